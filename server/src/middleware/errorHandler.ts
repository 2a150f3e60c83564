import { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { AppError, MalformedJsonError, RequestBodyUnreadableError } from "../errors";
import { monitoringService } from "../services/monitoringService";

/**
 * Shape of the errors body-parser raises while reading a request body.
 * See https://github.com/expressjs/body-parser#errors
 */
interface BodyParserError extends Error {
  type: string;
  status?: number;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return err instanceof Error && "type" in err && typeof err.type === "string";
}

/** Map body-parser failures onto the service's error types. */
function fromBodyParserError(err: BodyParserError): AppError {
  switch (err.type) {
    case "entity.parse.failed":
    case "encoding.unsupported":
    case "charset.unsupported":
      return new MalformedJsonError(err.message);
    case "entity.too.large":
      return new AppError("Request body too large", 413, "PAYLOAD_TOO_LARGE", err.message);
    default:
      return new RequestBodyUnreadableError(`${err.type}: ${err.message}`);
  }
}

function toAppError(err: unknown): AppError {
  if (err instanceof AppError) {
    return err;
  }
  if (isBodyParserError(err)) {
    return fromBodyParserError(err);
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new AppError("Internal server error", 500, "INTERNAL_ERROR", detail);
}

/**
 * Terminal error middleware. Every failure becomes a one-line JSON error;
 * the detail only reaches the server log.
 */
function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(err);
  const { statusCode, code, detail } = appError;
  const requestId = req.requestId;

  monitoringService.recordError();

  if (statusCode >= 500) {
    logger.error("server", `${statusCode} - ${appError.message}`, {
      requestId,
      statusCode,
      code,
      detail,
      ...(process.env.NODE_ENV === "development" && err instanceof Error && { stack: err.stack }),
    });
  } else {
    logger.warn("server", `${statusCode} - ${appError.message}`, {
      requestId,
      statusCode,
      code,
      detail,
    });
  }

  if (res.headersSent) {
    return;
  }

  res.status(statusCode).json({
    error: {
      message: appError.message,
      code,
      requestId,
    },
  });
}

export { errorHandler };
