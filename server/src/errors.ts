/**
 * Request-terminal error types.
 *
 * Each error carries the HTTP status and machine-readable code the error
 * handler responds with. The message is the one-line text sent to the client;
 * anything more detailed goes into `detail` and is only logged.
 */

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly detail?: string;

  constructor(message: string, statusCode: number, code: string, detail?: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.detail = detail;
  }
}

/** The HTTP body could not be read from the socket. */
export class RequestBodyUnreadableError extends AppError {
  constructor(detail?: string) {
    super("Failed to read request body", 500, "REQUEST_BODY_UNREADABLE", detail);
  }
}

/** Body is not JSON, or is JSON of the wrong shape. */
export class MalformedJsonError extends AppError {
  constructor(detail?: string) {
    super("Invalid request", 400, "MALFORMED_JSON", detail);
  }
}

/** A message's content is neither a typed-part list nor a string. */
export class MalformedContentError extends AppError {
  constructor(detail?: string) {
    super("Invalid content format in message", 400, "MALFORMED_CONTENT", detail);
  }
}

export class NoPromptProvidedError extends AppError {
  constructor() {
    super("No user prompt provided", 400, "NO_PROMPT_PROVIDED");
  }
}

export class InvalidBase64Error extends AppError {
  constructor(detail?: string) {
    super("Invalid base64 image data", 400, "INVALID_BASE64", detail);
  }
}

/**
 * A referenced image could not be retrieved. `prompt` holds the prompt text
 * assembled before the fetch was attempted.
 */
export class ImageFetchFailedError extends AppError {
  readonly prompt: string;

  constructor(message: string, prompt: string, detail?: string) {
    super(message, 400, "IMAGE_FETCH_FAILED", detail);
    this.prompt = prompt;
  }
}

/** The generation executable could not be started or exited non-zero. */
export class GenerationFailedError extends AppError {
  constructor(detail?: string) {
    super("Failed to run model", 500, "GENERATION_FAILED", detail);
  }
}

/** The generated image is missing, unreadable, or could not be saved. */
export class OutputUnavailableError extends AppError {
  constructor(message: string, detail?: string) {
    super(message, 500, "OUTPUT_UNAVAILABLE", detail);
  }
}

/** The client went away before its request could be served. */
export class RequestCancelledError extends AppError {
  constructor(detail?: string) {
    super("Request cancelled", 499, "REQUEST_CANCELLED", detail);
  }
}
