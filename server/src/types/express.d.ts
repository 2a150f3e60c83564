/**
 * Type augmentation for Express Request.
 * Adds the request id attached by the requestLogger middleware.
 */

export {};

declare global {
  namespace Express {
    interface Request {
      /** UUID assigned by requestLogger; also sent as X-Request-Id. */
      requestId?: string;
    }
  }
}
