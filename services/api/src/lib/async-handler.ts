import type { NextFunction, RequestHandler, Response } from "express";
import type { RequestWithActor } from "./auth-middleware";

/**
 * Wraps an async Express route handler so any rejection is passed to Express error handling.
 *
 * @param fn - The async route handler; sees the request with its resolved actor.
 */
export function asyncHandler(
  fn: (req: RequestWithActor, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    void Promise.resolve(fn(req, res, next)).catch(next);
  };
}
