import type { NextFunction, Request, RequestHandler, Response } from 'express';

/** Forwards rejections of an async handler to the express error middleware */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void> | void
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
