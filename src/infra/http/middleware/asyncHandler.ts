import type { NextFunction, Request, Response } from 'express';

/**
 * Wrap an async Express handler so it returns void (no-misused-promises)
 * and forwards rejections to next().
 */
export function asyncHandler<Req extends Request = Request>(
  fn: (req: Req, res: Response, next: NextFunction) => Promise<unknown>
): (req: Req, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
