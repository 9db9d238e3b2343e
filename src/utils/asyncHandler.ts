import { NextFunction, Request, RequestHandler, Response } from "express";

// Forwards rejections from async route handlers to the error middleware.
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };
