import type { NextFunction, Request, Response, RequestHandler } from "express";

/**
 * Wraps an async route handler so rejections reach the error middleware.
 */
export const asyncHandler =
    (handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
    (req, res, next) => {
        handler(req, res, next).catch(next);
    };
