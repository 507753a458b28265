// shared/middlewares/globalErrorHandler.ts
import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { AppError } from "../config/errorHandler";
import { logApiError } from "../config/logger";

export const globalErrorHandler = (
    err: Error | AppError,
    req: Request,
    res: Response,
    _next: NextFunction
) => {
    // Schemas parsed inside handlers surface here
    if (err instanceof ZodError) {
        logApiError(err, req, res, 400);
        return res.status(400).json({
            success: false,
            message: "Validation error",
            errors: err.errors.map((e) => ({ field: e.path.join("."), message: e.message })),
        });
    }

    const statusCode = err instanceof AppError ? err.statusCode : 500;
    const message =
        err instanceof AppError ? err.message : "Something went wrong";

    logApiError(err, req, res, statusCode);

    return res.status(statusCode).json({
        success: false,
        message,
        ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
    });
};
