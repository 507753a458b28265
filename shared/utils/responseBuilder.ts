import { Response } from "express";

export interface FieldError {
    field: string;
    message: string;
}

export const errorResponse = (
    res: Response,
    {
        statusCode = 400,
        message,
        errors,
    }: { statusCode?: number; message: string; errors?: FieldError[] | string[] }
) => {
    return res.status(statusCode).json({
        success: false,
        message,
        errors,
    });
};

export const successResponse = <T>(
    res: Response,
    {
        statusCode = 200,
        message,
        data,
    }: { statusCode?: number; message: string; data?: T }
) => {
    return res.status(statusCode).json({
        success: true,
        message,
        data,
    });
};
