import { Response } from 'express';
import { AppError } from './errors';

/**
 * Answers a failed request. Domain errors keep their status and code;
 * anything else is logged and reported as a 500.
 */
export const sendError = (res: Response, error: unknown, context: string) => {
    if (error instanceof AppError) {
        if (error.status >= 500) {
            console.error(`${context}:`, error);
        }
        return res.status(error.status).json({
            message: error.message,
            code: error.code,
            ...(error.details ? { details: error.details } : {}),
        });
    }

    console.error(`${context}:`, error);
    return res.status(500).json({ message: context });
};
