import { Request, Response, NextFunction } from 'express';
import { InvalidPostError } from '../../domain/entities/PostRecord';
import { PublishError, StoreError } from '../../domain/errors/PublishingErrors';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
    };
}

function statusFor(err: Error): number | null {
    if (err instanceof AppError) {
        return err.statusCode;
    }
    if (err instanceof InvalidPostError) {
        return 400;
    }
    // Upstream dependency (sheet or LinkedIn) failed
    if (err instanceof StoreError || err instanceof PublishError) {
        return 502;
    }
    return null;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    // Express only treats 4-argument middleware as an error handler
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    next: NextFunction
): void {
    const status = statusFor(err);

    if (status !== null && status < 500) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (status !== null) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.name,
            },
        };
        res.status(status).json(response);
        return;
    }

    // Generic server error
    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(500).json(response);
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
