import { Request, Response, NextFunction } from 'express';
import { DecodeError, TaskNotFoundError } from '../../domain/errors/PipelineErrors';

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
 * Payload too large error (413).
 */
export class PayloadTooLargeError extends AppError {
    constructor(message: string = 'Payload too large') {
        super(413, message);
        this.name = 'PayloadTooLargeError';
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

/**
 * Maps errors raised below the HTTP layer to their HTTP counterpart.
 */
function toAppError(err: Error): AppError | null {
    if (err instanceof AppError) {
        return err;
    }
    if (err instanceof DecodeError) {
        const mapped = new BadRequestError(err.message);
        mapped.name = err.name;
        return mapped;
    }
    if (err instanceof TaskNotFoundError) {
        return new NotFoundError(err.message);
    }
    // body-parser errors carry a status and a type
    if ('type' in err && err.type === 'entity.too.large') {
        return new PayloadTooLargeError('Request body is too large');
    }
    if ('type' in err && err.type === 'entity.parse.failed') {
        return new BadRequestError('Request body is not valid JSON');
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
    // Express recognizes error handlers by their four parameters
    _next: NextFunction
): void {
    const appError = toAppError(err);

    if (appError && appError.statusCode < 500) {
        console.warn(`[WARN] ${appError.name}: ${appError.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (appError) {
        const response: ErrorResponse = {
            error: {
                message: appError.message,
                code: appError.name,
            },
        };
        res.status(appError.statusCode).json(response);
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
