import { Request, Response, NextFunction } from 'express';
import { JobNotFoundError, JobStateError, PipelineError } from '../../domain/errors/PipelineErrors';

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
 * Conflict error (409): the resource is not in a state that allows the request.
 */
export class ConflictError extends AppError {
    constructor(message: string = 'Conflict') {
        super(409, message);
        this.name = 'ConflictError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
        details?: unknown;
    };
}

/**
 * Maps domain errors that reach the HTTP layer onto AppErrors.
 */
function toAppError(err: Error): AppError | null {
    if (err instanceof AppError) {
        return err;
    }
    if (err instanceof JobNotFoundError) {
        return new NotFoundError(err.message);
    }
    if (err instanceof JobStateError) {
        return new ConflictError(err.message);
    }
    if (err instanceof PipelineError && err.kind === 'invalid_config') {
        return new BadRequestError(err.message);
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
    // Express recognises error handlers by their four parameters
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
