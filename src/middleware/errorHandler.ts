import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { config } from '../config/config';
import { logger } from './requestLogger';

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;
    public readonly code: string;

    constructor(
        message: string,
        statusCode: number = 500,
        code: string = 'INTERNAL_ERROR',
        isOperational: boolean = true
    ) {
        super(message);
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.code = code;
        this.isOperational = isOperational;

        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Specific error types for fraud scoring
 */
export class ValidationError extends AppError {
    constructor(message: string) {
        super(message, 400, 'VALIDATION_ERROR');
    }
}

export class ParseError extends AppError {
    constructor(message: string) {
        super(message, 400, 'PARSE_ERROR');
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 404, 'NOT_FOUND');
    }
}

export class ModelNotTrainedError extends AppError {
    constructor(message: string = 'ML models not yet trained. Train or load a model first.') {
        super(message, 409, 'MODEL_NOT_TRAINED');
    }
}

export class ModelLoadError extends AppError {
    constructor(message: string) {
        super(message, 500, 'MODEL_LOAD_ERROR', false);
    }
}

export class ModelFormatError extends AppError {
    constructor(message: string) {
        super(message, 422, 'MODEL_FORMAT_ERROR');
    }
}

/**
 * Error response interface
 */
interface ErrorResponse {
    success: false;
    error: {
        code: string;
        message: string;
        timestamp: string;
        correlationId?: string;
    };
}

export interface ErrorDescription {
    statusCode: number;
    code: string;
    message: string;
    isOperational: boolean;
}

// body-parser tags its failures with a `type` such as 'entity.parse.failed'
function bodyParserType(err: Error): string | undefined {
    return 'type' in err && typeof err.type === 'string' ? err.type : undefined;
}

/**
 * Map anything thrown inside a route to the status and code the API reports
 */
export function describeError(err: Error): ErrorDescription {
    if (err instanceof AppError) {
        return {
            statusCode: err.statusCode,
            code: err.code,
            message: err.message,
            isOperational: err.isOperational,
        };
    }

    if (Joi.isError(err)) {
        return { statusCode: 400, code: 'VALIDATION_ERROR', message: `Invalid request data: ${err.message}`, isOperational: true };
    }

    switch (bodyParserType(err)) {
        case 'entity.parse.failed':
            return { statusCode: 400, code: 'PARSE_ERROR', message: 'Malformed JSON request body', isOperational: true };
        case 'entity.too.large':
            return {
                statusCode: 413,
                code: 'PAYLOAD_TOO_LARGE',
                message: `Request body exceeds ${config.security.maxRequestSize} bytes`,
                isOperational: true,
            };
        default:
            return { statusCode: 500, code: 'INTERNAL_ERROR', message: err.message, isOperational: false };
    }
}

/**
 * Global error handler middleware
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const correlationId = req.correlationId;
    const { statusCode, code, isOperational, message: detail } = describeError(err);

    if (isOperational) {
        logger.warn('Operational error', {
            code,
            message: detail,
            statusCode,
            correlationId,
            path: req.path,
        });
    } else {
        logger.error('System error', {
            code,
            message: err.message,
            stack: err.stack,
            statusCode,
            correlationId,
            path: req.path,
        });
    }

    // Only application errors carry a 500 message meant for clients, and never in production
    const opaque = statusCode === 500 && (config.isProduction() || !(err instanceof AppError));
    const message = opaque ? 'An unexpected error occurred' : detail;

    const errorResponse: ErrorResponse = {
        success: false,
        error: {
            code,
            message,
            timestamp: new Date().toISOString(),
            correlationId,
        },
    };

    res.status(statusCode).json(errorResponse);
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(
    req: Request,
    _res: Response,
    next: NextFunction
): void {
    const error = new AppError(`Route not found: ${req.method} ${req.path}`, 404, 'NOT_FOUND');
    next(error);
}

/**
 * Async handler wrapper to catch async errors
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}
