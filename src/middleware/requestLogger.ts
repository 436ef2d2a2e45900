import winston from 'winston';
import { v4 as uuidv4 } from 'uuid';
import { Request, Response, NextFunction } from 'express';
import { config } from '../config/config';

declare global {
    namespace Express {
        interface Request {
            correlationId?: string;
        }
    }
}

// Sensitive fields to redact from logs
const SENSITIVE_FIELDS = [
    'password',
    'token',
    'accessToken',
    'authorization',
    'cookie',
    'apiKey',
    'secret',
    'cardNumber',
    'cvv',
];

// Redact sensitive data from objects
function redactSensitiveData(obj: unknown): unknown {
    if (typeof obj !== 'object' || obj === null) {
        return obj;
    }

    if (Array.isArray(obj)) {
        return obj.map(item => redactSensitiveData(item));
    }

    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
        const lowerKey = key.toLowerCase();
        if (SENSITIVE_FIELDS.some(field => lowerKey.includes(field.toLowerCase()))) {
            result[key] = '[REDACTED]';
        } else if (typeof value === 'object' && value !== null) {
            result[key] = redactSensitiveData(value);
        } else {
            result[key] = value;
        }
    }
    return result;
}

// Error fields are not enumerable, so copy them out before logging
function serializeError(error: unknown): unknown {
    if (error instanceof Error) {
        return { ...error, name: error.name, message: error.message, stack: error.stack };
    }
    return error;
}

// Custom log format for structured logging
const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp'] }),
    config.logging.format === 'json'
        ? winston.format.json()
        : winston.format.printf(({ level, message, timestamp, metadata }) => {
            const meta = typeof metadata === 'object' && metadata !== null && Object.keys(metadata).length
                ? ` ${JSON.stringify(metadata)}`
                : '';
            return `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}${meta}`;
        })
);

// Create the logger
export const logger = winston.createLogger({
    level: config.logging.level,
    format: logFormat,
    defaultMeta: { service: config.serviceName },
    silent: config.nodeEnv === 'test',
    transports: [
        new winston.transports.Console({
            handleExceptions: true,
            handleRejections: true,
        }),
        // File transports (production)
        ...(config.isProduction()
            ? [
                new winston.transports.File({
                    filename: 'logs/error.log',
                    level: 'error',
                    maxsize: 10 * 1024 * 1024, // 10MB
                    maxFiles: 10,
                }),
                new winston.transports.File({
                    filename: 'logs/combined.log',
                    maxsize: 10 * 1024 * 1024,
                    maxFiles: 20,
                }),
                new winston.transports.File({
                    filename: 'logs/fraud-analysis.log',
                    maxsize: 50 * 1024 * 1024, // 50MB for analysis logs
                    maxFiles: 30,
                }),
            ]
            : []),
    ],
});

// Fraud-specific logging functions
export const fraudLogger = {
    analysisCompleted: (
        transactionId: string,
        cardholderId: string,
        score: number,
        riskLevel: string,
        analysisTimeMs: number
    ) => {
        logger.info('Fraud analysis completed', {
            event: 'fraud.analysis.completed',
            transactionId,
            cardholderId,
            score,
            riskLevel,
            analysisTimeMs,
        });
    },

    fraudDetected: (
        transactionId: string,
        cardholderId: string,
        score: number,
        indicators: string[]
    ) => {
        logger.warn('Fraud detected', {
            event: 'fraud.detected',
            transactionId,
            cardholderId,
            score,
            indicators,
            severity: 'HIGH',
        });
    },

    suspiciousActivity: (
        transactionId: string,
        cardholderId: string,
        score: number,
        indicators: string[]
    ) => {
        logger.warn('Suspicious activity detected - verification required', {
            event: 'fraud.suspicious',
            transactionId,
            cardholderId,
            score,
            indicators,
            severity: 'MEDIUM',
        });
    },

    transactionFlagged: (transactionId: string, found: boolean) => {
        logger.info('Transaction marked as fraud', {
            event: 'fraud.transaction.flagged',
            transactionId,
            found,
        });
    },

    velocityViolation: (cardholderId: string, windowType: string, count: number) => {
        logger.warn('Velocity violation detected', {
            event: 'fraud.velocity.violation',
            cardholderId,
            windowType,
            count,
        });
    },

    geographicAnomaly: (
        cardholderId: string,
        transactionId: string,
        reason: string,
        details: Record<string, unknown>
    ) => {
        const redacted = redactSensitiveData(details);
        logger.warn('Geographic anomaly detected', {
            event: 'fraud.geographic.anomaly',
            cardholderId,
            transactionId,
            reason,
            ...(typeof redacted === 'object' && redacted !== null ? redacted : {}),
        });
    },

    mlModelTrained: (version: string, samples: number, epochsTrained: number, trainTimeMs: number) => {
        logger.info('ML model trained', {
            event: 'ml.model.trained',
            version,
            samples,
            epochsTrained,
            trainTimeMs,
        });
    },

    mlModelLoaded: (version: string, loadTimeMs: number) => {
        logger.info('ML model loaded', {
            event: 'ml.model.loaded',
            version,
            loadTimeMs,
        });
    },

    mlModelSaved: (version: string, modelPath: string) => {
        logger.info('ML model saved', {
            event: 'ml.model.saved',
            version,
            modelPath,
        });
    },

    mlModelError: (version: string, error: unknown) => {
        const details = serializeError(error);
        logger.error('ML model error', {
            event: 'ml.model.error',
            version,
            error: config.logging.sensitiveFieldMasking ? redactSensitiveData(details) : details,
        });
    },

    mlInference: (transactionId: string, score: number, inferenceTimeMs: number) => {
        logger.debug('ML inference completed', {
            event: 'ml.inference.completed',
            transactionId,
            score,
            inferenceTimeMs,
        });
    },
};

// Request logging helper
export function createRequestLogData(
    method: string,
    url: string,
    statusCode: number,
    responseTime: number,
    ip: string,
    correlationId: string
): Record<string, unknown> {
    return {
        event: 'http.request',
        method,
        url: url.split('?')[0], // Remove query params
        statusCode,
        responseTime: `${responseTime}ms`,
        ip,
        correlationId,
    };
}

/**
 * Express middleware for request logging
 */
export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : uuidv4();
    req.correlationId = correlationId;
    res.setHeader('x-correlation-id', correlationId);

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = createRequestLogData(
            req.method,
            req.originalUrl || req.url,
            res.statusCode,
            duration,
            req.ip || req.socket.remoteAddress || 'unknown',
            correlationId
        );
        logger.info('HTTP Request', logData);
    });

    next();
}
