import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import { rateLimit } from 'express-rate-limit';
import { AppContext } from './context';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLoggerMiddleware } from './middleware/requestLogger';
import { createRoutes } from './routes';
import { config } from './config/config';

export function createApp(context: AppContext): Express {
    const app = express();

    // Security Middleware
    app.use(helmet());
    app.use(cors());
    app.use(compression());

    const limiter = rateLimit({
        windowMs: config.security.rateLimitWindowMs,
        limit: config.security.rateLimitMax,
        standardHeaders: 'draft-7',
        legacyHeaders: false,
        message: {
            success: false,
            error: {
                code: 'RATE_LIMIT_EXCEEDED',
                message: 'Too many requests, please try again later.',
            },
        },
    });
    app.use(limiter);

    // Body parsing with size limit from config
    app.use(express.json({ limit: config.security.maxRequestSize }));

    // Request Logging
    app.use(requestLoggerMiddleware);

    // Routes
    app.use('/api/v1', createRoutes(context));

    // 404 & Error Handling
    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}
