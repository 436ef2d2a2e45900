import fs from 'fs';
import { createApp } from './app';
import { createContext, disposeContext } from './context';
import { config } from './config/config';
import { logger } from './middleware/requestLogger';

async function startServer(): Promise<void> {
    logger.info(`Starting ${config.serviceName}...`);

    const context = createContext();

    // 1. Restore a saved model if one exists
    if (fs.existsSync(config.ml.modelPath)) {
        await context.mlModelService.loadModels(config.ml.modelPath);
    } else {
        logger.warn('No saved ML model found, /ml/predict is unavailable until training', {
            modelPath: config.ml.modelPath,
        });
    }

    // 2. Start Express Server
    const app = createApp(context);
    const server = app.listen(config.port, config.host, () => {
        logger.info(`Server running on http://${config.host}:${config.port}`);
        logger.info(`Environment: ${config.nodeEnv}`);
    });

    // Handle graceful shutdown
    const shutdown = (): void => {
        logger.info('Shutting down service...');
        server.close(error => {
            disposeContext(context);
            if (error) {
                logger.error('Error during shutdown', { error });
                process.exit(1);
            }
            logger.info('Service shutdown complete');
            process.exit(0);
        });
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
}

startServer().catch(error => {
    logger.error('Failed to start server', { error });
    process.exit(1);
});
