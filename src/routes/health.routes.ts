import { Router, Request, Response } from 'express';
import { config } from '../config/config';
import { AppContext } from '../context';
import { HealthCheckResponse } from '../types';

export function createHealthRoutes(context: AppContext): Router {
    const router = Router();

    router.get('/health', (_req: Request, res: Response) => {
        const modelReady = context.mlModelService.isModelReady();

        // Rule engine always answers; an untrained model only limits /ml/predict
        const body: HealthCheckResponse = {
            status: modelReady ? 'healthy' : 'degraded',
            service: config.serviceName,
            timestamp: new Date().toISOString(),
            checks: {
                engine: 'ready',
                mlModel: modelReady ? 'trained' : 'not_trained',
            },
        };

        res.status(200).json(body);
    });

    return router;
}
