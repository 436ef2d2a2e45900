import { Router } from 'express';
import { AppContext } from '../context';
import { createAnalysisRoutes } from './analysis.routes';
import { createHealthRoutes } from './health.routes';
import { createMLRoutes } from './ml.routes';
import { createTransactionRoutes } from './transaction.routes';

export function createRoutes(context: AppContext): Router {
    const router = Router();

    router.use(createHealthRoutes(context));
    router.use(createTransactionRoutes(context));
    router.use(createAnalysisRoutes(context));
    router.use(createMLRoutes(context));

    return router;
}
