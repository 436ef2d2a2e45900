import { Router, Request, Response } from 'express';
import Joi from 'joi';
import { config } from '../config/config';
import { AppContext } from '../context';
import { ValidationError, asyncHandler } from '../middleware/errorHandler';
import { Transaction } from '../models/Transaction';
import { Label } from '../types';

interface TrainRequest {
    samples: Array<{ transaction: unknown; label: Label }>;
}

const trainSchema = Joi.object<TrainRequest>({
    samples: Joi.array()
        .items(Joi.object({
            transaction: Joi.object().required(),
            label: Joi.number().valid(0, 1).required(),
        }))
        .min(1)
        .required(),
});

export function createMLRoutes(context: AppContext): Router {
    const router = Router();
    const { history, mlModelService } = context;

    /**
     * Train both models on the labelled transactions, then record them.
     * Each sample's features come from the history as it was before the request.
     */
    router.post('/ml/train', (req: Request, res: Response) => {
        const { error, value } = trainSchema.validate(req.body);
        if (error) {
            throw new ValidationError(`Invalid request data: ${error.message}`);
        }

        const samples = value.samples.map(sample => ({
            transaction: Transaction.fromRecord(sample.transaction),
            label: sample.label,
        }));
        const summary = mlModelService.trainModels(samples);
        samples.forEach(sample => history.add(sample.transaction));

        res.json({ success: true, data: summary });
    });

    router.post('/ml/predict', (req: Request, res: Response) => {
        const transaction = Transaction.fromRecord(req.body);
        const prediction = mlModelService.predictFraudProbability(transaction);
        res.json({ success: true, data: prediction });
    });

    router.post('/ml/save', asyncHandler(async (_req: Request, res: Response) => {
        await mlModelService.saveModels(config.ml.modelPath);
        res.json({ success: true, data: { modelPath: config.ml.modelPath, version: mlModelService.getModelVersion() } });
    }));

    router.post('/ml/load', asyncHandler(async (_req: Request, res: Response) => {
        await mlModelService.loadModels(config.ml.modelPath);
        res.json({ success: true, data: mlModelService.getStatus() });
    }));

    return router;
}
