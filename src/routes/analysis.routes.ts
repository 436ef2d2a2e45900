import { Router, Request, Response } from 'express';
import Joi from 'joi';
import { AppContext } from '../context';
import { ValidationError } from '../middleware/errorHandler';
import { Transaction } from '../models/Transaction';

const batchSchema = Joi.object<{ transactions: unknown[] }>({
    transactions: Joi.array().items(Joi.object().required()).min(1).max(1000).required(),
});

export function createAnalysisRoutes(context: AppContext): Router {
    const router = Router();
    const { history, fraudDetectionService } = context;

    /**
     * Score one transaction against the prior history, then record it
     */
    router.post('/analyze', (req: Request, res: Response) => {
        const transaction = Transaction.fromRecord(req.body);
        const result = fraudDetectionService.analyzeTransaction(transaction);
        history.add(transaction);

        res.json({ success: true, data: result.toJSON() });
    });

    /**
     * Record every transaction, then score each one against the full history
     */
    router.post('/analyze/batch', (req: Request, res: Response) => {
        const { error, value } = batchSchema.validate(req.body);
        if (error) {
            throw new ValidationError(`Invalid request data: ${error.message}`);
        }

        const transactions = value.transactions.map(record => Transaction.fromRecord(record));
        transactions.forEach(transaction => history.add(transaction));

        const results = fraudDetectionService.batchAnalyze(transactions);
        res.json({
            success: true,
            data: {
                results: results.map(result => result.toJSON()),
                summary: fraudDetectionService.generateSummaryReport(results),
            },
        });
    });

    return router;
}
