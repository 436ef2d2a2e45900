import { Router, Request, Response } from 'express';
import { AppContext } from '../context';
import { fraudLogger, logger } from '../middleware/requestLogger';
import { NotFoundError } from '../middleware/errorHandler';
import { Transaction } from '../models/Transaction';

export function createTransactionRoutes(context: AppContext): Router {
    const router = Router();
    const { history } = context;

    /**
     * Append a transaction to the history without scoring it
     */
    router.post('/transactions', (req: Request, res: Response) => {
        const transaction = Transaction.fromRecord(req.body);
        history.add(transaction);

        logger.debug('Transaction recorded', {
            transactionId: transaction.transactionId,
            cardholderId: transaction.cardholderId,
            correlationId: req.correlationId,
        });

        res.status(201).json({ success: true, data: transaction.toRecord() });
    });

    router.post('/transactions/:id/fraud', (req: Request, res: Response) => {
        const transactionId = req.params['id'];
        const found = history.markFraud(transactionId);
        fraudLogger.transactionFlagged(transactionId, found);

        if (!found) {
            throw new NotFoundError(`Transaction not found: ${transactionId}`);
        }
        res.json({ success: true, data: { transactionId, isFraud: true } });
    });

    router.get('/cardholders/:id', (req: Request, res: Response) => {
        const cardholderId = req.params['id'];
        const transactions = history.byCardholder(cardholderId);
        if (transactions.length === 0) {
            throw new NotFoundError(`Cardholder not found: ${cardholderId}`);
        }

        const totalAmount = history.totalAmount(cardholderId);
        res.json({
            success: true,
            data: {
                cardholderId,
                transactionCount: transactions.length,
                totalAmount,
                averageAmount: totalAmount / transactions.length,
                merchants: [...new Set(transactions.map(t => t.merchantName))],
                countries: [...new Set(transactions.map(t => t.country))],
                fraudCount: transactions.filter(t => t.isFraud).length,
            },
        });
    });

    router.get('/stats', (_req: Request, res: Response) => {
        const transactions = history.all();
        res.json({
            success: true,
            data: {
                totalTransactions: history.size,
                cardholders: history.cardholderIds().length,
                fraudTransactions: history.fraudTransactions().length,
                totalAmount: transactions.reduce((sum, t) => sum + t.amount, 0),
                mlModel: context.mlModelService.getStatus(),
            },
        });
    });

    return router;
}
