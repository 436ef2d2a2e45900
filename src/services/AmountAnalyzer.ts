import { config } from '../config/config';
import { logger } from '../middleware/requestLogger';
import { TransactionHistory } from '../models/TransactionHistory';
import { IndicatorResult } from '../types';
import { mean, sampleStandardDeviation } from '../utils/statistics';

export type AmountAnalyzerOptions = typeof config.analysis.amount;

/**
 * Amount Analyzer Service
 * Flags amounts that deviate statistically from the cardholder's history
 */
export class AmountAnalyzer {
    constructor(
        private readonly history: TransactionHistory,
        private readonly options: AmountAnalyzerOptions = config.analysis.amount
    ) { }

    /**
     * Z-score check of a new amount against the cardholder's past amounts
     */
    analyze(cardholderId: string, amount: number): IndicatorResult {
        const transactions = this.history.byCardholder(cardholderId);

        if (transactions.length < this.options.minHistory) {
            return { triggered: false, confidence: 0 };
        }

        const amounts = transactions.map(t => t.amount);
        const average = mean(amounts);
        const stdDev = sampleStandardDeviation(amounts);

        if (stdDev === 0) {
            // Every historical amount is identical
            if (Math.abs(amount - average) > average * this.options.flatDeviationRatio) {
                return { triggered: true, confidence: this.options.flatConfidence };
            }
            return { triggered: false, confidence: 0 };
        }

        const zScore = Math.abs((amount - average) / stdDev);
        const result = {
            triggered: zScore > this.options.zScoreThreshold,
            confidence: Math.min(zScore / 3.0, 1.0),
        };

        logger.debug('Amount analysis complete', {
            cardholderId,
            amount,
            average,
            stdDev,
            zScore,
        });

        return result;
    }
}
