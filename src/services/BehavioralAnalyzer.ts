import { config } from '../config/config';
import { logger } from '../middleware/requestLogger';
import { Transaction } from '../models/Transaction';
import { TransactionHistory } from '../models/TransactionHistory';
import { IndicatorResult } from '../types';

export type BehavioralAnalyzerOptions = typeof config.analysis.behavioral;

/**
 * Behavioral Analyzer Service
 * Compares merchant and category choices with the cardholder's habits
 */
export class BehavioralAnalyzer {
    constructor(
        private readonly history: TransactionHistory,
        private readonly options: BehavioralAnalyzerOptions = config.analysis.behavioral
    ) { }

    /**
     * Flags categories that make up less than the rarity threshold of history
     */
    checkCategoryDeviation(cardholderId: string, transaction: Transaction): IndicatorResult {
        const transactions = this.history.byCardholder(cardholderId);

        if (transactions.length < this.options.categoryMinHistory) {
            return { triggered: false, confidence: 0 };
        }

        const occurrences = transactions.filter(t => t.merchantCategory === transaction.merchantCategory).length;
        const frequency = occurrences / transactions.length;
        const triggered = frequency < this.options.rareCategoryFrequency;

        logger.debug('Category analysis complete', {
            cardholderId,
            category: transaction.merchantCategory,
            frequency,
        });

        return {
            triggered,
            confidence: triggered ? 1.0 - frequency : 0,
        };
    }

    /**
     * Flags merchants the cardholder has never paid before
     */
    checkMerchantPattern(cardholderId: string, transaction: Transaction): IndicatorResult {
        const transactions = this.history.byCardholder(cardholderId);

        if (transactions.length < this.options.merchantMinHistory) {
            return { triggered: false, confidence: 0 };
        }

        const knownMerchants = new Set(transactions.map(t => t.merchantName));
        const triggered = !knownMerchants.has(transaction.merchantName);

        return {
            triggered,
            confidence: triggered ? this.options.newMerchantConfidence : 0,
        };
    }
}
