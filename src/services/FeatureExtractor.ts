import { logger } from '../middleware/requestLogger';
import { Transaction } from '../models/Transaction';
import { TransactionHistory } from '../models/TransactionHistory';
import { TransactionFeatures } from '../types';
import { MS_PER_DAY, dateKey, hourOfDay, weekday } from '../utils/dates';
import { GeographicAnalyzer, mostRecentTransaction } from './GeographicAnalyzer';
import { VelocityAnalyzer } from './VelocityAnalyzer';

/**
 * Feature order of the ML vector. Models are trained and queried in this order.
 */
export const FEATURE_NAMES = [
    'amount',
    'hourOfDay',
    'dayOfWeek',
    'isWeekend',
    'amountZScore',
    'daysSinceLastTransaction',
    'transactionsToday',
    'transactionsThisWeek',
    'isNewMerchant',
    'isNewCategory',
    'impossibleTravelScore',
    'isNewCountry',
    'categoryFrequency',
    'merchantFrequency',
    'rapidTransactionCount',
] as const satisfies ReadonlyArray<keyof TransactionFeatures>;

export const FEATURE_COUNT = FEATURE_NAMES.length;

/**
 * Convert TransactionFeatures to a vector in FEATURE_NAMES order
 */
export function featuresToArray(features: TransactionFeatures): number[] {
    return FEATURE_NAMES.map(name => Number(features[name]));
}

/**
 * Extracts ML features from a transaction and its cardholder's history
 */
export class FeatureExtractor {
    private readonly geographicAnalyzer: GeographicAnalyzer;
    private readonly velocityAnalyzer: VelocityAnalyzer;

    constructor(private readonly history: TransactionHistory) {
        this.geographicAnalyzer = new GeographicAnalyzer(history);
        this.velocityAnalyzer = new VelocityAnalyzer(history);
    }

    extractFeatures(transaction: Transaction): TransactionFeatures {
        const { cardholderId } = transaction;
        const history = this.history.byCardholder(cardholderId);
        const time = transaction.timestamp.getTime();

        // Amount
        let amountZScore = 0;
        if (history.length > 0) {
            const average = history.reduce((sum, t) => sum + t.amount, 0) / history.length;
            amountZScore = (transaction.amount - average) / Math.max(1, average * 0.5);
        }

        // Time
        const dayOfWeek = weekday(transaction.timestamp);
        const latest = mostRecentTransaction(history);
        const daysSinceLastTransaction = latest
            ? Math.floor((time - latest.timestamp.getTime()) / MS_PER_DAY)
            : 0;

        const today = dateKey(transaction.timestamp);
        const transactionsToday = history.filter(t => dateKey(t.timestamp) === today).length;

        const weekAgo = time - 7 * MS_PER_DAY;
        const transactionsThisWeek = history.filter(t => t.timestamp.getTime() >= weekAgo).length;

        // Merchant and category
        const denominator = Math.max(1, history.length);
        const merchantCount = history.filter(t => t.merchantName === transaction.merchantName).length;
        const categoryCount = history.filter(t => t.merchantCategory === transaction.merchantCategory).length;

        // Geography and velocity
        const travel = this.geographicAnalyzer.checkImpossibleTravel(cardholderId, transaction);
        const rapid = this.velocityAnalyzer.checkRapidTransactions(cardholderId);

        const features: TransactionFeatures = {
            amount: transaction.amount,
            hourOfDay: hourOfDay(transaction.timestamp),
            dayOfWeek,
            isWeekend: dayOfWeek >= 5,
            amountZScore,
            daysSinceLastTransaction,
            transactionsToday,
            transactionsThisWeek,
            isNewMerchant: merchantCount === 0,
            isNewCategory: categoryCount === 0,
            impossibleTravelScore: travel.confidence,
            isNewCountry: !history.some(t => t.country === transaction.country),
            categoryFrequency: categoryCount / denominator,
            merchantFrequency: merchantCount / denominator,
            rapidTransactionCount: rapid.count,
        };

        logger.debug('Features extracted', {
            transactionId: transaction.transactionId,
            cardholderId,
            historySize: history.length,
        });

        return features;
    }

    extractVector(transaction: Transaction): number[] {
        return featuresToArray(this.extractFeatures(transaction));
    }
}
