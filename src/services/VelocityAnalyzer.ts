import { config } from '../config/config';
import { logger, fraudLogger } from '../middleware/requestLogger';
import { TransactionHistory } from '../models/TransactionHistory';
import { VelocityResult } from '../types';
import { MS_PER_MINUTE, dateKey } from '../utils/dates';
import { countBy, mean } from '../utils/statistics';

export type VelocityAnalyzerOptions = typeof config.analysis.velocity;

/**
 * Velocity Analyzer Service
 * Detects abnormal transaction frequency patterns that may indicate fraud
 */
export class VelocityAnalyzer {
    constructor(
        private readonly history: TransactionHistory,
        private readonly options: VelocityAnalyzerOptions = config.analysis.velocity
    ) { }

    /**
     * Count the cardholder's transactions in the window ending at their latest transaction
     */
    checkRapidTransactions(cardholderId: string): VelocityResult {
        const transactions = this.history.byCardholder(cardholderId);

        if (transactions.length < this.options.minHistory) {
            return { triggered: false, confidence: 0, count: 0 };
        }

        const latest = transactions.reduce((max, t) => Math.max(max, t.timestamp.getTime()), -Infinity);
        const windowStart = latest - this.options.windowMinutes * MS_PER_MINUTE;

        const count = transactions.filter(t => {
            const time = t.timestamp.getTime();
            return windowStart <= time && time <= latest;
        }).length;

        const threshold = this.options.countThreshold;
        const triggered = count >= threshold;

        if (triggered) {
            fraudLogger.velocityViolation(cardholderId, `${this.options.windowMinutes}min`, count);
        }

        return {
            triggered,
            confidence: triggered ? Math.min((count - 2) / threshold, 1.0) : 0,
            count,
        };
    }

    /**
     * Compare the target date's transaction count with the cardholder's average per active day
     */
    checkHighFrequencyDay(cardholderId: string, targetDate: Date): VelocityResult {
        const transactions = this.history.byCardholder(cardholderId);

        if (transactions.length < this.options.dailyMinHistory) {
            return { triggered: false, confidence: 0, count: 0 };
        }

        const dailyCounts = countBy(transactions, t => dateKey(t.timestamp));
        const averageDaily = mean([...dailyCounts.values()]);
        const targetDayCount = dailyCounts.get(dateKey(targetDate)) ?? 0;

        const triggered = targetDayCount > averageDaily * this.options.dailyMultiplier;

        if (triggered) {
            fraudLogger.velocityViolation(cardholderId, '1day', targetDayCount);
        }

        logger.debug('Daily velocity analysis complete', {
            cardholderId,
            averageDaily,
            targetDayCount,
        });

        return {
            triggered,
            confidence: triggered ? Math.min((targetDayCount - averageDaily) / averageDaily, 1.0) : 0,
            count: targetDayCount,
        };
    }
}
