import { config } from '../config/config';
import { logger } from '../middleware/requestLogger';
import { TransactionHistory } from '../models/TransactionHistory';
import { IndicatorResult } from '../types';
import { hourOfDay } from '../utils/dates';
import { countBy } from '../utils/statistics';

export type TimeAnalyzerOptions = typeof config.analysis.time;

/**
 * Time Analyzer Service
 * Detects transactions at hours the cardholder rarely uses
 */
export class TimeAnalyzer {
    constructor(
        private readonly history: TransactionHistory,
        private readonly options: TimeAnalyzerOptions = config.analysis.time
    ) { }

    analyze(cardholderId: string, timestamp: Date): IndicatorResult {
        const transactions = this.history.byCardholder(cardholderId);

        if (transactions.length < this.options.minHistory) {
            return { triggered: false, confidence: 0 };
        }

        const hour = hourOfDay(timestamp);
        const hourCounts = this.buildHourHistogram(cardholderId);
        const frequency = (hourCounts.get(hour) ?? 0) / transactions.length;

        const triggered = frequency < this.options.rareHourFrequency;

        logger.debug('Time analysis complete', {
            cardholderId,
            hour,
            frequency,
            triggered,
        });

        return {
            triggered,
            confidence: triggered ? 1.0 - frequency : 0,
        };
    }

    /**
     * Transaction count per hour of day (0-23) over the cardholder's history
     */
    buildHourHistogram(cardholderId: string): Map<number, number> {
        return countBy(this.history.byCardholder(cardholderId), t => hourOfDay(t.timestamp));
    }
}
