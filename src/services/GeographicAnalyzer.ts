import { config } from '../config/config';
import { logger, fraudLogger } from '../middleware/requestLogger';
import { Transaction } from '../models/Transaction';
import { TransactionHistory } from '../models/TransactionHistory';
import { GeoPoint, IndicatorResult, TravelResult } from '../types';
import { MS_PER_HOUR } from '../utils/dates';

export type GeographicAnalyzerOptions = typeof config.analysis.geographic;

const EARTH_RADIUS_KM = 6371;

/**
 * Latest transaction by timestamp; the earliest inserted wins ties
 */
export function mostRecentTransaction(transactions: readonly Transaction[]): Transaction | undefined {
    let latest: Transaction | undefined;
    for (const transaction of transactions) {
        if (!latest || transaction.timestamp.getTime() > latest.timestamp.getTime()) {
            latest = transaction;
        }
    }
    return latest;
}

/**
 * Geographic Analyzer Service
 * Detects impossible travel and transactions from countries the cardholder never used
 */
export class GeographicAnalyzer {
    constructor(
        private readonly history: TransactionHistory,
        private readonly options: GeographicAnalyzerOptions = config.analysis.geographic
    ) { }

    /**
     * Great-circle distance in km (Haversine formula)
     */
    static calculateDistance(from: GeoPoint, to: GeoPoint): number {
        const dLat = GeographicAnalyzer.toRad(to.latitude - from.latitude);
        const dLon = GeographicAnalyzer.toRad(to.longitude - from.longitude);

        const a =
            Math.sin(dLat / 2) ** 2 +
            Math.cos(GeographicAnalyzer.toRad(from.latitude)) *
            Math.cos(GeographicAnalyzer.toRad(to.latitude)) *
            Math.sin(dLon / 2) ** 2;

        const c = 2 * Math.asin(Math.sqrt(a));
        return EARTH_RADIUS_KM * c;
    }

    private static toRad(deg: number): number {
        return deg * (Math.PI / 180);
    }

    /**
     * Speed needed to get from the cardholder's latest transaction to this one
     */
    checkImpossibleTravel(cardholderId: string, transaction: Transaction): TravelResult {
        const previous = mostRecentTransaction(this.history.byCardholder(cardholderId));

        if (!previous) {
            return { triggered: false, confidence: 0, speedKmH: null };
        }

        const distanceKm = GeographicAnalyzer.calculateDistance(previous.location, transaction.location);
        const hours = (transaction.timestamp.getTime() - previous.timestamp.getTime()) / MS_PER_HOUR;

        if (hours <= 0) {
            return { triggered: false, confidence: 0, speedKmH: null };
        }

        const maxSpeed = this.options.maxReasonableSpeedKmH;
        const speedKmH = distanceKm / hours;
        const triggered = speedKmH > maxSpeed;

        if (triggered) {
            fraudLogger.geographicAnomaly(cardholderId, transaction.transactionId, 'impossible_travel', {
                previousCountry: previous.country,
                currentCountry: transaction.country,
                distanceKm,
                hours,
                speedKmH,
            });
        }

        return {
            triggered,
            confidence: triggered ? Math.min((speedKmH - maxSpeed) / maxSpeed, 1.0) : 0,
            speedKmH,
        };
    }

    /**
     * Flags a country that never appears in the cardholder's history
     */
    checkCountryShift(cardholderId: string, transaction: Transaction): IndicatorResult {
        const transactions = this.history.byCardholder(cardholderId);

        if (transactions.length < this.options.countryMinHistory) {
            return { triggered: false, confidence: 0 };
        }

        const occurrences = transactions.filter(t => t.country === transaction.country).length;
        const triggered = occurrences === 0;

        if (triggered) {
            fraudLogger.geographicAnomaly(cardholderId, transaction.transactionId, 'new_country', {
                country: transaction.country,
                historySize: transactions.length,
            });
        }

        logger.debug('Country analysis complete', {
            cardholderId,
            country: transaction.country,
            occurrences,
        });

        return {
            triggered,
            confidence: triggered ? this.options.countryShiftConfidence : 0,
        };
    }
}
