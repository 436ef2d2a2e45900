import { config } from '../config/config';
import { logger, fraudLogger } from '../middleware/requestLogger';
import { FraudAnalysisResult } from '../models/FraudAnalysisResult';
import { Transaction } from '../models/Transaction';
import { TransactionHistory } from '../models/TransactionHistory';
import {
    FraudIndicatorName,
    FraudIndicators,
    INDICATOR_NAMES,
    RiskLevel,
    SummaryReport,
} from '../types';
import { AmountAnalyzer } from './AmountAnalyzer';
import { BehavioralAnalyzer } from './BehavioralAnalyzer';
import { GeographicAnalyzer } from './GeographicAnalyzer';
import { TimeAnalyzer } from './TimeAnalyzer';
import { VelocityAnalyzer } from './VelocityAnalyzer';

export type IndicatorWeights = Record<FraudIndicatorName, number>;

export interface RiskThresholds {
    critical: number;
    high: number;
    medium: number;
}

export interface FraudDetectionOptions {
    weights?: IndicatorWeights;
    thresholds?: RiskThresholds;
}

export const DEFAULT_WEIGHTS: IndicatorWeights = {
    amount_anomaly: config.weights.amountAnomaly,
    time_anomaly: config.weights.timeAnomaly,
    rapid_transactions: config.weights.rapidTransactions,
    high_frequency_day: config.weights.highFrequencyDay,
    impossible_travel: config.weights.impossibleTravel,
    country_shift: config.weights.countryShift,
    category_deviation: config.weights.categoryDeviation,
    new_merchant: config.weights.newMerchant,
};

/**
 * Weighted average of indicator confidences; 0 when the weights sum to 0
 */
export function calculateWeightedScore(indicators: FraudIndicators, weights: IndicatorWeights): number {
    let totalWeight = 0;
    let weightedSum = 0;

    for (const name of INDICATOR_NAMES) {
        totalWeight += weights[name];
        weightedSum += indicators[name].confidence * weights[name];
    }

    if (totalWeight === 0) {
        return 0;
    }
    return weightedSum / totalWeight;
}

export class FraudDetectionService {
    private readonly amountAnalyzer: AmountAnalyzer;
    private readonly timeAnalyzer: TimeAnalyzer;
    private readonly velocityAnalyzer: VelocityAnalyzer;
    private readonly geographicAnalyzer: GeographicAnalyzer;
    private readonly behavioralAnalyzer: BehavioralAnalyzer;
    private readonly weights: IndicatorWeights;
    private readonly thresholds: RiskThresholds;

    constructor(
        private readonly history: TransactionHistory,
        options: FraudDetectionOptions = {}
    ) {
        this.amountAnalyzer = new AmountAnalyzer(history);
        this.timeAnalyzer = new TimeAnalyzer(history);
        this.velocityAnalyzer = new VelocityAnalyzer(history);
        this.geographicAnalyzer = new GeographicAnalyzer(history);
        this.behavioralAnalyzer = new BehavioralAnalyzer(history);
        this.weights = options.weights ?? DEFAULT_WEIGHTS;
        this.thresholds = options.thresholds ?? config.thresholds;
    }

    /**
     * Score a transaction against the cardholder's history.
     * The transaction itself is not added to the history.
     */
    analyzeTransaction(transaction: Transaction): FraudAnalysisResult {
        const startTime = Date.now();
        const { cardholderId } = transaction;

        const amount = this.amountAnalyzer.analyze(cardholderId, transaction.amount);
        const time = this.timeAnalyzer.analyze(cardholderId, transaction.timestamp);
        const rapid = this.velocityAnalyzer.checkRapidTransactions(cardholderId);
        const daily = this.velocityAnalyzer.checkHighFrequencyDay(cardholderId, transaction.timestamp);
        const travel = this.geographicAnalyzer.checkImpossibleTravel(cardholderId, transaction);
        const country = this.geographicAnalyzer.checkCountryShift(cardholderId, transaction);
        const category = this.behavioralAnalyzer.checkCategoryDeviation(cardholderId, transaction);
        const merchant = this.behavioralAnalyzer.checkMerchantPattern(cardholderId, transaction);

        const indicators: FraudIndicators = {
            amount_anomaly: amount,
            time_anomaly: time,
            rapid_transactions: { triggered: rapid.triggered, confidence: rapid.confidence },
            high_frequency_day: { triggered: daily.triggered, confidence: daily.confidence },
            impossible_travel: { triggered: travel.triggered, confidence: travel.confidence },
            country_shift: country,
            category_deviation: category,
            new_merchant: merchant,
        };

        const fraudScore = calculateWeightedScore(indicators, this.weights);
        const riskLevel = this.determineRiskLevel(fraudScore);
        const recommendation = FraudDetectionService.generateRecommendation(riskLevel, indicators);

        const result = new FraudAnalysisResult({
            transactionId: transaction.transactionId,
            cardholderId,
            fraudScore,
            riskLevel,
            indicators,
            recommendation,
            details: {
                transaction_amount: transaction.amount,
                merchant_name: transaction.merchantName,
                merchant_category: transaction.merchantCategory,
                transaction_type: transaction.transactionType,
                country: transaction.country,
                timestamp: transaction.timestamp.toISOString(),
                rapid_tx_count: rapid.count,
                daily_tx_count: daily.count,
                impossible_travel_speed: travel.speedKmH,
            },
        });

        this.logOutcome(result, Date.now() - startTime);
        return result;
    }

    /**
     * Analyze each transaction independently against the current history
     */
    batchAnalyze(transactions: readonly Transaction[]): FraudAnalysisResult[] {
        return transactions.map(transaction => this.analyzeTransaction(transaction));
    }

    determineRiskLevel(fraudScore: number): RiskLevel {
        if (fraudScore >= this.thresholds.critical) {
            return 'CRITICAL';
        } else if (fraudScore >= this.thresholds.high) {
            return 'HIGH';
        } else if (fraudScore >= this.thresholds.medium) {
            return 'MEDIUM';
        }
        return 'LOW';
    }

    static generateRecommendation(riskLevel: RiskLevel, indicators: FraudIndicators): string {
        switch (riskLevel) {
            case 'CRITICAL':
                return 'BLOCK_TRANSACTION - Multiple high-risk indicators detected';
            case 'HIGH':
                if (indicators.impossible_travel.triggered) {
                    return 'REQUIRE_VERIFICATION - Impossible travel detected';
                }
                if (indicators.rapid_transactions.triggered) {
                    return 'REQUIRE_VERIFICATION - Unusual transaction velocity';
                }
                return 'REVIEW_TRANSACTION - High fraud risk';
            case 'MEDIUM':
                return 'MONITOR_TRANSACTION - Multiple moderate risk factors';
            case 'LOW':
                return 'APPROVE_TRANSACTION - Low fraud risk';
        }
    }

    generateSummaryReport(results: readonly FraudAnalysisResult[]): SummaryReport {
        const highRiskCount = results.filter(r => r.riskLevel === 'HIGH' || r.riskLevel === 'CRITICAL').length;
        const mediumRiskCount = results.filter(r => r.riskLevel === 'MEDIUM').length;

        const indicatorCounts = new Map<FraudIndicatorName, number>();
        for (const result of results) {
            for (const name of result.triggeredIndicators()) {
                indicatorCounts.set(name, (indicatorCounts.get(name) ?? 0) + 1);
            }
        }

        const topFraudIndicators = [...indicatorCounts.entries()]
            .sort((a, b) => b[1] - a[1])
            .slice(0, 5);

        return {
            totalTransactions: results.length,
            highRiskTransactions: highRiskCount,
            mediumRiskTransactions: mediumRiskCount,
            averageFraudScore: results.length > 0
                ? results.reduce((sum, r) => sum + r.fraudScore, 0) / results.length
                : 0,
            topFraudIndicators,
            estimatedFraudTransactions: highRiskCount + Math.floor(mediumRiskCount * 0.5),
        };
    }

    private logOutcome(result: FraudAnalysisResult, analysisTimeMs: number): void {
        const triggered = result.triggeredIndicators();

        if (result.riskLevel === 'CRITICAL') {
            fraudLogger.fraudDetected(result.transactionId, result.cardholderId, result.fraudScore, triggered);
        } else if (result.riskLevel === 'HIGH') {
            fraudLogger.suspiciousActivity(result.transactionId, result.cardholderId, result.fraudScore, triggered);
        }

        fraudLogger.analysisCompleted(
            result.transactionId,
            result.cardholderId,
            result.fraudScore,
            result.riskLevel,
            analysisTimeMs
        );

        logger.debug('Indicator breakdown', {
            transactionId: result.transactionId,
            historySize: this.history.byCardholder(result.cardholderId).length,
            triggered,
        });
    }
}
