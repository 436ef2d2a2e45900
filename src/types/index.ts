/**
 * Card Fraud Scoring - Type Definitions
 */

/**
 * Merchant categories accepted on a transaction
 */
export const MERCHANT_CATEGORIES = [
    'grocery',
    'restaurant',
    'retail',
    'gas',
    'utilities',
    'entertainment',
    'travel',
    'online_retail',
    'cash_advance',
    'other',
] as const;

export type MerchantCategory = typeof MERCHANT_CATEGORIES[number];

/**
 * Transaction types accepted on a transaction
 */
export const TRANSACTION_TYPES = [
    'purchase',
    'withdrawal',
    'transfer',
    'online',
    'international',
] as const;

export type TransactionType = typeof TRANSACTION_TYPES[number];

export function isMerchantCategory(value: string): value is MerchantCategory {
    return MERCHANT_CATEGORIES.some(category => category === value);
}

export function isTransactionType(value: string): value is TransactionType {
    return TRANSACTION_TYPES.some(type => type === value);
}

export interface GeoPoint {
    latitude: number;
    longitude: number;
}

/**
 * Serialized transaction as it crosses the service boundary
 */
export interface TransactionRecord {
    transaction_id: string;
    cardholder_id: string;
    amount: number;
    timestamp: string;
    merchant_name: string;
    merchant_category: string;
    transaction_type: string;
    location: GeoPoint;
    mcc_code: string;
    country: string;
    is_fraud?: boolean;
}

/**
 * Risk tier assigned to a score
 */
export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

/**
 * Rule-based indicators, in evaluation order
 */
export const INDICATOR_NAMES = [
    'amount_anomaly',
    'time_anomaly',
    'rapid_transactions',
    'high_frequency_day',
    'impossible_travel',
    'country_shift',
    'category_deviation',
    'new_merchant',
] as const;

export type FraudIndicatorName = typeof INDICATOR_NAMES[number];

/**
 * Outcome of a single rule-based check
 */
export interface IndicatorResult {
    triggered: boolean;
    confidence: number;
}

export interface VelocityResult extends IndicatorResult {
    count: number;
}

export interface TravelResult extends IndicatorResult {
    speedKmH: number | null;
}

export type FraudIndicators = Record<FraudIndicatorName, IndicatorResult>;

/**
 * Supplementary values attached to an analysis result
 */
export interface AnalysisDetails {
    transaction_amount: number;
    merchant_name: string;
    merchant_category: MerchantCategory;
    transaction_type: TransactionType;
    country: string;
    timestamp: string;
    rapid_tx_count: number;
    daily_tx_count: number;
    impossible_travel_speed: number | null;
}

/**
 * Serialized fraud analysis result
 */
export interface FraudAnalysisResultJSON {
    transaction_id: string;
    cardholder_id: string;
    fraud_score: number;
    risk_level: RiskLevel;
    fraud_indicators: FraudIndicators;
    recommendation: string;
    details: AnalysisDetails;
}

/**
 * Aggregate view over a batch of analysis results
 */
export interface SummaryReport {
    totalTransactions: number;
    highRiskTransactions: number;
    mediumRiskTransactions: number;
    averageFraudScore: number;
    topFraudIndicators: Array<[FraudIndicatorName, number]>;
    estimatedFraudTransactions: number;
}

/**
 * Named ML features; see FEATURE_NAMES for vector order
 */
export interface TransactionFeatures {
    amount: number;
    hourOfDay: number;
    dayOfWeek: number;
    isWeekend: boolean;
    amountZScore: number;
    daysSinceLastTransaction: number;
    transactionsToday: number;
    transactionsThisWeek: number;
    isNewMerchant: boolean;
    isNewCategory: boolean;
    impossibleTravelScore: number;
    isNewCountry: boolean;
    categoryFrequency: number;
    merchantFrequency: number;
    rapidTransactionCount: number;
}

export type Label = 0 | 1;

/**
 * Decision tree nodes. Every split node owns its two subtrees.
 */
export interface LeafNode {
    type: 'leaf';
    prediction: Label;
}

export interface SplitNode {
    type: 'node';
    feature: number;
    threshold: number;
    left: DecisionTreeNode;
    right: DecisionTreeNode;
}

export type DecisionTreeNode = LeafNode | SplitNode;

export interface LogisticTrainingSummary {
    epochsTrained: number;
    finalLoss: number;
    converged: boolean;
}

export interface ForestTrainingSummary {
    numTrees: number;
    status: 'trained';
}

export interface EnsembleTrainingSummary {
    logisticRegression: LogisticTrainingSummary;
    randomForest: ForestTrainingSummary;
    totalSamples: number;
}

export interface MLPrediction {
    transactionId: string;
    logisticRegressionScore: number;
    randomForestScore: number;
    ensembleScore: number;
    riskLevel: RiskLevel;
    modelVersion: string;
    features: {
        amount: number;
        hourOfDay: number;
        isNewMerchant: boolean;
        impossibleTravelScore: number;
    };
}

/**
 * On-disk model file
 */
export interface PersistedModel {
    logistic: {
        weights: number[];
        bias: number;
    };
    forest: {
        trees: DecisionTreeNode[];
    };
    timestamp?: string;
    version?: string;
}

/**
 * Health check response
 */
export interface HealthCheckResponse {
    status: 'healthy' | 'degraded';
    service: string;
    timestamp: string;
    checks: {
        engine: 'ready';
        mlModel: 'trained' | 'not_trained';
    };
}
