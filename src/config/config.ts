function optionalEnv(name: string, defaultValue: string): string {
    return process.env[name] ?? defaultValue;
}

function optionalEnvInt(name: string, defaultValue: number): number {
    const value = process.env[name];
    return value ? parseInt(value, 10) : defaultValue;
}

function optionalEnvFloat(name: string, defaultValue: number): number {
    const value = process.env[name];
    return value ? parseFloat(value) : defaultValue;
}

function optionalEnvBool(name: string, defaultValue: boolean): boolean {
    const value = process.env[name];
    if (!value) return defaultValue;
    return value.toLowerCase() === 'true';
}

export const config = {
    // Server
    nodeEnv: optionalEnv('NODE_ENV', 'development'),
    port: optionalEnvInt('PORT', 3003),
    host: optionalEnv('HOST', '0.0.0.0'),
    serviceName: 'card-fraud-scoring',

    // Indicator weights for the rule-based ensemble score
    weights: {
        amountAnomaly: optionalEnvFloat('WEIGHT_AMOUNT_ANOMALY', 0.20),
        timeAnomaly: optionalEnvFloat('WEIGHT_TIME_ANOMALY', 0.10),
        rapidTransactions: optionalEnvFloat('WEIGHT_RAPID_TRANSACTIONS', 0.25),
        highFrequencyDay: optionalEnvFloat('WEIGHT_HIGH_FREQUENCY_DAY', 0.15),
        impossibleTravel: optionalEnvFloat('WEIGHT_IMPOSSIBLE_TRAVEL', 0.30),
        countryShift: optionalEnvFloat('WEIGHT_COUNTRY_SHIFT', 0.20),
        categoryDeviation: optionalEnvFloat('WEIGHT_CATEGORY_DEVIATION', 0.10),
        newMerchant: optionalEnvFloat('WEIGHT_NEW_MERCHANT', 0.15),
    },

    // Rule engine risk tiers (inclusive lower bounds)
    thresholds: {
        critical: optionalEnvFloat('THRESHOLD_CRITICAL', 0.85),
        high: optionalEnvFloat('THRESHOLD_HIGH', 0.70),
        medium: optionalEnvFloat('THRESHOLD_MEDIUM', 0.50),
    },

    // Detector configuration
    analysis: {
        amount: {
            minHistory: optionalEnvInt('AMOUNT_MIN_HISTORY', 3),
            zScoreThreshold: optionalEnvFloat('AMOUNT_ZSCORE_THRESHOLD', 2.5),
            flatDeviationRatio: optionalEnvFloat('AMOUNT_FLAT_DEVIATION_RATIO', 0.1),
            flatConfidence: 0.7,
        },

        time: {
            minHistory: optionalEnvInt('TIME_MIN_HISTORY', 5),
            rareHourFrequency: optionalEnvFloat('TIME_RARE_HOUR_FREQUENCY', 0.05),
        },

        velocity: {
            minHistory: optionalEnvInt('VELOCITY_MIN_HISTORY', 2),
            windowMinutes: optionalEnvInt('VELOCITY_WINDOW_MINUTES', 10),
            countThreshold: optionalEnvInt('VELOCITY_COUNT_THRESHOLD', 3),
            dailyMinHistory: optionalEnvInt('VELOCITY_DAILY_MIN_HISTORY', 5),
            dailyMultiplier: optionalEnvFloat('VELOCITY_DAILY_MULTIPLIER', 2.0),
        },

        geographic: {
            maxReasonableSpeedKmH: optionalEnvFloat('MAX_TRAVEL_SPEED_KMH', 900), // Airplane speed
            countryMinHistory: optionalEnvInt('COUNTRY_MIN_HISTORY', 5),
            countryShiftConfidence: 0.6,
        },

        behavioral: {
            categoryMinHistory: optionalEnvInt('CATEGORY_MIN_HISTORY', 5),
            rareCategoryFrequency: optionalEnvFloat('CATEGORY_RARE_FREQUENCY', 0.05),
            merchantMinHistory: optionalEnvInt('MERCHANT_MIN_HISTORY', 3),
            newMerchantConfidence: 0.3,
        },
    },

    // ML model configuration
    ml: {
        modelPath: optionalEnv('ML_MODEL_PATH', './models/fraud-model.json'),
        modelVersion: optionalEnv('ML_MODEL_VERSION', 'ensemble-v1'),
        learningRate: optionalEnvFloat('ML_LEARNING_RATE', 0.01),
        epochs: optionalEnvInt('ML_EPOCHS', 100),
        numTrees: optionalEnvInt('ML_NUM_TREES', 10),
        maxDepth: optionalEnvInt('ML_MAX_DEPTH', 5),
        modelHashValidation: optionalEnvBool('ML_HASH_VALIDATION', false),
        expectedModelHash: process.env['ML_MODEL_SIGNATURE'],
        riskThresholds: {
            critical: 0.7,
            high: 0.5,
            medium: 0.3,
        },
    },

    // Security
    security: {
        maxRequestSize: optionalEnvInt('MAX_REQUEST_SIZE', 1024 * 1024), // 1MB, batch payloads
        rateLimitWindowMs: optionalEnvInt('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000),
        rateLimitMax: optionalEnvInt('RATE_LIMIT_MAX', 100),
    },

    // Logging
    logging: {
        level: optionalEnv('LOG_LEVEL', 'info'),
        format: optionalEnv('LOG_FORMAT', 'json'),
        sensitiveFieldMasking: optionalEnvBool('LOG_MASK_SENSITIVE', true),
    },

    // Helper methods
    isProduction: (): boolean => config.nodeEnv === 'production',
};

export type Config = typeof config;
