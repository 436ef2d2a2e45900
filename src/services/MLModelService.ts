import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import Joi from 'joi';
import { config } from '../config/config';
import { logger, fraudLogger } from '../middleware/requestLogger';
import { ModelFormatError, ModelLoadError, ModelNotTrainedError } from '../middleware/errorHandler';
import { Transaction } from '../models/Transaction';
import { TransactionHistory } from '../models/TransactionHistory';
import {
    EnsembleTrainingSummary,
    Label,
    MLPrediction,
    PersistedModel,
    RiskLevel,
} from '../types';
import { FEATURE_COUNT, FeatureExtractor, featuresToArray } from './FeatureExtractor';
import { LogisticRegressionClassifier } from './LogisticRegressionClassifier';
import { RandomForestClassifier, SplitCriterion } from './RandomForestClassifier';

export interface TrainingSample {
    transaction: Transaction;
    label: Label;
}

export interface MLModelServiceOptions {
    modelVersion?: string;
    learningRate?: number;
    epochs?: number;
    numTrees?: number;
    maxDepth?: number;
    splitCriterion?: SplitCriterion;
    random?: () => number;
    hashValidation?: boolean;
    expectedModelHash?: string;
}

export interface MLModelStatus {
    isTrained: boolean;
    version: string;
    trainedAt: Date | null;
    loadedAt: Date | null;
    inferenceCount: number;
    avgInferenceTimeMs: number;
}

const treeSchema = Joi.object({
    type: Joi.string().valid('leaf', 'node').required(),
    prediction: Joi.when('type', {
        is: 'leaf',
        then: Joi.number().valid(0, 1).required(),
        otherwise: Joi.forbidden(),
    }),
    feature: Joi.when('type', {
        is: 'node',
        then: Joi.number().integer().min(0).max(FEATURE_COUNT - 1).required(),
        otherwise: Joi.forbidden(),
    }),
    threshold: Joi.when('type', {
        is: 'node',
        then: Joi.number().required(),
        otherwise: Joi.forbidden(),
    }),
    left: Joi.when('type', {
        is: 'node',
        then: Joi.link('#tree').required(),
        otherwise: Joi.forbidden(),
    }),
    right: Joi.when('type', {
        is: 'node',
        then: Joi.link('#tree').required(),
        otherwise: Joi.forbidden(),
    }),
}).id('tree');

const persistedModelSchema = Joi.object<PersistedModel>({
    logistic: Joi.object({
        weights: Joi.array().items(Joi.number().required()).length(FEATURE_COUNT).required(),
        bias: Joi.number().required(),
    }).required(),
    forest: Joi.object({
        trees: Joi.array().items(treeSchema).required(),
    }).required(),
    timestamp: Joi.string(),
    version: Joi.string(),
}).unknown(true);

/**
 * Map an ensemble probability to a risk tier (strict lower bounds)
 */
export function classifyEnsembleScore(
    score: number,
    thresholds: { critical: number; high: number; medium: number } = config.ml.riskThresholds
): RiskLevel {
    if (score > thresholds.critical) return 'CRITICAL';
    if (score > thresholds.high) return 'HIGH';
    if (score > thresholds.medium) return 'MEDIUM';
    return 'LOW';
}

/**
 * ML Model Service
 * Trains, persists and serves the logistic regression + random forest ensemble
 */
export class MLModelService {
    private readonly logistic = new LogisticRegressionClassifier();
    private readonly forest: RandomForestClassifier;
    private readonly featureExtractor: FeatureExtractor;
    private readonly learningRate: number;
    private readonly epochs: number;
    private readonly hashValidation: boolean;
    private readonly expectedModelHash: string | undefined;
    private modelVersion: string;
    private isTrained = false;
    private trainedAt: Date | null = null;
    private loadedAt: Date | null = null;
    private inferenceCount = 0;
    private totalInferenceTimeMs = 0;

    constructor(
        history: TransactionHistory,
        featureExtractor?: FeatureExtractor,
        options: MLModelServiceOptions = {}
    ) {
        this.featureExtractor = featureExtractor ?? new FeatureExtractor(history);
        this.forest = new RandomForestClassifier({
            numTrees: options.numTrees ?? config.ml.numTrees,
            maxDepth: options.maxDepth ?? config.ml.maxDepth,
            splitCriterion: options.splitCriterion,
            random: options.random,
        });
        this.learningRate = options.learningRate ?? config.ml.learningRate;
        this.epochs = options.epochs ?? config.ml.epochs;
        this.hashValidation = options.hashValidation ?? config.ml.modelHashValidation;
        this.expectedModelHash = options.expectedModelHash ?? config.ml.expectedModelHash;
        this.modelVersion = options.modelVersion ?? config.ml.modelVersion;
    }

    /**
     * Extract features for every sample in order and train both models.
     * Features are taken against the current history; the samples themselves are not recorded.
     */
    trainModels(samples: readonly TrainingSample[]): EnsembleTrainingSummary {
        const startTime = Date.now();

        const featuresList = samples.map(sample => this.featureExtractor.extractVector(sample.transaction));
        const labels = samples.map(sample => sample.label);

        const logisticSummary = this.logistic.train(featuresList, labels, {
            learningRate: this.learningRate,
            epochs: this.epochs,
        });
        const forestSummary = this.forest.train(featuresList, labels);

        this.isTrained = true;
        this.trainedAt = new Date();

        fraudLogger.mlModelTrained(
            this.modelVersion,
            samples.length,
            logisticSummary.epochsTrained,
            Date.now() - startTime
        );

        return {
            logisticRegression: logisticSummary,
            randomForest: forestSummary,
            totalSamples: samples.length,
        };
    }

    /**
     * Ensemble fraud probability for a transaction
     */
    predictFraudProbability(transaction: Transaction): MLPrediction {
        if (!this.isTrained) {
            throw new ModelNotTrainedError();
        }

        const startTime = Date.now();
        const features = this.featureExtractor.extractFeatures(transaction);
        const vector = featuresToArray(features);

        const logisticScore = this.logistic.predict(vector);
        const forestScore = this.forest.predict(vector);
        const ensembleScore = (logisticScore + forestScore) / 2.0;

        const inferenceTimeMs = Date.now() - startTime;
        this.inferenceCount++;
        this.totalInferenceTimeMs += inferenceTimeMs;
        fraudLogger.mlInference(transaction.transactionId, ensembleScore, inferenceTimeMs);

        return {
            transactionId: transaction.transactionId,
            logisticRegressionScore: logisticScore,
            randomForestScore: forestScore,
            ensembleScore,
            riskLevel: classifyEnsembleScore(ensembleScore),
            modelVersion: this.modelVersion,
            features: {
                amount: features.amount,
                hourOfDay: features.hourOfDay,
                isNewMerchant: features.isNewMerchant,
                impossibleTravelScore: features.impossibleTravelScore,
            },
        };
    }

    /**
     * Write both models to a JSON file, creating the directory when needed
     */
    async saveModels(modelPath: string = config.ml.modelPath): Promise<void> {
        const state = this.logistic.getState();
        if (!this.isTrained || state === null) {
            throw new ModelNotTrainedError();
        }

        const modelData: PersistedModel = {
            logistic: state,
            forest: { trees: this.forest.getTrees() },
            timestamp: new Date().toISOString(),
            version: this.modelVersion,
        };

        try {
            await fs.mkdir(path.dirname(modelPath), { recursive: true });
            await fs.writeFile(modelPath, JSON.stringify(modelData, null, 2), 'utf8');
        } catch (error) {
            fraudLogger.mlModelError(this.modelVersion, error);
            throw error;
        }

        fraudLogger.mlModelSaved(this.modelVersion, modelPath);
    }

    /**
     * Load both models from a JSON file. State is replaced only when the whole file is valid.
     */
    async loadModels(modelPath: string = config.ml.modelPath): Promise<void> {
        const startTime = Date.now();

        let raw: string;
        try {
            raw = await fs.readFile(modelPath, 'utf8');
        } catch (error) {
            fraudLogger.mlModelError(this.modelVersion, error);
            throw new ModelLoadError(`Unable to read model file: ${modelPath}`);
        }

        if (this.hashValidation && this.expectedModelHash) {
            const hash = crypto.createHash('sha256').update(raw).digest('hex');
            if (hash !== this.expectedModelHash) {
                logger.error('Model hash mismatch', {
                    expected: this.expectedModelHash,
                    actual: hash,
                });
                throw new ModelLoadError('Model hash validation failed - possible tampering');
            }
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch {
            throw new ModelFormatError(`Model file is not valid JSON: ${modelPath}`);
        }

        const { error, value } = persistedModelSchema.validate(parsed);
        if (error) {
            throw new ModelFormatError(`Invalid model file: ${error.message}`);
        }

        this.logistic.setState(value.logistic);
        this.forest.setTrees(value.forest.trees);
        this.modelVersion = value.version ?? this.modelVersion;
        this.isTrained = true;
        this.loadedAt = new Date();

        fraudLogger.mlModelLoaded(this.modelVersion, Date.now() - startTime);
    }

    isModelReady(): boolean {
        return this.isTrained;
    }

    getModelVersion(): string {
        return this.modelVersion;
    }

    getStatus(): MLModelStatus {
        return {
            isTrained: this.isTrained,
            version: this.modelVersion,
            trainedAt: this.trainedAt,
            loadedAt: this.loadedAt,
            inferenceCount: this.inferenceCount,
            avgInferenceTimeMs: this.inferenceCount > 0
                ? this.totalInferenceTimeMs / this.inferenceCount
                : 0,
        };
    }
}
