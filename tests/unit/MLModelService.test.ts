import fs from 'fs';
import os from 'os';
import path from 'path';
import crypto from 'crypto';
import { MLModelService, TrainingSample, classifyEnsembleScore } from '../../src/services/MLModelService';
import { FEATURE_COUNT } from '../../src/services/FeatureExtractor';
import { ModelFormatError, ModelLoadError, ModelNotTrainedError } from '../../src/middleware/errorHandler';
import { TransactionHistory } from '../../src/models/TransactionHistory';
import { LONDON, NEW_YORK, makeTransaction } from '../helpers';

jest.mock('../../src/middleware/requestLogger', () => ({
    logger: {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    },
    fraudLogger: {
        velocityViolation: jest.fn(),
        geographicAnomaly: jest.fn(),
        mlModelTrained: jest.fn(),
        mlModelLoaded: jest.fn(),
        mlModelSaved: jest.fn(),
        mlModelError: jest.fn(),
        mlInference: jest.fn(),
    },
}));

function day(n: number): string {
    return String(n).padStart(2, '0');
}

function buildTrainingSet(history: TransactionHistory): TrainingSample[] {
    const samples: TrainingSample[] = [];

    for (let i = 0; i < 12; i++) {
        samples.push({
            transaction: makeTransaction({
                cardholderId: 'card-ml',
                amount: 20 + 5 * i,
                timestamp: new Date(`2024-03-${day(i + 1)}T12:00:00Z`),
                location: NEW_YORK,
            }),
            label: 0,
        });
    }
    for (let i = 0; i < 6; i++) {
        samples.push({
            transaction: makeTransaction({
                cardholderId: 'card-ml',
                amount: 2000 + 100 * i,
                timestamp: new Date(`2024-03-${day(i + 1)}T03:00:00Z`),
                merchantName: 'Harbor Electronics',
                merchantCategory: 'online_retail',
                location: LONDON,
                country: 'GB',
            }),
            label: 1,
        });
    }

    samples.forEach(sample => history.add(sample.transaction));
    return samples;
}

function modelFile(overrides: Record<string, unknown> = {}): string {
    return JSON.stringify({
        logistic: { weights: new Array<number>(FEATURE_COUNT).fill(0), bias: 0 },
        forest: { trees: [{ type: 'leaf', prediction: 1 }] },
        timestamp: '2024-03-04T12:00:00.000Z',
        version: 'hand-made-v2',
        ...overrides,
    });
}

describe('classifyEnsembleScore', () => {
    it.each([
        [0.95, 'CRITICAL'],
        [0.7000001, 'CRITICAL'],
        [0.7, 'HIGH'],
        [0.51, 'HIGH'],
        [0.5, 'MEDIUM'],
        [0.31, 'MEDIUM'],
        [0.3, 'LOW'],
        [0, 'LOW'],
    ])('should map %p to %s', (score, level) => {
        expect(classifyEnsembleScore(score)).toBe(level);
    });
});

describe('MLModelService', () => {
    let tmpDir: string;
    let history: TransactionHistory;
    let samples: TrainingSample[];
    const probe = () => makeTransaction({
        transactionId: 'tx-probe',
        cardholderId: 'card-ml',
        amount: 5000,
        timestamp: new Date('2024-03-20T03:00:00Z'),
        merchantName: 'Harbor Electronics',
        merchantCategory: 'online_retail',
        location: LONDON,
        country: 'GB',
    });

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fraud-model-'));
        history = new TransactionHistory();
        samples = buildTrainingSet(history);
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should refuse to predict or save before training', async () => {
        const service = new MLModelService(history);

        expect(service.isModelReady()).toBe(false);
        expect(() => service.predictFraudProbability(probe())).toThrow(ModelNotTrainedError);
        await expect(service.saveModels(path.join(tmpDir, 'model.json'))).rejects.toBeInstanceOf(ModelNotTrainedError);
    });

    it('should train both models', () => {
        const service = new MLModelService(history, undefined, { epochs: 50, numTrees: 5 });

        const summary = service.trainModels(samples);

        expect(summary.totalSamples).toBe(18);
        expect(summary.randomForest).toEqual({ numTrees: 5, status: 'trained' });
        expect(summary.logisticRegression.epochsTrained).toBeGreaterThan(0);
        expect(summary.logisticRegression.epochsTrained).toBeLessThanOrEqual(50);
        expect(service.isModelReady()).toBe(true);
        expect(service.getStatus().trainedAt).toBeInstanceOf(Date);
    });

    it('should reject an empty training set', () => {
        const service = new MLModelService(history);

        expect(() => service.trainModels([])).toThrow('No training data');
        expect(service.isModelReady()).toBe(false);
    });

    it('should average both model scores', () => {
        const service = new MLModelService(history, undefined, { epochs: 50, numTrees: 5 });
        service.trainModels(samples);

        const prediction = service.predictFraudProbability(probe());

        expect(prediction.transactionId).toBe('tx-probe');
        expect(prediction.ensembleScore)
            .toBeCloseTo((prediction.logisticRegressionScore + prediction.randomForestScore) / 2, 12);
        expect(prediction.ensembleScore).toBeGreaterThanOrEqual(0);
        expect(prediction.ensembleScore).toBeLessThanOrEqual(1);
        expect(prediction.riskLevel).toBe(classifyEnsembleScore(prediction.ensembleScore));
        expect(prediction.modelVersion).toBe('ensemble-v1');
        expect(prediction.features).toEqual({
            amount: 5000,
            hourOfDay: 3,
            isNewMerchant: false,
            impossibleTravelScore: 0,
        });
        expect(service.getStatus().inferenceCount).toBe(1);
    });

    it('should reproduce predictions after a save and load round trip', async () => {
        const modelPath = path.join(tmpDir, 'nested', 'model.json');
        const trained = new MLModelService(history, undefined, { epochs: 50, numTrees: 5 });
        trained.trainModels(samples);

        await trained.saveModels(modelPath);
        const restored = new MLModelService(history);
        await restored.loadModels(modelPath);

        expect(restored.isModelReady()).toBe(true);
        expect(restored.predictFraudProbability(probe())).toEqual(trained.predictFraudProbability(probe()));

        const saved = JSON.parse(fs.readFileSync(modelPath, 'utf8'));
        expect(saved.logistic.weights).toHaveLength(FEATURE_COUNT);
        expect(saved.forest.trees).toHaveLength(5);
        expect(saved.version).toBe('ensemble-v1');
    });

    it('should serve a hand-written model file', async () => {
        const modelPath = path.join(tmpDir, 'model.json');
        fs.writeFileSync(modelPath, modelFile());
        const service = new MLModelService(history);

        await service.loadModels(modelPath);
        const prediction = service.predictFraudProbability(probe());

        // sigmoid(0) = 0.5 from the zero weights, 1 from the single leaf
        expect(prediction.logisticRegressionScore).toBe(0.5);
        expect(prediction.randomForestScore).toBe(1);
        expect(prediction.ensembleScore).toBe(0.75);
        expect(prediction.riskLevel).toBe('CRITICAL');
        expect(service.getModelVersion()).toBe('hand-made-v2');
    });

    it('should load a file holding only weights, bias and trees', async () => {
        const modelPath = path.join(tmpDir, 'model.json');
        fs.writeFileSync(modelPath, JSON.stringify({
            logistic: { weights: new Array<number>(FEATURE_COUNT).fill(0), bias: 0 },
            forest: { trees: [{ type: 'leaf', prediction: 1 }] },
        }));
        const service = new MLModelService(history);

        await service.loadModels(modelPath);

        expect(service.isModelReady()).toBe(true);
        expect(service.getModelVersion()).toBe('ensemble-v1');
        expect(service.predictFraudProbability(probe()).ensembleScore).toBe(0.75);
    });

    it('should fail with ModelLoadError for a missing file', async () => {
        const service = new MLModelService(history);

        await expect(service.loadModels(path.join(tmpDir, 'absent.json'))).rejects.toBeInstanceOf(ModelLoadError);
        expect(service.isModelReady()).toBe(false);
    });

    it.each([
        ['invalid JSON', '{ not json'],
        ['a missing forest', JSON.stringify({ logistic: { weights: [], bias: 0 }, timestamp: 'now' })],
        ['the wrong number of weights', modelFile({ logistic: { weights: [1, 2, 3], bias: 0 } })],
        ['a split without a right branch', modelFile({
            forest: { trees: [{ type: 'node', feature: 0, threshold: 1, left: { type: 'leaf', prediction: 0 } }] },
        })],
        ['a leaf with a non-binary prediction', modelFile({ forest: { trees: [{ type: 'leaf', prediction: 0.4 }] } })],
        ['an unknown node type', modelFile({ forest: { trees: [{ type: 'branch' }] } })],
    ])('should fail with ModelFormatError for %s', async (_label, content) => {
        const modelPath = path.join(tmpDir, 'model.json');
        fs.writeFileSync(modelPath, content);
        const service = new MLModelService(history);

        await expect(service.loadModels(modelPath)).rejects.toBeInstanceOf(ModelFormatError);
        expect(service.isModelReady()).toBe(false);
    });

    it('should keep the current models when a load fails', async () => {
        const service = new MLModelService(history, undefined, { epochs: 50, numTrees: 5 });
        service.trainModels(samples);
        const before = service.predictFraudProbability(probe());
        const modelPath = path.join(tmpDir, 'model.json');
        fs.writeFileSync(modelPath, modelFile({ forest: { trees: [{ type: 'node', feature: 0 }] } }));

        await expect(service.loadModels(modelPath)).rejects.toBeInstanceOf(ModelFormatError);

        expect(service.predictFraudProbability(probe())).toEqual(before);
        expect(service.getModelVersion()).toBe('ensemble-v1');
    });

    it('should verify the model hash when configured', async () => {
        const modelPath = path.join(tmpDir, 'model.json');
        const content = modelFile();
        fs.writeFileSync(modelPath, content);
        const hash = crypto.createHash('sha256').update(content).digest('hex');

        const rejecting = new MLModelService(history, undefined, { hashValidation: true, expectedModelHash: 'test-hash' });
        await expect(rejecting.loadModels(modelPath)).rejects.toBeInstanceOf(ModelLoadError);

        const accepting = new MLModelService(history, undefined, { hashValidation: true, expectedModelHash: hash });
        await accepting.loadModels(modelPath);
        expect(accepting.isModelReady()).toBe(true);
    });
});
