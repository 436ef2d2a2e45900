import { LogisticRegressionClassifier, sigmoid } from '../../src/services/LogisticRegressionClassifier';
import { ValidationError } from '../../src/middleware/errorHandler';
import { Label } from '../../src/types';

describe('sigmoid', () => {
    it('should be 0.5 at zero', () => {
        expect(sigmoid(0)).toBe(0.5);
    });

    it('should clamp large magnitudes', () => {
        expect(sigmoid(501)).toBe(1.0);
        expect(sigmoid(-501)).toBe(0.0);
    });

    it('should follow the logistic curve', () => {
        expect(sigmoid(2)).toBeCloseTo(0.8808, 4);
        expect(sigmoid(-2)).toBeCloseTo(0.1192, 4);
    });
});

describe('LogisticRegressionClassifier', () => {
    const features = [[0], [0.1], [0.9], [1]];
    const labels: Label[] = [0, 0, 1, 1];

    it('should predict 0.5 while untrained', () => {
        const model = new LogisticRegressionClassifier();

        expect(model.isTrained).toBe(false);
        expect(model.predict([1, 2, 3])).toBe(0.5);
        expect(model.getState()).toBeNull();
    });

    it('should reject empty or mismatched training data', () => {
        const model = new LogisticRegressionClassifier();

        expect(() => model.train([], [])).toThrow(ValidationError);
        expect(() => model.train([[1], [2]], [1])).toThrow(ValidationError);
        expect(() => model.train([[1], [2, 3]], [0, 1])).toThrow(ValidationError);
        expect(model.isTrained).toBe(false);
    });

    it('should separate a one-dimensional dataset', () => {
        const model = new LogisticRegressionClassifier();

        const summary = model.train(features, labels, { learningRate: 0.5, epochs: 500 });

        expect(summary.converged).toBe(true);
        expect(summary.epochsTrained).toBeLessThanOrEqual(500);
        expect(model.predict([1])).toBeGreaterThan(0.5);
        expect(model.predict([0])).toBeLessThan(0.5);
    });

    it('should not stop early before epoch eleven', () => {
        const model = new LogisticRegressionClassifier();

        expect(model.train(features, labels, { epochs: 3 }).epochsTrained).toBe(3);
    });

    it('should stop early once the loss plateaus', () => {
        const model = new LogisticRegressionClassifier();

        // a tiny learning rate barely moves the loss
        const summary = model.train(features, labels, { learningRate: 1e-6, epochs: 100 });

        expect(summary.epochsTrained).toBe(12);
    });

    it('should train deterministically', () => {
        const first = new LogisticRegressionClassifier();
        const second = new LogisticRegressionClassifier();

        first.train(features, labels);
        second.train(features, labels);

        expect(first.getState()).toEqual(second.getState());
    });

    it('should score from restored weights', () => {
        const model = new LogisticRegressionClassifier();

        model.setState({ weights: [1, 2], bias: -1 });

        expect(model.isTrained).toBe(true);
        expect(model.predict([1, 0])).toBe(0.5);
        expect(model.predictBatch([[1, 0], [1, 0]])).toEqual([0.5, 0.5]);
        expect(model.getState()).toEqual({ weights: [1, 2], bias: -1 });
    });
});
