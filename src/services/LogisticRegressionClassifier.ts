import { ValidationError } from '../middleware/errorHandler';
import { Label, LogisticTrainingSummary } from '../types';

/**
 * Common surface of the ensemble members
 */
export interface FraudClassifier {
    readonly isTrained: boolean;
    predict(features: readonly number[]): number;
}

export interface LogisticTrainingOptions {
    learningRate?: number;
    epochs?: number;
}

export interface LogisticState {
    weights: number[];
    bias: number;
}

const EULER = 2.718281828;

/**
 * Logistic function, clamped for |x| > 500
 */
export function sigmoid(x: number): number {
    if (x > 500) return 1.0;
    if (x < -500) return 0.0;
    return 1.0 / (1.0 + EULER ** -x);
}

/**
 * Validate parallel feature/label inputs shared by both classifiers
 */
export function assertTrainingData(featuresList: readonly (readonly number[])[], labels: readonly Label[]): void {
    if (featuresList.length === 0 || labels.length === 0) {
        throw new ValidationError('No training data');
    }
    if (featuresList.length !== labels.length) {
        throw new ValidationError(
            `Feature and label counts differ (${featuresList.length} vs ${labels.length})`
        );
    }
    const width = featuresList[0]?.length ?? 0;
    if (featuresList.some(features => features.length !== width)) {
        throw new ValidationError('All feature vectors must have the same length');
    }
}

/**
 * Logistic regression trained by per-example gradient descent
 */
export class LogisticRegressionClassifier implements FraudClassifier {
    private weights: number[] | null = null;
    private bias = 0;

    get isTrained(): boolean {
        return this.weights !== null;
    }

    train(
        featuresList: readonly (readonly number[])[],
        labels: readonly Label[],
        { learningRate = 0.01, epochs = 100 }: LogisticTrainingOptions = {}
    ): LogisticTrainingSummary {
        assertTrainingData(featuresList, labels);

        const numFeatures = featuresList[0]?.length ?? 0;
        const weights = new Array<number>(numFeatures).fill(0);
        let bias = 0;

        const lossHistory: number[] = [];
        let epochsTrained = 0;
        let averageLoss = 0;

        for (let epoch = 0; epoch < epochs; epoch++) {
            let totalLoss = 0;

            for (let n = 0; n < featuresList.length; n++) {
                const features = featuresList[n];
                const label = labels[n];
                const prediction = sigmoid(LogisticRegressionClassifier.linear(weights, bias, features));

                totalLoss += -((label * (prediction + 1e-10)) + (1 - label) * (1 - prediction + 1e-10));

                const error = prediction - label;
                bias -= learningRate * error;
                for (let i = 0; i < numFeatures; i++) {
                    weights[i] -= learningRate * error * features[i];
                }
            }

            averageLoss = totalLoss / featuresList.length;
            lossHistory.push(averageLoss);
            epochsTrained = epoch + 1;

            // Stop once the loss has flattened out
            const earlier = lossHistory[lossHistory.length - 10];
            if (epoch > 10 && earlier !== undefined && Math.abs(averageLoss - earlier) < 0.001) {
                break;
            }
        }

        this.weights = weights;
        this.bias = bias;

        return {
            epochsTrained,
            finalLoss: averageLoss,
            converged: true,
        };
    }

    /**
     * Fraud probability in [0, 1]; 0.5 while untrained
     */
    predict(features: readonly number[]): number {
        if (this.weights === null) {
            return 0.5;
        }
        return sigmoid(LogisticRegressionClassifier.linear(this.weights, this.bias, features));
    }

    predictBatch(featuresList: readonly (readonly number[])[]): number[] {
        return featuresList.map(features => this.predict(features));
    }

    getState(): LogisticState | null {
        if (this.weights === null) {
            return null;
        }
        return { weights: [...this.weights], bias: this.bias };
    }

    setState(state: LogisticState): void {
        this.weights = [...state.weights];
        this.bias = state.bias;
    }

    private static linear(weights: readonly number[], bias: number, features: readonly number[]): number {
        let dot = 0;
        const length = Math.min(weights.length, features.length);
        for (let i = 0; i < length; i++) {
            dot += weights[i] * features[i];
        }
        return bias + dot;
    }
}
