import { logger } from './middleware/requestLogger';
import { TransactionHistory } from './models/TransactionHistory';
import { FeatureExtractor } from './services/FeatureExtractor';
import { FraudDetectionOptions, FraudDetectionService } from './services/FraudDetectionService';
import { MLModelService, MLModelServiceOptions } from './services/MLModelService';

/**
 * Everything one running service instance owns. Components share the same history.
 */
export interface AppContext {
    history: TransactionHistory;
    fraudDetectionService: FraudDetectionService;
    featureExtractor: FeatureExtractor;
    mlModelService: MLModelService;
}

export interface ContextOptions {
    detection?: FraudDetectionOptions;
    ml?: MLModelServiceOptions;
}

export function createContext(options: ContextOptions = {}): AppContext {
    const history = new TransactionHistory();
    const featureExtractor = new FeatureExtractor(history);

    return {
        history,
        featureExtractor,
        fraudDetectionService: new FraudDetectionService(history, options.detection),
        mlModelService: new MLModelService(history, featureExtractor, options.ml),
    };
}

export function disposeContext(context: AppContext): void {
    logger.info('Disposing service context', {
        transactions: context.history.size,
        modelTrained: context.mlModelService.isModelReady(),
    });
}
