import { AmountAnalyzer } from '../../src/services/AmountAnalyzer';
import { historyOf, makeTransaction } from '../helpers';

// Mock logger
jest.mock('../../src/middleware/requestLogger', () => ({
    logger: {
        debug: jest.fn(),
        error: jest.fn(),
        info: jest.fn(),
    },
}));

describe('AmountAnalyzer', () => {
    const cardholderId = 'card-001';

    function analyzerFor(amounts: number[]): AmountAnalyzer {
        return new AmountAnalyzer(historyOf(amounts.map(amount => makeTransaction({ cardholderId, amount }))));
    }

    it('should flag an amount far above the cardholder average', () => {
        const analyzer = analyzerFor([100, 110, 90, 105, 95]);

        const result = analyzer.analyze(cardholderId, 200);

        expect(result).toEqual({ triggered: true, confidence: 1.0 });
    });

    it('should report z-score confidence for an ordinary amount without triggering', () => {
        // mean 100, sample standard deviation sqrt(62.5)
        const analyzer = analyzerFor([100, 110, 90, 105, 95]);

        const result = analyzer.analyze(cardholderId, 105);

        expect(result.triggered).toBe(false);
        expect(result.confidence).toBeCloseTo(5 / Math.sqrt(62.5) / 3, 10);
    });

    it('should stay neutral with fewer than three past transactions', () => {
        const analyzer = analyzerFor([10, 20]);

        expect(analyzer.analyze(cardholderId, 10000)).toEqual({ triggered: false, confidence: 0 });
    });

    it('should flag deviations over 10% when every past amount is identical', () => {
        const analyzer = analyzerFor([50, 50, 50]);

        expect(analyzer.analyze(cardholderId, 56)).toEqual({ triggered: true, confidence: 0.7 });
        expect(analyzer.analyze(cardholderId, 54)).toEqual({ triggered: false, confidence: 0 });
    });

    it('should honour a custom z-score threshold', () => {
        const history = historyOf([100, 110, 90, 105, 95].map(amount => makeTransaction({ cardholderId, amount })));
        const analyzer = new AmountAnalyzer(history, {
            minHistory: 3,
            zScoreThreshold: 0.5,
            flatDeviationRatio: 0.1,
            flatConfidence: 0.7,
        });

        expect(analyzer.analyze(cardholderId, 105).triggered).toBe(true);
    });
});
