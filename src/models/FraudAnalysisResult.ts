import {
    AnalysisDetails,
    FraudAnalysisResultJSON,
    FraudIndicatorName,
    FraudIndicators,
    INDICATOR_NAMES,
    RiskLevel,
} from '../types';

export interface FraudAnalysisResultProps {
    transactionId: string;
    cardholderId: string;
    fraudScore: number;
    riskLevel: RiskLevel;
    indicators: FraudIndicators;
    recommendation: string;
    details: AnalysisDetails;
}

/**
 * Outcome of scoring one transaction against the rule-based indicators
 */
export class FraudAnalysisResult {
    readonly transactionId: string;
    readonly cardholderId: string;
    readonly fraudScore: number;
    readonly riskLevel: RiskLevel;
    readonly indicators: Readonly<FraudIndicators>;
    readonly recommendation: string;
    readonly details: Readonly<AnalysisDetails>;

    constructor(props: FraudAnalysisResultProps) {
        this.transactionId = props.transactionId;
        this.cardholderId = props.cardholderId;
        this.fraudScore = props.fraudScore;
        this.riskLevel = props.riskLevel;
        this.indicators = Object.freeze({ ...props.indicators });
        this.recommendation = props.recommendation;
        this.details = Object.freeze({ ...props.details });
    }

    triggeredIndicators(): FraudIndicatorName[] {
        return INDICATOR_NAMES.filter(name => this.indicators[name].triggered);
    }

    toJSON(): FraudAnalysisResultJSON {
        return {
            transaction_id: this.transactionId,
            cardholder_id: this.cardholderId,
            fraud_score: this.fraudScore,
            risk_level: this.riskLevel,
            fraud_indicators: { ...this.indicators },
            recommendation: this.recommendation,
            details: { ...this.details },
        };
    }
}
