import { DecisionTreeNode, ForestTrainingSummary, Label, LeafNode } from '../types';
import { FraudClassifier, assertTrainingData } from './LogisticRegressionClassifier';

/**
 * Impurity used to score candidate splits.
 * 'legacy' keeps the quadratic, same-sign measure earlier models were trained with;
 * 'entropy' is Shannon entropy in bits.
 */
export type SplitCriterion = 'legacy' | 'entropy';

export interface RandomForestOptions {
    numTrees?: number;
    maxDepth?: number;
    /** Split candidates are feature indices 0 .. candidateFeatures - 1 */
    candidateFeatures?: number;
    splitCriterion?: SplitCriterion;
    /** Uniform source in [0, 1) used for bootstrap sampling */
    random?: () => number;
}

function legacyImpurity(labels: readonly Label[]): number {
    if (labels.length === 0) return 0;
    const positives = labels.reduce<number>((sum, label) => sum + label, 0);
    const negatives = labels.length - positives;

    if (positives === 0 || negatives === 0) return 0;

    const pPos = positives / labels.length;
    const pNeg = negatives / labels.length;
    return -(pPos * (pPos + 1e-10) + pNeg * (pNeg + 1e-10));
}

function shannonEntropy(labels: readonly Label[]): number {
    if (labels.length === 0) return 0;
    const positives = labels.reduce<number>((sum, label) => sum + label, 0);
    const negatives = labels.length - positives;

    if (positives === 0 || negatives === 0) return 0;

    const pPos = positives / labels.length;
    const pNeg = negatives / labels.length;
    return -(pPos * Math.log2(pPos) + pNeg * Math.log2(pNeg));
}

export const IMPURITY: Record<SplitCriterion, (labels: readonly Label[]) => number> = {
    legacy: legacyImpurity,
    entropy: shannonEntropy,
};

export function informationGain(
    parent: readonly Label[],
    left: readonly Label[],
    right: readonly Label[],
    criterion: SplitCriterion = 'legacy'
): number {
    const impurity = IMPURITY[criterion];
    const leftWeight = left.length / parent.length;
    const rightWeight = right.length / parent.length;
    return impurity(parent) - (leftWeight * impurity(left) + rightWeight * impurity(right));
}

/**
 * 1 when positives are a strict majority, otherwise 0 (ties and empty nodes go to 0)
 */
export function majorityLeaf(labels: readonly Label[]): LeafNode {
    const positives = labels.reduce<number>((sum, label) => sum + label, 0);
    return { type: 'leaf', prediction: positives > labels.length / 2 ? 1 : 0 };
}

export function traverseTree(tree: DecisionTreeNode, features: readonly number[]): number {
    let node = tree;
    while (node.type === 'node') {
        node = features[node.feature] <= node.threshold ? node.left : node.right;
    }
    return node.prediction;
}

/**
 * Bootstrap-aggregated decision trees
 */
export class RandomForestClassifier implements FraudClassifier {
    readonly numTrees: number;
    readonly maxDepth: number;
    private readonly candidateFeatures: number;
    private readonly splitCriterion: SplitCriterion;
    private readonly random: () => number;
    private trees: DecisionTreeNode[] = [];

    constructor({
        numTrees = 10,
        maxDepth = 5,
        candidateFeatures = 3,
        splitCriterion = 'legacy',
        random = Math.random,
    }: RandomForestOptions = {}) {
        this.numTrees = numTrees;
        this.maxDepth = maxDepth;
        this.candidateFeatures = candidateFeatures;
        this.splitCriterion = splitCriterion;
        this.random = random;
    }

    get isTrained(): boolean {
        return this.trees.length > 0;
    }

    /**
     * Replace the forest with numTrees trees, each grown on its own bootstrap sample
     */
    train(featuresList: readonly (readonly number[])[], labels: readonly Label[]): ForestTrainingSummary {
        assertTrainingData(featuresList, labels);

        const size = featuresList.length;
        const trees: DecisionTreeNode[] = [];

        for (let t = 0; t < this.numTrees; t++) {
            const sampledFeatures: (readonly number[])[] = [];
            const sampledLabels: Label[] = [];

            for (let n = 0; n < size; n++) {
                const index = Math.min(Math.floor(this.random() * size), size - 1);
                sampledFeatures.push(featuresList[index]);
                sampledLabels.push(labels[index]);
            }

            trees.push(this.buildTree(sampledFeatures, sampledLabels, 0));
        }

        this.trees = trees;
        return { numTrees: trees.length, status: 'trained' };
    }

    /**
     * Mean of the trees' leaf votes; 0.5 for an empty forest
     */
    predict(features: readonly number[]): number {
        if (this.trees.length === 0) {
            return 0.5;
        }
        const votes = this.trees.reduce((sum, tree) => sum + traverseTree(tree, features), 0);
        return votes / this.trees.length;
    }

    getTrees(): DecisionTreeNode[] {
        return structuredClone(this.trees);
    }

    setTrees(trees: readonly DecisionTreeNode[]): void {
        this.trees = structuredClone([...trees]);
    }

    private buildTree(
        featuresList: readonly (readonly number[])[],
        labels: readonly Label[],
        depth: number
    ): DecisionTreeNode {
        if (depth >= this.maxDepth || featuresList.length === 0 || new Set(labels).size === 1) {
            return majorityLeaf(labels);
        }

        let bestFeature = -1;
        let bestThreshold = 0;
        let bestGain = 0;

        const numFeatures = Math.min(this.candidateFeatures, featuresList[0].length);
        for (let featureIndex = 0; featureIndex < numFeatures; featureIndex++) {
            const threshold = featuresList.reduce((sum, f) => sum + f[featureIndex], 0) / featuresList.length;

            const leftLabels: Label[] = [];
            const rightLabels: Label[] = [];
            featuresList.forEach((features, i) => {
                (features[featureIndex] <= threshold ? leftLabels : rightLabels).push(labels[i]);
            });

            if (leftLabels.length === 0 || rightLabels.length === 0) {
                continue;
            }

            const gain = informationGain(labels, leftLabels, rightLabels, this.splitCriterion);
            if (gain > bestGain) {
                bestGain = gain;
                bestFeature = featureIndex;
                bestThreshold = threshold;
            }
        }

        if (bestFeature < 0) {
            return majorityLeaf(labels);
        }

        const leftFeatures: (readonly number[])[] = [];
        const leftLabels: Label[] = [];
        const rightFeatures: (readonly number[])[] = [];
        const rightLabels: Label[] = [];

        featuresList.forEach((features, i) => {
            if (features[bestFeature] <= bestThreshold) {
                leftFeatures.push(features);
                leftLabels.push(labels[i]);
            } else {
                rightFeatures.push(features);
                rightLabels.push(labels[i]);
            }
        });

        return {
            type: 'node',
            feature: bestFeature,
            threshold: bestThreshold,
            left: this.buildTree(leftFeatures, leftLabels, depth + 1),
            right: this.buildTree(rightFeatures, rightLabels, depth + 1),
        };
    }
}
