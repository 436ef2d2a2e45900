export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Sample (n - 1) standard deviation; 0 for fewer than two values
 */
export function sampleStandardDeviation(values: readonly number[]): number {
    if (values.length < 2) return 0;
    const avg = mean(values);
    const squaredDeviations = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
    return Math.sqrt(squaredDeviations / (values.length - 1));
}

/**
 * Occurrence count per key, in first-seen order
 */
export function countBy<T, K>(items: readonly T[], key: (item: T) => K): Map<K, number> {
    const counts = new Map<K, number>();
    for (const item of items) {
        const k = key(item);
        counts.set(k, (counts.get(k) ?? 0) + 1);
    }
    return counts;
}
