/**
 * Shared arithmetic for metric calculations.
 */

/**
 * Plain division; 0/0 is NaN and x/0 is Infinity.
 */
export function divide(numerator: number, denominator: number): number {
	return numerator / denominator;
}

/**
 * Division that reports 0 when the denominator is not positive.
 */
export function guardedDivide(numerator: number, denominator: number): number {
	return denominator > 0 ? numerator / denominator : 0;
}

/**
 * Harmonic mean of precision and recall, unguarded (NaN when both are 0).
 */
export function harmonicMean(precision: number, recall: number): number {
	return (2 * precision * recall) / (precision + recall);
}

/**
 * Compute F1 score from precision and recall, 0 when both are 0.
 */
export function computeF1FromPR(precision: number, recall: number): number {
	if (!(precision + recall > 0)) return 0;
	return (2 * precision * recall) / (precision + recall);
}

/**
 * Increment a per-key counter.
 */
export function increment(counts: Map<string, number>, key: string): void {
	counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Copy a map with its keys in ascending order.
 */
export function sortByKey<V>(map: ReadonlyMap<string, V>): Map<string, V> {
	const entries = Array.from(map.entries());
	entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
	return new Map(entries);
}
