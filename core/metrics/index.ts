/**
 * Metrics Engine - exports counting, derivation and result types.
 *
 * computeMetrics() is a pure function of its two record sets: counting
 * runs first, then per-document and micro metrics are derived from the counts.
 */

export * from "./interface.ts";
export { countPositives, countDistinctSpans } from "./positives.ts";
export { calculateMetrics } from "./calculate.ts";

import type { RecordSet } from "../config.ts";
import { calculateMetrics } from "./calculate.ts";
import type { MetricsOptions, MetricsResult } from "./interface.ts";
import { countPositives } from "./positives.ts";

/**
 * Score predicted records against the gold standard.
 */
export function computeMetrics(
	gold: RecordSet,
	predicted: RecordSet,
	options: MetricsOptions = {},
): MetricsResult {
	return calculateMetrics(countPositives(gold, predicted), options);
}
