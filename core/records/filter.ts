import { LABEL_TAG, type RawAnnotationRow } from "../config.ts";

/**
 * Keep rows whose label is one of `entities`, compared upper-cased.
 * An absent or empty list keeps every row.
 */
export function filterByEntities<T extends RawAnnotationRow>(
	rows: readonly T[],
	entities?: readonly string[],
): T[] {
	if (!entities || entities.length === 0) {
		return [...rows];
	}

	const allowed = new Set(entities.map((entity) => entity.toUpperCase()));
	return rows.filter((row) => {
		const label = row[LABEL_TAG];
		return label !== undefined && allowed.has(label);
	});
}
