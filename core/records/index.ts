export { normalize, dedupeRecords, toSpanKey, recordKey, type NormalizeOptions } from "./normalize.ts";
export { filterByEntities } from "./filter.ts";
