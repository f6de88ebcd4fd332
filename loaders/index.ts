/**
 * Annotation loaders: read a file, apply the entity filter, normalize.
 */

import type { RecordSet } from "../core/config.ts";
import type { WarningSink } from "../core/errors.ts";
import { filterByEntities, normalize } from "../core/records/index.ts";
import { ensureBuiltinLoadersRegistered } from "./builtin-loaders.ts";

export { parseTsv, parseJsonl, loadLocalTsv, loadLocalJsonl } from "./local.ts";
export {
	LoaderRegistry,
	UnknownFormatError,
	FormatConflictError,
	getLoaderRegistry,
	resetLoaderRegistry,
	registerLoader,
	DEFAULT_FORMAT,
	type LoaderDefinition,
} from "./loader-registry.ts";
export { ensureBuiltinLoadersRegistered, registerBuiltinLoaders } from "./builtin-loaders.ts";

export interface LoadRecordsOptions {
	/** Loader name; inferred from the extension when absent */
	format?: string;
	/** Restrict to these labels (upper-cased before matching) */
	entities?: readonly string[];
	onWarning?: WarningSink;
}

/**
 * Load one annotation file into a RecordSet.
 * @throws MalformedInputError if the file is unreadable or lacks required columns
 */
export async function loadRecordSet(
	path: string,
	options: LoadRecordsOptions = {},
): Promise<RecordSet> {
	const loader = ensureBuiltinLoadersRegistered().resolve(path, options.format);
	const rows = await loader.loadFn(path);
	return normalize(filterByEntities(rows, options.entities), {
		source: path,
		onWarning: options.onWarning,
	});
}
