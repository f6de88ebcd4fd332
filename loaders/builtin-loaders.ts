/**
 * Built-in annotation loaders: TSV (the evaluation format) and JSONL.
 */

import { getLoaderRegistry, registerLoader, type LoaderRegistry } from "./loader-registry.ts";
import { loadLocalJsonl, loadLocalTsv } from "./local.ts";

export function registerBuiltinLoaders(): void {
	registerLoader({
		name: "tsv",
		aliases: [".tsv", ".tab", ".txt"],
		description: "Tab-separated values with a header row, no quoting",
		loadFn: loadLocalTsv,
	});

	registerLoader({
		name: "jsonl",
		aliases: [".jsonl", ".ndjson"],
		description: "One JSON object per line with the annotation columns",
		loadFn: loadLocalJsonl,
	});
}

/**
 * Return the global registry with the built-in loaders registered.
 */
export function ensureBuiltinLoadersRegistered(): LoaderRegistry {
	const registry = getLoaderRegistry();
	if (!registry.has("tsv")) {
		registerBuiltinLoaders();
	}
	return registry;
}
