/**
 * Loader Registry - pluggable annotation file formats.
 *
 * Formats register under a name with file extensions as aliases, so a
 * path's extension picks its loader when no format is configured.
 *
 * @example
 * ```typescript
 * registerLoader({
 *   name: "csv",
 *   aliases: [".csv"],
 *   loadFn: async (path) => parseCsv(await readFile(path, "utf8")),
 * });
 * ```
 */

import { extname } from "node:path";
import type { RawAnnotationRow } from "../core/config.ts";

export const DEFAULT_FORMAT = "tsv";

/**
 * Definition of an annotation file loader.
 */
export interface LoaderDefinition {
	/** Format name, as given by `--format` or the `format` config key */
	name: string;
	/** File extensions (with the dot) handled by this loader */
	aliases?: readonly string[];
	/** One line shown in `--help` */
	description?: string;
	loadFn: (path: string) => Promise<RawAnnotationRow[]>;
}

/**
 * No loader is registered under the requested format name.
 */
export class UnknownFormatError extends Error {
	constructor(
		public readonly format: string,
		public readonly availableFormats: string[],
	) {
		super(`Unknown input format "${format}". Available: ${availableFormats.join(", ") || "none"}`);
		this.name = "UnknownFormatError";
	}
}

/**
 * A format name or extension is already claimed by another loader.
 */
export class FormatConflictError extends Error {
	constructor(
		public readonly key: string,
		public readonly claimedBy: string,
	) {
		super(`"${key}" is already registered by the ${claimedBy} loader`);
		this.name = "FormatConflictError";
	}
}

export class LoaderRegistry {
	private loaders = new Map<string, LoaderDefinition>();
	private extensions = new Map<string, LoaderDefinition>();

	/**
	 * @throws FormatConflictError if the name or an extension is taken
	 */
	register(def: LoaderDefinition): void {
		const extensions = (def.aliases ?? []).map((ext) => ext.toLowerCase());
		for (const key of [def.name, ...extensions]) {
			const owner = this.loaders.get(key) ?? this.extensions.get(key);
			if (owner) {
				throw new FormatConflictError(key, owner.name);
			}
		}

		this.loaders.set(def.name, def);
		for (const ext of extensions) {
			this.extensions.set(ext, def);
		}
	}

	has(nameOrExtension: string): boolean {
		return this.loaders.has(nameOrExtension) || this.extensions.has(nameOrExtension);
	}

	/**
	 * Pick the loader for a path: the explicit format if given, else the
	 * file extension, else the default TSV loader.
	 * @throws UnknownFormatError for an unknown explicit format
	 */
	resolve(path: string, format?: string): LoaderDefinition {
		const byName = (name: string): LoaderDefinition => {
			const def = this.loaders.get(name);
			if (!def) {
				throw new UnknownFormatError(name, this.getLoaderNames());
			}
			return def;
		};

		if (format) {
			return byName(format);
		}
		return this.extensions.get(extname(path).toLowerCase()) ?? byName(DEFAULT_FORMAT);
	}

	getLoaderNames(): string[] {
		return Array.from(this.loaders.keys()).sort();
	}

	/**
	 * Loaders sorted by name.
	 */
	list(): LoaderDefinition[] {
		return this.getLoaderNames().flatMap((name) => this.loaders.get(name) ?? []);
	}
}

let globalLoaderRegistry: LoaderRegistry | null = null;

/**
 * Get the global loader registry. Built-in loaders are added by
 * builtin-loaders.ts before first use.
 */
export function getLoaderRegistry(): LoaderRegistry {
	if (!globalLoaderRegistry) {
		globalLoaderRegistry = new LoaderRegistry();
	}
	return globalLoaderRegistry;
}

/**
 * Reset the global loader registry (for testing).
 */
export function resetLoaderRegistry(): void {
	globalLoaderRegistry = null;
}

export function registerLoader(def: LoaderDefinition): void {
	getLoaderRegistry().register(def);
}
