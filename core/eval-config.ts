/**
 * Evaluation config: optional YAML file merged with command-line overrides,
 * validated by EvalConfigSchema.
 */

import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { parse } from "yaml";
import type { ZodError, z } from "zod";
import { EvalConfigSchema, type EvalConfig } from "./config.ts";
import { EvalConfigError } from "./errors.ts";

export type EvalConfigInput = z.input<typeof EvalConfigSchema>;

/**
 * Values from the command line, validated only after merging.
 */
export type EvalConfigOverrides = { [K in keyof EvalConfigInput]?: unknown };

const EvalConfigFileSchema = EvalConfigSchema.partial().strict();

/**
 * Interpolate environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax; unset variables without a
 * default are left as written.
 */
export function interpolateEnvVars(value: string): string {
	return value.replace(
		/\$\{(\w+)(?::-([^}]*))?\}/g,
		(match: string, name: string, defaultValue?: string) => {
			const envVal = process.env[name];
			if (envVal !== undefined && envVal !== "") {
				return envVal;
			}
			return defaultValue ?? match;
		},
	);
}

function interpolateEnvVarsInObject(obj: unknown): unknown {
	if (typeof obj === "string") {
		return interpolateEnvVars(obj);
	}
	if (Array.isArray(obj)) {
		return obj.map((item) => interpolateEnvVarsInObject(item));
	}
	if (obj !== null && typeof obj === "object") {
		const result: Record<string, unknown> = {};
		for (const [key, value] of Object.entries(obj)) {
			result[key] = interpolateEnvVarsInObject(value);
		}
		return result;
	}
	return obj;
}

/**
 * Format Zod validation errors for display.
 */
export function formatZodError(error: ZodError, source: string): string {
	const issues = error.issues.map((issue) => {
		const path = issue.path.join(".");
		return `  - ${path ? `${path}: ` : ""}${issue.message}`;
	});
	return `Validation failed for ${source}:\n${issues.join("\n")}`;
}

/**
 * Read a YAML config file. Relative file paths inside it resolve against
 * the file's directory.
 * @throws EvalConfigError if the file is unreadable, not YAML, or invalid
 */
export async function readEvalConfigFile(filePath: string): Promise<Partial<EvalConfigInput>> {
	let raw: unknown;
	try {
		raw = parse(await readFile(filePath, "utf8"));
	} catch (error) {
		throw new EvalConfigError(`Cannot read config ${filePath}: ${error}`, filePath, {
			cause: error,
		});
	}

	const result = EvalConfigFileSchema.safeParse(interpolateEnvVarsInObject(raw ?? {}));
	if (!result.success) {
		throw new EvalConfigError(formatZodError(result.error, filePath), filePath);
	}

	const baseDir = dirname(filePath);
	const fromFile = (path: string | undefined): string | undefined =>
		path === undefined || isAbsolute(path) ? path : resolve(baseDir, path);

	return {
		...result.data,
		goldStandard: fromFile(result.data.goldStandard),
		predictions: fromFile(result.data.predictions),
		output: fromFile(result.data.output),
	};
}

/**
 * Build the evaluation config. Overrides win over the config file; keys left
 * undefined in the overrides fall through to the file.
 * @throws EvalConfigError if the merged config is invalid
 */
export async function loadEvalConfig(
	overrides: EvalConfigOverrides,
	configPath?: string,
): Promise<EvalConfig> {
	const fileValues: Partial<EvalConfigInput> = configPath
		? await readEvalConfigFile(configPath)
		: {};
	const merged: EvalConfigOverrides = {
		goldStandard: overrides.goldStandard ?? fileValues.goldStandard,
		predictions: overrides.predictions ?? fileValues.predictions,
		entities: overrides.entities ?? fileValues.entities,
		format: overrides.format ?? fileValues.format,
		perDocument: overrides.perDocument ?? fileValues.perDocument,
		zeroDivision: overrides.zeroDivision ?? fileValues.zeroDivision,
		output: overrides.output ?? fileValues.output,
	};

	const result = EvalConfigSchema.safeParse(merged);
	if (!result.success) {
		const source = configPath ?? "command-line options";
		throw new EvalConfigError(formatZodError(result.error, source), source);
	}
	return result.data;
}
