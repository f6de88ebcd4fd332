#!/usr/bin/env tsx
/**
 * spaneval CLI entry point.
 */

import { runEvaluation } from "./evaluate.ts";

runEvaluation(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		console.error("❌ Error:", error);
		process.exitCode = 1;
	});
