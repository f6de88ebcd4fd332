import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MalformedInputError } from "../core/errors.ts";
import { loadRecordSet } from "./index.ts";

const GOLD = [
	"filename\tlabel\tstart_span\tend_span\ttext",
	"cc_1\tDISEASE\t0\t7\tanaemia",
	"cc_1\tDISEASE\t0\t7\tanaemia",
	"cc_1\tSYMPTOM\t12\t17\tfever",
	"cc_2\tPROCEDURE\t4\t9\tbiopsy",
].join("\n");

describe("loadRecordSet", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "spaneval-load-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("loads, deduplicates and reports duplicates against the path", async () => {
		const path = join(dir, "gold.tsv");
		await writeFile(path, GOLD);
		const onWarning = vi.fn();

		const records = await loadRecordSet(path, { onWarning });

		expect(records.map((r) => `${r.documentId}:${r.spanKey}:${r.label}`)).toEqual([
			"cc_1:0 7:DISEASE",
			"cc_1:12 17:SYMPTOM",
			"cc_2:4 9:PROCEDURE",
		]);
		expect(onWarning).toHaveBeenCalledWith({ kind: "duplicate-records", source: path, removed: 1 });
	});

	it("restricts records to the requested entities", async () => {
		const path = join(dir, "gold.tsv");
		await writeFile(path, GOLD);

		const records = await loadRecordSet(path, {
			entities: ["symptom", "procedure"],
			onWarning: () => {},
		});

		expect(records.map((r) => r.label)).toEqual(["SYMPTOM", "PROCEDURE"]);
	});

	it("honours an explicit format over the extension", async () => {
		const path = join(dir, "pred.txt");
		await writeFile(
			path,
			'{"filename":"cc_1","label":"DISEASE","start_span":"0","end_span":"7","text":"anaemia"}\n',
		);

		const records = await loadRecordSet(path, { format: "jsonl" });

		expect(records).toHaveLength(1);
		expect(records[0]?.spanKey).toBe("0 7");
	});

	it("fails on a file without the required columns", async () => {
		const path = join(dir, "pred.tsv");
		await writeFile(path, "filename\tlabel\noops\tDISEASE\n");

		await expect(loadRecordSet(path)).rejects.toBeInstanceOf(MalformedInputError);
	});
});
