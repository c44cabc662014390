import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SpecFormatError } from "../errors";
import {
	createFileResolver,
	loadEtlSpecFile,
	readJsonDocument,
	runChainFile,
	runEtl,
	runEtlFile,
	writeOutput,
} from "../run";

let dir: string;

async function writeJson(name: string, value: unknown) {
	const filePath = join(dir, name);
	await writeFile(filePath, JSON.stringify(value), "utf-8");
	return filePath;
}

beforeEach(async () => {
	dir = await mkdtemp(join(tmpdir(), "jetl-run-"));
});

afterEach(async () => {
	await rm(dir, { recursive: true, force: true });
	vi.restoreAllMocks();
});

describe("runEtlFile", () => {
	it("applies a spec file to a source file", async () => {
		const etlPath = await writeJson("report.etl.json", [
			{ ctx: { greeting: "hi" } },
			{ src: "$ctx.greeting & ' ' & name", dst: ".message" },
			{ src: "items.id", dst: ".ids", mode: "replace" },
		]);
		const srcPath = await writeJson("users.json", {
			name: "Ada",
			items: [{ id: 1 }, { id: 2 }],
		});

		expect(await runEtlFile({ etlPath, srcPath })).toEqual({
			message: "hi Ada",
			ids: [1, 2],
		});
	});

	it("starts from the seed document when it exists", async () => {
		const etlPath = await writeJson("spec.json", [{ src: "note", dst: ".log" }]);
		const srcPath = await writeJson("src.json", { note: "second" });
		const dstPath = await writeJson("seed.json", { log: "first", keep: true });

		expect(await runEtlFile({ etlPath, srcPath, dstPath })).toEqual({
			log: "first\nsecond",
			keep: true,
		});
		expect(
			await runEtlFile({ etlPath, srcPath, dstPath: join(dir, "absent.json") }),
		).toEqual({ log: "second" });
	});

	it("reads YAML spec files", async () => {
		const etlPath = join(dir, "spec.yaml");
		await writeFile(
			etlPath,
			"with: \"$shout := function($s) { $uppercase($s) & '!' }\"\nmappings:\n  - src: $shout(word)\n    dst: .loud\n",
			"utf-8",
		);
		const srcPath = await writeJson("src.json", { word: "hey" });

		expect(await runEtlFile({ etlPath, srcPath })).toEqual({ loud: "HEY!" });
	});

	it("reports invalid source JSON with the file name", async () => {
		const etlPath = await writeJson("spec.json", []);
		const srcPath = join(dir, "broken.json");
		await writeFile(srcPath, "{broken", "utf-8");

		await expect(runEtlFile({ etlPath, srcPath })).rejects.toThrow(
			`Invalid JSON in ${srcPath}: `,
		);
	});
});

describe("loadEtlSpecFile", () => {
	it("annotates spec errors with the file", async () => {
		const etlPath = await writeJson("bad.json", "just text");
		const failure = loadEtlSpecFile(etlPath);
		await expect(failure).rejects.toBeInstanceOf(SpecFormatError);
		await expect(failure).rejects.toMatchObject({ context: { file: etlPath } });
	});
});

describe("runChainFile", () => {
	it("resolves step files next to the chain spec", async () => {
		await mkdir(join(dir, "specs"));
		await writeJson("specs/extract.json", [
			{ src: "orders.total", dst: ".totals", mode: "replace" },
		]);
		await writeJson("specs/summarize.json", {
			ctx: { currency: "EUR" },
			mappings: [
				{ src: "$sum(totals)", dst: ".sum" },
				{ src: "$ctx.currency", dst: ".currency" },
				{ src: "$ctx.run", dst: ".run" },
			],
		});
		await writeJson("orders.json", { orders: [{ total: 5 }, { total: 7 }] });
		const chainPath = await writeJson("chain.json", {
			ctx: { run: "nightly" },
			steps: [
				{ etl: "specs/extract.json", src: "orders.json" },
				{ etl: "specs/summarize.json", src: "$prev", dst: "$prev" },
			],
		});

		expect(await runChainFile({ chainPath })).toEqual({
			totals: [5, 7],
			sum: 12,
			currency: "EUR",
			run: "nightly",
		});
	});
});

describe("createFileResolver", () => {
	it("returns undefined for a missing seed and fails for a missing source", async () => {
		const resolver = createFileResolver(dir);
		expect(await resolver.readSeed("nothing.json")).toBeUndefined();
		await expect(resolver.readDocument("nothing.json")).rejects.toMatchObject({
			code: "ENOENT",
		});
	});
});

describe("writeOutput", () => {
	it("writes pretty JSON to a file", async () => {
		const out = join(dir, "out.json");
		await writeOutput({ a: [1] }, out);
		expect(await readFile(out, "utf-8")).toBe('{\n  "a": [\n    1\n  ]\n}');
		expect(await readJsonDocument(out)).toEqual({ a: [1] });
	});

	it("prints to stdout for '-'", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		await writeOutput({ ok: true }, "-");
		expect(log).toHaveBeenCalledWith('{\n  "ok": true\n}');
	});
});

describe("runEtl", () => {
	it("runs an in-memory spec without touching the destination", async () => {
		const destination = { list: ["a"] };
		const result = await runEtl({
			spec: [{ src: "next", dst: ".list" }],
			source: { next: "b" },
			destination,
		});
		expect(result).toEqual({ list: ["a", "b"] });
		expect(destination).toEqual({ list: ["a"] });
	});
});
