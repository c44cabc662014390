import { describe, expect, it, vi } from "vitest";
import type { ChainResolver, ChainState } from "../chain";
import { mergeContexts, runChain } from "../chain";
import { resolveConfig } from "../config";
import { InvalidChainStateError, SpecFormatError } from "../errors";
import type { JsonValue } from "../json";
import type { ChainSpec } from "../loader";
import { createDotEvaluator } from "./helpers/evaluators";

function createMemoryResolver(
	specs: Record<string, unknown>,
	documents: Record<string, JsonValue>,
): ChainResolver {
	return {
		readEtlSpec: async (ref) => {
			if (!(ref in specs)) throw new Error(`No spec ${ref}`);
			return specs[ref];
		},
		readDocument: async (ref) => {
			if (!(ref in documents)) throw new Error(`No document ${ref}`);
			return documents[ref];
		},
		readSeed: async (ref) => documents[ref],
	};
}

function run(
	chain: ChainSpec,
	resolver: ChainResolver,
	onStateChange?: (state: ChainState) => void,
) {
	return runChain(chain, {
		resolver,
		evaluator: createDotEvaluator(),
		config: resolveConfig(),
		onStateChange,
	});
}

describe("mergeContexts", () => {
	it("lets later layers win and merges nested objects", () => {
		expect(
			mergeContexts(
				{ level: "chain", shared: { a: 1 } },
				{ level: "etl", shared: { b: 2 } },
				{ level: "step" },
			),
		).toEqual({ level: "step", shared: { a: 1, b: 2 } });
	});

	it("does not mutate its inputs", () => {
		const chain = { shared: { a: 1 } };
		mergeContexts(chain, { shared: { b: 2 } });
		expect(chain).toEqual({ shared: { a: 1 } });
	});
});

describe("runChain", () => {
	it("feeds each step's output to the next through $prev", async () => {
		const resolver = createMemoryResolver(
			{
				"extract.json": [{ src: ".user.name", dst: ".name" }],
				"shape.json": [{ src: ".name", dst: ".profile.displayName" }],
			},
			{ "input.json": { user: { name: "Ada" } } },
		);
		const output = await run(
			{
				context: {},
				steps: [
					{ etl: "extract.json", src: "input.json", context: {} },
					{ etl: "shape.json", src: "$prev", context: {} },
				],
			},
			resolver,
		);
		expect(output).toEqual({ profile: { displayName: "Ada" } });
	});

	it("seeds the destination with a copy of the previous output", async () => {
		const first = { tags: ["a"] };
		const resolver = createMemoryResolver(
			{
				"start.json": [{ src: ".tags", dst: ".tags" }],
				"more.json": [{ src: ".extra", dst: ".tags" }],
			},
			{ "input.json": first, "extra.json": { extra: ["b"] } },
		);
		const output = await run(
			{
				context: {},
				steps: [
					{ etl: "start.json", src: "input.json", context: {} },
					{ etl: "more.json", src: "extra.json", dst: "$prev", context: {} },
				],
			},
			resolver,
		);
		expect(output).toEqual({ tags: ["a", "b"] });
		expect(first).toEqual({ tags: ["a"] });
	});

	it("starts from a seed document or an empty object", async () => {
		const resolver = createMemoryResolver(
			{ "copy.json": [{ src: ".v", dst: ".v" }] },
			{ "input.json": { v: "new" }, "seed.json": { v: "old", keep: 1 } },
		);
		const seeded = await run(
			{
				context: {},
				steps: [
					{ etl: "copy.json", src: "input.json", dst: "seed.json", context: {} },
				],
			},
			resolver,
		);
		expect(seeded).toEqual({ v: "old\nnew", keep: 1 });

		const missingSeed = await run(
			{
				context: {},
				steps: [
					{ etl: "copy.json", src: "input.json", dst: "absent.json", context: {} },
				],
			},
			resolver,
		);
		expect(missingSeed).toEqual({ v: "new" });
	});

	it("layers chain, ETL and step contexts", async () => {
		const resolver = createMemoryResolver(
			{
				"ctx.json": [
					{ ctx: { who: "etl", fromEtl: true } },
					{ src: "$ctx.who", dst: ".who" },
					{ src: "$ctx.fromChain", dst: ".chain" },
					{ src: "$ctx.fromEtl", dst: ".etl" },
				],
			},
			{ "input.json": {} },
		);
		const output = await run(
			{
				context: { who: "chain", fromChain: true },
				steps: [
					{ etl: "ctx.json", src: "input.json", context: { who: "step" } },
				],
			},
			resolver,
		);
		expect(output).toEqual({ who: "step", chain: true, etl: true });
	});

	it("applies the step delimiter", async () => {
		const resolver = createMemoryResolver(
			{
				"join.json": [
					{ src: ".a", dst: ".t" },
					{ src: ".b", dst: ".t" },
				],
			},
			{ "input.json": { a: "x", b: "y" } },
		);
		const output = await run(
			{
				context: {},
				steps: [
					{ etl: "join.json", src: "input.json", context: {}, delimiter: "+" },
				],
			},
			resolver,
		);
		expect(output).toEqual({ t: "x+y" });
	});

	it("rejects $prev in the first step", async () => {
		const resolver = createMemoryResolver({ "a.json": [] }, {});
		const failure = run(
			{ context: {}, steps: [{ etl: "a.json", src: "$prev", context: {} }] },
			resolver,
		);
		await expect(failure).rejects.toBeInstanceOf(InvalidChainStateError);
		await expect(failure).rejects.toThrow(
			"Step 1: src '$prev' used but no previous output exists",
		);
	});

	it("reports state transitions", async () => {
		const resolver = createMemoryResolver(
			{ "a.json": [{ src: ".v", dst: ".v" }] },
			{ "input.json": { v: 1 } },
		);
		const onStateChange = vi.fn<(state: ChainState) => void>();
		await run(
			{
				context: {},
				steps: [
					{ etl: "a.json", src: "input.json", context: {} },
					{ etl: "a.json", src: "$prev", context: {} },
				],
			},
			resolver,
			onStateChange,
		);
		expect(onStateChange.mock.calls.map(([state]) => state)).toEqual([
			{ status: "notStarted" },
			{ status: "running", step: 1 },
			{ status: "running", step: 2 },
			{ status: "completed", output: { v: 1 } },
		]);
	});

	it("aborts on the first failing step and annotates the error", async () => {
		const resolver = createMemoryResolver(
			{
				"ok.json": [{ src: ".v", dst: ".v" }],
				"broken.json": [{ src: ".v" }],
			},
			{ "input.json": { v: 1 } },
		);
		const onStateChange = vi.fn<(state: ChainState) => void>();
		const failure = run(
			{
				context: {},
				steps: [
					{ etl: "ok.json", src: "input.json", context: {} },
					{ etl: "broken.json", src: "$prev", context: {} },
					{ etl: "ok.json", src: "$prev", context: {} },
				],
			},
			resolver,
			onStateChange,
		);
		await expect(failure).rejects.toMatchObject({
			name: "MissingRequiredFieldError",
			context: { stepIndex: 2, mappingIndex: 0, file: "broken.json" },
		});
		const statuses = onStateChange.mock.calls.map(([state]) => state.status);
		expect(statuses).toEqual(["notStarted", "running", "running", "failed"]);
	});

	it("annotates spec format errors with the spec reference", async () => {
		const resolver = createMemoryResolver(
			{ "bad.json": "not a spec" },
			{ "input.json": {} },
		);
		const failure = run(
			{ context: {}, steps: [{ etl: "bad.json", src: "input.json", context: {} }] },
			resolver,
		);
		await expect(failure).rejects.toBeInstanceOf(SpecFormatError);
		await expect(failure).rejects.toMatchObject({
			context: { stepIndex: 1, file: "bad.json" },
		});
	});

	it("propagates resolver failures unchanged", async () => {
		const resolver = createMemoryResolver({ "a.json": [] }, {});
		await expect(
			run(
				{ context: {}, steps: [{ etl: "a.json", src: "missing.json", context: {} }] },
				resolver,
			),
		).rejects.toThrow("No document missing.json");
	});
});
