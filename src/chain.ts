import type { EngineConfig } from "./config";
import { ConfigError, EtlError, InvalidChainStateError } from "./errors";
import type { Evaluator } from "./evaluator";
import { applyMappings } from "./executor";
import type { JsonObject, JsonValue } from "./json";
import { cloneJson } from "./json";
import type { ChainSpec, ChainStep, EtlSpec } from "./loader";
import { loadEtlSpec } from "./loader";
import { deepMerge } from "./merge";
import { PREVIOUS_OUTPUT } from "./spec";

/**
 * Where a chain gets its ETL specs and documents from. References are the
 * literal `etl` / `src` / `dst` strings of a step.
 */
export interface ChainResolver {
	/** Raw (unvalidated) ETL spec value. */
	readEtlSpec(ref: string): Promise<unknown>;
	readDocument(ref: string): Promise<JsonValue>;
	/** Seed document, or undefined when the reference does not exist yet. */
	readSeed(ref: string): Promise<JsonValue | undefined>;
}

export type ChainRunOptions = {
	resolver: ChainResolver;
	evaluator: Evaluator;
	config: EngineConfig;
	/** Observes NotStarted → Running(1..n) → Completed | Failed. */
	onStateChange?: (state: ChainState) => void;
};

export type ChainState =
	| { status: "notStarted" }
	| { status: "running"; step: number }
	| { status: "completed"; output: JsonValue }
	| { status: "failed"; step: number; error: unknown };

/** Chain context, then ETL context, then step context; later wins. */
export function mergeContexts(...layers: JsonObject[]): JsonObject {
	const merged: JsonObject = {};
	for (const layer of layers) {
		deepMerge(merged, layer);
	}
	return merged;
}

function requirePrevious(
	previous: JsonValue | undefined,
	stepIndex: number,
	role: "src" | "dst",
): JsonValue {
	if (previous === undefined) {
		throw new InvalidChainStateError(
			`Step ${stepIndex}: ${role} '${PREVIOUS_OUTPUT}' used but no previous output exists`,
			{ stepIndex },
		);
	}
	return previous;
}

async function resolveSource(
	step: ChainStep,
	stepIndex: number,
	previous: JsonValue | undefined,
	resolver: ChainResolver,
): Promise<JsonValue> {
	if (step.src === PREVIOUS_OUTPUT) {
		return requirePrevious(previous, stepIndex, "src");
	}
	return resolver.readDocument(step.src);
}

async function resolveSeed(
	step: ChainStep,
	stepIndex: number,
	previous: JsonValue | undefined,
	resolver: ChainResolver,
): Promise<JsonValue> {
	if (step.dst === PREVIOUS_OUTPUT) {
		return cloneJson(requirePrevious(previous, stepIndex, "dst"));
	}
	if (step.dst === undefined) return {};
	return (await resolver.readSeed(step.dst)) ?? {};
}

async function runStep(
	step: ChainStep,
	stepIndex: number,
	chainContext: JsonObject,
	previous: JsonValue | undefined,
	options: ChainRunOptions,
): Promise<JsonValue> {
	const { resolver, evaluator, config } = options;

	const rawSpec = await resolver.readEtlSpec(step.etl);
	let spec: EtlSpec;
	try {
		spec = loadEtlSpec(rawSpec);
	} catch (error) {
		if (error instanceof EtlError) throw error.locate({ file: step.etl });
		throw error;
	}

	const context = mergeContexts(chainContext, spec.context, step.context);
	const source = await resolveSource(step, stepIndex, previous, resolver);
	const destination = await resolveSeed(step, stepIndex, previous, resolver);

	return applyMappings(spec.mappings, {
		source,
		context,
		prelude: spec.prelude,
		destination,
		delimiter: step.delimiter ?? config.delimiter,
		config,
		evaluator,
	});
}

/**
 * Runs every step in order. Each step's output becomes the `$prev` of the
 * next; the last output is the result. Any failure aborts the whole chain.
 */
export async function runChain(
	chain: ChainSpec,
	options: ChainRunOptions,
): Promise<JsonValue> {
	const notify = options.onStateChange ?? (() => {});
	notify({ status: "notStarted" });
	if (chain.steps.length === 0) {
		throw new ConfigError("Chain must contain at least one step");
	}

	let previous: JsonValue | undefined;
	for (const [offset, step] of chain.steps.entries()) {
		const stepIndex = offset + 1;
		notify({ status: "running", step: stepIndex });
		try {
			previous = await runStep(step, stepIndex, chain.context, previous, options);
		} catch (error) {
			notify({ status: "failed", step: stepIndex, error });
			if (error instanceof EtlError) throw error.locate({ stepIndex });
			throw error;
		}
	}

	if (previous === undefined) {
		throw new ConfigError("Chain produced no output");
	}
	notify({ status: "completed", output: previous });
	return previous;
}
