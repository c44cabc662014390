import type { EngineConfig, MappingMode } from "./config";
import { MAPPING_MODES } from "./config";
import { unescapeText } from "./escapes";
import { EtlError, UnsupportedModeError } from "./errors";
import type { Evaluator } from "./evaluator";
import { composeExpression, withDeadline } from "./evaluator";
import type { JsonObject, JsonValue } from "./json";
import type { Mapping } from "./loader";
import { replace, upsert } from "./merge";
import { ensureWritableTarget, readTarget, writeTarget } from "./navigator";
import type { Segment } from "./path";
import { parsePath } from "./path";

export type MappingRunOptions = {
	source: JsonValue;
	context: JsonObject;
	prelude: string;
	destination: JsonValue;
	/** Delimiter used when the mapping does not carry its own. */
	delimiter: string;
	config: EngineConfig;
	evaluator: Evaluator;
};

function isMappingMode(value: string): value is MappingMode {
	return MAPPING_MODES.some((mode) => mode === value);
}

export function resolveMode(
	mode: string | undefined,
	fallback: MappingMode,
): MappingMode {
	if (mode === undefined) return fallback;
	const normalized = mode.toLowerCase();
	if (!isMappingMode(normalized)) {
		throw new UnsupportedModeError(mode);
	}
	return normalized;
}

function collapseResults(results: JsonValue[]): JsonValue {
	if (results.length === 0) return null;
	if (results.length === 1) return results[0];
	return results;
}

function writeAt(
	destination: JsonValue,
	segments: Segment[],
	merge: (existing: JsonValue) => JsonValue,
): JsonValue {
	if (segments.length === 0) {
		return merge(destination);
	}
	const target = ensureWritableTarget(destination, segments);
	writeTarget(target, merge(readTarget(target)));
	return destination;
}

/**
 * Applies one mapping to `destination`, mutating it in place. Resolves to the
 * destination document, which is a new value only when the mapping writes to
 * the root path `.`.
 */
export async function applyMapping(
	mapping: Mapping,
	options: MappingRunOptions,
): Promise<JsonValue> {
	const mode = resolveMode(mapping.mode, options.config.mode);

	const { timeoutMs } = options.config;
	const evaluate =
		timeoutMs !== undefined
			? withDeadline(options.evaluator, timeoutMs)
			: options.evaluator;
	const results = await evaluate(
		composeExpression(mapping.src, options.prelude),
		options.source,
		{ ctx: options.context },
	);
	const segments = parsePath(mapping.dst);

	const delimiter =
		mapping.delimiter !== undefined && mapping.delimiter !== null
			? unescapeText(mapping.delimiter)
			: options.delimiter;

	if (mode === "replace") {
		const value = collapseResults(results);
		return writeAt(options.destination, segments, (existing) =>
			replace(existing, value),
		);
	}

	let destination = options.destination;
	for (const value of results) {
		destination = writeAt(destination, segments, (existing) =>
			upsert(existing, value, delimiter),
		);
	}
	return destination;
}

/**
 * Applies `mappings` in order against the same source, context and prelude.
 * Each mapping sees what earlier mappings wrote.
 */
export async function applyMappings(
	mappings: ReadonlyArray<Mapping>,
	options: MappingRunOptions,
): Promise<JsonValue> {
	let destination = options.destination;
	for (const [mappingIndex, mapping] of mappings.entries()) {
		try {
			destination = await applyMapping(mapping, { ...options, destination });
		} catch (error) {
			if (error instanceof EtlError) {
				throw error.locate({
					mappingIndex,
					path: mapping.dst,
					expression: mapping.src,
				});
			}
			throw error;
		}
	}
	return destination;
}
