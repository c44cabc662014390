import type { ZodError } from "zod";
import {
	ConfigError,
	MissingRequiredFieldError,
	SpecFormatError,
} from "./errors";
import type { JsonObject } from "./json";
import { deepMerge } from "./merge";
import type { RawMapping } from "./spec";
import {
	ChainStepSchema,
	ContextDirectiveSchema,
	EtlSpecObjectSchema,
	JsonObjectSchema,
	MappingSchema,
	PreludeDirectiveSchema,
} from "./spec";

export type Mapping = {
	src: string;
	dst: string;
	mode?: string;
	delimiter?: string | null;
};

export type EtlSpec = {
	mappings: Mapping[];
	context: JsonObject;
	prelude: string;
};

export type ChainStep = {
	etl: string;
	src: string;
	dst?: string;
	context: JsonObject;
	delimiter?: string;
};

export type ChainSpec = {
	context: JsonObject;
	steps: ChainStep[];
};

type SpecEntry =
	| { kind: "ctx"; value: JsonObject | null }
	| { kind: "with"; value: string | null }
	| { kind: "mapping"; value: Record<string, unknown> };

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstIssue(error: ZodError, prefix: string): string {
	const issue = error.issues[0];
	const path = [prefix, ...issue.path.map(String)].filter(Boolean).join(".");
	return path ? `${path}: ${issue.message}` : issue.message;
}

function classifyEntry(item: unknown, position: number): SpecEntry {
	if (!isPlainObject(item)) {
		throw new SpecFormatError(
			`ETL spec entry ${position} must be an object, got ${Array.isArray(item) ? "array" : typeof item}`,
		);
	}
	const keys = Object.keys(item);
	if (keys.length === 1 && keys[0] === "ctx") {
		const parsed = ContextDirectiveSchema.safeParse(item);
		if (!parsed.success) {
			throw new SpecFormatError(
				`Invalid ctx entry: ${firstIssue(parsed.error, `[${position}]`)}`,
			);
		}
		return { kind: "ctx", value: parsed.data.ctx };
	}
	if (keys.length === 1 && keys[0] === "with") {
		const parsed = PreludeDirectiveSchema.safeParse(item);
		if (!parsed.success) {
			throw new SpecFormatError(
				`Invalid with entry: ${firstIssue(parsed.error, `[${position}]`)}`,
			);
		}
		return { kind: "with", value: parsed.data.with };
	}
	return { kind: "mapping", value: item };
}

function toMapping(item: unknown, mappingIndex: number): Mapping {
	if (!isPlainObject(item)) {
		throw new SpecFormatError("Each mapping must be an object", {
			context: { mappingIndex },
		});
	}
	const missing = ["src", "dst"].filter((field) => !(field in item));
	if (missing.length > 0) {
		throw new MissingRequiredFieldError(
			"Each mapping must include 'src' and 'dst'",
			missing,
			{ mappingIndex },
		);
	}
	const parsed = MappingSchema.safeParse(item);
	if (!parsed.success) {
		throw new SpecFormatError(
			`Invalid mapping: ${firstIssue(parsed.error, "")}`,
			{ context: { mappingIndex } },
		);
	}
	return normalizeMapping(parsed.data);
}

function normalizeMapping(raw: RawMapping): Mapping {
	const mapping: Mapping = { src: raw.src, dst: raw.dst };
	if (raw.mode !== undefined) mapping.mode = raw.mode;
	if (raw.delimiter !== undefined) mapping.delimiter = raw.delimiter;
	return mapping;
}

function loadListSpec(entries: unknown[]): EtlSpec {
	const classified = entries.map((item, position) =>
		classifyEntry(item, position),
	);

	const mappings: Mapping[] = [];
	const context: JsonObject = {};
	let prelude = "";
	for (const entry of classified) {
		switch (entry.kind) {
			case "ctx":
				if (entry.value) deepMerge(context, entry.value);
				break;
			case "with":
				prelude = (entry.value ?? "").trim();
				break;
			case "mapping":
				mappings.push(toMapping(entry.value, mappings.length));
				break;
		}
	}
	return { mappings, context, prelude };
}

function loadObjectSpec(raw: Record<string, unknown>): EtlSpec {
	const parsed = EtlSpecObjectSchema.omit({ mappings: true }).safeParse(raw);
	if (!parsed.success) {
		throw new SpecFormatError(
			`Invalid ETL spec: ${firstIssue(parsed.error, "")}`,
		);
	}
	const rawMappings = raw.mappings ?? [];
	if (!Array.isArray(rawMappings)) {
		throw new SpecFormatError("ETL spec 'mappings' must be an array");
	}
	return {
		mappings: rawMappings.map((item, index) => toMapping(item, index)),
		context: parsed.data.ctx ?? {},
		prelude: (parsed.data.with ?? "").trim(),
	};
}

/**
 * Accepts either a list mixing mappings with `{"ctx": ...}` and
 * `{"with": ...}` entries, or an object `{ mappings, ctx?, with? }`.
 */
export function loadEtlSpec(raw: unknown): EtlSpec {
	if (Array.isArray(raw)) return loadListSpec(raw);
	if (isPlainObject(raw)) return loadObjectSpec(raw);
	throw new SpecFormatError("ETL spec must be a JSON array or object");
}

function parseContext(value: unknown, label: string): JsonObject {
	if (value === undefined || value === null) return {};
	const parsed = JsonObjectSchema.safeParse(value);
	if (!parsed.success) {
		throw new SpecFormatError(`${label} must be a JSON object`);
	}
	return parsed.data;
}

function toChainStep(raw: unknown, stepIndex: number): ChainStep {
	if (!isPlainObject(raw)) {
		throw new SpecFormatError(`Step ${stepIndex}: must be an object`, {
			context: { stepIndex },
		});
	}
	const missing = ["etl", "src"].filter((field) => !raw[field]);
	if (missing.length > 0) {
		throw new MissingRequiredFieldError(
			`Step ${stepIndex}: missing required keys 'etl' and/or 'src'`,
			missing,
			{ stepIndex },
		);
	}
	const parsed = ChainStepSchema.safeParse(raw);
	if (!parsed.success) {
		throw new SpecFormatError(
			`Step ${stepIndex}: ${firstIssue(parsed.error, "")}`,
			{ context: { stepIndex } },
		);
	}
	const { etl, src, dst, ctx, options } = parsed.data;
	const step: ChainStep = { etl, src, context: ctx ?? {} };
	if (dst) step.dst = dst;
	if (options?.delimiter !== undefined) step.delimiter = options.delimiter;
	return step;
}

export function loadChainSpec(raw: unknown): ChainSpec {
	if (!isPlainObject(raw)) {
		throw new SpecFormatError("Chain spec must be a JSON object");
	}
	const steps = raw.steps;
	if (!Array.isArray(steps) || steps.length === 0) {
		throw new ConfigError("Chain spec 'steps' must be a non-empty array");
	}
	return {
		context: parseContext(raw.ctx, "Chain spec 'ctx'"),
		steps: steps.map((step, index) => toChainStep(step, index + 1)),
	};
}
