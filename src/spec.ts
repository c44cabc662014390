import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { JsonValue } from "./json";

/** Sentinel that refers to the previous chain step's output document. */
export const PREVIOUS_OUTPUT = "$prev";

const JsonLiteral = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
	z.union([JsonLiteral, z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

export const JsonObjectSchema = z.record(JsonValueSchema);

export const MappingSchema = z.object({
	src: z.string().describe("Source expression evaluated against the source document"),
	dst: z
		.string()
		.describe('Concrete destination path, e.g. .report.items[0]["full name"]'),
	mode: z
		.string()
		.optional()
		.describe("Write mode: upsert (default) or replace, case-insensitive"),
	delimiter: z
		.string()
		.nullable()
		.optional()
		.describe("Per-mapping string upsert delimiter; backslash escapes are decoded"),
});

export const ContextDirectiveSchema = z
	.object({
		ctx: JsonObjectSchema.nullable().describe(
			"Deep-merged into the spec context",
		),
	})
	.strict();

export const PreludeDirectiveSchema = z
	.object({
		with: z
			.string()
			.nullable()
			.describe("Expression prelude wrapped around every mapping"),
	})
	.strict();

export const EtlSpecListSchema = z.array(
	z.union([ContextDirectiveSchema, PreludeDirectiveSchema, MappingSchema]),
);

export const EtlSpecObjectSchema = z.object({
	mappings: z.array(MappingSchema).optional(),
	ctx: JsonObjectSchema.nullable().optional(),
	with: z.string().nullable().optional(),
});

export const EtlSpecSchema = z.union([EtlSpecListSchema, EtlSpecObjectSchema]);

export const StepOptionsSchema = z.object({
	delimiter: z
		.string()
		.optional()
		.describe("String upsert delimiter for this step"),
});

export const ChainStepSchema = z.object({
	etl: z.string().min(1).describe("ETL spec file, relative to the chain spec"),
	src: z
		.string()
		.min(1)
		.describe(`Source document file, or "${PREVIOUS_OUTPUT}"`),
	dst: z
		.string()
		.nullable()
		.optional()
		.describe(`Destination seed file, or "${PREVIOUS_OUTPUT}"`),
	ctx: JsonObjectSchema.nullable().optional(),
	options: StepOptionsSchema.nullable().optional(),
});

export const ChainSpecSchema = z.object({
	ctx: JsonObjectSchema.nullable().optional(),
	steps: z.array(ChainStepSchema).min(1),
});

export type RawMapping = z.infer<typeof MappingSchema>;
export type RawEtlSpec = z.infer<typeof EtlSpecSchema>;
export type RawChainStep = z.infer<typeof ChainStepSchema>;
export type RawChainSpec = z.infer<typeof ChainSpecSchema>;

export function getEtlSpecJsonSchema() {
	return zodToJsonSchema(EtlSpecSchema, { name: "EtlSpec" });
}

export function getChainSpecJsonSchema() {
	return zodToJsonSchema(ChainSpecSchema, { name: "ChainSpec" });
}
