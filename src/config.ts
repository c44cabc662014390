import { z } from "zod";
import { ConfigError } from "./errors";

export const MAPPING_MODES = ["upsert", "replace"] as const;

export type MappingMode = (typeof MAPPING_MODES)[number];

export const DEFAULT_DELIMITER = "\n";
export const DEFAULT_MODE: MappingMode = "upsert";

export const EngineConfigSchema = z.object({
	delimiter: z
		.string()
		.default(DEFAULT_DELIMITER)
		.describe("Separator used when upserting a string onto a string"),
	mode: z
		.enum(MAPPING_MODES)
		.default(DEFAULT_MODE)
		.describe("Write mode for mappings that do not name one"),
	timeoutMs: z
		.number()
		.int()
		.positive()
		.optional()
		.describe("Deadline for a single expression evaluation"),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export function resolveConfig(
	overrides: z.input<typeof EngineConfigSchema> = {},
): EngineConfig {
	const parsed = EngineConfigSchema.safeParse(overrides);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new ConfigError(
			`Invalid engine configuration: ${issue.path.join(".")} ${issue.message}`,
		);
	}
	return parsed.data;
}
