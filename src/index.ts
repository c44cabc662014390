export { parsePath, formatPath } from "./path";
export type { Segment } from "./path";
export { ensureWritableTarget, readTarget, writeTarget } from "./navigator";
export type { WriteTarget } from "./navigator";
export { deepMerge, replace, upsert } from "./merge";
export { applyMapping, applyMappings, resolveMode } from "./executor";
export type { MappingRunOptions } from "./executor";
export { loadChainSpec, loadEtlSpec } from "./loader";
export type { ChainSpec, ChainStep, EtlSpec, Mapping } from "./loader";
export { mergeContexts, runChain } from "./chain";
export type { ChainResolver, ChainRunOptions, ChainState } from "./chain";
export {
	composeExpression,
	createJsonataEvaluator,
	withDeadline,
} from "./evaluator";
export type { Evaluator } from "./evaluator";
export { parseSpecText } from "./parser";
export {
	DEFAULT_DELIMITER,
	DEFAULT_MODE,
	MAPPING_MODES,
	resolveConfig,
} from "./config";
export type { EngineConfig, MappingMode } from "./config";
export {
	ChainSpecSchema,
	EtlSpecSchema,
	MappingSchema,
	PREVIOUS_OUTPUT,
	getChainSpecJsonSchema,
	getEtlSpecJsonSchema,
} from "./spec";
export { cloneJson, jsonKind, toJsonValue } from "./json";
export type { JsonArray, JsonObject, JsonValue, JsonKind } from "./json";
export { unescapeText } from "./escapes";
export {
	ConfigError,
	EtlError,
	EvaluationTimeoutError,
	ExpressionError,
	InvalidChainStateError,
	MissingRequiredFieldError,
	PathSyntaxError,
	SpecFormatError,
	TypeMismatchError,
	UnsupportedModeError,
	describeError,
} from "./errors";
export type { ErrorContext } from "./errors";

// File-based runners
export {
	createFileResolver,
	loadChainSpecFile,
	loadEtlSpecFile,
	readJsonDocument,
	runChainFile,
	runEtl,
	runEtlFile,
	writeOutput,
} from "./run";
