import { readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { ChainResolver, ChainState } from "./chain";
import { runChain } from "./chain";
import type { EngineConfig } from "./config";
import { resolveConfig } from "./config";
import { EtlError } from "./errors";
import type { Evaluator } from "./evaluator";
import { createJsonataEvaluator } from "./evaluator";
import { applyMappings } from "./executor";
import type { JsonValue } from "./json";
import { cloneJson, toJsonValue } from "./json";
import { loadChainSpec, loadEtlSpec } from "./loader";
import { parseSpecText } from "./parser";

function isMissingFile(error: unknown): boolean {
	return (
		error instanceof Error &&
		"code" in error &&
		(error.code === "ENOENT" || error.code === "ENOTDIR")
	);
}

export async function readJsonDocument(filePath: string): Promise<JsonValue> {
	const text = await readFile(filePath, "utf-8");
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Invalid JSON in ${filePath}: ${message}`);
	}
	return toJsonValue(parsed);
}

/** Like readJsonDocument, but a file that does not exist yields undefined. */
export async function readSeedDocument(
	filePath: string,
): Promise<JsonValue | undefined> {
	try {
		return await readJsonDocument(filePath);
	} catch (error) {
		if (isMissingFile(error)) return undefined;
		throw error;
	}
}

export async function readSpecFile(filePath: string): Promise<unknown> {
	const text = await readFile(filePath, "utf-8");
	return locateFile(filePath, () => parseSpecText(text, filePath));
}

function locateFile<T>(filePath: string, load: () => T): T {
	try {
		return load();
	} catch (error) {
		if (error instanceof EtlError) throw error.locate({ file: filePath });
		throw error;
	}
}

export async function loadEtlSpecFile(filePath: string) {
	const raw = await readSpecFile(filePath);
	return locateFile(filePath, () => loadEtlSpec(raw));
}

export async function loadChainSpecFile(filePath: string) {
	const raw = await readSpecFile(filePath);
	return locateFile(filePath, () => loadChainSpec(raw));
}

/** Resolves step references relative to the chain spec's directory. */
export function createFileResolver(baseDir: string): ChainResolver {
	return {
		readEtlSpec: (ref) => readSpecFile(resolve(baseDir, ref)),
		readDocument: (ref) => readJsonDocument(resolve(baseDir, ref)),
		readSeed: (ref) => readSeedDocument(resolve(baseDir, ref)),
	};
}

export function formatDocument(document: JsonValue): string {
	return JSON.stringify(document, null, 2);
}

/** Writes to stdout when `out` is undefined, empty or `-`. */
export async function writeOutput(document: JsonValue, out?: string) {
	const text = formatDocument(document);
	if (!out || out === "-") {
		console.log(text);
		return;
	}
	await writeFile(out, text, "utf-8");
}

export async function runEtlFile({
	etlPath,
	srcPath,
	dstPath,
	config = resolveConfig(),
	evaluator = createJsonataEvaluator(),
}: {
	etlPath: string;
	srcPath: string;
	dstPath?: string;
	config?: EngineConfig;
	evaluator?: Evaluator;
}): Promise<JsonValue> {
	const spec = await loadEtlSpecFile(etlPath);
	const source = await readJsonDocument(srcPath);
	const destination = dstPath ? await readSeedDocument(dstPath) : undefined;
	return applyMappings(spec.mappings, {
		source,
		context: spec.context,
		prelude: spec.prelude,
		destination: destination ?? {},
		delimiter: config.delimiter,
		config,
		evaluator,
	});
}

export async function runChainFile({
	chainPath,
	config = resolveConfig(),
	evaluator = createJsonataEvaluator(),
	onStateChange,
}: {
	chainPath: string;
	config?: EngineConfig;
	evaluator?: Evaluator;
	onStateChange?: (state: ChainState) => void;
}): Promise<JsonValue> {
	const chain = await loadChainSpecFile(chainPath);
	return runChain(chain, {
		resolver: createFileResolver(dirname(chainPath)),
		evaluator,
		config,
		onStateChange,
	});
}

// Programmatic mode: spec and documents already in memory
export async function runEtl({
	spec,
	source,
	destination = {},
	config = resolveConfig(),
	evaluator = createJsonataEvaluator(),
}: {
	spec: unknown;
	source: JsonValue;
	destination?: JsonValue;
	config?: EngineConfig;
	evaluator?: Evaluator;
}): Promise<JsonValue> {
	const { mappings, context, prelude } = loadEtlSpec(spec);
	return applyMappings(mappings, {
		source,
		context,
		prelude,
		destination: cloneJson(destination),
		delimiter: config.delimiter,
		config,
		evaluator,
	});
}
