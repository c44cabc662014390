#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import type { ChainState } from "./chain";
import type { EngineConfig } from "./config";
import { resolveConfig } from "./config";
import { describeError } from "./errors";
import { unescapeText } from "./escapes";
import { runChainFile, runEtlFile, writeOutput } from "./run";
import { getChainSpecJsonSchema, getEtlSpecJsonSchema } from "./spec";

export function printHelp() {
	console.log(`jetl - declarative JSON-to-JSON transformation

Usage:
  jetl --etl <spec> --src <file> [--dst <file>] [options]
  jetl --meta <chain> [options]
  jetl schema <etl|chain> [--pretty]

Options:
  --etl        ETL spec file (single transformation)
  --meta       Chain spec file (runs several ETL specs in sequence)
  --src        Source JSON document (required with --etl)
  --dst        Destination seed document (starts from {} if missing)
  --out        Output file (default: stdout, '-' for stdout explicitly)
  --stdout     Force output to stdout (overrides --out)
  --delimiter  Default delimiter for string upserts (default: \\n)
  --timeout    Deadline in milliseconds for each expression evaluation
  --verbose    Report chain progress on stderr
  --pretty     Pretty-print JSON Schema output
  --help       Show help

Examples:
  jetl --etl report.etl.json --src users.json --out report.json
  jetl --meta pipeline.json --delimiter ", "
  jetl schema chain --pretty
`);
}

export function parseTimeout(value: string | undefined): number | undefined {
	if (value === undefined) return undefined;
	const timeout = Number(value);
	if (!Number.isInteger(timeout) || timeout <= 0) {
		throw new Error(`Invalid --timeout: ${value}`);
	}
	return timeout;
}

export function buildConfig(values: {
	delimiter?: string;
	timeout?: string;
}): EngineConfig {
	return resolveConfig({
		delimiter: unescapeText(values.delimiter ?? "\\n"),
		timeoutMs: parseTimeout(values.timeout),
	});
}

export function describeState(state: ChainState): string | undefined {
	switch (state.status) {
		case "running":
			return `step ${state.step} running`;
		case "failed":
			return `step ${state.step} failed`;
		case "completed":
			return "chain completed";
		default:
			return undefined;
	}
}

export async function commandEtl(options: {
	etl: string;
	src: string | undefined;
	dst?: string;
	out?: string;
	config: EngineConfig;
}) {
	if (!options.src) {
		throw new Error("Missing --src path (required with --etl)");
	}
	const result = await runEtlFile({
		etlPath: options.etl,
		srcPath: options.src,
		dstPath: options.dst,
		config: options.config,
	});
	await writeOutput(result, options.out);
}

export async function commandMeta(options: {
	meta: string;
	out?: string;
	verbose?: boolean;
	config: EngineConfig;
}) {
	const result = await runChainFile({
		chainPath: options.meta,
		config: options.config,
		onStateChange: options.verbose
			? (state) => {
					const message = describeState(state);
					if (message) console.error(`[jetl] ${message}`);
				}
			: undefined,
	});
	await writeOutput(result, options.out);
}

export function commandSchema(kind: string | undefined, pretty: boolean | undefined) {
	let schema: ReturnType<typeof getEtlSpecJsonSchema>;
	if (kind === "etl") {
		schema = getEtlSpecJsonSchema();
	} else if (kind === "chain") {
		schema = getChainSpecJsonSchema();
	} else {
		throw new Error(`Unknown schema: ${kind ?? "(none)"} (expected etl or chain)`);
	}
	console.log(JSON.stringify(schema, null, pretty ? 2 : 0));
}

export async function main(argv: string[] = process.argv.slice(2)) {
	const { positionals, values } = parseArgs({
		args: argv,
		allowPositionals: true,
		options: {
			etl: { type: "string" },
			meta: { type: "string" },
			src: { type: "string" },
			dst: { type: "string" },
			out: { type: "string", default: "-" },
			stdout: { type: "boolean" },
			delimiter: { type: "string" },
			timeout: { type: "string" },
			verbose: { type: "boolean" },
			pretty: { type: "boolean" },
			help: { type: "boolean" },
		},
	});

	if (values.help) {
		printHelp();
		return;
	}

	if (positionals[0] === "schema") {
		commandSchema(positionals[1], values.pretty);
		return;
	}
	if (positionals.length > 0) {
		throw new Error(`Unknown command: ${positionals.join(" ")}`);
	}

	if (values.etl && values.meta) {
		throw new Error("--etl and --meta cannot be used together");
	}
	if (!values.etl && !values.meta) {
		printHelp();
		throw new Error("One of --etl or --meta is required");
	}

	const config = buildConfig(values);
	const out = values.stdout ? "-" : values.out;

	if (values.meta) {
		await commandMeta({ meta: values.meta, out, verbose: values.verbose, config });
		return;
	}
	if (values.etl) {
		await commandEtl({
			etl: values.etl,
			src: values.src,
			dst: values.dst,
			out,
			config,
		});
	}
}

const invokedPath = process.argv[1];
if (invokedPath && pathToFileURL(invokedPath).href === import.meta.url) {
	main().catch((error) => {
		console.error(`jetl error: ${describeError(error)}`);
		process.exitCode = 1;
	});
}
