export interface ErrorContext {
	/** One-based index of the chain step. */
	stepIndex?: number;
	/** Zero-based index of the mapping inside its ETL spec. */
	mappingIndex?: number;
	/** Destination path text of the failing mapping. */
	path?: string;
	/** Source expression text of the failing mapping. */
	expression?: string;
	/** File the failing spec or document was read from. */
	file?: string;
}

/**
 * Base class for every failure raised by the engine. The context is filled in
 * as the error travels outward through the mapping and chain layers.
 */
export class EtlError extends Error {
	context: ErrorContext;

	constructor(message: string, context: ErrorContext = {}) {
		super(message);
		this.name = "EtlError";
		this.context = { ...context };
	}

	/** Adds context fields that are not already set. */
	locate(context: ErrorContext): this {
		const merged: ErrorContext = { ...context };
		for (const [key, value] of Object.entries(this.context)) {
			if (value !== undefined) {
				Object.assign(merged, { [key]: value });
			}
		}
		this.context = merged;
		return this;
	}

	format(): string {
		const lines = [`${this.name}: ${this.message}`];
		const { stepIndex, mappingIndex, path, expression, file } = this.context;
		const position: string[] = [];
		if (stepIndex !== undefined) position.push(`step ${stepIndex}`);
		if (mappingIndex !== undefined) position.push(`mapping ${mappingIndex}`);
		if (position.length > 0) lines.push(`  at ${position.join(", ")}`);
		if (file) lines.push(`  file: ${file}`);
		if (path !== undefined) lines.push(`  dst: ${path}`);
		if (expression !== undefined) lines.push(`  src: ${expression}`);
		return lines.join("\n");
	}
}

export class PathSyntaxError extends EtlError {
	readonly offset: number;
	readonly remainder: string;

	constructor(path: string, offset: number, reason?: string) {
		const remainder = path.slice(offset);
		super(
			reason ??
				`Unsupported or non-concrete destination path near '${remainder}' at offset ${offset} (full: ${path})`,
			{ path },
		);
		this.name = "PathSyntaxError";
		this.offset = offset;
		this.remainder = remainder;
	}
}

export class TypeMismatchError extends EtlError {
	readonly segments: ReadonlyArray<string | number>;
	readonly segmentIndex: number;

	constructor(
		message: string,
		segments: ReadonlyArray<string | number>,
		segmentIndex: number,
	) {
		super(message);
		this.name = "TypeMismatchError";
		this.segments = segments;
		this.segmentIndex = segmentIndex;
	}
}

export class SpecFormatError extends EtlError {
	line?: number;
	column?: number;

	constructor(
		message: string,
		options: { line?: number; column?: number; context?: ErrorContext } = {},
	) {
		super(message, options.context);
		this.name = "SpecFormatError";
		this.line = options.line;
		this.column = options.column;
	}

	format(): string {
		const base = super.format();
		if (this.line === undefined) return base;
		return `${base}\n  at line ${this.line}, column ${this.column ?? 1}`;
	}
}

export class MissingRequiredFieldError extends EtlError {
	readonly fields: string[];

	constructor(message: string, fields: string[], context?: ErrorContext) {
		super(message, context);
		this.name = "MissingRequiredFieldError";
		this.fields = fields;
	}
}

export class InvalidChainStateError extends EtlError {
	constructor(message: string, context?: ErrorContext) {
		super(message, context);
		this.name = "InvalidChainStateError";
	}
}

export class UnsupportedModeError extends EtlError {
	readonly mode: string;

	constructor(mode: string) {
		super(`Unsupported mode: ${mode}`);
		this.name = "UnsupportedModeError";
		this.mode = mode;
	}
}

export class ExpressionError extends EtlError {
	/** Text handed to the evaluator, prelude included. */
	readonly evaluated: string;

	constructor(message: string, evaluated: string, options?: { cause?: unknown }) {
		super(message);
		this.name = "ExpressionError";
		this.evaluated = evaluated;
		if (options?.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

export class EvaluationTimeoutError extends EtlError {
	readonly timeoutMs: number;

	constructor(timeoutMs: number) {
		super(`Expression evaluation exceeded ${timeoutMs}ms`);
		this.name = "EvaluationTimeoutError";
		this.timeoutMs = timeoutMs;
	}
}

export class ConfigError extends EtlError {
	constructor(message: string, context?: ErrorContext) {
		super(message, context);
		this.name = "ConfigError";
	}
}

export function describeError(error: unknown): string {
	if (error instanceof EtlError) return error.format();
	if (error instanceof Error) return error.message;
	return String(error);
}
