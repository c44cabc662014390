import jsonata from "jsonata";
import { EvaluationTimeoutError, ExpressionError } from "./errors";
import type { JsonObject, JsonValue } from "./json";
import { JsonConversionError, toJsonValue } from "./json";

/**
 * Evaluates `expression` against `document` with `bindings` in scope and
 * resolves to the ordered list of results.
 */
export type Evaluator = (
	expression: string,
	document: JsonValue,
	bindings: JsonObject,
) => Promise<JsonValue[]>;

/**
 * Wraps an expression in the spec's prelude. The prelude is a list of JSONata
 * statements (typically `$name := ...;` bindings) that must be in scope for
 * the expression, so both go into one block.
 */
export function composeExpression(expression: string, prelude: string): string {
	const statements = prelude.trim();
	if (!statements) return expression;
	const terminated = statements.endsWith(";") ? statements : `${statements};`;
	return `(\n${terminated}\n(${expression})\n)`;
}

function describeFailure(error: unknown): string {
	if (error instanceof Error) return error.message;
	if (typeof error === "object" && error !== null && "message" in error) {
		const { message } = error;
		if (typeof message === "string") return message;
	}
	return String(error);
}

function isResultSequence(value: unknown[]): boolean {
	return Reflect.get(value, "sequence") === true;
}

function toResultList(result: unknown, expression: string): JsonValue[] {
	if (result === undefined) return [];
	const items =
		Array.isArray(result) && isResultSequence(result) ? result : [result];
	try {
		return items
			.filter((item) => item !== undefined)
			.map((item) => toJsonValue(item));
	} catch (error) {
		if (error instanceof JsonConversionError) {
			throw new ExpressionError(
				`Expression produced a non-JSON result: ${error.message}`,
				expression,
				{ cause: error },
			);
		}
		throw error;
	}
}

export function createJsonataEvaluator(): Evaluator {
	return async (expression, document, bindings) => {
		let compiled: ReturnType<typeof jsonata>;
		try {
			compiled = jsonata(expression);
		} catch (error) {
			throw new ExpressionError(
				`Failed to compile expression: ${describeFailure(error)}`,
				expression,
				{ cause: error },
			);
		}

		let result: unknown;
		try {
			result = await compiled.evaluate(document, bindings);
		} catch (error) {
			throw new ExpressionError(
				`Failed to evaluate expression: ${describeFailure(error)}`,
				expression,
				{ cause: error },
			);
		}
		return toResultList(result, expression);
	};
}

/**
 * Rejects with EvaluationTimeoutError when `evaluator` has not settled within
 * `timeoutMs`. The underlying evaluation is not interrupted; its result is
 * discarded.
 */
export function withDeadline(evaluator: Evaluator, timeoutMs: number): Evaluator {
	return (expression, document, bindings) => {
		let timer: NodeJS.Timeout | undefined;
		const deadline = new Promise<never>((_resolve, reject) => {
			timer = setTimeout(
				() => reject(new EvaluationTimeoutError(timeoutMs)),
				timeoutMs,
			);
		});
		return Promise.race([
			evaluator(expression, document, bindings),
			deadline,
		]).finally(() => clearTimeout(timer));
	};
}
