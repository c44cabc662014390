import { parseDocument } from "yaml";
import { SpecFormatError } from "./errors";

type JsonAttempt = { ok: true; value: unknown } | { ok: false };

function tryParseJson(text: string): JsonAttempt {
	try {
		return { ok: true, value: JSON.parse(text) };
	} catch (error) {
		if (error instanceof SyntaxError) return { ok: false };
		throw error;
	}
}

/**
 * Parses spec file text. JSON is the documented format; anything JSON.parse
 * rejects goes through the YAML parser, which accepts YAML specs and reports
 * syntax errors with their line and column.
 */
export function parseSpecText(text: string, file?: string): unknown {
	const json = tryParseJson(text);
	if (json.ok) return json.value;

	const doc = parseDocument(text, { prettyErrors: true });
	if (doc.errors.length > 0) {
		const first = doc.errors[0];
		throw new SpecFormatError(first.message, {
			line: first.linePos?.[0]?.line,
			column: first.linePos?.[0]?.col,
			context: { file },
		});
	}
	return doc.toJSON();
}
