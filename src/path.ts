import { unescapeText } from "./escapes";
import { PathSyntaxError } from "./errors";

export type Segment = string | number;

// One token per alternative: .name | [123] | ["key"] | ['key']
const TOKEN =
	/\.([A-Za-z_][A-Za-z0-9_]*)|\[\s*([0-9]+)\s*\]|\[\s*"((?:[^"\\]|\\.)*)"\s*\]|\[\s*'((?:[^'\\]|\\.)*)'\s*\]/y;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Parses a concrete destination path such as `.a.b[2]["c d"]` into its
 * segments. `.` alone addresses the document root and yields no segments.
 */
export function parsePath(path: string): Segment[] {
	if (!path.startsWith(".")) {
		throw new PathSyntaxError(
			path,
			0,
			`Destination path must start with '.': ${path}`,
		);
	}
	if (path === ".") return [];

	const segments: Segment[] = [];
	let offset = 0;
	while (offset < path.length) {
		TOKEN.lastIndex = offset;
		const match = TOKEN.exec(path);
		if (!match) {
			throw new PathSyntaxError(path, offset);
		}
		const [, name, index, doubleQuoted, singleQuoted] = match;
		if (name !== undefined) {
			segments.push(name);
		} else if (index !== undefined) {
			segments.push(Number.parseInt(index, 10));
		} else if (doubleQuoted !== undefined) {
			segments.push(unescapeText(doubleQuoted));
		} else {
			segments.push(unescapeText(singleQuoted));
		}
		offset = TOKEN.lastIndex;
	}
	return segments;
}

export function formatPath(segments: ReadonlyArray<Segment>): string {
	if (segments.length === 0) return ".";
	return segments
		.map((segment) => {
			if (typeof segment === "number") return `[${segment}]`;
			if (IDENTIFIER.test(segment)) return `.${segment}`;
			return `[${JSON.stringify(segment)}]`;
		})
		.join("");
}
