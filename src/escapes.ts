const SIMPLE_ESCAPES: Record<string, string> = {
	n: "\n",
	t: "\t",
	r: "\r",
	b: "\b",
	f: "\f",
	v: "\v",
	a: "\x07",
	"0": "\0",
	'"': '"',
	"'": "'",
	"\\": "\\",
	"/": "/",
};

const HEX_ESCAPES: Record<string, number> = { x: 2, u: 4, U: 8 };

/**
 * Decodes backslash escapes (`\n`, `\t`, `\"`, `\\`, `\xHH`, `\uHHHH`,
 * `\UHHHHHHHH`, ...). An unknown escape, or a hex escape with too few
 * digits, is kept verbatim including the backslash.
 */
export function unescapeText(text: string): string {
	if (!text.includes("\\")) return text;

	let result = "";
	let index = 0;
	while (index < text.length) {
		const char = text[index];
		if (char !== "\\" || index === text.length - 1) {
			result += char;
			index += 1;
			continue;
		}

		const marker = text[index + 1];
		const simple = SIMPLE_ESCAPES[marker];
		if (simple !== undefined) {
			result += simple;
			index += 2;
			continue;
		}

		const width = HEX_ESCAPES[marker];
		if (width !== undefined) {
			const digits = text.slice(index + 2, index + 2 + width);
			const codePoint = Number.parseInt(digits, 16);
			if (
				digits.length === width &&
				/^[0-9a-fA-F]+$/.test(digits) &&
				codePoint <= 0x10ffff
			) {
				result += String.fromCodePoint(codePoint);
				index += 2 + width;
				continue;
			}
		}

		result += `\\${marker}`;
		index += 2;
	}
	return result;
}
