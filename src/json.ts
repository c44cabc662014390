export type JsonPrimitive = null | boolean | number | string;

export type JsonArray = JsonValue[];

export type JsonObject = { [key: string]: JsonValue };

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export type JsonKind =
	| "null"
	| "boolean"
	| "number"
	| "string"
	| "array"
	| "object";

export function jsonKind(value: JsonValue): JsonKind {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	switch (typeof value) {
		case "boolean":
			return "boolean";
		case "number":
			return "number";
		case "string":
			return "string";
		default:
			return "object";
	}
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
	return value !== undefined && jsonKind(value) === "object";
}

export function hasKey(object: JsonObject, key: string): boolean {
	return Object.hasOwn(object, key);
}

// A plain assignment of "__proto__" would replace the prototype instead of
// storing a key.
export function setKey(object: JsonObject, key: string, value: JsonValue) {
	if (key === "__proto__") {
		Object.defineProperty(object, key, {
			value,
			enumerable: true,
			writable: true,
			configurable: true,
		});
		return;
	}
	object[key] = value;
}

type CopyFrame = {
	from: JsonArray | JsonObject;
	to: JsonArray | JsonObject;
};

function shallowContainer(value: JsonArray | JsonObject): JsonArray | JsonObject {
	return Array.isArray(value) ? [] : {};
}

function placeChild(
	parent: JsonArray | JsonObject,
	key: string | number,
	value: JsonValue,
) {
	if (Array.isArray(parent)) {
		parent.push(value);
	} else {
		setKey(parent, String(key), value);
	}
}

/**
 * Deep copy of a JSON tree. Walks with an explicit stack so document depth
 * is not bounded by the call stack.
 */
export function cloneJson<T extends JsonValue>(value: T): T;
export function cloneJson(value: JsonValue): JsonValue {
	if (value === null || typeof value !== "object") return value;

	const root = shallowContainer(value);
	const stack: CopyFrame[] = [{ from: value, to: root }];
	while (stack.length > 0) {
		const frame = stack.pop();
		if (!frame) break;
		const entries: Array<[string | number, JsonValue]> = Array.isArray(
			frame.from,
		)
			? frame.from.map((item, index): [number, JsonValue] => [index, item])
			: Object.entries(frame.from);
		for (const [key, child] of entries) {
			if (child !== null && typeof child === "object") {
				const copy = shallowContainer(child);
				placeChild(frame.to, key, copy);
				stack.push({ from: child, to: copy });
			} else {
				placeChild(frame.to, key, child);
			}
		}
	}
	return root;
}

export class JsonConversionError extends Error {
	readonly location: string;
	constructor(message: string, location: string) {
		super(`${message} at ${location}`);
		this.name = "JsonConversionError";
		this.location = location;
	}
}

type ConvertFrame = {
	from: unknown[] | Record<string, unknown>;
	to: JsonArray | JsonObject;
	location: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function convertScalar(value: unknown, location: string): JsonValue {
	if (value === null) return null;
	switch (typeof value) {
		case "boolean":
		case "string":
			return value;
		case "number":
			if (!Number.isFinite(value)) {
				throw new JsonConversionError("Non-finite number", location);
			}
			return value;
		default:
			throw new JsonConversionError(
				`Value of type ${typeof value} is not JSON`,
				location,
			);
	}
}

/**
 * Converts an arbitrary runtime value (parsed file, evaluator output) into a
 * fresh JSON tree. Object properties holding `undefined` are dropped, the
 * same way JSON.stringify drops them.
 */
export function toJsonValue(value: unknown): JsonValue {
	if (!Array.isArray(value) && !isRecord(value)) {
		return convertScalar(value, "$");
	}

	const root: JsonArray | JsonObject = Array.isArray(value) ? [] : {};
	const stack: ConvertFrame[] = [{ from: value, to: root, location: "$" }];
	while (stack.length > 0) {
		const frame = stack.pop();
		if (!frame) break;
		const entries: Array<[string | number, unknown]> = Array.isArray(
			frame.from,
		)
			? frame.from.map((item, index): [number, unknown] => [index, item])
			: Object.entries(frame.from);
		for (const [key, child] of entries) {
			const location =
				typeof key === "number"
					? `${frame.location}[${key}]`
					: `${frame.location}.${key}`;
			if (child === undefined) {
				if (typeof key === "number") {
					placeChild(frame.to, key, null);
				}
				continue;
			}
			if (Array.isArray(child) || isRecord(child)) {
				const copy: JsonArray | JsonObject = Array.isArray(child) ? [] : {};
				placeChild(frame.to, key, copy);
				stack.push({ from: child, to: copy, location });
			} else {
				placeChild(frame.to, key, convertScalar(child, location));
			}
		}
	}
	return root;
}
