import type { JsonObject, JsonValue } from "./json";
import { cloneJson, hasKey, isJsonObject, jsonKind, setKey } from "./json";

/**
 * Deep-merges `source` into `target` in place. Object values present on both
 * sides merge key by key; every other value from `source` overwrites the
 * target's as a fresh copy. Keys only present in `target` are left alone.
 */
export function deepMerge(target: JsonObject, source: JsonObject): JsonObject {
	const stack: Array<[JsonObject, JsonObject]> = [[target, source]];
	while (stack.length > 0) {
		const pair = stack.pop();
		if (!pair) break;
		const [into, from] = pair;
		for (const [key, incoming] of Object.entries(from)) {
			const existing = hasKey(into, key) ? into[key] : undefined;
			if (isJsonObject(existing) && isJsonObject(incoming)) {
				stack.push([existing, incoming]);
			} else {
				setKey(into, key, cloneJson(incoming));
			}
		}
	}
	return target;
}

export function replace(_existing: JsonValue, newValue: JsonValue): JsonValue {
	return cloneJson(newValue);
}

/**
 * Type-aware incremental write. Order matters: strings join as
 * `existing + delimiter + newValue`, arrays keep `existing` first.
 */
export function upsert(
	existing: JsonValue,
	newValue: JsonValue,
	delimiter: string,
): JsonValue {
	const kind = jsonKind(existing);
	switch (kind) {
		case "null":
			return cloneJson(newValue);
		case "string":
			if (typeof existing === "string" && typeof newValue === "string") {
				if (existing === "") return newValue;
				if (newValue === "") return existing;
				return `${existing}${delimiter}${newValue}`;
			}
			return cloneJson(newValue);
		case "array":
			if (!Array.isArray(existing)) return cloneJson(newValue);
			if (Array.isArray(newValue)) {
				return [...existing, ...cloneJson(newValue)];
			}
			return [...existing, cloneJson(newValue)];
		case "object":
			if (isJsonObject(existing) && isJsonObject(newValue)) {
				return deepMerge(existing, newValue);
			}
			return cloneJson(newValue);
		case "boolean":
		case "number":
			return cloneJson(newValue);
		default: {
			const unreachable: never = kind;
			throw new Error(`Unhandled JSON kind: ${String(unreachable)}`);
		}
	}
}
