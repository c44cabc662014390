import { TypeMismatchError } from "./errors";
import type { JsonArray, JsonObject, JsonValue } from "./json";
import { hasKey, isJsonObject, jsonKind, setKey } from "./json";
import type { Segment } from "./path";
import { formatPath } from "./path";

export type WriteTarget =
	| { kind: "index"; parent: JsonArray; index: number }
	| { kind: "key"; parent: JsonObject; key: string };

function mismatch(
	segments: ReadonlyArray<Segment>,
	segmentIndex: number,
	found: JsonValue,
): TypeMismatchError {
	const segment = segments[segmentIndex];
	const expected = typeof segment === "number" ? "array" : "object";
	const label =
		typeof segment === "number" ? `index [${segment}]` : `field .${segment}`;
	return new TypeMismatchError(
		`Expected ${expected} for ${label} but found ${jsonKind(found)} (segment ${segmentIndex} of ${formatPath(segments)})`,
		segments,
		segmentIndex,
	);
}

function emptyContainerFor(next: Segment): JsonValue {
	return typeof next === "number" ? [] : {};
}

function growArray(array: JsonArray, index: number) {
	while (array.length <= index) {
		array.push(null);
	}
}

/**
 * Walks `root` along every segment except the last, creating missing or null
 * intermediate containers, and returns the parent slot of the final segment.
 * Nothing is written at the final segment itself.
 */
export function ensureWritableTarget(
	root: JsonValue,
	segments: ReadonlyArray<Segment>,
): WriteTarget {
	if (segments.length === 0) {
		throw new RangeError("ensureWritableTarget needs at least one segment");
	}

	let current = root;
	for (let position = 0; position < segments.length - 1; position++) {
		const segment = segments[position];
		const next = segments[position + 1];
		if (typeof segment === "number") {
			if (!Array.isArray(current)) {
				throw mismatch(segments, position, current);
			}
			growArray(current, segment);
			let child = current[segment];
			if (child === null) {
				child = emptyContainerFor(next);
				current[segment] = child;
			}
			current = child;
		} else {
			if (!isJsonObject(current)) {
				throw mismatch(segments, position, current);
			}
			let child = hasKey(current, segment) ? current[segment] : null;
			if (child === null) {
				child = emptyContainerFor(next);
				setKey(current, segment, child);
			}
			current = child;
		}
	}

	const lastIndex = segments.length - 1;
	const last = segments[lastIndex];
	if (typeof last === "number") {
		if (!Array.isArray(current)) {
			throw mismatch(segments, lastIndex, current);
		}
		return { kind: "index", parent: current, index: last };
	}
	if (!isJsonObject(current)) {
		throw mismatch(segments, lastIndex, current);
	}
	return { kind: "key", parent: current, key: last };
}

/** Current value at the target; an absent slot reads as null. */
export function readTarget(target: WriteTarget): JsonValue {
	if (target.kind === "index") {
		return target.index < target.parent.length
			? target.parent[target.index]
			: null;
	}
	return hasKey(target.parent, target.key) ? target.parent[target.key] : null;
}

export function writeTarget(target: WriteTarget, value: JsonValue) {
	if (target.kind === "index") {
		growArray(target.parent, target.index);
		target.parent[target.index] = value;
		return;
	}
	setKey(target.parent, target.key, value);
}
