// STRATA Wire Format
// Triples as JSON arrays: [tag, [[name, value], ...], payload], with child
// nodes in the payload encoded the same way. Metadata keeps its order as a
// list of pairs.

import { capture, type Result, TransformError } from "./errors.js";
import type { IrNode, MetaValue, Tag } from "./types.js";
import { isTag } from "./types.js";
import { conforms, MAX_STRUCTURAL_DEPTH } from "./validator.js";
import { isNodeLike } from "./zod-schemas.js";

//==============================================================================
// Types
//==============================================================================

export type WireMeta = [name: string, value: MetaValue][];

export type WireNode = [tag: Tag, meta: WireMeta, payload: unknown];

/** Payload position kinds, per tag. */
type Slot = "scalar" | "node" | "optional" | "nodes" | "opaque";

type Shape = Slot | Slot[];

function shapeOf(tag: Tag, payload: unknown): Shape {
	switch (tag) {
	case "literal":
	case "variable":
		return "scalar";
	case "list":
	case "map":
	case "tuple":
	case "block":
		return "nodes";
	case "pair":
	case "assignment":
	case "inline_match":
		return ["node", "node"];
	case "binary_op":
	case "augmented_assignment":
		return ["scalar", "scalar", "node", "node"];
	case "unary_op":
		return ["scalar", "scalar", "node"];
	case "function_call":
		return ["scalar", "nodes"];
	case "conditional":
		return ["node", "node", "optional"];
	case "early_return":
		return ["scalar", "optional"];
	case "loop":
		return ["scalar", "optional", "node", "node"];
	case "lambda":
		return ["nodes", "node"];
	case "collection_op":
		return ["scalar", "node", "node", "optional"];
	case "pattern_match":
		return ["node", "nodes"];
	case "match_arm":
		return ["optional", "optional", "node"];
	case "exception_handling":
		return ["node", "nodes", "optional"];
	case "async_operation":
		return ["scalar", "node"];
	case "container":
		return ["scalar", "scalar", "nodes"];
	case "function_def":
		return ["scalar", "nodes", "node"];
	case "param":
		if (Array.isArray(payload) && payload[0] === "pattern") return ["scalar", "node"];
		if (Array.isArray(payload) && payload[0] === "default") return ["scalar", "scalar", "node"];
		return ["scalar", "scalar"];
	case "attribute_access":
		return ["node", "scalar"];
	case "property":
		return ["scalar", "optional", "optional"];
	case "language_specific":
		return ["scalar", "scalar", "opaque"];
	}
}

//==============================================================================
// Slot Mapping
//==============================================================================

type Convert = (value: unknown, level: number) => unknown;

function mapSlot(slot: Slot, value: unknown, level: number, convert: Convert): unknown {
	switch (slot) {
	case "scalar":
	case "opaque":
		return value;
	case "node":
		return convert(value, level);
	case "optional":
		return value === null ? null : convert(value, level);
	case "nodes":
		if (!Array.isArray(value)) {
			throw TransformError.malformed("expected a list of nodes", value);
		}
		return value.map((item: unknown) => convert(item, level));
	}
}

function mapPayload(shape: Shape, payload: unknown, level: number, convert: Convert): unknown {
	if (!Array.isArray(shape)) return mapSlot(shape, payload, level, convert);
	if (!Array.isArray(payload) || payload.length !== shape.length) {
		throw TransformError.malformed(`expected a payload tuple of ${shape.length} elements`, payload);
	}
	return shape.map((slot, i) => mapSlot(slot, payload[i], level, convert));
}

function checkLevel(level: number, subtree: unknown): void {
	if (level > MAX_STRUCTURAL_DEPTH) {
		throw TransformError.malformed(`nesting exceeds ${MAX_STRUCTURAL_DEPTH} levels`, subtree);
	}
}

//==============================================================================
// Encoding
//==============================================================================

function encodeValue(value: unknown, level: number): WireNode {
	checkLevel(level, value);
	if (!isNodeLike(value)) {
		throw TransformError.malformed("expected a node triple", value);
	}
	return [
		value.tag,
		Object.entries(value.meta),
		mapPayload(shapeOf(value.tag, value.payload), value.payload, level + 1, encodeValue),
	];
}

export function encodeTree(tree: IrNode): WireNode {
	return encodeValue(tree, 1);
}

//==============================================================================
// Decoding
//==============================================================================

function decodeMeta(value: unknown): Record<string, unknown> {
	if (!Array.isArray(value)) {
		throw TransformError.malformed("metadata must be a list of [name, value] pairs", value);
	}
	const entries = value.map((entry: unknown): [string, unknown] => {
		if (!Array.isArray(entry) || entry.length !== 2 || typeof entry[0] !== "string") {
			throw TransformError.malformed("metadata entries must be [name, value] pairs", entry);
		}
		return [entry[0], entry[1]];
	});
	// fromEntries defines own properties, so a "__proto__" entry stays data.
	return Object.fromEntries(entries);
}

function decodeValue(value: unknown, level: number): unknown {
	checkLevel(level, value);
	if (!Array.isArray(value) || value.length !== 3) {
		throw TransformError.malformed("wire nodes are [tag, meta, payload] arrays", value);
	}
	const [tag, meta, payload]: unknown[] = value;
	if (!isTag(tag)) {
		throw TransformError.malformed(`unknown tag ${JSON.stringify(tag)}`, value);
	}
	return {
		tag,
		meta: decodeMeta(meta),
		payload: mapPayload(shapeOf(tag, payload), payload, level + 1, decodeValue),
	};
}

/**
 * Rebuild a tree from its wire form. Fails with Malformed when the input is
 * not a wire tree or the rebuilt tree does not conform.
 */
export function decodeTree(wire: unknown): Result<IrNode> {
	return capture(() => {
		const candidate = decodeValue(wire, 1);
		if (!conforms(candidate)) {
			throw TransformError.malformed("decoded tree does not conform", wire);
		}
		return candidate;
	});
}
