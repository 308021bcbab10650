// STRATA JSON Canonicalization (JCS Profile)
// RFC 8785 serialization of meta-stripped trees, used to compare the
// Core/Extended IR produced by different languages byte for byte.

import { createHash, type Hash } from "node:crypto";
import { TransformError } from "./errors.js";
import { transform } from "./traversal.js";
import type { IrNode } from "./types.js";

//==============================================================================
// JCS Serialization (RFC 8785)
//==============================================================================

/**
 * RFC 8785 canonical JSON. Object members are sorted by UTF-16 code units and
 * members holding undefined are dropped; numbers use the ECMAScript form
 * (JSON.stringify already prints -0 as 0).
 */
export function jcsSerialize(value: unknown): string {
	const out: string[] = [];
	write(out, value);
	return out.join("");
}

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

function write(out: string[], value: unknown): void {
	switch (typeof value) {
	case "undefined":
		out.push("null");
		return;
	case "boolean":
	case "string":
		out.push(JSON.stringify(value));
		return;
	case "number":
		if (!Number.isFinite(value)) {
			throw TransformError.malformed(`non-finite number ${value} has no canonical form`, value);
		}
		out.push(JSON.stringify(value));
		return;
	case "object":
		if (value === null) {
			out.push("null");
		} else if (Array.isArray(value)) {
			out.push("[");
			value.forEach((item: unknown, i) => {
				if (i > 0) out.push(",");
				write(out, item);
			});
			out.push("]");
		} else {
			const members = Object.entries(value).filter(([, v]) => v !== undefined).sort(byKey);
			out.push("{");
			members.forEach(([key, member], i) => {
				out.push(i > 0 ? "," : "", JSON.stringify(key), ":");
				write(out, member);
			});
			out.push("}");
		}
		return;
	default:
		throw TransformError.malformed(`${typeof value} has no JSON form`, value);
	}
}

//==============================================================================
// Semantic Projection
//==============================================================================

/**
 * Drop every meta record and reduce escape-hatch nodes to their language and
 * hint. Opaque native blobs are never serialized.
 */
export function semanticProjection(tree: IrNode): IrNode {
	return transform(tree, (node) => {
		if (node.tag === "language_specific") {
			const [language, hint] = node.payload;
			return { tag: "language_specific", meta: {}, payload: [language, hint, null] };
		}
		return { ...node, meta: {} };
	});
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Produce the RFC 8785 canonical JSON string of a tree's semantic content.
 */
export function canonicalize(tree: IrNode): string {
	return jcsSerialize(semanticProjection(tree));
}

/**
 * Same canonical form: the two trees carry the same payloads everywhere,
 * whatever their metadata.
 */
export function coreEquivalent(a: IrNode, b: IrNode): boolean {
	return canonicalize(a) === canonicalize(b);
}

/**
 * Compute the content digest of a tree.
 *
 * @param algorithm - Hash algorithm (default: "sha256")
 * @returns Digest string in the format `strata-{algorithm}:{hex}`
 */
export function treeDigest(tree: IrNode, algorithm = "sha256"): string {
	const canonical = canonicalize(tree);
	const hash: Hash = createHash(algorithm);
	hash.update(canonical, "utf8");
	return `strata-${algorithm}:${hash.digest("hex")}`;
}
