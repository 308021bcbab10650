// SPDX-License-Identifier: MIT
// STRATA Tree Traversal - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	childrenOf,
	collectTags,
	countNative,
	depth,
	freeVariables,
	highestLayer,
	mapChildren,
	nodeCount,
	nodes,
	postwalk,
	prewalk,
	stripMetadata,
	transform,
} from "../src/traversal.js";
import {
	binaryOp,
	conditional,
	exceptionHandling,
	functionDef,
	int,
	lambda,
	languageSpecific,
	list,
	map,
	matchArm,
	pair,
	paramDefault,
	paramName,
	str,
	variable,
} from "../src/builders.js";
import { TransformError } from "../src/errors.js";
import type { IrNode } from "../src/types.js";

const sum = binaryOp("arithmetic", "+", variable("x", { line: 1 }), int(5, { line: 1 }), { line: 1 });

describe("childrenOf", () => {
	it("returns child nodes in payload order and skips scalars", () => {
		assert.deepEqual(childrenOf(sum), [variable("x", { line: 1 }), int(5, { line: 1 })]);
		assert.deepEqual(childrenOf(int(1)), []);
	});

	it("skips absent optional children", () => {
		assert.equal(childrenOf(conditional(variable("a"), int(1), null)).length, 2);
	});

	it("includes params before the body", () => {
		const fn = functionDef("f", [paramName("a"), paramDefault("b", int(2))], variable("a"));
		assert.deepEqual(childrenOf(fn).map((n) => n.tag), ["param", "param", "variable"]);
	});

	it("treats escape-hatch payloads as opaque", () => {
		assert.deepEqual(childrenOf(languageSpecific("python", "with", sum)), []);
	});
});

describe("mapChildren", () => {
	it("rebuilds the node with rewritten children and keeps meta", () => {
		const doubled = mapChildren(sum, (child) => (child.tag === "literal" ? int(10) : child));
		assert.deepEqual(doubled, binaryOp("arithmetic", "+", variable("x", { line: 1 }), int(10), { line: 1 }));
	});

	it("rejects a rewrite that turns a map entry into another tag", () => {
		const m = map([pair(str("k"), int(1))]);
		assert.throws(() => mapChildren(m, () => int(0)), TransformError);
	});

	it("rejects a rewrite that turns a handler into another tag", () => {
		const tree = exceptionHandling(variable("body"), [matchArm(null, null, int(0))], null);
		assert.throws(() => mapChildren(tree, (child) => (child.tag === "match_arm" ? int(1) : child)), TransformError);
	});
});

describe("walks", () => {
	it("prewalk visits parents before children", () => {
		const [, order] = prewalk<string[]>(sum, [], (node, acc) => [node, [...acc, node.tag]]);
		assert.deepEqual(order, ["binary_op", "variable", "literal"]);
	});

	it("postwalk visits children before parents", () => {
		const [, order] = postwalk<string[]>(sum, [], (node, acc) => [node, [...acc, node.tag]]);
		assert.deepEqual(order, ["variable", "literal", "binary_op"]);
	});

	it("transform rewrites bottom-up", () => {
		const renamed = transform(sum, (node) => (node.tag === "variable" ? variable("y") : node));
		assert.deepEqual(freeVariables(renamed), new Set(["y"]));
	});

	it("prewalk replacement is walked into", () => {
		const [, count] = prewalk(int(0), 0, (node, acc): [IrNode, number] =>
			node.tag === "literal" && acc === 0 ? [list([int(1), int(2)]), acc + 1] : [node, acc + 1]);
		assert.equal(count, 3);
	});
});

describe("queries", () => {
	const tree = lambda(
		[paramName("a"), paramDefault("b", variable("c"))],
		list([variable("a"), languageSpecific("elixir", "pipe", null)]),
	);

	it("nodes lists every node in pre-order", () => {
		assert.deepEqual(nodes(tree).map((n) => n.tag), [
			"lambda", "param", "param", "variable", "list", "variable", "language_specific",
		]);
	});

	it("freeVariables includes names bound by params", () => {
		assert.deepEqual(freeVariables(tree), new Set(["a", "b", "c"]));
	});

	it("depth, nodeCount and countNative", () => {
		assert.equal(depth(tree), 3);
		assert.equal(depth(int(1)), 1);
		assert.equal(nodeCount(tree), 7);
		assert.equal(countNative(tree), 1);
	});

	it("collectTags and highestLayer", () => {
		assert.deepEqual(collectTags(sum), new Set(["binary_op", "variable", "literal"]));
		assert.equal(highestLayer(sum), "core");
		assert.equal(highestLayer(tree), "native");
	});

	it("stripMetadata clears meta at every level", () => {
		assert.deepEqual(stripMetadata(sum), binaryOp("arithmetic", "+", variable("x"), int(5)));
	});
});
