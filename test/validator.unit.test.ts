// SPDX-License-Identifier: MIT
// STRATA Conformance Validator - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { conforms, ensureConforms, validateTree } from "../src/validator.js";
import { parseNodeShallow } from "../src/zod-schemas.js";
import { ErrorCodes, TransformError } from "../src/errors.js";
import {
	assignment,
	binaryOp,
	block,
	collectionOp,
	functionDef,
	int,
	lambda,
	languageSpecific,
	list,
	loop,
	map,
	pair,
	paramName,
	str,
	variable,
} from "../src/builders.js";

//==============================================================================
// Fixtures
//==============================================================================

const xPlus5 = binaryOp("arithmetic", "+", variable("x"), int(5));

function nested(levels: number) {
	let node = list([]);
	for (let i = 1; i < levels; i++) node = list([node]);
	return node;
}

//==============================================================================
// Tests
//==============================================================================

describe("conforms", () => {
	it("accepts well-formed trees from every layer", () => {
		assert.equal(conforms(xPlus5), true);
		assert.equal(conforms(loop("while", null, variable("c"), block([]))), true);
		assert.equal(conforms(functionDef("f", [paramName("a")], variable("a"))), true);
		assert.equal(conforms(languageSpecific("python", "with", { anything: [1, 2] })), true);
	});

	it("rejects unknown tags and non-node values", () => {
		assert.equal(conforms({ tag: "goto", meta: {}, payload: "l" }), false);
		assert.equal(conforms(42), false);
		assert.equal(conforms({ tag: "literal", payload: ["integer", 1] }), false);
	});

	it("rejects payloads that break the tag's rule", () => {
		assert.equal(conforms({ tag: "literal", meta: {}, payload: ["integer", 1.5] }), false);
		assert.equal(conforms({ tag: "binary_op", meta: {}, payload: ["bitwise", "&", xPlus5, xPlus5] }), false);
		assert.equal(conforms({ tag: "variable", meta: {}, payload: "" }), false);
	});

	it("checks children recursively", () => {
		assert.equal(conforms(list([int(1), { tag: "literal", meta: {}, payload: ["integer", "1"] }])), false);
	});

	it("while loops have no binding and for_each loops need one", () => {
		assert.equal(conforms(loop("while", variable("x"), variable("c"), block([]))), false);
		assert.equal(conforms(loop("for_each", null, variable("xs"), block([]))), false);
	});

	it("reduce requires an initial value and map forbids one", () => {
		assert.equal(conforms(collectionOp("reduce", variable("f"), variable("xs"))), false);
		assert.equal(conforms(collectionOp("map", variable("f"), variable("xs"), int(0))), false);
		assert.equal(conforms(collectionOp("reduce", variable("f"), variable("xs"), int(0))), true);
	});

	it("map entries must be pair nodes", () => {
		assert.equal(conforms(map([pair(str("k"), int(1))])), true);
		assert.equal(conforms({ tag: "map", meta: {}, payload: [int(1)] }), false);
	});

	it("lambda parameters must be param nodes", () => {
		assert.equal(conforms({ tag: "lambda", meta: {}, payload: [[variable("a")], variable("a")] }), false);
		assert.equal(conforms(lambda([paramName("a")], variable("a"))), true);
	});

	it("metadata must hold JSON values", () => {
		assert.equal(conforms(int(1, { line: 1, tags: ["a"], nested: { ok: true } })), true);
		assert.equal(conforms({ tag: "literal", meta: { bad: Number.NaN }, payload: ["integer", 1] }), false);
		assert.equal(conforms({ tag: "literal", meta: { fn: () => 1 }, payload: ["integer", 1] }), false);
	});

	it("rejects cyclic trees", () => {
		const items: unknown[] = [];
		const cyclic = { tag: "list", meta: {}, payload: items };
		items.push(cyclic);
		assert.equal(conforms(cyclic), false);
	});

	it("accepts a shared subtree that is not a cycle", () => {
		const shared = int(1);
		assert.equal(conforms(list([shared, shared])), true);
	});
});

describe("ensureConforms", () => {
	it("returns a conforming tree unchanged", () => {
		assert.equal(ensureConforms(xPlus5), xPlus5);
	});

	it("throws Malformed naming the first violation", () => {
		assert.throws(
			() => ensureConforms(list([{ tag: "goto", meta: {}, payload: null }])),
			(err: unknown) => err instanceof TransformError &&
				err.code === ErrorCodes.Malformed &&
				err.message === "Malformed tree: $.payload.0.tag: Unknown tag: goto",
		);
	});
});

describe("validateTree", () => {
	it("reports layer, size and variables", () => {
		const tree = block([assignment(variable("y"), xPlus5), loop("while", null, variable("y"), block([]))]);
		const result = validateTree(tree);
		assert.equal(result.valid, true);
		assert.deepEqual(result.warnings, []);
		assert.equal(result.value?.level, "extended");
		assert.equal(result.value?.nativeConstructs, 0);
		assert.deepEqual(result.value?.variables, new Set(["y", "x"]));
		assert.equal(result.value?.depth, 4);
		assert.equal(result.value?.nodeCount, 9);
	});

	it("collects every structural error with its path", () => {
		const result = validateTree(list([int(1), { tag: "goto", meta: {}, payload: 1 }, { tag: "variable", meta: {}, payload: 7 }]));
		assert.equal(result.valid, false);
		assert.deepEqual(result.errors.map((e) => [e.path, e.code]), [
			["$.payload.1.tag", ErrorCodes.UnknownTag],
			["$.payload.2.payload", ErrorCodes.InvalidPayload],
		]);
	});

	it("standard mode warns about native constructs", () => {
		const result = validateTree(block([languageSpecific("elixir", "pipe", null)]));
		assert.equal(result.valid, true);
		assert.deepEqual(result.warnings, ["native_constructs_present: 1 language_specific node(s)"]);
		assert.equal(result.value?.level, "native");
	});

	it("permissive mode accepts native constructs silently", () => {
		const result = validateTree(languageSpecific("elixir", "pipe", null), { mode: "permissive" });
		assert.equal(result.valid, true);
		assert.deepEqual(result.warnings, []);
	});

	it("strict mode rejects native constructs", () => {
		const result = validateTree(languageSpecific("elixir", "pipe", null), { mode: "strict" });
		assert.equal(result.valid, false);
		assert.equal(result.errors[0]?.code, ErrorCodes.NativeConstructRejected);
	});

	it("enforces the depth limit", () => {
		const result = validateTree(nested(5), { maxDepth: 4 });
		assert.equal(result.valid, false);
		assert.equal(result.errors[0]?.code, ErrorCodes.DepthExceeded);
		assert.equal(validateTree(nested(4), { maxDepth: 4 }).valid, true);
	});

	it("warns about deep nesting", () => {
		const result = validateTree(nested(101));
		assert.equal(result.valid, true);
		assert.deepEqual(result.warnings, ["deep_nesting: depth 101"]);
	});

	it("enforces the variable limit", () => {
		const result = validateTree(list([variable("a"), variable("b"), variable("c")]), { maxVariables: 2 });
		assert.equal(result.valid, false);
		assert.equal(result.errors[0]?.message, "Too many variables: 3 > 2");
	});
});

describe("parseNodeShallow", () => {
	it("does not look inside child nodes", () => {
		const result = parseNodeShallow("list", { tag: "list", meta: {}, payload: [{ tag: "bogus", meta: {}, payload: 0 }] });
		assert.equal(result.success, true);
	});

	it("reports issue paths relative to the node", () => {
		const result = parseNodeShallow("function_call", { tag: "function_call", meta: {}, payload: ["", []] });
		assert.equal(result.success, false);
		if (!result.success) assert.deepEqual(result.issues[0]?.path, ["payload", 0]);
	});
});
