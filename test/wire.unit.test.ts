// SPDX-License-Identifier: MIT
// STRATA Wire Format - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { decodeTree, encodeTree } from "../src/wire.js";
import {
	binaryOp,
	conditional,
	functionDef,
	int,
	languageSpecific,
	paramDefault,
	paramName,
	variable,
} from "../src/builders.js";
import { ErrorCodes } from "../src/errors.js";

describe("encodeTree", () => {
	it("encodes triples as arrays with ordered metadata pairs", () => {
		const tree = binaryOp("arithmetic", "+", variable("x", { line: 1, column: 1 }), int(5), { original_operator: "+" });
		assert.deepEqual(encodeTree(tree), [
			"binary_op",
			[["original_operator", "+"]],
			["arithmetic", "+", ["variable", [["line", 1], ["column", 1]], "x"], ["literal", [], ["integer", 5]]],
		]);
	});

	it("keeps null optional children", () => {
		assert.deepEqual(encodeTree(conditional(variable("a"), int(1), null)), [
			"conditional",
			[],
			[["variable", [], "a"], ["literal", [], ["integer", 1]], null],
		]);
	});

	it("encodes param payload variants", () => {
		const fn = functionDef("f", [paramName("a"), paramDefault("b", int(2))], variable("a"));
		assert.deepEqual(encodeTree(fn), [
			"function_def",
			[],
			[
				"f",
				[["param", [], ["name", "a"]], ["param", [], ["default", "b", ["literal", [], ["integer", 2]]]]],
				["variable", [], "a"],
			],
		]);
	});

	it("passes opaque payloads through untouched", () => {
		const native = { tag: "not-a-node", nested: [1, 2] };
		const wire = encodeTree(languageSpecific("python", "with", native));
		assert.deepEqual(wire, ["language_specific", [], ["python", "with", native]]);
	});
});

describe("decodeTree", () => {
	it("rebuilds the encoded tree", () => {
		const tree = functionDef("f", [paramName("a")], binaryOp("comparison", "<", variable("a"), int(3)), { visibility: "public" });
		const decoded = decodeTree(encodeTree(tree));
		assert.deepEqual(decoded, { success: true, value: tree });
	});

	it("keeps a __proto__ metadata entry as data", () => {
		const wire = ["variable", [["__proto__", { a: 1 }], ["line", 3]], "x"];
		const result = decodeTree(wire);
		assert.equal(result.success, true);
		if (result.success) {
			assert.deepEqual(Object.keys(result.value.meta), ["__proto__", "line"]);
			assert.deepEqual(encodeTree(result.value), wire);
		}
	});

	it("restores metadata order", () => {
		const decoded = decodeTree(["variable", [["line", 2], ["column", 7]], "x"]);
		assert.equal(decoded.success, true);
		if (decoded.success) assert.deepEqual(Object.keys(decoded.value.meta), ["line", "column"]);
	});

	it("fails Malformed on an unknown tag", () => {
		const decoded = decodeTree(["goto", [], "label"]);
		assert.equal(decoded.success, false);
		if (!decoded.success) assert.equal(decoded.error.code, ErrorCodes.Malformed);
	});

	it("fails Malformed on a wrong-arity payload", () => {
		const decoded = decodeTree(["pair", [], [["variable", [], "a"]]]);
		assert.equal(decoded.success, false);
		if (!decoded.success) assert.equal(decoded.error.message, "Malformed tree: expected a payload tuple of 2 elements");
	});

	it("fails Malformed when the rebuilt tree does not conform", () => {
		const decoded = decodeTree(["literal", [], ["integer", "five"]]);
		assert.equal(decoded.success, false);
		if (!decoded.success) assert.equal(decoded.error.message, "Malformed tree: decoded tree does not conform");
	});

	it("rejects malformed metadata", () => {
		const decoded = decodeTree(["variable", { line: 1 }, "x"]);
		assert.equal(decoded.success, false);
	});
});
