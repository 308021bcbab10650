// SPDX-License-Identifier: MIT
// STRATA Adapters and Documents - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import ts from "typescript";

import {
	type Adapter,
	analyzeDocument,
	createAdapterRegistry,
	createDocument,
	isDocumentValid,
	lift,
	liftDocument,
	lower,
	pythonAdapter,
	roundTrip,
	typescriptAdapter,
	withTree,
} from "../src/adapters.js";
import { binaryOp, int, languageSpecific, variable } from "../src/builders.js";
import { ErrorCodes, ok } from "../src/errors.js";
import { call, ref } from "../src/native/elixir-types.js";
import { constant, module, name, py, type PyNode } from "../src/native/python-types.js";

const sum = binaryOp("arithmetic", "+", variable("x"), int(5));
const pySum: PyNode = module([py("Expr", { value: py("BinOp", { left: name("x"), op: py("Add"), right: constant(5) }) })]);

describe("AdapterRegistry", () => {
	it("lists the built-in languages", () => {
		assert.deepEqual(createAdapterRegistry().languages(), ["elixir", "python", "typescript"]);
	});

	it("returns the built-in adapters", () => {
		const registry = createAdapterRegistry();
		assert.equal(registry.get("python"), pythonAdapter);
		assert.equal(registry.get("typescript"), typescriptAdapter);
	});

	it("overrides replace one language", () => {
		const stub: Adapter<PyNode> = {
			language: "python",
			lift: () => ok(int(1)),
			lower: () => ok(py("Pass")),
		};
		const registry = createAdapterRegistry({ python: stub });
		assert.deepEqual(lift("python", null, { registry }), { success: true, value: int(1) });
		assert.equal(registry.get("typescript"), typescriptAdapter);
	});
});

describe("lift / lower / roundTrip", () => {
	it("lift dispatches on language", () => {
		assert.deepEqual(lift("python", pySum), { success: true, value: sum });
	});

	it("lower dispatches on target", () => {
		assert.deepEqual(lower(sum, "elixir"), { success: true, value: call("+", [ref("x"), 5]) });
	});

	it("lift options pass through", () => {
		const file = ts.createSourceFile("a.ts", "x + 5", ts.ScriptTarget.Latest, true);
		assert.deepEqual(lift("typescript", file, { lift: { locations: false } }), { success: true, value: sum });
	});

	it("roundTrip returns the IR and the lowered tree", () => {
		const native = call("+", [ref("x"), 5]);
		assert.deepEqual(roundTrip("elixir", native), { success: true, value: { ir: sum, native } });
	});

	it("roundTrip stops at the first failure", () => {
		const result = roundTrip("python", 42);
		assert.equal(result.success, false);
		if (!result.success) assert.equal(result.error.code, ErrorCodes.Unsupported);
	});
});

describe("Documents", () => {
	it("createDocument leaves out an absent source", () => {
		const doc = createDocument(sum, "python");
		assert.deepEqual(doc, { tree: sum, language: "python", metadata: {} });
		assert.equal(createDocument(sum, "python", {}, "x + 5").originalSource, "x + 5");
	});

	it("liftDocument carries metadata", () => {
		const result = liftDocument("python", pySum, { metadata: { file: "a.py" } });
		assert.deepEqual(result, { success: true, value: { tree: sum, language: "python", metadata: { file: "a.py" } } });
	});

	it("withTree replaces only the tree", () => {
		const doc = createDocument(sum, "elixir", { origin: "test" });
		const next = withTree(doc, int(0));
		assert.deepEqual(next, { tree: int(0), language: "elixir", metadata: { origin: "test" } });
		assert.deepEqual(doc.tree, sum);
		assert.equal(isDocumentValid(next), true);
	});

	it("analyzeDocument reports on the tree", () => {
		const analysis = analyzeDocument(createDocument(sum, "python"));
		assert.equal(analysis.valid, true);
		assert.deepEqual(analysis.warnings, []);
		assert.equal(analysis.value?.language, "python");
		assert.equal(analysis.value?.level, "core");
		assert.equal(analysis.value?.depth, 2);
		assert.equal(analysis.value?.nodeCount, 3);
		assert.deepEqual(analysis.value?.variables, new Set(["x"]));
	});

	it("analyzeDocument in strict mode rejects native nodes", () => {
		const doc = createDocument(languageSpecific("python", "with", {}), "python");
		const analysis = analyzeDocument(doc, { mode: "strict" });
		assert.equal(analysis.valid, false);
		assert.equal(analysis.value, undefined);
		assert.deepEqual(analysis.errors.map((e) => e.message), ["strict mode rejects language_specific nodes (found 1)"]);
		assert.deepEqual(analysis.warnings, ["native_constructs_present: 1 language_specific node(s)"]);
	});
});
