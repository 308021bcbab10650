// SPDX-License-Identifier: MIT
// STRATA Python Lower - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { lowerPython } from "../src/lower/python.js";
import { FallbackRegistry, type LowerOptions } from "../src/lower/shared.js";
import { arg, args, constant, isAstNode, module, name, py, type PyNode, store } from "../src/native/python-types.js";
import {
	assignment,
	binaryOp,
	block,
	collectionOp,
	conditional,
	container,
	earlyReturn,
	exceptionHandling,
	functionCall,
	functionDef,
	inlineMatch,
	int,
	lambda,
	languageSpecific,
	loop,
	matchArm,
	paramDefault,
	paramName,
	patternMatch,
	property,
	str,
	symbol,
	variable,
} from "../src/builders.js";
import { ErrorCodes } from "../src/errors.js";

//==============================================================================
// Helpers
//==============================================================================

function lowered(tree: unknown, options?: LowerOptions): PyNode {
	const result = lowerPython(tree, options);
	if (!result.success) throw result.error;
	return result.value;
}

function failureCode(tree: unknown, options?: LowerOptions): string | undefined {
	const result = lowerPython(tree, options);
	return result.success ? undefined : result.error.code;
}

function moduleBody(node: PyNode): PyNode[] {
	assert.equal(node._type, "Module");
	const body = node.body;
	assert.ok(Array.isArray(body) && body.every(isAstNode));
	return body;
}

const expr = (value: PyNode): PyNode => py("Expr", { value });
const pyCall = (func: PyNode, callArgs: PyNode[] = []): PyNode => py("Call", { func, args: callArgs, keywords: [] });

//==============================================================================
// Tests
//==============================================================================

describe("Python lower - expressions", () => {
	it("x + 5 is a module with one expression statement", () => {
		assert.deepEqual(
			lowered(binaryOp("arithmetic", "+", variable("x"), int(5))),
			module([expr(py("BinOp", { left: name("x"), op: py("Add"), right: constant(5) }))]),
		);
	});

	it("writes 0-based column offsets", () => {
		assert.deepEqual(
			lowered(variable("x", { line: 2, column: 5 })),
			module([py("Expr", {
				value: py("Name", { id: "x", ctx: py("Load"), lineno: 2, col_offset: 4 }),
				lineno: 2,
				col_offset: 4,
			})]),
		);
	});

	it("strict equality is `is`, rem is %", () => {
		assert.deepEqual(
			lowered(binaryOp("comparison", "===", variable("x"), variable("y"))),
			module([expr(py("Compare", { left: name("x"), ops: [py("Is")], comparators: [name("y")] }))]),
		);
		assert.deepEqual(
			lowered(binaryOp("arithmetic", "rem", variable("x"), int(2))),
			module([expr(py("BinOp", { left: name("x"), op: py("Mod"), right: constant(2) }))]),
		);
	});

	it("conditionals in expression position are IfExp", () => {
		const tree = assignment(variable("y"), conditional(variable("a"), int(1), null));
		assert.deepEqual(lowered(tree), module([py("Assign", {
			targets: [name("y", store())],
			value: py("IfExp", { test: name("a"), body: constant(1), orelse: constant(null) }),
			type_comment: null,
		})]));
	});

	it("assignments in expression position are NamedExpr", () => {
		const tree = functionCall("f", [assignment(variable("n"), int(1))]);
		assert.deepEqual(
			lowered(tree),
			module([expr(pyCall(name("f"), [py("NamedExpr", { target: name("n", store()), value: constant(1) })]))]),
		);
	});

	it("regex literals compile with inline flags", (t) => {
		const warn = t.mock.method(console, "warn", () => undefined);
		const tree = { tag: "literal", meta: {}, payload: ["regex", { source: "a+", flags: "ig" }] };
		const compile = py("Attribute", { value: name("re"), attr: "compile", ctx: py("Load") });
		assert.deepEqual(lowered(tree, { verbose: true }), module([expr(pyCall(compile, [constant("(?i)a+")]))]));
		assert.deepEqual(warn.mock.calls.map((c) => c.arguments), [["[Lower:python] regex flags ig reduced to i"]]);
	});

	it("module attributes are Unsupported", () => {
		assert.equal(failureCode(variable("@limit")), ErrorCodes.Unsupported);
	});
});

describe("Python lower - collections", () => {
	it("map with a lambda is a list comprehension", () => {
		const tree = collectionOp(
			"map",
			lambda([paramName("x")], binaryOp("arithmetic", "*", variable("x"), int(2))),
			variable("xs"),
			null,
		);
		const generator = py("comprehension", { target: name("x", store()), iter: name("xs"), ifs: [], is_async: 0 });
		assert.deepEqual(
			lowered(tree),
			module([expr(py("ListComp", {
				elt: py("BinOp", { left: name("x"), op: py("Mult"), right: constant(2) }),
				generators: [generator],
			}))]),
		);
	});

	it("filter with a named function goes through list(filter())", () => {
		const tree = collectionOp("filter", variable("f"), variable("xs"), null);
		assert.deepEqual(
			lowered(tree),
			module([expr(pyCall(name("list"), [pyCall(name("filter"), [name("f"), name("xs")])]))]),
		);
	});

	it("reduce without an initial value does not conform", () => {
		assert.equal(failureCode(collectionOp("reduce", variable("f"), variable("xs"), null)), ErrorCodes.Malformed);
	});
});

describe("Python lower - statements", () => {
	it("chained assignment collapses into one Assign", () => {
		const tree = assignment(variable("a"), assignment(variable("b"), int(1)));
		assert.deepEqual(lowered(tree), module([py("Assign", {
			targets: [name("a", store()), name("b", store())],
			value: constant(1),
			type_comment: null,
		})]));
	});

	it("function definitions with defaults", () => {
		const tree = functionDef(
			"add",
			[paramName("a"), paramDefault("b", int(1))],
			earlyReturn("return", binaryOp("arithmetic", "+", variable("a"), variable("b"))),
		);
		assert.deepEqual(lowered(tree), module([py("FunctionDef", {
			name: "add",
			args: args([arg("a"), arg("b")], [constant(1)]),
			body: [py("Return", { value: py("BinOp", { left: name("a"), op: py("Add"), right: name("b") }) })],
			decorator_list: [],
			returns: null,
			type_comment: null,
			type_params: [],
		})]));
	});

	it("a parameter without default after a defaulted one is Unsupported", () => {
		const tree = functionDef("f", [paramDefault("a", int(1)), paramName("b")], variable("b"));
		assert.equal(failureCode(tree), ErrorCodes.Unsupported);
	});

	it("empty suites are pass", () => {
		assert.deepEqual(
			lowered(loop("while", null, variable("go"), block([]))),
			module([py("While", { test: name("go"), body: [py("Pass")], orelse: [] })]),
		);
	});

	it("containers are classes", () => {
		assert.deepEqual(lowered(container("module", "Utils", [])), module([py("ClassDef", {
			name: "Utils",
			bases: [],
			keywords: [],
			body: [py("Pass")],
			decorator_list: [],
			type_params: [],
		})]));
	});

	it("handlers bind through inline_match", () => {
		const tree = exceptionHandling(
			functionCall("risky", []),
			[matchArm(inlineMatch(variable("e"), variable("ValueError")), null, functionCall("handle", [variable("e")]))],
			null,
		);
		assert.deepEqual(lowered(tree), module([py("Try", {
			body: [expr(pyCall(name("risky")))],
			handlers: [py("ExceptHandler", {
				type: name("ValueError"),
				name: "e",
				body: [expr(pyCall(name("handle"), [name("e")]))],
			})],
			orelse: [],
			finalbody: [],
		})]));
	});

	it("lowercase bare patterns bind Exception, capitalised ones name the type", () => {
		const tree = exceptionHandling(
			functionCall("risky", []),
			[
				matchArm(variable("KeyError"), null, int(1)),
				matchArm(variable("err"), null, int(2)),
				matchArm(variable("_"), null, int(3)),
			],
			null,
		);
		const [statement] = moduleBody(lowered(tree));
		assert.deepEqual(statement?.handlers, [
			py("ExceptHandler", { type: name("KeyError"), name: null, body: [expr(constant(1))] }),
			py("ExceptHandler", { type: name("Exception"), name: "err", body: [expr(constant(2))] }),
			py("ExceptHandler", { type: name("Exception"), name: null, body: [expr(constant(3))] }),
		]);
	});

	it("pattern matches become match statements", () => {
		const tree = patternMatch(variable("v"), [
			matchArm(int(1), null, str("one")),
			matchArm(variable("_"), null, str("other")),
		]);
		assert.deepEqual(lowered(tree), module([py("Match", {
			subject: name("v"),
			cases: [
				py("match_case", { pattern: py("MatchValue", { value: constant(1) }), guard: null, body: [expr(constant("one"))] }),
				py("match_case", { pattern: py("MatchAs", { pattern: null, name: null }), guard: null, body: [expr(constant("other"))] }),
			],
		})]));
	});
});

describe("Python lower - escape hatch and failures", () => {
	const withNode = py("With", { items: [], body: [py("Pass")] });

	it("a python escape-hatch root is returned as is", () => {
		assert.deepEqual(lowered(languageSpecific("python", "with", withNode)), withNode);
	});

	it("nested python statements are spliced in", () => {
		assert.deepEqual(lowered(block([languageSpecific("python", "with", withNode)])), module([withNode]));
	});

	it("other languages' native nodes are Incompatible", () => {
		assert.equal(failureCode(languageSpecific("elixir", "pipe", null)), ErrorCodes.Incompatible);
	});

	it("a registered fallback renders the node", () => {
		const fallbacks = new FallbackRegistry().register("pipe", "python", () => name("piped"));
		assert.deepEqual(lowered(languageSpecific("elixir", "pipe", null), { fallbacks }), name("piped"));
	});

	it("properties are Unsupported", () => {
		assert.equal(failureCode(property("size", null, null)), ErrorCodes.Unsupported);
	});

	it("non-conforming input is Malformed", () => {
		assert.equal(failureCode({ tag: "binary_op", meta: {}, payload: [] }), ErrorCodes.Malformed);
	});

	it("verbose reports degraded renderings", (t) => {
		const warn = t.mock.method(console, "warn", () => undefined);
		lowered(symbol("ok"), { verbose: true });
		assert.deepEqual(warn.mock.calls.map((c) => c.arguments), [["[Lower:python] symbol ok rendered as a string"]]);
	});
});
