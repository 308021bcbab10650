// SPDX-License-Identifier: MIT
// STRATA Python Lift - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { basename, resolve } from "node:path";
import { globSync } from "glob";

import { liftPython } from "../src/lift/python.js";
import type { LiftOptions } from "../src/lift/shared.js";
import { arg, args, constant, module, name, py, type PyNode, store } from "../src/native/python-types.js";
import {
	assignment,
	asyncOperation,
	binaryOp,
	block,
	bool,
	collectionOp,
	conditional,
	earlyReturn,
	float,
	functionCall,
	functionDef,
	int,
	lambda,
	loop,
	map,
	nil,
	pair,
	paramName,
	str,
	tuple,
	unaryOp,
	variable,
} from "../src/builders.js";
import { ErrorCodes } from "../src/errors.js";
import type { IrNode } from "../src/types.js";

//==============================================================================
// Helpers
//==============================================================================

interface PythonFixture {
	description: string;
	source: string;
	ast: unknown;
	ir: unknown;
}

function isFixture(value: unknown): value is PythonFixture {
	if (typeof value !== "object" || value === null) return false;
	return "description" in value && "source" in value && "ast" in value && "ir" in value;
}

function loadFixtures(): { file: string; fixture: PythonFixture }[] {
	const root = resolve(import.meta.dirname, "fixtures/python");
	return globSync("*.json", { cwd: root, absolute: true }).sort().map((file) => {
		const parsed: unknown = JSON.parse(readFileSync(file, "utf-8"));
		if (!isFixture(parsed)) throw new Error(`${file} is not a Python fixture`);
		return { file: basename(file), fixture: parsed };
	});
}

function lifted(node: unknown, options: LiftOptions = { locations: false }): IrNode {
	const result = liftPython(node, options);
	if (!result.success) throw result.error;
	return result.value;
}

function failureCode(node: unknown): string | undefined {
	const result = liftPython(node);
	return result.success ? undefined : result.error.code;
}

function escapeHint(node: IrNode): string | undefined {
	return node.tag === "language_specific" ? node.payload[1] : undefined;
}

const x = name("x");
const expr = (value: PyNode): PyNode => py("Expr", { value });
const binOp = (left: PyNode, op: string, right: PyNode): PyNode => py("BinOp", { left, op: py(op), right });
const compare = (left: PyNode, ops: string[], comparators: PyNode[]): PyNode =>
	py("Compare", { left, ops: ops.map((o) => py(o)), comparators });
const pyCall = (func: PyNode, callArgs: PyNode[] = []): PyNode => py("Call", { func, args: callArgs, keywords: [] });

//==============================================================================
// Fixtures
//==============================================================================

describe("Python lift - fixtures", () => {
	for (const { file, fixture } of loadFixtures()) {
		it(`${file}: ${fixture.description}`, () => {
			assert.deepEqual(lifted(fixture.ast), fixture.ir);
		});
	}
});

//==============================================================================
// Tests
//==============================================================================

describe("Python lift - literals and names", () => {
	it("constants", () => {
		assert.deepEqual(lifted(constant(3)), int(3));
		assert.deepEqual(lifted(constant(2.5)), float(2.5));
		assert.deepEqual(lifted(constant(true)), bool(true));
		assert.deepEqual(lifted(constant(null)), nil());
		assert.deepEqual(lifted(constant("s")), str("s"));
	});

	it("integral floats lift as integers", () => {
		assert.deepEqual(lifted(constant(2.0)), int(2));
	});

	it("locations are 1-based columns", () => {
		const node = py("Name", { id: "x", ctx: py("Load"), lineno: 2, col_offset: 4 });
		assert.deepEqual(lifted(node, {}), variable("x", { line: 2, column: 5 }));
	});

	it("dicts become maps", () => {
		const dict = py("Dict", { keys: [constant("a")], values: [constant(1)] });
		assert.deepEqual(lifted(dict), map([pair(str("a"), int(1))]));
	});

	it("dict unpacking stays native", () => {
		const dict = py("Dict", { keys: [null], values: [name("other")] });
		assert.equal(escapeHint(lifted(dict)), "dict_unpack");
	});

	it("tuples", () => {
		const node = py("Tuple", { elts: [constant(1), x], ctx: py("Load") });
		assert.deepEqual(lifted(node), tuple([int(1), variable("x")]));
	});
});

describe("Python lift - operators", () => {
	it("% is rem with its spelling", () => {
		assert.deepEqual(
			lifted(binOp(x, "Mod", constant(2))),
			binaryOp("arithmetic", "rem", variable("x"), int(2), { original_operator: "%" }),
		);
	});

	it("bitwise operators stay native", () => {
		assert.equal(escapeHint(lifted(binOp(x, "BitAnd", constant(1)))), "bitwise_operator");
	});

	it("and-chains associate left", () => {
		const node = py("BoolOp", { op: py("And"), values: [name("a"), name("b"), name("c")] });
		assert.deepEqual(
			lifted(node),
			binaryOp("boolean", "and", binaryOp("boolean", "and", variable("a"), variable("b")), variable("c")),
		);
	});

	it("is not", () => {
		assert.deepEqual(
			lifted(compare(x, ["IsNot"], [constant(null)])),
			binaryOp("comparison", "!==", variable("x"), nil(), { original_operator: "is not" }),
		);
	});

	it("chained comparisons and membership stay native", () => {
		assert.equal(escapeHint(lifted(compare(x, ["Lt", "Lt"], [name("y"), name("z")]))), "chained_comparison");
		assert.equal(escapeHint(lifted(compare(x, ["In"], [name("xs")]))), "membership");
	});

	it("not", () => {
		assert.deepEqual(lifted(py("UnaryOp", { op: py("Not"), operand: x })), unaryOp("boolean", "not", variable("x")));
	});
});

describe("Python lift - statements", () => {
	it("several statements form a block", () => {
		const tree = module([expr(x), expr(constant(1))]);
		assert.deepEqual(lifted(tree), block([variable("x"), int(1)]));
	});

	it("pass is an empty block", () => {
		assert.deepEqual(lifted(py("Pass")), block([]));
	});

	it("chained assignment nests right to left", () => {
		const node = py("Assign", { targets: [name("a", store()), name("b", store())], value: constant(1) });
		assert.deepEqual(lifted(node), assignment(variable("a"), assignment(variable("b"), int(1))));
	});

	it("if without else", () => {
		const node = py("If", { test: x, body: [expr(constant(1))], orelse: [] });
		assert.deepEqual(lifted(node), conditional(variable("x"), int(1), null));
	});

	it("for loops bind their target", () => {
		const node = py("For", { target: name("v", store()), iter: name("xs"), body: [py("Break")], orelse: [] });
		assert.deepEqual(lifted(node), loop("for_each", variable("v"), variable("xs"), earlyReturn("break", null)));
	});

	it("loop else stays native", () => {
		const node = py("While", { test: x, body: [py("Pass")], orelse: [py("Pass")] });
		assert.equal(escapeHint(lifted(node)), "loop_else");
	});

	it("bare return", () => {
		assert.deepEqual(lifted(py("Return", { value: null })), earlyReturn("return", null));
	});

	it("try with else stays native", () => {
		const node = py("Try", { body: [py("Pass")], handlers: [], orelse: [py("Pass")], finalbody: [] });
		assert.equal(escapeHint(lifted(node)), "try_else");
	});
});

describe("Python lift - calls and comprehensions", () => {
	it("dotted calls", () => {
		const func = py("Attribute", { value: name("os"), attr: "getcwd", ctx: py("Load") });
		assert.deepEqual(lifted(pyCall(func)), functionCall("os.getcwd", []));
	});

	it("calls on computed receivers stay native", () => {
		const func = py("Attribute", { value: pyCall(name("f")), attr: "g", ctx: py("Load") });
		assert.equal(escapeHint(lifted(pyCall(func))), "method_call");
	});

	it("keyword arguments stay native", () => {
		const node = py("Call", {
			func: name("f"),
			args: [],
			keywords: [py("keyword", { arg: "k", value: constant(1) })],
		});
		assert.equal(escapeHint(lifted(node)), "keyword_arguments");
	});

	it("functools.reduce", () => {
		const func = py("Attribute", { value: name("functools"), attr: "reduce", ctx: py("Load") });
		assert.deepEqual(
			lifted(pyCall(func, [name("f"), name("xs"), constant(0)])),
			collectionOp("reduce", variable("f"), variable("xs"), int(0)),
		);
	});

	it("list(filter(f, xs))", () => {
		const node = pyCall(name("list"), [pyCall(name("filter"), [name("f"), name("xs")])]);
		assert.deepEqual(lifted(node), collectionOp("filter", variable("f"), variable("xs"), null));
	});

	it("filtering comprehensions", () => {
		const node = py("ListComp", {
			elt: x,
			generators: [py("comprehension", {
				target: name("x", store()),
				iter: name("xs"),
				ifs: [compare(x, ["Gt"], [constant(0)])],
				is_async: 0,
			})],
		});
		assert.deepEqual(
			lifted(node),
			collectionOp(
				"filter",
				lambda([paramName("x")], binaryOp("comparison", ">", variable("x"), int(0))),
				variable("xs"),
				null,
			),
		);
	});

	it("lambda and await", () => {
		assert.deepEqual(lifted(py("Lambda", { args: args([arg("x")]), body: x })), lambda([paramName("x")], variable("x")));
		assert.deepEqual(
			lifted(py("Await", { value: pyCall(name("fetch")) })),
			asyncOperation("await", functionCall("fetch", [])),
		);
	});
});

describe("Python lift - definitions", () => {
	const def = (fname: string, extra: Record<string, unknown> = {}): PyNode =>
		py("FunctionDef", {
			name: fname,
			args: args([]),
			body: [py("Pass")],
			decorator_list: [],
			returns: null,
			type_comment: null,
			type_params: [],
			...extra,
		});

	it("underscore names are private, dunder names public", () => {
		assert.deepEqual(lifted(def("_helper")), functionDef("_helper", [], block([]), { visibility: "private" }));
		assert.deepEqual(lifted(def("__init__")), functionDef("__init__", [], block([]), { visibility: "public" }));
	});

	it("function meta follows the location", () => {
		const node = lifted(def("f", { lineno: 3, col_offset: 0 }), {});
		assert.deepEqual(node.meta, { line: 3, column: 1, visibility: "public" });
	});

	it("decorated, annotated and generator functions stay native", () => {
		assert.equal(escapeHint(lifted(def("f", { decorator_list: [name("cache")] }))), "decorated_def");
		assert.equal(escapeHint(lifted(def("f", { returns: name("int") }))), "annotated_def");
		assert.equal(escapeHint(lifted(def("f", { body: [expr(py("Yield", { value: x }))] }))), "generator");
	});

	it("star parameters stay native", () => {
		const variadic = { ...args([]), vararg: arg("rest") };
		assert.equal(escapeHint(lifted(def("f", { args: variadic }))), "variadic_params");
	});
});

describe("Python lift - escape hatch and failures", () => {
	it("with statements keep the native node", () => {
		const node = py("With", { items: [], body: [py("Pass")] });
		const result = lifted(node);
		assert.deepEqual(result, { tag: "language_specific", meta: {}, payload: ["python", "with", node] });
	});

	it("verbose reports escapes", (t) => {
		const warn = t.mock.method(console, "warn", () => undefined);
		lifted(py("Raise", { exc: null, cause: null }), { verbose: true });
		assert.deepEqual(warn.mock.calls.map((c) => c.arguments), [["[Lift:python] raise kept as language_specific"]]);
	});

	it("non-nodes and unknown classes are Unsupported", () => {
		assert.equal(failureCode(42), ErrorCodes.Unsupported);
		assert.equal(failureCode(py("Bogus")), ErrorCodes.Unsupported);
		assert.equal(failureCode({ _type: "Module", body: [1] }), ErrorCodes.Unsupported);
	});

	it("nesting is bounded", () => {
		const negated = (levels: number): PyNode => {
			let node: PyNode = name("x");
			for (let i = 0; i < levels; i++) node = py("UnaryOp", { op: py("USub"), operand: node });
			return module([py("Expr", { value: node })]);
		};
		assert.equal(liftPython(negated(500)).success, true);
		const result = liftPython(negated(20_000));
		assert.equal(result.success, false);
		if (!result.success) {
			assert.equal(result.error.code, ErrorCodes.Malformed);
			assert.equal(result.error.message, "Malformed tree: nesting deeper than 1000 levels");
		}
	});

	it("missing fields are Unsupported", () => {
		const result = liftPython(py("Attribute", { value: x }));
		assert.equal(result.success, false);
		if (!result.success) {
			assert.equal(result.error.message, "Unsupported construct: Attribute (field attr is not a string)");
		}
	});
});
