// SPDX-License-Identifier: MIT
// STRATA Elixir Lower - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { lowerElixir } from "../src/lower/elixir.js";
import { FallbackRegistry, type LowerOptions } from "../src/lower/shared.js";
import {
	alias,
	atom,
	call,
	float as qfloat,
	kw,
	type Quoted,
	ref,
	remote,
	tuple as qtuple,
} from "../src/native/elixir-types.js";
import {
	assignment,
	binaryOp,
	collectionOp,
	conditional,
	earlyReturn,
	float,
	functionCall,
	functionDef,
	int,
	lambda,
	languageSpecific,
	loop,
	paramName,
	property,
	str,
	symbol,
	tuple,
	variable,
} from "../src/builders.js";
import { ErrorCodes } from "../src/errors.js";

//==============================================================================
// Helpers
//==============================================================================

function lowered(tree: unknown, options?: LowerOptions): Quoted {
	const result = lowerElixir(tree, options);
	if (!result.success) throw result.error;
	return result.value;
}

function failureCode(tree: unknown, options?: LowerOptions): string | undefined {
	const result = lowerElixir(tree, options);
	return result.success ? undefined : result.error.code;
}

//==============================================================================
// Tests
//==============================================================================

describe("Elixir lower - leaves", () => {
	it("literals", () => {
		assert.equal(lowered(int(3)), 3);
		assert.equal(lowered(str("s")), "s");
		assert.deepEqual(lowered(symbol("ok")), atom("ok"));
		assert.deepEqual(lowered(float(2)), qfloat(2));
		assert.equal(lowered(float(2.5)), 2.5);
	});

	it("variables keep their line", () => {
		assert.deepEqual(lowered(variable("x", { line: 4, column: 2 })), ref("x", kw({ line: 4 })));
	});

	it("alias-shaped names and module attributes", () => {
		assert.deepEqual(lowered(variable("My.App")), alias("My", "App"));
		assert.deepEqual(lowered(variable("@limit")), call("@", [ref("limit")]));
	});

	it("regex literals become ~r sigils", () => {
		const tree = { tag: "literal", meta: {}, payload: ["regex", { source: "a+", flags: "i" }] };
		assert.deepEqual(lowered(tree), call("sigil_r", [call("<<>>", ["a+"]), [105]]));
	});

	it("2-tuples are literal tuples, others use {}", () => {
		assert.deepEqual(lowered(tuple([int(1), int(2)])), qtuple(1, 2));
		assert.deepEqual(lowered(tuple([int(1), int(2), int(3)])), call("{}", [1, 2, 3]));
	});
});

describe("Elixir lower - operators", () => {
	it("x + 5", () => {
		assert.deepEqual(lowered(binaryOp("arithmetic", "+", variable("x"), int(5))), call("+", [ref("x"), 5]));
	});

	it("restores Elixir spellings", () => {
		const tree = binaryOp("boolean", "and", variable("a"), variable("b"), { original_operator: "&&" });
		assert.deepEqual(lowered(tree), call("&&", [ref("a"), ref("b")]));
	});

	it("ignores spellings from other languages", () => {
		const tree = binaryOp("arithmetic", "rem", variable("a"), int(2), { original_operator: "%" });
		assert.deepEqual(lowered(tree), call("rem", [ref("a"), 2]));
	});
});

describe("Elixir lower - calls", () => {
	it("remote calls split the module", () => {
		assert.deepEqual(lowered(functionCall("String.upcase", [str("a")])), remote("String", "upcase", ["a"]));
	});

	it("erlang module calls", () => {
		assert.deepEqual(
			lowered(functionCall(":lists.reverse", [variable("l")])),
			call(call(".", [atom("lists"), atom("reverse")]), [ref("l")]),
		);
	});

	it("method calls on a variable are remote calls on that variable", () => {
		assert.deepEqual(
			lowered(functionCall("obj.method", [variable("x")])),
			call(call(".", [ref("obj"), atom("method")]), [ref("x")]),
		);
	});

	it("operator-named calls keep the operator form", () => {
		assert.deepEqual(lowered(functionCall("++", [variable("a"), variable("b")])), call("++", [ref("a"), ref("b")]));
	});

	it("other call names have no rendering", () => {
		assert.equal(failureCode(functionCall("this.total.add", [int(1)])), ErrorCodes.Unsupported);
		assert.equal(failureCode(functionCall("obj.Method", [])), ErrorCodes.Unsupported);
		assert.equal(failureCode(functionCall("my-fn", [])), ErrorCodes.Unsupported);
	});

	it("anonymous call style", () => {
		assert.deepEqual(
			lowered(functionCall("f", [int(1)], { call_style: "anonymous" })),
			call(call(".", [ref("f")]), [1]),
		);
	});
});

describe("Elixir lower - control flow", () => {
	it("multi_branch conditionals become cond", () => {
		const tree = conditional(variable("a"), int(1), int(2), { original_form: "multi_branch" });
		assert.deepEqual(
			lowered(tree),
			call("cond", [kw({ do: [call("->", [[ref("a")], 1]), call("->", [[true], 2])] })]),
		);
	});

	it("plain conditionals become if", () => {
		assert.deepEqual(
			lowered(conditional(variable("a"), int(1), null)),
			call("if", [ref("a"), kw({ do: 1 })]),
		);
	});

	it("for_each loops become Enum.each", () => {
		const tree = loop("for_each", variable("v"), variable("xs"), functionCall("puts", [variable("v")]));
		assert.deepEqual(
			lowered(tree),
			remote("Enum", "each", [ref("xs"), call("fn", [call("->", [[ref("v")], call("puts", [ref("v")])])])]),
		);
	});

	it("early returns are rendered as throw", () => {
		assert.deepEqual(lowered(earlyReturn("return", int(1))), call("throw", [qtuple(atom("return"), 1)]));
	});
});

describe("Elixir lower - functions", () => {
	it("reduce callbacks take (element, accumulator)", () => {
		const tree = collectionOp(
			"reduce",
			lambda([paramName("acc"), paramName("e")], binaryOp("arithmetic", "+", variable("acc"), variable("e"))),
			variable("xs"),
			int(0),
		);
		const fn = call("fn", [call("->", [[ref("e"), ref("acc")], call("+", [ref("acc"), ref("e")])])]);
		assert.deepEqual(lowered(tree), remote("Enum", "reduce", [ref("xs"), 0, fn]));
	});

	it("private functions use defp", () => {
		const tree = functionDef("helper", [paramName("a")], variable("a"), { visibility: "private" });
		assert.deepEqual(lowered(tree), call("defp", [call("helper", [ref("a")]), kw({ do: ref("a") })]));
	});

	it("attribute writes", () => {
		assert.deepEqual(lowered(assignment(variable("@limit"), int(10))), call("@", [call("limit", [10])]));
	});
});

describe("Elixir lower - escape hatch and failures", () => {
	it("same-language native nodes come back verbatim", () => {
		const pipe = call("|>", [ref("xs"), call("length", [])]);
		assert.deepEqual(lowered(languageSpecific("elixir", "pipe", pipe)), pipe);
	});

	it("a non-quoted payload under the elixir language is Malformed", () => {
		assert.equal(failureCode(languageSpecific("elixir", "pipe", { bogus: 1, extra: 2 })), ErrorCodes.Malformed);
	});

	it("other languages' native nodes are Incompatible", () => {
		assert.equal(failureCode(languageSpecific("python", "with", {})), ErrorCodes.Incompatible);
	});

	it("a registered fallback renders the node", () => {
		const fallbacks = new FallbackRegistry().register("with", "elixir", () => atom("fallback"));
		assert.deepEqual(lowered(languageSpecific("python", "with", {}), { fallbacks }), atom("fallback"));
	});

	it("properties are Unsupported", () => {
		assert.equal(failureCode(property("size", null, null)), ErrorCodes.Unsupported);
	});

	it("non-conforming input is Malformed", () => {
		assert.equal(failureCode({ tag: "goto", meta: {}, payload: null }), ErrorCodes.Malformed);
	});

	it("verbose reports degraded renderings", (t) => {
		const warn = t.mock.method(console, "warn", () => undefined);
		lowered(earlyReturn("break", null), { verbose: true });
		assert.deepEqual(warn.mock.calls.map((c) => c.arguments), [["[Lower:elixir] break rendered as throw"]]);
	});
});
