// SPDX-License-Identifier: MIT
// STRATA Round Trip - Integration Tests
// lift -> lower -> lift through each language keeps the IR, and escape-hatch
// nodes come back unchanged in their own language.

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { basename, resolve } from "node:path";
import { globSync } from "glob";
import ts from "typescript";

import { lift, lower, roundTrip } from "../src/adapters.js";
import { ErrorCodes, type Result } from "../src/errors.js";
import { call, kw, type Quoted, ref, remote } from "../src/native/elixir-types.js";
import { module, py } from "../src/native/python-types.js";
import { stripMetadata } from "../src/traversal.js";
import type { IrNode } from "../src/types.js";

//==============================================================================
// Helpers
//==============================================================================

function unwrap<T>(result: Result<T>): T {
	if (!result.success) throw result.error;
	return result.value;
}

const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
const scratch = ts.createSourceFile("output.ts", "", ts.ScriptTarget.Latest, false, ts.ScriptKind.TS);

function parse(code: string): ts.SourceFile {
	return ts.createSourceFile("input.ts", code, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
}

function print(node: ts.Node): string {
	const statements = ts.isSourceFile(node) ? node.statements : [node];
	return statements.map((s) => printer.printNode(ts.EmitHint.Unspecified, s, scratch)).join("\n");
}

function pythonAsts(): { file: string; ast: unknown }[] {
	const root = resolve(import.meta.dirname, "fixtures/python");
	return globSync("*.json", { cwd: root, absolute: true }).sort().map((file) => {
		const parsed: unknown = JSON.parse(readFileSync(file, "utf-8"));
		if (typeof parsed !== "object" || parsed === null || !("ast" in parsed)) {
			throw new Error(`${file} has no ast`);
		}
		return { file: basename(file), ast: parsed.ast };
	});
}

const fn = (params: Quoted[], body: Quoted): Quoted => call("fn", [call("->", [params, body])]);

//==============================================================================
// Tests
//==============================================================================

describe("Round trip - Python", () => {
	for (const { file, ast } of pythonAsts()) {
		it(file, () => {
			const first = unwrap(lift("python", ast));
			const second = unwrap(lift("python", unwrap(lower(first, "python"))));
			assert.deepEqual(stripMetadata(second), stripMetadata(first));
		});
	}
});

describe("Round trip - Elixir", () => {
	const samples: [string, Quoted][] = [
		["x + 5", call("+", [ref("x"), 5])],
		["if", call("if", [ref("a"), kw({ do: 1 })])],
		["Enum.each", remote("Enum", "each", [ref("xs"), fn([ref("v")], call("puts", [ref("v")]))])],
		["Enum.reduce", remote("Enum", "reduce", [ref("xs"), 0, fn([ref("e"), ref("acc")], call("+", [ref("acc"), ref("e")]))])],
		["defp", call("defp", [call("helper", [ref("a")]), kw({ do: ref("a") })])],
	];

	for (const [label, quoted] of samples) {
		it(label, () => {
			const first = unwrap(lift("elixir", quoted));
			const second = unwrap(lift("elixir", unwrap(lower(first, "elixir"))));
			assert.deepEqual(stripMetadata(second), stripMetadata(first));
		});
	}

	it("lowering restores the quoted form", () => {
		const quoted = samples.map(([, q]) => q);
		for (const q of quoted) {
			assert.deepEqual(unwrap(roundTrip("elixir", q)).native, q);
		}
	});
});

describe("Round trip - TypeScript", () => {
	const sources = [
		"x + 5",
		"const y = a === b ? 1 : 2;",
		"export function add(a, b = 1) { return a + b; }",
		"for (const v of xs) { use(v); }",
		"xs.filter((x) => x > 0).map((x) => x * 2)",
		"try { risky(); } catch (e) { handle(e); }",
		"namespace A.B { const x = 1; }",
		"class Box { size = 0; grow() { this.size += 1; } }",
	];

	for (const source of sources) {
		it(source, () => {
			const first = unwrap(lift("typescript", parse(source)));
			const printed = print(unwrap(lower(first, "typescript")));
			const second = unwrap(lift("typescript", parse(printed)));
			assert.deepEqual(stripMetadata(second), stripMetadata(first));
		});
	}
});

describe("Round trip - escape hatch", () => {
	it("python nodes come back as the same node", () => {
		const node = py("With", { items: [], body: [py("Pass")] });
		const ir: IrNode = unwrap(lift("python", module([node])));
		assert.equal(ir.tag, "language_specific");
		assert.equal(unwrap(lower(ir, "python")), node);
	});

	it("elixir nodes come back unchanged", () => {
		const pipe = call("|>", [ref("xs"), call("length", [])]);
		assert.deepEqual(unwrap(roundTrip("elixir", pipe)).native, pipe);
	});

	it("typescript nodes come back as the same node", () => {
		const file = parse("debugger;");
		assert.equal(unwrap(lower(unwrap(lift("typescript", file)), "typescript")), file.statements[0]);
	});

	it("other targets refuse them", () => {
		const ir = unwrap(lift("python", module([py("With", { items: [], body: [py("Pass")] })])));
		const result = lower(ir, "elixir");
		assert.equal(result.success, false);
		if (!result.success) assert.equal(result.error.code, ErrorCodes.Incompatible);
	});
});
