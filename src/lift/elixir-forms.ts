// Elixir special forms and macros with IR counterparts:
// if/unless, cond, case, fn, for, try, def/defp, defmodule, module attributes.

import {
	assignment,
	collectionOp,
	conditional,
	container,
	exceptionHandling,
	functionDef,
	inlineMatch,
	lambda,
	matchArm,
	nil,
	paramDefault,
	paramName,
	paramPattern,
	patternMatch,
	tuple as irTuple,
	unaryOp,
	variable,
} from "../builders.js";
import { TransformError } from "../errors.js";
import {
	asNode,
	atomName,
	isAtomNamed,
	isCallTo,
	isKeyword,
	keywordGet,
	type QNode,
	type Quoted,
} from "../native/elixir-types.js";
import type { IrNode, MatchArmNode, Meta, ParamNode } from "../types.js";
import { escape, type LiftState, withMeta } from "./shared.js";

//==============================================================================
// Context
//==============================================================================

/** Callbacks into the main converter, so forms can recurse without a cycle. */
export interface ElixirContext {
	state: LiftState;
	expr(q: Quoted): IrNode;
	pattern(q: Quoted): IrNode;
	/** Location metadata of an AST node */
	loc(node: QNode): Meta;
}

function listArgs(node: QNode): Quoted[] {
	if (!Array.isArray(node.args)) {
		throw TransformError.unsupported(String(atomName(node.form)), node.source, "expected argument list");
	}
	return node.args;
}

/** Block sections [do: ..., else: ...] of a macro call; Unsupported if absent. */
function sections(node: QNode, name: string, allowed: readonly string[]): Map<string, Quoted> {
	const last = listArgs(node).at(-1);
	if (last === undefined || !isKeyword(last)) {
		throw TransformError.unsupported(name, node.source, "missing do block");
	}
	const out = new Map<string, Quoted>();
	for (const entry of last) {
		const key = atomName(entry.tuple[0] ?? null);
		const value = entry.tuple[1];
		if (key === undefined || value === undefined || !allowed.includes(key)) {
			throw TransformError.unsupported(name, node.source, `unexpected section ${String(key)}`);
		}
		out.set(key, value);
	}
	if (!out.has("do")) {
		throw TransformError.unsupported(name, node.source, "missing do block");
	}
	return out;
}

function section(map: Map<string, Quoted>, key: string): Quoted {
	const value = map.get(key);
	return value === undefined ? null : value;
}

/** Statements of a body: __block__ contents or the single expression. */
export function bodyStatements(q: Quoted): Quoted[] {
	const node = asNode(q);
	if (node !== undefined && isAtomNamed(node.form, "__block__") && Array.isArray(node.args)) {
		return node.args;
	}
	return q === null ? [] : [q];
}

interface Clause {
	patterns: Quoted[];
	body: Quoted;
	source: Quoted;
}

/** `patterns -> body` clauses of a do block. Malformed clauses are Unsupported. */
function clauses(q: Quoted, construct: string): Clause[] {
	if (!Array.isArray(q)) {
		throw TransformError.unsupported(construct, q, "expected -> clauses");
	}
	return q.map((item) => {
		const node = asNode(item);
		const args = node?.args;
		if (node === undefined || !isAtomNamed(node.form, "->") || !Array.isArray(args) || args.length !== 2) {
			throw TransformError.unsupported(construct, item, "malformed clause");
		}
		const [patterns, body] = args;
		if (!Array.isArray(patterns) || body === undefined) {
			throw TransformError.unsupported(construct, item, "malformed clause");
		}
		return { patterns, body, source: item };
	});
}

function splitGuard(q: Quoted): { pattern: Quoted; guard: Quoted | undefined } {
	const node = asNode(q);
	if (node !== undefined && isAtomNamed(node.form, "when") && Array.isArray(node.args) && node.args.length === 2) {
		const [pattern, guard] = node.args;
		if (pattern !== undefined && guard !== undefined) return { pattern, guard };
	}
	return { pattern: q, guard: undefined };
}

//==============================================================================
// Conditionals
//==============================================================================

export function liftIf(cx: ElixirContext, node: QNode, name: "if" | "unless"): IrNode {
	const args = listArgs(node);
	const condition = args[0];
	if (args.length !== 2 || condition === undefined) {
		throw TransformError.unsupported(name, node.source, "expected condition and do block");
	}
	const parts = sections(node, name, ["do", "else"]);
	const otherwise = parts.has("else") ? cx.expr(section(parts, "else")) : null;
	const then = cx.expr(section(parts, "do"));
	if (name === "unless") {
		const negated = unaryOp("boolean", "not", cx.expr(condition));
		return conditional(negated, then, otherwise, withMeta(cx.loc(node), { original_form: "unless" }));
	}
	return conditional(cx.expr(condition), then, otherwise, cx.loc(node));
}

/**
 * cond becomes a right-nested conditional chain. A trailing `true ->` clause
 * after at least one other clause is the final else.
 */
export function liftCond(cx: ElixirContext, node: QNode): IrNode {
	const parts = sections(node, "cond", ["do"]);
	const all = clauses(section(parts, "do"), "cond").map((clause) => {
		const [condition] = clause.patterns;
		if (clause.patterns.length !== 1 || condition === undefined) {
			throw TransformError.unsupported("cond", clause.source, "clause needs exactly one condition");
		}
		return { condition, body: clause.body };
	});
	if (all.length === 0) {
		return nil();
	}

	const last = all[all.length - 1];
	const hasDefault = all.length > 1 && last !== undefined && last.condition === true;
	const branches = hasDefault ? all.slice(0, -1) : all;
	let chain: IrNode | null = hasDefault && last !== undefined ? cx.expr(last.body) : null;
	const meta = withMeta(cx.loc(node), { original_form: "multi_branch" });
	for (let i = branches.length - 1; i >= 0; i--) {
		const branch = branches[i];
		if (branch === undefined) continue;
		chain = conditional(cx.expr(branch.condition), cx.expr(branch.body), chain, meta);
	}
	return chain ?? nil();
}

//==============================================================================
// Pattern matching
//==============================================================================

function arm(cx: ElixirContext, clause: Clause, construct: string, extra: Meta = {}): MatchArmNode {
	const [head] = clause.patterns;
	if (clause.patterns.length !== 1 || head === undefined) {
		throw TransformError.unsupported(construct, clause.source, "clause needs exactly one pattern");
	}
	const { pattern, guard } = splitGuard(head);
	const liftedPattern = isWildcard(pattern) ? null : cx.pattern(pattern);
	return matchArm(
		liftedPattern,
		guard === undefined ? null : cx.expr(guard),
		cx.expr(clause.body),
		extra,
	);
}

function isWildcard(q: Quoted): boolean {
	const node = asNode(q);
	return node !== undefined && isAtomNamed(node.form, "_") && !Array.isArray(node.args);
}

export function liftCase(cx: ElixirContext, node: QNode): IrNode {
	const args = listArgs(node);
	const scrutinee = args[0];
	if (args.length !== 2 || scrutinee === undefined) {
		throw TransformError.unsupported("case", node.source, "expected subject and do block");
	}
	const parts = sections(node, "case", ["do"]);
	const arms = clauses(section(parts, "do"), "case").map((c) => arm(cx, c, "case"));
	return patternMatch(cx.expr(scrutinee), arms, cx.loc(node));
}

//==============================================================================
// Functions
//==============================================================================

/** Parameter from a pattern: plain variable, `name \\ default`, or a pattern. */
export function liftParam(cx: ElixirContext, q: Quoted): ParamNode {
	const node = asNode(q);
	if (node !== undefined) {
		const name = atomName(node.form);
		if (name !== undefined && !Array.isArray(node.args)) {
			return paramName(name);
		}
		if (name === "\\\\" && Array.isArray(node.args) && node.args.length === 2) {
			const [target, fallback] = node.args;
			const targetNode = target === undefined ? undefined : asNode(target);
			const targetName = targetNode === undefined ? undefined : atomName(targetNode.form);
			if (targetNode !== undefined && targetName !== undefined && !Array.isArray(targetNode.args) && fallback !== undefined) {
				return paramDefault(targetName, cx.expr(fallback));
			}
		}
	}
	return paramPattern(cx.pattern(q));
}

export function liftFn(cx: ElixirContext, node: QNode): IrNode {
	const fnClauses = clauses(listArgs(node), "fn");
	const [only] = fnClauses;
	if (fnClauses.length !== 1 || only === undefined) {
		return escape(cx.state, "multi_clause_fn", node.source, cx.loc(node));
	}
	const [first] = only.patterns;
	if (only.patterns.length === 1 && first !== undefined && isCallTo(first, "when")) {
		return escape(cx.state, "multi_clause_fn", node.source, cx.loc(node));
	}
	return lambda(only.patterns.map((p) => liftParam(cx, p)), cx.expr(only.body), cx.loc(node));
}

/** `for pattern <- source, do: body` with one generator and no options. */
export function liftFor(cx: ElixirContext, node: QNode): IrNode {
	const args = listArgs(node);
	const [generator, options] = args;
	const gen = generator === undefined ? undefined : asNode(generator);
	const genArgs = gen?.args;
	if (
		args.length !== 2 || gen === undefined || options === undefined ||
		!isAtomNamed(gen.form, "<-") || !Array.isArray(genArgs) || genArgs.length !== 2 ||
		!isKeyword(options) || options.length !== 1
	) {
		return escape(cx.state, "comprehension", node.source, cx.loc(node));
	}
	const body = keywordGet(options, "do");
	const [pattern, source] = genArgs;
	if (body === undefined || pattern === undefined || source === undefined) {
		return escape(cx.state, "comprehension", node.source, cx.loc(node));
	}
	const fn = lambda([liftParam(cx, pattern)], cx.expr(body));
	return collectionOp("map", fn, cx.expr(source), null, withMeta(cx.loc(node), { original_form: "comprehension" }));
}

//==============================================================================
// Exceptions
//==============================================================================

/** rescue pattern: `e in Type` binds the exception and names its type. */
function rescuePattern(cx: ElixirContext, q: Quoted): IrNode {
	const node = asNode(q);
	if (node !== undefined && isAtomNamed(node.form, "in") && Array.isArray(node.args) && node.args.length === 2) {
		const [binding, kind] = node.args;
		if (binding !== undefined && kind !== undefined) {
			return inlineMatch(cx.pattern(binding), cx.pattern(kind));
		}
	}
	return cx.pattern(q);
}

function handler(cx: ElixirContext, clause: Clause, kind: "rescue" | "catch"): MatchArmNode {
	if (kind === "catch" && clause.patterns.length === 2) {
		const [catchKind, value] = clause.patterns;
		if (catchKind !== undefined && value !== undefined) {
			const pattern = irTuple([cx.pattern(catchKind), cx.pattern(value)]);
			return matchArm(pattern, null, cx.expr(clause.body), { handler: "catch", catch_arity: 2 });
		}
	}
	const [head] = clause.patterns;
	if (clause.patterns.length !== 1 || head === undefined) {
		throw TransformError.unsupported(kind, clause.source, "clause needs one pattern");
	}
	const { pattern, guard } = splitGuard(head);
	const lifted = isWildcard(pattern) ? null : kind === "rescue" ? rescuePattern(cx, pattern) : cx.pattern(pattern);
	return matchArm(lifted, guard === undefined ? null : cx.expr(guard), cx.expr(clause.body), { handler: kind });
}

export function liftTry(cx: ElixirContext, node: QNode): IrNode {
	const parts = sections(node, "try", ["do", "rescue", "catch", "after", "else"]);
	if (parts.has("else")) {
		return escape(cx.state, "try_else", node.source, cx.loc(node));
	}
	const handlers = [
		...(parts.has("rescue") ? clauses(section(parts, "rescue"), "rescue").map((c) => handler(cx, c, "rescue")) : []),
		...(parts.has("catch") ? clauses(section(parts, "catch"), "catch").map((c) => handler(cx, c, "catch")) : []),
	];
	const cleanup = parts.has("after") ? cx.expr(section(parts, "after")) : null;
	return exceptionHandling(cx.expr(section(parts, "do")), handlers, cleanup, cx.loc(node));
}

//==============================================================================
// Definitions
//==============================================================================

export function liftDef(cx: ElixirContext, node: QNode, visibility: "public" | "private"): IrNode {
	const args = listArgs(node);
	const [head, options] = args;
	if (args.length !== 2 || head === undefined || options === undefined || !isKeyword(options)) {
		return escape(cx.state, "bodiless_def", node.source, cx.loc(node));
	}
	if (isCallTo(head, "when")) {
		return escape(cx.state, "guarded_def", node.source, cx.loc(node));
	}
	const body = keywordGet(options, "do");
	const signature = asNode(head);
	const name = signature === undefined ? undefined : atomName(signature.form);
	if (options.length !== 1 || body === undefined || signature === undefined || name === undefined) {
		return escape(cx.state, "def_sections", node.source, cx.loc(node));
	}
	const params = Array.isArray(signature.args) ? signature.args : [];
	return functionDef(
		name,
		params.map((p) => liftParam(cx, p)),
		cx.expr(body),
		withMeta(cx.loc(node), { visibility }),
	);
}

export function aliasName(q: Quoted): string | undefined {
	const node = asNode(q);
	if (node === undefined || !isAtomNamed(node.form, "__aliases__") || !Array.isArray(node.args)) {
		return undefined;
	}
	const parts = node.args.map(atomName);
	if (parts.length === 0 || parts.some((p) => p === undefined)) return undefined;
	return parts.join(".");
}

export function liftDefmodule(cx: ElixirContext, node: QNode): IrNode {
	const args = listArgs(node);
	const [head] = args;
	const name = head === undefined ? undefined : aliasName(head);
	if (args.length !== 2 || name === undefined) {
		return escape(cx.state, "defmodule", node.source, cx.loc(node));
	}
	const parts = sections(node, "defmodule", ["do"]);
	return container("module", name, bodyStatements(section(parts, "do")).map((q) => cx.expr(q)), cx.loc(node));
}

/** `@name value` writes an attribute; `@name` reads it. */
export function liftAttribute(cx: ElixirContext, node: QNode): IrNode {
	const args = listArgs(node);
	const inner = args.length === 1 && args[0] !== undefined ? asNode(args[0]) : undefined;
	const name = inner === undefined ? undefined : atomName(inner.form);
	if (inner === undefined || name === undefined) {
		throw TransformError.unsupported("@", node.source, "malformed module attribute");
	}
	if (!Array.isArray(inner.args)) {
		return variable("@" + name, cx.loc(node));
	}
	const [value] = inner.args;
	if (inner.args.length !== 1 || value === undefined) {
		throw TransformError.unsupported("@", node.source, "attribute takes one value");
	}
	return assignment(variable("@" + name), cx.expr(value), cx.loc(node));
}
