// STRATA Elixir Lift
// Converts Elixir quoted expressions (JSON-encoded) to IR trees.

import {
	asyncOperation,
	attributeAccess,
	binaryOp,
	block,
	collectionOp,
	float,
	functionCall,
	inlineMatch,
	int,
	lambda,
	list,
	literal,
	loop,
	map,
	nil,
	pair,
	str,
	symbol,
	tuple,
	unaryOp,
	variable,
} from "../builders.js";
import { type Result, TransformError } from "../errors.js";
import {
	asNode,
	atomName,
	isAtom,
	isAtomNamed,
	isCallTo,
	isFloat,
	isQuoted,
	isTuple,
	keywordGet,
	type QNode,
	type Quoted,
} from "../native/elixir-types.js";
import type { IrNode, Meta } from "../types.js";
import { classifyTrailingKeyword } from "./elixir-ambiguity.js";
import {
	aliasName,
	type ElixirContext,
	liftAttribute,
	liftCase,
	liftCond,
	liftDef,
	liftDefmodule,
	liftFn,
	liftFor,
	liftIf,
	liftTry,
} from "./elixir-forms.js";
import {
	canonical,
	createLiftState,
	escape,
	type LiftOptions,
	type LiftState,
	locationMeta,
	own,
	runLift,
	spellingMeta,
	withMeta,
} from "./shared.js";

//==============================================================================
// Public API
//==============================================================================

export function liftElixir(native: unknown, options?: LiftOptions): Result<IrNode> {
	const state = createLiftState("elixir", options);
	return runLift(() => {
		if (!isQuoted(native)) {
			throw TransformError.unsupported("quoted expression", native, "not a quoted Elixir value");
		}
		return liftExpr(createContext(state), native);
	});
}

//==============================================================================
// Tables
//==============================================================================

/** Source operator spelling -> canonical binary operator. */
const BINARY_OPERATORS: Readonly<Record<string, string>> = {
	"+": "+",
	"-": "-",
	"*": "*",
	"/": "/",
	"**": "**",
	"<>": "<>",
	div: "div",
	rem: "rem",
	"==": "==",
	"!=": "!=",
	"<": "<",
	">": ">",
	"<=": "<=",
	">=": ">=",
	"===": "===",
	"!==": "!==",
	and: "and",
	or: "or",
	"&&": "and",
	"||": "or",
};

const UNARY_OPERATORS: Readonly<Record<string, { category: "arithmetic" | "boolean"; operator: string }>> = {
	"-": { category: "arithmetic", operator: "-" },
	"+": { category: "arithmetic", operator: "+" },
	not: { category: "boolean", operator: "not" },
	"!": { category: "boolean", operator: "not" },
};

/** Forms with no IR counterpart; the hint is the form name unless mapped. */
const ESCAPED_FORMS: Readonly<Record<string, string>> = {
	with: "with",
	receive: "receive",
	quote: "quote",
	unquote: "unquote",
	unquote_splicing: "unquote",
	import: "directive",
	alias: "directive",
	require: "directive",
	use: "directive",
	"&": "capture",
	defmacro: "macro_def",
	defmacrop: "macro_def",
	defguard: "macro_def",
	defguardp: "macro_def",
	defstruct: "defstruct",
	defprotocol: "protocol",
	defimpl: "protocol",
	defdelegate: "defdelegate",
	defexception: "defexception",
	"<<>>": "binary",
	"%": "struct",
	"^": "pin_pattern",
	"|": "cons_pattern",
	"::": "type_spec",
	"..": "range",
	"++": "operator",
	"--": "operator",
	in: "operator",
	"=~": "operator",
	"<-": "operator",
	"\\\\": "default_argument",
	when: "guard",
	"->": "clause",
	".": "dot",
};

/** Zero-arity special forms read like variables but are not bindings. */
const SPECIAL_VARIABLES: ReadonlySet<string> = new Set([
	"__MODULE__",
	"__ENV__",
	"__CALLER__",
	"__DIR__",
	"__STACKTRACE__",
]);

//==============================================================================
// Context
//==============================================================================

function createContext(state: LiftState): ElixirContext {
	const cx: ElixirContext = {
		state,
		expr: (q) => liftExpr(cx, q),
		pattern: (q) => liftExpr(cx, q),
		loc: (node) => nodeLocation(state, node),
	};
	return cx;
}

function nodeLocation(state: LiftState, node: QNode): Meta {
	const line = keywordGet(node.meta, "line");
	const column = keywordGet(node.meta, "column");
	return locationMeta(
		state,
		typeof line === "number" ? line : undefined,
		typeof column === "number" ? column : undefined,
	);
}

//==============================================================================
// Expressions
//==============================================================================

function liftExpr(cx: ElixirContext, q: Quoted): IrNode {
	if (typeof q === "number") {
		return Number.isInteger(q) ? int(q) : float(q);
	}
	if (typeof q === "string") return str(q);
	if (typeof q === "boolean") return literal(["boolean", q]);
	if (q === null) return nil();
	if (Array.isArray(q)) return list(q.map((item) => liftExpr(cx, item)));
	if (isFloat(q)) return float(q.float);
	if (isAtom(q)) return symbol(q.atom);
	if (isTuple(q)) {
		if (q.tuple.length === 2) {
			return tuple(q.tuple.map((item) => liftExpr(cx, item)));
		}
		const node = asNode(q);
		if (node === undefined) {
			throw TransformError.unsupported("tuple", q, "only 2-tuples and AST nodes appear in quoted form");
		}
		return liftNode(cx, node);
	}
	throw TransformError.unsupported("quoted value", q);
}

function liftNode(cx: ElixirContext, node: QNode): IrNode {
	const remoteForm = asNode(node.form);
	if (remoteForm !== undefined) {
		return liftDotCall(cx, node, remoteForm);
	}
	const name = atomName(node.form);
	if (name === undefined) {
		throw TransformError.unsupported("call", node.source, "call target is neither an atom nor a dot form");
	}
	if (!Array.isArray(node.args)) {
		if (SPECIAL_VARIABLES.has(name)) {
			return escape(cx.state, "special_form", node.source, cx.loc(node));
		}
		return variable(name, cx.loc(node));
	}
	return liftCall(cx, node, name, node.args);
}

function liftCall(cx: ElixirContext, node: QNode, name: string, args: Quoted[]): IrNode {
	const loc = cx.loc(node);
	switch (name) {
	case "__block__":
		return block(args.map(cx.expr), loc);
	case "__aliases__": {
		const dotted = aliasName(node.source);
		if (dotted === undefined) throw TransformError.unsupported("alias", node.source);
		return variable(dotted, loc);
	}
	case "{}":
		return tuple(args.map(cx.expr), loc);
	case "%{}":
		return liftMap(cx, node, args);
	case "=":
		return liftMatchOperator(cx, node, args);
	case "|>":
		return escape(cx.state, isPipedCase(args) ? "piped_case" : "pipe", node.source, loc);
	case "if":
	case "unless":
		return liftIf(cx, node, name === "if" ? "if" : "unless");
	case "cond":
		return liftCond(cx, node);
	case "case":
		return liftCase(cx, node);
	case "fn":
		return liftFn(cx, node);
	case "for":
		return liftFor(cx, node);
	case "try":
		return liftTry(cx, node);
	case "def":
		return liftDef(cx, node, "public");
	case "defp":
		return liftDef(cx, node, "private");
	case "defmodule":
		return liftDefmodule(cx, node);
	case "@":
		return liftAttribute(cx, node);
	case "sigil_r":
		return liftRegex(cx, node, args);
	}

	const escaped = own(ESCAPED_FORMS, name);
	if (escaped !== undefined) return escape(cx.state, escaped, node.source, loc);
	if (name.startsWith("sigil_")) return escape(cx.state, "sigil", node.source, loc);

	const operator = liftOperator(cx, node, name, args);
	if (operator !== undefined) return operator;

	return liftPlainCall(cx, node, name, args);
}

function liftOperator(cx: ElixirContext, node: QNode, name: string, args: Quoted[]): IrNode | undefined {
	const loc = cx.loc(node);
	if (args.length === 2) {
		const target = own(BINARY_OPERATORS, name);
		const op = target === undefined ? undefined : canonical(target);
		const [left, right] = args;
		if (op !== undefined && left !== undefined && right !== undefined) {
			return binaryOp(op.category, op.operator, cx.expr(left), cx.expr(right), withMeta(loc, spellingMeta(name, op.operator)));
		}
	}
	if (args.length === 1) {
		const unary = own(UNARY_OPERATORS, name);
		const [operand] = args;
		if (unary !== undefined && operand !== undefined) {
			return unaryOp(unary.category, unary.operator, cx.expr(operand), withMeta(loc, spellingMeta(name, unary.operator)));
		}
	}
	return undefined;
}

/**
 * Local or remote call. A trailing keyword list holding a block section makes
 * the call a macro invocation with a do block, which has no IR counterpart.
 */
function liftPlainCall(cx: ElixirContext, node: QNode, name: string, args: Quoted[], extra: Meta = {}): IrNode {
	const loc = withMeta(cx.loc(node), extra);
	const trailing = classifyTrailingKeyword(node.meta, args);
	if (trailing?.readings.includes("uncertain")) {
		throw TransformError.ambiguous(
			name,
			node.source,
			"keyword argument with a block-section key could be a do block or data",
		);
	}
	if (trailing?.readings.includes("wrapper")) {
		return escape(cx.state, "macro_block", node.source, loc);
	}
	return functionCall(name, args.map(cx.expr), loc);
}

function isPipedCase(args: Quoted[]): boolean {
	const right = args[1];
	return right !== undefined && isCallTo(right, "case");
}

//==============================================================================
// Data
//==============================================================================

function liftMap(cx: ElixirContext, node: QNode, args: Quoted[]): IrNode {
	const [first] = args;
	if (args.length === 1 && first !== undefined && isCallTo(first, "|")) {
		return escape(cx.state, "map_update", node.source, cx.loc(node));
	}
	const pairs = args.map((entry) => {
		if (!isTuple(entry) || entry.tuple.length !== 2) {
			throw TransformError.unsupported("map entry", entry, "expected {key, value}");
		}
		const [key, value] = entry.tuple;
		if (key === undefined || value === undefined) {
			throw TransformError.unsupported("map entry", entry);
		}
		return pair(cx.expr(key), cx.expr(value));
	});
	return map(pairs, cx.loc(node));
}

function liftMatchOperator(cx: ElixirContext, node: QNode, args: Quoted[]): IrNode {
	const [left, right] = args;
	if (args.length !== 2 || left === undefined || right === undefined) {
		throw TransformError.unsupported("=", node.source, "match takes two operands");
	}
	return inlineMatch(cx.pattern(left), cx.expr(right), cx.loc(node));
}

/** ~r"source"flags with a literal source. */
function liftRegex(cx: ElixirContext, node: QNode, args: Quoted[]): IrNode {
	const [body, modifiers] = args;
	const parts = body === undefined ? undefined : asNode(body);
	const pieces = parts?.args;
	const [source] = Array.isArray(pieces) ? pieces : [];
	if (
		parts === undefined || !isAtomNamed(parts.form, "<<>>") || !Array.isArray(pieces) ||
		pieces.length !== 1 || typeof source !== "string" || !Array.isArray(modifiers)
	) {
		return escape(cx.state, "sigil", node.source, cx.loc(node));
	}
	const codes = modifiers.filter((m): m is number => typeof m === "number");
	if (codes.length !== modifiers.length) {
		return escape(cx.state, "sigil", node.source, cx.loc(node));
	}
	return literal(["regex", { source, flags: String.fromCharCode(...codes) }], cx.loc(node));
}

//==============================================================================
// Dot forms: Mod.fun(args), value.field, fun.(args)
//==============================================================================

function liftDotCall(cx: ElixirContext, node: QNode, dot: QNode): IrNode {
	if (!isAtomNamed(dot.form, ".") || !Array.isArray(dot.args) || !Array.isArray(node.args)) {
		throw TransformError.unsupported("call", node.source, "unrecognised call target");
	}
	const args = node.args;
	const [receiver, fun] = dot.args;

	// fun.(args)
	if (dot.args.length === 1 && receiver !== undefined) {
		const target = asNode(receiver);
		const name = target === undefined ? undefined : atomName(target.form);
		if (target === undefined || name === undefined || Array.isArray(target.args)) {
			return escape(cx.state, "anonymous_call", node.source, cx.loc(node));
		}
		return liftPlainCall(cx, node, name, args, { call_style: "anonymous" });
	}

	const funName = fun === undefined ? undefined : atomName(fun);
	if (dot.args.length !== 2 || receiver === undefined || funName === undefined) {
		throw TransformError.unsupported("call", node.source, "malformed dot form");
	}

	const module = aliasName(receiver) ?? (isAtom(receiver) ? ":" + receiver.atom : undefined);
	if (module === undefined) {
		if (args.length === 0 && keywordGet(node.meta, "no_parens") === true) {
			return attributeAccess(cx.expr(receiver), funName, cx.loc(node));
		}
		return escape(cx.state, "dynamic_call", node.source, cx.loc(node));
	}
	return liftRemoteCall(cx, node, module, funName, args);
}

function liftRemoteCall(cx: ElixirContext, node: QNode, module: string, fun: string, args: Quoted[]): IrNode {
	const loc = cx.loc(node);
	const qualified = module + "." + fun;
	const [first, second, third] = args;

	switch (qualified) {
	case "Enum.map":
	case "Enum.filter":
		if (args.length === 2 && first !== undefined && second !== undefined) {
			const op = fun === "map" ? "map" : "filter";
			return collectionOp(op, cx.expr(second), cx.expr(first), null, loc);
		}
		break;
	case "Enum.reduce":
		if (args.length === 3 && first !== undefined && second !== undefined && third !== undefined) {
			return liftReduce(cx, node, first, second, third);
		}
		break;
	case "Enum.each":
		if (args.length === 2 && first !== undefined && second !== undefined) {
			return liftEach(cx, node, first, second);
		}
		break;
	case "Task.async":
		if (args.length === 1 && first !== undefined) {
			return asyncOperation("async", cx.expr(first), loc);
		}
		break;
	case "Task.await":
		if (args.length === 1 && first !== undefined) {
			return asyncOperation("await", cx.expr(first), loc);
		}
		break;
	}
	return liftPlainCall(cx, node, qualified, args);
}

/** Enum.reduce(c, acc, fn elem, acc -> ... end): callback reordered to (acc, elem). */
function liftReduce(cx: ElixirContext, node: QNode, collection: Quoted, initial: Quoted, callback: Quoted): IrNode {
	const fn = cx.expr(callback);
	if (fn.tag !== "lambda" || fn.payload[0].length !== 2) {
		return escape(cx.state, "enum_reduce", node.source, cx.loc(node));
	}
	const [elem, acc] = fn.payload[0];
	if (elem === undefined || acc === undefined) {
		return escape(cx.state, "enum_reduce", node.source, cx.loc(node));
	}
	const reordered = lambda([acc, elem], fn.payload[1], fn.meta);
	return collectionOp("reduce", reordered, cx.expr(collection), cx.expr(initial), cx.loc(node));
}

/** Enum.each(c, fn x -> body end) is a for_each loop. */
function liftEach(cx: ElixirContext, node: QNode, collection: Quoted, callback: Quoted): IrNode {
	const fnNode = asNode(callback);
	const clauses = fnNode !== undefined && isAtomNamed(fnNode.form, "fn") && Array.isArray(fnNode.args) ? fnNode.args : [];
	const clause = clauses.length === 1 && clauses[0] !== undefined ? asNode(clauses[0]) : undefined;
	const clauseArgs = clause?.args;
	if (clause === undefined || !Array.isArray(clauseArgs) || clauseArgs.length !== 2) {
		return liftPlainCall(cx, node, "Enum.each", [collection, callback]);
	}
	const [params, body] = clauseArgs;
	if (!Array.isArray(params) || params.length !== 1 || params[0] === undefined || body === undefined || isCallTo(params[0], "when")) {
		return liftPlainCall(cx, node, "Enum.each", [collection, callback]);
	}
	return loop("for_each", cx.pattern(params[0]), cx.expr(collection), cx.expr(body), cx.loc(node));
}
