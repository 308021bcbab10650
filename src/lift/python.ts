// STRATA Python Lift
// Converts Python ASTs (the `ast` module serialised to JSON) to IR trees.

import {
	assignment,
	asyncOperation,
	attributeAccess,
	augmentedAssignment,
	binaryOp,
	block,
	collectionOp,
	conditional,
	container,
	earlyReturn,
	exceptionHandling,
	float,
	functionCall,
	functionDef,
	inlineMatch,
	int,
	lambda,
	list,
	literal,
	loop,
	map,
	matchArm,
	nil,
	pair,
	paramDefault,
	paramName,
	paramPattern,
	str,
	tuple,
	unaryOp,
	variable,
} from "../builders.js";
import { type Result, TransformError } from "../errors.js";
import { isArguments, isAstNode, isModule, isName, type PyArguments, type PyNode } from "../native/python-types.js";
import type { IrNode, Meta, ParamNode } from "../types.js";
import {
	canonical,
	createLiftState,
	descend,
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

export function liftPython(native: unknown, options?: LiftOptions): Result<IrNode> {
	const state = createLiftState("python", options);
	return runLift(() => {
		if (!isAstNode(native)) {
			throw TransformError.unsupported("python node", native, "expected an object with a _type field");
		}
		return liftNode(state, native);
	});
}

//==============================================================================
// Tables
//==============================================================================

interface OperatorSpelling {
	operator: string;
	spelling: string;
}

const BINARY_OPERATORS: Readonly<Record<string, OperatorSpelling>> = {
	Add: { operator: "+", spelling: "+" },
	Sub: { operator: "-", spelling: "-" },
	Mult: { operator: "*", spelling: "*" },
	Div: { operator: "/", spelling: "/" },
	FloorDiv: { operator: "div", spelling: "//" },
	Mod: { operator: "rem", spelling: "%" },
	Pow: { operator: "**", spelling: "**" },
};

const COMPARE_OPERATORS: Readonly<Record<string, OperatorSpelling>> = {
	Eq: { operator: "==", spelling: "==" },
	NotEq: { operator: "!=", spelling: "!=" },
	Lt: { operator: "<", spelling: "<" },
	LtE: { operator: "<=", spelling: "<=" },
	Gt: { operator: ">", spelling: ">" },
	GtE: { operator: ">=", spelling: ">=" },
	Is: { operator: "===", spelling: "is" },
	IsNot: { operator: "!==", spelling: "is not" },
};

const BITWISE_OPERATORS: ReadonlySet<string> = new Set(["BitAnd", "BitOr", "BitXor", "LShift", "RShift", "Invert"]);

/** AST classes kept as language_specific, by hint. */
const ESCAPED_TYPES: Readonly<Record<string, string>> = {
	Import: "import",
	ImportFrom: "import",
	With: "with",
	AsyncWith: "with",
	Yield: "yield",
	YieldFrom: "yield",
	Raise: "raise",
	Assert: "assert",
	Global: "scope_declaration",
	Nonlocal: "scope_declaration",
	Delete: "del",
	Match: "match",
	NamedExpr: "walrus",
	JoinedStr: "f_string",
	FormattedValue: "f_string",
	Subscript: "subscript",
	Slice: "subscript",
	Set: "set",
	SetComp: "comprehension",
	DictComp: "comprehension",
	GeneratorExp: "comprehension",
	Starred: "starred",
	AsyncFunctionDef: "async_def",
	AsyncFor: "async_for",
	TryStar: "try_star",
	AnnAssign: "annotated_assignment",
	TypeAlias: "type_alias",
};

//==============================================================================
// Field access
//==============================================================================

function child(node: PyNode, field: string): PyNode {
	const value = node[field];
	if (!isAstNode(value)) {
		throw TransformError.unsupported(node._type, node, `field ${field} is not an AST node`);
	}
	return value;
}

function optionalChild(node: PyNode, field: string): PyNode | null {
	const value = node[field];
	if (value === null || value === undefined) return null;
	return child(node, field);
}

function children(node: PyNode, field: string): PyNode[] {
	const value = node[field];
	if (value === undefined) return [];
	if (!Array.isArray(value) || !value.every(isAstNode)) {
		throw TransformError.unsupported(node._type, node, `field ${field} is not a list of AST nodes`);
	}
	return value;
}

function text(node: PyNode, field: string): string {
	const value = node[field];
	if (typeof value !== "string") {
		throw TransformError.unsupported(node._type, node, `field ${field} is not a string`);
	}
	return value;
}

function opType(node: PyNode, field = "op"): string {
	return child(node, field)._type;
}

function loc(state: LiftState, node: PyNode): Meta {
	const line = node.lineno;
	const column = node.col_offset;
	return locationMeta(
		state,
		typeof line === "number" ? line : undefined,
		typeof column === "number" ? column + 1 : undefined,
	);
}

//==============================================================================
// Dispatch
//==============================================================================

function liftNode(state: LiftState, node: PyNode): IrNode {
	descend(state, node);
	try {
		return convertNode(state, node);
	} finally {
		state.depth--;
	}
}

function convertNode(state: LiftState, node: PyNode): IrNode {
	const meta = loc(state, node);
	const lift = (n: PyNode): IrNode => liftNode(state, n);

	switch (node._type) {
	case "Module":
		if (!isModule(node)) throw TransformError.unsupported("Module", node, "body is not a statement list");
		return liftBody(state, node.body);
	case "Expression":
	case "Expr":
		return lift(child(node, node._type === "Expr" ? "value" : "body"));
	case "Pass":
		return block([], meta);

	// Literals and names
	case "Constant":
		return liftConstant(state, node, meta);
	case "Name":
		return variable(text(node, "id"), meta);
	case "List":
		return list(children(node, "elts").map(lift), meta);
	case "Tuple":
		return tuple(children(node, "elts").map(lift), meta);
	case "Dict":
		return liftDict(state, node, meta);
	case "Attribute":
		return attributeAccess(lift(child(node, "value")), text(node, "attr"), meta);

	// Operators
	case "BinOp":
		return liftBinOp(state, node, meta);
	case "UnaryOp":
		return liftUnaryOp(state, node, meta);
	case "BoolOp":
		return liftBoolOp(state, node, meta);
	case "Compare":
		return liftCompare(state, node, meta);

	// Control flow
	case "IfExp":
		return conditional(lift(child(node, "test")), lift(child(node, "body")), lift(child(node, "orelse")), meta);
	case "If": {
		const orelse = children(node, "orelse");
		return conditional(
			lift(child(node, "test")),
			liftBody(state, children(node, "body")),
			orelse.length === 0 ? null : liftBody(state, orelse),
			meta,
		);
	}
	case "Return": {
		const value = optionalChild(node, "value");
		return earlyReturn("return", value === null ? null : lift(value), meta);
	}
	case "Break":
		return earlyReturn("break", null, meta);
	case "Continue":
		return earlyReturn("continue", null, meta);
	case "While":
		if (children(node, "orelse").length > 0) return escape(state, "loop_else", node, meta);
		return loop("while", null, lift(child(node, "test")), liftBody(state, children(node, "body")), meta);
	case "For":
		if (children(node, "orelse").length > 0) return escape(state, "loop_else", node, meta);
		return loop(
			"for_each",
			lift(child(node, "target")),
			lift(child(node, "iter")),
			liftBody(state, children(node, "body")),
			meta,
		);
	case "Try":
		return liftTry(state, node, meta);

	// Bindings
	case "Assign":
		return liftAssign(state, node, meta);
	case "AugAssign":
		return liftAugAssign(state, node, meta);

	// Functions and calls
	case "Call":
		return liftCall(state, node, meta);
	case "Lambda": {
		const params = liftParams(state, child(node, "args"));
		if (params === undefined) return escape(state, "variadic_params", node, meta);
		return lambda(params, lift(child(node, "body")), meta);
	}
	case "ListComp":
		return liftListComp(state, node, meta);
	case "FunctionDef":
		return liftFunctionDef(state, node, meta);
	case "ClassDef":
		return liftClassDef(state, node, meta);
	case "Await":
		return asyncOperation("await", lift(child(node, "value")), meta);
	}

	const hint = own(ESCAPED_TYPES, node._type);
	if (hint !== undefined) return escape(state, hint, node, meta);
	throw TransformError.unsupported(node._type, node, "unknown Python AST class");
}

/** A statement list: one statement stands alone, several form a block. */
function liftBody(state: LiftState, statements: PyNode[]): IrNode {
	const [only] = statements;
	if (statements.length === 1 && only !== undefined) return liftNode(state, only);
	return block(statements.map((s) => liftNode(state, s)));
}

//==============================================================================
// Literals and data
//==============================================================================

function liftConstant(state: LiftState, node: PyNode, meta: Meta): IrNode {
	const value = node.value;
	if (typeof value === "boolean") return literal(["boolean", value], meta);
	if (typeof value === "number") return Number.isInteger(value) ? int(value, meta) : float(value, meta);
	if (typeof value === "string") return str(value, meta);
	if (value === null) return nil(meta);
	return escape(state, "constant", node, meta);
}

function liftDict(state: LiftState, node: PyNode, meta: Meta): IrNode {
	const keys = node.keys;
	const values = children(node, "values");
	if (!Array.isArray(keys) || keys.length !== values.length) {
		throw TransformError.unsupported("Dict", node, "keys and values differ in length");
	}
	if (keys.some((k) => k === null)) return escape(state, "dict_unpack", node, meta);
	const pairs = values.map((value, i) => {
		const key: unknown = keys[i];
		if (!isAstNode(key)) throw TransformError.unsupported("Dict", node, "key is not an AST node");
		return pair(liftNode(state, key), liftNode(state, value));
	});
	return map(pairs, meta);
}

//==============================================================================
// Operators
//==============================================================================

function liftBinOp(state: LiftState, node: PyNode, meta: Meta): IrNode {
	const op = opType(node);
	const entry = own(BINARY_OPERATORS, op);
	const target = entry === undefined ? undefined : canonical(entry.operator);
	if (entry === undefined || target === undefined) {
		return escape(state, BITWISE_OPERATORS.has(op) ? "bitwise_operator" : "operator", node, meta);
	}
	return binaryOp(
		target.category,
		target.operator,
		liftNode(state, child(node, "left")),
		liftNode(state, child(node, "right")),
		withMeta(meta, spellingMeta(entry.spelling, target.operator)),
	);
}

function liftUnaryOp(state: LiftState, node: PyNode, meta: Meta): IrNode {
	const operand = (): IrNode => liftNode(state, child(node, "operand"));
	switch (opType(node)) {
	case "Not":
		return unaryOp("boolean", "not", operand(), meta);
	case "USub":
		return unaryOp("arithmetic", "-", operand(), meta);
	case "UAdd":
		return unaryOp("arithmetic", "+", operand(), meta);
	default:
		return escape(state, "bitwise_operator", node, meta);
	}
}

/** `a and b and c` is a left-associative chain. */
function liftBoolOp(state: LiftState, node: PyNode, meta: Meta): IrNode {
	const operator = opType(node) === "And" ? "and" : "or";
	const [first, ...rest] = children(node, "values").map((v) => liftNode(state, v));
	if (first === undefined || rest.length === 0) {
		throw TransformError.unsupported("BoolOp", node, "needs at least two operands");
	}
	return rest.reduce<IrNode>((left, right) => binaryOp("boolean", operator, left, right, meta), first);
}

function liftCompare(state: LiftState, node: PyNode, meta: Meta): IrNode {
	const ops = children(node, "ops");
	const comparators = children(node, "comparators");
	const [op] = ops;
	const [right] = comparators;
	if (ops.length !== 1 || op === undefined || right === undefined) {
		return escape(state, "chained_comparison", node, meta);
	}
	const entry = own(COMPARE_OPERATORS, op._type);
	if (entry === undefined) return escape(state, "membership", node, meta);
	return binaryOp(
		"comparison",
		entry.operator,
		liftNode(state, child(node, "left")),
		liftNode(state, right),
		withMeta(meta, spellingMeta(entry.spelling, entry.operator)),
	);
}

//==============================================================================
// Bindings
//==============================================================================

/** `a = b = v` nests right to left: assignment(a, assignment(b, v)). */
function liftAssign(state: LiftState, node: PyNode, meta: Meta): IrNode {
	const targets = children(node, "targets");
	if (targets.length === 0) throw TransformError.unsupported("Assign", node, "no targets");
	return targets.reduceRight<IrNode>(
		(value, target) => assignment(liftNode(state, target), value, meta),
		liftNode(state, child(node, "value")),
	);
}

function liftAugAssign(state: LiftState, node: PyNode, meta: Meta): IrNode {
	const op = opType(node);
	const entry = own(BINARY_OPERATORS, op);
	if (entry === undefined) {
		return escape(state, BITWISE_OPERATORS.has(op) ? "bitwise_operator" : "operator", node, meta);
	}
	return augmentedAssignment(
		"arithmetic",
		entry.operator,
		liftNode(state, child(node, "target")),
		liftNode(state, child(node, "value")),
		withMeta(meta, spellingMeta(entry.spelling, entry.operator)),
	);
}

//==============================================================================
// Calls
//==============================================================================

/** `a.b.c` as a dotted name; undefined when the receiver is not a name chain. */
function dottedName(node: PyNode): string | undefined {
	const chain: PyNode[] = [];
	let current = node;
	while (current._type === "Attribute") {
		chain.push(current);
		current = child(current, "value");
	}
	if (!isName(current)) return undefined;
	return [text(current, "id"), ...chain.reverse().map((n) => text(n, "attr"))].join(".");
}

function liftCall(state: LiftState, node: PyNode, meta: Meta): IrNode {
	const args = children(node, "args");
	if (children(node, "keywords").length > 0 || args.some((a) => a._type === "Starred")) {
		return escape(state, "keyword_arguments", node, meta);
	}
	const name = dottedName(child(node, "func"));
	if (name === undefined) return escape(state, "method_call", node, meta);

	const [first, second, third] = args;
	if ((name === "functools.reduce" || name === "reduce") && first !== undefined && second !== undefined && third !== undefined && args.length === 3) {
		return collectionOp("reduce", liftNode(state, first), liftNode(state, second), liftNode(state, third), meta);
	}
	if (name === "list" && first !== undefined && args.length === 1) {
		const wrapped = liftListOfIterator(state, first, meta);
		if (wrapped !== undefined) return wrapped;
	}
	return functionCall(name, args.map((a) => liftNode(state, a)), meta);
}

/** `list(map(f, xs))` and `list(filter(f, xs))`. */
function liftListOfIterator(state: LiftState, inner: PyNode, meta: Meta): IrNode | undefined {
	if (inner._type !== "Call" || children(inner, "keywords").length > 0) return undefined;
	const func = child(inner, "func");
	const op = isName(func, "map") ? "map" : isName(func, "filter") ? "filter" : undefined;
	const args = children(inner, "args");
	const [fn, source] = args;
	if (op === undefined || args.length !== 2 || fn === undefined || source === undefined) return undefined;
	return collectionOp(op, liftNode(state, fn), liftNode(state, source), null, meta);
}

/**
 * `[e for x in xs]` is a map and `[x for x in xs if c]` a filter; anything
 * with more generators or conditions stays native.
 */
function liftListComp(state: LiftState, node: PyNode, meta: Meta): IrNode {
	const generators = children(node, "generators");
	const [generator] = generators;
	if (generators.length !== 1 || generator === undefined || generator.is_async === 1) {
		return escape(state, "comprehension", node, meta);
	}
	const target = child(generator, "target");
	const source = liftNode(state, child(generator, "iter"));
	const ifs = children(generator, "ifs");
	const elt = child(node, "elt");
	const param = isName(target) ? paramName(text(target, "id")) : paramPattern(liftNode(state, target));

	const [condition] = ifs;
	if (ifs.length === 0) {
		return collectionOp("map", lambda([param], liftNode(state, elt)), source, null, meta);
	}
	if (ifs.length === 1 && condition !== undefined && isName(target) && isName(elt, text(target, "id"))) {
		return collectionOp("filter", lambda([param], liftNode(state, condition)), source, null, meta);
	}
	return escape(state, "comprehension", node, meta);
}

//==============================================================================
// Definitions
//==============================================================================

/** Plain positional parameters with trailing defaults; undefined otherwise. */
function liftParams(state: LiftState, node: PyNode): ParamNode[] | undefined {
	if (!isArguments(node)) {
		throw TransformError.unsupported("arguments", node, "malformed parameter list");
	}
	if (!isPlainArguments(node)) return undefined;
	const offset = node.args.length - node.defaults.length;
	return node.args.map((a, i) => {
		const fallback = i >= offset ? node.defaults[i - offset] : undefined;
		return fallback === undefined ? paramName(a.arg) : paramDefault(a.arg, liftNode(state, fallback));
	});
}

function isPlainArguments(node: PyArguments): boolean {
	return node.posonlyargs.length === 0 && node.vararg === null && node.kwonlyargs.length === 0 && node.kwarg === null;
}

function hasAnnotations(node: PyNode): boolean {
	const params = node.args;
	if (node.returns !== null && node.returns !== undefined) return true;
	if (!isArguments(params)) return false;
	return params.args.some((a) => a.annotation !== null && a.annotation !== undefined);
}

/** Does a function body yield? Nested scopes are not searched. */
function containsYield(statements: PyNode[]): boolean {
	const stack: unknown[] = [...statements];
	while (stack.length > 0) {
		const item = stack.pop();
		if (Array.isArray(item)) {
			stack.push(...item);
			continue;
		}
		if (!isAstNode(item)) continue;
		if (item._type === "Yield" || item._type === "YieldFrom") return true;
		if (item._type === "FunctionDef" || item._type === "AsyncFunctionDef" || item._type === "Lambda" || item._type === "ClassDef") {
			continue;
		}
		for (const value of Object.values(item)) {
			if (typeof value === "object" && value !== null) stack.push(value);
		}
	}
	return false;
}

function liftFunctionDef(state: LiftState, node: PyNode, meta: Meta): IrNode {
	if (children(node, "decorator_list").length > 0) return escape(state, "decorated_def", node, meta);
	if (children(node, "type_params").length > 0) return escape(state, "generic_def", node, meta);
	if (hasAnnotations(node)) return escape(state, "annotated_def", node, meta);
	const body = children(node, "body");
	if (containsYield(body)) return escape(state, "generator", node, meta);

	const params = liftParams(state, child(node, "args"));
	if (params === undefined) return escape(state, "variadic_params", node, meta);
	const name = text(node, "name");
	const visibility = name.startsWith("_") && !name.startsWith("__") ? "private" : "public";
	return functionDef(name, params, liftBody(state, body), withMeta(meta, { visibility }));
}

function liftClassDef(state: LiftState, node: PyNode, meta: Meta): IrNode {
	if (children(node, "bases").length > 0 || children(node, "keywords").length > 0) {
		return escape(state, "class_inheritance", node, meta);
	}
	if (children(node, "decorator_list").length > 0) return escape(state, "decorated_class", node, meta);
	const body = children(node, "body");
	const members = body.length === 1 && body[0]?._type === "Pass" ? [] : body;
	return container("class", text(node, "name"), members.map((s) => liftNode(state, s)), meta);
}

//==============================================================================
// Exceptions
//==============================================================================

/** `except T as e` binds through inline_match(variable(e), T). */
function liftTry(state: LiftState, node: PyNode, meta: Meta): IrNode {
	if (children(node, "orelse").length > 0) return escape(state, "try_else", node, meta);
	const handlers = children(node, "handlers").map((handler) => {
		const type = optionalChild(handler, "type");
		const bound = handler.name;
		let pattern: IrNode | null = null;
		if (type !== null) {
			const lifted = liftNode(state, type);
			pattern = typeof bound === "string" ? inlineMatch(variable(bound), lifted) : lifted;
		}
		return matchArm(pattern, null, liftBody(state, children(handler, "body")), loc(state, handler));
	});
	const finalbody = children(node, "finalbody");
	return exceptionHandling(
		liftBody(state, children(node, "body")),
		handlers,
		finalbody.length === 0 ? null : liftBody(state, finalbody),
		meta,
	);
}
