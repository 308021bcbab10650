// STRATA Python Lower
// Renders IR trees as Python ASTs (JSON form of the `ast` module).

import type { Result } from "../errors.js";
import { own } from "../lift/shared.js";
import {
	arg,
	args,
	constant,
	isAstNode,
	isStatement,
	module,
	name,
	py,
	type PyArg,
	type PyNode,
	store,
} from "../native/python-types.js";
import type {
	CollectionOpNode,
	ExceptionHandlingNode,
	IrNode,
	LanguageSpecificNode,
	LiteralNode,
	MatchArmNode,
	ParamNode,
	PatternMatchNode,
} from "../types.js";
import {
	createLowerState,
	type LowerOptions,
	type LowerState,
	lowerNative,
	metaNumber,
	metaString,
	note,
	runLower,
	unsupported,
} from "./shared.js";

type State = LowerState<"python">;

//==============================================================================
// Public API
//==============================================================================

/**
 * Lower a tree to a Python Module. An escape-hatch root is returned as the
 * native node it wraps.
 */
export function lowerPython(tree: unknown, options?: LowerOptions): Result<PyNode> {
	const state = createLowerState("python", options);
	return runLower(tree, (root) => {
		if (root.tag === "language_specific") return native(state, root);
		return module(statements(state, root));
	});
}

//==============================================================================
// Tables
//==============================================================================

const ARITHMETIC: Readonly<Record<string, string>> = {
	"+": "Add",
	"-": "Sub",
	"*": "Mult",
	"/": "Div",
	div: "FloorDiv",
	rem: "Mod",
	"**": "Pow",
	"<>": "Add",
};

const COMPARISON: Readonly<Record<string, string>> = {
	"==": "Eq",
	"!=": "NotEq",
	"<": "Lt",
	"<=": "LtE",
	">": "Gt",
	">=": "GtE",
	"===": "Is",
	"!==": "IsNot",
};

const UNARY: Readonly<Record<string, string>> = {
	not: "Not",
	"-": "USub",
	"+": "UAdd",
};

/** Inline flag groups Python's re module understands. */
const REGEX_FLAGS = new Set(["i", "m", "s", "x"]);

//==============================================================================
// Helpers
//==============================================================================

/** Build a node carrying the source position, when the IR has one. IR columns count from 1. */
function at(source: IrNode, type: string, fields: Record<string, unknown>): PyNode {
	const line = metaNumber(source, "line");
	const column = metaNumber(source, "column");
	return py(type, {
		...fields,
		...(line === undefined ? {} : { lineno: line }),
		...(column === undefined ? {} : { col_offset: column - 1 }),
	});
}

/** `a.b.c` as a Name/Attribute chain. */
function dotted(id: string): PyNode {
	const [first, ...rest] = id.split(".");
	return rest.reduce((value, attr) => py("Attribute", { value, attr, ctx: py("Load") }), name(first ?? id));
}

function native(state: State, node: LanguageSpecificNode): PyNode {
	return lowerNative(state, node, isAstNode);
}

/** Statement list for a suite; Python suites are never empty. */
function suite(state: State, node: IrNode): PyNode[] {
	const lowered = statements(state, node);
	return lowered.length === 0 ? [py("Pass")] : lowered;
}

function operatorNode(table: Readonly<Record<string, string>>, state: State, node: IrNode, operator: string): PyNode {
	const type = own(table, operator);
	if (type === undefined) unsupported(state, node, `operator ${operator} has no rendering`);
	return py(type);
}

//==============================================================================
// Statements
//==============================================================================

function statements(state: State, node: IrNode): PyNode[] {
	switch (node.tag) {
	case "block":
		return node.payload.flatMap((s) => statements(state, s));
	case "conditional": {
		const [test, then, otherwise] = node.payload;
		return [at(node, "If", {
			test: expression(state, test),
			body: suite(state, then),
			orelse: otherwise === null ? [] : suite(state, otherwise),
		})];
	}
	case "early_return": {
		const [kind, value] = node.payload;
		if (kind === "return") {
			return [at(node, "Return", { value: value === null ? null : expression(state, value) })];
		}
		if (value !== null) unsupported(state, node, `${kind} with a value`);
		return [at(node, kind === "break" ? "Break" : "Continue", {})];
	}
	case "assignment": {
		// Chained assignment collapses into one Assign with several targets.
		const targets: PyNode[] = [];
		let current: IrNode = node;
		while (current.tag === "assignment") {
			targets.push(target(state, current.payload[0]));
			current = current.payload[1];
		}
		return [at(node, "Assign", { targets, value: expression(state, current), type_comment: null })];
	}
	case "inline_match":
		note(state, "match rendered as assignment");
		return [at(node, "Assign", {
			targets: [target(state, node.payload[0])],
			value: expression(state, node.payload[1]),
			type_comment: null,
		})];
	case "augmented_assignment": {
		const [, operator, assigned, value] = node.payload;
		return [at(node, "AugAssign", {
			target: target(state, assigned),
			op: operatorNode(ARITHMETIC, state, node, operator),
			value: expression(state, value),
		})];
	}
	case "loop": {
		const [kind, binding, source, body] = node.payload;
		if (kind === "while") {
			return [at(node, "While", { test: expression(state, source), body: suite(state, body), orelse: [] })];
		}
		if (binding === null) unsupported(state, node, "for_each without a binding");
		return [at(node, "For", {
			target: target(state, binding),
			iter: expression(state, source),
			body: suite(state, body),
			orelse: [],
			type_comment: null,
		})];
	}
	case "function_def": {
		const [fname, params, body] = node.payload;
		return [at(node, "FunctionDef", {
			name: fname,
			args: parameters(state, params),
			body: suite(state, body),
			decorator_list: [],
			returns: null,
			type_comment: null,
			type_params: [],
		})];
	}
	case "container": {
		const [kind, cname, members] = node.payload;
		if (kind !== "class") note(state, `${kind} ${cname} rendered as a class`);
		const body = members.flatMap((m) => statements(state, m));
		return [at(node, "ClassDef", {
			name: cname,
			bases: [],
			keywords: [],
			body: body.length === 0 ? [py("Pass")] : body,
			decorator_list: [],
			type_params: [],
		})];
	}
	case "exception_handling":
		return [lowerTry(state, node)];
	case "pattern_match":
		return [lowerMatch(state, node)];
	case "property":
		return unsupported(state, node, "property");
	case "language_specific": {
		const lowered = native(state, node);
		if (lowered._type === "Module" && Array.isArray(lowered.body) && lowered.body.every(isAstNode)) {
			return lowered.body;
		}
		return [isStatement(lowered) ? lowered : py("Expr", { value: lowered })];
	}
	default:
		return [at(node, "Expr", { value: expression(state, node) })];
	}
}

/** Assignment and loop targets, in Store context. */
function target(state: State, node: IrNode): PyNode {
	switch (node.tag) {
	case "variable":
		if (node.payload.includes(".")) unsupported(state, node, "dotted assignment target");
		return at(node, "Name", { id: node.payload, ctx: store() });
	case "tuple":
		return at(node, "Tuple", { elts: node.payload.map((n) => target(state, n)), ctx: store() });
	case "list":
		return at(node, "List", { elts: node.payload.map((n) => target(state, n)), ctx: store() });
	case "attribute_access":
		return at(node, "Attribute", {
			value: expression(state, node.payload[0]),
			attr: node.payload[1],
			ctx: store(),
		});
	default:
		return unsupported(state, node, `${node.tag} as an assignment target`);
	}
}

function parameters(state: State, params: ParamNode[]): PyNode {
	const names: PyArg[] = [];
	const defaults: PyNode[] = [];
	for (const param of params) {
		const payload = param.payload;
		switch (payload[0]) {
		case "name":
			if (defaults.length > 0) unsupported(state, param, "parameter without default after one with a default");
			names.push(arg(payload[1]));
			break;
		case "default":
			names.push(arg(payload[1]));
			defaults.push(expression(state, payload[2]));
			break;
		case "pattern":
			unsupported(state, param, "destructuring parameter");
		}
	}
	return args(names, defaults);
}

//==============================================================================
// Exceptions and matching
//==============================================================================

function lowerTry(state: State, node: ExceptionHandlingNode): PyNode {
	const [body, handlers, cleanup] = node.payload;
	return at(node, "Try", {
		body: suite(state, body),
		handlers: handlers.map((arm) => handler(state, arm)),
		orelse: [],
		finalbody: cleanup === null ? [] : suite(state, cleanup),
	});
}

/**
 * `except T as e` from inline_match(variable(e), T). A bare capitalised or
 * dotted variable is the type; any other bare variable binds `Exception`.
 */
function handler(state: State, arm: MatchArmNode): PyNode {
	const [pattern, guard, body] = arm.payload;
	if (guard !== null) unsupported(state, arm, "guarded exception handler");
	if (metaString(arm, "handler") === "catch") unsupported(state, arm, "thrown-value handler");
	let type: PyNode | null = null;
	let bound: string | null = null;
	const binding = pattern?.tag === "inline_match" ? pattern.payload[0] : undefined;
	if (pattern?.tag === "inline_match" && binding?.tag === "variable") {
		bound = binding.payload;
		type = expression(state, pattern.payload[1]);
	} else if (pattern?.tag === "variable" && !/^[A-Z]/.test(pattern.payload) && !pattern.payload.includes(".")) {
		type = at(pattern, "Name", { id: "Exception", ctx: py("Load") });
		bound = pattern.payload === "_" ? null : pattern.payload;
	} else if (pattern !== null) {
		type = expression(state, pattern);
	}
	return at(arm, "ExceptHandler", { type, name: bound, body: suite(state, body) });
}

function lowerMatch(state: State, node: PatternMatchNode): PyNode {
	const [subject, arms] = node.payload;
	return at(node, "Match", {
		subject: expression(state, subject),
		cases: arms.map((arm) => {
			const [pattern, guard, body] = arm.payload;
			return py("match_case", {
				pattern: matchPattern(state, pattern, arm),
				guard: guard === null ? null : expression(state, guard),
				body: suite(state, body),
			});
		}),
	});
}

function matchPattern(state: State, pattern: IrNode | null, arm: MatchArmNode): PyNode {
	if (pattern === null) return py("MatchAs", { pattern: null, name: null });
	switch (pattern.tag) {
	case "variable":
		return py("MatchAs", { pattern: null, name: pattern.payload === "_" ? null : pattern.payload });
	case "literal": {
		const payload = pattern.payload;
		switch (payload[0]) {
		case "null":
		case "boolean":
			return py("MatchSingleton", { value: payload[1] });
		case "integer":
		case "float":
		case "string":
			return py("MatchValue", { value: constant(payload[1]) });
		default:
			return unsupported(state, arm, `${payload[0]} literal pattern`);
		}
	}
	case "tuple":
	case "list":
		return py("MatchSequence", { patterns: pattern.payload.map((p) => matchPattern(state, p, arm)) });
	default:
		return unsupported(state, arm, `${pattern.tag} pattern`);
	}
}

//==============================================================================
// Expressions
//==============================================================================

function expression(state: State, node: IrNode): PyNode {
	const expr = (n: IrNode): PyNode => expression(state, n);
	switch (node.tag) {
	case "literal":
		return lowerLiteral(state, node);
	case "variable":
		if (node.payload.startsWith("@")) unsupported(state, node, "module attribute");
		return node.payload.includes(".") ? dotted(node.payload) : at(node, "Name", { id: node.payload, ctx: py("Load") });
	case "list":
		return at(node, "List", { elts: node.payload.map(expr), ctx: py("Load") });
	case "tuple":
		return at(node, "Tuple", { elts: node.payload.map(expr), ctx: py("Load") });
	case "map":
		return at(node, "Dict", {
			keys: node.payload.map((p) => expr(p.payload[0])),
			values: node.payload.map((p) => expr(p.payload[1])),
		});
	case "pair":
		return at(node, "Tuple", { elts: node.payload.map(expr), ctx: py("Load") });
	case "binary_op": {
		const [category, operator, left, right] = node.payload;
		if (category === "boolean") {
			return at(node, "BoolOp", { op: py(operator === "and" ? "And" : "Or"), values: [expr(left), expr(right)] });
		}
		if (category === "comparison") {
			return at(node, "Compare", {
				left: expr(left),
				ops: [operatorNode(COMPARISON, state, node, operator)],
				comparators: [expr(right)],
			});
		}
		if (operator === "<>") note(state, "string concatenation rendered as +");
		return at(node, "BinOp", { left: expr(left), op: operatorNode(ARITHMETIC, state, node, operator), right: expr(right) });
	}
	case "unary_op":
		return at(node, "UnaryOp", {
			op: operatorNode(UNARY, state, node, node.payload[1]),
			operand: expr(node.payload[2]),
		});
	case "function_call":
		return at(node, "Call", { func: dotted(node.payload[0]), args: node.payload[1].map(expr), keywords: [] });
	case "conditional": {
		const [test, then, otherwise] = node.payload;
		return at(node, "IfExp", {
			test: expr(test),
			body: expr(then),
			orelse: otherwise === null ? constant(null) : expr(otherwise),
		});
	}
	case "block": {
		const [only] = node.payload;
		if (node.payload.length === 0) return constant(null);
		if (node.payload.length === 1 && only !== undefined) return expr(only);
		note(state, "expression block rendered as a tuple index");
		return at(node, "Subscript", {
			value: py("Tuple", { elts: node.payload.map(expr), ctx: py("Load") }),
			slice: constant(-1),
			ctx: py("Load"),
		});
	}
	case "assignment":
	case "inline_match": {
		const [assigned, value] = node.payload;
		if (assigned.tag !== "variable") unsupported(state, node, "destructuring in expression position");
		return at(node, "NamedExpr", { target: target(state, assigned), value: expr(value) });
	}
	case "lambda":
		return at(node, "Lambda", { args: parameters(state, node.payload[0]), body: expr(node.payload[1]) });
	case "collection_op":
		return lowerCollectionOp(state, node);
	case "async_operation": {
		const [kind, operation] = node.payload;
		if (kind === "await") return at(node, "Await", { value: expr(operation) });
		note(state, "async rendered as asyncio.ensure_future");
		return at(node, "Call", { func: dotted("asyncio.ensure_future"), args: [expr(operation)], keywords: [] });
	}
	case "attribute_access":
		return at(node, "Attribute", { value: expr(node.payload[0]), attr: node.payload[1], ctx: py("Load") });
	case "language_specific": {
		const lowered = native(state, node);
		if (isStatement(lowered)) unsupported(state, node, "statement in expression position");
		return lowered;
	}
	default:
		return unsupported(state, node, `${node.tag} has no expression form`);
	}
}

function lowerLiteral(state: State, node: LiteralNode): PyNode {
	const payload = node.payload;
	switch (payload[0]) {
	case "symbol":
		note(state, `symbol ${payload[1]} rendered as a string`);
		return at(node, "Constant", { value: payload[1], kind: null });
	case "regex": {
		const { source, flags } = payload[1];
		const kept = [...flags].filter((f) => REGEX_FLAGS.has(f)).join("");
		if (kept.length !== flags.length) note(state, `regex flags ${flags} reduced to ${kept}`);
		const pattern = kept === "" ? source : `(?${kept})${source}`;
		return at(node, "Call", { func: dotted("re.compile"), args: [constant(pattern)], keywords: [] });
	}
	default:
		return at(node, "Constant", { value: payload[1], kind: null });
	}
}

/** Single-parameter lambdas become comprehensions; other callables go through map/filter. */
function lowerCollectionOp(state: State, node: CollectionOpNode): PyNode {
	const [op, fn, collection, initial] = node.payload;
	const iter = expression(state, collection);
	if (op === "reduce") {
		const seed = initial === null ? [] : [expression(state, initial)];
		return at(node, "Call", { func: dotted("functools.reduce"), args: [expression(state, fn), iter, ...seed], keywords: [] });
	}

	const [param] = fn.tag === "lambda" ? fn.payload[0] : [];
	const shape = param?.payload;
	if (fn.tag === "lambda" && fn.payload[0].length === 1 && shape !== undefined && shape[0] !== "default") {
		const bound = shape[0] === "name" ? name(shape[1], store()) : target(state, shape[1]);
		const body = expression(state, fn.payload[1]);
		const generator = py("comprehension", { target: bound, iter, ifs: op === "filter" ? [body] : [], is_async: 0 });
		if (op === "map") return at(node, "ListComp", { elt: body, generators: [generator] });
		if (shape[0] === "name") {
			return at(node, "ListComp", { elt: name(shape[1]), generators: [generator] });
		}
	}
	const inner = py("Call", { func: name(op), args: [expression(state, fn), iter], keywords: [] });
	return at(node, "Call", { func: name("list"), args: [inner], keywords: [] });
}
