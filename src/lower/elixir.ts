// STRATA Elixir Lower
// Renders IR trees as Elixir quoted expressions (JSON-encoded).

import type { Result } from "../errors.js";
import {
	alias,
	atom,
	call,
	float,
	isQuoted,
	kw,
	type Keyword,
	type Quoted,
	ref,
	remote,
	tuple,
} from "../native/elixir-types.js";
import type {
	CollectionOpNode,
	ConditionalNode,
	ExceptionHandlingNode,
	FunctionCallNode,
	IrNode,
	LiteralNode,
	LoopNode,
	MatchArmNode,
	ParamNode,
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

type State = LowerState<"elixir">;

//==============================================================================
// Public API
//==============================================================================

export function lowerElixir(tree: unknown, options?: LowerOptions): Result<Quoted> {
	const state = createLowerState("elixir", options);
	return runLower(tree, (node) => lower(state, node));
}

//==============================================================================
// Helpers
//==============================================================================

const ALIAS_NAME = /^[A-Z][A-Za-z0-9_]*(\.[A-Z][A-Za-z0-9_]*)*$/;
const VARIABLE_NAME = /^[a-z_][A-Za-z0-9_]*$/;
const FUNCTION_NAME = /^[a-z_][A-Za-z0-9_]*[?!]?$/;
const OPERATOR_NAME = /^[-!%&*+./:<=>@\\^|~]+$/;

/** Alternative operator spellings Elixir has; other recorded spellings belong to other languages. */
const ELIXIR_SPELLINGS: ReadonlySet<string> = new Set(["&&", "||", "!"]);

function spelling(node: IrNode, operator: string): string {
	const original = metaString(node, "original_operator");
	return original !== undefined && ELIXIR_SPELLINGS.has(original) ? original : operator;
}

/** Node metadata: only the line number travels back. */
function lineMeta(node: IrNode): Keyword {
	const line = metaNumber(node, "line");
	return line === undefined ? [] : kw({ line });
}

function body(state: State, statements: IrNode[]): Quoted {
	if (statements.length === 1 && statements[0] !== undefined) return lower(state, statements[0]);
	return call("__block__", statements.map((s) => lower(state, s)));
}

//==============================================================================
// Dispatch
//==============================================================================

function lower(state: State, node: IrNode): Quoted {
	const meta = lineMeta(node);
	switch (node.tag) {
	case "literal":
		return lowerLiteral(node);
	case "variable":
		return lowerVariable(node.payload, meta);
	case "list":
		return node.payload.map((item) => lower(state, item));
	case "tuple": {
		const items = node.payload.map((item) => lower(state, item));
		return items.length === 2 ? tuple(...items) : call("{}", items, meta);
	}
	case "map":
		return call("%{}", node.payload.map((p) => tuple(lower(state, p.payload[0]), lower(state, p.payload[1]))), meta);
	case "pair":
		return tuple(lower(state, node.payload[0]), lower(state, node.payload[1]));
	case "binary_op": {
		const [, operator, left, right] = node.payload;
		return call(spelling(node, operator), [lower(state, left), lower(state, right)], meta);
	}
	case "unary_op": {
		const [, operator, operand] = node.payload;
		return call(spelling(node, operator), [lower(state, operand)], meta);
	}
	case "function_call":
		return lowerCall(state, node, node.payload[1].map((a) => lower(state, a)), meta);
	case "conditional":
		return lowerConditional(state, node);
	case "block":
		return call("__block__", node.payload.map((s) => lower(state, s)), meta);
	case "early_return": {
		const [kind, value] = node.payload;
		note(state, `${kind} rendered as throw`);
		return call("throw", [tuple(atom(kind), value === null ? null : lower(state, value))], meta);
	}
	case "assignment": {
		const [target, value] = node.payload;
		if (target.tag === "variable" && target.payload.startsWith("@")) {
			return call("@", [call(target.payload.slice(1), [lower(state, value)])], meta);
		}
		return call("=", [lower(state, target), lower(state, value)], meta);
	}
	case "inline_match":
		return call("=", [lower(state, node.payload[0]), lower(state, node.payload[1])], meta);
	case "loop":
		return lowerLoop(state, node);
	case "lambda":
		return fn(state, node.payload[0], node.payload[1]);
	case "collection_op":
		return lowerCollectionOp(state, node);
	case "pattern_match": {
		const [scrutinee, arms] = node.payload;
		return call("case", [lower(state, scrutinee), kw({ do: arms.map((a) => clause(state, a)) })], meta);
	}
	case "match_arm":
		return unsupported(state, node, "match arm outside pattern_match or exception_handling");
	case "exception_handling":
		return lowerTry(state, node);
	case "async_operation": {
		const [kind, operation] = node.payload;
		if (kind === "await") return remote("Task", "await", [lower(state, operation)], meta);
		const thunk = operation.tag === "lambda" && operation.payload[0].length === 0
			? lower(state, operation)
			: call("fn", [call("->", [[], lower(state, operation)])]);
		return remote("Task", "async", [thunk], meta);
	}
	case "container": {
		const [kind, name, statements] = node.payload;
		if (kind !== "module") note(state, `${kind} ${name} rendered as defmodule`);
		return call("defmodule", [lowerVariable(name, []), kw({ do: body(state, statements) })], meta);
	}
	case "function_def": {
		const [name, params, fnBody] = node.payload;
		const form = metaString(node, "visibility") === "private" ? "defp" : "def";
		const head = call(name, params.map((p) => param(state, p)));
		return call(form, [head, kw({ do: lower(state, fnBody) })], meta);
	}
	case "param":
		return unsupported(state, node, "parameter outside lambda or function_def");
	case "attribute_access":
		return call(
			call(".", [lower(state, node.payload[0]), atom(node.payload[1])]),
			[],
			[...kw({ no_parens: true }), ...meta],
		);
	case "augmented_assignment": {
		const [, operator, target, value] = node.payload;
		note(state, `augmented ${operator} rendered as rebinding`);
		const lowered = lower(state, target);
		return call("=", [lowered, call(operator, [lowered, lower(state, value)])], meta);
	}
	case "property":
		return unsupported(state, node, "accessor properties have no rendering");
	case "language_specific":
		return lowerNative(state, node, isQuoted);
	}
}

//==============================================================================
// Leaves
//==============================================================================

function lowerLiteral(node: LiteralNode): Quoted {
	const payload = node.payload;
	switch (payload[0]) {
	case "integer":
	case "string":
	case "boolean":
	case "null":
		return payload[1];
	case "float":
		return Number.isInteger(payload[1]) ? float(payload[1]) : payload[1];
	case "symbol":
		return atom(payload[1]);
	case "regex": {
		const { source, flags } = payload[1];
		const modifiers = [...flags].map((c) => c.charCodeAt(0));
		return call("sigil_r", [call("<<>>", [source]), modifiers]);
	}
	}
}

function lowerVariable(name: string, meta: Keyword): Quoted {
	if (name.startsWith("@")) return call("@", [ref(name.slice(1))], meta);
	if (ALIAS_NAME.test(name)) return alias(...name.split("."));
	return ref(name, meta);
}

/**
 * Local, operator, remote (Mod.fun, :mod.fun, var.fun) or anonymous (fun.(x))
 * call. Any other dotted or non-identifier name has no rendering.
 */
function lowerCall(state: State, node: FunctionCallNode, args: Quoted[], meta: Keyword): Quoted {
	const name = node.payload[0];
	if (metaString(node, "call_style") === "anonymous") {
		return call(call(".", [ref(name)]), args, meta);
	}
	if (OPERATOR_NAME.test(name)) return call(name, args, meta);
	const dot = name.lastIndexOf(".");
	if (dot < 0) {
		if (!FUNCTION_NAME.test(name)) unsupported(state, node, `call name ${name} is not an Elixir identifier`);
		return call(name, args, meta);
	}
	const receiver = name.slice(0, dot);
	const fun = name.slice(dot + 1);
	if (!FUNCTION_NAME.test(fun)) unsupported(state, node, `call name ${name} is not an Elixir identifier`);
	if (receiver.startsWith(":")) {
		return call(call(".", [atom(receiver.slice(1)), atom(fun)]), args, meta);
	}
	if (ALIAS_NAME.test(receiver)) return remote(receiver, fun, args, meta);
	if (VARIABLE_NAME.test(receiver)) return call(call(".", [ref(receiver), atom(fun)]), args, meta);
	return unsupported(state, node, `call target ${receiver} is neither a module nor a variable`);
}

//==============================================================================
// Control flow
//==============================================================================

function lowerConditional(state: State, node: ConditionalNode): Quoted {
	const meta = lineMeta(node);
	const [condition, then, otherwise] = node.payload;
	const form = metaString(node, "original_form");

	if (form === "multi_branch") {
		const clauses: Quoted[] = [];
		let current: IrNode | null = node;
		while (current !== null && current.tag === "conditional" && metaString(current, "original_form") === "multi_branch") {
			const [c, t, e]: ConditionalNode["payload"] = current.payload;
			clauses.push(call("->", [[lower(state, c)], lower(state, t)]));
			current = e;
		}
		if (current !== null) clauses.push(call("->", [[true], lower(state, current)]));
		return call("cond", [kw({ do: clauses })], meta);
	}

	if (form === "unless" && condition.tag === "unary_op" && condition.payload[1] === "not") {
		const sections = otherwise === null
			? kw({ do: lower(state, then) })
			: kw({ do: lower(state, then), else: lower(state, otherwise) });
		return call("unless", [lower(state, condition.payload[2]), sections], meta);
	}

	const sections = otherwise === null
		? kw({ do: lower(state, then) })
		: kw({ do: lower(state, then), else: lower(state, otherwise) });
	return call("if", [lower(state, condition), sections], meta);
}

/** while runs as reduce_while over an endless stream. */
function lowerLoop(state: State, node: LoopNode): Quoted {
	const meta = lineMeta(node);
	const [kind, binding, source, loopBody] = node.payload;
	if (kind === "for_each") {
		const pattern = binding === null ? ref("_") : lower(state, binding);
		return remote("Enum", "each", [lower(state, source), call("fn", [call("->", [[pattern], lower(state, loopBody)])])], meta);
	}
	note(state, "while loop rendered as Enum.reduce_while");
	const step = call("if", [
		lower(state, source),
		kw({
			do: call("__block__", [lower(state, loopBody), tuple(atom("cont"), ref("acc"))]),
			else: tuple(atom("halt"), ref("acc")),
		}),
	]);
	return remote("Enum", "reduce_while", [
		remote("Stream", "cycle", [[null]]),
		null,
		call("fn", [call("->", [[ref("_"), ref("acc")], step])]),
	], meta);
}

function param(state: State, node: ParamNode): Quoted {
	const p = node.payload;
	switch (p[0]) {
	case "name":
		return ref(p[1]);
	case "pattern":
		return lower(state, p[1]);
	case "default":
		return call("\\\\", [ref(p[1]), lower(state, p[2])]);
	}
}

function fn(state: State, params: ParamNode[], fnBody: IrNode): Quoted {
	return call("fn", [call("->", [params.map((p) => param(state, p)), lower(state, fnBody)])]);
}

function lowerCollectionOp(state: State, node: CollectionOpNode): Quoted {
	const meta = lineMeta(node);
	const [op, f, collection, initial] = node.payload;
	const source = lower(state, collection);

	if (op === "map" && metaString(node, "original_form") === "comprehension" && f.tag === "lambda" && f.payload[0].length === 1) {
		const [only] = f.payload[0];
		if (only !== undefined) {
			const generator = call("<-", [param(state, only), source]);
			return call("for", [generator, kw({ do: lower(state, f.payload[1]) })], meta);
		}
	}
	if (op === "map" || op === "filter") {
		return remote("Enum", op, [source, lower(state, f)], meta);
	}
	// Enum.reduce callbacks take (element, accumulator).
	const [acc, elem] = f.tag === "lambda" ? f.payload[0] : [];
	const callback = f.tag === "lambda" && f.payload[0].length === 2 && acc !== undefined && elem !== undefined
		? fn(state, [elem, acc], f.payload[1])
		: call("fn", [call("->", [[ref("elem"), ref("acc")], call(call(".", [lower(state, f)]), [ref("acc"), ref("elem")])])]);
	const seed = initial === null ? [] : [lower(state, initial)];
	return remote("Enum", "reduce", [source, ...seed, callback], meta);
}

function clause(state: State, arm: MatchArmNode): Quoted {
	const [pattern, guard, armBody] = arm.payload;
	const head = pattern === null ? ref("_") : lower(state, pattern);
	const guarded = guard === null ? head : call("when", [head, lower(state, guard)]);
	return call("->", [[guarded], lower(state, armBody)]);
}

function rescueClause(state: State, arm: MatchArmNode): Quoted {
	const [pattern, guard, armBody] = arm.payload;
	let head: Quoted;
	if (pattern === null) {
		head = ref("_");
	} else if (pattern.tag === "inline_match") {
		head = call("in", [lower(state, pattern.payload[0]), lower(state, pattern.payload[1])]);
	} else {
		head = lower(state, pattern);
	}
	const guarded = guard === null ? head : call("when", [head, lower(state, guard)]);
	return call("->", [[guarded], lower(state, armBody)]);
}

function catchClause(state: State, arm: MatchArmNode): Quoted {
	const [pattern, , armBody] = arm.payload;
	if (arm.meta.catch_arity === 2 && pattern !== null && pattern.tag === "tuple" && pattern.payload.length === 2) {
		return call("->", [pattern.payload.map((p) => lower(state, p)), lower(state, armBody)]);
	}
	return clause(state, arm);
}

function lowerTry(state: State, node: ExceptionHandlingNode): Quoted {
	const [tryBody, handlers, cleanup] = node.payload;
	const rescue = handlers.filter((h) => h.meta.handler !== "catch");
	const caught = handlers.filter((h) => h.meta.handler === "catch");
	const sections: Record<string, Quoted> = { do: lower(state, tryBody) };
	if (rescue.length > 0) sections.rescue = rescue.map((h) => rescueClause(state, h));
	if (caught.length > 0) sections.catch = caught.map((h) => catchClause(state, h));
	if (cleanup !== null) sections.after = lower(state, cleanup);
	return call("try", [kw(sections)], lineMeta(node));
}
