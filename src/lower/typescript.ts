// STRATA TypeScript Lower
// Renders IR trees as TypeScript compiler-API nodes through ts.factory.

import ts from "typescript";
import type { Result } from "../errors.js";
import { own } from "../lift/shared.js";
import { isIdentifierText, isStatementNode, isTsNode } from "../native/typescript-nodes.js";
import type {
	AssignmentNode,
	ContainerNode,
	ExceptionHandlingNode,
	IrNode,
	LanguageSpecificNode,
	LiteralNode,
	MatchArmNode,
	ParamNode,
	PatternMatchNode,
	Tag,
} from "../types.js";
import {
	createLowerState,
	type LowerOptions,
	type LowerState,
	lowerNative,
	metaString,
	note,
	runLower,
	unsupported,
} from "./shared.js";

type State = LowerState<"typescript">;

const f = ts.factory;

//==============================================================================
// Public API
//==============================================================================

/**
 * Lower a tree to a SourceFile. An escape-hatch root is returned as the
 * native node it wraps.
 */
export function lowerTypeScript(tree: unknown, options?: LowerOptions): Result<ts.Node> {
	const state = createLowerState("typescript", options);
	return runLower(tree, (root) => {
		if (root.tag === "language_specific") return native(state, root);
		const statements = root.tag === "block" && root.payload.length !== 1
			? statementList(state, root)
			: [statement(state, root)];
		return f.createSourceFile(statements, f.createToken(ts.SyntaxKind.EndOfFileToken), ts.NodeFlags.None);
	});
}

//==============================================================================
// Tables
//==============================================================================

const BINARY_OPERATORS: Readonly<Record<string, ts.BinaryOperator>> = {
	"+": ts.SyntaxKind.PlusToken,
	"-": ts.SyntaxKind.MinusToken,
	"*": ts.SyntaxKind.AsteriskToken,
	"/": ts.SyntaxKind.SlashToken,
	rem: ts.SyntaxKind.PercentToken,
	"**": ts.SyntaxKind.AsteriskAsteriskToken,
	"<>": ts.SyntaxKind.PlusToken,
	"==": ts.SyntaxKind.EqualsEqualsEqualsToken,
	"!=": ts.SyntaxKind.ExclamationEqualsEqualsToken,
	"===": ts.SyntaxKind.EqualsEqualsEqualsToken,
	"!==": ts.SyntaxKind.ExclamationEqualsEqualsToken,
	"<": ts.SyntaxKind.LessThanToken,
	">": ts.SyntaxKind.GreaterThanToken,
	"<=": ts.SyntaxKind.LessThanEqualsToken,
	">=": ts.SyntaxKind.GreaterThanEqualsToken,
	and: ts.SyntaxKind.AmpersandAmpersandToken,
	or: ts.SyntaxKind.BarBarToken,
};

const COMPOUND_OPERATORS: Readonly<Record<string, ts.CompoundAssignmentOperator>> = {
	"+": ts.SyntaxKind.PlusEqualsToken,
	"-": ts.SyntaxKind.MinusEqualsToken,
	"*": ts.SyntaxKind.AsteriskEqualsToken,
	"/": ts.SyntaxKind.SlashEqualsToken,
	rem: ts.SyntaxKind.PercentEqualsToken,
	"**": ts.SyntaxKind.AsteriskAsteriskEqualsToken,
	"<>": ts.SyntaxKind.PlusEqualsToken,
};

const UNARY_OPERATORS: Readonly<Record<string, ts.PrefixUnaryOperator>> = {
	not: ts.SyntaxKind.ExclamationToken,
	"-": ts.SyntaxKind.MinusToken,
	"+": ts.SyntaxKind.PlusToken,
};

/** Tags that only exist as statements; in expression position they need an IIFE. */
const STATEMENT_TAGS: ReadonlySet<Tag> = new Set([
	"block",
	"early_return",
	"loop",
	"function_def",
	"container",
	"exception_handling",
	"pattern_match",
	"property",
]);

const MATCH_SUBJECT = "__match";
const CAUGHT = "error";

//==============================================================================
// Helpers
//==============================================================================

function native(state: State, node: LanguageSpecificNode): ts.Node {
	return lowerNative(state, node, isTsNode);
}

function identifier(state: State, name: string): ts.Identifier {
	if (!isIdentifierText(name)) note(state, `${name} is not a TypeScript identifier`);
	return f.createIdentifier(name);
}

/** `a.b.c` as a property-access chain; `this` stays a keyword. */
function dotted(state: State, name: string): ts.Expression {
	const [first = name, ...rest] = name.split(".");
	const head: ts.Expression = first === "this" ? f.createThis() : identifier(state, first);
	return rest.reduce<ts.Expression>((receiver, part) => f.createPropertyAccessExpression(receiver, part), head);
}

function isStatementOnly(node: IrNode): boolean {
	if (STATEMENT_TAGS.has(node.tag)) return true;
	return node.tag === "assignment" && metaString(node, "declaration") !== undefined;
}

function iife(statements: ts.Statement[], async = false): ts.Expression {
	const modifiers = async ? [f.createModifier(ts.SyntaxKind.AsyncKeyword)] : undefined;
	const arrow = f.createArrowFunction(
		modifiers,
		undefined,
		[],
		undefined,
		f.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
		f.createBlock(statements, true),
	);
	return f.createCallExpression(f.createParenthesizedExpression(arrow), undefined, []);
}

/** Last statement of a value-producing body: return it unless it is statement-only. */
function returning(state: State, node: IrNode): ts.Statement {
	return isStatementOnly(node) ? statement(state, node) : f.createReturnStatement(expression(state, node));
}

//==============================================================================
// Statements
//==============================================================================

function statementList(state: State, node: IrNode): ts.Statement[] {
	return node.tag === "block" ? node.payload.map((s) => statement(state, s)) : [statement(state, node)];
}

function blockOf(state: State, node: IrNode): ts.Block {
	return f.createBlock(statementList(state, node), true);
}

function statement(state: State, node: IrNode): ts.Statement {
	switch (node.tag) {
	case "block":
		return blockOf(state, node);
	case "conditional": {
		const [test, then, otherwise] = node.payload;
		return f.createIfStatement(
			expression(state, test),
			statement(state, then),
			otherwise === null ? undefined : statement(state, otherwise),
		);
	}
	case "early_return": {
		const [kind, value] = node.payload;
		if (kind === "return") return f.createReturnStatement(value === null ? undefined : expression(state, value));
		if (value !== null) unsupported(state, node, `${kind} with a value`);
		return kind === "break" ? f.createBreakStatement() : f.createContinueStatement();
	}
	case "assignment":
		return lowerAssignmentStatement(state, node);
	case "inline_match":
		note(state, "match rendered as assignment");
		return f.createExpressionStatement(expression(state, node));
	case "loop": {
		const [kind, binding, source, body] = node.payload;
		if (kind === "while") return f.createWhileStatement(expression(state, source), statement(state, body));
		if (binding === null) return unsupported(state, node, "for_each without a binding");
		const declaration = metaString(node, "declaration");
		const initializer = declaration === "none"
			? target(state, binding)
			: f.createVariableDeclarationList(
				[f.createVariableDeclaration(bindingName(state, binding))],
				declarationFlags(declaration ?? "const"),
			);
		return f.createForOfStatement(undefined, initializer, expression(state, source), statement(state, body));
	}
	case "function_def": {
		const [name, params, body] = node.payload;
		const parts = functionParts(state, params, body);
		const modifiers: ts.ModifierLike[] = [];
		if (metaString(node, "visibility") === "public") modifiers.push(f.createModifier(ts.SyntaxKind.ExportKeyword));
		if (parts.async) modifiers.push(f.createModifier(ts.SyntaxKind.AsyncKeyword));
		return f.createFunctionDeclaration(
			modifiers.length === 0 ? undefined : modifiers,
			undefined,
			identifier(state, name),
			undefined,
			parts.parameters,
			undefined,
			parts.body,
		);
	}
	case "container":
		return lowerContainer(state, node);
	case "exception_handling":
		return lowerTry(state, node);
	case "pattern_match":
		return lowerMatch(state, node);
	case "property":
		return unsupported(state, node, "property outside a class");
	case "language_specific": {
		const lowered = native(state, node);
		if (ts.isExpression(lowered)) return f.createExpressionStatement(lowered);
		if (isStatementNode(lowered)) return lowered;
		return unsupported(state, node, "native node is neither a statement nor an expression");
	}
	default:
		return f.createExpressionStatement(expression(state, node));
	}
}

function declarationFlags(kind: string): ts.NodeFlags {
	if (kind === "let") return ts.NodeFlags.Let;
	if (kind === "var") return ts.NodeFlags.None;
	return ts.NodeFlags.Const;
}

function lowerAssignmentStatement(state: State, node: AssignmentNode): ts.Statement {
	const declaration = metaString(node, "declaration");
	if (declaration === undefined) return f.createExpressionStatement(expression(state, node));
	const [assigned, value] = node.payload;
	const modifiers = metaString(node, "visibility") === "public"
		? [f.createModifier(ts.SyntaxKind.ExportKeyword)]
		: undefined;
	return f.createVariableStatement(
		modifiers,
		f.createVariableDeclarationList(
			[f.createVariableDeclaration(bindingName(state, assigned), undefined, undefined, expression(state, value))],
			declarationFlags(declaration),
		),
	);
}

/** Declaration binding: identifier or array pattern. */
function bindingName(state: State, node: IrNode): ts.BindingName {
	if (node.tag === "variable") return identifier(state, node.payload);
	if (node.tag === "list" || node.tag === "tuple") {
		return f.createArrayBindingPattern(
			node.payload.map((item) => f.createBindingElement(undefined, undefined, bindingName(state, item))),
		);
	}
	return unsupported(state, node, `${node.tag} as a binding`);
}

/** Assignment target expression. */
function target(state: State, node: IrNode): ts.Expression {
	switch (node.tag) {
	case "variable":
		return dotted(state, node.payload);
	case "list":
	case "tuple":
		return f.createArrayLiteralExpression(node.payload.map((item) => target(state, item)));
	case "attribute_access":
		return f.createPropertyAccessExpression(expression(state, node.payload[0]), node.payload[1]);
	default:
		return unsupported(state, node, `${node.tag} as an assignment target`);
	}
}

//==============================================================================
// Functions
//==============================================================================

interface FunctionParts {
	async: boolean;
	parameters: ts.ParameterDeclaration[];
	body: ts.Block;
}

function parameters(state: State, params: ParamNode[]): ts.ParameterDeclaration[] {
	return params.map((param) => {
		const payload = param.payload;
		switch (payload[0]) {
		case "name":
			return f.createParameterDeclaration(undefined, undefined, identifier(state, payload[1]));
		case "default":
			return f.createParameterDeclaration(
				undefined,
				undefined,
				identifier(state, payload[1]),
				undefined,
				undefined,
				expression(state, payload[2]),
			);
		case "pattern":
			return f.createParameterDeclaration(undefined, undefined, bindingName(state, payload[1]));
		}
	});
}

/** Async bodies come back as async functions; expression bodies are returned. */
function functionParts(state: State, params: ParamNode[], body: IrNode): FunctionParts {
	const async = body.tag === "async_operation" && body.payload[0] === "async";
	const inner = body.tag === "async_operation" && body.payload[0] === "async" ? body.payload[1] : body;
	const block = inner.tag === "block" ? blockOf(state, inner) : f.createBlock([returning(state, inner)], true);
	return { async, parameters: parameters(state, params), body: block };
}

function lowerLambda(state: State, params: ParamNode[], body: IrNode): ts.Expression {
	const async = body.tag === "async_operation" && body.payload[0] === "async";
	const inner = body.tag === "async_operation" && body.payload[0] === "async" ? body.payload[1] : body;
	let concise: ts.ConciseBody;
	if (inner.tag === "block") concise = blockOf(state, inner);
	else if (isStatementOnly(inner)) concise = f.createBlock([statement(state, inner)], true);
	else concise = expression(state, inner);
	return f.createArrowFunction(
		async ? [f.createModifier(ts.SyntaxKind.AsyncKeyword)] : undefined,
		undefined,
		parameters(state, params),
		undefined,
		f.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
		concise,
	);
}

//==============================================================================
// Classes and namespaces
//==============================================================================

function memberModifiers(node: IrNode, async = false): ts.ModifierLike[] | undefined {
	const modifiers: ts.ModifierLike[] = [];
	const visibility = metaString(node, "visibility");
	if (visibility === "private") modifiers.push(f.createModifier(ts.SyntaxKind.PrivateKeyword));
	if (visibility === "protected") modifiers.push(f.createModifier(ts.SyntaxKind.ProtectedKeyword));
	if (node.meta.static === true) modifiers.push(f.createModifier(ts.SyntaxKind.StaticKeyword));
	if (async) modifiers.push(f.createModifier(ts.SyntaxKind.AsyncKeyword));
	return modifiers.length === 0 ? undefined : modifiers;
}

function accessorBody(state: State, accessor: IrNode, member: IrNode): { params: ParamNode[]; body: ts.Block } {
	if (accessor.tag !== "lambda") return unsupported(state, member, "accessor that is not a lambda");
	const [params, body] = accessor.payload;
	const block = body.tag === "block" ? blockOf(state, body) : f.createBlock([returning(state, body)], true);
	return { params, body: block };
}

function classMembers(state: State, member: IrNode): ts.ClassElement[] {
	switch (member.tag) {
	case "function_def": {
		const [name, params, body] = member.payload;
		const parts = functionParts(state, params, body);
		if (name === "constructor") return [f.createConstructorDeclaration(undefined, parts.parameters, parts.body)];
		return [f.createMethodDeclaration(
			memberModifiers(member, parts.async),
			undefined,
			name,
			undefined,
			undefined,
			parts.parameters,
			undefined,
			parts.body,
		)];
	}
	case "assignment": {
		const [assigned, value] = member.payload;
		if (assigned.tag !== "variable") return unsupported(state, member, "field with a pattern name");
		const omitted = value.tag === "literal" && value.payload[0] === "null" && value.meta.original_literal === "undefined";
		return [f.createPropertyDeclaration(
			memberModifiers(member),
			assigned.payload,
			undefined,
			undefined,
			omitted ? undefined : expression(state, value),
		)];
	}
	case "property": {
		const [name, getter, setter] = member.payload;
		const elements: ts.ClassElement[] = [];
		if (getter !== null) {
			const { body } = accessorBody(state, getter, member);
			elements.push(f.createGetAccessorDeclaration(undefined, name, [], undefined, body));
		}
		if (setter !== null) {
			const { params, body } = accessorBody(state, setter, member);
			elements.push(f.createSetAccessorDeclaration(undefined, name, parameters(state, params), body));
		}
		return elements;
	}
	default:
		return unsupported(state, member, `${member.tag} as a class member`);
	}
}

/** Classes become class declarations; modules and namespaces become (nested) namespaces. */
function lowerContainer(state: State, node: ContainerNode): ts.Statement {
	const [kind, name, members] = node.payload;
	if (kind === "class") {
		return f.createClassDeclaration(
			undefined,
			identifier(state, name),
			undefined,
			undefined,
			members.flatMap((m) => classMembers(state, m)),
		);
	}
	if (kind === "module") note(state, `module ${name} rendered as a namespace`);
	const parts = name.split(".");
	let body: ts.ModuleBlock | ts.ModuleDeclaration = f.createModuleBlock(members.map((m) => statement(state, m)));
	for (let i = parts.length - 1; i > 0; i--) {
		if (!isNamespaceBody(body)) return unsupported(state, node, "namespace body");
		body = f.createModuleDeclaration(
			undefined,
			identifier(state, parts[i] ?? name),
			body,
			ts.NodeFlags.Namespace | ts.NodeFlags.NestedNamespace,
		);
	}
	if (!isNamespaceBody(body)) return unsupported(state, node, "namespace body");
	return f.createModuleDeclaration(undefined, identifier(state, parts[0] ?? name), body, ts.NodeFlags.Namespace);
}

function isNamespaceBody(node: ts.ModuleBlock | ts.ModuleDeclaration): node is ts.NamespaceBody {
	return ts.isModuleBlock(node) || ts.isIdentifier(node.name);
}

//==============================================================================
// Exceptions and matching
//==============================================================================

interface HandlerShape {
	type: IrNode | null;
	binding: string | null;
}

/** `T`, `e in T` (inline_match(e, T)), a bare binding `e`, or null for a catch-all. */
function handlerShape(state: State, arm: MatchArmNode): HandlerShape {
	const [pattern] = arm.payload;
	if (metaString(arm, "handler") === "catch") return unsupported(state, arm, "thrown-value handler");
	if (pattern === null) return { type: null, binding: null };
	if (pattern.tag === "inline_match") {
		const [bound, type] = pattern.payload;
		if (bound.tag === "variable") return { type, binding: bound.payload };
	}
	if (pattern.tag === "variable") {
		if (/^[A-Z]/.test(pattern.payload) || pattern.payload.includes(".")) return { type: pattern, binding: null };
		return { type: null, binding: pattern.payload === "_" ? null : pattern.payload };
	}
	return unsupported(state, arm, `${pattern.tag} handler pattern`);
}

function lowerTry(state: State, node: ExceptionHandlingNode): ts.Statement {
	const [body, handlers, cleanup] = node.payload;
	const tryBlock = blockOf(state, body);
	const finallyBlock = cleanup === null ? undefined : blockOf(state, cleanup);
	const [first] = handlers;

	if (first === undefined) {
		if (finallyBlock === undefined) {
			note(state, "try without handlers rendered as a block");
			return tryBlock;
		}
		return f.createTryStatement(tryBlock, undefined, finallyBlock);
	}

	const firstShape = handlerShape(state, first);
	if (handlers.length === 1 && firstShape.type === null && first.payload[1] === null) {
		const clause = f.createCatchClause(
			firstShape.binding === null ? undefined : firstShape.binding,
			blockOf(state, first.payload[2]),
		);
		return f.createTryStatement(tryBlock, clause, finallyBlock);
	}

	// Typed handlers: one catch with an instanceof chain, rethrowing when nothing matches.
	let chain: ts.Statement = f.createThrowStatement(f.createIdentifier(CAUGHT));
	for (const arm of [...handlers].reverse()) {
		const shape = handlerShape(state, arm);
		const [, guard, armBody] = arm.payload;
		const statements = statementList(state, armBody);
		if (shape.binding !== null && shape.binding !== CAUGHT) {
			statements.unshift(constDeclaration(state, shape.binding, f.createIdentifier(CAUGHT)));
		}
		const armBlock = f.createBlock(statements, true);
		let test: ts.Expression | undefined = shape.type === null
			? undefined
			: f.createBinaryExpression(f.createIdentifier(CAUGHT), ts.SyntaxKind.InstanceOfKeyword, expression(state, shape.type));
		if (guard !== null) {
			const guardTest = expression(state, guard);
			test = test === undefined ? guardTest : f.createBinaryExpression(test, ts.SyntaxKind.AmpersandAmpersandToken, guardTest);
		}
		chain = test === undefined ? armBlock : f.createIfStatement(test, armBlock, chain);
	}
	note(state, "typed handlers rendered as an instanceof chain");
	const clause = f.createCatchClause(CAUGHT, f.createBlock([chain], true));
	return f.createTryStatement(tryBlock, clause, finallyBlock);
}

function constDeclaration(state: State, name: string, value: ts.Expression): ts.Statement {
	return f.createVariableStatement(
		undefined,
		f.createVariableDeclarationList(
			[f.createVariableDeclaration(identifier(state, name), undefined, undefined, value)],
			ts.NodeFlags.Const,
		),
	);
}

/** An if chain over literal, wildcard and capture arms. */
function lowerMatch(state: State, node: PatternMatchNode): ts.Statement {
	const [scrutinee, arms] = node.payload;
	const direct = scrutinee.tag === "variable" && !scrutinee.payload.includes(".");
	const subject: ts.Expression = direct ? expression(state, scrutinee) : f.createIdentifier(MATCH_SUBJECT);

	let chain: ts.Statement | undefined;
	for (const arm of [...arms].reverse()) {
		const [pattern, guard, body] = arm.payload;
		const statements = statementList(state, body);
		let test: ts.Expression | undefined;
		if (pattern === null || (pattern.tag === "variable" && pattern.payload === "_")) {
			test = undefined;
		} else if (pattern.tag === "variable") {
			if (guard !== null) unsupported(state, arm, "guarded capture pattern");
			statements.unshift(constDeclaration(state, pattern.payload, subject));
		} else if (pattern.tag === "literal") {
			test = f.createBinaryExpression(subject, ts.SyntaxKind.EqualsEqualsEqualsToken, lowerLiteral(state, pattern));
		} else {
			unsupported(state, arm, `${pattern.tag} pattern`);
		}
		if (guard !== null) {
			const guardTest = expression(state, guard);
			test = test === undefined ? guardTest : f.createBinaryExpression(test, ts.SyntaxKind.AmpersandAmpersandToken, guardTest);
		}
		const armBlock = f.createBlock(statements, true);
		chain = test === undefined ? armBlock : f.createIfStatement(test, armBlock, chain);
	}
	note(state, "pattern match rendered as an if chain");

	const result = chain ?? f.createBlock([], false);
	if (direct) return result;
	return f.createBlock([constDeclaration(state, MATCH_SUBJECT, expression(state, scrutinee)), result], true);
}

//==============================================================================
// Expressions
//==============================================================================

function expression(state: State, node: IrNode): ts.Expression {
	const expr = (n: IrNode): ts.Expression => expression(state, n);
	switch (node.tag) {
	case "literal":
		return lowerLiteral(state, node);
	case "variable":
		if (node.payload.startsWith("@")) return unsupported(state, node, "module attribute");
		return dotted(state, node.payload);
	case "list":
		return f.createArrayLiteralExpression(node.payload.map(expr));
	case "tuple":
		note(state, "tuple rendered as an array");
		return f.createArrayLiteralExpression(node.payload.map(expr));
	case "pair":
		return f.createArrayLiteralExpression(node.payload.map(expr));
	case "map":
		return f.createObjectLiteralExpression(node.payload.map((p) => objectProperty(state, p.payload[0], p.payload[1])), false);
	case "binary_op": {
		const [, operator, left, right] = node.payload;
		if (operator === "div") {
			note(state, "integer division rendered as Math.trunc");
			const quotient = f.createBinaryExpression(expr(left), ts.SyntaxKind.SlashToken, expr(right));
			return f.createCallExpression(dotted(state, "Math.trunc"), undefined, [quotient]);
		}
		const token = own(BINARY_OPERATORS, operator);
		if (token === undefined) return unsupported(state, node, `operator ${operator}`);
		return f.createBinaryExpression(expr(left), token, expr(right));
	}
	case "unary_op": {
		const [, operator, operand] = node.payload;
		const token = own(UNARY_OPERATORS, operator);
		if (token === undefined) return unsupported(state, node, `operator ${operator}`);
		return f.createPrefixUnaryExpression(token, expr(operand));
	}
	case "function_call":
		return f.createCallExpression(dotted(state, node.payload[0]), undefined, node.payload[1].map(expr));
	case "conditional": {
		const [test, then, otherwise] = node.payload;
		return f.createConditionalExpression(
			expr(test),
			undefined,
			expr(then),
			undefined,
			otherwise === null ? f.createIdentifier("undefined") : expr(otherwise),
		);
	}
	case "block": {
		const items = node.payload;
		const last = items[items.length - 1];
		if (last === undefined) return f.createIdentifier("undefined");
		if (items.length === 1) return expr(last);
		note(state, "expression block rendered as an IIFE");
		return iife([...items.slice(0, -1).map((s) => statement(state, s)), returning(state, last)]);
	}
	case "assignment":
	case "inline_match":
		return f.createBinaryExpression(target(state, node.payload[0]), ts.SyntaxKind.EqualsToken, expr(node.payload[1]));
	case "augmented_assignment": {
		const [, operator, assigned, value] = node.payload;
		if (operator === "div") {
			const quotient = f.createBinaryExpression(target(state, assigned), ts.SyntaxKind.SlashToken, expr(value));
			const truncated = f.createCallExpression(dotted(state, "Math.trunc"), undefined, [quotient]);
			return f.createBinaryExpression(target(state, assigned), ts.SyntaxKind.EqualsToken, truncated);
		}
		const token = own(COMPOUND_OPERATORS, operator);
		if (token === undefined) return unsupported(state, node, `operator ${operator}=`);
		return f.createBinaryExpression(target(state, assigned), token, expr(value));
	}
	case "lambda":
		return lowerLambda(state, node.payload[0], node.payload[1]);
	case "collection_op": {
		const [op, fn, collection, initial] = node.payload;
		const args = initial === null ? [expr(fn)] : [expr(fn), expr(initial)];
		return f.createCallExpression(f.createPropertyAccessExpression(expr(collection), op), undefined, args);
	}
	case "async_operation": {
		const [kind, operation] = node.payload;
		if (kind === "await") return f.createAwaitExpression(expr(operation));
		note(state, "async operation rendered as an async IIFE");
		const work = operation.tag === "lambda" && operation.payload[0].length === 0 ? operation.payload[1] : operation;
		const body = isStatementOnly(work) ? statementList(state, work) : [f.createReturnStatement(expr(work))];
		return iife(body, true);
	}
	case "attribute_access":
		return f.createPropertyAccessExpression(expr(node.payload[0]), node.payload[1]);
	case "language_specific": {
		const lowered = native(state, node);
		if (!ts.isExpression(lowered)) return unsupported(state, node, "native statement in expression position");
		return lowered;
	}
	case "early_return":
		return unsupported(state, node, "early return in expression position");
	case "loop":
	case "function_def":
	case "container":
	case "exception_handling":
	case "pattern_match":
		note(state, `${node.tag} in expression position rendered as an IIFE`);
		return iife([statement(state, node)]);
	case "property":
	case "param":
	case "match_arm":
		return unsupported(state, node, `${node.tag} has no expression form`);
	}
}

function lowerLiteral(state: State, node: LiteralNode): ts.Expression {
	const payload = node.payload;
	switch (payload[0]) {
	case "integer":
		return numeric(String(Math.abs(payload[1])), payload[1] < 0);
	case "float": {
		const value = payload[1];
		const magnitude = Math.abs(value);
		const text = Number.isInteger(magnitude) && magnitude < 1e21 ? `${magnitude}.0` : String(magnitude);
		return numeric(text, value < 0);
	}
	case "string":
		return f.createStringLiteral(payload[1]);
	case "boolean":
		return payload[1] ? f.createTrue() : f.createFalse();
	case "null":
		return node.meta.original_literal === "undefined" ? f.createIdentifier("undefined") : f.createNull();
	case "symbol":
		note(state, `symbol ${payload[1]} rendered as a string`);
		return f.createStringLiteral(payload[1]);
	case "regex":
		return f.createRegularExpressionLiteral(`/${payload[1].source}/${payload[1].flags}`);
	}
}

function numeric(text: string, negative: boolean): ts.Expression {
	const literal = f.createNumericLiteral(text);
	return negative ? f.createPrefixUnaryExpression(ts.SyntaxKind.MinusToken, literal) : literal;
}

/** String and symbol keys become names; `{a: a}` is written `{a}`. */
function objectProperty(state: State, key: IrNode, value: IrNode): ts.ObjectLiteralElementLike {
	if (key.tag === "literal") {
		const payload = key.payload;
		if (payload[0] === "string" || payload[0] === "symbol") {
			const text = payload[1];
			if (!isIdentifierText(text)) return f.createPropertyAssignment(f.createStringLiteral(text), expression(state, value));
			if (value.tag === "variable" && value.payload === text) return f.createShorthandPropertyAssignment(text);
			return f.createPropertyAssignment(text, expression(state, value));
		}
		if (payload[0] === "integer" && payload[1] >= 0) {
			return f.createPropertyAssignment(f.createNumericLiteral(payload[1]), expression(state, value));
		}
	}
	return unsupported(state, key, "object key that is not a string or number");
}
