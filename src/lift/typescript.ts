// STRATA TypeScript Lift
// Converts TypeScript compiler-API trees to IR trees. Types are erased.

import ts from "typescript";
import {
	assignment,
	asyncOperation,
	attributeAccess,
	augmentedAssignment,
	binaryOp,
	block,
	bool,
	collectionOp,
	conditional,
	container,
	earlyReturn,
	exceptionHandling,
	float,
	functionCall,
	functionDef,
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
	property,
	str,
	unaryOp,
	variable,
} from "../builders.js";
import { type Result, TransformError } from "../errors.js";
import { hasDecorators, hasModifier, isTsNode, kindName } from "../native/typescript-nodes.js";
import type { IrNode, MatchArmNode, Meta, PairNode, ParamNode } from "../types.js";
import {
	canonical,
	createLiftState,
	descend,
	escape,
	type LiftOptions,
	type LiftState,
	locationMeta,
	runLift,
	spellingMeta,
	withMeta,
} from "./shared.js";

//==============================================================================
// Public API
//==============================================================================

export function liftTypeScript(native: unknown, options?: LiftOptions): Result<IrNode> {
	const base = createLiftState("typescript", options);
	return runLift(() => {
		if (!isTsNode(native)) {
			throw TransformError.unsupported("typescript node", native, "not a compiler-API node");
		}
		const state: TsLiftState = { ...base, sourceFile: ts.isSourceFile(native) ? native : undefined };
		return lift(state, native);
	});
}

//==============================================================================
// State and tables
//==============================================================================

interface TsLiftState extends LiftState {
	/** Present when lifting a parsed file; positions are read from it. */
	sourceFile: ts.SourceFile | undefined;
}

const BINARY_OPERATORS: ReadonlyMap<ts.SyntaxKind, { operator: string; spelling: string }> = new Map([
	[ts.SyntaxKind.PlusToken, { operator: "+", spelling: "+" }],
	[ts.SyntaxKind.MinusToken, { operator: "-", spelling: "-" }],
	[ts.SyntaxKind.AsteriskToken, { operator: "*", spelling: "*" }],
	[ts.SyntaxKind.SlashToken, { operator: "/", spelling: "/" }],
	[ts.SyntaxKind.PercentToken, { operator: "rem", spelling: "%" }],
	[ts.SyntaxKind.AsteriskAsteriskToken, { operator: "**", spelling: "**" }],
	[ts.SyntaxKind.LessThanToken, { operator: "<", spelling: "<" }],
	[ts.SyntaxKind.GreaterThanToken, { operator: ">", spelling: ">" }],
	[ts.SyntaxKind.LessThanEqualsToken, { operator: "<=", spelling: "<=" }],
	[ts.SyntaxKind.GreaterThanEqualsToken, { operator: ">=", spelling: ">=" }],
	[ts.SyntaxKind.EqualsEqualsEqualsToken, { operator: "==", spelling: "===" }],
	[ts.SyntaxKind.ExclamationEqualsEqualsToken, { operator: "!=", spelling: "!==" }],
	[ts.SyntaxKind.AmpersandAmpersandToken, { operator: "and", spelling: "&&" }],
	[ts.SyntaxKind.BarBarToken, { operator: "or", spelling: "||" }],
]);

const COMPOUND_ASSIGNMENTS: ReadonlyMap<ts.SyntaxKind, { operator: string; spelling: string }> = new Map([
	[ts.SyntaxKind.PlusEqualsToken, { operator: "+", spelling: "+" }],
	[ts.SyntaxKind.MinusEqualsToken, { operator: "-", spelling: "-" }],
	[ts.SyntaxKind.AsteriskEqualsToken, { operator: "*", spelling: "*" }],
	[ts.SyntaxKind.SlashEqualsToken, { operator: "/", spelling: "/" }],
	[ts.SyntaxKind.PercentEqualsToken, { operator: "rem", spelling: "%" }],
	[ts.SyntaxKind.AsteriskAsteriskEqualsToken, { operator: "**", spelling: "**" }],
]);

const BINARY_ESCAPES: ReadonlyMap<ts.SyntaxKind, string> = new Map([
	[ts.SyntaxKind.EqualsEqualsToken, "loose_equality"],
	[ts.SyntaxKind.ExclamationEqualsToken, "loose_equality"],
	[ts.SyntaxKind.QuestionQuestionToken, "nullish"],
	[ts.SyntaxKind.AmpersandToken, "bitwise_operator"],
	[ts.SyntaxKind.BarToken, "bitwise_operator"],
	[ts.SyntaxKind.CaretToken, "bitwise_operator"],
	[ts.SyntaxKind.LessThanLessThanToken, "bitwise_operator"],
	[ts.SyntaxKind.GreaterThanGreaterThanToken, "bitwise_operator"],
	[ts.SyntaxKind.GreaterThanGreaterThanGreaterThanToken, "bitwise_operator"],
	[ts.SyntaxKind.InKeyword, "operator"],
	[ts.SyntaxKind.InstanceOfKeyword, "operator"],
	[ts.SyntaxKind.CommaToken, "comma"],
]);

/** Recognised syntax with no IR counterpart. */
const ESCAPED_KINDS: ReadonlyMap<ts.SyntaxKind, string> = new Map([
	[ts.SyntaxKind.ImportDeclaration, "import"],
	[ts.SyntaxKind.ImportEqualsDeclaration, "import"],
	[ts.SyntaxKind.ExportDeclaration, "export"],
	[ts.SyntaxKind.ExportAssignment, "export"],
	[ts.SyntaxKind.InterfaceDeclaration, "type_declaration"],
	[ts.SyntaxKind.TypeAliasDeclaration, "type_declaration"],
	[ts.SyntaxKind.EnumDeclaration, "enum"],
	[ts.SyntaxKind.SwitchStatement, "switch"],
	[ts.SyntaxKind.ThrowStatement, "throw"],
	[ts.SyntaxKind.ForStatement, "c_style_for"],
	[ts.SyntaxKind.ForInStatement, "for_in"],
	[ts.SyntaxKind.DoStatement, "do_while"],
	[ts.SyntaxKind.LabeledStatement, "label"],
	[ts.SyntaxKind.DebuggerStatement, "debugger"],
	[ts.SyntaxKind.TemplateExpression, "template"],
	[ts.SyntaxKind.TaggedTemplateExpression, "template"],
	[ts.SyntaxKind.NewExpression, "new"],
	[ts.SyntaxKind.ElementAccessExpression, "element_access"],
	[ts.SyntaxKind.ClassExpression, "class_expression"],
	[ts.SyntaxKind.SpreadElement, "spread"],
	[ts.SyntaxKind.TypeOfExpression, "typeof"],
	[ts.SyntaxKind.DeleteExpression, "operator"],
	[ts.SyntaxKind.VoidExpression, "operator"],
	[ts.SyntaxKind.YieldExpression, "yield"],
	[ts.SyntaxKind.PostfixUnaryExpression, "increment"],
	[ts.SyntaxKind.BigIntLiteral, "bigint"],
	[ts.SyntaxKind.SuperKeyword, "super"],
]);

//==============================================================================
// Helpers
//==============================================================================

function loc(state: TsLiftState, node: ts.Node): Meta {
	const file = state.sourceFile;
	if (file === undefined || node.pos < 0 || node.end > file.text.length) return {};
	const { line, character } = file.getLineAndCharacterOfPosition(node.getStart(file));
	return locationMeta(state, line + 1, character + 1);
}

function declarationKind(list: ts.VariableDeclarationList): string {
	if (list.flags & ts.NodeFlags.Const) return "const";
	if (list.flags & ts.NodeFlags.Let) return "let";
	return "var";
}

/** Statement list: one statement stands alone, several form a block. */
function liftBody(state: TsLiftState, statements: readonly ts.Statement[]): IrNode {
	const [only] = statements;
	if (statements.length === 1 && only !== undefined) return lift(state, only);
	return block(statements.map((s) => lift(state, s)));
}

/** `a.b.c` (identifiers and `this` only) as a dotted name. */
function dottedName(node: ts.Expression): string | undefined {
	const names: string[] = [];
	let current: ts.Expression = node;
	while (ts.isPropertyAccessExpression(current)) {
		if (current.questionDotToken !== undefined || !ts.isIdentifier(current.name)) return undefined;
		names.unshift(current.name.text);
		current = current.expression;
	}
	if (ts.isIdentifier(current)) return [current.text, ...names].join(".");
	if (current.kind === ts.SyntaxKind.ThisKeyword) return ["this", ...names].join(".");
	return undefined;
}

//==============================================================================
// Dispatch
//==============================================================================

function lift(state: TsLiftState, node: ts.Node): IrNode {
	descend(state, node);
	try {
		return convert(state, node);
	} finally {
		state.depth--;
	}
}

function convert(state: TsLiftState, node: ts.Node): IrNode {
	const meta = loc(state, node);

	if (ts.isSourceFile(node)) return liftBody(state, node.statements);
	if (ts.isExpressionStatement(node)) return lift(state, node.expression);
	if (ts.isBlock(node)) return block(node.statements.map((s) => lift(state, s)), meta);
	if (ts.isEmptyStatement(node)) return block([], meta);

	// Erased type syntax
	if (ts.isParenthesizedExpression(node) || ts.isAsExpression(node) || ts.isNonNullExpression(node) ||
		ts.isSatisfiesExpression(node) || ts.isTypeAssertionExpression(node)) {
		return lift(state, node.expression);
	}

	// Literals
	if (ts.isNumericLiteral(node)) return liftNumber(state, node, meta);
	if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) return str(node.text, meta);
	if (ts.isRegularExpressionLiteral(node)) return liftRegex(state, node, meta);
	switch (node.kind) {
	case ts.SyntaxKind.TrueKeyword:
		return bool(true, meta);
	case ts.SyntaxKind.FalseKeyword:
		return bool(false, meta);
	case ts.SyntaxKind.NullKeyword:
		return nil(meta);
	case ts.SyntaxKind.ThisKeyword:
		return variable("this", meta);
	}
	if (ts.isIdentifier(node)) {
		return node.text === "undefined" ? nil(withMeta(meta, { original_literal: "undefined" })) : variable(node.text, meta);
	}

	// Expressions
	if (ts.isBinaryExpression(node)) return liftBinary(state, node, meta);
	if (ts.isPrefixUnaryExpression(node)) return liftPrefixUnary(state, node, meta);
	if (ts.isCallExpression(node)) return liftCall(state, node, meta);
	if (ts.isConditionalExpression(node)) {
		return conditional(lift(state, node.condition), lift(state, node.whenTrue), lift(state, node.whenFalse), meta);
	}
	if (ts.isArrayLiteralExpression(node)) {
		if (node.elements.some((e) => ts.isSpreadElement(e) || ts.isOmittedExpression(e))) {
			return escape(state, "spread", node, meta);
		}
		return list(node.elements.map((e) => lift(state, e)), meta);
	}
	if (ts.isObjectLiteralExpression(node)) return liftObject(state, node, meta);
	if (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) return liftFunctionLike(state, node, meta);
	if (ts.isAwaitExpression(node)) return asyncOperation("await", lift(state, node.expression), meta);
	if (ts.isPropertyAccessExpression(node)) {
		if (node.questionDotToken !== undefined) return escape(state, "optional_chain", node, meta);
		if (!ts.isIdentifier(node.name)) return escape(state, "private_member", node, meta);
		return attributeAccess(lift(state, node.expression), node.name.text, meta);
	}

	// Statements
	if (ts.isVariableStatement(node)) return liftVariableStatement(state, node, meta);
	if (ts.isReturnStatement(node)) {
		return earlyReturn("return", node.expression === undefined ? null : lift(state, node.expression), meta);
	}
	if (ts.isBreakStatement(node) || ts.isContinueStatement(node)) {
		if (node.label !== undefined) return escape(state, "labeled_jump", node, meta);
		return earlyReturn(ts.isBreakStatement(node) ? "break" : "continue", null, meta);
	}
	if (ts.isIfStatement(node)) {
		return conditional(
			lift(state, node.expression),
			lift(state, node.thenStatement),
			node.elseStatement === undefined ? null : lift(state, node.elseStatement),
			meta,
		);
	}
	if (ts.isWhileStatement(node)) return loop("while", null, lift(state, node.expression), lift(state, node.statement), meta);
	if (ts.isForOfStatement(node)) return liftForOf(state, node, meta);
	if (ts.isTryStatement(node)) return liftTry(state, node, meta);
	if (ts.isFunctionDeclaration(node)) return liftFunctionDeclaration(state, node, meta);
	if (ts.isClassDeclaration(node)) return liftClass(state, node, meta);
	if (ts.isModuleDeclaration(node)) return liftNamespace(state, node, meta);

	const hint = ESCAPED_KINDS.get(node.kind);
	if (hint !== undefined) return escape(state, hint, node, meta);
	if (ts.isFunctionLike(node)) return escape(state, "declaration", node, meta);
	throw TransformError.unsupported(kindName(node), node, "no IR mapping for this TypeScript syntax");
}

//==============================================================================
// Literals
//==============================================================================

/** Decimal points and exponents mark a float; `1.0` stays a float. */
function liftNumber(state: TsLiftState, node: ts.NumericLiteral, meta: Meta): IrNode {
	// node.text is normalised by the scanner ("1.0" reads "1"); parsed nodes are read from the file.
	const file = state.sourceFile;
	const text = file !== undefined && node.pos >= 0 ? node.getText(file) : node.text;
	const value = Number(text.replace(/_/g, ""));
	const isHex = /^0[xXoObB]/.test(text);
	const isFloat = !isHex && (text.includes(".") || text.includes("e") || text.includes("E"));
	return isFloat || !Number.isInteger(value) ? float(value, meta) : int(value, meta);
}

function liftRegex(state: TsLiftState, node: ts.RegularExpressionLiteral, meta: Meta): IrNode {
	const text = node.text;
	const end = text.lastIndexOf("/");
	if (!text.startsWith("/") || end <= 0) return escape(state, "regex", node, meta);
	return literal(["regex", { source: text.slice(1, end), flags: text.slice(end + 1) }], meta);
}

function liftObject(state: TsLiftState, node: ts.ObjectLiteralExpression, meta: Meta): IrNode {
	const pairs: PairNode[] = [];
	for (const prop of node.properties) {
		if (ts.isShorthandPropertyAssignment(prop) && prop.objectAssignmentInitializer === undefined) {
			pairs.push(pair(str(prop.name.text), variable(prop.name.text)));
			continue;
		}
		if (ts.isPropertyAssignment(prop) && (ts.isIdentifier(prop.name) || ts.isStringLiteral(prop.name))) {
			pairs.push(pair(str(prop.name.text), lift(state, prop.initializer)));
			continue;
		}
		if (ts.isPropertyAssignment(prop) && ts.isNumericLiteral(prop.name)) {
			pairs.push(pair(liftNumber(state, prop.name, {}), lift(state, prop.initializer)));
			continue;
		}
		return escape(state, "object_literal", node, meta);
	}
	return map(pairs, meta);
}

//==============================================================================
// Operators
//==============================================================================

function liftBinary(state: TsLiftState, node: ts.BinaryExpression, meta: Meta): IrNode {
	const kind = node.operatorToken.kind;
	if (kind === ts.SyntaxKind.EqualsToken) {
		if (ts.isObjectLiteralExpression(node.left)) return escape(state, "destructuring", node, meta);
		return assignment(lift(state, node.left), lift(state, node.right), meta);
	}
	const compound = COMPOUND_ASSIGNMENTS.get(kind);
	if (compound !== undefined) {
		return augmentedAssignment(
			"arithmetic",
			compound.operator,
			lift(state, node.left),
			lift(state, node.right),
			withMeta(meta, spellingMeta(compound.spelling, compound.operator)),
		);
	}
	const entry = BINARY_OPERATORS.get(kind);
	const op = entry === undefined ? undefined : canonical(entry.operator);
	if (entry === undefined || op === undefined) {
		return escape(state, BINARY_ESCAPES.get(kind) ?? "compound_assignment", node, meta);
	}
	return binaryOp(
		op.category,
		op.operator,
		lift(state, node.left),
		lift(state, node.right),
		withMeta(meta, spellingMeta(entry.spelling, op.operator)),
	);
}

function liftPrefixUnary(state: TsLiftState, node: ts.PrefixUnaryExpression, meta: Meta): IrNode {
	const operand = (): IrNode => lift(state, node.operand);
	switch (node.operator) {
	case ts.SyntaxKind.ExclamationToken:
		return unaryOp("boolean", "not", operand(), withMeta(meta, { original_operator: "!" }));
	case ts.SyntaxKind.MinusToken:
		return unaryOp("arithmetic", "-", operand(), meta);
	case ts.SyntaxKind.PlusToken:
		return unaryOp("arithmetic", "+", operand(), meta);
	case ts.SyntaxKind.TildeToken:
		return escape(state, "bitwise_operator", node, meta);
	default:
		return escape(state, "increment", node, meta);
	}
}

//==============================================================================
// Calls
//==============================================================================

/** `xs.map(f)`, `xs.filter(f)` and `xs.reduce(f, init)` are collection operations. */
function liftCollectionCall(state: TsLiftState, node: ts.CallExpression, meta: Meta): IrNode | undefined {
	const callee = node.expression;
	if (!ts.isPropertyAccessExpression(callee) || callee.questionDotToken !== undefined || !ts.isIdentifier(callee.name)) {
		return undefined;
	}
	const [fn, initial] = node.arguments;
	const method = callee.name.text;
	if ((method === "map" || method === "filter") && node.arguments.length === 1 && fn !== undefined) {
		return collectionOp(method, lift(state, fn), lift(state, callee.expression), null, meta);
	}
	if (method === "reduce" && node.arguments.length === 2 && fn !== undefined && initial !== undefined) {
		return collectionOp("reduce", lift(state, fn), lift(state, callee.expression), lift(state, initial), meta);
	}
	return undefined;
}

function liftCall(state: TsLiftState, node: ts.CallExpression, meta: Meta): IrNode {
	if (node.questionDotToken !== undefined) return escape(state, "optional_chain", node, meta);
	if (node.arguments.some(ts.isSpreadElement)) return escape(state, "spread", node, meta);
	if (node.expression.kind === ts.SyntaxKind.SuperKeyword || node.expression.kind === ts.SyntaxKind.ImportKeyword) {
		return escape(state, "super", node, meta);
	}
	const collection = liftCollectionCall(state, node, meta);
	if (collection !== undefined) return collection;
	const name = dottedName(node.expression);
	if (name === undefined) return escape(state, "dynamic_call", node, meta);
	return functionCall(name, node.arguments.map((a) => lift(state, a)), meta);
}

//==============================================================================
// Bindings
//==============================================================================

/** Identifier or array binding pattern as an assignable target. */
function liftBindingName(name: ts.BindingName): IrNode | undefined {
	if (ts.isIdentifier(name)) return variable(name.text);
	if (!ts.isArrayBindingPattern(name)) return undefined;
	const items: IrNode[] = [];
	for (const element of name.elements) {
		if (ts.isOmittedExpression(element) || element.dotDotDotToken !== undefined || element.initializer !== undefined) {
			return undefined;
		}
		const inner = liftBindingName(element.name);
		if (inner === undefined) return undefined;
		items.push(inner);
	}
	return list(items);
}

function liftVariableStatement(state: TsLiftState, node: ts.VariableStatement, meta: Meta): IrNode {
	if (hasModifier(node, ts.SyntaxKind.DeclareKeyword)) return escape(state, "ambient_declaration", node, meta);
	const declarations = node.declarationList.declarations;
	const [declaration] = declarations;
	if (declarations.length !== 1 || declaration === undefined) {
		return escape(state, "multiple_declarations", node, meta);
	}
	if (declaration.initializer === undefined) return escape(state, "uninitialized_declaration", node, meta);
	const target = liftBindingName(declaration.name);
	if (target === undefined) return escape(state, "destructuring", node, meta);
	const extra: Meta = { declaration: declarationKind(node.declarationList) };
	if (hasModifier(node, ts.SyntaxKind.ExportKeyword)) extra.visibility = "public";
	return assignment(target, lift(state, declaration.initializer), withMeta(meta, extra));
}

function liftForOf(state: TsLiftState, node: ts.ForOfStatement, meta: Meta): IrNode {
	if (node.awaitModifier !== undefined) return escape(state, "for_await", node, meta);
	const init = node.initializer;
	let binding: IrNode | undefined;
	let declaration = "none";
	if (ts.isVariableDeclarationList(init)) {
		const [only] = init.declarations;
		binding = init.declarations.length === 1 && only !== undefined ? liftBindingName(only.name) : undefined;
		declaration = declarationKind(init);
	} else {
		binding = lift(state, init);
	}
	if (binding === undefined) return escape(state, "destructuring", node, meta);
	return loop("for_each", binding, lift(state, node.expression), lift(state, node.statement), withMeta(meta, { declaration }));
}

//==============================================================================
// Functions
//==============================================================================

function liftParams(state: TsLiftState, params: readonly ts.ParameterDeclaration[]): ParamNode[] | undefined {
	const result: ParamNode[] = [];
	for (const param of params) {
		if (ts.isIdentifier(param.name) && param.name.text === "this") continue;
		if (param.dotDotDotToken !== undefined || ts.getModifiers(param) !== undefined || hasDecorators(param)) {
			return undefined;
		}
		if (ts.isIdentifier(param.name)) {
			result.push(param.initializer === undefined
				? paramName(param.name.text)
				: paramDefault(param.name.text, lift(state, param.initializer)));
			continue;
		}
		const pattern = param.initializer === undefined ? liftBindingName(param.name) : undefined;
		if (pattern === undefined) return undefined;
		result.push(paramPattern(pattern));
	}
	return result;
}

/** Async bodies are wrapped in async_operation(async, ...). */
function liftFunctionBody(state: TsLiftState, node: ts.FunctionLikeDeclaration): IrNode | undefined {
	if (node.body === undefined) return undefined;
	const body = lift(state, node.body);
	return hasModifier(node, ts.SyntaxKind.AsyncKeyword) ? asyncOperation("async", body) : body;
}

function liftFunctionLike(state: TsLiftState, node: ts.ArrowFunction | ts.FunctionExpression, meta: Meta): IrNode {
	if (ts.isFunctionExpression(node) && node.asteriskToken !== undefined) return escape(state, "generator", node, meta);
	const params = liftParams(state, node.parameters);
	const body = liftFunctionBody(state, node);
	if (params === undefined || body === undefined) return escape(state, "parameters", node, meta);
	return lambda(params, body, meta);
}

function liftFunctionDeclaration(state: TsLiftState, node: ts.FunctionDeclaration, meta: Meta): IrNode {
	if (node.asteriskToken !== undefined) return escape(state, "generator", node, meta);
	if (node.name === undefined || node.body === undefined) return escape(state, "overload", node, meta);
	const params = liftParams(state, node.parameters);
	const body = liftFunctionBody(state, node);
	if (params === undefined || body === undefined) return escape(state, "parameters", node, meta);
	const visibility = hasModifier(node, ts.SyntaxKind.ExportKeyword) ? "public" : "private";
	return functionDef(node.name.text, params, body, withMeta(meta, { visibility }));
}

//==============================================================================
// Classes and namespaces
//==============================================================================

function memberMeta(node: ts.ClassElement): Meta {
	const meta: Meta = {};
	if (hasModifier(node, ts.SyntaxKind.StaticKeyword)) meta.static = true;
	if (hasModifier(node, ts.SyntaxKind.PrivateKeyword)) meta.visibility = "private";
	else if (hasModifier(node, ts.SyntaxKind.ProtectedKeyword)) meta.visibility = "protected";
	return meta;
}

/** Methods, fields, constructors and accessor pairs; undefined for anything else. */
function liftMembers(state: TsLiftState, node: ts.ClassDeclaration): IrNode[] | undefined {
	const members: IrNode[] = [];
	const accessors = new Map<string, { getter: IrNode | null; setter: IrNode | null; index: number }>();

	for (const member of node.members) {
		if (ts.isSemicolonClassElement(member)) continue;
		if (hasDecorators(member)) return undefined;
		const meta = memberMeta(member);

		if (ts.isConstructorDeclaration(member) || ts.isMethodDeclaration(member)) {
			const name = ts.isConstructorDeclaration(member) ? "constructor" : ts.isIdentifier(member.name) ? member.name.text : undefined;
			const params = liftParams(state, member.parameters);
			const body = liftFunctionBody(state, member);
			if (name === undefined || params === undefined || body === undefined) return undefined;
			members.push(functionDef(name, params, body, meta));
			continue;
		}
		if (ts.isPropertyDeclaration(member) && ts.isIdentifier(member.name)) {
			const value = member.initializer === undefined
				? nil({ original_literal: "undefined" })
				: lift(state, member.initializer);
			members.push(assignment(variable(member.name.text), value, withMeta(meta, { member: "field" })));
			continue;
		}
		if ((ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) && ts.isIdentifier(member.name)) {
			const params = liftParams(state, member.parameters);
			const body = member.body === undefined ? undefined : lift(state, member.body);
			if (params === undefined || body === undefined) return undefined;
			const name = member.name.text;
			let entry = accessors.get(name);
			if (entry === undefined) {
				entry = { getter: null, setter: null, index: members.length };
				accessors.set(name, entry);
				members.push(property(name, null, null));
			}
			if (ts.isGetAccessorDeclaration(member)) entry.getter = lambda(params, body);
			else entry.setter = lambda(params, body);
			continue;
		}
		return undefined;
	}

	for (const [name, entry] of accessors) {
		members[entry.index] = property(name, entry.getter, entry.setter);
	}
	return members;
}

function liftClass(state: TsLiftState, node: ts.ClassDeclaration, meta: Meta): IrNode {
	if (hasDecorators(node)) return escape(state, "decorated_class", node, meta);
	if (node.heritageClauses !== undefined && node.heritageClauses.length > 0) {
		return escape(state, "class_heritage", node, meta);
	}
	if (node.name === undefined) return escape(state, "anonymous_class", node, meta);
	const members = liftMembers(state, node);
	if (members === undefined) return escape(state, "class_member", node, meta);
	return container("class", node.name.text, members, meta);
}

/** `namespace A.B { ... }` nests declarations; the name is joined back up. */
function liftNamespace(state: TsLiftState, node: ts.ModuleDeclaration, meta: Meta): IrNode {
	if (!ts.isIdentifier(node.name) || hasModifier(node, ts.SyntaxKind.DeclareKeyword)) {
		return escape(state, "ambient_module", node, meta);
	}
	const names = [node.name.text];
	let body = node.body;
	while (body !== undefined && ts.isModuleDeclaration(body) && ts.isIdentifier(body.name)) {
		names.push(body.name.text);
		body = body.body;
	}
	if (body === undefined || !ts.isModuleBlock(body)) return escape(state, "ambient_module", node, meta);
	return container("namespace", names.join("."), body.statements.map((s) => lift(state, s)), meta);
}

//==============================================================================
// Exceptions
//==============================================================================

function liftTry(state: TsLiftState, node: ts.TryStatement, meta: Meta): IrNode {
	const handlers: MatchArmNode[] = [];
	const clause = node.catchClause;
	if (clause !== undefined) {
		const name = clause.variableDeclaration?.name;
		if (name !== undefined && !ts.isIdentifier(name)) return escape(state, "destructuring", node, meta);
		handlers.push(matchArm(name === undefined ? null : variable(name.text), null, lift(state, clause.block), loc(state, clause)));
	}
	return exceptionHandling(
		lift(state, node.tryBlock),
		handlers,
		node.finallyBlock === undefined ? null : lift(state, node.finallyBlock),
		meta,
	);
}
