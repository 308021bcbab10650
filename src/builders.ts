// STRATA Node Builders
// One constructor per tag. Builders never validate; use conforms() for that.

import type {
	AssignmentNode,
	AsyncKind,
	AsyncOperationNode,
	AttributeAccessNode,
	AugmentedAssignmentNode,
	BinaryOpNode,
	BlockNode,
	CollectionOpKind,
	CollectionOpNode,
	ConditionalNode,
	ContainerKind,
	ContainerNode,
	EarlyReturnKind,
	EarlyReturnNode,
	ExceptionHandlingNode,
	FunctionCallNode,
	FunctionDefNode,
	InlineMatchNode,
	IrNode,
	LambdaNode,
	LanguageSpecificNode,
	ListNode,
	LiteralNode,
	LiteralPayload,
	LoopKind,
	LoopNode,
	MapNode,
	MatchArmNode,
	Meta,
	OperatorCategory,
	PairNode,
	ParamNode,
	PatternMatchNode,
	PropertyNode,
	TupleNode,
	UnaryOpNode,
	VariableNode,
} from "./types.js";

//==============================================================================
// Core
//==============================================================================

export function literal(payload: LiteralPayload, meta: Meta = {}): LiteralNode {
	return { tag: "literal", meta, payload };
}

export const int = (value: number, meta: Meta = {}): LiteralNode => literal(["integer", value], meta);
export const float = (value: number, meta: Meta = {}): LiteralNode => literal(["float", value], meta);
export const str = (value: string, meta: Meta = {}): LiteralNode => literal(["string", value], meta);
export const bool = (value: boolean, meta: Meta = {}): LiteralNode => literal(["boolean", value], meta);
export const nil = (meta: Meta = {}): LiteralNode => literal(["null", null], meta);
export const symbol = (value: string, meta: Meta = {}): LiteralNode => literal(["symbol", value], meta);

export function variable(name: string, meta: Meta = {}): VariableNode {
	return { tag: "variable", meta, payload: name };
}

export function list(items: IrNode[], meta: Meta = {}): ListNode {
	return { tag: "list", meta, payload: items };
}

export function map(pairs: PairNode[], meta: Meta = {}): MapNode {
	return { tag: "map", meta, payload: pairs };
}

export function pair(key: IrNode, value: IrNode, meta: Meta = {}): PairNode {
	return { tag: "pair", meta, payload: [key, value] };
}

export function tuple(items: IrNode[], meta: Meta = {}): TupleNode {
	return { tag: "tuple", meta, payload: items };
}

export function binaryOp(
	category: OperatorCategory,
	operator: string,
	left: IrNode,
	right: IrNode,
	meta: Meta = {},
): BinaryOpNode {
	return { tag: "binary_op", meta, payload: [category, operator, left, right] };
}

export function unaryOp(
	category: OperatorCategory,
	operator: string,
	operand: IrNode,
	meta: Meta = {},
): UnaryOpNode {
	return { tag: "unary_op", meta, payload: [category, operator, operand] };
}

export function functionCall(name: string, args: IrNode[], meta: Meta = {}): FunctionCallNode {
	return { tag: "function_call", meta, payload: [name, args] };
}

export function conditional(
	condition: IrNode,
	then: IrNode,
	otherwise: IrNode | null,
	meta: Meta = {},
): ConditionalNode {
	return { tag: "conditional", meta, payload: [condition, then, otherwise] };
}

export function block(statements: IrNode[], meta: Meta = {}): BlockNode {
	return { tag: "block", meta, payload: statements };
}

export function earlyReturn(
	kind: EarlyReturnKind,
	value: IrNode | null,
	meta: Meta = {},
): EarlyReturnNode {
	return { tag: "early_return", meta, payload: [kind, value] };
}

export function assignment(target: IrNode, value: IrNode, meta: Meta = {}): AssignmentNode {
	return { tag: "assignment", meta, payload: [target, value] };
}

export function inlineMatch(pattern: IrNode, value: IrNode, meta: Meta = {}): InlineMatchNode {
	return { tag: "inline_match", meta, payload: [pattern, value] };
}

//==============================================================================
// Extended
//==============================================================================

export function loop(
	kind: LoopKind,
	binding: IrNode | null,
	source: IrNode,
	body: IrNode,
	meta: Meta = {},
): LoopNode {
	return { tag: "loop", meta, payload: [kind, binding, source, body] };
}

export function lambda(params: ParamNode[], body: IrNode, meta: Meta = {}): LambdaNode {
	return { tag: "lambda", meta, payload: [params, body] };
}

export function collectionOp(
	op: CollectionOpKind,
	fn: IrNode,
	collection: IrNode,
	initial: IrNode | null = null,
	meta: Meta = {},
): CollectionOpNode {
	return { tag: "collection_op", meta, payload: [op, fn, collection, initial] };
}

export function patternMatch(
	scrutinee: IrNode,
	arms: MatchArmNode[],
	meta: Meta = {},
): PatternMatchNode {
	return { tag: "pattern_match", meta, payload: [scrutinee, arms] };
}

export function matchArm(
	pattern: IrNode | null,
	guard: IrNode | null,
	body: IrNode,
	meta: Meta = {},
): MatchArmNode {
	return { tag: "match_arm", meta, payload: [pattern, guard, body] };
}

export function exceptionHandling(
	body: IrNode,
	handlers: MatchArmNode[],
	cleanup: IrNode | null,
	meta: Meta = {},
): ExceptionHandlingNode {
	return { tag: "exception_handling", meta, payload: [body, handlers, cleanup] };
}

export function asyncOperation(kind: AsyncKind, operation: IrNode, meta: Meta = {}): AsyncOperationNode {
	return { tag: "async_operation", meta, payload: [kind, operation] };
}

//==============================================================================
// Structural
//==============================================================================

export function container(
	kind: ContainerKind,
	name: string,
	body: IrNode[],
	meta: Meta = {},
): ContainerNode {
	return { tag: "container", meta, payload: [kind, name, body] };
}

export function functionDef(
	name: string,
	params: ParamNode[],
	body: IrNode,
	meta: Meta = {},
): FunctionDefNode {
	return { tag: "function_def", meta, payload: [name, params, body] };
}

export function paramName(name: string, meta: Meta = {}): ParamNode {
	return { tag: "param", meta, payload: ["name", name] };
}

export function paramPattern(pattern: IrNode, meta: Meta = {}): ParamNode {
	return { tag: "param", meta, payload: ["pattern", pattern] };
}

export function paramDefault(name: string, fallback: IrNode, meta: Meta = {}): ParamNode {
	return { tag: "param", meta, payload: ["default", name, fallback] };
}

export function attributeAccess(receiver: IrNode, attribute: string, meta: Meta = {}): AttributeAccessNode {
	return { tag: "attribute_access", meta, payload: [receiver, attribute] };
}

export function augmentedAssignment(
	category: OperatorCategory,
	operator: string,
	target: IrNode,
	value: IrNode,
	meta: Meta = {},
): AugmentedAssignmentNode {
	return { tag: "augmented_assignment", meta, payload: [category, operator, target, value] };
}

export function property(
	name: string,
	getter: IrNode | null,
	setter: IrNode | null,
	meta: Meta = {},
): PropertyNode {
	return { tag: "property", meta, payload: [name, getter, setter] };
}

//==============================================================================
// Native
//==============================================================================

export function languageSpecific(
	language: string,
	hint: string,
	native: unknown,
	meta: Meta = {},
): LanguageSpecificNode {
	return { tag: "language_specific", meta, payload: [language, hint, native] };
}
