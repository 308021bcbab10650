// STRATA Node Types
// Uniform (tag, meta, payload) triples for the cross-language IR, grouped by layer.

//==============================================================================
// Metadata
//==============================================================================

export type MetaValue =
	| string
	| number
	| boolean
	| null
	| MetaValue[]
	| { [key: string]: MetaValue };

/**
 * Named, ordered node attributes. Insertion order is the attribute order.
 * Core nodes never need anything in here to be interpreted.
 */
export type Meta = Record<string, MetaValue>;

export interface NodeBase<T extends string, P> {
	tag: T;
	meta: Meta;
	payload: P;
}

//==============================================================================
// Scalar vocabularies
//==============================================================================

export const LITERAL_SUBTYPES = [
	"integer",
	"float",
	"string",
	"boolean",
	"null",
	"symbol",
	"regex",
] as const;
export type LiteralSubtype = (typeof LITERAL_SUBTYPES)[number];

export const OPERATOR_CATEGORIES = ["arithmetic", "comparison", "boolean"] as const;
export type OperatorCategory = (typeof OPERATOR_CATEGORIES)[number];

export const EARLY_RETURN_KINDS = ["return", "break", "continue"] as const;
export type EarlyReturnKind = (typeof EARLY_RETURN_KINDS)[number];

export const LOOP_KINDS = ["while", "for_each"] as const;
export type LoopKind = (typeof LOOP_KINDS)[number];

export const COLLECTION_OPS = ["map", "filter", "reduce"] as const;
export type CollectionOpKind = (typeof COLLECTION_OPS)[number];

export const ASYNC_KINDS = ["await", "async"] as const;
export type AsyncKind = (typeof ASYNC_KINDS)[number];

export const CONTAINER_KINDS = ["module", "class", "namespace"] as const;
export type ContainerKind = (typeof CONTAINER_KINDS)[number];

export interface RegexValue {
	source: string;
	flags: string;
}

export type LiteralPayload =
	| ["integer", number]
	| ["float", number]
	| ["string", string]
	| ["boolean", boolean]
	| ["null", null]
	| ["symbol", string]
	| ["regex", RegexValue];

//==============================================================================
// Core layer
//==============================================================================

export type LiteralNode = NodeBase<"literal", LiteralPayload>;
export type VariableNode = NodeBase<"variable", string>;
export type ListNode = NodeBase<"list", IrNode[]>;
export type MapNode = NodeBase<"map", PairNode[]>;
export type PairNode = NodeBase<"pair", [key: IrNode, value: IrNode]>;
export type TupleNode = NodeBase<"tuple", IrNode[]>;
export type BinaryOpNode = NodeBase<
	"binary_op",
	[category: OperatorCategory, operator: string, left: IrNode, right: IrNode]
>;
export type UnaryOpNode = NodeBase<
	"unary_op",
	[category: OperatorCategory, operator: string, operand: IrNode]
>;
export type FunctionCallNode = NodeBase<"function_call", [name: string, args: IrNode[]]>;
export type ConditionalNode = NodeBase<
	"conditional",
	[condition: IrNode, then: IrNode, otherwise: IrNode | null]
>;
export type BlockNode = NodeBase<"block", IrNode[]>;
export type EarlyReturnNode = NodeBase<"early_return", [kind: EarlyReturnKind, value: IrNode | null]>;
export type AssignmentNode = NodeBase<"assignment", [target: IrNode, value: IrNode]>;
export type InlineMatchNode = NodeBase<"inline_match", [pattern: IrNode, value: IrNode]>;

export type CoreNode =
	| LiteralNode | VariableNode | ListNode | MapNode | PairNode | TupleNode
	| BinaryOpNode | UnaryOpNode | FunctionCallNode | ConditionalNode
	| BlockNode | EarlyReturnNode | AssignmentNode | InlineMatchNode;

//==============================================================================
// Extended layer
//==============================================================================

export type LoopNode = NodeBase<
	"loop",
	[kind: LoopKind, binding: IrNode | null, source: IrNode, body: IrNode]
>;
export type LambdaNode = NodeBase<"lambda", [params: ParamNode[], body: IrNode]>;
export type CollectionOpNode = NodeBase<
	"collection_op",
	[op: CollectionOpKind, fn: IrNode, collection: IrNode, initial: IrNode | null]
>;
export type PatternMatchNode = NodeBase<"pattern_match", [scrutinee: IrNode, arms: MatchArmNode[]]>;
export type MatchArmNode = NodeBase<
	"match_arm",
	[pattern: IrNode | null, guard: IrNode | null, body: IrNode]
>;
export type ExceptionHandlingNode = NodeBase<
	"exception_handling",
	[body: IrNode, handlers: MatchArmNode[], cleanup: IrNode | null]
>;
export type AsyncOperationNode = NodeBase<"async_operation", [kind: AsyncKind, operation: IrNode]>;

export type ExtendedNode =
	| LoopNode | LambdaNode | CollectionOpNode | PatternMatchNode
	| MatchArmNode | ExceptionHandlingNode | AsyncOperationNode;

//==============================================================================
// Structural layer
//==============================================================================

export type ParamPayload =
	| ["name", name: string]
	| ["pattern", pattern: IrNode]
	| ["default", name: string, fallback: IrNode];

export type ContainerNode = NodeBase<
	"container",
	[kind: ContainerKind, name: string, body: IrNode[]]
>;
export type FunctionDefNode = NodeBase<
	"function_def",
	[name: string, params: ParamNode[], body: IrNode]
>;
export type ParamNode = NodeBase<"param", ParamPayload>;
export type AttributeAccessNode = NodeBase<"attribute_access", [receiver: IrNode, attribute: string]>;
export type AugmentedAssignmentNode = NodeBase<
	"augmented_assignment",
	[category: OperatorCategory, operator: string, target: IrNode, value: IrNode]
>;
export type PropertyNode = NodeBase<
	"property",
	[name: string, getter: IrNode | null, setter: IrNode | null]
>;

export type StructuralNode =
	| ContainerNode | FunctionDefNode | ParamNode
	| AttributeAccessNode | AugmentedAssignmentNode | PropertyNode;

//==============================================================================
// Native layer
//==============================================================================

/** Escape hatch: the native construct travels untouched as an opaque blob. */
export type LanguageSpecificNode = NodeBase<
	"language_specific",
	[language: string, hint: string, native: unknown]
>;

//==============================================================================
// Node union
//==============================================================================

export type IrNode = CoreNode | ExtendedNode | StructuralNode | LanguageSpecificNode;

export type Tag = IrNode["tag"];

export type NodeOf<K extends Tag> = Extract<IrNode, { tag: K }>;

export type Layer = "core" | "extended" | "structural" | "native";

export const CORE_TAGS = [
	"literal",
	"variable",
	"list",
	"map",
	"pair",
	"tuple",
	"binary_op",
	"unary_op",
	"function_call",
	"conditional",
	"block",
	"early_return",
	"assignment",
	"inline_match",
] as const satisfies readonly CoreNode["tag"][];

export const EXTENDED_TAGS = [
	"loop",
	"lambda",
	"collection_op",
	"pattern_match",
	"match_arm",
	"exception_handling",
	"async_operation",
] as const satisfies readonly ExtendedNode["tag"][];

export const STRUCTURAL_TAGS = [
	"container",
	"function_def",
	"param",
	"attribute_access",
	"augmented_assignment",
	"property",
] as const satisfies readonly StructuralNode["tag"][];

export const NATIVE_TAGS = ["language_specific"] as const;

export const ALL_TAGS: readonly Tag[] = [
	...CORE_TAGS,
	...EXTENDED_TAGS,
	...STRUCTURAL_TAGS,
	...NATIVE_TAGS,
];

const LAYER_RANK: Record<Layer, number> = {
	core: 0,
	extended: 1,
	structural: 2,
	native: 3,
};

const TAG_SET: ReadonlySet<string> = new Set(ALL_TAGS);

export function isTag(value: unknown): value is Tag {
	return typeof value === "string" && TAG_SET.has(value);
}

export function layerOf(tag: Tag): Layer {
	switch (tag) {
	case "literal":
	case "variable":
	case "list":
	case "map":
	case "pair":
	case "tuple":
	case "binary_op":
	case "unary_op":
	case "function_call":
	case "conditional":
	case "block":
	case "early_return":
	case "assignment":
	case "inline_match":
		return "core";
	case "loop":
	case "lambda":
	case "collection_op":
	case "pattern_match":
	case "match_arm":
	case "exception_handling":
	case "async_operation":
		return "extended";
	case "container":
	case "function_def":
	case "param":
	case "attribute_access":
	case "augmented_assignment":
	case "property":
		return "structural";
	case "language_specific":
		return "native";
	}
}

/** Higher of two layers (core < extended < structural < native). */
export function maxLayer(a: Layer, b: Layer): Layer {
	return LAYER_RANK[a] >= LAYER_RANK[b] ? a : b;
}

//==============================================================================
// Canonical operator vocabulary
//==============================================================================

export const ARITHMETIC_OPERATORS = ["+", "-", "*", "/", "div", "rem", "**", "<>"] as const;
export const COMPARISON_OPERATORS = ["==", "!=", "<", ">", "<=", ">=", "===", "!=="] as const;
export const BOOLEAN_OPERATORS = ["and", "or"] as const;
export const UNARY_OPERATORS = ["not", "-", "+"] as const;
