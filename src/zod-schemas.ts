// STRATA Zod Schemas
// One schema per tag describing the payload rule of that tag.
//
// Schemas are shallow: a child position only checks that it holds a node
// triple (NodeRefSchema). The validator walks children itself, so that
// depth, cycles and error paths stay under its control. Node interfaces live
// in types.ts and every schema is annotated with the interface it produces.

import { z } from "zod/v4";
import type {
	IrNode,
	LiteralPayload,
	Meta,
	MetaValue,
	NodeOf,
	ParamPayload,
	RegexValue,
	Tag,
} from "./types.js";
import {
	ASYNC_KINDS,
	COLLECTION_OPS,
	CONTAINER_KINDS,
	EARLY_RETURN_KINDS,
	LOOP_KINDS,
	OPERATOR_CATEGORIES,
} from "./types.js";

//==============================================================================
// Primitives
//==============================================================================

/** Metadata values nested deeper than this are rejected. */
const META_DEPTH_LIMIT = 64;

function isRecord(val: unknown): val is Record<string, unknown> {
	return val !== null && typeof val === "object" && !Array.isArray(val);
}

/**
 * JSON-value check for metadata. Iterative with a depth bound so that cyclic
 * or hostile values are rejected instead of overflowing the stack.
 */
export function isMetaValue(value: unknown): value is MetaValue {
	const stack: { value: unknown; depth: number }[] = [{ value, depth: 0 }];
	while (stack.length > 0) {
		const top = stack.pop();
		if (top === undefined) break;
		const current = top.value;
		if (current === null || typeof current === "string" || typeof current === "boolean") continue;
		if (typeof current === "number") {
			if (!Number.isFinite(current)) return false;
			continue;
		}
		if (top.depth >= META_DEPTH_LIMIT) return false;
		if (Array.isArray(current)) {
			for (const item of current) stack.push({ value: item, depth: top.depth + 1 });
			continue;
		}
		if (!isRecord(current)) return false;
		for (const item of Object.values(current)) stack.push({ value: item, depth: top.depth + 1 });
	}
	return true;
}

/** A value with the outer shape of a node triple; its contents are checked separately. */
export function isNodeLike(value: unknown): value is IrNode {
	return isRecord(value) && typeof value.tag === "string" && isRecord(value.meta) && "payload" in value;
}

export const MetaValueSchema: z.ZodType<MetaValue> = z
	.custom<MetaValue>(isMetaValue, "Metadata values must be JSON values")
	.meta({ id: "MetaValue", title: "Metadata Value", description: "JSON value attached to a node" });

export const MetaSchema: z.ZodType<Meta> = z
	.record(z.string(), MetaValueSchema)
	.meta({ id: "Meta", title: "Node Metadata", description: "Named node attributes" });

export const NodeRefSchema: z.ZodType<IrNode> = z
	.custom<IrNode>(isNodeLike, "Expected a node triple { tag, meta, payload }")
	.meta({ id: "NodeRef", title: "Child Node", description: "Child position holding a node" });

const OptionalNodeRef = NodeRefSchema.nullable();
const NodeList = z.array(NodeRefSchema);

function tagged<K extends Tag>(tag: K): z.ZodType<NodeOf<K>> {
	return z.custom<NodeOf<K>>((v) => isNodeLike(v) && v.tag === tag, `Expected a ${tag} node`);
}

const Category = z.enum(OPERATOR_CATEGORIES);
const Operator = z.string().min(1);
const Name = z.string().min(1);

//==============================================================================
// Core Layer
//==============================================================================

const RegexValueSchema: z.ZodType<RegexValue> = z.object({
	source: z.string(),
	flags: z.string(),
});

export const LiteralPayloadSchema: z.ZodType<LiteralPayload> = z.union([
	z.tuple([z.literal("integer"), z.number().int()]),
	z.tuple([z.literal("float"), z.number()]),
	z.tuple([z.literal("string"), z.string()]),
	z.tuple([z.literal("boolean"), z.boolean()]),
	z.tuple([z.literal("null"), z.null()]),
	z.tuple([z.literal("symbol"), z.string()]),
	z.tuple([z.literal("regex"), RegexValueSchema]),
]);

export const LiteralSchema: z.ZodType<NodeOf<"literal">> = z.object({
	tag: z.literal("literal"),
	meta: MetaSchema,
	payload: LiteralPayloadSchema,
}).meta({ id: "Literal", title: "Literal", description: "Constant value with a subtype" });

export const VariableSchema: z.ZodType<NodeOf<"variable">> = z.object({
	tag: z.literal("variable"),
	meta: MetaSchema,
	payload: Name,
}).meta({ id: "Variable", title: "Variable", description: "Reference to a named binding" });

export const ListSchema: z.ZodType<NodeOf<"list">> = z.object({
	tag: z.literal("list"),
	meta: MetaSchema,
	payload: NodeList,
}).meta({ id: "List", title: "List", description: "Ordered sequence" });

export const MapSchema: z.ZodType<NodeOf<"map">> = z.object({
	tag: z.literal("map"),
	meta: MetaSchema,
	payload: z.array(tagged("pair")),
}).meta({ id: "Map", title: "Map", description: "Key/value collection of pairs" });

export const PairSchema: z.ZodType<NodeOf<"pair">> = z.object({
	tag: z.literal("pair"),
	meta: MetaSchema,
	payload: z.tuple([NodeRefSchema, NodeRefSchema]),
}).meta({ id: "Pair", title: "Pair", description: "Map entry" });

export const TupleSchema: z.ZodType<NodeOf<"tuple">> = z.object({
	tag: z.literal("tuple"),
	meta: MetaSchema,
	payload: NodeList,
}).meta({ id: "Tuple", title: "Tuple", description: "Fixed-size heterogeneous sequence" });

export const BinaryOpSchema: z.ZodType<NodeOf<"binary_op">> = z.object({
	tag: z.literal("binary_op"),
	meta: MetaSchema,
	payload: z.tuple([Category, Operator, NodeRefSchema, NodeRefSchema]),
}).meta({ id: "BinaryOp", title: "Binary Operation", description: "Categorised two-operand operator" });

export const UnaryOpSchema: z.ZodType<NodeOf<"unary_op">> = z.object({
	tag: z.literal("unary_op"),
	meta: MetaSchema,
	payload: z.tuple([Category, Operator, NodeRefSchema]),
}).meta({ id: "UnaryOp", title: "Unary Operation", description: "Categorised one-operand operator" });

export const FunctionCallSchema: z.ZodType<NodeOf<"function_call">> = z.object({
	tag: z.literal("function_call"),
	meta: MetaSchema,
	payload: z.tuple([Name, NodeList]),
}).meta({ id: "FunctionCall", title: "Function Call", description: "Call of a named function" });

export const ConditionalSchema: z.ZodType<NodeOf<"conditional">> = z.object({
	tag: z.literal("conditional"),
	meta: MetaSchema,
	payload: z.tuple([NodeRefSchema, NodeRefSchema, OptionalNodeRef]),
}).meta({ id: "Conditional", title: "Conditional", description: "Two-way branch with optional else" });

export const BlockSchema: z.ZodType<NodeOf<"block">> = z.object({
	tag: z.literal("block"),
	meta: MetaSchema,
	payload: NodeList,
}).meta({ id: "Block", title: "Block", description: "Statement sequence" });

export const EarlyReturnSchema: z.ZodType<NodeOf<"early_return">> = z.object({
	tag: z.literal("early_return"),
	meta: MetaSchema,
	payload: z.tuple([z.enum(EARLY_RETURN_KINDS), OptionalNodeRef]),
}).meta({ id: "EarlyReturn", title: "Early Return", description: "return, break or continue" });

export const AssignmentSchema: z.ZodType<NodeOf<"assignment">> = z.object({
	tag: z.literal("assignment"),
	meta: MetaSchema,
	payload: z.tuple([NodeRefSchema, NodeRefSchema]),
}).meta({ id: "Assignment", title: "Assignment", description: "Imperative binding or mutation" });

export const InlineMatchSchema: z.ZodType<NodeOf<"inline_match">> = z.object({
	tag: z.literal("inline_match"),
	meta: MetaSchema,
	payload: z.tuple([NodeRefSchema, NodeRefSchema]),
}).meta({ id: "InlineMatch", title: "Inline Match", description: "Declarative unification of a pattern with a value" });

//==============================================================================
// Extended Layer
//==============================================================================

export const LoopSchema: z.ZodType<NodeOf<"loop">> = z.object({
	tag: z.literal("loop"),
	meta: MetaSchema,
	payload: z.tuple([z.enum(LOOP_KINDS), OptionalNodeRef, NodeRefSchema, NodeRefSchema]),
}).refine(
	(node) => (node.payload[0] === "while") === (node.payload[1] === null),
	{ message: "while loops have no binding; for_each loops require one", path: ["payload", 1] },
).meta({ id: "Loop", title: "Loop", description: "while or for_each iteration" });

export const LambdaSchema: z.ZodType<NodeOf<"lambda">> = z.object({
	tag: z.literal("lambda"),
	meta: MetaSchema,
	payload: z.tuple([z.array(tagged("param")), NodeRefSchema]),
}).meta({ id: "Lambda", title: "Lambda", description: "Anonymous function" });

export const CollectionOpSchema: z.ZodType<NodeOf<"collection_op">> = z.object({
	tag: z.literal("collection_op"),
	meta: MetaSchema,
	payload: z.tuple([z.enum(COLLECTION_OPS), NodeRefSchema, NodeRefSchema, OptionalNodeRef]),
}).refine(
	(node) => (node.payload[0] === "reduce") === (node.payload[3] !== null),
	{ message: "initial value is required for reduce and forbidden otherwise", path: ["payload", 3] },
).meta({ id: "CollectionOp", title: "Collection Operation", description: "map, filter or reduce" });

export const PatternMatchSchema: z.ZodType<NodeOf<"pattern_match">> = z.object({
	tag: z.literal("pattern_match"),
	meta: MetaSchema,
	payload: z.tuple([NodeRefSchema, z.array(tagged("match_arm"))]),
}).meta({ id: "PatternMatch", title: "Pattern Match", description: "Multi-arm match on a scrutinee" });

export const MatchArmSchema: z.ZodType<NodeOf<"match_arm">> = z.object({
	tag: z.literal("match_arm"),
	meta: MetaSchema,
	payload: z.tuple([OptionalNodeRef, OptionalNodeRef, NodeRefSchema]),
}).meta({ id: "MatchArm", title: "Match Arm", description: "Pattern, optional guard and body" });

export const ExceptionHandlingSchema: z.ZodType<NodeOf<"exception_handling">> = z.object({
	tag: z.literal("exception_handling"),
	meta: MetaSchema,
	payload: z.tuple([NodeRefSchema, z.array(tagged("match_arm")), OptionalNodeRef]),
}).meta({ id: "ExceptionHandling", title: "Exception Handling", description: "Body, handlers and cleanup" });

export const AsyncOperationSchema: z.ZodType<NodeOf<"async_operation">> = z.object({
	tag: z.literal("async_operation"),
	meta: MetaSchema,
	payload: z.tuple([z.enum(ASYNC_KINDS), NodeRefSchema]),
}).meta({ id: "AsyncOperation", title: "Async Operation", description: "await or async" });

//==============================================================================
// Structural Layer
//==============================================================================

export const ContainerSchema: z.ZodType<NodeOf<"container">> = z.object({
	tag: z.literal("container"),
	meta: MetaSchema,
	payload: z.tuple([z.enum(CONTAINER_KINDS), Name, NodeList]),
}).meta({ id: "Container", title: "Container", description: "Module, class or namespace" });

export const FunctionDefSchema: z.ZodType<NodeOf<"function_def">> = z.object({
	tag: z.literal("function_def"),
	meta: MetaSchema,
	payload: z.tuple([Name, z.array(tagged("param")), NodeRefSchema]),
}).meta({ id: "FunctionDef", title: "Function Definition", description: "Named function" });

const ParamPayloadSchema: z.ZodType<ParamPayload> = z.union([
	z.tuple([z.literal("name"), Name]),
	z.tuple([z.literal("pattern"), NodeRefSchema]),
	z.tuple([z.literal("default"), Name, NodeRefSchema]),
]);

export const ParamSchema: z.ZodType<NodeOf<"param">> = z.object({
	tag: z.literal("param"),
	meta: MetaSchema,
	payload: ParamPayloadSchema,
}).meta({ id: "Param", title: "Parameter", description: "Plain, pattern or defaulted parameter" });

export const AttributeAccessSchema: z.ZodType<NodeOf<"attribute_access">> = z.object({
	tag: z.literal("attribute_access"),
	meta: MetaSchema,
	payload: z.tuple([NodeRefSchema, Name]),
}).meta({ id: "AttributeAccess", title: "Attribute Access", description: "Field read on a receiver" });

export const AugmentedAssignmentSchema: z.ZodType<NodeOf<"augmented_assignment">> = z.object({
	tag: z.literal("augmented_assignment"),
	meta: MetaSchema,
	payload: z.tuple([Category, Operator, NodeRefSchema, NodeRefSchema]),
}).meta({ id: "AugmentedAssignment", title: "Augmented Assignment", description: "Compound assignment such as x += 1" });

export const PropertySchema: z.ZodType<NodeOf<"property">> = z.object({
	tag: z.literal("property"),
	meta: MetaSchema,
	payload: z.tuple([Name, OptionalNodeRef, OptionalNodeRef]),
}).meta({ id: "Property", title: "Property", description: "Accessor pair" });

//==============================================================================
// Native Layer
//==============================================================================

export const LanguageSpecificSchema: z.ZodType<NodeOf<"language_specific">> = z.object({
	tag: z.literal("language_specific"),
	meta: MetaSchema,
	payload: z.tuple([Name, Name, z.unknown()]),
}).meta({ id: "LanguageSpecific", title: "Language Specific", description: "Opaque native construct" });

//==============================================================================
// Schema Table
//==============================================================================

export const NODE_SCHEMAS: { [K in Tag]: z.ZodType<NodeOf<K>> } = {
	literal: LiteralSchema,
	variable: VariableSchema,
	list: ListSchema,
	map: MapSchema,
	pair: PairSchema,
	tuple: TupleSchema,
	binary_op: BinaryOpSchema,
	unary_op: UnaryOpSchema,
	function_call: FunctionCallSchema,
	conditional: ConditionalSchema,
	block: BlockSchema,
	early_return: EarlyReturnSchema,
	assignment: AssignmentSchema,
	inline_match: InlineMatchSchema,
	loop: LoopSchema,
	lambda: LambdaSchema,
	collection_op: CollectionOpSchema,
	pattern_match: PatternMatchSchema,
	match_arm: MatchArmSchema,
	exception_handling: ExceptionHandlingSchema,
	async_operation: AsyncOperationSchema,
	container: ContainerSchema,
	function_def: FunctionDefSchema,
	param: ParamSchema,
	attribute_access: AttributeAccessSchema,
	augmented_assignment: AugmentedAssignmentSchema,
	property: PropertySchema,
	language_specific: LanguageSpecificSchema,
};

export interface ShallowIssue {
	path: PropertyKey[];
	message: string;
}

export type ShallowParseResult =
	| { success: true; node: IrNode }
	| { success: false; issues: ShallowIssue[] };

/** Shallow parse of a single node against its tag's rule. */
export function parseNodeShallow(tag: Tag, value: unknown): ShallowParseResult {
	const schema: z.ZodType<IrNode> = NODE_SCHEMAS[tag];
	const parsed = schema.safeParse(value);
	if (parsed.success) {
		return { success: true, node: parsed.data };
	}
	return {
		success: false,
		issues: parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
	};
}
