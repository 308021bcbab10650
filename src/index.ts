// STRATA - Cross-language layered intermediate representation
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	IrNode, Tag, NodeOf, Layer, Meta, MetaValue, NodeBase,
	// Core
	CoreNode, LiteralNode, LiteralPayload, LiteralSubtype, RegexValue,
	VariableNode, ListNode, MapNode, PairNode, TupleNode,
	BinaryOpNode, UnaryOpNode, FunctionCallNode, ConditionalNode, BlockNode,
	EarlyReturnNode, AssignmentNode, InlineMatchNode,
	// Extended
	ExtendedNode, LoopNode, LambdaNode, CollectionOpNode, PatternMatchNode,
	MatchArmNode, ExceptionHandlingNode, AsyncOperationNode,
	// Structural
	StructuralNode, ContainerNode, FunctionDefNode, ParamNode, ParamPayload,
	AttributeAccessNode, AugmentedAssignmentNode, PropertyNode,
	// Native
	LanguageSpecificNode,
	// Vocabularies
	OperatorCategory, EarlyReturnKind, LoopKind, CollectionOpKind, AsyncKind, ContainerKind,
} from "./types.js";

export type {
	ErrorCode, TransformErrorCode, Result, ValidationError, ValidationResult,
} from "./errors.js";

export type { Language, NativeTrees } from "./native/languages.js";
export type { Quoted, QAtom, QFloat, QTuple, QNode } from "./native/elixir-types.js";
export type { PyNode, PyModule } from "./native/python-types.js";

//==============================================================================
// Taxonomy
//==============================================================================

export {
	CORE_TAGS, EXTENDED_TAGS, STRUCTURAL_TAGS, NATIVE_TAGS, ALL_TAGS,
	isTag, layerOf, maxLayer,
	LITERAL_SUBTYPES, OPERATOR_CATEGORIES, EARLY_RETURN_KINDS, LOOP_KINDS,
	COLLECTION_OPS, ASYNC_KINDS, CONTAINER_KINDS,
	ARITHMETIC_OPERATORS, COMPARISON_OPERATORS, BOOLEAN_OPERATORS, UNARY_OPERATORS,
} from "./types.js";

export { LANGUAGES, isLanguage, detectLanguage } from "./native/languages.js";

//==============================================================================
// Node Constructors
//==============================================================================

export {
	literal, int, float, str, bool, nil, symbol,
	variable, list, map, pair, tuple,
	binaryOp, unaryOp, functionCall, conditional, block,
	earlyReturn, assignment, inlineMatch,
	loop, lambda, collectionOp, patternMatch, matchArm,
	exceptionHandling, asyncOperation,
	container, functionDef, paramName, paramPattern, paramDefault,
	attributeAccess, augmentedAssignment, property,
	languageSpecific,
} from "./builders.js";

//==============================================================================
// Errors
//==============================================================================

export {
	ErrorCodes, StrataError, TransformError, isTransformError,
	ok, fail, capture,
	validResult, invalidResult,
	exhaustive, describeNode,
} from "./errors.js";

//==============================================================================
// Validation
//==============================================================================

export type { ValidationMode, ValidateTreeOptions, TreeReport } from "./validator.js";
export { conforms, ensureConforms, validateTree, MAX_STRUCTURAL_DEPTH } from "./validator.js";

export type { ShallowIssue, ShallowParseResult } from "./zod-schemas.js";
export { NODE_SCHEMAS, parseNodeShallow, MetaSchema, MetaValueSchema } from "./zod-schemas.js";

//==============================================================================
// Traversal
//==============================================================================

export type { Visitor } from "./traversal.js";
export {
	childrenOf, mapChildren,
	visit, prewalk, postwalk, transform, nodes,
	freeVariables, depth, nodeCount, stripMetadata,
	collectTags, highestLayer, countNative,
} from "./traversal.js";

//==============================================================================
// Canonical Form and Wire Format
//==============================================================================

export { jcsSerialize, semanticProjection, canonicalize, coreEquivalent, treeDigest } from "./canonicalize.js";

export type { WireMeta, WireNode } from "./wire.js";
export { encodeTree, decodeTree } from "./wire.js";

//==============================================================================
// Lift and Lower
//==============================================================================

export type { LiftOptions } from "./lift/shared.js";
export { liftElixir } from "./lift/elixir.js";
export { liftPython } from "./lift/python.js";
export { liftTypeScript } from "./lift/typescript.js";

export type { Fallback, LowerOptions } from "./lower/shared.js";
export { FallbackRegistry } from "./lower/shared.js";
export { lowerElixir } from "./lower/elixir.js";
export { lowerPython } from "./lower/python.js";
export { lowerTypeScript } from "./lower/typescript.js";

//==============================================================================
// Adapters and Documents
//==============================================================================

export type {
	Adapter, AdapterTable, AdapterRegistry, AdapterOptions, RoundTrip,
	StrataDocument, DocumentAnalysis,
} from "./adapters.js";
export {
	elixirAdapter, pythonAdapter, typescriptAdapter,
	createAdapterRegistry, lift, lower, roundTrip,
	createDocument, liftDocument, isDocumentValid, withTree, analyzeDocument,
} from "./adapters.js";
