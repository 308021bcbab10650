// STRATA Tree Validator
// Two-phase validation: per-tag Zod payload rules during a guarded structural
// walk, then semantic checks (mode, depth, variable budget) on the typed tree.

import {
	ErrorCodes,
	type ErrorCode,
	invalidResult,
	TransformError,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";
import { childrenOf, countNative, depth, freeVariables, highestLayer, nodeCount } from "./traversal.js";
import type { IrNode, Layer } from "./types.js";
import { isTag } from "./types.js";
import { isNodeLike, parseNodeShallow } from "./zod-schemas.js";

//==============================================================================
// Options
//==============================================================================

export type ValidationMode = "strict" | "standard" | "permissive";

export interface ValidateTreeOptions {
	/** strict rejects language_specific nodes; standard and permissive accept them */
	mode?: ValidationMode;
	/** Maximum nesting depth (a leaf has depth 1) */
	maxDepth?: number;
	/** Maximum number of distinct variable and parameter names */
	maxVariables?: number;
}

/** Nesting guard used by conforms(). */
export const MAX_STRUCTURAL_DEPTH = 1000;

const DEFAULT_OPTIONS: Required<ValidateTreeOptions> = {
	mode: "standard",
	maxDepth: MAX_STRUCTURAL_DEPTH,
	maxVariables: 10_000,
};

const DEEP_NESTING_WARNING = 100;
const LARGE_TREE_WARNING = 1000;

export interface TreeReport {
	tree: IrNode;
	/** Highest layer used anywhere in the tree */
	level: Layer;
	nativeConstructs: number;
	variables: Set<string>;
	depth: number;
	nodeCount: number;
}

//==============================================================================
// Validation State
//==============================================================================

interface WalkState {
	errors: ValidationError[];
	path: string[];
	ancestors: Set<object>;
	depthLimit: number;
	failFast: boolean;
}

function currentPath(state: WalkState): string {
	return state.path.length > 0 ? "$." + state.path.join(".") : "$";
}

function addError(state: WalkState, code: ErrorCode, message: string, suffix: PropertyKey[] = []): void {
	const segments = suffix.map(String);
	const base = currentPath(state);
	state.errors.push({
		path: segments.length > 0 ? base + "." + segments.join(".") : base,
		message,
		code,
	});
}

/** Payload path of a child, found by identity one or two levels into the payload. */
function childSegment(payload: unknown, child: IrNode): string {
	if (!Array.isArray(payload)) return "payload";
	for (let i = 0; i < payload.length; i++) {
		const slot: unknown = payload[i];
		if (slot === child) return `payload.${i}`;
		if (Array.isArray(slot)) {
			const j = slot.indexOf(child);
			if (j >= 0) return `payload.${i}.${j}`;
		}
	}
	return "payload";
}

//==============================================================================
// Structural Walk
//==============================================================================

function walk(state: WalkState, value: unknown, level: number): void {
	if (state.failFast && state.errors.length > 0) return;

	if (!isNodeLike(value)) {
		addError(state, ErrorCodes.InvalidPayload, "Expected a node triple { tag, meta, payload }");
		return;
	}
	if (level > state.depthLimit) {
		addError(state, ErrorCodes.DepthExceeded, `Nesting exceeds ${state.depthLimit} levels`);
		return;
	}
	if (state.ancestors.has(value)) {
		addError(state, ErrorCodes.CyclicTree, "Node is its own ancestor");
		return;
	}
	const tag: unknown = value.tag;
	if (!isTag(tag)) {
		addError(state, ErrorCodes.UnknownTag, `Unknown tag: ${String(tag)}`, ["tag"]);
		return;
	}

	const parsed = parseNodeShallow(tag, value);
	if (!parsed.success) {
		for (const issue of parsed.issues) {
			addError(state, ErrorCodes.InvalidPayload, issue.message, issue.path);
		}
		return;
	}

	state.ancestors.add(value);
	for (const child of childrenOf(parsed.node)) {
		state.path.push(childSegment(parsed.node.payload, child));
		walk(state, child, level + 1);
		state.path.pop();
	}
	state.ancestors.delete(value);
}

function structuralErrors(tree: unknown, depthLimit: number, failFast: boolean): ValidationError[] {
	const state: WalkState = {
		errors: [],
		path: [],
		ancestors: new Set(),
		depthLimit,
		failFast,
	};
	walk(state, tree, 1);
	return state.errors;
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Total conformance predicate: known tags, payload rules satisfied at every
 * node. Cyclic input or input nested deeper than MAX_STRUCTURAL_DEPTH is
 * non-conforming.
 */
export function conforms(tree: unknown): tree is IrNode {
	return conformsWithin(tree, MAX_STRUCTURAL_DEPTH);
}

function conformsWithin(tree: unknown, depthLimit: number): tree is IrNode {
	return structuralErrors(tree, depthLimit, true).length === 0;
}

/**
 * Return the tree typed as IrNode, or throw a Malformed TransformError
 * naming the first violation.
 */
export function ensureConforms(tree: unknown): IrNode {
	if (conforms(tree)) return tree;
	const [first] = structuralErrors(tree, MAX_STRUCTURAL_DEPTH, true);
	throw TransformError.malformed(
		first ? `${first.path}: ${first.message}` : "tree does not conform",
		tree,
	);
}

/**
 * Full validation with a report of the tree's layer, size and escape-hatch use.
 */
export function validateTree(
	tree: unknown,
	options: ValidateTreeOptions = {},
): ValidationResult<TreeReport> {
	const opts = { ...DEFAULT_OPTIONS, ...options };

	// Phase 1: structure
	if (!conformsWithin(tree, opts.maxDepth)) {
		return invalidResult<TreeReport>(structuralErrors(tree, opts.maxDepth, false));
	}

	// Phase 2: semantics on the typed tree
	const report: TreeReport = {
		tree,
		level: highestLayer(tree),
		nativeConstructs: countNative(tree),
		variables: freeVariables(tree),
		depth: depth(tree),
		nodeCount: nodeCount(tree),
	};

	const semantic: ValidationError[] = [];
	if (opts.mode === "strict" && report.nativeConstructs > 0) {
		semantic.push({
			path: "$",
			message: `strict mode rejects language_specific nodes (found ${report.nativeConstructs})`,
			code: ErrorCodes.NativeConstructRejected,
		});
	}
	if (report.variables.size > opts.maxVariables) {
		semantic.push({
			path: "$",
			message: `Too many variables: ${report.variables.size} > ${opts.maxVariables}`,
			code: ErrorCodes.TooManyVariables,
		});
	}

	const warnings: string[] = [];
	if (report.nativeConstructs > 0 && opts.mode !== "permissive") {
		warnings.push(`native_constructs_present: ${report.nativeConstructs} language_specific node(s)`);
	}
	if (report.depth > DEEP_NESTING_WARNING) {
		warnings.push(`deep_nesting: depth ${report.depth}`);
	}
	if (report.nodeCount > LARGE_TREE_WARNING) {
		warnings.push(`large_tree: ${report.nodeCount} nodes`);
	}

	if (semantic.length > 0) {
		return invalidResult<TreeReport>(semantic, warnings);
	}
	return validResult(report, warnings);
}
