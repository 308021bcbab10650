// Shared helpers for the lift (native tree -> IR) pipeline

import { languageSpecific } from "../builders.js";
import { capture, type Result, TransformError } from "../errors.js";
import {
	ARITHMETIC_OPERATORS,
	BOOLEAN_OPERATORS,
	COMPARISON_OPERATORS,
	type IrNode,
	type LanguageSpecificNode,
	type Meta,
	type OperatorCategory,
} from "../types.js";
import { ensureConforms, MAX_STRUCTURAL_DEPTH } from "../validator.js";

//==============================================================================
// Options and State
//==============================================================================

export interface LiftOptions {
	/** Copy line/column information into node metadata (default: true) */
	locations?: boolean;
	/** Report every escape-hatch node through console.warn (default: false) */
	verbose?: boolean;
}

export const DEFAULT_LIFT_OPTIONS: Required<LiftOptions> = {
	locations: true,
	verbose: false,
};

export interface LiftState {
	language: string;
	options: Required<LiftOptions>;
	/** Native nesting level of the node being converted */
	depth: number;
}

export function createLiftState(language: string, options?: LiftOptions): LiftState {
	return {
		language,
		options: { ...DEFAULT_LIFT_OPTIONS, ...options },
		depth: 0,
	};
}

//==============================================================================
// Node helpers
//==============================================================================

/** Wrap a native construct with no IR counterpart. */
export function escape(
	state: LiftState,
	hint: string,
	native: unknown,
	meta: Meta = {},
): LanguageSpecificNode {
	if (state.options.verbose) {
		console.warn(`[Lift:${state.language}] ${hint} kept as language_specific`);
	}
	return languageSpecific(state.language, hint, native, meta);
}

export function locationMeta(
	state: LiftState,
	line: number | undefined,
	column: number | undefined,
): Meta {
	if (!state.options.locations) return {};
	const meta: Meta = {};
	if (line !== undefined) meta.line = line;
	if (column !== undefined) meta.column = column;
	return meta;
}

/** Own-property table lookup; inherited names such as `constructor` miss. */
export function own<V>(table: Readonly<Record<string, V>>, key: string): V | undefined {
	return Object.hasOwn(table, key) ? table[key] : undefined;
}

/** Merge extra attributes after location info. */
export function withMeta(base: Meta, extra: Meta): Meta {
	return { ...base, ...extra };
}

/**
 * Step one nesting level down; past MAX_STRUCTURAL_DEPTH the input is
 * Malformed. Callers decrement `state.depth` once the node is converted.
 */
export function descend(state: LiftState, native: unknown): void {
	if (state.depth >= MAX_STRUCTURAL_DEPTH) {
		throw TransformError.malformed(`nesting deeper than ${MAX_STRUCTURAL_DEPTH} levels`, native);
	}
	state.depth++;
}

/**
 * Entry-point wrapper: convert, check the result conforms, and turn thrown
 * TransformErrors into a failed Result.
 */
export function runLift(fn: () => IrNode): Result<IrNode> {
	return capture(() => ensureConforms(fn()));
}

//==============================================================================
// Operator classification
//==============================================================================

export interface CanonicalOperator {
	category: OperatorCategory;
	operator: string;
}

const ARITHMETIC: ReadonlySet<string> = new Set(ARITHMETIC_OPERATORS);
const COMPARISON: ReadonlySet<string> = new Set(COMPARISON_OPERATORS);
const BOOLEAN: ReadonlySet<string> = new Set(BOOLEAN_OPERATORS);

/** Category of a canonical binary operator. */
export function categoryOf(operator: string): OperatorCategory | undefined {
	if (ARITHMETIC.has(operator)) return "arithmetic";
	if (COMPARISON.has(operator)) return "comparison";
	if (BOOLEAN.has(operator)) return "boolean";
	return undefined;
}

export function canonical(operator: string): CanonicalOperator | undefined {
	const category = categoryOf(operator);
	return category === undefined ? undefined : { category, operator };
}

/** Meta hint recording a source spelling that differs from the canonical one. */
export function spellingMeta(source: string, canonicalOperator: string): Meta {
	return source === canonicalOperator ? {} : { original_operator: source };
}
