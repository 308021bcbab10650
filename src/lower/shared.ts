// Shared helpers for the lower (IR -> native tree) pipeline

import { capture, type Result, TransformError } from "../errors.js";
import type { Language, NativeTrees } from "../native/languages.js";
import type { IrNode, LanguageSpecificNode } from "../types.js";
import { ensureConforms } from "../validator.js";

//==============================================================================
// Fallback Registry
//==============================================================================

/** Renders another language's escape-hatch node in a target language. */
export type Fallback<L extends Language> = (node: LanguageSpecificNode) => NativeTrees[L];

/**
 * Explicitly constructed table of cross-language renderings, keyed by
 * (target, hint). Pass it to lower() through LowerOptions.fallbacks.
 */
export class FallbackRegistry {
	private readonly tables: { [L in Language]: Map<string, Fallback<L>> } = {
		elixir: new Map(),
		python: new Map(),
		typescript: new Map(),
	};

	register<L extends Language>(hint: string, target: L, fn: Fallback<L>): this {
		this.tables[target].set(hint, fn);
		return this;
	}

	lookup<L extends Language>(target: L, hint: string): Fallback<L> | undefined {
		return this.tables[target].get(hint);
	}

	has(target: Language, hint: string): boolean {
		return this.tables[target].has(hint);
	}
}

//==============================================================================
// Options and State
//==============================================================================

export interface LowerOptions {
	/** Cross-language renderings for escape-hatch nodes */
	fallbacks?: FallbackRegistry;
	/** Report fallback use and degraded renderings through console.warn (default: false) */
	verbose?: boolean;
}

export interface LowerState<L extends Language> {
	target: L;
	fallbacks: FallbackRegistry | undefined;
	verbose: boolean;
}

export function createLowerState<L extends Language>(target: L, options?: LowerOptions): LowerState<L> {
	return {
		target,
		fallbacks: options?.fallbacks,
		verbose: options?.verbose ?? false,
	};
}

export function note(state: LowerState<Language>, message: string): void {
	if (state.verbose) {
		console.warn(`[Lower:${state.target}] ${message}`);
	}
}

/**
 * Entry-point wrapper: reject non-conforming input as Malformed, then turn
 * thrown TransformErrors into a failed Result.
 */
export function runLower<T>(tree: unknown, fn: (tree: IrNode) => T): Result<T> {
	return capture(() => fn(ensureConforms(tree)));
}

//==============================================================================
// Escape hatch
//==============================================================================

/**
 * Same-language escape-hatch nodes are unwrapped verbatim; others go through
 * the fallback registry or fail as Incompatible.
 */
export function lowerNative<L extends Language>(
	state: LowerState<L>,
	node: LanguageSpecificNode,
	isNative: (value: unknown) => value is NativeTrees[L],
): NativeTrees[L] {
	const [language, hint, native] = node.payload;
	if (language === state.target) {
		if (!isNative(native)) {
			throw TransformError.malformed(`opaque ${language}/${hint} payload is not a ${language} tree`, node);
		}
		return native;
	}
	const fallback = state.fallbacks?.lookup(state.target, hint);
	if (fallback === undefined) {
		throw TransformError.incompatible(language, hint, state.target, node);
	}
	note(state, `fallback rendering for ${language}/${hint}`);
	return fallback(node);
}

/** Fail fast for a node with no rendering in the target. */
export function unsupported(state: LowerState<Language>, node: IrNode, reason: string): never {
	throw TransformError.unsupported(node.tag, node, `${reason} in ${state.target}`);
}

/** String meta value, if present. */
export function metaString(node: IrNode, key: string): string | undefined {
	const value = node.meta[key];
	return typeof value === "string" ? value : undefined;
}

export function metaNumber(node: IrNode, key: string): number | undefined {
	const value = node.meta[key];
	return typeof value === "number" ? value : undefined;
}
