// Keyword-entry classification for Elixir calls.
//
// `foo x do ... end` quotes its block as a trailing keyword list [do: body],
// the same shape as a literal keyword argument. The classifier decides which
// reading applies to each trailing entry, or reports that it cannot tell.

import {
	asNode,
	isAtom,
	isKeyword,
	isKeywordPair,
	keywordGet,
	type Quoted,
	type QTuple,
} from "../native/elixir-types.js";

export type KeywordReading = "wrapper" | "data" | "uncertain";

/** Keys that open a block section in do/end syntax. */
export const BLOCK_SECTIONS: ReadonlySet<string> = new Set(["do", "else", "after", "rescue", "catch"]);

/** Call metadata carries do/end token positions only for do/end syntax. */
export function hasDoEndMeta(callMeta: Quoted[]): boolean {
	return keywordGet(callMeta, "do") !== undefined || keywordGet(callMeta, "end") !== undefined;
}

/** A syntax node: a three-element AST tuple, __block__ included. */
function isSyntaxNode(value: Quoted): boolean {
	return asNode(value) !== undefined;
}

export function classifyKeywordEntry(callMeta: Quoted[], entry: QTuple): KeywordReading {
	const [key, value] = entry.tuple;
	if (key === undefined || value === undefined || !isAtom(key)) return "data";
	if (hasDoEndMeta(callMeta)) return "wrapper";
	if (!BLOCK_SECTIONS.has(key.atom)) return "data";
	return isSyntaxNode(value) ? "wrapper" : "uncertain";
}

export interface TrailingKeyword {
	entries: QTuple[];
	readings: KeywordReading[];
}

/** Classify the trailing keyword-list argument of a call, if it has one. */
export function classifyTrailingKeyword(callMeta: Quoted[], args: Quoted[]): TrailingKeyword | undefined {
	const last = args[args.length - 1];
	if (last === undefined || !isKeyword(last)) return undefined;
	const entries = last.filter(isKeywordPair);
	return { entries, readings: entries.map((entry) => classifyKeywordEntry(callMeta, entry)) };
}
