// STRATA Adapters
// Per-language lift/lower pairs, an explicitly constructed registry and IR documents

import { ok, type Result, type ValidationResult } from "./errors.js";
import { liftElixir } from "./lift/elixir.js";
import { liftPython } from "./lift/python.js";
import type { LiftOptions } from "./lift/shared.js";
import { liftTypeScript } from "./lift/typescript.js";
import { lowerElixir } from "./lower/elixir.js";
import { lowerPython } from "./lower/python.js";
import type { LowerOptions } from "./lower/shared.js";
import { lowerTypeScript } from "./lower/typescript.js";
import { LANGUAGES, type Language, type NativeTrees } from "./native/languages.js";
import type { IrNode } from "./types.js";
import { conforms, validateTree, type TreeReport, type ValidateTreeOptions } from "./validator.js";

//==============================================================================
// Adapter
//==============================================================================

export interface Adapter<N> {
	language: Language;
	/** Native tree -> IR */
	lift(native: unknown, options?: LiftOptions): Result<IrNode>;
	/** IR -> native tree */
	lower(tree: unknown, options?: LowerOptions): Result<N>;
}

export const elixirAdapter: Adapter<NativeTrees["elixir"]> = {
	language: "elixir",
	lift: liftElixir,
	lower: lowerElixir,
};

export const pythonAdapter: Adapter<NativeTrees["python"]> = {
	language: "python",
	lift: liftPython,
	lower: lowerPython,
};

export const typescriptAdapter: Adapter<NativeTrees["typescript"]> = {
	language: "typescript",
	lift: liftTypeScript,
	lower: lowerTypeScript,
};

//==============================================================================
// Registry
//==============================================================================

export type AdapterTable = { [L in Language]: Adapter<NativeTrees[L]> };

export interface AdapterRegistry {
	get<L extends Language>(language: L): Adapter<NativeTrees[L]>;
	languages(): Language[];
}

/**
 * Build a registry over the built-in adapters. Entries in `overrides`
 * replace the adapter for their language.
 */
export function createAdapterRegistry(overrides: Partial<AdapterTable> = {}): AdapterRegistry {
	const table: AdapterTable = {
		elixir: overrides.elixir ?? elixirAdapter,
		python: overrides.python ?? pythonAdapter,
		typescript: overrides.typescript ?? typescriptAdapter,
	};
	return {
		get: <L extends Language>(language: L): Adapter<NativeTrees[L]> => table[language],
		languages: () => [...LANGUAGES],
	};
}

//==============================================================================
// Entry points
//==============================================================================

export interface AdapterOptions {
	registry?: AdapterRegistry;
	lift?: LiftOptions;
	lower?: LowerOptions;
}

function registryOf(options: AdapterOptions | undefined): AdapterRegistry {
	return options?.registry ?? createAdapterRegistry();
}

export function lift(language: Language, native: unknown, options?: AdapterOptions): Result<IrNode> {
	return registryOf(options).get(language).lift(native, options?.lift);
}

export function lower<L extends Language>(
	tree: unknown,
	target: L,
	options?: AdapterOptions,
): Result<NativeTrees[L]> {
	return registryOf(options).get(target).lower(tree, options?.lower);
}

export interface RoundTrip<N> {
	ir: IrNode;
	native: N;
}

/** Lift then lower through the same language. */
export function roundTrip<L extends Language>(
	language: L,
	native: unknown,
	options?: AdapterOptions,
): Result<RoundTrip<NativeTrees[L]>> {
	const adapter = registryOf(options).get(language);
	const lifted = adapter.lift(native, options?.lift);
	if (!lifted.success) return lifted;
	const lowered = adapter.lower(lifted.value, options?.lower);
	if (!lowered.success) return lowered;
	return ok({ ir: lifted.value, native: lowered.value });
}

//==============================================================================
// Documents
//==============================================================================

export interface StrataDocument {
	tree: IrNode;
	language: Language;
	/** Source-language details the IR does not carry (hints, formatting) */
	metadata: Record<string, unknown>;
	originalSource?: string;
}

export function createDocument(
	tree: IrNode,
	language: Language,
	metadata: Record<string, unknown> = {},
	originalSource?: string,
): StrataDocument {
	const doc: StrataDocument = { tree, language, metadata };
	if (originalSource !== undefined) doc.originalSource = originalSource;
	return doc;
}

/** Lift a native tree straight into a document. */
export function liftDocument(
	language: Language,
	native: unknown,
	options?: AdapterOptions & { metadata?: Record<string, unknown> },
): Result<StrataDocument> {
	const lifted = lift(language, native, options);
	if (!lifted.success) return lifted;
	return ok(createDocument(lifted.value, language, options?.metadata ?? {}));
}

export function isDocumentValid(doc: StrataDocument): boolean {
	return conforms(doc.tree);
}

export function withTree(doc: StrataDocument, tree: IrNode): StrataDocument {
	return { ...doc, tree };
}

export interface DocumentAnalysis extends TreeReport {
	language: Language;
}

export function analyzeDocument(
	doc: StrataDocument,
	options?: ValidateTreeOptions,
): ValidationResult<DocumentAnalysis> {
	const result = validateTree(doc.tree, options);
	if (result.value === undefined) {
		return { valid: result.valid, errors: result.errors, warnings: result.warnings };
	}
	return { ...result, value: { ...result.value, language: doc.language } };
}
