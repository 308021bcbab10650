// STRATA Error Types
// Error domain for lifting, lowering and tree validation

import type { IrNode } from "./types.js";

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Transform errors
	Unsupported: "Unsupported",
	Ambiguous: "Ambiguous",
	Incompatible: "Incompatible",
	Malformed: "Malformed",

	// Validation errors
	UnknownTag: "UnknownTag",
	InvalidPayload: "InvalidPayload",
	CyclicTree: "CyclicTree",
	DepthExceeded: "DepthExceeded",
	TooManyVariables: "TooManyVariables",
	NativeConstructRejected: "NativeConstructRejected",

	// Registry errors
	UnknownLanguage: "UnknownLanguage",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type TransformErrorCode =
	| typeof ErrorCodes.Unsupported
	| typeof ErrorCodes.Ambiguous
	| typeof ErrorCodes.Incompatible
	| typeof ErrorCodes.Malformed
	| typeof ErrorCodes.UnknownLanguage;

//==============================================================================
// STRATA Error Class
//==============================================================================

export class StrataError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string) {
		super(message);
		this.name = "StrataError";
		this.code = code;
	}
}

/**
 * Failure of a lift or lower call. `subtree` is the offending native or IR
 * fragment, kept as-is so callers can report it.
 */
export class TransformError extends StrataError {
	declare readonly code: TransformErrorCode;
	readonly subtree: unknown;

	constructor(code: TransformErrorCode, message: string, subtree: unknown) {
		super(code, message);
		this.name = "TransformError";
		this.subtree = subtree;
	}

	/**
	 * No IR counterpart (lift) or no rendering in the target (lower).
	 */
	static unsupported(construct: string, subtree: unknown, reason?: string): TransformError {
		return new TransformError(
			ErrorCodes.Unsupported,
			"Unsupported construct: " + construct + (reason ? " (" + reason + ")" : ""),
			subtree,
		);
	}

	/**
	 * Native shape admits more than one reading and nothing disambiguates it.
	 */
	static ambiguous(construct: string, subtree: unknown, reason?: string): TransformError {
		return new TransformError(
			ErrorCodes.Ambiguous,
			"Ambiguous construct: " + construct + (reason ? " (" + reason + ")" : ""),
			subtree,
		);
	}

	/**
	 * Escape-hatch node from another language with no registered fallback.
	 */
	static incompatible(language: string, hint: string, target: string, subtree: unknown): TransformError {
		return new TransformError(
			ErrorCodes.Incompatible,
			"Incompatible native construct: " + language + "/" + hint + " has no " + target + " rendering",
			subtree,
		);
	}

	static malformed(message: string, subtree: unknown): TransformError {
		return new TransformError(ErrorCodes.Malformed, "Malformed tree: " + message, subtree);
	}

	static unknownLanguage(language: string): TransformError {
		return new TransformError(
			ErrorCodes.UnknownLanguage,
			"No adapter registered for language: " + language,
			language,
		);
	}
}

export function isTransformError(value: unknown): value is TransformError {
	return value instanceof TransformError;
}

//==============================================================================
// Result Type
//==============================================================================

export type Result<T, E = TransformError> =
	| { success: true; value: T }
	| { success: false; error: E };

export function ok<T>(value: T): Result<T, never> {
	return { success: true, value };
}

export function fail<E>(error: E): Result<never, E> {
	return { success: false, error };
}

/**
 * Run a transform that reports failures by throwing TransformError.
 * Any other exception is a programming error and propagates.
 */
export function capture<T>(fn: () => T): Result<T> {
	try {
		return ok(fn());
	} catch (e) {
		if (e instanceof TransformError) {
			return fail(e);
		}
		throw e;
	}
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	code?: ErrorCode;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	warnings: string[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T, warnings: string[] = []): ValidationResult<T> {
	return { valid: true, errors: [], warnings, value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
	warnings: string[] = [],
): ValidationResult<T> {
	return { valid: false, errors, warnings };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}

/** Short label for a node in error messages. */
export function describeNode(node: IrNode): string {
	return node.tag === "language_specific"
		? `language_specific(${node.payload[0]}/${node.payload[1]})`
		: node.tag;
}
