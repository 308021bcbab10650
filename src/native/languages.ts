// Native tree types per supported language

import type ts from "typescript";
import type { Quoted } from "./elixir-types.js";
import type { PyNode } from "./python-types.js";

export interface NativeTrees {
	elixir: Quoted;
	python: PyNode;
	typescript: ts.Node;
}

export type Language = keyof NativeTrees;

export const LANGUAGES: readonly Language[] = ["elixir", "python", "typescript"];

export function isLanguage(value: string): value is Language {
	return value === "elixir" || value === "python" || value === "typescript";
}

/** File extension -> language, for callers that start from a path. */
const EXTENSIONS: Readonly<Record<string, Language>> = {
	".ex": "elixir",
	".exs": "elixir",
	".py": "python",
	".pyi": "python",
	".ts": "typescript",
	".tsx": "typescript",
	".mts": "typescript",
	".cts": "typescript",
};

export function detectLanguage(path: string): Language | undefined {
	const dot = path.lastIndexOf(".");
	if (dot < 0) return undefined;
	return EXTENSIONS[path.slice(dot).toLowerCase()];
}
