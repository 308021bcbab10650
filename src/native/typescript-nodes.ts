// TypeScript compiler-API node helpers

import ts from "typescript";

/** Structural check for a compiler node (parsed or built through ts.factory). */
export function isTsNode(value: unknown): value is ts.Node {
	if (typeof value !== "object" || value === null) return false;
	return (
		"kind" in value && typeof value.kind === "number" &&
		"pos" in value && typeof value.pos === "number" &&
		"end" in value && typeof value.end === "number" &&
		"flags" in value && typeof value.flags === "number"
	);
}

const DECLARATION_STATEMENTS: ReadonlySet<ts.SyntaxKind> = new Set([
	ts.SyntaxKind.Block,
	ts.SyntaxKind.FunctionDeclaration,
	ts.SyntaxKind.ClassDeclaration,
	ts.SyntaxKind.InterfaceDeclaration,
	ts.SyntaxKind.TypeAliasDeclaration,
	ts.SyntaxKind.EnumDeclaration,
	ts.SyntaxKind.ModuleDeclaration,
	ts.SyntaxKind.ImportDeclaration,
	ts.SyntaxKind.ImportEqualsDeclaration,
	ts.SyntaxKind.ExportDeclaration,
	ts.SyntaxKind.ExportAssignment,
	ts.SyntaxKind.NamespaceExportDeclaration,
]);

export function isStatementNode(node: ts.Node): node is ts.Statement {
	if (node.kind >= ts.SyntaxKind.FirstStatement && node.kind <= ts.SyntaxKind.LastStatement) return true;
	return DECLARATION_STATEMENTS.has(node.kind);
}

/** Name of a node's syntax kind, for error messages and escape hints. */
export function kindName(node: ts.Node): string {
	return ts.SyntaxKind[node.kind];
}

export function hasModifier(node: ts.Node, kind: ts.ModifierSyntaxKind): boolean {
	if (!ts.canHaveModifiers(node)) return false;
	return ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false;
}

export function hasDecorators(node: ts.Node): boolean {
	if (!ts.canHaveDecorators(node)) return false;
	return (ts.getDecorators(node)?.length ?? 0) > 0;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function isIdentifierText(text: string): boolean {
	return IDENTIFIER.test(text);
}
