// Python AST type definitions
//
// Trees are Python's `ast` module serialised to JSON: every node is an object
// with a `_type` field naming its class, and one field per AST field.

export interface PyNode {
	_type: string;
	[key: string]: unknown;
}

export interface PyModule {
	_type: "Module";
	body: PyNode[];
	[key: string]: unknown;
}

export interface PyArg {
	_type: "arg";
	arg: string;
	[key: string]: unknown;
}

export interface PyArguments {
	_type: "arguments";
	posonlyargs: PyArg[];
	args: PyArg[];
	vararg: PyArg | null;
	kwonlyargs: PyArg[];
	kw_defaults: (PyNode | null)[];
	kwarg: PyArg | null;
	defaults: PyNode[];
	[key: string]: unknown;
}

/** AST classes that are statements; everything else lowered is an expression. */
export const STATEMENT_TYPES: ReadonlySet<string> = new Set([
	"FunctionDef",
	"AsyncFunctionDef",
	"ClassDef",
	"Return",
	"Delete",
	"Assign",
	"AugAssign",
	"AnnAssign",
	"For",
	"AsyncFor",
	"While",
	"If",
	"With",
	"AsyncWith",
	"Match",
	"Raise",
	"Try",
	"TryStar",
	"Assert",
	"Import",
	"ImportFrom",
	"Global",
	"Nonlocal",
	"Expr",
	"Pass",
	"Break",
	"Continue",
]);

// ---------- Builders ----------

export function py(type: string, fields: Record<string, unknown> = {}): PyNode {
	return { _type: type, ...fields };
}

export const load = (): PyNode => py("Load");
export const store = (): PyNode => py("Store");

export function name(id: string, ctx: PyNode = load()): PyNode {
	return py("Name", { id, ctx });
}

export function constant(value: string | number | boolean | null): PyNode {
	return py("Constant", { value, kind: null });
}

export function module(body: PyNode[]): PyModule {
	return { _type: "Module", body, type_ignores: [] };
}

export function arg(id: string): PyArg {
	return { _type: "arg", arg: id, annotation: null, type_comment: null };
}

export function args(params: PyArg[], defaults: PyNode[] = []): PyArguments {
	return {
		_type: "arguments",
		posonlyargs: [],
		args: params,
		vararg: null,
		kwonlyargs: [],
		kw_defaults: [],
		kwarg: null,
		defaults,
	};
}

// ---------- Type guards ----------

export function isAstNode(value: unknown): value is PyNode {
	if (typeof value !== "object" || value === null) return false;
	if (!("_type" in value)) return false;
	return typeof value._type === "string";
}

export function isModule(node: PyNode): node is PyModule {
	return node._type === "Module" && Array.isArray(node.body) && node.body.every(isAstNode);
}

export function isStatement(node: PyNode): boolean {
	return STATEMENT_TYPES.has(node._type);
}

export function isArg(value: unknown): value is PyArg {
	return isAstNode(value) && value._type === "arg" && typeof value.arg === "string";
}

function isArgList(value: unknown): value is PyArg[] {
	return Array.isArray(value) && value.every(isArg);
}

export function isArguments(value: unknown): value is PyArguments {
	if (!isAstNode(value) || value._type !== "arguments") return false;
	return (
		isArgList(value.posonlyargs) &&
		isArgList(value.args) &&
		(value.vararg === null || isArg(value.vararg)) &&
		isArgList(value.kwonlyargs) &&
		Array.isArray(value.kw_defaults) &&
		(value.kwarg === null || isArg(value.kwarg)) &&
		Array.isArray(value.defaults) &&
		value.defaults.every(isAstNode)
	);
}

export function isName(node: PyNode, id?: string): boolean {
	return node._type === "Name" && typeof node.id === "string" && (id === undefined || node.id === id);
}
