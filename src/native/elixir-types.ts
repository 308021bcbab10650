// Elixir quoted-form type definitions
//
// Quoted expressions are carried as JSON-compatible values:
//   atoms          { atom: "name" }        (nil, true, false map to null, true, false)
//   floats         { float: 1.0 } or a non-integral number
//   tuples         { tuple: [...] }        (AST nodes are 3-tuples {form, meta, args})
//   lists, strings, integers as themselves

export interface QAtom {
	atom: string;
}

export interface QFloat {
	float: number;
}

export interface QTuple {
	tuple: Quoted[];
}

export type Quoted = number | string | boolean | null | QAtom | QFloat | QTuple | Quoted[];

/** Keyword list: list of {atom, value} pairs. */
export type Keyword = QTuple[];

/** A three-element AST node {form, meta, args}. */
export interface QNode {
	form: Quoted;
	meta: Quoted[];
	args: Quoted;
	source: QTuple;
}

// ---------- Builders ----------

export function atom(name: string): QAtom {
	return { atom: name };
}

export function float(value: number): QFloat {
	return { float: value };
}

export function tuple(...items: Quoted[]): QTuple {
	return { tuple: items };
}

export function kw(entries: Record<string, Quoted>): Keyword {
	return Object.entries(entries).map(([key, value]) => tuple(atom(key), value));
}

export function call(form: string | Quoted, args: Quoted[], meta: Keyword = []): QTuple {
	return tuple(typeof form === "string" ? atom(form) : form, meta, args);
}

/** Variable reference: {name, meta, context} with a nil context. */
export function ref(name: string, meta: Keyword = []): QTuple {
	return tuple(atom(name), meta, null);
}

export function alias(...parts: string[]): QTuple {
	return call("__aliases__", parts.map(atom));
}

/** Remote call Mod.fun(args) with Mod given as dotted alias parts. */
export function remote(module: string, fun: string, args: Quoted[], meta: Keyword = []): QTuple {
	const receiver = module.split(".").map(atom);
	return call(call(".", [call("__aliases__", receiver), atom(fun)]), args, meta);
}

export function block(...exprs: Quoted[]): QTuple {
	return call("__block__", exprs);
}

// ---------- Type guards ----------

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isAtom(value: Quoted): value is QAtom {
	return isRecord(value) && "atom" in value;
}

export function isFloat(value: Quoted): value is QFloat {
	return isRecord(value) && "float" in value;
}

export function isTuple(value: Quoted): value is QTuple {
	return isRecord(value) && "tuple" in value;
}

export function isAtomNamed(value: Quoted, name: string): boolean {
	return isAtom(value) && value.atom === name;
}

export function atomName(value: Quoted): string | undefined {
	return isAtom(value) ? value.atom : undefined;
}

/** View a 3-tuple with a keyword-list meta as an AST node. */
export function asNode(value: Quoted): QNode | undefined {
	if (!isTuple(value) || value.tuple.length !== 3) return undefined;
	const [form, meta, args] = value.tuple;
	if (form === undefined || args === undefined || !Array.isArray(meta)) return undefined;
	return { form, meta, args, source: value };
}

/** Node whose form is the given atom and whose args are a list. */
export function isCallTo(value: Quoted, name: string): boolean {
	const node = asNode(value);
	return node !== undefined && isAtomNamed(node.form, name) && Array.isArray(node.args);
}

export function isKeywordPair(value: Quoted): value is QTuple {
	return isTuple(value) && value.tuple.length === 2 && value.tuple[0] !== undefined && isAtom(value.tuple[0]);
}

export function isKeyword(value: Quoted): value is Keyword {
	return Array.isArray(value) && value.length > 0 && value.every(isKeywordPair);
}

/** Value of a key in a keyword list (AST meta or options). */
export function keywordGet(list: Quoted[], key: string): Quoted | undefined {
	for (const entry of list) {
		if (isKeywordPair(entry) && isAtomNamed(entry.tuple[0] ?? null, key)) {
			return entry.tuple[1];
		}
	}
	return undefined;
}

const QUOTED_DEPTH_LIMIT = 1000;

/** Structural check of untrusted input; rejects cycles by depth. */
export function isQuoted(value: unknown, level = 0): value is Quoted {
	if (level > QUOTED_DEPTH_LIMIT) return false;
	if (value === null || typeof value === "string" || typeof value === "boolean") return true;
	if (typeof value === "number") return Number.isFinite(value);
	if (Array.isArray(value)) return value.every((item) => isQuoted(item, level + 1));
	if (!isRecord(value)) return false;
	const keys = Object.keys(value);
	if (keys.length !== 1) return false;
	if ("atom" in value) return typeof value.atom === "string";
	if ("float" in value) return typeof value.float === "number" && Number.isFinite(value.float);
	if ("tuple" in value) return Array.isArray(value.tuple) && value.tuple.every((item) => isQuoted(item, level + 1));
	return false;
}
