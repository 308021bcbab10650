// STRATA Tree Traversal
// Generic walks and queries driven only by each tag's payload rule.

import { exhaustive, TransformError } from "./errors.js";
import type {
	IrNode,
	Layer,
	MatchArmNode,
	PairNode,
	ParamNode,
	Tag,
} from "./types.js";
import { layerOf, maxLayer } from "./types.js";

//==============================================================================
// Children
//==============================================================================

function present(node: IrNode | null): IrNode[] {
	return node === null ? [] : [node];
}

/** Direct child nodes in payload order. Scalars are not children. */
export function childrenOf(node: IrNode): IrNode[] {
	switch (node.tag) {
	case "literal":
	case "variable":
	case "language_specific":
		return [];
	case "list":
	case "tuple":
	case "block":
		return [...node.payload];
	case "map":
		return [...node.payload];
	case "pair":
	case "assignment":
	case "inline_match":
		return [node.payload[0], node.payload[1]];
	case "binary_op":
	case "augmented_assignment":
		return [node.payload[2], node.payload[3]];
	case "unary_op":
		return [node.payload[2]];
	case "function_call":
		return [...node.payload[1]];
	case "conditional":
		return [node.payload[0], node.payload[1], ...present(node.payload[2])];
	case "early_return":
		return present(node.payload[1]);
	case "loop":
		return [...present(node.payload[1]), node.payload[2], node.payload[3]];
	case "lambda":
		return [...node.payload[0], node.payload[1]];
	case "collection_op":
		return [node.payload[1], node.payload[2], ...present(node.payload[3])];
	case "pattern_match":
		return [node.payload[0], ...node.payload[1]];
	case "match_arm":
		return [...present(node.payload[0]), ...present(node.payload[1]), node.payload[2]];
	case "exception_handling":
		return [node.payload[0], ...node.payload[1], ...present(node.payload[2])];
	case "async_operation":
		return [node.payload[1]];
	case "container":
		return [...node.payload[2]];
	case "function_def":
		return [...node.payload[1], node.payload[2]];
	case "param": {
		const p = node.payload;
		switch (p[0]) {
		case "name":
			return [];
		case "pattern":
			return [p[1]];
		case "default":
			return [p[2]];
		default:
			return exhaustive(p);
		}
	}
	case "attribute_access":
		return [node.payload[0]];
	case "property":
		return [...present(node.payload[1]), ...present(node.payload[2])];
	default:
		return exhaustive(node);
	}
}

//==============================================================================
// Rewriting
//==============================================================================

type Rewrite = (child: IrNode) => IrNode;

function asPair(node: IrNode): PairNode {
	if (node.tag !== "pair") {
		throw TransformError.malformed(`map entries must stay pair nodes, got ${node.tag}`, node);
	}
	return node;
}

function asParam(node: IrNode): ParamNode {
	if (node.tag !== "param") {
		throw TransformError.malformed(`parameters must stay param nodes, got ${node.tag}`, node);
	}
	return node;
}

function asArm(node: IrNode): MatchArmNode {
	if (node.tag !== "match_arm") {
		throw TransformError.malformed(`arms and handlers must stay match_arm nodes, got ${node.tag}`, node);
	}
	return node;
}

function opt(node: IrNode | null, fn: Rewrite): IrNode | null {
	return node === null ? null : fn(node);
}

/**
 * Rebuild a node with every child passed through `fn`, in payload order.
 * Positions that only admit one tag (map entries, params, arms) reject a
 * rewrite that changes the tag.
 */
export function mapChildren(node: IrNode, fn: Rewrite): IrNode {
	const { meta } = node;
	switch (node.tag) {
	case "literal":
	case "variable":
	case "language_specific":
		return node;
	case "list":
	case "tuple":
	case "block":
		return { tag: node.tag, meta, payload: node.payload.map(fn) };
	case "map":
		return { tag: "map", meta, payload: node.payload.map((p) => asPair(fn(p))) };
	case "pair":
	case "assignment":
	case "inline_match": {
		const [a, b] = node.payload;
		const left = fn(a);
		return { tag: node.tag, meta, payload: [left, fn(b)] };
	}
	case "binary_op":
	case "augmented_assignment": {
		const [category, operator, left, right] = node.payload;
		const l = fn(left);
		return { tag: node.tag, meta, payload: [category, operator, l, fn(right)] };
	}
	case "unary_op": {
		const [category, operator, operand] = node.payload;
		return { tag: "unary_op", meta, payload: [category, operator, fn(operand)] };
	}
	case "function_call":
		return { tag: "function_call", meta, payload: [node.payload[0], node.payload[1].map(fn)] };
	case "conditional": {
		const [c, t, e] = node.payload;
		const cond = fn(c);
		const then = fn(t);
		return { tag: "conditional", meta, payload: [cond, then, opt(e, fn)] };
	}
	case "early_return":
		return { tag: "early_return", meta, payload: [node.payload[0], opt(node.payload[1], fn)] };
	case "loop": {
		const [kind, binding, source, body] = node.payload;
		const b = opt(binding, fn);
		const s = fn(source);
		return { tag: "loop", meta, payload: [kind, b, s, fn(body)] };
	}
	case "lambda": {
		const params = node.payload[0].map((p) => asParam(fn(p)));
		return { tag: "lambda", meta, payload: [params, fn(node.payload[1])] };
	}
	case "collection_op": {
		const [op, f, collection, initial] = node.payload;
		const f2 = fn(f);
		const c2 = fn(collection);
		return { tag: "collection_op", meta, payload: [op, f2, c2, opt(initial, fn)] };
	}
	case "pattern_match": {
		const scrutinee = fn(node.payload[0]);
		return { tag: "pattern_match", meta, payload: [scrutinee, node.payload[1].map((a) => asArm(fn(a)))] };
	}
	case "match_arm": {
		const [pattern, guard, body] = node.payload;
		const p = opt(pattern, fn);
		const g = opt(guard, fn);
		return { tag: "match_arm", meta, payload: [p, g, fn(body)] };
	}
	case "exception_handling": {
		const [body, handlers, cleanup] = node.payload;
		const b = fn(body);
		const hs = handlers.map((h) => asArm(fn(h)));
		return { tag: "exception_handling", meta, payload: [b, hs, opt(cleanup, fn)] };
	}
	case "async_operation":
		return { tag: "async_operation", meta, payload: [node.payload[0], fn(node.payload[1])] };
	case "container": {
		const [kind, name, body] = node.payload;
		return { tag: "container", meta, payload: [kind, name, body.map(fn)] };
	}
	case "function_def": {
		const [name, params, body] = node.payload;
		const ps = params.map((p) => asParam(fn(p)));
		return { tag: "function_def", meta, payload: [name, ps, fn(body)] };
	}
	case "param": {
		const p = node.payload;
		switch (p[0]) {
		case "name":
			return node;
		case "pattern":
			return { tag: "param", meta, payload: ["pattern", fn(p[1])] };
		case "default":
			return { tag: "param", meta, payload: ["default", p[1], fn(p[2])] };
		default:
			return exhaustive(p);
		}
	}
	case "attribute_access":
		return { tag: "attribute_access", meta, payload: [fn(node.payload[0]), node.payload[1]] };
	case "property": {
		const [name, getter, setter] = node.payload;
		const g = opt(getter, fn);
		return { tag: "property", meta, payload: [name, g, opt(setter, fn)] };
	}
	default:
		return exhaustive(node);
	}
}

//==============================================================================
// Generic Fold
//==============================================================================

export type Visitor<A> = (node: IrNode, acc: A) => [IrNode, A];

const keep = <A>(node: IrNode, acc: A): [IrNode, A] => [node, acc];

/**
 * Depth-first fold. `pre` runs before a node's children (and may replace the
 * node whose children are then walked), `post` runs after them.
 */
export function visit<A>(tree: IrNode, acc: A, pre: Visitor<A>, post: Visitor<A>): [IrNode, A] {
	const [entered, afterPre] = pre(tree, acc);
	let current = afterPre;
	const rebuilt = mapChildren(entered, (child) => {
		const [next, nextAcc] = visit(child, current, pre, post);
		current = nextAcc;
		return next;
	});
	return post(rebuilt, current);
}

export function prewalk<A>(tree: IrNode, acc: A, fn: Visitor<A>): [IrNode, A] {
	return visit(tree, acc, fn, keep);
}

export function postwalk<A>(tree: IrNode, acc: A, fn: Visitor<A>): [IrNode, A] {
	return visit(tree, acc, keep, fn);
}

/** Rewrite bottom-up without an accumulator. */
export function transform(tree: IrNode, fn: (node: IrNode) => IrNode): IrNode {
	return postwalk(tree, null, (node, acc) => [fn(node), acc])[0];
}

/** Every node in pre-order. */
export function nodes(tree: IrNode): IrNode[] {
	const out: IrNode[] = [];
	const stack: IrNode[] = [tree];
	while (stack.length > 0) {
		const node = stack.pop();
		if (node === undefined) break;
		out.push(node);
		const children = childrenOf(node);
		for (let i = children.length - 1; i >= 0; i--) {
			const child = children[i];
			if (child !== undefined) stack.push(child);
		}
	}
	return out;
}

//==============================================================================
// Queries
//==============================================================================

/**
 * Names of every variable leaf plus every name bound by a parameter.
 * Despite the name, bound occurrences are included.
 */
export function freeVariables(tree: IrNode): Set<string> {
	const names = new Set<string>();
	for (const node of nodes(tree)) {
		if (node.tag === "variable") {
			names.add(node.payload);
		} else if (node.tag === "param") {
			const p = node.payload;
			if (p[0] !== "pattern") names.add(p[1]);
		}
	}
	return names;
}

/** A leaf has depth 1. */
export function depth(tree: IrNode): number {
	let max = 0;
	const stack: [IrNode, number][] = [[tree, 1]];
	while (stack.length > 0) {
		const top = stack.pop();
		if (top === undefined) break;
		const [node, d] = top;
		if (d > max) max = d;
		for (const child of childrenOf(node)) stack.push([child, d + 1]);
	}
	return max;
}

export function nodeCount(tree: IrNode): number {
	return nodes(tree).length;
}

export function stripMetadata(tree: IrNode): IrNode {
	return transform(tree, (node) => ({ ...node, meta: {} }));
}

export function collectTags(tree: IrNode): Set<Tag> {
	return new Set(nodes(tree).map((n) => n.tag));
}

/** Highest layer any node of the tree belongs to. */
export function highestLayer(tree: IrNode): Layer {
	let level: Layer = "core";
	for (const tag of collectTags(tree)) {
		level = maxLayer(level, layerOf(tag));
	}
	return level;
}

export function countNative(tree: IrNode): number {
	return nodes(tree).filter((n) => n.tag === "language_specific").length;
}
