// SPDX-License-Identifier: MIT
// Reforge AST Traversal
// Copy-on-write child mapping over the closed Expr union. A node whose
// children all come back unchanged is returned as-is, so passes that rewrite
// nothing hand the same tree to the next pass.

import { exhaustive } from "../errors.ts";
import type {
	Clause, Expr, FnClause, Generator, Pattern, StrPart, WithClause,
} from "./types.ts";

type ExprFn = (expr: Expr) => Expr;

//==============================================================================
// Identity-Preserving Helpers
//==============================================================================

function mapArray<T>(items: T[], f: (item: T) => T): T[] {
	let changed = false;
	const out = items.map((item) => {
		const next = f(item);
		if (next !== item) changed = true;
		return next;
	});
	return changed ? out : items;
}

function mapOptional(expr: Expr | undefined, f: ExprFn): Expr | undefined {
	return expr === undefined ? undefined : f(expr);
}

function mapClause(c: Clause, f: ExprFn): Clause {
	const guard = mapOptional(c.guard, f);
	const body = f(c.body);
	if (guard === c.guard && body === c.body) return c;
	return guard === undefined ? { pattern: c.pattern, body } : { pattern: c.pattern, guard, body };
}

function mapFnClause(c: FnClause, f: ExprFn): FnClause {
	const guard = mapOptional(c.guard, f);
	const body = f(c.body);
	if (guard === c.guard && body === c.body) return c;
	return guard === undefined ? { params: c.params, body } : { params: c.params, guard, body };
}

function mapWithClause(c: WithClause, f: ExprFn): WithClause {
	const value = f(c.value);
	return value === c.value ? c : { pattern: c.pattern, value };
}

function mapGenerator(g: Generator, f: ExprFn): Generator {
	const source = f(g.source);
	return source === g.source ? g : { pattern: g.pattern, source };
}

function mapStrPart(part: StrPart, f: ExprFn): StrPart {
	if (part.kind === "text") return part;
	const expr = f(part.expr);
	return expr === part.expr ? part : { kind: "interp", expr };
}

/**
 * Rebuild `node` with `patch` only when some patched field differs.
 * Optional fields patched to undefined are dropped, not kept as keys.
 */
function patched<T extends Expr>(node: T, patch: Partial<T>): T {
	const keys = Object.keys(patch);
	if (keys.every((key) => Object.is(Reflect.get(patch, key), Reflect.get(node, key)))) {
		return node;
	}
	const next = { ...node, ...patch };
	for (const key of keys) {
		if (Reflect.get(next, key) === undefined) Reflect.deleteProperty(next, key);
	}
	return next;
}

//==============================================================================
// Child Mapping
//==============================================================================

/**
 * Apply `f` to every direct expression child of `expr`.
 * Patterns are left untouched; see mapPattern for those.
 */
export function mapChildren(expr: Expr, f: ExprFn): Expr {
	switch (expr.kind) {
	case "var":
	case "lit":
	case "raw":
	case "loop":
		return expr;
	case "str":
		return patched(expr, { parts: mapArray(expr.parts, (p) => mapStrPart(p, f)) });
	case "block":
		return patched(expr, { exprs: mapArray(expr.exprs, f) });
	case "binary":
		return patched(expr, { left: f(expr.left), right: f(expr.right) });
	case "unary":
		return patched(expr, { operand: f(expr.operand) });
	case "match":
		return patched(expr, { value: f(expr.value) });
	case "if":
		return patched(expr, { cond: f(expr.cond), then: f(expr.then), else: mapOptional(expr.else, f) });
	case "case":
		return patched(expr, {
			subject: f(expr.subject),
			clauses: mapArray(expr.clauses, (c) => mapClause(c, f)),
		});
	case "with":
		return patched(expr, {
			clauses: mapArray(expr.clauses, (c) => mapWithClause(c, f)),
			body: f(expr.body),
			else: expr.else === undefined ? undefined : mapArray(expr.else, (c) => mapClause(c, f)),
		});
	case "receive":
		return patched(expr, {
			clauses: mapArray(expr.clauses, (c) => mapClause(c, f)),
			after: mapAfter(expr.after, f),
		});
	case "try":
		return patched(expr, {
			body: f(expr.body),
			rescue: mapArray(expr.rescue, (c) => mapClause(c, f)),
			catch: mapArray(expr.catch, (c) => mapClause(c, f)),
			after: mapOptional(expr.after, f),
		});
	case "for":
		return patched(expr, {
			generators: mapArray(expr.generators, (g) => mapGenerator(g, f)),
			filters: mapArray(expr.filters, f),
			into: mapOptional(expr.into, f),
			body: f(expr.body),
		});
	case "fn":
		return patched(expr, { clauses: mapArray(expr.clauses, (c) => mapFnClause(c, f)) });
	case "def":
		return patched(expr, { clauses: mapArray(expr.clauses, (c) => mapFnClause(c, f)) });
	case "call":
	case "remoteCall":
		return patched(expr, { args: mapArray(expr.args, f) });
	case "apply":
		return patched(expr, { fn: f(expr.fn), args: mapArray(expr.args, f) });
	case "field":
		return patched(expr, { target: f(expr.target) });
	case "index":
		return patched(expr, { target: f(expr.target), index: f(expr.index) });
	case "list":
	case "tuple":
		return patched(expr, { elements: mapArray(expr.elements, f) });
	case "map":
		return patched(expr, {
			entries: mapArray(expr.entries, (e) => {
				const key = f(e.key);
				const value = f(e.value);
				return key === e.key && value === e.value ? e : { key, value };
			}),
		});
	case "struct":
		return patched(expr, {
			fields: mapArray(expr.fields, (fl) => {
				const value = f(fl.value);
				return value === fl.value ? fl : { name: fl.name, value };
			}),
		});
	case "module":
		return patched(expr, { body: mapArray(expr.body, f) });
	default:
		return exhaustive(expr);
	}
}

function mapAfter(
	after: { timeout: Expr; body: Expr } | undefined,
	f: ExprFn,
): { timeout: Expr; body: Expr } | undefined {
	if (after === undefined) return undefined;
	const timeout = f(after.timeout);
	const body = f(after.body);
	return timeout === after.timeout && body === after.body ? after : { timeout, body };
}

/** Rewrite children first, then the node itself. */
export function transformBottomUp(expr: Expr, f: ExprFn): Expr {
	return f(mapChildren(expr, (child) => transformBottomUp(child, f)));
}

/** Direct expression children, in source order. */
export function childrenOf(expr: Expr): Expr[] {
	const out: Expr[] = [];
	mapChildren(expr, (child) => {
		out.push(child);
		return child;
	});
	return out;
}

/** True when `pred` holds for `expr` or any descendant. */
export function someNode(expr: Expr, pred: (e: Expr) => boolean): boolean {
	if (pred(expr)) return true;
	return childrenOf(expr).some((child) => someNode(child, pred));
}

//==============================================================================
// Pattern Mapping
//==============================================================================

/** Rewrite a pattern bottom-up. Embedded expressions are not visited. */
export function mapPattern(pattern: Pattern, f: (p: Pattern) => Pattern): Pattern {
	const recur = (p: Pattern): Pattern => mapPattern(p, f);
	switch (pattern.kind) {
	case "bind":
	case "literal":
	case "pin":
		return f(pattern);
	case "tuple":
	case "list": {
		const elements = mapArray(pattern.elements, recur);
		return f(elements === pattern.elements ? pattern : { ...pattern, elements });
	}
	case "cons": {
		const head = mapArray(pattern.head, recur);
		const tail = recur(pattern.tail);
		return f(head === pattern.head && tail === pattern.tail ? pattern : { ...pattern, head, tail });
	}
	case "map": {
		const entries = mapArray(pattern.entries, (e) => {
			const value = recur(e.value);
			return value === e.value ? e : { key: e.key, value };
		});
		return f(entries === pattern.entries ? pattern : { ...pattern, entries });
	}
	case "struct": {
		const fields = mapArray(pattern.fields, (fl) => {
			const value = recur(fl.value);
			return value === fl.value ? fl : { name: fl.name, value };
		});
		return f(fields === pattern.fields ? pattern : { ...pattern, fields });
	}
	case "alias": {
		const inner = recur(pattern.pattern);
		return f(inner === pattern.pattern ? pattern : { ...pattern, pattern: inner });
	}
	case "bitstring": {
		const segments = mapArray(pattern.segments, (s) => {
			const p = recur(s.pattern);
			return p === s.pattern ? s : { ...s, pattern: p };
		});
		return f(segments === pattern.segments ? pattern : { ...pattern, segments });
	}
	default:
		return exhaustive(pattern);
	}
}

//==============================================================================
// Node-Owned Patterns
//==============================================================================

type PatternFn = (p: Pattern) => Pattern;

function mapClausePattern(c: Clause, f: PatternFn): Clause {
	const pattern = f(c.pattern);
	return pattern === c.pattern ? c : { ...c, pattern };
}

function mapFnClauseParams(c: FnClause, f: PatternFn): FnClause {
	const params = mapArray(c.params, f);
	return params === c.params ? c : { ...c, params };
}

/**
 * Apply `f` to the patterns `expr` itself owns (match pattern, clause
 * patterns, with/for binders, fn/def parameters). Children are not visited.
 */
export function mapOwnPatterns(expr: Expr, f: PatternFn): Expr {
	switch (expr.kind) {
	case "match":
		return patched(expr, { pattern: f(expr.pattern) });
	case "case":
	case "receive":
		return patched(expr, { clauses: mapArray(expr.clauses, (c) => mapClausePattern(c, f)) });
	case "try":
		return patched(expr, {
			rescue: mapArray(expr.rescue, (c) => mapClausePattern(c, f)),
			catch: mapArray(expr.catch, (c) => mapClausePattern(c, f)),
		});
	case "with":
		return patched(expr, {
			clauses: mapArray(expr.clauses, (c) => {
				const pattern = f(c.pattern);
				return pattern === c.pattern ? c : { pattern, value: c.value };
			}),
			else: expr.else === undefined ? undefined : mapArray(expr.else, (c) => mapClausePattern(c, f)),
		});
	case "for":
		return patched(expr, {
			generators: mapArray(expr.generators, (g) => {
				const pattern = f(g.pattern);
				return pattern === g.pattern ? g : { pattern, source: g.source };
			}),
		});
	case "fn":
	case "def":
		return patched(expr, { clauses: mapArray(expr.clauses, (c) => mapFnClauseParams(c, f)) });
	default:
		return expr;
	}
}

/** Patterns owned by `expr` itself, in source order. */
export function ownPatterns(expr: Expr): Pattern[] {
	const out: Pattern[] = [];
	mapOwnPatterns(expr, (p) => {
		out.push(p);
		return p;
	});
	return out;
}
