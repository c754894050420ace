// SPDX-License-Identifier: MIT
// Reforge Scope Walk
// The single scope-aware traversal every usage query is built on. It reports
// each name referenced in expression position that is not shadowed by a
// binder between the reference and the walk's starting point.
//
// Binders: case/receive/try clause patterns, with clauses, for generators
// and fn/def parameters always shadow. In sequential mode a `match` at
// statement level of a block also shadows the statements after it, which is
// what free-variable collection needs; plain usage queries leave it off so
// that a later read of a rebound name still counts as a use of that name.

import { identifierTokens } from "../ast/names.ts";
import { exhaustive } from "../errors.ts";
import { loopReads } from "../loops/source-usage.ts";
import type { Clause, Expr, FnClause, ForExpr, Literal, Pattern, WithExpr } from "../ast/types.ts";
import { patternBinders, patternExprs, pinnedNames } from "./patterns.ts";

export interface ScopeWalkOptions {
	/** Statement-level matches shadow later statements of the same block. */
	sequential: boolean;
}

type Visit = (name: string) => void;

interface WalkState {
	visit: Visit;
	options: ScopeWalkOptions;
}

/**
 * Code spans inside `#{...}` of a plain string literal. Braces nested inside
 * a span (maps, tuples, inner interpolations) are balanced, not terminators.
 * An unterminated `#{` yields nothing.
 */
export function interpolationSpans(text: string): string[] {
	const spans: string[] = [];
	let from = 0;
	for (;;) {
		const open = text.indexOf("#{", from);
		if (open < 0) return spans;
		let depth = 1;
		let i = open + 2;
		for (; i < text.length && depth > 0; i++) {
			const ch = text.charAt(i);
			if (ch === "{") depth++;
			else if (ch === "}") depth--;
		}
		if (depth > 0) return spans;
		spans.push(text.slice(open + 2, i - 1));
		from = i;
	}
}

function extend(shadow: ReadonlySet<string>, names: Iterable<string>): ReadonlySet<string> {
	const next = new Set(shadow);
	for (const name of names) next.add(name);
	return next;
}

function emit(state: WalkState, shadow: ReadonlySet<string>, names: Iterable<string>): void {
	for (const name of names) {
		if (!shadow.has(name)) state.visit(name);
	}
}

//==============================================================================
// Patterns and Clauses
//==============================================================================

/** Uses inside a pattern: pins and embedded expressions, read in `shadow`. */
function walkPatternUses(pattern: Pattern, shadow: ReadonlySet<string>, state: WalkState): void {
	emit(state, shadow, pinnedNames(pattern));
	for (const e of patternExprs(pattern)) walk(e, shadow, state);
}

function walkClause(c: Clause, shadow: ReadonlySet<string>, state: WalkState): void {
	walkPatternUses(c.pattern, shadow, state);
	const inner = extend(shadow, patternBinders(c.pattern));
	if (c.guard !== undefined) walk(c.guard, inner, state);
	walk(c.body, inner, state);
}

function walkFnClause(c: FnClause, shadow: ReadonlySet<string>, state: WalkState): void {
	for (const p of c.params) walkPatternUses(p, shadow, state);
	const inner = extend(shadow, c.params.flatMap(patternBinders));
	if (c.guard !== undefined) walk(c.guard, inner, state);
	walk(c.body, inner, state);
}

/** Names a statement binds for its successors: `a = b = expr` binds both. */
export function statementBinders(stmt: Expr): string[] {
	if (stmt.kind !== "match") return [];
	return [...patternBinders(stmt.pattern), ...statementBinders(stmt.value)];
}

function walkLiteral(value: Literal, shadow: ReadonlySet<string>, state: WalkState): void {
	if (value.type !== "string") return;
	for (const span of interpolationSpans(value.value)) {
		emit(state, shadow, identifierTokens(span));
	}
}

//==============================================================================
// Expression Walk
//==============================================================================

function walk(expr: Expr, shadow: ReadonlySet<string>, state: WalkState): void {
	const recur = (e: Expr): void => {
		walk(e, shadow, state);
	};
	switch (expr.kind) {
	case "var":
		emit(state, shadow, [expr.name]);
		return;
	case "lit":
		walkLiteral(expr.value, shadow, state);
		return;
	case "str":
		for (const part of expr.parts) {
			if (part.kind === "interp") recur(part.expr);
		}
		return;
	case "raw":
		emit(state, shadow, identifierTokens(expr.code));
		return;
	case "block":
		walkBlock(expr.exprs, shadow, state);
		return;
	case "binary":
		recur(expr.left);
		recur(expr.right);
		return;
	case "unary":
		recur(expr.operand);
		return;
	case "match":
		recur(expr.value);
		walkPatternUses(expr.pattern, shadow, state);
		return;
	case "if":
		recur(expr.cond);
		recur(expr.then);
		if (expr.else !== undefined) recur(expr.else);
		return;
	case "case":
		recur(expr.subject);
		for (const c of expr.clauses) walkClause(c, shadow, state);
		return;
	case "with":
		walkWith(expr, shadow, state);
		return;
	case "receive":
		for (const c of expr.clauses) walkClause(c, shadow, state);
		if (expr.after !== undefined) {
			recur(expr.after.timeout);
			recur(expr.after.body);
		}
		return;
	case "try":
		recur(expr.body);
		for (const c of expr.rescue) walkClause(c, shadow, state);
		for (const c of expr.catch) walkClause(c, shadow, state);
		if (expr.after !== undefined) recur(expr.after);
		return;
	case "for":
		walkFor(expr, shadow, state);
		return;
	case "fn":
	case "def":
		for (const c of expr.clauses) walkFnClause(c, shadow, state);
		return;
	case "call":
	case "remoteCall":
		expr.args.forEach(recur);
		return;
	case "apply":
		recur(expr.fn);
		expr.args.forEach(recur);
		return;
	case "field":
		recur(expr.target);
		return;
	case "index":
		recur(expr.target);
		recur(expr.index);
		return;
	case "list":
	case "tuple":
		expr.elements.forEach(recur);
		return;
	case "map":
		for (const e of expr.entries) {
			recur(e.key);
			recur(e.value);
		}
		return;
	case "struct":
		for (const f of expr.fields) recur(f.value);
		return;
	case "module":
		expr.body.forEach(recur);
		return;
	case "loop":
		emit(state, shadow, loopReads(expr.loop));
		return;
	default:
		exhaustive(expr);
	}
}

function walkBlock(exprs: Expr[], shadow: ReadonlySet<string>, state: WalkState): void {
	let scope = shadow;
	for (const stmt of exprs) {
		walk(stmt, scope, state);
		if (state.options.sequential) {
			const bound = statementBinders(stmt);
			if (bound.length > 0) scope = extend(scope, bound);
		}
	}
}

function walkWith(expr: WithExpr, shadow: ReadonlySet<string>, state: WalkState): void {
	let scope = shadow;
	for (const c of expr.clauses) {
		walk(c.value, scope, state);
		walkPatternUses(c.pattern, scope, state);
		scope = extend(scope, patternBinders(c.pattern));
	}
	walk(expr.body, scope, state);
	for (const c of expr.else ?? []) walkClause(c, shadow, state);
}

function walkFor(expr: ForExpr, shadow: ReadonlySet<string>, state: WalkState): void {
	let scope = shadow;
	for (const g of expr.generators) {
		walk(g.source, scope, state);
		walkPatternUses(g.pattern, scope, state);
		scope = extend(scope, patternBinders(g.pattern));
	}
	for (const f of expr.filters) walk(f, scope, state);
	walk(expr.body, scope, state);
	if (expr.into !== undefined) walk(expr.into, shadow, state);
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Visit every unshadowed reference in `expr`, in traversal order.
 * A name may be visited more than once.
 */
export function walkReferences(
	expr: Expr,
	visit: Visit,
	options: ScopeWalkOptions = { sequential: false },
	shadow: ReadonlySet<string> = new Set(),
): void {
	walk(expr, shadow, { visit, options });
}

/** Distinct unshadowed references in `expr`. */
export function referencedNames(
	expr: Expr,
	options: ScopeWalkOptions = { sequential: false },
	shadow: ReadonlySet<string> = new Set(),
): Set<string> {
	const out = new Set<string>();
	walkReferences(expr, (name) => out.add(name), options, shadow);
	return out;
}
