// SPDX-License-Identifier: MIT
// Reforge Hygiene Passes
// Variable naming cleanups that must re-query usage after every structural
// rewrite has settled: snake_case normalisation, `_` prefixes on binders that
// are never read, and removal of `_` from binders that are.

import {
	fuzzyKey,
	hasHygienePrefix,
	identifierTokens,
	isWildcard,
	toSnakeCase,
	withHygienePrefix,
	withoutHygienePrefix,
} from "../ast/names.ts";
import { childrenOf, mapOwnPatterns, mapPattern, ownPatterns, someNode, transformBottomUp } from "../ast/traverse.ts";
import type { Clause, Expr, FnClause, Pattern } from "../ast/types.ts";
import { collectFreeVars } from "../analysis/closure.ts";
import { patternBinders, renameBinders } from "../analysis/patterns.ts";
import { interpolationSpans, referencedNames } from "../analysis/scope-walk.ts";
import { buildUsageIndex, usedLater } from "../analysis/usage-index.ts";
import { loopReads, loopWrites } from "../loops/source-usage.ts";
import type { PassDescriptor } from "../pipeline/pass.ts";

//==============================================================================
// Scope Renaming
//==============================================================================

/** Rename binders, pins and alias names. */
function renamePattern(pattern: Pattern, renaming: ReadonlyMap<string, string>): Pattern {
	return mapPattern(renameBinders(pattern, renaming), (p) => {
		if (p.kind !== "pin") return p;
		const next = renaming.get(p.name);
		return next === undefined ? p : { kind: "pin", name: next };
	});
}

/** Rename every occurrence of the mapped names inside `expr`, binders and references alike. */
function renameAll(expr: Expr, renaming: ReadonlyMap<string, string>): Expr {
	if (renaming.size === 0) return expr;
	return transformBottomUp(expr, (node) => {
		if (node.kind === "var") {
			const next = renaming.get(node.name);
			return next === undefined ? node : { kind: "var", name: next };
		}
		return mapOwnPatterns(node, (p) => renamePattern(p, renaming));
	});
}

function renameInFnClause(c: FnClause, renaming: ReadonlyMap<string, string>): FnClause {
	if (renaming.size === 0) return c;
	const params = c.params.map((p) => renamePattern(p, renaming));
	const body = renameAll(c.body, renaming);
	return c.guard === undefined
		? { params, body }
		: { params, guard: renameAll(c.guard, renaming), body };
}

interface ScopeNames {
	/** Every binder and reference spelling in the scope */
	all: Set<string>;
	/** Names some pattern in the scope binds */
	bound: Set<string>;
	/** Names only visible as text (raw code, interpolation) or inside deferred loops */
	opaque: Set<string>;
}

function scopeNames(exprs: readonly Expr[], params: readonly Pattern[] = []): ScopeNames {
	const all = new Set<string>();
	const bound = new Set<string>();
	const opaque = new Set<string>();
	const addPattern = (p: Pattern): void => {
		mapPattern(p, (q) => {
			if (q.kind === "bind" || q.kind === "pin" || q.kind === "alias") all.add(q.name);
			return q;
		});
		for (const name of patternBinders(p)) bound.add(name);
	};
	params.forEach(addPattern);
	const visit = (node: Expr): void => {
		switch (node.kind) {
		case "var":
			all.add(node.name);
			break;
		case "raw":
			for (const t of identifierTokens(node.code)) opaque.add(t);
			break;
		case "lit":
			if (node.value.type === "string") {
				for (const span of interpolationSpans(node.value.value)) {
					for (const t of identifierTokens(span)) opaque.add(t);
				}
			}
			break;
		case "loop":
			for (const n of loopReads(node.loop)) opaque.add(n);
			for (const n of loopWrites(node.loop)) opaque.add(n);
			break;
		default:
			break;
		}
		ownPatterns(node).forEach(addPattern);
		childrenOf(node).forEach(visit);
	};
	exprs.forEach(visit);
	for (const n of opaque) all.add(n);
	return { all, bound, opaque };
}

/**
 * Apply `plan` to every function clause scope: each def clause on its own,
 * or the whole tree when it contains no def.
 */
function perScope(
	ast: Expr,
	plan: (names: ScopeNames, exprs: readonly Expr[]) => Map<string, string>,
): Expr {
	if (!someNode(ast, (n) => n.kind === "def")) {
		return renameAll(ast, plan(scopeNames([ast]), [ast]));
	}
	return transformBottomUp(ast, (node) => {
		if (node.kind !== "def") return node;
		let changed = false;
		const clauses = node.clauses.map((c) => {
			const exprs = c.guard === undefined ? [c.body] : [c.guard, c.body];
			const renaming = plan(scopeNames(exprs, c.params), exprs);
			if (renaming.size > 0) changed = true;
			return renameInFnClause(c, renaming);
		});
		return changed ? { ...node, clauses } : node;
	});
}

//==============================================================================
// normalizeVariableCase
//==============================================================================

/** camelCase variables become snake_case, unless the snake form is taken. */
export function normalizeVariableCase(ast: Expr): Expr {
	return perScope(ast, ({ all, bound, opaque }) => {
		const renaming = new Map<string, string>();
		const taken = new Set(all);
		for (const name of bound) {
			const snake = toSnakeCase(name);
			if (snake === name || opaque.has(name) || taken.has(snake)) continue;
			renaming.set(name, snake);
			taken.add(snake);
		}
		return renaming;
	});
}

//==============================================================================
// underscoreUnusedParams
//==============================================================================

function readKeys(exprs: readonly (Expr | undefined)[]): Set<string> {
	const keys = new Set<string>();
	for (const e of exprs) {
		if (e === undefined) continue;
		for (const name of collectFreeVars(e)) keys.add(fuzzyKey(name));
	}
	return keys;
}

function unusedRenaming(binders: readonly string[], used: ReadonlySet<string>): Map<string, string> {
	const renaming = new Map<string, string>();
	for (const name of binders) {
		if (isWildcard(name) || hasHygienePrefix(name) || used.has(fuzzyKey(name))) continue;
		renaming.set(name, withHygienePrefix(name));
	}
	return renaming;
}

function underscoreFnClause(c: FnClause): FnClause {
	const used = readKeys([c.guard, c.body]);
	const renaming = unusedRenaming(c.params.flatMap(patternBinders), used);
	if (renaming.size === 0) return c;
	return { ...c, params: c.params.map((p) => renameBinders(p, renaming)) };
}

function underscoreClause(c: Clause): Clause {
	const used = readKeys([c.guard, c.body]);
	const renaming = unusedRenaming(patternBinders(c.pattern), used);
	if (renaming.size === 0) return c;
	return { ...c, pattern: renameBinders(c.pattern, renaming) };
}

function mapIfChanged<T>(items: T[], f: (item: T) => T): T[] {
	const out = items.map(f);
	return out.every((item, i) => item === items[i]) ? items : out;
}

function sameIfUnchanged(items: Expr[], next: Expr[]): Expr[] {
	return next.every((item, i) => item === items[i]) ? items : next;
}

/** Parameters and clause binders never read in their guard or body get a `_` prefix. */
export function underscoreUnusedParams(ast: Expr): Expr {
	return transformBottomUp(ast, (node) => {
		switch (node.kind) {
		case "fn":
		case "def": {
			const clauses = mapIfChanged(node.clauses, underscoreFnClause);
			return clauses === node.clauses ? node : { ...node, clauses };
		}
		case "case":
		case "receive": {
			const clauses = mapIfChanged(node.clauses, underscoreClause);
			return clauses === node.clauses ? node : { ...node, clauses };
		}
		case "try": {
			const rescue = mapIfChanged(node.rescue, underscoreClause);
			const caught = mapIfChanged(node.catch, underscoreClause);
			return rescue === node.rescue && caught === node.catch ? node : { ...node, rescue, catch: caught };
		}
		default:
			return node;
		}
	});
}

//==============================================================================
// underscoreUnusedBinders
//==============================================================================

/** Match binders in a statement sequence that nothing after them reads. */
function underscoreSequence(stmts: readonly Expr[]): Expr[] {
	const index = buildUsageIndex(stmts);
	return stmts.map((stmt, i) => {
		if (stmt.kind !== "match") return stmt;
		const renaming = new Map<string, string>();
		for (const name of patternBinders(stmt.pattern)) {
			if (isWildcard(name) || hasHygienePrefix(name) || usedLater(index, i + 1, name)) continue;
			renaming.set(name, withHygienePrefix(name));
		}
		if (renaming.size === 0) return stmt;
		return { ...stmt, pattern: renameBinders(stmt.pattern, renaming) };
	});
}

function underscoreBody(body: Expr): Expr {
	if (body.kind !== "match") return body;
	const [next] = underscoreSequence([body]);
	return next ?? body;
}

/** `x = e` where no later statement reads `x` becomes `_x = e`. */
export function underscoreUnusedBinders(ast: Expr): Expr {
	return transformBottomUp(ast, (node) => {
		switch (node.kind) {
		case "block": {
			const exprs = sameIfUnchanged(node.exprs, underscoreSequence(node.exprs));
			return exprs === node.exprs ? node : { kind: "block", exprs };
		}
		case "fn":
		case "def": {
			const clauses = mapIfChanged(node.clauses, (c) => {
				const body = underscoreBody(c.body);
				return body === c.body ? c : { ...c, body };
			});
			return clauses === node.clauses ? node : { ...node, clauses };
		}
		default:
			return node;
		}
	});
}


//==============================================================================
// restoreUsedUnderscoreBinders
//==============================================================================

/** `_x` that is read gets its plain name back when `x` is free in the scope. */
export function restoreUsedUnderscoreBinders(ast: Expr): Expr {
	return perScope(ast, ({ all, bound, opaque }, exprs) => {
		const referenced = new Set<string>();
		for (const e of exprs) {
			for (const name of referencedNames(e)) referenced.add(name);
		}
		const renaming = new Map<string, string>();
		for (const name of bound) {
			if (!hasHygienePrefix(name) || !referenced.has(name) || opaque.has(name)) continue;
			const plain = withoutHygienePrefix(name);
			if (all.has(plain) || [...renaming.values()].includes(plain)) continue;
			renaming.set(name, plain);
		}
		return renaming;
	});
}

//==============================================================================
// Descriptors
//==============================================================================

export const hygienePasses: readonly PassDescriptor[] = [
	{
		name: "normalizeVariableCase",
		description: "camelCase variables become snake_case per function scope",
		enabled: true,
		rewrite: normalizeVariableCase,
		runAfter: ["inlineTrailingTemp"],
	},
	{
		name: "underscoreUnusedParams",
		description: "Prefix unread parameters and clause binders with _",
		enabled: true,
		rewrite: underscoreUnusedParams,
		runAfter: ["normalizeVariableCase"],
	},
	{
		name: "underscoreUnusedBinders",
		description: "Prefix match binders no later statement reads with _",
		enabled: true,
		rewrite: underscoreUnusedBinders,
		runAfter: ["normalizeVariableCase"],
	},
	{
		name: "restoreUsedUnderscoreBinders",
		description: "Drop the _ prefix from binders that are read",
		enabled: true,
		rewrite: restoreUsedUnderscoreBinders,
		runAfter: ["underscoreUnusedParams", "underscoreUnusedBinders"],
	},
];
