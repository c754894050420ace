// SPDX-License-Identifier: MIT
// Reforge Closure Analysis
// Free-variable collection for function and closure bodies, plus fresh-name
// generation for synthesised binders.

import { fuzzyKey } from "../ast/names.ts";
import type { Expr, FnClause, FnExpr } from "../ast/types.ts";
import { patternBinders } from "./patterns.ts";
import { referencedNames, walkReferences } from "./scope-walk.ts";

//==============================================================================
// Fresh Name Generation
//==============================================================================

/**
 * Generate a name that doesn't conflict with names in the given context.
 * Returns `base` when it is free, else `base_1`, `base_2`, ...
 */
export function freshName(base: string, context: ReadonlySet<string>): string {
	let candidate = base;
	let counter = 0;
	while (context.has(candidate)) {
		counter++;
		candidate = base + "_" + String(counter);
	}
	return candidate;
}

//==============================================================================
// Free Variable Collection
//==============================================================================

/**
 * Collect the free variables of a body: names it reads that are not bound
 * inside it. Nested case/with/for/fn/try binders shadow for their own scope
 * only, and a statement-level match binds for the statements after it.
 *
 * @param body - Function or closure body
 * @param bound - Names already bound around `body` (e.g. its parameters)
 */
export function collectFreeVars(body: Expr, bound: ReadonlySet<string> = new Set()): Set<string> {
	return referencedNames(body, { sequential: true }, bound);
}

/** Free variables of one fn/def clause: its params shadow guard and body. */
export function clauseFreeVars(c: FnClause): Set<string> {
	const bound = new Set(c.params.flatMap(patternBinders));
	const free = collectFreeVars(c.body, bound);
	if (c.guard !== undefined) {
		for (const name of collectFreeVars(c.guard, bound)) free.add(name);
	}
	return free;
}

/** Names a closure captures from its enclosing scope. */
export function capturedVariables(fnExpr: FnExpr): Set<string> {
	const out = new Set<string>();
	for (const c of fnExpr.clauses) {
		for (const name of clauseFreeVars(c)) out.add(name);
	}
	return out;
}

/** Is `name` a free reference inside `body`? */
export function isFreeIn(body: Expr, name: string, mode: "exact" | "fuzzy" = "exact"): boolean {
	if (mode === "exact") return collectFreeVars(body).has(name);
	const key = fuzzyKey(name);
	let found = false;
	walkReferences(body, (ref) => {
		if (!found && fuzzyKey(ref) === key) found = true;
	}, { sequential: true });
	return found;
}
