// SPDX-License-Identifier: MIT
// Reforge Loop Passes
// Lowers the deferred imperative loops the front end left in the tree.
//
// The walk is top-down so that a loop in a nested statement block sees what
// the enclosing blocks read after it: a plain block leaks its bindings to the
// code that follows, so a counter read after `(i = 0; while ...)` must survive.

import { statementsOf } from "../ast/builders.ts";
import { childrenOf, mapChildren } from "../ast/traverse.ts";
import type { Expr, ExprKind, LoopExpr } from "../ast/types.ts";
import { pinnedNames } from "../analysis/patterns.ts";
import { buildExactUsageIndex, suffixAt } from "../analysis/usage-index.ts";
import { usedNames } from "../analysis/usage.ts";
import { lowerLoop } from "../loops/lowering.ts";
import { contextualPass, type PassContext, type PassDescriptor } from "../pipeline/pass.ts";

const NOTHING_LIVE: ReadonlySet<string> = new Set();

/** Function bodies: nothing outside them reads their bindings. */
const FUNCTION_SCOPES: ReadonlySet<ExprKind> = new Set<ExprKind>(["module", "def", "fn"]);

function union(a: ReadonlySet<string>, b: Iterable<string>): Set<string> {
	const out = new Set(a);
	for (const name of b) out.add(name);
	return out;
}

function lowerNode(node: LoopExpr, liveAfter: ReadonlySet<string>, ctx: PassContext): Expr {
	return lowerLoop(node.loop, ctx.builder, { known: node.known, liveAfter }) ?? node;
}

/** Statements of a block, each lowered against what the rest of the block and the enclosing code read. */
function lowerInBlock(exprs: readonly Expr[], live: ReadonlySet<string>, ctx: PassContext): Expr[] | null {
	const index = buildExactUsageIndex(exprs);
	let changed = false;
	const out = exprs.flatMap((stmt, i) => {
		const lowered = lowerWithin(stmt, union(live, suffixAt(index, i + 1)), ctx);
		if (lowered === stmt) return [stmt];
		changed = true;
		return stmt.kind === "loop" ? statementsOf(lowered) : [lowered];
	});
	return changed ? out : null;
}

/** Names read by the other children of a node, which may run after `child`. */
function siblingReads(siblings: readonly Expr[], child: Expr): Set<string> {
	const out = new Set<string>();
	for (const s of siblings) {
		if (s !== child) for (const name of usedNames(s)) out.add(name);
	}
	return out;
}

function lowerWithin(node: Expr, live: ReadonlySet<string>, ctx: PassContext): Expr {
	if (node.kind === "loop") return lowerNode(node, live, ctx);
	if (node.kind === "block") {
		const exprs = lowerInBlock(node.exprs, live, ctx);
		return exprs === null ? node : { kind: "block", exprs };
	}
	if (FUNCTION_SCOPES.has(node.kind)) {
		return mapChildren(node, (child) => lowerWithin(child, NOTHING_LIVE, ctx));
	}
	const siblings = childrenOf(node);
	// a pin in `^x = (...)` is matched after the value runs
	const outer = node.kind === "match" ? union(live, pinnedNames(node.pattern)) : live;
	return mapChildren(node, (child) => lowerWithin(child, union(outer, siblingReads(siblings, child)), ctx));
}

export function lowerDeferredLoops(ast: Expr, ctx: PassContext): Expr {
	return lowerWithin(ast, NOTHING_LIVE, ctx);
}

export const lowerDeferredLoopsPass: PassDescriptor = contextualPass(
	"lowerDeferredLoops",
	"Recognise deferred imperative loops and replace them with Enum/comprehension/recursive-closure forms",
	lowerDeferredLoops,
);

export const loopPasses: readonly PassDescriptor[] = [lowerDeferredLoopsPass];
