// SPDX-License-Identifier: MIT
// Reforge Early-Exit Signals
// Rewrites `break` / `continue` in a loop body into explicit signal values:
// every path through the rewritten body ends in exactly one signal. A body
// whose last statement is not a jump gets a continue signal appended.
//
// Supported positions: a jump at the top level of the body, or as the last
// statement of the then/else branch of a top-level `if`. The statements after
// such an `if` are copied into whichever branch falls through.

import { nilLit, ifExpr, sequence } from "../ast/builders.ts";
import type { Expr } from "../ast/types.ts";
import { ReforgeError } from "../errors.ts";
import { containsJump } from "./analyzer.ts";
import type { SourceExpr, SourceStmt } from "./source.ts";

export interface SignalKit {
	/** Value that continues with the next iteration */
	cont(): Expr;
	/** Value that stops the loop */
	halt(): Expr;
}

export interface StatementTranslator {
	expr(expr: SourceExpr): Expr;
	stmts(stmts: readonly SourceStmt[]): Expr[];
}

export function hasLoopJump(stmts: readonly SourceStmt[]): boolean {
	return containsJump(stmts, "break") || containsJump(stmts, "continue");
}

function signalFor(stmt: SourceStmt | undefined, kit: SignalKit): Expr | undefined {
	if (stmt?.kind === "break") return kit.halt();
	if (stmt?.kind === "continue") return kit.cont();
	return undefined;
}

function seq(exprs: Expr[]): Expr {
	return exprs.length === 0 ? nilLit() : sequence(exprs);
}

function branch(
	stmts: readonly SourceStmt[],
	rest: readonly SourceStmt[],
	t: StatementTranslator,
	kit: SignalKit,
): Expr[] {
	const head = stmts.slice(0, -1);
	const signal = signalFor(stmts[stmts.length - 1], kit);
	if (signal !== undefined) {
		if (hasLoopJump(head)) throw ReforgeError.unsupportedLoop("jump before the end of a branch");
		return [...t.stmts(head), signal];
	}
	if (hasLoopJump(stmts)) throw ReforgeError.unsupportedLoop("jump nested below a top-level if");
	return signalize([...stmts, ...rest], t, kit);
}

/**
 * Translate a loop body so that it evaluates to a signal.
 * Throws UnsupportedLoop for jumps in positions it cannot express.
 */
export function signalize(stmts: readonly SourceStmt[], t: StatementTranslator, kit: SignalKit): Expr[] {
	const out: Expr[] = [];
	for (const [i, stmt] of stmts.entries()) {
		const signal = signalFor(stmt, kit);
		if (signal !== undefined) {
			out.push(signal);
			return out;
		}
		if (stmt.kind === "if" && hasLoopJump([stmt])) {
			const rest = stmts.slice(i + 1);
			out.push(ifExpr(
				t.expr(stmt.cond),
				seq(branch(stmt.then, rest, t, kit)),
				seq(branch(stmt.else ?? [], rest, t, kit)),
			));
			return out;
		}
		out.push(...t.stmts([stmt]));
	}
	out.push(kit.cont());
	return out;
}
