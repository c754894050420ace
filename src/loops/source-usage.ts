// SPDX-License-Identifier: MIT
// Reforge Source Loop Usage
// Reads and writes of outer variables inside an imperative loop fragment.
// Names declared with `varDecl` inside a body are local to that body and
// hide outer names of the same spelling from the point of declaration on.

import { exhaustive } from "../errors.ts";
import type { SourceExpr, SourceLoop, SourceStmt } from "./source.ts";

//==============================================================================
// Expression Reads
//==============================================================================

export function exprReads(expr: SourceExpr, out: Set<string> = new Set()): Set<string> {
	switch (expr.kind) {
	case "ident":
		out.add(expr.name);
		break;
	case "const":
		break;
	case "binop":
		exprReads(expr.left, out);
		exprReads(expr.right, out);
		break;
	case "unop":
		exprReads(expr.operand, out);
		break;
	case "call":
		for (const a of expr.args) exprReads(a, out);
		break;
	case "method":
		exprReads(expr.target, out);
		for (const a of expr.args) exprReads(a, out);
		break;
	case "field":
		exprReads(expr.target, out);
		break;
	case "index":
		exprReads(expr.target, out);
		exprReads(expr.index, out);
		break;
	case "arrayLit":
		for (const e of expr.elements) exprReads(e, out);
		break;
	default:
		exhaustive(expr);
	}
	return out;
}

//==============================================================================
// Statement Reads / Writes
//==============================================================================

interface UsageAcc {
	reads: Set<string>;
	writes: Set<string>;
}

function addRead(acc: UsageAcc, local: ReadonlySet<string>, names: Iterable<string>): void {
	for (const name of names) {
		if (!local.has(name)) acc.reads.add(name);
	}
}

function addWrite(acc: UsageAcc, local: ReadonlySet<string>, name: string): void {
	if (!local.has(name)) acc.writes.add(name);
}

function scanStmts(stmts: readonly SourceStmt[], outerLocal: ReadonlySet<string>, acc: UsageAcc): void {
	const local = new Set(outerLocal);
	for (const stmt of stmts) {
		scanStmt(stmt, local, acc);
		if (stmt.kind === "varDecl") local.add(stmt.name);
	}
}

function scanStmt(stmt: SourceStmt, local: ReadonlySet<string>, acc: UsageAcc): void {
	switch (stmt.kind) {
	case "varDecl":
		if (stmt.init !== undefined) addRead(acc, local, exprReads(stmt.init));
		return;
	case "assign":
		addRead(acc, local, exprReads(stmt.value));
		addWrite(acc, local, stmt.target);
		return;
	case "compoundAssign":
		addRead(acc, local, [stmt.target, ...exprReads(stmt.value)]);
		addWrite(acc, local, stmt.target);
		return;
	case "increment":
		addRead(acc, local, [stmt.target]);
		addWrite(acc, local, stmt.target);
		return;
	case "push":
		addRead(acc, local, [stmt.target, ...exprReads(stmt.value)]);
		addWrite(acc, local, stmt.target);
		return;
	case "if":
		addRead(acc, local, exprReads(stmt.cond));
		scanStmts(stmt.then, local, acc);
		if (stmt.else !== undefined) scanStmts(stmt.else, local, acc);
		return;
	case "exprStmt":
		addRead(acc, local, exprReads(stmt.expr));
		return;
	case "break":
	case "continue":
		return;
	case "return":
		if (stmt.value !== undefined) addRead(acc, local, exprReads(stmt.value));
		return;
	case "forRange":
	case "forEach":
	case "while":
		scanLoop(stmt, local, acc);
		return;
	default:
		exhaustive(stmt);
	}
}

function scanLoop(loop: SourceLoop, local: ReadonlySet<string>, acc: UsageAcc): void {
	switch (loop.kind) {
	case "forRange": {
		addRead(acc, local, exprReads(loop.start));
		addRead(acc, local, exprReads(loop.end));
		const inner = new Set(local);
		inner.add(loop.variable);
		scanStmts(loop.body, inner, acc);
		return;
	}
	case "forEach": {
		addRead(acc, local, exprReads(loop.collection));
		const inner = new Set(local);
		inner.add(loop.variable);
		scanStmts(loop.body, inner, acc);
		return;
	}
	case "while":
		addRead(acc, local, exprReads(loop.cond));
		scanStmts(loop.body, local, acc);
		return;
	default:
		exhaustive(loop);
	}
}

/** Outer names a statement list reads. */
export function stmtsReads(stmts: readonly SourceStmt[], local: ReadonlySet<string> = new Set()): Set<string> {
	const acc: UsageAcc = { reads: new Set(), writes: new Set() };
	scanStmts(stmts, local, acc);
	return acc.reads;
}

/** Outer names a statement list assigns. */
export function stmtsWrites(stmts: readonly SourceStmt[], local: ReadonlySet<string> = new Set()): Set<string> {
	const acc: UsageAcc = { reads: new Set(), writes: new Set() };
	scanStmts(stmts, local, acc);
	return acc.writes;
}

/** Outer names a loop reads, including through its header. */
export function loopReads(loop: SourceLoop): Set<string> {
	const acc: UsageAcc = { reads: new Set(), writes: new Set() };
	scanLoop(loop, new Set(), acc);
	return acc.reads;
}

/** Outer names a loop assigns. The loop's own variable is not outer. */
export function loopWrites(loop: SourceLoop): Set<string> {
	const acc: UsageAcc = { reads: new Set(), writes: new Set() };
	scanLoop(loop, new Set(), acc);
	return acc.writes;
}
