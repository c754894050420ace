// SPDX-License-Identifier: MIT
// Reforge AST Constructors

import type {
	BitstringSegment, BlockExpr, Clause, Expr, FnClause, FnExpr, Generator,
	Literal, LitExpr, Pattern, StrPart, VarExpr,
} from "./types.ts";

//==============================================================================
// Literals
//==============================================================================

export const intLit = (value: number): LitExpr => ({ kind: "lit", value: { type: "int", value } });
export const floatLit = (value: number): LitExpr => ({ kind: "lit", value: { type: "float", value } });
export const stringLit = (value: string): LitExpr => ({ kind: "lit", value: { type: "string", value } });
export const boolLit = (value: boolean): LitExpr => ({ kind: "lit", value: { type: "bool", value } });
export const nilLit = (): LitExpr => ({ kind: "lit", value: { type: "nil" } });
export const atom = (value: string): LitExpr => ({ kind: "lit", value: { type: "atom", value } });

//==============================================================================
// Expressions
//==============================================================================

export const varRef = (name: string): VarExpr => ({ kind: "var", name });
export const raw = (code: string): Expr => ({ kind: "raw", code });
export const str = (parts: StrPart[]): Expr => ({ kind: "str", parts });
export const block = (exprs: Expr[]): BlockExpr => ({ kind: "block", exprs });
export const binary = (op: string, left: Expr, right: Expr): Expr => ({ kind: "binary", op, left, right });
export const unary = (op: string, operand: Expr): Expr => ({ kind: "unary", op, operand });
export const match = (pattern: Pattern, value: Expr): Expr => ({ kind: "match", pattern, value });
export const call = (name: string, args: Expr[]): Expr => ({ kind: "call", name, args });
export const remoteCall = (module: string, name: string, args: Expr[]): Expr => ({
	kind: "remoteCall", module, name, args,
});
export const apply = (fn: Expr, args: Expr[]): Expr => ({ kind: "apply", fn, args });
export const field = (target: Expr, name: string): Expr => ({ kind: "field", target, field: name });
export const index = (target: Expr, idx: Expr): Expr => ({ kind: "index", target, index: idx });
export const list = (elements: Expr[]): Expr => ({ kind: "list", elements });
export const tuple = (elements: Expr[]): Expr => ({ kind: "tuple", elements });

export function ifExpr(cond: Expr, then: Expr, otherwise?: Expr): Expr {
	return otherwise === undefined
		? { kind: "if", cond, then }
		: { kind: "if", cond, then, else: otherwise };
}

export function clause(pattern: Pattern, body: Expr, guard?: Expr): Clause {
	return guard === undefined ? { pattern, body } : { pattern, guard, body };
}

export const caseExpr = (subject: Expr, clauses: Clause[]): Expr => ({ kind: "case", subject, clauses });

export function fnClause(params: Pattern[], body: Expr, guard?: Expr): FnClause {
	return guard === undefined ? { params, body } : { params, guard, body };
}

/** Single-clause anonymous function */
export const fn = (params: Pattern[], body: Expr): FnExpr => ({ kind: "fn", clauses: [fnClause(params, body)] });

export function forExpr(generators: Generator[], filters: Expr[], body: Expr): Expr {
	return { kind: "for", generators, filters, body };
}

export function def(name: string, params: Pattern[], body: Expr, isPrivate = false): Expr {
	return { kind: "def", name, private: isPrivate, clauses: [fnClause(params, body)] };
}

export const moduleExpr = (name: string, body: Expr[]): Expr => ({ kind: "module", name, body });

//==============================================================================
// Patterns
//==============================================================================

export const pbind = (name: string): Pattern => ({ kind: "bind", name });
export const plit = (value: Literal): Pattern => ({ kind: "literal", value });
export const ptuple = (elements: Pattern[]): Pattern => ({ kind: "tuple", elements });
export const plist = (elements: Pattern[]): Pattern => ({ kind: "list", elements });
export const pcons = (head: Pattern[], tail: Pattern): Pattern => ({ kind: "cons", head, tail });
export const ppin = (name: string): Pattern => ({ kind: "pin", name });
export const palias = (pattern: Pattern, name: string): Pattern => ({ kind: "alias", pattern, name });
export const pbitstring = (segments: BitstringSegment[]): Pattern => ({ kind: "bitstring", segments });

//==============================================================================
// Sequences
//==============================================================================

/** Statements of a body: the block's expressions, or the body itself. */
export function statementsOf(body: Expr): Expr[] {
	return body.kind === "block" ? body.exprs : [body];
}

/** Inverse of statementsOf: a single statement stays bare. */
export function sequence(stmts: Expr[]): Expr {
	if (stmts.length === 1 && stmts[0] !== undefined) return stmts[0];
	return block(stmts);
}
