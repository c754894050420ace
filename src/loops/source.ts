// SPDX-License-Identifier: MIT
// Reforge Source Loops
// The imperative input-side fragment a front end hands over when it cannot
// lower a loop itself. Mirrors the desugared shapes the front end produces:
// counted range loops, collection loops and while loops over a small
// statement language.

//==============================================================================
// Source Expressions
//==============================================================================

export type SourceBinaryOp =
	| "+" | "-" | "*" | "/" | "%"
	| "<" | "<=" | ">" | ">=" | "==" | "!="
	| "&&" | "||";

export type SourceConst = number | string | boolean | null;

export interface SourceIdent { kind: "ident"; name: string }
export interface SourceConstExpr { kind: "const"; value: SourceConst }
export interface SourceBinop { kind: "binop"; op: SourceBinaryOp; left: SourceExpr; right: SourceExpr }
export interface SourceUnop { kind: "unop"; op: "-" | "!"; operand: SourceExpr }
export interface SourceCall { kind: "call"; callee: string; args: SourceExpr[] }
export interface SourceMethodCall { kind: "method"; target: SourceExpr; name: string; args: SourceExpr[] }
export interface SourceField { kind: "field"; target: SourceExpr; field: string }
export interface SourceIndex { kind: "index"; target: SourceExpr; index: SourceExpr }
export interface SourceArrayLit { kind: "arrayLit"; elements: SourceExpr[] }

export type SourceExpr =
	| SourceIdent | SourceConstExpr | SourceBinop | SourceUnop
	| SourceCall | SourceMethodCall | SourceField | SourceIndex | SourceArrayLit;

//==============================================================================
// Source Statements
//==============================================================================

export type CompoundOp = "+" | "-" | "*" | "/";

export interface SourceVarDecl { kind: "varDecl"; name: string; init?: SourceExpr | undefined }
export interface SourceAssign { kind: "assign"; target: string; value: SourceExpr }
export interface SourceCompoundAssign { kind: "compoundAssign"; target: string; op: CompoundOp; value: SourceExpr }
/** `i++` / `i--` */
export interface SourceIncrement { kind: "increment"; target: string; delta: 1 | -1 }
/** `target.push(value)` */
export interface SourcePush { kind: "push"; target: string; value: SourceExpr }
export interface SourceIf { kind: "if"; cond: SourceExpr; then: SourceStmt[]; else?: SourceStmt[] | undefined }
export interface SourceExprStmt { kind: "exprStmt"; expr: SourceExpr }
export interface SourceBreak { kind: "break" }
export interface SourceContinue { kind: "continue" }
export interface SourceReturn { kind: "return"; value?: SourceExpr | undefined }

export type SourceStmt =
	| SourceVarDecl | SourceAssign | SourceCompoundAssign | SourceIncrement
	| SourcePush | SourceIf | SourceExprStmt
	| SourceBreak | SourceContinue | SourceReturn
	| SourceLoop;

//==============================================================================
// Source Loops
//==============================================================================

/** Counted range loop: `for (v in start...end)` */
export interface SourceForRange {
	kind: "forRange";
	variable: string;
	start: SourceExpr;
	end: SourceExpr;
	inclusive: boolean;
	step?: number | undefined;
	body: SourceStmt[];
}

/** Collection loop: `for (v in collection)` */
export interface SourceForEach {
	kind: "forEach";
	variable: string;
	collection: SourceExpr;
	body: SourceStmt[];
}

export interface SourceWhile {
	kind: "while";
	cond: SourceExpr;
	body: SourceStmt[];
	doWhile: boolean;
}

export type SourceLoop = SourceForRange | SourceForEach | SourceWhile;

const LOOP_KINDS = new Set(["forRange", "forEach", "while"]);

/** Type guard: checks if a statement is a nested loop */
export function isSourceLoop(stmt: SourceStmt): stmt is SourceLoop {
	return LOOP_KINDS.has(stmt.kind);
}

/**
 * What the front end knows about a variable when the loop starts,
 * e.g. `i = 0` or `result = []`.
 */
export interface KnownBinding {
	name: string;
	value: SourceExpr;
}

//==============================================================================
// Constructors
//==============================================================================

export const ident = (name: string): SourceIdent => ({ kind: "ident", name });
export const sconst = (value: SourceConst): SourceConstExpr => ({ kind: "const", value });
export const binop = (op: SourceBinaryOp, left: SourceExpr, right: SourceExpr): SourceBinop => ({
	kind: "binop", op, left, right,
});
