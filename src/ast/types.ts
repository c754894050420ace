// SPDX-License-Identifier: MIT
// Reforge Target AST
// The tree every rewrite pass reads and writes. Expressions and patterns are
// separate closed unions: expression position never binds a name, pattern
// position binds names except through `pin`.

import type { KnownBinding, SourceLoop } from "../loops/source.ts";

//==============================================================================
// Literals
//==============================================================================

export interface IntLit { type: "int"; value: number }
export interface FloatLit { type: "float"; value: number }
export interface StringLit { type: "string"; value: string }
export interface BoolLit { type: "bool"; value: boolean }
export interface NilLit { type: "nil" }
export interface AtomLit { type: "atom"; value: string }

export type Literal = IntLit | FloatLit | StringLit | BoolLit | NilLit | AtomLit;

//==============================================================================
// Patterns
//==============================================================================

export interface BindPattern { kind: "bind"; name: string }
export interface LiteralPattern { kind: "literal"; value: Literal }
export interface TuplePattern { kind: "tuple"; elements: Pattern[] }
export interface ListPattern { kind: "list"; elements: Pattern[] }
export interface ConsPattern { kind: "cons"; head: Pattern[]; tail: Pattern }
/** Map keys are expressions (literals or pinned values), never binders. */
export interface MapPattern { kind: "map"; entries: { key: Expr; value: Pattern }[] }
export interface StructPattern { kind: "struct"; module: string; fields: { name: string; value: Pattern }[] }
/** `^name`: matches the current value of an existing binding */
export interface PinPattern { kind: "pin"; name: string }
/** `pattern = name` */
export interface AliasPattern { kind: "alias"; pattern: Pattern; name: string }
export interface BitstringSegment { pattern: Pattern; size?: Expr | undefined; type?: string | undefined }
export interface BitstringPattern { kind: "bitstring"; segments: BitstringSegment[] }

export type Pattern =
	| BindPattern | LiteralPattern | TuplePattern | ListPattern | ConsPattern
	| MapPattern | StructPattern | PinPattern | AliasPattern | BitstringPattern;

export type PatternKind = Pattern["kind"];

//==============================================================================
// Clauses
//==============================================================================

export interface Clause { pattern: Pattern; guard?: Expr | undefined; body: Expr }
export interface FnClause { params: Pattern[]; guard?: Expr | undefined; body: Expr }
export interface WithClause { pattern: Pattern; value: Expr }
export interface Generator { pattern: Pattern; source: Expr }

export type StrPart =
	| { kind: "text"; text: string }
	| { kind: "interp"; expr: Expr };

//==============================================================================
// Expressions
//==============================================================================

export interface VarExpr { kind: "var"; name: string }
export interface LitExpr { kind: "lit"; value: Literal }
export interface StrExpr { kind: "str"; parts: StrPart[] }
/** Pass-through code fragment the printer emits verbatim. */
export interface RawExpr { kind: "raw"; code: string }
export interface BlockExpr { kind: "block"; exprs: Expr[] }
export interface BinaryExpr { kind: "binary"; op: string; left: Expr; right: Expr }
export interface UnaryExpr { kind: "unary"; op: string; operand: Expr }
export interface MatchExpr { kind: "match"; pattern: Pattern; value: Expr }
export interface IfExpr { kind: "if"; cond: Expr; then: Expr; else?: Expr | undefined }
export interface CaseExpr { kind: "case"; subject: Expr; clauses: Clause[] }
export interface WithExpr { kind: "with"; clauses: WithClause[]; body: Expr; else?: Clause[] | undefined }
export interface ReceiveExpr { kind: "receive"; clauses: Clause[]; after?: { timeout: Expr; body: Expr } | undefined }
export interface TryExpr { kind: "try"; body: Expr; rescue: Clause[]; catch: Clause[]; after?: Expr | undefined }
export interface ForExpr { kind: "for"; generators: Generator[]; filters: Expr[]; into?: Expr | undefined; body: Expr }
export interface FnExpr { kind: "fn"; clauses: FnClause[] }
export interface CallExpr { kind: "call"; name: string; args: Expr[] }
export interface RemoteCallExpr { kind: "remoteCall"; module: string; name: string; args: Expr[] }
/** `fun.(args)` */
export interface ApplyExpr { kind: "apply"; fn: Expr; args: Expr[] }
export interface FieldExpr { kind: "field"; target: Expr; field: string }
export interface IndexExpr { kind: "index"; target: Expr; index: Expr }
export interface ListExpr { kind: "list"; elements: Expr[] }
export interface TupleExpr { kind: "tuple"; elements: Expr[] }
export interface MapExpr { kind: "map"; entries: { key: Expr; value: Expr }[] }
export interface StructExpr { kind: "struct"; module: string; fields: { name: string; value: Expr }[] }
export interface DefExpr { kind: "def"; name: string; private: boolean; clauses: FnClause[] }
export interface ModuleExpr { kind: "module"; name: string; body: Expr[] }
/** Imperative loop the front end deferred to the loop passes. */
export interface LoopExpr { kind: "loop"; loop: SourceLoop; known: KnownBinding[] }

export type Expr =
	| VarExpr | LitExpr | StrExpr | RawExpr | BlockExpr
	| BinaryExpr | UnaryExpr | MatchExpr
	| IfExpr | CaseExpr | WithExpr | ReceiveExpr | TryExpr | ForExpr
	| FnExpr | CallExpr | RemoteCallExpr | ApplyExpr
	| FieldExpr | IndexExpr
	| ListExpr | TupleExpr | MapExpr | StructExpr
	| DefExpr | ModuleExpr | LoopExpr;

export type ExprKind = Expr["kind"];
