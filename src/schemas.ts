// SPDX-License-Identifier: MIT
// Reforge Zod Schemas
// Runtime validation for trees handed over as JSON by a front end running in
// another process.
//
// Types come from the hand-written interfaces in ast/types.ts and
// loops/source.ts; each schema is annotated with z.ZodType<ExplicitType> and
// recursive fields use getters, since z.discriminatedUnion does not support
// recursion.

import { z } from "zod/v4";
import type {
	AliasPattern, ApplyExpr, BinaryExpr, BindPattern, BitstringPattern, BlockExpr,
	CallExpr, CaseExpr, Clause, ConsPattern, DefExpr, Expr, FieldExpr, FnClause, FnExpr,
	ForExpr, Generator, IfExpr, IndexExpr, ListExpr, ListPattern, Literal, LiteralPattern,
	LitExpr, LoopExpr, MapExpr, MapPattern, MatchExpr, ModuleExpr, Pattern, PinPattern,
	RawExpr, ReceiveExpr, RemoteCallExpr, StrExpr, StrPart, StructExpr, StructPattern,
	TryExpr, TupleExpr, TuplePattern, UnaryExpr, VarExpr, WithClause, WithExpr,
} from "./ast/types.ts";
import type {
	KnownBinding, SourceExpr, SourceForEach, SourceForRange, SourceLoop, SourceStmt, SourceWhile,
} from "./loops/source.ts";
import { ReforgeError } from "./errors.ts";

//==============================================================================
// Literals
//==============================================================================

export const LiteralSchema: z.ZodType<Literal> = z.discriminatedUnion("type", [
	z.object({ type: z.literal("int"), value: z.number().int() }),
	z.object({ type: z.literal("float"), value: z.number() }),
	z.object({ type: z.literal("string"), value: z.string() }),
	z.object({ type: z.literal("bool"), value: z.boolean() }),
	z.object({ type: z.literal("nil") }),
	z.object({ type: z.literal("atom"), value: z.string() }),
]).meta({ id: "Literal", title: "Literal", description: "Constant value tagged with its literal type" });

//==============================================================================
// Source Loops
//==============================================================================

export const SourceExprSchema: z.ZodType<SourceExpr> = z.union([
	z.object({ kind: z.literal("ident"), name: z.string() }),
	z.object({ kind: z.literal("const"), value: z.union([z.number(), z.string(), z.boolean(), z.null()]) }),
	z.object({
		kind: z.literal("binop"),
		op: z.enum(["+", "-", "*", "/", "%", "<", "<=", ">", ">=", "==", "!=", "&&", "||"]),
		get left() { return SourceExprSchema; },
		get right() { return SourceExprSchema; },
	}),
	z.object({ kind: z.literal("unop"), op: z.enum(["-", "!"]), get operand() { return SourceExprSchema; } }),
	z.object({ kind: z.literal("call"), callee: z.string(), get args() { return z.array(SourceExprSchema); } }),
	z.object({
		kind: z.literal("method"),
		get target() { return SourceExprSchema; },
		name: z.string(),
		get args() { return z.array(SourceExprSchema); },
	}),
	z.object({ kind: z.literal("field"), get target() { return SourceExprSchema; }, field: z.string() }),
	z.object({ kind: z.literal("index"), get target() { return SourceExprSchema; }, get index() { return SourceExprSchema; } }),
	z.object({ kind: z.literal("arrayLit"), get elements() { return z.array(SourceExprSchema); } }),
]).meta({ id: "SourceExpr", title: "Source Expression", description: "Expression of a deferred imperative loop" });

const stmts = (): z.ZodType<SourceStmt[]> => z.array(SourceStmtSchema);

export const SourceForRangeSchema: z.ZodType<SourceForRange> = z.object({
	kind: z.literal("forRange"),
	variable: z.string(),
	start: SourceExprSchema,
	end: SourceExprSchema,
	inclusive: z.boolean(),
	step: z.number().int().optional(),
	get body() { return stmts(); },
});

export const SourceForEachSchema: z.ZodType<SourceForEach> = z.object({
	kind: z.literal("forEach"),
	variable: z.string(),
	collection: SourceExprSchema,
	get body() { return stmts(); },
});

export const SourceWhileSchema: z.ZodType<SourceWhile> = z.object({
	kind: z.literal("while"),
	cond: SourceExprSchema,
	doWhile: z.boolean(),
	get body() { return stmts(); },
});

export const SourceLoopSchema: z.ZodType<SourceLoop> = z.union([
	SourceForRangeSchema,
	SourceForEachSchema,
	SourceWhileSchema,
]).meta({ id: "SourceLoop", title: "Source Loop", description: "Imperative loop the front end could not lower" });

export const SourceStmtSchema: z.ZodType<SourceStmt> = z.union([
	z.object({ kind: z.literal("varDecl"), name: z.string(), init: SourceExprSchema.optional() }),
	z.object({ kind: z.literal("assign"), target: z.string(), value: SourceExprSchema }),
	z.object({
		kind: z.literal("compoundAssign"),
		target: z.string(),
		op: z.enum(["+", "-", "*", "/"]),
		value: SourceExprSchema,
	}),
	z.object({ kind: z.literal("increment"), target: z.string(), delta: z.union([z.literal(1), z.literal(-1)]) }),
	z.object({ kind: z.literal("push"), target: z.string(), value: SourceExprSchema }),
	z.object({
		kind: z.literal("if"),
		cond: SourceExprSchema,
		get then() { return stmts(); },
		get else() { return stmts().optional(); },
	}),
	z.object({ kind: z.literal("exprStmt"), expr: SourceExprSchema }),
	z.object({ kind: z.literal("break") }),
	z.object({ kind: z.literal("continue") }),
	z.object({ kind: z.literal("return"), value: SourceExprSchema.optional() }),
	SourceLoopSchema,
]);

export const KnownBindingSchema: z.ZodType<KnownBinding> = z.object({
	name: z.string(),
	value: SourceExprSchema,
});

//==============================================================================
// Patterns
//==============================================================================

export const BindPatternSchema: z.ZodType<BindPattern> = z.object({ kind: z.literal("bind"), name: z.string() });
export const LiteralPatternSchema: z.ZodType<LiteralPattern> = z.object({ kind: z.literal("literal"), value: LiteralSchema });
export const PinPatternSchema: z.ZodType<PinPattern> = z.object({ kind: z.literal("pin"), name: z.string() });

export const TuplePatternSchema: z.ZodType<TuplePattern> = z.object({
	kind: z.literal("tuple"),
	get elements() { return z.array(PatternSchema); },
});

export const ListPatternSchema: z.ZodType<ListPattern> = z.object({
	kind: z.literal("list"),
	get elements() { return z.array(PatternSchema); },
});

export const ConsPatternSchema: z.ZodType<ConsPattern> = z.object({
	kind: z.literal("cons"),
	get head() { return z.array(PatternSchema); },
	get tail() { return PatternSchema; },
});

export const MapPatternSchema: z.ZodType<MapPattern> = z.object({
	kind: z.literal("map"),
	get entries() { return z.array(z.object({ key: ExprSchema, value: PatternSchema })); },
});

export const StructPatternSchema: z.ZodType<StructPattern> = z.object({
	kind: z.literal("struct"),
	module: z.string(),
	get fields() { return z.array(z.object({ name: z.string(), value: PatternSchema })); },
});

export const AliasPatternSchema: z.ZodType<AliasPattern> = z.object({
	kind: z.literal("alias"),
	get pattern() { return PatternSchema; },
	name: z.string(),
});

export const BitstringPatternSchema: z.ZodType<BitstringPattern> = z.object({
	kind: z.literal("bitstring"),
	get segments() {
		return z.array(z.object({ pattern: PatternSchema, size: ExprSchema.optional(), type: z.string().optional() }));
	},
});

export const PatternSchema: z.ZodType<Pattern> = z.union([
	BindPatternSchema,
	LiteralPatternSchema,
	TuplePatternSchema,
	ListPatternSchema,
	ConsPatternSchema,
	MapPatternSchema,
	StructPatternSchema,
	PinPatternSchema,
	AliasPatternSchema,
	BitstringPatternSchema,
] satisfies [z.ZodType<Pattern>, z.ZodType<Pattern>, ...z.ZodType<Pattern>[]]).meta({
	id: "Pattern", title: "Pattern", description: "Binding-position pattern",
});

//==============================================================================
// Clauses
//==============================================================================

export const ClauseSchema: z.ZodType<Clause> = z.object({
	get pattern() { return PatternSchema; },
	get guard() { return ExprSchema.optional(); },
	get body() { return ExprSchema; },
});

export const FnClauseSchema: z.ZodType<FnClause> = z.object({
	get params() { return z.array(PatternSchema); },
	get guard() { return ExprSchema.optional(); },
	get body() { return ExprSchema; },
});

export const WithClauseSchema: z.ZodType<WithClause> = z.object({
	get pattern() { return PatternSchema; },
	get value() { return ExprSchema; },
});

export const GeneratorSchema: z.ZodType<Generator> = z.object({
	get pattern() { return PatternSchema; },
	get source() { return ExprSchema; },
});

export const StrPartSchema: z.ZodType<StrPart> = z.union([
	z.object({ kind: z.literal("text"), text: z.string() }),
	z.object({ kind: z.literal("interp"), get expr() { return ExprSchema; } }),
]);

//==============================================================================
// Expressions
//==============================================================================

const exprs = (): z.ZodType<Expr[]> => z.array(ExprSchema);

export const VarExprSchema: z.ZodType<VarExpr> = z.object({ kind: z.literal("var"), name: z.string() });
export const LitExprSchema: z.ZodType<LitExpr> = z.object({ kind: z.literal("lit"), value: LiteralSchema });
export const StrExprSchema: z.ZodType<StrExpr> = z.object({ kind: z.literal("str"), parts: z.array(StrPartSchema) });
export const RawExprSchema: z.ZodType<RawExpr> = z.object({ kind: z.literal("raw"), code: z.string() });

export const BlockExprSchema: z.ZodType<BlockExpr> = z.object({
	kind: z.literal("block"),
	get exprs() { return exprs(); },
});

export const BinaryExprSchema: z.ZodType<BinaryExpr> = z.object({
	kind: z.literal("binary"),
	op: z.string(),
	get left() { return ExprSchema; },
	get right() { return ExprSchema; },
});

export const UnaryExprSchema: z.ZodType<UnaryExpr> = z.object({
	kind: z.literal("unary"),
	op: z.string(),
	get operand() { return ExprSchema; },
});

export const MatchExprSchema: z.ZodType<MatchExpr> = z.object({
	kind: z.literal("match"),
	pattern: PatternSchema,
	get value() { return ExprSchema; },
});

export const IfExprSchema: z.ZodType<IfExpr> = z.object({
	kind: z.literal("if"),
	get cond() { return ExprSchema; },
	get then() { return ExprSchema; },
	get else() { return ExprSchema.optional(); },
});

export const CaseExprSchema: z.ZodType<CaseExpr> = z.object({
	kind: z.literal("case"),
	get subject() { return ExprSchema; },
	clauses: z.array(ClauseSchema),
});

export const WithExprSchema: z.ZodType<WithExpr> = z.object({
	kind: z.literal("with"),
	clauses: z.array(WithClauseSchema),
	get body() { return ExprSchema; },
	else: z.array(ClauseSchema).optional(),
});

export const ReceiveExprSchema: z.ZodType<ReceiveExpr> = z.object({
	kind: z.literal("receive"),
	clauses: z.array(ClauseSchema),
	get after() { return z.object({ timeout: ExprSchema, body: ExprSchema }).optional(); },
});

export const TryExprSchema: z.ZodType<TryExpr> = z.object({
	kind: z.literal("try"),
	get body() { return ExprSchema; },
	rescue: z.array(ClauseSchema),
	catch: z.array(ClauseSchema),
	get after() { return ExprSchema.optional(); },
});

export const ForExprSchema: z.ZodType<ForExpr> = z.object({
	kind: z.literal("for"),
	generators: z.array(GeneratorSchema),
	get filters() { return exprs(); },
	get into() { return ExprSchema.optional(); },
	get body() { return ExprSchema; },
});

export const FnExprSchema: z.ZodType<FnExpr> = z.object({ kind: z.literal("fn"), clauses: z.array(FnClauseSchema) });

export const CallExprSchema: z.ZodType<CallExpr> = z.object({
	kind: z.literal("call"),
	name: z.string(),
	get args() { return exprs(); },
});

export const RemoteCallExprSchema: z.ZodType<RemoteCallExpr> = z.object({
	kind: z.literal("remoteCall"),
	module: z.string(),
	name: z.string(),
	get args() { return exprs(); },
});

export const ApplyExprSchema: z.ZodType<ApplyExpr> = z.object({
	kind: z.literal("apply"),
	get fn() { return ExprSchema; },
	get args() { return exprs(); },
});

export const FieldExprSchema: z.ZodType<FieldExpr> = z.object({
	kind: z.literal("field"),
	get target() { return ExprSchema; },
	field: z.string(),
});

export const IndexExprSchema: z.ZodType<IndexExpr> = z.object({
	kind: z.literal("index"),
	get target() { return ExprSchema; },
	get index() { return ExprSchema; },
});

export const ListExprSchema: z.ZodType<ListExpr> = z.object({ kind: z.literal("list"), get elements() { return exprs(); } });
export const TupleExprSchema: z.ZodType<TupleExpr> = z.object({ kind: z.literal("tuple"), get elements() { return exprs(); } });

export const MapExprSchema: z.ZodType<MapExpr> = z.object({
	kind: z.literal("map"),
	get entries() { return z.array(z.object({ key: ExprSchema, value: ExprSchema })); },
});

export const StructExprSchema: z.ZodType<StructExpr> = z.object({
	kind: z.literal("struct"),
	module: z.string(),
	get fields() { return z.array(z.object({ name: z.string(), value: ExprSchema })); },
});

export const DefExprSchema: z.ZodType<DefExpr> = z.object({
	kind: z.literal("def"),
	name: z.string(),
	private: z.boolean(),
	clauses: z.array(FnClauseSchema),
});

export const ModuleExprSchema: z.ZodType<ModuleExpr> = z.object({
	kind: z.literal("module"),
	name: z.string(),
	get body() { return exprs(); },
});

export const LoopExprSchema: z.ZodType<LoopExpr> = z.object({
	kind: z.literal("loop"),
	loop: SourceLoopSchema,
	known: z.array(KnownBindingSchema),
});

export const ExprSchema: z.ZodType<Expr> = z.union([
	VarExprSchema, LitExprSchema, StrExprSchema, RawExprSchema, BlockExprSchema,
	BinaryExprSchema, UnaryExprSchema, MatchExprSchema,
	IfExprSchema, CaseExprSchema, WithExprSchema, ReceiveExprSchema, TryExprSchema, ForExprSchema,
	FnExprSchema, CallExprSchema, RemoteCallExprSchema, ApplyExprSchema,
	FieldExprSchema, IndexExprSchema,
	ListExprSchema, TupleExprSchema, MapExprSchema, StructExprSchema,
	DefExprSchema, ModuleExprSchema, LoopExprSchema,
] satisfies [z.ZodType<Expr>, z.ZodType<Expr>, ...z.ZodType<Expr>[]]).meta({
	id: "Expr", title: "Expression", description: "Target AST node",
});

//==============================================================================
// Parsing
//==============================================================================

function issuePath(path: readonly PropertyKey[]): string {
	return path.length === 0 ? "<root>" : path.map(String).join(".");
}

/** Validate an untrusted tree. Throws ReforgeError (InvalidAst) on the first issue. */
export function parseAst(input: unknown): Expr {
	const result = ExprSchema.safeParse(input);
	if (result.success) return result.data;
	const [first] = result.error.issues;
	throw ReforgeError.invalidAst(
		first === undefined ? "<root>" : issuePath(first.path),
		first?.message ?? "invalid value",
	);
}

/** Validate an untrusted deferred loop. */
export function parseSourceLoop(input: unknown): SourceLoop {
	const result = SourceLoopSchema.safeParse(input);
	if (result.success) return result.data;
	const [first] = result.error.issues;
	throw ReforgeError.invalidAst(
		first === undefined ? "<root>" : issuePath(first.path),
		first?.message ?? "invalid value",
	);
}

/** JSON Schema (draft-07) for the interchange format. */
export function astJsonSchema(): z.core.JSONSchema.BaseSchema {
	return z.toJSONSchema(ExprSchema, { target: "draft-07" });
}
