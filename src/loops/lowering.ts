// SPDX-License-Identifier: MIT
// Reforge Loop-Intent Lowering
// Turns a recognised loop intent into one functional subtree. Variables the
// body assigns are threaded explicitly: through the fold accumulator for
// each/range loops and through the state tuple of the recursive closure for
// while loops.

import {
	apply,
	atom,
	binary,
	block,
	fn,
	forExpr,
	ifExpr,
	intLit,
	list,
	match,
	nilLit,
	pbind,
	ptuple,
	remoteCall,
	sequence,
	tuple,
	varRef,
} from "../ast/builders.ts";
import type { Expr, Pattern } from "../ast/types.ts";
import { freshName } from "../analysis/closure.ts";
import { ErrorCodes, ReforgeError, exhaustive } from "../errors.ts";
import { analyzeLoop, containsJump, intConst } from "./analyzer.ts";
import type { ExprBuilder } from "./builder.ts";
import {
	NO_FACTS,
	type DoWhileIntent,
	type IndexedIntent,
	type IterSource,
	type LoopFacts,
	type LoopIntent,
	type RangeSource,
	type WhileIntent,
} from "./intent.ts";
import { hasLoopJump, signalize, type SignalKit, type StatementTranslator } from "./signals.ts";
import { exprReads, stmtsReads, stmtsWrites } from "./source-usage.ts";
import type { SourceExpr, SourceIf, SourceLoop, SourceStmt } from "./source.ts";

//==============================================================================
// Carried State
//==============================================================================

function stateExpr(names: readonly string[]): Expr {
	const [only] = names;
	if (names.length === 1 && only !== undefined) return varRef(only);
	return tuple(names.map(varRef));
}

function statePattern(names: readonly string[]): Pattern {
	const [only] = names;
	if (names.length === 1 && only !== undefined) return pbind(only);
	return ptuple(names.map(pbind));
}

function seq(exprs: Expr[]): Expr {
	return exprs.length === 0 ? nilLit() : sequence(exprs);
}

//==============================================================================
// Statement Translation
//==============================================================================

class Translator implements StatementTranslator {
	constructor(
		private readonly build: ExprBuilder,
		/** Names a nested loop must leave intact */
		private readonly live: ReadonlySet<string>,
	) {}

	expr(expr: SourceExpr): Expr {
		return this.build(expr);
	}

	stmts(stmts: readonly SourceStmt[]): Expr[] {
		return stmts.flatMap((stmt) => this.stmt(stmt));
	}

	private stmt(stmt: SourceStmt): Expr[] {
		switch (stmt.kind) {
		case "varDecl":
			return [match(pbind(stmt.name), stmt.init === undefined ? nilLit() : this.build(stmt.init))];
		case "assign":
			return [match(pbind(stmt.target), this.build(stmt.value))];
		case "compoundAssign":
			return [match(pbind(stmt.target), binary(stmt.op, varRef(stmt.target), this.build(stmt.value)))];
		case "increment":
			return [match(pbind(stmt.target), binary(stmt.delta > 0 ? "+" : "-", varRef(stmt.target), intLit(1)))];
		case "push":
			return [match(pbind(stmt.target), binary("++", varRef(stmt.target), list([this.build(stmt.value)])))];
		case "if":
			return [this.ifStmt(stmt)];
		case "exprStmt":
			return [this.build(stmt.expr)];
		case "break":
		case "continue":
		case "return":
			throw ReforgeError.unsupportedLoop(stmt.kind + " in an unsupported position");
		case "forRange":
		case "forEach":
		case "while":
			return [this.nestedLoop(stmt)];
		default:
			return exhaustive(stmt);
		}
	}

	/** An `if` that assigns outer variables rebinds them from its result. */
	private ifStmt(stmt: SourceIf): Expr {
		const cond = this.build(stmt.cond);
		const thenExprs = this.stmts(stmt.then);
		const elseExprs = this.stmts(stmt.else ?? []);
		const written = [...stmtsWrites([stmt])];
		if (written.length === 0) {
			return elseExprs.length === 0
				? ifExpr(cond, seq(thenExprs))
				: ifExpr(cond, seq(thenExprs), seq(elseExprs));
		}
		return match(
			statePattern(written),
			ifExpr(cond, sequence([...thenExprs, stateExpr(written)]), sequence([...elseExprs, stateExpr(written)])),
		);
	}

	private nestedLoop(loop: SourceLoop): Expr {
		const lowered = lowerLoop(loop, this.build, { known: [], liveAfter: this.live });
		if (lowered === null) throw ReforgeError.unsupportedLoop("nested loop could not be lowered");
		return lowered;
	}
}

function translatorFor(build: ExprBuilder, facts: LoopFacts, body: readonly SourceStmt[]): Translator {
	return new Translator(build, new Set([...facts.liveAfter, ...stmtsReads([...body])]));
}

//==============================================================================
// Sources
//==============================================================================

/**
 * `first..last`, with `//step` whenever the plain range could run the wrong
 * way: non-unit steps, and bounds not known to be ascending.
 */
export function rangeExpr(src: RangeSource, build: ExprBuilder): Expr {
	const sign = src.step > 0 ? 1 : -1;
	const startInt = intConst(src.start);
	const endInt = intConst(src.end);
	let last: Expr;
	let lastInt: number | undefined;
	if (src.inclusive) {
		last = build(src.end);
		lastInt = endInt;
	} else if (endInt !== undefined) {
		lastInt = endInt - sign;
		last = intLit(lastInt);
	} else {
		last = binary(sign > 0 ? "-" : "+", build(src.end), intLit(1));
	}
	const plain = binary("..", build(src.start), last);
	if (src.step === 1 && startInt !== undefined && lastInt !== undefined && lastInt >= startInt) {
		return plain;
	}
	return binary("//", plain, intLit(src.step));
}

export function sourceExpr(src: IterSource, build: ExprBuilder): Expr {
	return src.kind === "range" ? rangeExpr(src, build) : build(src.collection);
}

//==============================================================================
// Intent Lowering
//==============================================================================

/** Per-iteration binding of an each/range/indexed loop. */
interface IterationBinder {
	pattern: Pattern;
	names: readonly string[];
}

const bindOne = (name: string): IterationBinder => ({ pattern: pbind(name), names: [name] });

/** each/range: `Enum.each`, `Enum.reduce` when state is carried, `Enum.reduce_while` on early exit. */
function lowerIteration(
	binder: IterationBinder,
	source: Expr,
	body: readonly SourceStmt[],
	build: ExprBuilder,
	facts: LoopFacts,
): Expr {
	if (containsJump(body, "return")) throw ReforgeError.unsupportedLoop("return inside a loop body");
	const t = translatorFor(build, facts, body);
	const carried = [...stmtsWrites([...body], new Set(binder.names))];

	if (!hasLoopJump(body)) {
		const exprs = t.stmts(body);
		if (carried.length === 0) {
			return remoteCall("Enum", "each", [source, fn([binder.pattern], seq(exprs))]);
		}
		const fold = remoteCall("Enum", "reduce", [
			source,
			stateExpr(carried),
			fn([binder.pattern, statePattern(carried)], sequence([...exprs, stateExpr(carried)])),
		]);
		return match(statePattern(carried), fold);
	}

	const acc = (): Expr => (carried.length === 0 ? atom("ok") : stateExpr(carried));
	const kit: SignalKit = {
		cont: () => tuple([atom("cont"), acc()]),
		halt: () => tuple([atom("halt"), acc()]),
	};
	const accPattern = carried.length === 0 ? pbind("_acc") : statePattern(carried);
	const fold = remoteCall("Enum", "reduce_while", [
		source,
		acc(),
		fn([binder.pattern, accPattern], sequence(signalize(body, t, kit))),
	]);
	return carried.length === 0 ? fold : match(statePattern(carried), fold);
}

function loopNames(intent: WhileIntent | DoWhileIntent, facts: LoopFacts): Set<string> {
	return new Set([
		...exprReads(intent.cond),
		...stmtsReads(intent.body),
		...stmtsWrites(intent.body),
		...facts.liveAfter,
		...facts.known.map((b) => b.name),
	]);
}

/**
 * while/doWhile: a closure that receives itself (and the carried state) and
 * recurses while the condition holds.
 *
 *   loop_fn = fn loop_fn, {a, b} -> if cond do ...; loop_fn.(loop_fn, {a, b}) else {a, b} end end
 *   {a, b} = loop_fn.(loop_fn, {a, b})
 */
function lowerWhile(intent: WhileIntent | DoWhileIntent, build: ExprBuilder, facts: LoopFacts): Expr {
	if (containsJump(intent.body, "return")) throw ReforgeError.unsupportedLoop("return inside a loop body");
	const t = translatorFor(build, facts, intent.body);
	const carried = [...stmtsWrites(intent.body)];
	const name = freshName("loop_fn", loopNames(intent, facts));
	const self = varRef(name);

	const recurse = (): Expr => apply(self, carried.length === 0 ? [self] : [self, stateExpr(carried)]);
	const done = (): Expr => (carried.length === 0 ? nilLit() : stateExpr(carried));
	const cond = build(intent.cond);

	let body: Expr;
	if (intent.kind === "while") {
		body = ifExpr(cond, sequence(signalize(intent.body, t, { cont: recurse, halt: done })), done());
	} else {
		const again = (): Expr => ifExpr(build(intent.cond), recurse(), done());
		body = sequence(signalize(intent.body, t, { cont: again, halt: done }));
	}

	const params = carried.length === 0 ? [pbind(name)] : [pbind(name), statePattern(carried)];
	const closure = match(pbind(name), fn(params, body));
	const invoke = recurse();
	return block([closure, carried.length === 0 ? invoke : match(statePattern(carried), invoke)]);
}

/** `Enum.with_index` when the body reads the position, the bare collection otherwise. */
function lowerIndexed(intent: IndexedIntent, build: ExprBuilder, facts: LoopFacts): Expr {
	const { variable, index, body } = intent;
	const collection = build(intent.collection);
	if (!stmtsReads(body, new Set([variable])).has(index)) {
		return lowerIteration(bindOne(variable), collection, body, build, facts);
	}
	const binder: IterationBinder = { pattern: ptuple([pbind(variable), pbind(index)]), names: [variable, index] };
	return lowerIteration(binder, remoteCall("Enum", "with_index", [collection]), body, build, facts);
}

function collect(result: string, knownEmpty: boolean, produced: Expr): Expr {
	return match(pbind(result), knownEmpty ? produced : binary("++", varRef(result), produced));
}

/**
 * Lower one intent. Throws a ReforgeError with code UnsupportedLoop when the
 * body contains control flow the target shapes cannot express.
 */
export function lowerIntent(intent: LoopIntent, build: ExprBuilder, facts: LoopFacts = NO_FACTS): Expr {
	switch (intent.kind) {
	case "range": {
		const { start, end, step, inclusive } = intent;
		const source = rangeExpr({ kind: "range", start, end, step, inclusive }, build);
		return lowerIteration(bindOne(intent.variable), source, intent.body, build, facts);
	}
	case "each":
		return lowerIteration(bindOne(intent.variable), build(intent.collection), intent.body, build, facts);
	case "indexed":
		return lowerIndexed(intent, build, facts);
	case "map":
		return collect(intent.result, intent.resultKnownEmpty, remoteCall("Enum", "map", [
			sourceExpr(intent.source, build),
			fn([pbind(intent.variable)], build(intent.transform)),
		]));
	case "filter":
		return collect(intent.result, intent.resultKnownEmpty, remoteCall("Enum", "filter", [
			sourceExpr(intent.source, build),
			fn([pbind(intent.variable)], build(intent.predicate)),
		]));
	case "comprehension":
		return collect(intent.result, intent.resultKnownEmpty, forExpr(
			[{ pattern: pbind(intent.variable), source: sourceExpr(intent.source, build) }],
			intent.filters.map(build),
			build(intent.yield),
		));
	case "reduce":
		return match(pbind(intent.accumulator), remoteCall("Enum", "reduce", [
			sourceExpr(intent.source, build),
			varRef(intent.accumulator),
			fn([pbind(intent.variable), pbind(intent.accumulator)], build(intent.update)),
		]));
	case "while":
	case "doWhile":
		return lowerWhile(intent, build, facts);
	default:
		return exhaustive(intent);
	}
}

/** Like lowerIntent, but answers null for loops it cannot express. */
export function tryLowerIntent(intent: LoopIntent, build: ExprBuilder, facts: LoopFacts = NO_FACTS): Expr | null {
	try {
		return lowerIntent(intent, build, facts);
	} catch (e) {
		if (e instanceof ReforgeError && e.code === ErrorCodes.UnsupportedLoop) return null;
		throw e;
	}
}

/** Analyse and lower; null when no detector fires or the winner cannot be lowered. */
export function lowerLoop(loop: SourceLoop, build: ExprBuilder, facts: LoopFacts = NO_FACTS): Expr | null {
	const detection = analyzeLoop(loop, facts);
	return detection === null ? null : tryLowerIntent(detection.intent, build, facts);
}
