// SPDX-License-Identifier: MIT
// Reforge Loop-Pattern Analyzer
// Recognises what an imperative loop means. Each detector looks at the loop
// independently; the caller keeps the detection with the highest confidence,
// and equal confidence goes to the detector declared first.

import { exprReads, stmtsReads, stmtsWrites } from "./source-usage.ts";
import { isSourceLoop, sconst } from "./source.ts";
import type {
	SourceExpr,
	SourceIdent,
	SourceIf,
	SourceLoop,
	SourceStmt,
	SourceWhile,
} from "./source.ts";
import {
	NO_FACTS,
	type Iteration,
	type LoopDetection,
	type LoopFacts,
	type RangeSource,
} from "./intent.ts";

export interface LoopDetector {
	name: string;
	detect(loop: SourceLoop, facts: LoopFacts): LoopDetection | null;
}

//==============================================================================
// Body Queries
//==============================================================================

/** Does `stmts` contain the given jump outside any nested loop? */
export function containsJump(stmts: readonly SourceStmt[], kind: "break" | "continue" | "return"): boolean {
	return stmts.some((stmt) => {
		if (stmt.kind === kind) return true;
		if (stmt.kind === "if") {
			return containsJump(stmt.then, kind) || containsJump(stmt.else ?? [], kind);
		}
		// `return` leaves the enclosing function from any depth
		if (kind === "return" && isSourceLoop(stmt)) return containsJump(stmt.body, kind);
		return false;
	});
}

function knownValue(facts: LoopFacts, name: string): SourceExpr | undefined {
	return facts.known.find((b) => b.name === name)?.value;
}

function isIdent(expr: SourceExpr, name: string): boolean {
	return expr.kind === "ident" && expr.name === name;
}

/** Integer value of a constant expression */
export function intConst(expr: SourceExpr): number | undefined {
	if (expr.kind === "const" && typeof expr.value === "number" && Number.isInteger(expr.value)) {
		return expr.value;
	}
	return undefined;
}

/**
 * Signed step of a statement that advances `index`, or undefined when the
 * statement is not a plain constant increment of it.
 */
export function incrementStep(stmt: SourceStmt, index: string): number | undefined {
	switch (stmt.kind) {
	case "increment":
		return stmt.target === index ? stmt.delta : undefined;
	case "compoundAssign": {
		if (stmt.target !== index) return undefined;
		const k = intConst(stmt.value);
		if (k === undefined) return undefined;
		if (stmt.op === "+") return k;
		if (stmt.op === "-") return -k;
		return undefined;
	}
	case "assign": {
		if (stmt.target !== index || stmt.value.kind !== "binop") return undefined;
		const { op, left, right } = stmt.value;
		if (op === "+" && isIdent(left, index)) return intConst(right);
		if (op === "+" && isIdent(right, index)) return intConst(left);
		if (op === "-" && isIdent(left, index)) {
			const k = intConst(right);
			return k === undefined ? undefined : -k;
		}
		return undefined;
	}
	default:
		return undefined;
	}
}

/**
 * Locate the single top-level increment of `index`. It must be the only write
 * to the index in the body and nothing after it may read the index.
 */
function findIncrement(body: readonly SourceStmt[], index: string): { at: number; step: number } | null {
	let found: { at: number; step: number } | null = null;
	for (let i = 0; i < body.length; i++) {
		const stmt = body[i];
		if (stmt === undefined) continue;
		const step = incrementStep(stmt, index);
		if (step !== undefined && step !== 0) {
			if (found !== null) return null;
			found = { at: i, step };
		} else if (stmtsWrites([stmt]).has(index)) {
			return null;
		}
	}
	if (found === null) return null;
	if (stmtsReads(body.slice(found.at + 1)).has(index)) return null;
	return found;
}

function without(body: readonly SourceStmt[], ...positions: number[]): SourceStmt[] {
	return body.filter((_, i) => !positions.includes(i));
}

function overlaps(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
	for (const name of a) if (b.has(name)) return true;
	return false;
}

//==============================================================================
// Iteration Recognition
//==============================================================================

/** `while (i < end) { ...; i += k }` read as a counted range. */
function counterWhile(loop: SourceWhile, facts: LoopFacts): Iteration | null {
	if (loop.doWhile || loop.cond.kind !== "binop") return null;
	const { op, left, right } = loop.cond;
	if (left.kind !== "ident") return null;
	const index = left.name;
	const boundReads = exprReads(right);
	if (boundReads.has(index) || facts.liveAfter.has(index)) return null;
	// a bound the body moves is re-read every iteration
	if (overlaps(stmtsWrites(loop.body), boundReads)) return null;
	if (containsJump(loop.body, "continue")) return null;

	const inc = findIncrement(loop.body, index);
	if (inc === null) return null;
	const ascending = op === "<" || op === "<=";
	const descending = op === ">" || op === ">=";
	if (!(ascending && inc.step > 0) && !(descending && inc.step < 0)) return null;

	return {
		variable: index,
		source: {
			kind: "range",
			start: knownValue(facts, index) ?? sconst(0),
			end: right,
			inclusive: op === "<=" || op === ">=",
			step: inc.step,
		},
		body: without(loop.body, inc.at),
	};
}

/** `while (_g < coll.length) { x = coll[_g]; _g++; ... }` read as a collection loop. */
function desugaredCollectionWhile(loop: SourceWhile, facts: LoopFacts): Iteration | null {
	if (loop.doWhile || loop.cond.kind !== "binop" || loop.cond.op !== "<") return null;
	const { left, right } = loop.cond;
	if (left.kind !== "ident" || right.kind !== "field" || right.field !== "length") return null;
	if (right.target.kind !== "ident") return null;
	const counter = left.name;
	const holder = right.target.name;
	if (facts.liveAfter.has(counter) || containsJump(loop.body, "continue")) return null;
	const start = knownValue(facts, counter);
	if (start !== undefined && intConst(start) !== 0) return null;
	if (stmtsWrites(loop.body).has(holder)) return null;

	const first = loop.body[0];
	if (first === undefined || first.kind !== "varDecl" || first.init === undefined) return null;
	const element = first.init;
	const variable = first.name;
	if (element.kind !== "index" || !isIdent(element.target, holder) || !isIdent(element.index, counter)) {
		return null;
	}

	const rest = loop.body.slice(1);
	const inc = findIncrement(rest, counter);
	if (inc === null || inc.step !== 1) return null;
	const body = without(rest, inc.at);
	if (stmtsReads(body).has(counter)) return null;

	return {
		variable,
		source: { kind: "collection", collection: knownValue(facts, holder) ?? right.target },
		body,
	};
}

/** Reduce any recognised loop to "for variable in source do body". */
export function recognizeIteration(loop: SourceLoop, facts: LoopFacts = NO_FACTS): Iteration | null {
	switch (loop.kind) {
	case "forRange":
		if (loop.step === 0) return null;
		return {
			variable: loop.variable,
			source: {
				kind: "range",
				start: loop.start,
				end: loop.end,
				inclusive: loop.inclusive,
				step: loop.step ?? 1,
			},
			body: loop.body,
		};
	case "forEach":
		return {
			variable: loop.variable,
			source: { kind: "collection", collection: loop.collection },
			body: loop.body,
		};
	case "while":
		return desugaredCollectionWhile(loop, facts) ?? counterWhile(loop, facts);
	}
}

//==============================================================================
// Detectors
//==============================================================================

function isEmptyArray(expr: SourceExpr | undefined): boolean {
	return expr?.kind === "arrayLit" && expr.elements.length === 0;
}

/** Nested `if (a) { if (b) { stmt } }` with no else branches: filters plus inner statement. */
function guardedStatement(stmt: SourceIf): { filters: SourceExpr[]; inner: SourceStmt } | null {
	const filters: SourceExpr[] = [];
	let current: SourceStmt = stmt;
	while (current.kind === "if") {
		if (current.else !== undefined && current.else.length > 0) return null;
		const only: SourceStmt | undefined = current.then[0];
		if (current.then.length !== 1 || only === undefined) return null;
		filters.push(current.cond);
		current = only;
	}
	return { filters, inner: current };
}

export const accumulationDetector: LoopDetector = {
	name: "accumulation",
	detect(loop, facts) {
		const iteration = recognizeIteration(loop, facts);
		if (iteration === null || iteration.body.length !== 1) return null;
		const [stmt] = iteration.body;
		if (stmt === undefined) return null;
		const { variable, source } = iteration;

		if (stmt.kind === "push" || stmt.kind === "if") {
			const guarded = stmt.kind === "if" ? guardedStatement(stmt) : { filters: [], inner: stmt };
			if (guarded === null) return null;
			const { filters, inner } = guarded;
			if (inner.kind !== "push") return null;
			const result = inner.target;
			if (result === variable) return null;
			if (exprReads(inner.value).has(result) || filters.some((f) => exprReads(f).has(result))) {
				return null;
			}
			const resultKnownEmpty = isEmptyArray(knownValue(facts, result));
			const [onlyFilter] = filters;
			if (filters.length === 0) {
				return {
					intent: { kind: "map", variable, source, result, resultKnownEmpty, transform: inner.value },
					confidence: 0.95,
					detector: "accumulation",
				};
			}
			if (filters.length === 1 && onlyFilter !== undefined && isIdent(inner.value, variable)) {
				return {
					intent: { kind: "filter", variable, source, result, resultKnownEmpty, predicate: onlyFilter },
					confidence: 0.95,
					detector: "accumulation",
				};
			}
			return {
				intent: { kind: "comprehension", variable, source, result, resultKnownEmpty, filters, yield: inner.value },
				confidence: 0.95,
				detector: "accumulation",
			};
		}

		if (stmt.kind === "compoundAssign") {
			if (stmt.target === variable || exprReads(stmt.value).has(stmt.target)) return null;
			return {
				intent: {
					kind: "reduce",
					variable,
					source,
					accumulator: stmt.target,
					update: { kind: "binop", op: stmt.op, left: { kind: "ident", name: stmt.target }, right: stmt.value },
				},
				confidence: 0.9,
				detector: "accumulation",
			};
		}

		if (stmt.kind === "assign") {
			// `acc = f(acc, x)`: the new value must depend on the old one
			if (stmt.target === variable || !exprReads(stmt.value).has(stmt.target)) return null;
			return {
				intent: { kind: "reduce", variable, source, accumulator: stmt.target, update: stmt.value },
				confidence: 0.9,
				detector: "accumulation",
			};
		}
		return null;
	},
};

function lengthOf(expr: SourceExpr): SourceIdent | undefined {
	return expr.kind === "field" && expr.field === "length" && expr.target.kind === "ident" ? expr.target : undefined;
}

/** The collection a range walks index by index from 0 to its last element. */
function wholeIndexRange(source: RangeSource): SourceIdent | undefined {
	if (source.step !== 1 || intConst(source.start) !== 0) return undefined;
	if (!source.inclusive) return lengthOf(source.end);
	const { end } = source;
	if (end.kind === "binop" && end.op === "-" && intConst(end.right) === 1) return lengthOf(end.left);
	return undefined;
}

/** `for i in 0...arr.length { var x = arr[i]; ... }`: element and index together. */
export const indexedDetector: LoopDetector = {
	name: "indexed",
	detect(loop, facts) {
		const iteration = recognizeIteration(loop, facts);
		if (iteration === null || iteration.source.kind !== "range") return null;
		const holder = wholeIndexRange(iteration.source);
		const [first, ...rest] = iteration.body;
		if (holder === undefined || first?.kind !== "varDecl" || first.init === undefined) return null;
		const index = iteration.variable;
		const element = first.init;
		if (element.kind !== "index" || !isIdent(element.target, holder.name) || !isIdent(element.index, index)) {
			return null;
		}
		const writes = stmtsWrites(rest, new Set([first.name]));
		if (writes.has(holder.name) || writes.has(index)) return null;
		return {
			intent: {
				kind: "indexed",
				variable: first.name,
				index,
				collection: knownValue(facts, holder.name) ?? holder,
				body: rest,
			},
			confidence: 0.9,
			detector: "indexed",
		};
	},
};

export const rangeDetector: LoopDetector = {
	name: "range",
	detect(loop, facts) {
		const iteration = recognizeIteration(loop, facts);
		if (iteration === null || iteration.source.kind !== "range") return null;
		const { start, end, inclusive, step } = iteration.source;
		return {
			intent: { kind: "range", variable: iteration.variable, start, end, step, inclusive, body: iteration.body },
			confidence: 0.9,
			detector: "range",
		};
	},
};

export const collectionDetector: LoopDetector = {
	name: "collection",
	detect(loop, facts) {
		const iteration = recognizeIteration(loop, facts);
		if (iteration === null || iteration.source.kind !== "collection") return null;
		return {
			intent: {
				kind: "each",
				variable: iteration.variable,
				collection: iteration.source.collection,
				body: iteration.body,
			},
			confidence: 0.85,
			detector: "collection",
		};
	},
};

export const whileDetector: LoopDetector = {
	name: "while",
	detect(loop) {
		if (loop.kind !== "while") return null;
		return {
			intent: { kind: loop.doWhile ? "doWhile" : "while", cond: loop.cond, body: loop.body },
			confidence: 0.4,
			detector: "while",
		};
	},
};

export const DEFAULT_DETECTORS: readonly LoopDetector[] = [
	accumulationDetector,
	indexedDetector,
	rangeDetector,
	collectionDetector,
	whileDetector,
];

//==============================================================================
// Analysis Entry Points
//==============================================================================

/** Every detection, in detector declaration order. */
export function detectAll(
	loop: SourceLoop,
	facts: LoopFacts = NO_FACTS,
	detectors: readonly LoopDetector[] = DEFAULT_DETECTORS,
): LoopDetection[] {
	const out: LoopDetection[] = [];
	for (const detector of detectors) {
		const detection = detector.detect(loop, facts);
		if (detection !== null) out.push(detection);
	}
	return out;
}

/**
 * The winning detection for a loop, or null when no detector fires.
 * Strictly greater confidence is required to displace an earlier detector.
 */
export function analyzeLoop(
	loop: SourceLoop,
	facts: LoopFacts = NO_FACTS,
	detectors: readonly LoopDetector[] = DEFAULT_DETECTORS,
): LoopDetection | null {
	let best: LoopDetection | null = null;
	for (const detection of detectAll(loop, facts, detectors)) {
		if (best === null || detection.confidence > best.confidence) best = detection;
	}
	return best;
}
