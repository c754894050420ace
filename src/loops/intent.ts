// SPDX-License-Identifier: MIT
// Reforge Loop Intents
// What a loop means, independent of how the front end desugared it. Intents
// always carry the user's variable name, never a synthetic counter.

import type { KnownBinding, SourceExpr, SourceStmt } from "./source.ts";

//==============================================================================
// Iteration Sources
//==============================================================================

export interface RangeSource {
	kind: "range";
	start: SourceExpr;
	end: SourceExpr;
	inclusive: boolean;
	/** Signed, never zero */
	step: number;
}

export interface CollectionSource {
	kind: "collection";
	collection: SourceExpr;
}

export type IterSource = RangeSource | CollectionSource;

/** A loop reduced to "for `variable` in `source` do `body`". */
export interface Iteration {
	variable: string;
	source: IterSource;
	body: SourceStmt[];
}

//==============================================================================
// Intents
//==============================================================================

export interface RangeIntent {
	kind: "range";
	variable: string;
	start: SourceExpr;
	end: SourceExpr;
	step: number;
	inclusive: boolean;
	body: SourceStmt[];
}

export interface EachIntent {
	kind: "each";
	variable: string;
	collection: SourceExpr;
	body: SourceStmt[];
}

/** Whole-collection walk that reads both the element and its position. */
export interface IndexedIntent {
	kind: "indexed";
	/** Element binding */
	variable: string;
	index: string;
	collection: SourceExpr;
	body: SourceStmt[];
}

interface CollectingIntent {
	variable: string;
	source: IterSource;
	/** Collection the loop appends to */
	result: string;
	/** The result was `[]` on entry, so the output replaces it */
	resultKnownEmpty: boolean;
}

export interface MapIntent extends CollectingIntent {
	kind: "map";
	transform: SourceExpr;
}

export interface FilterIntent extends CollectingIntent {
	kind: "filter";
	predicate: SourceExpr;
}

/** Guarded transform: generator, filters, yielded expression. */
export interface ComprehensionIntent extends CollectingIntent {
	kind: "comprehension";
	filters: SourceExpr[];
	yield: SourceExpr;
}

export interface ReduceIntent {
	kind: "reduce";
	variable: string;
	source: IterSource;
	accumulator: string;
	/** New accumulator value, in terms of the accumulator and the element */
	update: SourceExpr;
}

export interface WhileIntent {
	kind: "while";
	cond: SourceExpr;
	body: SourceStmt[];
}

export interface DoWhileIntent {
	kind: "doWhile";
	cond: SourceExpr;
	body: SourceStmt[];
}

export type LoopIntent =
	| RangeIntent | EachIntent | IndexedIntent
	| MapIntent | FilterIntent | ComprehensionIntent | ReduceIntent
	| WhileIntent | DoWhileIntent;

export type LoopIntentKind = LoopIntent["kind"];

//==============================================================================
// Detection
//==============================================================================

export interface LoopDetection {
	intent: LoopIntent;
	/**
	 * Coarse preference score used to pick between detectors that fire on
	 * the same loop. Not a probability.
	 */
	confidence: number;
	/** Name of the detector that produced the intent */
	detector: string;
}

/** Facts about the code around a loop. */
export interface LoopFacts {
	/** Values known at loop entry */
	known: readonly KnownBinding[];
	/** Names that may be read after the loop; the loop must leave them intact */
	liveAfter: ReadonlySet<string>;
}

export const NO_FACTS: LoopFacts = { known: [], liveAfter: new Set() };
