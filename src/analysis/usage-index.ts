// SPDX-License-Identifier: MIT
// Reforge Usage-Suffix Index
// Answers "is `name` referenced at or after position i of this statement
// list" in O(1) after a single backward pass. Conceptually suffix[i] is the
// union of names referenced by stmts[i..]; the index stores, per name, the
// last position that references it, which encodes the same sets:
//   name ∈ suffix[i]  ⇔  last[name] ≥ i
// The index is a snapshot. Rebuild it after the statement list changes.

import { fuzzyKey } from "../ast/names.ts";
import type { Expr } from "../ast/types.ts";
import { usedNames, type MatchMode } from "./usage.ts";

export interface UsageIndex {
	readonly mode: MatchMode;
	readonly length: number;
	/** Last statement position referencing each (possibly fuzzy-keyed) name. */
	readonly lastUse: ReadonlyMap<string, number>;
}

function keyFor(mode: MatchMode, name: string): string {
	return mode === "exact" ? name : fuzzyKey(name);
}

function build(stmts: readonly Expr[], mode: MatchMode): UsageIndex {
	const lastUse = new Map<string, number>();
	for (let i = stmts.length - 1; i >= 0; i--) {
		const stmt = stmts[i];
		if (stmt === undefined) continue;
		for (const name of usedNames(stmt)) {
			const key = keyFor(mode, name);
			if (!lastUse.has(key)) lastUse.set(key, i);
		}
	}
	return { mode, length: stmts.length, lastUse };
}

/** Fuzzy index: case-style and hygiene variants share an entry. */
export function buildUsageIndex(stmts: readonly Expr[]): UsageIndex {
	return build(stmts, "fuzzy");
}

/** Exact index: `x` and `_x` are different names. */
export function buildExactUsageIndex(stmts: readonly Expr[]): UsageIndex {
	return build(stmts, "exact");
}

/**
 * Is `name` referenced by some statement at position `startIdx` or later?
 * Positions at or past the end answer false; negative positions clamp to 0.
 */
export function usedLater(index: UsageIndex, startIdx: number, name: string): boolean {
	if (name === "" || startIdx >= index.length) return false;
	const last = index.lastUse.get(keyFor(index.mode, name));
	return last !== undefined && last >= Math.max(0, startIdx);
}

/** Materialise suffix[i]: every name used at position i or later. */
export function suffixAt(index: UsageIndex, i: number): Set<string> {
	const out = new Set<string>();
	if (i >= index.length) return out;
	for (const [name, last] of index.lastUse) {
		if (last >= Math.max(0, i)) out.add(name);
	}
	return out;
}
