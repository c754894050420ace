// SPDX-License-Identifier: MIT
// Reforge Variable-Usage Analyzer
// "Is this name read inside this node?" Built on the scope walk, so binders
// are excluded, pins count as uses and inner shadowing hides inner reads from
// queries about an outer variable of the same name.

import { fuzzyKey } from "../ast/names.ts";
import type { Expr } from "../ast/types.ts";
import { referencedNames } from "./scope-walk.ts";

export type MatchMode = "exact" | "fuzzy";

/** Every name referenced in `node`, verbatim. */
export function usedNames(node: Expr | null | undefined): Set<string> {
	if (node === null || node === undefined) return new Set();
	return referencedNames(node);
}

/** Fuzzy keys of every name referenced in `node`. */
export function usedNameKeys(node: Expr | null | undefined): Set<string> {
	const keys = new Set<string>();
	for (const name of usedNames(node)) keys.add(fuzzyKey(name));
	return keys;
}

/**
 * Exact query: `name` must appear verbatim. Distinguishes `x` from `_x`.
 * Absent node or name is "not used".
 */
export function isUsedExact(node: Expr | null | undefined, name: string | null | undefined): boolean {
	if (name === null || name === undefined || name === "") return false;
	return usedNames(node).has(name);
}

/**
 * Fuzzy query: also matches the snake_case/camelCase spellings of `name`
 * and its forms with or without a leading hygiene underscore.
 */
export function isUsedFuzzy(node: Expr | null | undefined, name: string | null | undefined): boolean {
	if (name === null || name === undefined || name === "") return false;
	return usedNameKeys(node).has(fuzzyKey(name));
}

export function isUsed(
	node: Expr | null | undefined,
	name: string | null | undefined,
	mode: MatchMode = "fuzzy",
): boolean {
	return mode === "exact" ? isUsedExact(node, name) : isUsedFuzzy(node, name);
}

/** True when any node in `nodes` uses `name`. */
export function isUsedInAny(nodes: readonly Expr[], name: string, mode: MatchMode = "fuzzy"): boolean {
	return nodes.some((node) => isUsed(node, name, mode));
}
