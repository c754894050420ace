// SPDX-License-Identifier: MIT
// Reforge Pattern Analysis
// What a pattern binds, and what it uses. Pins, bitstring segment sizes and
// map-pattern keys read existing bindings; everything else binds.

import { isWildcard } from "../ast/names.ts";
import { mapPattern } from "../ast/traverse.ts";
import { exhaustive } from "../errors.ts";
import type { Expr, Pattern } from "../ast/types.ts";

/** Names bound by a pattern, in order, without wildcards or repeats. */
export function patternBinders(pattern: Pattern): string[] {
	const out: string[] = [];
	collectBinders(pattern, out);
	return out.filter((name, i) => out.indexOf(name) === i);
}

function collectBinders(pattern: Pattern, out: string[]): void {
	switch (pattern.kind) {
	case "bind":
		if (!isWildcard(pattern.name)) out.push(pattern.name);
		return;
	case "literal":
	case "pin":
		return;
	case "tuple":
	case "list":
		for (const p of pattern.elements) collectBinders(p, out);
		return;
	case "cons":
		for (const p of pattern.head) collectBinders(p, out);
		collectBinders(pattern.tail, out);
		return;
	case "map":
		for (const e of pattern.entries) collectBinders(e.value, out);
		return;
	case "struct":
		for (const f of pattern.fields) collectBinders(f.value, out);
		return;
	case "alias":
		collectBinders(pattern.pattern, out);
		if (!isWildcard(pattern.name)) out.push(pattern.name);
		return;
	case "bitstring":
		for (const s of pattern.segments) collectBinders(s.pattern, out);
		return;
	default:
		exhaustive(pattern);
	}
}

/** Names a pattern reads through pins. */
export function pinnedNames(pattern: Pattern): string[] {
	const out: string[] = [];
	forEachPatternPart(pattern, (p) => {
		if (p.kind === "pin") out.push(p.name);
	}, () => undefined);
	return out;
}

/** Expressions embedded in a pattern: map keys and bitstring sizes. */
export function patternExprs(pattern: Pattern): Expr[] {
	const out: Expr[] = [];
	forEachPatternPart(pattern, () => undefined, (e) => out.push(e));
	return out;
}

function forEachPatternPart(
	pattern: Pattern,
	onPattern: (p: Pattern) => void,
	onExpr: (e: Expr) => void,
): void {
	onPattern(pattern);
	const recur = (p: Pattern): void => {
		forEachPatternPart(p, onPattern, onExpr);
	};
	switch (pattern.kind) {
	case "bind":
	case "literal":
	case "pin":
		return;
	case "tuple":
	case "list":
		pattern.elements.forEach(recur);
		return;
	case "cons":
		pattern.head.forEach(recur);
		recur(pattern.tail);
		return;
	case "map":
		for (const e of pattern.entries) {
			onExpr(e.key);
			recur(e.value);
		}
		return;
	case "struct":
		for (const f of pattern.fields) recur(f.value);
		return;
	case "alias":
		recur(pattern.pattern);
		return;
	case "bitstring":
		for (const s of pattern.segments) {
			if (s.size !== undefined) onExpr(s.size);
			recur(s.pattern);
		}
		return;
	default:
		exhaustive(pattern);
	}
}

/** Rename binders (not pins) according to `renaming`. */
export function renameBinders(pattern: Pattern, renaming: ReadonlyMap<string, string>): Pattern {
	return mapPattern(pattern, (p) => {
		if (p.kind === "bind") {
			const next = renaming.get(p.name);
			return next === undefined ? p : { kind: "bind", name: next };
		}
		if (p.kind === "alias") {
			const next = renaming.get(p.name);
			return next === undefined ? p : { ...p, name: next };
		}
		return p;
	});
}
