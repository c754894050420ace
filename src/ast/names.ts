// SPDX-License-Identifier: MIT
// Reforge Name Forms
// camelCase to snake_case conversion, the fuzzy key that identifies the
// spellings of one variable, and the leading-underscore hygiene prefix the
// target language uses for intentionally unused binders.

const LEADING_UNDERSCORES = /^(_*)(.*)$/s;

function splitPrefix(name: string): [string, string] {
	const m = LEADING_UNDERSCORES.exec(name);
	return [m?.[1] ?? "", m?.[2] ?? name];
}

/** `userName` -> `user_name`; leading underscores are kept. Idempotent. */
export function toSnakeCase(name: string): string {
	const [prefix, rest] = splitPrefix(name);
	const snake = rest
		.replace(/([a-z0-9])([A-Z])/g, "$1_$2")
		.replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
		.toLowerCase();
	return prefix + snake;
}

/** The bare wildcard binder. Never a real variable. */
export function isWildcard(name: string): boolean {
	return /^_+$/.test(name);
}

/** `_x`: a binder marked as intentionally unused. */
export function hasHygienePrefix(name: string): boolean {
	return name.startsWith("_") && !isWildcard(name);
}

export function withHygienePrefix(name: string): string {
	return hasHygienePrefix(name) || isWildcard(name) ? name : "_" + name;
}

export function withoutHygienePrefix(name: string): string {
	return hasHygienePrefix(name) ? name.slice(1) : name;
}

/**
 * Key under which all case-style and hygiene variants of a name collide:
 * `_userName`, `userName`, `user_name` and `_user_name` share `user_name`.
 */
export function fuzzyKey(name: string): string {
	if (isWildcard(name)) return name;
	const [, rest] = splitPrefix(name);
	return toSnakeCase(rest);
}

export function fuzzyMatches(a: string, b: string): boolean {
	return fuzzyKey(a) === fuzzyKey(b);
}

/** Identifier-like tokens in a code fragment, in order of appearance. */
export function identifierTokens(text: string): string[] {
	return text.match(/(?<![A-Za-z0-9_])[A-Za-z_][A-Za-z0-9_]*/g) ?? [];
}
