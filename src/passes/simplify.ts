// SPDX-License-Identifier: MIT
// Reforge Simplification Passes
// Local, meaning-preserving cleanups of the shapes earlier lowering leaves
// behind. Each is a bottom-up rewrite that returns the input tree unchanged
// when nothing matches.

import { ifExpr, nilLit, str, stringLit } from "../ast/builders.ts";
import { transformBottomUp } from "../ast/traverse.ts";
import type { BlockExpr, Clause, Expr, StrPart } from "../ast/types.ts";
import { interpolationSpans } from "../analysis/scope-walk.ts";
import type { PassDescriptor } from "../pipeline/pass.ts";

function boolValue(expr: Expr): boolean | undefined {
	return expr.kind === "lit" && expr.value.type === "bool" ? expr.value.value : undefined;
}

function isFalsyLiteral(expr: Expr): boolean {
	return expr.kind === "lit" && (expr.value.type === "nil" || (expr.value.type === "bool" && !expr.value.value));
}

/** Rebuild a block only when its statement list changed. */
function withExprs(node: BlockExpr, exprs: Expr[]): Expr {
	if (exprs.length === node.exprs.length && exprs.every((e, i) => e === node.exprs[i])) return node;
	return { kind: "block", exprs };
}

//==============================================================================
// booleanCaseToIf
//==============================================================================

function clauseBool(c: Clause): boolean | "any" | undefined {
	if (c.guard !== undefined) return undefined;
	if (c.pattern.kind === "literal" && c.pattern.value.type === "bool") return c.pattern.value.value;
	if (c.pattern.kind === "bind" && c.pattern.name === "_") return "any";
	return undefined;
}

const COMPARISONS = new Set(["==", "!=", "===", "!==", "<", ">", "<=", ">=", "and", "or", "in", "not in"]);

/** Expressions that can only evaluate to `true` or `false`. */
function isBooleanValued(expr: Expr): boolean {
	switch (expr.kind) {
	case "lit":
		return expr.value.type === "bool";
	case "binary":
		return COMPARISONS.has(expr.op);
	case "unary":
		return expr.op === "not";
	default:
		return false;
	}
}

/**
 * `case c do true -> a; false -> b end` becomes `if c do a else b end`. A
 * `_ -> b` fallback qualifies only when `c` is boolean-valued, since `if`
 * would also take the first branch for any other truthy value.
 */
export function booleanCaseToIf(ast: Expr): Expr {
	return transformBottomUp(ast, (node) => {
		if (node.kind !== "case" || node.clauses.length !== 2) return node;
		const [first, second] = node.clauses;
		if (first === undefined || second === undefined) return node;
		const a = clauseBool(first);
		const b = clauseBool(second);
		if (a === true && b === false) return ifExpr(node.subject, first.body, second.body);
		if (a === true && b === "any" && isBooleanValued(node.subject)) return ifExpr(node.subject, first.body, second.body);
		if (a === false && b === true) return ifExpr(node.subject, second.body, first.body);
		return node;
	});
}

//==============================================================================
// foldConstantConditions
//==============================================================================

export function foldConstantConditions(ast: Expr): Expr {
	return transformBottomUp(ast, (node) => {
		switch (node.kind) {
		case "if": {
			if (boolValue(node.cond) === true) return node.then;
			if (isFalsyLiteral(node.cond)) return node.else ?? nilLit();
			return node;
		}
		case "unary": {
			const v = boolValue(node.operand);
			if (v !== undefined && (node.op === "not" || node.op === "!")) {
				return { kind: "lit", value: { type: "bool", value: !v } };
			}
			return node;
		}
		case "binary": {
			const left = boolValue(node.left);
			if (left === undefined) return node;
			if (node.op === "and" || node.op === "&&") return left ? node.right : node.left;
			if (node.op === "or" || node.op === "||") return left ? node.left : node.right;
			return node;
		}
		default:
			return node;
		}
	});
}

//==============================================================================
// concatToInterpolation
//==============================================================================

function concatParts(expr: Expr): StrPart[] {
	if (expr.kind === "binary" && expr.op === "<>") return [...concatParts(expr.left), ...concatParts(expr.right)];
	if (expr.kind === "lit" && expr.value.type === "string") return [{ kind: "text", text: expr.value.value }];
	if (expr.kind === "str") return expr.parts;
	return [{ kind: "interp", expr }];
}

function mergeText(parts: readonly StrPart[]): StrPart[] {
	const out: StrPart[] = [];
	for (const part of parts) {
		const prev = out[out.length - 1];
		if (part.kind === "text" && prev?.kind === "text") {
			out[out.length - 1] = { kind: "text", text: prev.text + part.text };
		} else if (part.kind !== "text" || part.text !== "") {
			out.push(part);
		}
	}
	return out;
}

/** `"Hello " <> name <> "!"` becomes `"Hello #{name}!"`. */
export function concatToInterpolation(ast: Expr): Expr {
	return transformBottomUp(ast, (node) => {
		if (node.kind !== "binary" || node.op !== "<>") return node;
		const parts = concatParts(node);
		if (!parts.some((p) => p.kind === "text")) return node;
		const merged = mergeText(parts);
		if (merged.every((p) => p.kind === "text")) {
			return stringLit(merged.map((p) => (p.kind === "text" ? p.text : "")).join(""));
		}
		return str(merged);
	});
}

//==============================================================================
// Block Cleanups
//==============================================================================

/** Splice nested statement blocks; one-statement blocks unwrap, empty ones become nil. */
export function flattenBlocks(ast: Expr): Expr {
	return transformBottomUp(ast, (node) => {
		if (node.kind !== "block") return node;
		const exprs = node.exprs.flatMap((e) => (e.kind === "block" ? e.exprs : [e]));
		const [only] = exprs;
		if (exprs.length === 0) return nilLit();
		if (exprs.length === 1 && only !== undefined) return only;
		return withExprs(node, exprs);
	});
}

/** Literals and variables, except string literals that interpolate code. */
function isPure(expr: Expr): boolean {
	if (expr.kind === "var") return true;
	if (expr.kind !== "lit") return false;
	return expr.value.type !== "string" || interpolationSpans(expr.value.value).length === 0;
}

/** Literal and variable statements whose value is discarded. */
export function dropPureStatements(ast: Expr): Expr {
	return transformBottomUp(ast, (node) => {
		if (node.kind !== "block") return node;
		const last = node.exprs.length - 1;
		return withExprs(node, node.exprs.filter((e, i) => i === last || !isPure(e)));
	});
}

function isSelfRebinding(expr: Expr): boolean {
	return expr.kind === "match" && expr.pattern.kind === "bind"
		&& expr.value.kind === "var" && expr.value.name === expr.pattern.name;
}

/** Non-final `x = x`. */
export function removeSelfRebinding(ast: Expr): Expr {
	return transformBottomUp(ast, (node) => {
		if (node.kind !== "block") return node;
		const last = node.exprs.length - 1;
		return withExprs(node, node.exprs.filter((e, i) => i === last || !isSelfRebinding(e)));
	});
}

/** `...; x = e; x` at the end of a block becomes `...; e`, repeatedly. */
export function inlineTrailingTemp(ast: Expr): Expr {
	return transformBottomUp(ast, (node) => {
		if (node.kind !== "block") return node;
		let exprs = node.exprs;
		for (;;) {
			const result = exprs[exprs.length - 1];
			const temp = exprs[exprs.length - 2];
			if (result === undefined || temp === undefined) break;
			if (result.kind !== "var" || temp.kind !== "match") break;
			if (temp.pattern.kind !== "bind" || temp.pattern.name !== result.name) break;
			const value = temp.value;
			exprs = [...exprs.slice(0, -2), ...(value.kind === "block" ? value.exprs : [value])];
		}
		const [only] = exprs;
		if (exprs.length === 1 && only !== undefined) return only;
		if (exprs.length === 0) return nilLit();
		return withExprs(node, exprs);
	});
}

//==============================================================================
// Descriptors
//==============================================================================

function pass(name: string, description: string, rewrite: (ast: Expr) => Expr, runAfter: string[]): PassDescriptor {
	return { name, description, enabled: true, rewrite, runAfter };
}

export const simplifyPasses: readonly PassDescriptor[] = [
	pass("booleanCaseToIf", "case on true/false becomes if", booleanCaseToIf, ["lowerDeferredLoops"]),
	pass("foldConstantConditions", "Fold if/not/and/or over boolean literals", foldConstantConditions, ["booleanCaseToIf"]),
	pass("concatToInterpolation", "<> chains with string literals become interpolation", concatToInterpolation, ["foldConstantConditions"]),
	pass("flattenBlocks", "Splice nested blocks and unwrap single-statement blocks", flattenBlocks, ["foldConstantConditions"]),
	pass("dropPureStatements", "Drop discarded literal and variable statements", dropPureStatements, ["flattenBlocks"]),
	pass("removeSelfRebinding", "Drop non-final x = x", removeSelfRebinding, ["flattenBlocks"]),
	pass("inlineTrailingTemp", "x = e; x at the end of a block becomes e", inlineTrailingTemp, ["dropPureStatements", "removeSelfRebinding"]),
];
