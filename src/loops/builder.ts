// SPDX-License-Identifier: MIT
// Reforge Expression Builder
// Default translation of source-side expressions into target expressions.
// Front ends with richer type information supply their own through the pass
// context.

import {
	binary,
	boolLit,
	call,
	field,
	floatLit,
	intLit,
	list,
	nilLit,
	remoteCall,
	stringLit,
	unary,
	varRef,
} from "../ast/builders.ts";
import type { Expr } from "../ast/types.ts";
import { exhaustive } from "../errors.ts";
import type { SourceConst, SourceExpr } from "./source.ts";

export type ExprBuilder = (expr: SourceExpr) => Expr;

export interface ExprBuilderOptions {
	/**
	 * Per-method overrides, e.g. `{ toUpperCase: (t) => remoteCall("String", "upcase", [t]) }`.
	 * Methods without an entry become a local call with the target first.
	 */
	methods?: Readonly<Record<string, (target: Expr, args: Expr[]) => Expr>> | undefined;
}

function constant(value: SourceConst): Expr {
	if (value === null) return nilLit();
	if (typeof value === "number") return Number.isInteger(value) ? intLit(value) : floatLit(value);
	if (typeof value === "string") return stringLit(value);
	return boolLit(value);
}

export function createExprBuilder(options: ExprBuilderOptions = {}): ExprBuilder {
	const methods = options.methods ?? {};
	const build: ExprBuilder = (expr) => {
		switch (expr.kind) {
		case "ident":
			return varRef(expr.name);
		case "const":
			return constant(expr.value);
		case "binop":
			if (expr.op === "%") return call("rem", [build(expr.left), build(expr.right)]);
			return binary(expr.op, build(expr.left), build(expr.right));
		case "unop":
			return unary(expr.op, build(expr.operand));
		case "call":
			return call(expr.callee, expr.args.map(build));
		case "method": {
			const target = build(expr.target);
			const args = expr.args.map(build);
			const override = Object.hasOwn(methods, expr.name) ? methods[expr.name] : undefined;
			return override !== undefined ? override(target, args) : call(expr.name, [target, ...args]);
		}
		case "field":
			if (expr.field === "length") return call("length", [build(expr.target)]);
			return field(build(expr.target), expr.field);
		case "index":
			return remoteCall("Enum", "at", [build(expr.target), build(expr.index)]);
		case "arrayLit":
			return list(expr.elements.map(build));
		default:
			return exhaustive(expr);
		}
	};
	return build;
}
