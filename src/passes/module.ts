// SPDX-License-Identifier: MIT
// Reforge Module Passes

import { transformBottomUp } from "../ast/traverse.ts";
import type { Expr } from "../ast/types.ts";
import { contextualPass, type PassContext, type PassDescriptor } from "../pipeline/pass.ts";

/**
 * Functions the build context does not list as public become `defp`.
 * Without a list the tree is returned unchanged.
 */
export function privatizeHelpers(ast: Expr, ctx: PassContext): Expr {
	const publicFunctions = ctx.module?.publicFunctions;
	if (publicFunctions === undefined) return ast;
	const keep = new Set(publicFunctions);
	return transformBottomUp(ast, (node) => {
		if (node.kind !== "def" || node.private || keep.has(node.name)) return node;
		return { ...node, private: true };
	});
}

export const modulePasses: readonly PassDescriptor[] = [
	contextualPass(
		"privatizeHelpers",
		"Functions outside the module's public list become private",
		privatizeHelpers,
	),
];
