// SPDX-License-Identifier: MIT
// Reforge Pass Descriptors

import type { Expr } from "../ast/types.ts";
import type { ExprBuilder } from "../loops/builder.ts";
import type { DiagnosticSink } from "./diagnostics.ts";

/** What the build knows about the module being rewritten. */
export interface ModuleInfo {
	name: string;
	/** Functions callers outside the module use; undefined when unknown */
	publicFunctions?: readonly string[] | undefined;
	/** Front-end classification, e.g. "class", "enum", "typedef" */
	kind?: string | undefined;
}

/** Read-only build context handed to contextual passes. */
export interface PassContext {
	module?: ModuleInfo | undefined;
	builder: ExprBuilder;
	diagnostics: DiagnosticSink;
}

export type RewriteFn = (ast: Expr) => Expr;
export type ContextualRewriteFn = (ast: Expr, ctx: PassContext) => Expr;

export interface PassDescriptor {
	name: string;
	description: string;
	/** Default enablement; a config override wins */
	enabled: boolean;
	rewrite: RewriteFn;
	/** Used instead of `rewrite` when present */
	contextualRewrite?: ContextualRewriteFn | undefined;
	/** Passes that must run before this one */
	runAfter?: readonly string[] | undefined;
}

export interface PassGroup {
	name: string;
	passes: readonly PassDescriptor[];
}

/** Passes of all groups, in group order. */
export function flattenGroups(groups: readonly PassGroup[]): PassDescriptor[] {
	return groups.flatMap((g) => g.passes);
}

/** A contextual pass; `rewrite` is what runs without a context. */
export function contextualPass(
	name: string,
	description: string,
	contextualRewrite: ContextualRewriteFn,
	options: { enabled?: boolean; runAfter?: readonly string[]; rewrite?: RewriteFn } = {},
): PassDescriptor {
	return {
		name,
		description,
		enabled: options.enabled ?? true,
		rewrite: options.rewrite ?? ((ast) => ast),
		contextualRewrite,
		runAfter: options.runAfter,
	};
}
