// SPDX-License-Identifier: MIT
// Reforge - rewrite passes over an Elixir-family target AST
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	Clause, Expr, ExprKind, FnClause, Generator, Literal, Pattern, PatternKind, StrPart, WithClause,
	BlockExpr, DefExpr, FnExpr, LoopExpr, MatchExpr, ModuleExpr,
} from "./ast/types.ts";

export type {
	KnownBinding, SourceExpr, SourceLoop, SourceStmt,
	SourceForEach, SourceForRange, SourceWhile,
} from "./loops/source.ts";

export type { ErrorCode } from "./errors.ts";

//==============================================================================
// AST Construction and Traversal
//==============================================================================

export {
	atom, binary, block, boolLit, call, caseExpr, clause, def, floatLit, fn, fnClause, forExpr,
	ifExpr, intLit, list, match, moduleExpr, nilLit, raw, remoteCall, sequence, statementsOf,
	str, stringLit, tuple, unary, varRef,
	palias, pbind, pcons, plist, plit, ppin, ptuple,
} from "./ast/builders.ts";

export { childrenOf, mapChildren, mapPattern, someNode, transformBottomUp } from "./ast/traverse.ts";

export { fuzzyKey, fuzzyMatches, toSnakeCase } from "./ast/names.ts";

export { astDigest, canonicalizeAst } from "./ast/canonicalize.ts";

export { binop, ident, isSourceLoop, sconst } from "./loops/source.ts";

//==============================================================================
// Analysis
//==============================================================================

export { patternBinders } from "./analysis/patterns.ts";
export { referencedNames, walkReferences, type ScopeWalkOptions } from "./analysis/scope-walk.ts";
export { isUsed, isUsedExact, isUsedFuzzy, isUsedInAny, usedNames, type MatchMode } from "./analysis/usage.ts";
export { buildExactUsageIndex, buildUsageIndex, suffixAt, usedLater, type UsageIndex } from "./analysis/usage-index.ts";
export { capturedVariables, clauseFreeVars, collectFreeVars, freshName, isFreeIn } from "./analysis/closure.ts";

//==============================================================================
// Loops
//==============================================================================

export type { LoopDetection, LoopFacts, LoopIntent, LoopIntentKind } from "./loops/intent.ts";
export {
	DEFAULT_DETECTORS, analyzeLoop, detectAll, recognizeIteration, type LoopDetector,
} from "./loops/analyzer.ts";
export { createExprBuilder, type ExprBuilder, type ExprBuilderOptions } from "./loops/builder.ts";
export { lowerIntent, lowerLoop, tryLowerIntent } from "./loops/lowering.ts";

//==============================================================================
// Pipeline
//==============================================================================

export {
	contextualPass, flattenGroups,
	type ContextualRewriteFn, type ModuleInfo, type PassContext, type PassDescriptor, type PassGroup, type RewriteFn,
} from "./pipeline/pass.ts";
export { buildSchedule, describeSchedule, type Schedule, type ScheduledPass } from "./pipeline/registry.ts";
export {
	Pipeline, type PassRecord, type PipelineOptions, type PipelineResult,
} from "./pipeline/runner.ts";
export {
	DEFAULT_CONFIG, PipelineConfigSchema, loadPipelineConfig, parsePipelineConfig, type PipelineConfig,
} from "./pipeline/config.ts";
export {
	DiagnosticCodes, collectingSink, consoleSink, formatDiagnostic,
	type DiagnosticSink, type PipelineDiagnostic,
} from "./pipeline/diagnostics.ts";

//==============================================================================
// Passes
//==============================================================================

export { defaultPassGroups, defaultPasses } from "./passes/default-passes.ts";
export { lowerDeferredLoops } from "./passes/loops.ts";
export {
	booleanCaseToIf, concatToInterpolation, dropPureStatements, flattenBlocks,
	foldConstantConditions, inlineTrailingTemp, removeSelfRebinding,
} from "./passes/simplify.ts";
export {
	normalizeVariableCase, restoreUsedUnderscoreBinders, underscoreUnusedBinders, underscoreUnusedParams,
} from "./passes/hygiene.ts";
export { privatizeHelpers } from "./passes/module.ts";

//==============================================================================
// Interchange and Errors
//==============================================================================

export { ExprSchema, PatternSchema, SourceLoopSchema, astJsonSchema, parseAst, parseSourceLoop } from "./schemas.ts";

export { ErrorCodes, ReforgeError, exhaustive } from "./errors.ts";

//==============================================================================
// Convenience
//==============================================================================

import type { Expr } from "./ast/types.ts";
import type { ModuleInfo } from "./pipeline/pass.ts";
import { Pipeline, type PipelineOptions, type PipelineResult } from "./pipeline/runner.ts";
import { defaultPasses } from "./passes/default-passes.ts";

/** Pipeline over the default pass catalogue. */
export function createPipeline(options: PipelineOptions = {}): Pipeline {
	return new Pipeline(defaultPasses(), options);
}

export interface RunOptions extends PipelineOptions {
	module?: ModuleInfo | undefined;
}

/**
 * Run the default passes once over `ast`.
 *
 * @example
 * const { ast: out } = runDefaultPipeline(tree, { module: { name: "Todo", publicFunctions: ["run"] } });
 */
export function runDefaultPipeline(ast: Expr, options: RunOptions = {}): PipelineResult {
	const { module, ...pipelineOptions } = options;
	return createPipeline(pipelineOptions).run(ast, module);
}
