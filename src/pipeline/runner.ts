// SPDX-License-Identifier: MIT
// Reforge Pipeline Runner
// Feeds a tree through the scheduled passes, strictly in sequence. A pass
// that throws is reported and its input tree carries on (fail-soft), unless
// the config asks to fail fast.

import { astDigest } from "../ast/canonicalize.ts";
import type { Expr } from "../ast/types.ts";
import { ReforgeError } from "../errors.ts";
import { createExprBuilder, type ExprBuilder } from "../loops/builder.ts";
import { parsePipelineConfig, type PipelineConfig } from "./config.ts";
import { DiagnosticCodes, consoleSink, type DiagnosticSink } from "./diagnostics.ts";
import type { ModuleInfo, PassContext, PassDescriptor } from "./pass.ts";
import { buildSchedule, describeSchedule, type Schedule } from "./registry.ts";

export interface PipelineOptions {
	config?: Partial<PipelineConfig> | undefined;
	diagnostics?: DiagnosticSink | undefined;
	builder?: ExprBuilder | undefined;
}

/** One executed pass, recorded in trace mode. */
export interface PassRecord {
	name: string;
	changed: boolean;
}

export interface PipelineResult {
	ast: Expr;
	/** Executed passes in order; empty unless trace is on */
	trace: PassRecord[];
	/** Passes that threw and were skipped */
	failed: string[];
}

export class Pipeline {
	readonly schedule: Schedule;
	readonly config: PipelineConfig;
	private readonly diagnostics: DiagnosticSink;
	private readonly builder: ExprBuilder;

	constructor(descriptors: readonly PassDescriptor[], options: PipelineOptions = {}) {
		this.config = parsePipelineConfig(options.config);
		this.diagnostics = options.diagnostics ?? consoleSink;
		this.builder = options.builder ?? createExprBuilder();
		this.schedule = buildSchedule(descriptors, {
			overrides: this.config.passes,
			diagnostics: this.diagnostics,
		});
	}

	/** Names of the passes that will run, in order. */
	enabledPassNames(): string[] {
		return this.schedule.passes.filter((p) => p.enabled).map((p) => p.descriptor.name);
	}

	describe(): string {
		return describeSchedule(this.schedule);
	}

	run(ast: Expr, module?: ModuleInfo): PipelineResult {
		const ctx: PassContext = { module, builder: this.builder, diagnostics: this.diagnostics };
		const trace: PassRecord[] = [];
		const failed: string[] = [];
		let current = ast;

		for (const { descriptor, enabled } of this.schedule.passes) {
			if (!enabled) continue;
			let next: Expr;
			try {
				next = descriptor.contextualRewrite !== undefined
					? descriptor.contextualRewrite(current, ctx)
					: descriptor.rewrite(current);
			} catch (e) {
				if (this.config.failFast) throw ReforgeError.passFailed(descriptor.name, e);
				this.diagnostics({
					code: DiagnosticCodes.PassFailed,
					message: `pass "${descriptor.name}" threw (${e instanceof Error ? e.message : String(e)}); keeping the tree from before it`,
					pass: descriptor.name,
				});
				failed.push(descriptor.name);
				continue;
			}
			if (this.config.trace) {
				trace.push({ name: descriptor.name, changed: next !== current && astDigest(next) !== astDigest(current) });
			}
			current = next;
		}
		return { ast: current, trace, failed };
	}
}
