// SPDX-License-Identifier: MIT
// Reforge Pipeline Runner - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { block, call, def, nilLit, varRef } from "../src/ast/builders.ts";
import { transformBottomUp } from "../src/ast/traverse.ts";
import type { Expr } from "../src/ast/types.ts";
import { ErrorCodes, ReforgeError } from "../src/errors.ts";
import { collectingSink } from "../src/pipeline/diagnostics.ts";
import type { PipelineConfig } from "../src/pipeline/config.ts";
import { contextualPass, type PassDescriptor } from "../src/pipeline/pass.ts";
import { Pipeline } from "../src/pipeline/runner.ts";

//==============================================================================
// Test Fixtures
//==============================================================================

const renameXtoY = (ast: Expr): Expr =>
	transformBottomUp(ast, (e) => (e.kind === "var" && e.name === "x" ? varRef("y") : e));

const rename: PassDescriptor = { name: "rename", description: "x -> y", enabled: true, rewrite: renameXtoY };
const identity: PassDescriptor = { name: "identity", description: "no-op", enabled: true, rewrite: (ast) => ast };
const copy: PassDescriptor = {
	name: "copy",
	description: "structural copy",
	enabled: true,
	rewrite: (ast) => block([...(ast.kind === "block" ? ast.exprs : [ast])]),
};
const explode: PassDescriptor = {
	name: "explode",
	description: "always throws",
	enabled: true,
	rewrite: () => {
		throw new Error("boom");
	},
	runAfter: ["rename"],
};

const tree = block([varRef("x"), call("f", [])]);

//==============================================================================
// Tests
//==============================================================================

describe("Pipeline.run", () => {
	it("applies enabled passes in schedule order", () => {
		const { sink } = collectingSink();
		const result = new Pipeline([rename], { diagnostics: sink }).run(tree);
		assert.deepEqual(result.ast, block([varRef("y"), call("f", [])]));
		assert.deepEqual(result.failed, []);
		assert.deepEqual(result.trace, []);
	});

	it("skips passes disabled by config", () => {
		const { sink } = collectingSink();
		const pipeline = new Pipeline([rename, identity], { config: { passes: { rename: false } }, diagnostics: sink });
		assert.deepEqual(pipeline.enabledPassNames(), ["identity"]);
		assert.equal(pipeline.run(tree).ast, tree);
	});

	it("keeps the tree from before a failing pass and reports it", () => {
		const { sink, lines } = collectingSink();
		const result = new Pipeline([explode, rename], { diagnostics: sink }).run(tree);
		assert.deepEqual(result.ast, block([varRef("y"), call("f", [])]));
		assert.deepEqual(result.failed, ["explode"]);
		assert.deepEqual(lines(), [
			"[Pipeline] PassFailed: pass \"explode\" threw (boom); keeping the tree from before it",
		]);
	});

	it("rejects a config that does not match its schema", () => {
		const config: Partial<PipelineConfig> = JSON.parse('{"failFast": "yes"}');
		assert.throws(
			() => new Pipeline([rename], { config }),
			(e: unknown) => e instanceof ReforgeError && e.code === ErrorCodes.InvalidConfig,
		);
	});

	it("fills the options it was not given with their defaults", () => {
		const pipeline = new Pipeline([rename], { config: { trace: true } });
		assert.deepEqual(pipeline.config, { passes: {}, failFast: false, trace: true });
	});

	it("raises PassFailed when configured to fail fast", () => {
		const { sink } = collectingSink();
		const pipeline = new Pipeline([rename, explode], { config: { failFast: true }, diagnostics: sink });
		assert.throws(
			() => pipeline.run(tree),
			(e: unknown) => e instanceof ReforgeError
				&& e.code === ErrorCodes.PassFailed
				&& e.pass === "explode"
				&& e.message === "Pass explode failed: boom",
		);
	});

	it("records which passes changed the tree in trace mode", () => {
		const { sink } = collectingSink();
		const result = new Pipeline([rename, identity, copy], { config: { trace: true }, diagnostics: sink }).run(tree);
		assert.deepEqual(result.trace, [
			{ name: "rename", changed: true },
			{ name: "identity", changed: false },
			{ name: "copy", changed: false },
		]);
	});

	it("hands the module info and builder to contextual passes", () => {
		const { sink } = collectingSink();
		let seen: string | undefined;
		const inspect = contextualPass("inspect", "reads the context", (ast, ctx) => {
			seen = ctx.module?.name;
			return ast;
		});
		new Pipeline([inspect], { diagnostics: sink }).run(nilLit(), { name: "Todo" });
		assert.equal(seen, "Todo");
	});

	it("runs the plain rewrite of a contextual pass as identity", () => {
		const inspect = contextualPass("inspect", "reads the context", () => nilLit());
		const ast = def("run", [], varRef("x"));
		assert.equal(inspect.rewrite(ast), ast);
	});

	it("describes its schedule", () => {
		const { sink } = collectingSink();
		const pipeline = new Pipeline([explode, rename], { diagnostics: sink });
		assert.equal(pipeline.describe(), "1. rename: x -> y\n2. explode (after rename): always throws");
	});
});
