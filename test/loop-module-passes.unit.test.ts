// SPDX-License-Identifier: MIT
// Reforge Loop and Module Passes - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	apply,
	binary,
	block,
	call,
	def,
	fn,
	ifExpr,
	intLit,
	list,
	match,
	moduleExpr,
	nilLit,
	pbind,
	remoteCall,
	varRef,
} from "../src/ast/builders.ts";
import type { Expr, LoopExpr } from "../src/ast/types.ts";
import { createExprBuilder } from "../src/loops/builder.ts";
import { binop, ident, sconst } from "../src/loops/source.ts";
import { collectingSink } from "../src/pipeline/diagnostics.ts";
import type { ModuleInfo, PassContext } from "../src/pipeline/pass.ts";
import { lowerDeferredLoops } from "../src/passes/loops.ts";
import { privatizeHelpers } from "../src/passes/module.ts";

//==============================================================================
// Test Fixtures
//==============================================================================

const context = (module?: ModuleInfo): PassContext => ({
	module,
	builder: createExprBuilder(),
	diagnostics: collectingSink().sink,
});

const doubling: LoopExpr = {
	kind: "loop",
	loop: {
		kind: "forEach",
		variable: "item",
		collection: ident("items"),
		body: [{ kind: "push", target: "out", value: binop("*", ident("item"), sconst(2)) }],
	},
	known: [{ name: "out", value: { kind: "arrayLit", elements: [] } }],
};

const lowered: Expr = match(pbind("out"), remoteCall("Enum", "map", [
	varRef("items"),
	fn([pbind("item")], binary("*", varRef("item"), intLit(2))),
]));

const stuck: LoopExpr = {
	kind: "loop",
	loop: {
		kind: "forEach",
		variable: "x",
		collection: ident("xs"),
		body: [{ kind: "if", cond: ident("x"), then: [{ kind: "return", value: ident("x") }] }],
	},
	known: [],
};

//==============================================================================
// lowerDeferredLoops
//==============================================================================

describe("lowerDeferredLoops", () => {
	it("replaces a loop statement inside a block", () => {
		const tree = block([match(pbind("out"), list([])), doubling, varRef("out")]);
		assert.deepEqual(
			lowerDeferredLoops(tree, context()),
			block([match(pbind("out"), list([])), lowered, varRef("out")]),
		);
	});

	it("lowers a loop at the root", () => {
		assert.deepEqual(lowerDeferredLoops(doubling, context()), lowered);
	});

	it("lowers a loop that is a def body", () => {
		const tree = def("run", [pbind("items")], doubling);
		assert.deepEqual(lowerDeferredLoops(tree, context()), def("run", [pbind("items")], lowered));
	});

	it("splices multi-statement lowerings into the block", () => {
		const counting: LoopExpr = {
			kind: "loop",
			loop: { kind: "while", cond: ident("running"), doWhile: false, body: [{ kind: "exprStmt", expr: { kind: "call", callee: "poll", args: [] } }] },
			known: [],
		};
		const out = lowerDeferredLoops(block([counting, nilLit()]), context());
		assert.ok(out.kind === "block");
		assert.equal(out.exprs.length, 3);
		assert.equal(out.exprs[0]?.kind, "match");
		assert.equal(out.exprs[1]?.kind, "apply");
	});

	describe("a counter loop in a nested block", () => {
		const counter: LoopExpr = {
			kind: "loop",
			loop: {
				kind: "while",
				cond: binop("<", ident("i"), sconst(10)),
				doWhile: false,
				body: [
					{ kind: "exprStmt", expr: { kind: "call", callee: "log", args: [ident("i")] } },
					{ kind: "increment", target: "i", delta: 1 },
				],
			},
			known: [{ name: "i", value: sconst(0) }],
		};
		const nested = (after: Expr): Expr => block([block([match(pbind("i"), intLit(0)), counter]), after]);

		it("keeps the counter when the enclosing block reads it afterwards", () => {
			const recurse = apply(varRef("loop_fn"), [varRef("loop_fn"), varRef("i")]);
			assert.deepEqual(lowerDeferredLoops(nested(call("show", [varRef("i")])), context()), block([
				block([
					match(pbind("i"), intLit(0)),
					match(pbind("loop_fn"), fn([pbind("loop_fn"), pbind("i")], ifExpr(
						binary("<", varRef("i"), intLit(10)),
						block([
							call("log", [varRef("i")]),
							match(pbind("i"), binary("+", varRef("i"), intLit(1))),
							recurse,
						]),
						varRef("i"),
					))),
					match(pbind("i"), recurse),
				]),
				call("show", [varRef("i")]),
			]));
		});

		it("walks a range when nothing after the block reads the counter", () => {
			assert.deepEqual(lowerDeferredLoops(nested(call("show", [varRef("j")])), context()), block([
				block([
					match(pbind("i"), intLit(0)),
					remoteCall("Enum", "each", [
						binary("..", intLit(0), intLit(9)),
						fn([pbind("i")], call("log", [varRef("i")])),
					]),
				]),
				call("show", [varRef("j")]),
			]));
		});
	});

	it("keeps a loop it cannot lower, and the tree identity with it", () => {
		const tree = block([stuck, call("done", [])]);
		assert.equal(lowerDeferredLoops(tree, context()), tree);
	});
});

//==============================================================================
// privatizeHelpers
//==============================================================================

describe("privatizeHelpers", () => {
	const tree = moduleExpr("Todo", [def("run", [], nilLit()), def("helper", [], nilLit())]);

	it("makes functions outside the public list private", () => {
		assert.deepEqual(
			privatizeHelpers(tree, context({ name: "Todo", publicFunctions: ["run"] })),
			moduleExpr("Todo", [def("run", [], nilLit()), def("helper", [], nilLit(), true)]),
		);
	});

	it("is the identity without a public list", () => {
		assert.equal(privatizeHelpers(tree, context({ name: "Todo" })), tree);
		assert.equal(privatizeHelpers(tree, context()), tree);
	});
});
