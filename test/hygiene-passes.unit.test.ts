// SPDX-License-Identifier: MIT
// Reforge Hygiene Passes - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	binary,
	block,
	call,
	caseExpr,
	clause,
	def,
	fn,
	intLit,
	match,
	pbind,
	ptuple,
	raw,
	stringLit,
	varRef,
} from "../src/ast/builders.ts";
import {
	normalizeVariableCase,
	restoreUsedUnderscoreBinders,
	underscoreUnusedBinders,
	underscoreUnusedParams,
} from "../src/passes/hygiene.ts";

//==============================================================================
// normalizeVariableCase
//==============================================================================

describe("normalizeVariableCase", () => {
	it("renames a camelCase parameter and its uses", () => {
		const node = def("run", [pbind("userName")], binary("<>", varRef("userName"), stringLit("!")));
		assert.deepEqual(
			normalizeVariableCase(node),
			def("run", [pbind("user_name")], binary("<>", varRef("user_name"), stringLit("!"))),
		);
	});

	it("renames match binders when the tree has no def", () => {
		const node = block([match(pbind("fooBar"), intLit(1)), call("f", [varRef("fooBar")])]);
		assert.deepEqual(
			normalizeVariableCase(node),
			block([match(pbind("foo_bar"), intLit(1)), call("f", [varRef("foo_bar")])]),
		);
	});

	it("renames closure parameters inside a def", () => {
		const node = def("run", [], fn([pbind("itemCount")], varRef("itemCount")));
		assert.deepEqual(normalizeVariableCase(node), def("run", [], fn([pbind("item_count")], varRef("item_count"))));
	});

	it("skips a rename that would collide", () => {
		const node = block([
			match(pbind("fooBar"), intLit(1)),
			match(pbind("foo_bar"), intLit(2)),
			call("f", [varRef("fooBar"), varRef("foo_bar")]),
		]);
		assert.equal(normalizeVariableCase(node), node);
	});

	it("leaves names that raw code refers to", () => {
		const node = block([match(pbind("fooBar"), intLit(1)), raw("IO.inspect(fooBar)")]);
		assert.equal(normalizeVariableCase(node), node);
	});

	it("never renames free names", () => {
		const node = call("f", [varRef("someGlobal")]);
		assert.equal(normalizeVariableCase(node), node);
	});
});

//==============================================================================
// underscoreUnusedParams
//==============================================================================

describe("underscoreUnusedParams", () => {
	it("prefixes parameters the body never reads", () => {
		const node = def("run", [pbind("a"), pbind("b")], varRef("a"));
		assert.deepEqual(underscoreUnusedParams(node), def("run", [pbind("a"), pbind("_b")], varRef("a")));
	});

	it("counts a read under another spelling as a use", () => {
		const node = def("run", [pbind("userName")], varRef("user_name"));
		assert.equal(underscoreUnusedParams(node), node);
	});

	it("prefixes unread case clause binders", () => {
		const node = caseExpr(varRef("v"), [clause(ptuple([pbind("ok"), pbind("val")]), varRef("ok"))]);
		assert.deepEqual(
			underscoreUnusedParams(node),
			caseExpr(varRef("v"), [clause(ptuple([pbind("ok"), pbind("_val")]), varRef("ok"))]),
		);
	});

	it("does not count a read shadowed by an inner closure", () => {
		const node = fn([pbind("x")], fn([pbind("x")], varRef("x")));
		assert.deepEqual(underscoreUnusedParams(node), fn([pbind("_x")], fn([pbind("x")], varRef("x"))));
	});
});

//==============================================================================
// underscoreUnusedBinders
//==============================================================================

describe("underscoreUnusedBinders", () => {
	it("prefixes match binders no later statement reads", () => {
		const node = block([match(pbind("x"), call("f", [])), match(pbind("y"), intLit(2)), varRef("y")]);
		assert.deepEqual(
			underscoreUnusedBinders(node),
			block([match(pbind("_x"), call("f", [])), match(pbind("y"), intLit(2)), varRef("y")]),
		);
	});

	it("treats a later read under another spelling as a use", () => {
		const node = block([match(pbind("userName"), call("read", [])), call("show", [varRef("user_name")])]);
		assert.equal(underscoreUnusedBinders(node), node);
	});

	it("prefixes a bare match body of a def", () => {
		const node = def("run", [], match(pbind("x"), call("f", [])));
		assert.deepEqual(underscoreUnusedBinders(node), def("run", [], match(pbind("_x"), call("f", []))));
	});
});

//==============================================================================
// restoreUsedUnderscoreBinders
//==============================================================================

describe("restoreUsedUnderscoreBinders", () => {
	it("drops the prefix from a binder that is read", () => {
		const node = block([match(pbind("_x"), intLit(1)), call("f", [varRef("_x")])]);
		assert.deepEqual(
			restoreUsedUnderscoreBinders(node),
			block([match(pbind("x"), intLit(1)), call("f", [varRef("x")])]),
		);
	});

	it("keeps the prefix when the plain name is taken", () => {
		const node = block([match(pbind("_x"), intLit(1)), call("f", [varRef("_x"), varRef("x")])]);
		assert.equal(restoreUsedUnderscoreBinders(node), node);
	});

	it("keeps the prefix on binders nothing reads", () => {
		const node = def("run", [pbind("_unused")], intLit(0));
		assert.equal(restoreUsedUnderscoreBinders(node), node);
	});
});
