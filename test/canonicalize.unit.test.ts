// SPDX-License-Identifier: MIT
// Reforge AST Canonicalization (JCS Profile) - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ifExpr, intLit, match, pbind, varRef } from "../src/ast/builders.ts";
import { astDigest, canonicalizeAst, jcsSerialize } from "../src/ast/canonicalize.ts";
import type { Expr } from "../src/ast/types.ts";

describe("jcsSerialize", () => {
	it("sorts keys and drops whitespace", () => {
		assert.equal(jcsSerialize({ b: 1, a: [true, null, "x"] }), "{\"a\":[true,null,\"x\"],\"b\":1}");
	});

	it("skips undefined-valued keys", () => {
		assert.equal(jcsSerialize({ a: undefined, b: 2 }), "{\"b\":2}");
	});

	it("writes negative zero as 0 and rejects non-finite numbers", () => {
		assert.equal(jcsSerialize(-0), "0");
		assert.throws(() => jcsSerialize(Number.NaN), /non-finite/);
	});
});

describe("canonicalizeAst", () => {
	it("serializes a tree with sorted keys", () => {
		assert.equal(
			canonicalizeAst(match(pbind("x"), intLit(1))),
			"{\"kind\":\"match\",\"pattern\":{\"kind\":\"bind\",\"name\":\"x\"},\"value\":{\"kind\":\"lit\",\"value\":{\"type\":\"int\",\"value\":1}}}",
		);
	});

	it("does not depend on key insertion order", () => {
		const a: Expr = { kind: "var", name: "x" };
		const b: Expr = { name: "x", kind: "var" };
		assert.equal(canonicalizeAst(a), canonicalizeAst(b));
	});

	it("treats an absent else and an undefined else alike", () => {
		const withUndefined: Expr = { kind: "if", cond: varRef("c"), then: varRef("t"), else: undefined };
		assert.equal(canonicalizeAst(withUndefined), canonicalizeAst(ifExpr(varRef("c"), varRef("t"))));
	});
});

describe("astDigest", () => {
	it("prefixes the algorithm name", () => {
		assert.match(astDigest(varRef("x")), /^reforge-sha256:[0-9a-f]{64}$/);
		assert.match(astDigest(varRef("x"), "sha1"), /^reforge-sha1:[0-9a-f]{40}$/);
	});

	it("is equal for equal trees and differs otherwise", () => {
		assert.equal(astDigest(varRef("x")), astDigest({ name: "x", kind: "var" }));
		assert.notEqual(astDigest(varRef("x")), astDigest(varRef("y")));
	});
});
