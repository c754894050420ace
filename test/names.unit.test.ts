// SPDX-License-Identifier: MIT
// Reforge Name Forms - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	fuzzyKey,
	fuzzyMatches,
	hasHygienePrefix,
	identifierTokens,
	isWildcard,
	toSnakeCase,
	withHygienePrefix,
	withoutHygienePrefix,
} from "../src/ast/names.ts";

describe("toSnakeCase", () => {
	it("splits camelCase words", () => {
		assert.equal(toSnakeCase("userName"), "user_name");
	});

	it("keeps leading underscores", () => {
		assert.equal(toSnakeCase("_userName"), "_user_name");
	});

	it("splits acronyms from the following word", () => {
		assert.equal(toSnakeCase("HTTPServer"), "http_server");
	});

	it("is idempotent", () => {
		assert.equal(toSnakeCase(toSnakeCase("someLongName")), "some_long_name");
	});
});

describe("hygiene prefix", () => {
	it("treats underscore-only names as wildcards", () => {
		assert.equal(isWildcard("_"), true);
		assert.equal(isWildcard("__"), true);
		assert.equal(hasHygienePrefix("_"), false);
	});

	it("adds and removes the prefix once", () => {
		assert.equal(withHygienePrefix("x"), "_x");
		assert.equal(withHygienePrefix("_x"), "_x");
		assert.equal(withHygienePrefix("_"), "_");
		assert.equal(withoutHygienePrefix("_x"), "x");
		assert.equal(withoutHygienePrefix("x"), "x");
	});
});

describe("fuzzyKey", () => {
	it("collapses case style and hygiene variants", () => {
		for (const name of ["userName", "_userName", "user_name", "_user_name", "__userName"]) {
			assert.equal(fuzzyKey(name), "user_name");
		}
	});

	it("leaves the wildcard alone", () => {
		assert.equal(fuzzyKey("_"), "_");
	});

	it("drives fuzzyMatches", () => {
		assert.equal(fuzzyMatches("itemCount", "_item_count"), true);
		assert.equal(fuzzyMatches("item", "items"), false);
	});
});

describe("token search", () => {
	it("lists identifier tokens and skips digit-led runs", () => {
		assert.deepEqual(identifierTokens("a + b1 * _c(2x)"), ["a", "b1", "_c"]);
	});
});
