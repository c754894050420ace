// SPDX-License-Identifier: MIT
// Reforge Loop-Pattern Analyzer - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	analyzeLoop,
	containsJump,
	detectAll,
	incrementStep,
	indexedDetector,
	recognizeIteration,
	type LoopDetector,
} from "../src/loops/analyzer.ts";
import type { LoopFacts } from "../src/loops/intent.ts";
import { binop, ident, sconst, type SourceExpr, type SourceLoop, type SourceStmt } from "../src/loops/source.ts";

//==============================================================================
// Test Fixtures
//==============================================================================

const facts = (known: LoopFacts["known"] = [], live: string[] = []): LoopFacts => ({
	known,
	liveAfter: new Set(live),
});

const counted: SourceLoop = {
	kind: "while",
	cond: binop("<", ident("i"), sconst(10)),
	doWhile: false,
	body: [{ kind: "assign", target: "i", value: binop("+", ident("i"), sconst(1)) }],
};

const printUpTo: SourceLoop = {
	kind: "while",
	cond: binop("<=", ident("i"), ident("n")),
	doWhile: false,
	body: [
		{ kind: "exprStmt", expr: { kind: "call", callee: "print", args: [ident("i")] } },
		{ kind: "increment", target: "i", delta: 1 },
	],
};

const arrLength: SourceExpr = { kind: "field", target: ident("arr"), field: "length" };

const doubled: SourceLoop = {
	kind: "forRange",
	variable: "x",
	start: sconst(0),
	end: sconst(5),
	inclusive: false,
	body: [{ kind: "push", target: "result", value: binop("*", ident("x"), sconst(2)) }],
};

//==============================================================================
// Increments and Jumps
//==============================================================================

describe("incrementStep", () => {
	const cases: [SourceStmt, number | undefined][] = [
		[{ kind: "increment", target: "i", delta: 1 }, 1],
		[{ kind: "increment", target: "i", delta: -1 }, -1],
		[{ kind: "compoundAssign", target: "i", op: "+", value: sconst(2) }, 2],
		[{ kind: "compoundAssign", target: "i", op: "-", value: sconst(3) }, -3],
		[{ kind: "compoundAssign", target: "i", op: "*", value: sconst(2) }, undefined],
		[{ kind: "assign", target: "i", value: binop("+", sconst(4), ident("i")) }, 4],
		[{ kind: "assign", target: "i", value: binop("-", ident("i"), sconst(1)) }, -1],
		[{ kind: "assign", target: "i", value: binop("-", sconst(1), ident("i")) }, undefined],
		[{ kind: "increment", target: "j", delta: 1 }, undefined],
	];
	for (const [stmt, expected] of cases) {
		it(`reads ${JSON.stringify(stmt)} as ${String(expected)}`, () => {
			assert.equal(incrementStep(stmt, "i"), expected);
		});
	}
});

describe("containsJump", () => {
	const body: SourceStmt[] = [
		{ kind: "if", cond: ident("done"), then: [{ kind: "break" }] },
		{ kind: "forEach", variable: "y", collection: ident("ys"), body: [{ kind: "continue" }, { kind: "return" }] },
	];

	it("finds jumps inside if branches", () => {
		assert.equal(containsJump(body, "break"), true);
	});

	it("ignores break/continue of nested loops", () => {
		assert.equal(containsJump(body, "continue"), false);
	});

	it("sees return at any depth", () => {
		assert.equal(containsJump(body, "return"), true);
	});
});

//==============================================================================
// Range Recognition
//==============================================================================

describe("range detection on while loops", () => {
	it("reads `i < 10` with `i = i + 1` as 0 up to 10, exclusive", () => {
		const detection = analyzeLoop(counted);
		assert.ok(detection !== null);
		assert.equal(detection.detector, "range");
		assert.equal(detection.confidence, 0.9);
		assert.deepEqual(detection.intent, {
			kind: "range",
			variable: "i",
			start: sconst(0),
			end: sconst(10),
			step: 1,
			inclusive: false,
			body: [],
		});
	});

	it("reads `i <= n` with `i++` as inclusive with step 1, starting from the known value", () => {
		const detection = analyzeLoop(printUpTo, facts([{ name: "i", value: sconst(1) }]));
		assert.ok(detection !== null);
		assert.deepEqual(detection.intent, {
			kind: "range",
			variable: "i",
			start: sconst(1),
			end: ident("n"),
			step: 1,
			inclusive: true,
			body: [{ kind: "exprStmt", expr: { kind: "call", callee: "print", args: [ident("i")] } }],
		});
	});

	it("falls back to a while loop when the counter is read after the loop", () => {
		const detection = analyzeLoop(counted, facts([], ["i"]));
		assert.ok(detection !== null);
		assert.equal(detection.intent.kind, "while");
		assert.equal(detection.confidence, 0.4);
	});

	it("rejects a step that runs away from the bound", () => {
		const away: SourceLoop = { ...counted, body: [{ kind: "increment", target: "i", delta: -1 }] };
		assert.equal(analyzeLoop(away)?.intent.kind, "while");
	});

	it("rejects a counter read after its increment", () => {
		const late: SourceLoop = {
			...counted,
			body: [
				{ kind: "increment", target: "i", delta: 1 },
				{ kind: "exprStmt", expr: ident("i") },
			],
		};
		assert.equal(recognizeIteration(late), null);
	});

	it("rejects a zero-step range", () => {
		assert.equal(recognizeIteration({ ...doubled, step: 0 }), null);
	});

	it("recognises a desugared collection loop", () => {
		const loop: SourceLoop = {
			kind: "while",
			cond: binop("<", ident("_g"), { kind: "field", target: ident("arr"), field: "length" }),
			doWhile: false,
			body: [
				{ kind: "varDecl", name: "v", init: { kind: "index", target: ident("arr"), index: ident("_g") } },
				{ kind: "increment", target: "_g", delta: 1 },
				{ kind: "exprStmt", expr: { kind: "call", callee: "show", args: [ident("v")] } },
			],
		};
		assert.deepEqual(recognizeIteration(loop), {
			variable: "v",
			source: { kind: "collection", collection: ident("arr") },
			body: [{ kind: "exprStmt", expr: { kind: "call", callee: "show", args: [ident("v")] } }],
		});
	});

	it("reads a desugared collection loop with a later start as a range from that start", () => {
		const loop: SourceLoop = {
			kind: "while",
			cond: binop("<", ident("i"), arrLength),
			doWhile: false,
			body: [
				{ kind: "varDecl", name: "x", init: { kind: "index", target: ident("arr"), index: ident("i") } },
				{ kind: "increment", target: "i", delta: 1 },
				{ kind: "exprStmt", expr: { kind: "call", callee: "print", args: [ident("x")] } },
			],
		};
		assert.deepEqual(analyzeLoop(loop, facts([{ name: "i", value: sconst(2) }]))?.intent, {
			kind: "range",
			variable: "i",
			start: sconst(2),
			end: arrLength,
			step: 1,
			inclusive: false,
			body: [
				{ kind: "varDecl", name: "x", init: { kind: "index", target: ident("arr"), index: ident("i") } },
				{ kind: "exprStmt", expr: { kind: "call", callee: "print", args: [ident("x")] } },
			],
		});
	});

	it("keeps a loop whose body moves its bound as a while loop", () => {
		const shrinking: SourceLoop = {
			kind: "while",
			cond: binop("<", ident("i"), ident("n")),
			doWhile: false,
			body: [
				{ kind: "assign", target: "n", value: binop("-", ident("n"), sconst(1)) },
				{ kind: "increment", target: "i", delta: 1 },
			],
		};
		assert.equal(recognizeIteration(shrinking), null);
		const detection = analyzeLoop(shrinking);
		assert.equal(detection?.detector, "while");
		assert.equal(detection?.confidence, 0.4);
	});

	it("does not read a loop that grows its own collection as a collection loop", () => {
		const growing: SourceLoop = {
			kind: "while",
			cond: binop("<", ident("_g"), arrLength),
			doWhile: false,
			body: [
				{ kind: "varDecl", name: "v", init: { kind: "index", target: ident("arr"), index: ident("_g") } },
				{ kind: "increment", target: "_g", delta: 1 },
				{ kind: "push", target: "arr", value: ident("v") },
			],
		};
		assert.equal(recognizeIteration(growing), null);
		assert.equal(analyzeLoop(growing)?.detector, "while");
	});
});

//==============================================================================
// Indexed Iteration
//==============================================================================

describe("indexed detection", () => {
	const element: SourceStmt = {
		kind: "varDecl",
		name: "x",
		init: { kind: "index", target: ident("arr"), index: ident("i") },
	};
	const show: SourceStmt = {
		kind: "exprStmt",
		expr: { kind: "call", callee: "show", args: [ident("i"), ident("x")] },
	};

	it("reads a walk over every index that loads the element first", () => {
		const loop: SourceLoop = {
			kind: "forRange",
			variable: "i",
			start: sconst(0),
			end: arrLength,
			inclusive: false,
			body: [element, show],
		};
		assert.deepEqual(analyzeLoop(loop), {
			intent: { kind: "indexed", variable: "x", index: "i", collection: ident("arr"), body: [show] },
			confidence: 0.9,
			detector: "indexed",
		});
	});

	it("accepts an inclusive end one before the length", () => {
		const loop: SourceLoop = {
			kind: "forRange",
			variable: "i",
			start: sconst(0),
			end: binop("-", arrLength, sconst(1)),
			inclusive: true,
			body: [element, show],
		};
		assert.equal(analyzeLoop(loop)?.detector, "indexed");
	});

	it("uses the known value of the collection", () => {
		const items: SourceExpr = { kind: "arrayLit", elements: [sconst(1), sconst(2)] };
		const loop: SourceLoop = {
			kind: "forRange",
			variable: "i",
			start: sconst(0),
			end: arrLength,
			inclusive: false,
			body: [element, show],
		};
		const detection = analyzeLoop(loop, facts([{ name: "arr", value: items }]));
		assert.deepEqual(detection?.intent, { kind: "indexed", variable: "x", index: "i", collection: items, body: [show] });
	});

	it("ignores a walk that starts past the first element", () => {
		const loop: SourceLoop = {
			kind: "forRange",
			variable: "i",
			start: sconst(1),
			end: arrLength,
			inclusive: false,
			body: [element, show],
		};
		assert.equal(analyzeLoop(loop)?.detector, "range");
	});

	it("ignores a body that writes the collection", () => {
		const loop: SourceLoop = {
			kind: "forRange",
			variable: "i",
			start: sconst(0),
			end: arrLength,
			inclusive: false,
			body: [element, { kind: "push", target: "arr", value: ident("x") }],
		};
		assert.equal(indexedDetector.detect(loop, facts()), null);
	});
});

//==============================================================================
// Accumulation
//==============================================================================

describe("accumulation detection", () => {
	it("reads an unguarded push as a map", () => {
		const detection = analyzeLoop(doubled, facts([{ name: "result", value: { kind: "arrayLit", elements: [] } }]));
		assert.ok(detection !== null);
		assert.equal(detection.detector, "accumulation");
		assert.equal(detection.confidence, 0.95);
		assert.equal(detection.intent.kind, "map");
		assert.ok(detection.intent.kind === "map");
		assert.equal(detection.intent.result, "result");
		assert.equal(detection.intent.resultKnownEmpty, true);
	});

	it("reads a guarded push of the loop variable as a filter", () => {
		const loop: SourceLoop = {
			...doubled,
			body: [{ kind: "if", cond: binop(">", ident("x"), sconst(2)), then: [{ kind: "push", target: "out", value: ident("x") }] }],
		};
		const detection = analyzeLoop(loop);
		assert.ok(detection !== null && detection.intent.kind === "filter");
		assert.deepEqual(detection.intent.predicate, binop(">", ident("x"), sconst(2)));
		assert.equal(detection.intent.resultKnownEmpty, false);
	});

	it("reads a guarded push of another value as a comprehension", () => {
		const guard = binop("==", binop("%", ident("x"), sconst(2)), sconst(0));
		const loop: SourceLoop = {
			...doubled,
			body: [{ kind: "if", cond: guard, then: [{ kind: "push", target: "result", value: binop("*", ident("x"), sconst(2)) }] }],
		};
		const detection = analyzeLoop(loop);
		assert.ok(detection !== null && detection.intent.kind === "comprehension");
		assert.deepEqual(detection.intent.filters, [guard]);
	});

	it("does not fold an if with an else branch", () => {
		const loop: SourceLoop = {
			...doubled,
			body: [{
				kind: "if",
				cond: ident("x"),
				then: [{ kind: "push", target: "a", value: ident("x") }],
				else: [{ kind: "push", target: "b", value: ident("x") }],
			}],
		};
		assert.equal(analyzeLoop(loop)?.detector, "range");
	});

	it("reads a compound assignment as a reduce", () => {
		const loop: SourceLoop = {
			kind: "forEach",
			variable: "n",
			collection: ident("items"),
			body: [{ kind: "compoundAssign", target: "total", op: "+", value: ident("n") }],
		};
		const detection = analyzeLoop(loop);
		assert.ok(detection !== null);
		assert.deepEqual(detection.intent, {
			kind: "reduce",
			variable: "n",
			source: { kind: "collection", collection: ident("items") },
			accumulator: "total",
			update: binop("+", ident("total"), ident("n")),
		});
	});

	it("requires a plain assignment to read its own target", () => {
		const loop: SourceLoop = {
			kind: "forEach",
			variable: "n",
			collection: ident("items"),
			body: [{ kind: "assign", target: "last", value: ident("n") }],
		};
		assert.equal(analyzeLoop(loop)?.detector, "collection");
	});
});

//==============================================================================
// Winner Selection
//==============================================================================

describe("analyzeLoop", () => {
	it("lists every detection in declaration order", () => {
		assert.deepEqual(detectAll(doubled).map((d) => d.detector), ["accumulation", "range"]);
	});

	it("gives ties to the detector declared first", () => {
		const make = (name: string): LoopDetector => ({
			name,
			detect: () => ({ intent: { kind: "while", cond: sconst(true), body: [] }, confidence: 0.5, detector: name }),
		});
		assert.equal(analyzeLoop(doubled, facts(), [make("first"), make("second")])?.detector, "first");
	});

	it("returns null when nothing fires", () => {
		assert.equal(analyzeLoop(doubled, facts(), []), null);
	});
});
