// SPDX-License-Identifier: MIT
// Reforge Pipeline Configuration - Unit Tests

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { ErrorCodes, ReforgeError } from "../src/errors.ts";
import { DEFAULT_CONFIG, loadPipelineConfig, parsePipelineConfig } from "../src/pipeline/config.ts";

const isInvalidConfig = (pattern: RegExp) => (e: unknown): boolean =>
	e instanceof ReforgeError && e.code === ErrorCodes.InvalidConfig && pattern.test(e.message);

describe("parsePipelineConfig", () => {
	it("fills defaults for a missing config", () => {
		assert.deepEqual(parsePipelineConfig(undefined), DEFAULT_CONFIG);
		assert.deepEqual(parsePipelineConfig({}), DEFAULT_CONFIG);
	});

	it("keeps pass overrides and options", () => {
		assert.deepEqual(parsePipelineConfig({ passes: { flattenBlocks: false }, trace: true }), {
			passes: { flattenBlocks: false },
			failFast: false,
			trace: true,
		});
	});

	it("names the offending field", () => {
		assert.throws(() => parsePipelineConfig({ failFast: "yes" }), isInvalidConfig(/^Invalid pipeline config at failFast: /));
		assert.throws(
			() => parsePipelineConfig({ passes: { flattenBlocks: "off" } }),
			isInvalidConfig(/^Invalid pipeline config at passes\.flattenBlocks: /),
		);
	});

	it("rejects unknown top-level fields", () => {
		assert.throws(() => parsePipelineConfig({ verbose: true }), isInvalidConfig(/^Invalid pipeline config at <root>: /));
	});
});

describe("loadPipelineConfig", () => {
	let dir = "";

	before(async () => {
		dir = await mkdtemp(join(tmpdir(), "reforge-config-"));
	});

	after(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("reads and validates a JSON file", async () => {
		const path = join(dir, "ok.json");
		await writeFile(path, JSON.stringify({ passes: { privatizeHelpers: false }, failFast: true }));
		assert.deepEqual(await loadPipelineConfig(path), {
			passes: { privatizeHelpers: false },
			failFast: true,
			trace: false,
		});
	});

	it("reports malformed JSON as an invalid config at the file path", async () => {
		const path = join(dir, "broken.json");
		await writeFile(path, "{ passes: ");
		await assert.rejects(loadPipelineConfig(path), isInvalidConfig(/^Invalid pipeline config at .*broken\.json: /));
	});
});
