// SPDX-License-Identifier: MIT
// Reforge Pipeline Configuration
// Explicit enablement overrides and run options, validated with zod.

import { readFile } from "node:fs/promises";
import { z } from "zod/v4";
import { ReforgeError } from "../errors.ts";

export interface PipelineConfig {
	/** Pass name -> enabled. Wins over the descriptor's own flag. */
	passes: Record<string, boolean>;
	/** Raise on the first failing pass instead of keeping the prior tree */
	failFast: boolean;
	/** Record which passes changed the tree */
	trace: boolean;
}

export const PipelineConfigSchema: z.ZodType<PipelineConfig> = z.strictObject({
	passes: z.record(z.string().min(1), z.boolean()).default({}),
	failFast: z.boolean().default(false),
	trace: z.boolean().default(false),
});

export const DEFAULT_CONFIG: PipelineConfig = { passes: {}, failFast: false, trace: false };

function issuePath(path: readonly PropertyKey[]): string {
	return path.length === 0 ? "<root>" : path.map(String).join(".");
}

/**
 * Validate a config value (e.g. parsed JSON). Missing fields take their
 * defaults; unknown top-level fields are rejected.
 */
export function parsePipelineConfig(input: unknown): PipelineConfig {
	const result = PipelineConfigSchema.safeParse(input ?? {});
	if (result.success) return result.data;
	const [first] = result.error.issues;
	throw ReforgeError.invalidConfig(
		first === undefined ? "<root>" : issuePath(first.path),
		first?.message ?? "invalid value",
	);
}

/** Read and validate a JSON config file. */
export async function loadPipelineConfig(path: string): Promise<PipelineConfig> {
	const text = await readFile(path, "utf8");
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (e) {
		throw ReforgeError.invalidConfig(path, e instanceof Error ? e.message : String(e));
	}
	return parsePipelineConfig(parsed);
}
