// SPDX-License-Identifier: MIT
// Reforge AST Canonicalization (JCS Profile)
// RFC 8785 serialization of target trees. Two trees are the same tree exactly
// when their canonical strings are equal, whatever order their keys were
// written in.

import { createHash } from "node:crypto";
import type { Expr } from "./types.ts";

//==============================================================================
// Serialization
//==============================================================================

const isPlainObject = (v: unknown): v is Record<string, unknown> =>
	typeof v === "object" && v !== null && !Array.isArray(v);

function writeNumber(n: number, out: string[]): void {
	if (!Number.isFinite(n)) {
		throw new Error(`Cannot canonicalize non-finite number ${n}`);
	}
	// -0 and 0 share one form
	out.push(n === 0 ? "0" : String(n));
}

function write(value: unknown, out: string[]): void {
	switch (typeof value) {
	case "undefined":
		out.push("null");
		return;
	case "boolean":
		out.push(String(value));
		return;
	case "number":
		writeNumber(value, out);
		return;
	case "string":
		out.push(JSON.stringify(value));
		return;
	case "object":
		break;
	default:
		throw new Error(`Cannot canonicalize a ${typeof value}`);
	}
	if (value === null) {
		out.push("null");
	} else if (Array.isArray(value)) {
		out.push("[");
		value.forEach((item: unknown, i) => {
			if (i > 0) out.push(",");
			write(item, out);
		});
		out.push("]");
	} else if (isPlainObject(value)) {
		// Absent and undefined-valued keys serialize alike
		const keys = Object.keys(value).filter((k) => value[k] !== undefined).sort();
		out.push("{");
		keys.forEach((k, i) => {
			if (i > 0) out.push(",");
			out.push(JSON.stringify(k), ":");
			write(value[k], out);
		});
		out.push("}");
	}
}

/** Canonical JSON text of any JSON-shaped value. */
export function jcsSerialize(value: unknown): string {
	const out: string[] = [];
	write(value, out);
	return out.join("");
}

//==============================================================================
// Trees
//==============================================================================

export function canonicalizeAst(ast: Expr): string {
	return jcsSerialize(ast);
}

/** `reforge-<algorithm>:<hex>` over the canonical text. */
export function astDigest(ast: Expr, algorithm = "sha256"): string {
	const hex = createHash(algorithm).update(canonicalizeAst(ast), "utf8").digest("hex");
	return `reforge-${algorithm}:${hex}`;
}
