// SPDX-License-Identifier: MIT
// Reforge Error Types
// Error domain for configuration, AST interchange and pass failures

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Configuration errors
	InvalidConfig: "InvalidConfig",

	// Interchange errors
	InvalidAst: "InvalidAst",

	// Pipeline errors
	PassFailed: "PassFailed",

	// Loop lowering
	UnsupportedLoop: "UnsupportedLoop",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// Reforge Error Class
//==============================================================================

export class ReforgeError extends Error {
	readonly code: ErrorCode;
	readonly pass?: string;

	constructor(code: ErrorCode, message: string, pass?: string) {
		super(message);
		this.name = "ReforgeError";
		this.code = code;
		if (pass !== undefined) this.pass = pass;
	}

	/**
	 * Create an InvalidConfig error
	 */
	static invalidConfig(path: string, message: string): ReforgeError {
		return new ReforgeError(
			ErrorCodes.InvalidConfig,
			"Invalid pipeline config at " + path + ": " + message,
		);
	}

	/**
	 * Create an InvalidAst error
	 */
	static invalidAst(path: string, message: string): ReforgeError {
		return new ReforgeError(
			ErrorCodes.InvalidAst,
			"Invalid AST at " + path + ": " + message,
		);
	}

	/**
	 * Create a PassFailed error, keeping the original cause message
	 */
	static passFailed(pass: string, cause: unknown): ReforgeError {
		const detail = cause instanceof Error ? cause.message : String(cause);
		return new ReforgeError(
			ErrorCodes.PassFailed,
			"Pass " + pass + " failed: " + detail,
			pass,
		);
	}

	static unsupportedLoop(reason: string): ReforgeError {
		return new ReforgeError(ErrorCodes.UnsupportedLoop, "Unsupported loop: " + reason);
	}
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/** Compile-time check that every variant of a closed union was handled. */
export function exhaustive(value: never): never {
	throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
