// SPDX-License-Identifier: MIT
// Reforge Pipeline Diagnostics
// Findings about the pass list and the run that are reported, never fatal
// (unless the runner is configured to fail fast on pass failures).

export const DiagnosticCodes = {
	DuplicatePass: "DuplicatePass",
	MissingDependency: "MissingDependency",
	DependencyCycle: "DependencyCycle",
	UnknownOverride: "UnknownOverride",
	PassFailed: "PassFailed",
} as const;

export type DiagnosticCode = (typeof DiagnosticCodes)[keyof typeof DiagnosticCodes];

export interface PipelineDiagnostic {
	code: DiagnosticCode;
	message: string;
	/** Pass the finding is about, when there is one */
	pass?: string | undefined;
}

export type DiagnosticSink = (diagnostic: PipelineDiagnostic) => void;

const REGISTRY_CODES: ReadonlySet<DiagnosticCode> = new Set([
	DiagnosticCodes.DuplicatePass,
	DiagnosticCodes.MissingDependency,
	DiagnosticCodes.DependencyCycle,
	DiagnosticCodes.UnknownOverride,
]);

/**
 * One line per diagnostic: `[PassRegistry] DuplicatePass: ...` for findings
 * about the pass list, `[Pipeline] PassFailed: ...` for findings from a run.
 */
export function formatDiagnostic(d: PipelineDiagnostic): string {
	const component = REGISTRY_CODES.has(d.code) ? "PassRegistry" : "Pipeline";
	return `[${component}] ${d.code}: ${d.message}`;
}

/** Writes each diagnostic to the developer log. */
export const consoleSink: DiagnosticSink = (d) => {
	console.warn(formatDiagnostic(d));
};

export interface CollectingSink {
	sink: DiagnosticSink;
	readonly diagnostics: readonly PipelineDiagnostic[];
	/** Formatted lines, in arrival order */
	lines(): string[];
}

/** Keeps diagnostics in memory; for tests and tooling. */
export function collectingSink(): CollectingSink {
	const diagnostics: PipelineDiagnostic[] = [];
	return {
		sink: (d) => {
			diagnostics.push(d);
		},
		diagnostics,
		lines: () => diagnostics.map(formatDiagnostic),
	};
}
