// SPDX-License-Identifier: MIT
// Reforge Pass Registry / Scheduler
// Resolves a declared pass list into a run order:
//   1. deduplicate by name (first declaration wins)
//   2. resolve runAfter edges (dangling edges are diagnosed and ignored)
//   3. drop the edge that closes each dependency cycle (DFS, declaration order)
//   4. stable topological sort (Kahn, smallest declaration index first)
// Disabled passes keep their place in the graph so that the order of the
// others does not depend on enablement.

import { DiagnosticCodes, consoleSink, type DiagnosticSink } from "./diagnostics.ts";
import type { PassDescriptor } from "./pass.ts";

//==============================================================================
// Types
//==============================================================================

export interface ScheduledPass {
	descriptor: PassDescriptor;
	/** Effective enablement after overrides */
	enabled: boolean;
	/** Declaration position after deduplication */
	index: number;
	/** runAfter edges that survived resolution and cycle breaking */
	after: string[];
}

/** Edge `from` runs after `to`, removed to break a cycle. */
export interface DroppedEdge {
	from: string;
	to: string;
	/** The cycle the edge closed, e.g. ["a", "b", "a"] */
	cycle: string[];
}

export interface Schedule {
	passes: ScheduledPass[];
	dropped: DroppedEdge[];
}

export interface ScheduleOptions {
	/** Pass name -> enabled */
	overrides?: Readonly<Record<string, boolean>> | undefined;
	diagnostics?: DiagnosticSink | undefined;
}

interface Node {
	descriptor: PassDescriptor;
	index: number;
	after: string[];
}

//==============================================================================
// Resolution
//==============================================================================

function dedupe(descriptors: readonly PassDescriptor[], report: DiagnosticSink): Map<string, Node> {
	const nodes = new Map<string, Node>();
	for (const descriptor of descriptors) {
		const existing = nodes.get(descriptor.name);
		if (existing !== undefined) {
			report({
				code: DiagnosticCodes.DuplicatePass,
				message: `duplicate pass "${descriptor.name}" ignored; keeping the one declared at position ${String(existing.index)}`,
				pass: descriptor.name,
			});
			continue;
		}
		nodes.set(descriptor.name, { descriptor, index: nodes.size, after: [] });
	}
	return nodes;
}

function resolveEdges(nodes: Map<string, Node>, report: DiagnosticSink): void {
	for (const node of nodes.values()) {
		for (const dep of node.descriptor.runAfter ?? []) {
			if (!nodes.has(dep)) {
				report({
					code: DiagnosticCodes.MissingDependency,
					message: `pass "${node.descriptor.name}" runs after unknown pass "${dep}"; edge ignored`,
					pass: node.descriptor.name,
				});
				continue;
			}
			if (!node.after.includes(dep)) node.after.push(dep);
		}
	}
}

/**
 * Depth-first walk over runAfter edges in declaration order. An edge to a
 * node still on the stack closes a cycle and is removed.
 */
function breakCycles(nodes: Map<string, Node>, report: DiagnosticSink): DroppedEdge[] {
	const dropped: DroppedEdge[] = [];
	const visited = new Set<string>();
	const onStack = new Set<string>();

	const dfs = (node: Node, path: string[]): void => {
		const name = node.descriptor.name;
		visited.add(name);
		onStack.add(name);
		for (const dep of [...node.after]) {
			if (onStack.has(dep)) {
				const cycle = [...path.slice(path.indexOf(dep)), dep];
				node.after = node.after.filter((d) => d !== dep);
				dropped.push({ from: name, to: dep, cycle });
				report({
					code: DiagnosticCodes.DependencyCycle,
					message: `cycle ${cycle.join(" -> ")}; dropped edge ${name} -> ${dep}`,
					pass: name,
				});
				continue;
			}
			const target = nodes.get(dep);
			if (target !== undefined && !visited.has(dep)) dfs(target, [...path, dep]);
		}
		onStack.delete(name);
	};

	for (const node of nodes.values()) {
		if (!visited.has(node.descriptor.name)) dfs(node, [node.descriptor.name]);
	}
	return dropped;
}

/** Kahn's algorithm; among ready passes the earliest declared goes first. */
function topologicalOrder(nodes: Map<string, Node>): Node[] {
	const pending = new Map<string, number>();
	const dependents = new Map<string, string[]>();
	for (const node of nodes.values()) {
		pending.set(node.descriptor.name, node.after.length);
		for (const dep of node.after) {
			const list = dependents.get(dep) ?? [];
			list.push(node.descriptor.name);
			dependents.set(dep, list);
		}
	}

	const ordered: Node[] = [];
	const ready: Node[] = [...nodes.values()].filter((n) => n.after.length === 0);
	while (ready.length > 0) {
		ready.sort((a, b) => a.index - b.index);
		const next = ready.shift();
		if (next === undefined) break;
		ordered.push(next);
		for (const name of dependents.get(next.descriptor.name) ?? []) {
			const left = (pending.get(name) ?? 0) - 1;
			pending.set(name, left);
			const node = nodes.get(name);
			if (left === 0 && node !== undefined) ready.push(node);
		}
	}
	return ordered;
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Build the run order for a pass list. Deterministic: the same list and
 * overrides always give the same schedule.
 */
export function buildSchedule(descriptors: readonly PassDescriptor[], options: ScheduleOptions = {}): Schedule {
	const report = options.diagnostics ?? consoleSink;
	const overrides = options.overrides ?? {};

	const nodes = dedupe(descriptors, report);
	for (const name of Object.keys(overrides)) {
		if (!nodes.has(name)) {
			report({
				code: DiagnosticCodes.UnknownOverride,
				message: `config names unknown pass "${name}"`,
				pass: name,
			});
		}
	}
	resolveEdges(nodes, report);
	const dropped = breakCycles(nodes, report);

	const passes = topologicalOrder(nodes).map((node): ScheduledPass => ({
		descriptor: node.descriptor,
		enabled: Object.hasOwn(overrides, node.descriptor.name)
			? overrides[node.descriptor.name] ?? node.descriptor.enabled
			: node.descriptor.enabled,
		index: node.index,
		after: node.after,
	}));
	return { passes, dropped };
}

/** Human-readable run order, one pass per line. */
export function describeSchedule(schedule: Schedule): string {
	return schedule.passes.map((p, i) => {
		const state = p.enabled ? "" : " [disabled]";
		const after = p.after.length > 0 ? ` (after ${p.after.join(", ")})` : "";
		return `${String(i + 1)}. ${p.descriptor.name}${state}${after}: ${p.descriptor.description}`;
	}).join("\n");
}
