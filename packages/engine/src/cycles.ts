/**
 * Cycle Detector: finds every deadlock cycle in a wait-for graph.
 *
 * Iterative DFS with three colours (white = unvisited, gray = on the
 * traversal stack, black = fully explored). The traversal stack is an
 * explicit array of node indices, so an edge into a gray node yields its
 * cycle as a slice of that array: from the re-entered node to the top.
 * Edges into black nodes are skipped. Roots are tried in registration
 * order so cycles in disconnected parts of the graph are found too.
 *
 * Reporting policy: cycles keep the orientation in which they were found
 * (first element = the re-entered node), and a cycle whose rotation
 * matches one already reported is dropped. Rotations are compared after
 * turning each cycle to start at its smallest ID.
 */

import type { DeadlockInfo, DeadlockReport, WaitForGraph } from "./types.js";

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/** Rotation-invariant key: the cycle rotated to start at its smallest ID. */
export function canonicalCycleKey(cycle: readonly string[]): string {
	if (cycle.length === 0) return "";
	let start = 0;
	for (let i = 1; i < cycle.length; i++) {
		if (cycle[i] < cycle[start]) start = i;
	}
	return [...cycle.slice(start), ...cycle.slice(0, start)].join("\u0000");
}

/**
 * Resources blocking along a cycle, in cycle order without repeats.
 */
function resourcesForCycle(graph: WaitForGraph, indices: readonly number[]): string[] {
	const seen = new Set<string>();
	for (let i = 0; i < indices.length; i++) {
		const from = indices[i];
		const to = indices[(i + 1) % indices.length];
		for (const rid of graph.blocking[from].get(to) ?? []) {
			seen.add(rid);
		}
	}
	return [...seen];
}

/**
 * Detect all deadlock cycles.
 *
 * @returns `hasDeadlock` (true iff any cycle exists), the cycles as
 * ordered process-ID lists, and one {@link DeadlockInfo} per cycle.
 *
 * @example
 * ```ts
 * const report = detectCycles(buildWaitForGraph(registry.snapshot()));
 * if (report.hasDeadlock) console.log(report.cycles[0]); // ["P1", "P2"]
 * ```
 */
export function detectCycles(graph: WaitForGraph): DeadlockReport {
	const n = graph.nodes.length;
	const color = new Uint8Array(n);
	/** Next adjacency position to explore, per node. */
	const cursor = new Uint32Array(n);
	/** Position of a gray node on the stack; -1 otherwise. */
	const stackPos = new Int32Array(n).fill(-1);
	const stack: number[] = [];

	const witnesses: DeadlockInfo[] = [];
	const reported = new Set<string>();

	const push = (node: number): void => {
		color[node] = GRAY;
		stackPos[node] = stack.length;
		stack.push(node);
	};

	for (let root = 0; root < n; root++) {
		if (color[root] !== WHITE) continue;
		push(root);

		while (stack.length > 0) {
			const node = stack[stack.length - 1];
			const targets = graph.adjacency[node];

			if (cursor[node] >= targets.length) {
				// Done exploring this node
				color[node] = BLACK;
				stackPos[node] = -1;
				stack.pop();
				continue;
			}

			const next = targets[cursor[node]];
			cursor[node]++;

			if (color[next] === GRAY) {
				const indices = stack.slice(stackPos[next]);
				const cycle = indices.map((i) => graph.nodes[i]);
				const key = canonicalCycleKey(cycle);
				if (!reported.has(key)) {
					reported.add(key);
					witnesses.push({ cycle, resources: resourcesForCycle(graph, indices) });
				}
			} else if (color[next] === WHITE) {
				push(next);
			}
		}
	}

	return {
		hasDeadlock: witnesses.length > 0,
		cycles: witnesses.map((w) => w.cycle),
		witnesses,
	};
}
