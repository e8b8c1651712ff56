/**
 * Wait-For Graph Builder.
 *
 * Derives the process → process wait-for graph from a registry snapshot.
 * Process P waits for Q when P has a positive outstanding request for a
 * resource of which Q holds at least one unit. Several such resources
 * between the same pair collapse into one edge.
 */

import type { RegistrySnapshot, WaitForEdge, WaitForGraph } from "./types.js";

/**
 * Build the wait-for graph. Pure: the snapshot is only read.
 *
 * Every registered process is a node, indexed by registration order, so
 * processes without outstanding requests appear with no outgoing edges.
 */
export function buildWaitForGraph(snapshot: RegistrySnapshot): WaitForGraph {
	const nodes = snapshot.processOrder;
	const processes = nodes.map((pid) => snapshot.processes[pid]);

	// resource → indices of processes holding at least one unit
	const holders = new Map<string, number[]>();
	processes.forEach((p, index) => {
		for (const [rid, held] of Object.entries(p.allocated)) {
			if (held <= 0) continue;
			const list = holders.get(rid);
			if (list) list.push(index);
			else holders.set(rid, [index]);
		}
	});

	const blocking = processes.map((p, from) => {
		const targets = new Map<number, string[]>();
		for (const [rid, wanted] of Object.entries(p.requesting)) {
			if (wanted <= 0) continue;
			for (const to of holders.get(rid) ?? []) {
				if (to === from) continue;
				const resources = targets.get(to);
				if (resources) resources.push(rid);
				else targets.set(to, [rid]);
			}
		}
		return targets;
	});

	const adjacency = blocking.map((targets) => [...targets.keys()].sort((a, b) => a - b));

	return { nodes, adjacency, blocking };
}

/**
 * Flatten a graph into `{ from, to, resources }` records for display or
 * JSON transport, ordered by source then target index.
 */
export function waitForEdges(graph: WaitForGraph): WaitForEdge[] {
	const edges: WaitForEdge[] = [];
	graph.adjacency.forEach((targets, from) => {
		for (const to of targets) {
			edges.push({
				from: graph.nodes[from],
				to: graph.nodes[to],
				resources: graph.blocking[from].get(to) ?? [],
			});
		}
	});
	return edges;
}
