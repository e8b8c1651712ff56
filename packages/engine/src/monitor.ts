/**
 * AllocationMonitor: the guarded entry point to allocation state.
 *
 * Owns an {@link EntityRegistry} by reference and routes every read and
 * write through one {@link CriticalSection}, including snapshot
 * construction. Analysis (wait-for graph, cycle detection, Banker's
 * check) runs on the copied snapshot after the section is released.
 *
 * `reset()` swaps in a fresh registry inside the section, so any caller
 * sees either the whole old registry or the whole new one.
 *
 * Events are emitted after the section is released, so listeners may call
 * back into the monitor.
 */

import { createEventBus, createLogger } from "@avarodha/core";
import type { EventBus, Logger } from "@avarodha/core";
import { release, request } from "./allocation.js";
import { CriticalSection } from "./critical-section.js";
import { detectCycles } from "./cycles.js";
import { EntityRegistry } from "./registry.js";
import { checkSafety, isSafeState } from "./safety.js";
import type { DeadlockReport, RegistrySnapshot, SafetyVerdict, WaitForEdge } from "./types.js";
import { buildWaitForGraph, waitForEdges } from "./wait-for.js";

// ─── Events ──────────────────────────────────────────────────────────────────

export interface MonitorEvents {
	"resource:added": { rid: string; total: number };
	"process:added": { pid: string };
	"demand:declared": { pid: string; rid: string; count: number };
	"request:granted": { pid: string; rid: string; count: number };
	"request:blocked": { pid: string; rid: string; count: number; requesting: number };
	"release": { pid: string; rid: string; requested: number; freed: number };
	"deadlock:detected": { cycles: readonly (readonly string[])[] };
	"reset": { resources: number; processes: number };
}

export interface MonitorOptions {
	/** Logger for mutation and deadlock messages. Default: `createLogger("engine:monitor")`. */
	logger?: Logger;
}

/** JSON-friendly view of the wait-for graph. */
export interface WaitForGraphView {
	nodes: readonly string[];
	edges: WaitForEdge[];
}

// ─── Monitor ─────────────────────────────────────────────────────────────────

/**
 * @example
 * ```ts
 * const monitor = new AllocationMonitor();
 * monitor.addResource("R1", 1);
 * monitor.addProcess("P1");
 * monitor.request("P1", "R1", 1); // true
 * monitor.detectDeadlock();       // { hasDeadlock: false, cycles: [], witnesses: [] }
 * ```
 */
export class AllocationMonitor {
	readonly events: EventBus<MonitorEvents> = createEventBus<MonitorEvents>();

	private registry = new EntityRegistry();
	private readonly section = new CriticalSection("allocation-registry");
	private readonly log: Logger;

	constructor(opts: MonitorOptions = {}) {
		this.log = opts.logger ?? createLogger("engine:monitor");
	}

	// ─── Registration ─────────────────────────────────────────────────

	addResource(rid: string, total: number): void {
		this.section.run(() => this.registry.addResource(rid, total));
		this.log.debug("resource added", { rid, total });
		this.events.emit("resource:added", { rid, total });
	}

	addProcess(pid: string): void {
		this.section.run(() => this.registry.addProcess(pid));
		this.log.debug("process added", { pid });
		this.events.emit("process:added", { pid });
	}

	setMaxDemand(pid: string, rid: string, count: number): void {
		this.section.run(() => this.registry.setMaxDemand(pid, rid, count));
		this.log.debug("max demand declared", { pid, rid, count });
		this.events.emit("demand:declared", { pid, rid, count });
	}

	// ─── Allocation ───────────────────────────────────────────────────

	/**
	 * Request `count` units of `rid` for `pid`.
	 *
	 * @returns `true` if granted immediately, `false` if recorded as waiting.
	 */
	request(pid: string, rid: string, count: number): boolean {
		const outcome = this.section.run(() => request(this.registry, pid, rid, count));
		if (outcome.granted) {
			this.log.debug("request granted", { pid, rid, count });
			this.events.emit("request:granted", { pid, rid, count });
		} else {
			this.log.debug("request blocked", { pid, rid, count, requesting: outcome.requesting });
			this.events.emit("request:blocked", { pid, rid, count, requesting: outcome.requesting });
		}
		return outcome.granted;
	}

	/**
	 * Release up to `count` units of `rid` held by `pid`.
	 *
	 * @returns The number of units actually freed.
	 */
	release(pid: string, rid: string, count: number): number {
		const freed = this.section.run(() => release(this.registry, pid, rid, count));
		this.log.debug("released", { pid, rid, requested: count, freed });
		this.events.emit("release", { pid, rid, requested: count, freed });
		return freed;
	}

	// ─── Reads & Analysis ─────────────────────────────────────────────

	snapshot(): RegistrySnapshot {
		return this.section.run(() => this.registry.snapshot());
	}

	/** Find every cycle in the current wait-for graph. */
	detectDeadlock(): DeadlockReport {
		const report = detectCycles(buildWaitForGraph(this.snapshot()));
		if (report.hasDeadlock) {
			this.log.warn("deadlock detected", { cycles: report.cycles });
			this.events.emit("deadlock:detected", { cycles: report.cycles });
		}
		return report;
	}

	/** Would granting `count` units of `rid` to `pid` keep the system safe? */
	checkSafety(pid: string, rid: string, count: number): SafetyVerdict {
		return checkSafety(this.snapshot(), pid, rid, count);
	}

	/** Is the current state safe, with no further grant? */
	isSafeState(): SafetyVerdict {
		return isSafeState(this.snapshot());
	}

	waitForGraph(): WaitForGraphView {
		const graph = buildWaitForGraph(this.snapshot());
		return { nodes: graph.nodes, edges: waitForEdges(graph) };
	}

	// ─── Lifecycle ────────────────────────────────────────────────────

	/** Atomically replace the registry with an empty one. */
	reset(): void {
		const previous = this.section.run(() => {
			const old = this.registry;
			this.registry = new EntityRegistry();
			return old;
		});
		const cleared = { resources: previous.resourceCount, processes: previous.processCount };
		this.log.info("registry reset", cleared);
		this.events.emit("reset", cleared);
	}
}
