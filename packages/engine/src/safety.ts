/**
 * Safety Oracle: Banker's Algorithm (Dijkstra, 1965) over a snapshot.
 *
 * Answers "would granting this request keep the system safe?" without
 * committing anything. Working matrices are built from the snapshot:
 *
 *   Available[r]     : unallocated units of resource r
 *   Allocation[p][r] : units of r held by process p
 *   Need[p][r]       : max(0, MaxDemand[p][r] − Allocation[p][r])
 *
 * Safe state check (O(n² · m) for n processes, m resources):
 *
 *   Work = Available
 *   repeat: for each unfinished p in registration order with Need[p] ≤ Work:
 *       Work += Allocation[p]; finish p; append p to the sequence
 *   until a pass finishes nobody
 *   safe ⇔ every process finished
 *
 * Only registered resources take part; a declared demand for a resource
 * that was never registered is ignored.
 */

import { UnknownEntityError } from "@avarodha/core";
import { assertCount } from "./registry.js";
import type { CountRecord, RegistrySnapshot, SafetyVerdict } from "./types.js";

// ─── Resource Vector Operations ──────────────────────────────────────────────

type Vector = Map<string, number>;

function countOf(record: CountRecord, resource: string): number {
	return Object.hasOwn(record, resource) ? record[resource] : 0;
}

/** True if `a[r] <= b[r]` for every resource r in `a`. */
function vectorLte(a: Vector, b: Vector): boolean {
	for (const [resource, amount] of a) {
		if (amount > (b.get(resource) ?? 0)) return false;
	}
	return true;
}

/** `target[r] += source[r]` for every r in `source`. */
function vectorAdd(target: Vector, source: Vector): void {
	for (const [resource, amount] of source) {
		target.set(resource, (target.get(resource) ?? 0) + amount);
	}
}

// ─── Working State ───────────────────────────────────────────────────────────

interface BankerMatrices {
	processes: readonly string[];
	available: Vector;
	allocation: Map<string, Vector>;
	need: Map<string, Vector>;
}

function buildMatrices(snapshot: RegistrySnapshot): BankerMatrices {
	const resources = snapshot.resourceOrder;
	const available: Vector = new Map(resources.map((r) => [r, snapshot.resources[r].available]));
	const allocation = new Map<string, Vector>();
	const need = new Map<string, Vector>();

	for (const pid of snapshot.processOrder) {
		const p = snapshot.processes[pid];
		const alloc: Vector = new Map();
		const remaining: Vector = new Map();
		for (const r of resources) {
			const held = countOf(p.allocated, r);
			alloc.set(r, held);
			remaining.set(r, Math.max(0, countOf(p.maxDemand, r) - held));
		}
		allocation.set(pid, alloc);
		need.set(pid, remaining);
	}

	return { processes: snapshot.processOrder, available, allocation, need };
}

/**
 * Run the fixed point. Every pass visits all unfinished processes in
 * registration order, so a process freed up mid-pass can still finish in
 * the same pass. Terminates after at most `processes.length` passes.
 */
function findSafeSequence(m: BankerMatrices): SafetyVerdict {
	const work = new Map(m.available);
	const finished = new Set<string>();
	const sequence: string[] = [];

	let progress = true;
	while (progress) {
		progress = false;
		for (const pid of m.processes) {
			if (finished.has(pid)) continue;
			const processNeed = m.need.get(pid);
			const processAlloc = m.allocation.get(pid);
			if (!processNeed || !processAlloc) continue;

			if (vectorLte(processNeed, work)) {
				vectorAdd(work, processAlloc);
				finished.add(pid);
				sequence.push(pid);
				progress = true;
			}
		}
	}

	const safe = finished.size === m.processes.length;
	return { safe, sequence: safe ? sequence : [] };
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Decide whether the current state, with no further grant, is safe.
 */
export function isSafeState(snapshot: RegistrySnapshot): SafetyVerdict {
	return findSafeSequence(buildMatrices(snapshot));
}

/**
 * Simulate granting `count` more units of `rid` to `pid` and decide
 * whether a safe sequence still exists.
 *
 * Returns unsafe with an empty sequence when `rid` is unknown or fewer than
 * `count` units are available. The snapshot is never modified.
 *
 * @throws {UnknownEntityError} If `pid` is not registered.
 * @throws {InvalidCountError} If `count` is negative or fractional.
 *
 * @example
 * ```ts
 * const { safe, sequence } = checkSafety(registry.snapshot(), "P2", "R1", 1);
 * ```
 */
export function checkSafety(snapshot: RegistrySnapshot, pid: string, rid: string, count: number): SafetyVerdict {
	assertCount("count", count);
	const m = buildMatrices(snapshot);
	const alloc = m.allocation.get(pid);
	const need = m.need.get(pid);
	if (!alloc || !need) {
		throw new UnknownEntityError("process", pid);
	}

	const avail = m.available.get(rid);
	if (avail === undefined || avail < count) {
		return { safe: false, sequence: [] };
	}

	// Tentative grant, on the working copies only
	m.available.set(rid, avail - count);
	alloc.set(rid, (alloc.get(rid) ?? 0) + count);
	need.set(rid, Math.max(0, (need.get(rid) ?? 0) - count));

	return findSafeSequence(m);
}
