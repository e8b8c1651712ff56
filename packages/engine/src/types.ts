/**
 * @avarodha/engine: Allocation state and analysis types.
 *
 * Live records use Maps and are owned by the {@link EntityRegistry}. Every
 * value handed to callers is a frozen plain-object snapshot that serialises
 * to JSON unchanged.
 */

// ─── Snapshots ──────────────────────────────────────────────────────────────

/** Resource → unit count. Absent keys mean zero. */
export type CountRecord = Readonly<Record<string, number>>;

export interface ResourceSnapshot {
	readonly id: string;
	readonly total: number;
	readonly available: number;
}

export interface ProcessSnapshot {
	readonly id: string;
	readonly allocated: CountRecord;
	/** Outstanding demand that could not be granted yet. */
	readonly requesting: CountRecord;
	/** Declared upper bound, read only by the safety oracle. */
	readonly maxDemand: CountRecord;
}

/**
 * Immutable copy of the whole registry.
 *
 * `resourceOrder` and `processOrder` carry registration order explicitly:
 * object key order is not reliable for IDs such as `"1"` or `"2"`. A
 * process's position in `processOrder` is its stable integer index.
 */
export interface RegistrySnapshot {
	readonly resources: Readonly<Record<string, ResourceSnapshot>>;
	readonly processes: Readonly<Record<string, ProcessSnapshot>>;
	readonly resourceOrder: readonly string[];
	readonly processOrder: readonly string[];
}

// ─── Wait-For Graph ─────────────────────────────────────────────────────────

/**
 * Directed process → process graph. Node `i` is `nodes[i]`; an edge
 * `i → j` means process `i` waits on a resource that `j` holds.
 */
export interface WaitForGraph {
	readonly nodes: readonly string[];
	/** Outgoing targets per node, ascending by index, no duplicates. */
	readonly adjacency: readonly (readonly number[])[];
	/** Per node: target index → resources that cause the edge. */
	readonly blocking: readonly ReadonlyMap<number, readonly string[]>[];
}

export interface WaitForEdge {
	readonly from: string;
	readonly to: string;
	readonly resources: readonly string[];
}

// ─── Analysis Results ───────────────────────────────────────────────────────

/** One deadlock cycle and the resources blocking along it. */
export interface DeadlockInfo {
	readonly cycle: readonly string[];
	readonly resources: readonly string[];
}

export interface DeadlockReport {
	/** True iff `cycles` is non-empty. */
	readonly hasDeadlock: boolean;
	readonly cycles: readonly (readonly string[])[];
	/** `witnesses[i]` describes `cycles[i]`. */
	readonly witnesses: readonly DeadlockInfo[];
}

export interface SafetyVerdict {
	readonly safe: boolean;
	/** A completion order proving safety; empty when unsafe. */
	readonly sequence: readonly string[];
}
