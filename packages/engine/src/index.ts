// @avarodha/engine: Allocation state, deadlock detection and avoidance
export { AllocationMonitor } from "./monitor.js";
export type { MonitorEvents, MonitorOptions, WaitForGraphView } from "./monitor.js";

export { EntityRegistry, assertCount } from "./registry.js";
export type { ProcessRecord, ResourceRecord } from "./registry.js";
export { request, release } from "./allocation.js";
export type { RequestOutcome } from "./allocation.js";
export { CriticalSection } from "./critical-section.js";

// Analysis
export { buildWaitForGraph, waitForEdges } from "./wait-for.js";
export { detectCycles, canonicalCycleKey } from "./cycles.js";
export { checkSafety, isSafeState } from "./safety.js";

export type {
	CountRecord,
	DeadlockInfo,
	DeadlockReport,
	ProcessSnapshot,
	RegistrySnapshot,
	ResourceSnapshot,
	SafetyVerdict,
	WaitForEdge,
	WaitForGraph,
} from "./types.js";
