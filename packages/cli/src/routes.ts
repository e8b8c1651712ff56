/**
 * Allocation API routes.
 *
 * Mounts the monitor's operations on an {@link AvarodhaServer}. Request
 * bodies are validated into typed records before they reach the engine;
 * engine errors are mapped to HTTP statuses by their `code`.
 */

import { AvarodhaError, assertValid, v } from "@avarodha/core";
import type { AllocationMonitor, RegistrySnapshot, WaitForEdge } from "@avarodha/engine";
import type { AvarodhaServer, ParsedRequest, RouteResponse } from "./http-server.js";

// ─── Request Records ─────────────────────────────────────────────────────────

const idV = v.string().min(1).validate;
const countV = v.optional(v.number().integer().min(0).validate).validate;

const addResourceV = v.object({ rid: idV, total: countV }).validate;
const addProcessV = v.object({ pid: idV }).validate;
const maxDemandV = v.object({ pid: idV, rid: idV, count: v.number().integer().min(0).validate }).validate;
const unitsV = v.object({ pid: idV, rid: idV, count: countV }).validate;

// ─── Response Shapes ─────────────────────────────────────────────────────────

export interface AllocationEdge {
	resource: string;
	process: string;
	count: number;
}

/** Everything a visualisation layer needs to draw the allocation graph. */
export interface GraphView {
	resources: { id: string; total: number; available: number }[];
	processes: string[];
	/** resource → process: units held */
	allocations: AllocationEdge[];
	/** process → resource: units awaited */
	requests: AllocationEdge[];
	waitFor: WaitForEdge[];
}

/** HTTP status for an engine error code. */
export function statusForCode(code: string): number {
	switch (code) {
		case "VALIDATION_ERROR":
		case "INVALID_COUNT":
		case "INVALID_IDENTIFIER":
			return 400;
		case "UNKNOWN_ENTITY":
			return 404;
		case "DUPLICATE_ENTITY":
			return 409;
		default:
			return 500;
	}
}

/**
 * Build the resource-allocation view from a snapshot plus wait-for edges.
 */
export function toGraphView(snapshot: RegistrySnapshot, waitFor: WaitForEdge[]): GraphView {
	const allocations: AllocationEdge[] = [];
	const requests: AllocationEdge[] = [];
	for (const pid of snapshot.processOrder) {
		const p = snapshot.processes[pid];
		for (const [resource, count] of Object.entries(p.allocated)) {
			allocations.push({ resource, process: pid, count });
		}
		for (const [resource, count] of Object.entries(p.requesting)) {
			if (count > 0) requests.push({ resource, process: pid, count });
		}
	}
	return {
		resources: snapshot.resourceOrder.map((rid) => ({ ...snapshot.resources[rid] })),
		processes: [...snapshot.processOrder],
		allocations,
		requests,
		waitFor,
	};
}

type Handler = (req: ParsedRequest) => RouteResponse;

/** Run a synchronous handler, turning Avarodha errors into error responses. */
function guarded(handler: Handler): (req: ParsedRequest) => Promise<RouteResponse> {
	return async (req) => {
		try {
			return handler(req);
		} catch (err) {
			if (err instanceof AvarodhaError) {
				return { status: statusForCode(err.code), body: { ok: false, error: err.message, code: err.code } };
			}
			throw err;
		}
	};
}

/**
 * Register every allocation route on `server`.
 */
export function mountAllocationRoutes(server: AvarodhaServer, monitor: AllocationMonitor): void {
	server.route("GET", "/api/health", async () => ({
		status: 200,
		body: { status: "ok", uptime: server.uptime },
	}));

	server.route("GET", "/api/state", guarded(() => ({ status: 200, body: monitor.snapshot() })));

	server.route("GET", "/api/graph", guarded(() => {
		const snapshot = monitor.snapshot();
		return { status: 200, body: toGraphView(snapshot, monitor.waitForGraph().edges) };
	}));

	server.route("POST", "/api/add_resource", guarded((req) => {
		const { rid, total = 1 } = assertValid(req.body, addResourceV, "request body");
		monitor.addResource(rid, total);
		return { status: 200, body: { ok: true, rid, total } };
	}));

	server.route("POST", "/api/add_process", guarded((req) => {
		const { pid } = assertValid(req.body, addProcessV, "request body");
		monitor.addProcess(pid);
		return { status: 200, body: { ok: true, pid } };
	}));

	server.route("POST", "/api/set_max_demand", guarded((req) => {
		const { pid, rid, count } = assertValid(req.body, maxDemandV, "request body");
		monitor.setMaxDemand(pid, rid, count);
		return { status: 200, body: { ok: true } };
	}));

	server.route("POST", "/api/request", guarded((req) => {
		const { pid, rid, count = 1 } = assertValid(req.body, unitsV, "request body");
		const granted = monitor.request(pid, rid, count);
		return { status: 200, body: { ok: true, granted } };
	}));

	server.route("POST", "/api/release", guarded((req) => {
		const { pid, rid, count = 1 } = assertValid(req.body, unitsV, "request body");
		const freed = monitor.release(pid, rid, count);
		return { status: 200, body: { ok: true, freed } };
	}));

	server.route("GET", "/api/detect", guarded(() => {
		const report = monitor.detectDeadlock();
		return {
			status: 200,
			body: { ok: true, has_deadlock: report.hasDeadlock, cycles: report.cycles, witnesses: report.witnesses },
		};
	}));

	server.route("POST", "/api/banker_check", guarded((req) => {
		const { pid, rid, count = 1 } = assertValid(req.body, unitsV, "request body");
		const verdict = monitor.checkSafety(pid, rid, count);
		return { status: 200, body: { ok: true, safe: verdict.safe, safe_sequence: verdict.sequence } };
	}));

	server.route("POST", "/api/reset", guarded(() => {
		monitor.reset();
		return { status: 200, body: { ok: true } };
	}));
}
