/**
 * Allocation Engine: request and release against an {@link EntityRegistry}.
 *
 * Both operations validate every argument before touching state, so a
 * thrown error leaves the registry exactly as it was. After either call,
 * `available + Σ allocated == total` still holds for the resource.
 */

import type { EntityRegistry } from "./registry.js";
import { assertCount } from "./registry.js";

/** Add `delta` to `m[key]`, deleting the entry when it drops to zero. */
function adjust(m: Map<string, number>, key: string, delta: number): number {
	const next = Math.max(0, (m.get(key) ?? 0) + delta);
	if (next === 0) {
		m.delete(key);
	} else {
		m.set(key, next);
	}
	return next;
}

/** Outcome of {@link request}. */
export interface RequestOutcome {
	granted: boolean;
	/** Units of the resource still outstanding for the process afterwards. */
	requesting: number;
}

/**
 * Ask for `count` units of `rid` on behalf of `pid`.
 *
 * Granted when enough units are available: they move from the resource to
 * the process, and any earlier blocked request for the same resource is
 * reduced by `count` (floored at zero). Otherwise the demand is added to
 * the process's outstanding requests, which is what creates wait-for edges.
 *
 * @throws {UnknownEntityError} If `pid` or `rid` is not registered.
 * @throws {InvalidCountError} If `count` is negative or fractional.
 */
export function request(registry: EntityRegistry, pid: string, rid: string, count: number): RequestOutcome {
	assertCount("count", count);
	const process = registry.requireProcess(pid);
	const resource = registry.requireResource(rid);

	if (resource.available >= count) {
		resource.available -= count;
		adjust(process.allocated, rid, count);
		const requesting = adjust(process.requesting, rid, -count);
		return { granted: true, requesting };
	}

	const requesting = adjust(process.requesting, rid, count);
	return { granted: false, requesting };
}

/**
 * Return up to `count` units of `rid` held by `pid`.
 *
 * Releasing more than is held is not an error: only the held units move.
 *
 * @returns The number of units actually freed.
 * @throws {UnknownEntityError} If `pid` or `rid` is not registered.
 * @throws {InvalidCountError} If `count` is negative or fractional.
 */
export function release(registry: EntityRegistry, pid: string, rid: string, count: number): number {
	assertCount("count", count);
	const process = registry.requireProcess(pid);
	const resource = registry.requireResource(rid);

	const freed = Math.min(process.allocated.get(rid) ?? 0, count);
	adjust(process.allocated, rid, -freed);
	resource.available += freed;
	return freed;
}
