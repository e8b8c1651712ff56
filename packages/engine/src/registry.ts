/**
 * Entity Registry: the canonical store of resources and processes.
 *
 * Owns both collections by ID. Records are created once and live until
 * the whole registry is discarded; there is no single-entity deletion.
 * Only the allocation functions touch `allocated` / `requesting`; only
 * {@link EntityRegistry.setMaxDemand} touches `maxDemand`.
 */

import {
	DuplicateEntityError,
	InvalidCountError,
	InvalidIdentifierError,
	UnknownEntityError,
} from "@avarodha/core";
import type { EntityKind } from "@avarodha/core";
import type { CountRecord, ProcessSnapshot, RegistrySnapshot, ResourceSnapshot } from "./types.js";

/** Live resource record. */
export interface ResourceRecord {
	readonly id: string;
	readonly total: number;
	available: number;
}

/** Live process record. `index` is assigned at registration and never changes. */
export interface ProcessRecord {
	readonly id: string;
	readonly index: number;
	readonly allocated: Map<string, number>;
	readonly requesting: Map<string, number>;
	readonly maxDemand: Map<string, number>;
}

/**
 * Throw {@link InvalidCountError} unless `value` is a non-negative integer.
 */
export function assertCount(label: string, value: number): void {
	if (!Number.isInteger(value) || value < 0) {
		throw new InvalidCountError(label, value);
	}
}

function assertId(kind: EntityKind, id: string): void {
	if (typeof id !== "string" || id.length === 0) {
		throw new InvalidIdentifierError(kind);
	}
}

function freezeCounts(m: Map<string, number>): CountRecord {
	return Object.freeze(Object.fromEntries(m));
}

export class EntityRegistry {
	private readonly resources = new Map<string, ResourceRecord>();
	private readonly processes = new Map<string, ProcessRecord>();

	/**
	 * Register a resource with `total` units, all of them available.
	 *
	 * @throws {InvalidIdentifierError} For an empty ID.
	 * @throws {InvalidCountError} For a negative or fractional total.
	 * @throws {DuplicateEntityError} If the ID is taken.
	 */
	addResource(id: string, total: number): ResourceRecord {
		assertId("resource", id);
		assertCount("total", total);
		if (this.resources.has(id)) {
			throw new DuplicateEntityError("resource", id);
		}
		const record: ResourceRecord = { id, total, available: total };
		this.resources.set(id, record);
		return record;
	}

	/**
	 * Register a process with empty allocation, request and demand maps.
	 *
	 * @throws {DuplicateEntityError} If the ID is taken.
	 */
	addProcess(id: string): ProcessRecord {
		assertId("process", id);
		if (this.processes.has(id)) {
			throw new DuplicateEntityError("process", id);
		}
		const record: ProcessRecord = {
			id,
			index: this.processes.size,
			allocated: new Map(),
			requesting: new Map(),
			maxDemand: new Map(),
		};
		this.processes.set(id, record);
		return record;
	}

	/**
	 * Declare the most units of `rid` that `pid` may ever hold.
	 *
	 * Neither the resource's existence nor its total is checked: a process
	 * may declare more than exists, or declare before the resource does.
	 */
	setMaxDemand(pid: string, rid: string, count: number): void {
		assertCount("count", count);
		const process = this.requireProcess(pid);
		process.maxDemand.set(rid, count);
	}

	/** @throws {UnknownEntityError} If the resource is not registered. */
	requireResource(rid: string): ResourceRecord {
		const record = this.resources.get(rid);
		if (!record) throw new UnknownEntityError("resource", rid);
		return record;
	}

	/** @throws {UnknownEntityError} If the process is not registered. */
	requireProcess(pid: string): ProcessRecord {
		const record = this.processes.get(pid);
		if (!record) throw new UnknownEntityError("process", pid);
		return record;
	}

	get resourceCount(): number {
		return this.resources.size;
	}

	get processCount(): number {
		return this.processes.size;
	}

	/** All processes in registration order. */
	processList(): ProcessRecord[] {
		return [...this.processes.values()];
	}

	/** Deep, frozen copy of every record. */
	snapshot(): RegistrySnapshot {
		const resources = Object.fromEntries(
			[...this.resources.values()].map((r): [string, ResourceSnapshot] => [
				r.id,
				Object.freeze({ id: r.id, total: r.total, available: r.available }),
			]),
		);
		const processes = Object.fromEntries(
			[...this.processes.values()].map((p): [string, ProcessSnapshot] => [
				p.id,
				Object.freeze({
					id: p.id,
					allocated: freezeCounts(p.allocated),
					requesting: freezeCounts(p.requesting),
					maxDemand: freezeCounts(p.maxDemand),
				}),
			]),
		);

		return Object.freeze({
			resources: Object.freeze(resources),
			processes: Object.freeze(processes),
			resourceOrder: Object.freeze([...this.resources.keys()]),
			processOrder: Object.freeze([...this.processes.keys()]),
		});
	}
}
