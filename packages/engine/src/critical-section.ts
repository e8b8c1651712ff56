/**
 * @avarodha/engine: Synchronous mutual exclusion for the registry.
 *
 * Node runs JavaScript on one thread, so a synchronous function can never
 * interleave with another caller. What can still go wrong is re-entry: a
 * callback invoked while the section is held calling back into it. The
 * section refuses that instead of letting the inner call observe a
 * half-applied change.
 */

import { ReentrancyError } from "@avarodha/core";

/**
 * A non-reentrant critical section around synchronous work.
 *
 * Bodies must be synchronous; a promise returned from a body would escape
 * the section before it settles.
 */
export class CriticalSection {
	private held = false;
	private entries = 0;

	constructor(private readonly name: string) {}

	/**
	 * Run `body` while holding the section.
	 *
	 * @throws {ReentrancyError} If the section is already held.
	 */
	run<T>(body: () => T): T {
		if (this.held) {
			throw new ReentrancyError(this.name);
		}
		this.held = true;
		this.entries++;
		try {
			return body();
		} finally {
			this.held = false;
		}
	}

	/** Whether a body is currently running. */
	get isHeld(): boolean {
		return this.held;
	}

	/** How many times the section has been entered. */
	get entryCount(): number {
		return this.entries;
	}
}
