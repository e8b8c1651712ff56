import type { EventBus } from "./types.js";
import { createLogger } from "./observability/logger.js";

type ListenerTable<Events extends object> = {
	[K in keyof Events]?: Set<(data: Events[K]) => void>;
};

/**
 * Create a synchronous typed event emitter.
 *
 * A handler that throws is logged at ERROR; the remaining handlers still run.
 *
 * @example
 * ```ts
 * const bus = createEventBus<{ "request:granted": { pid: string } }>();
 * bus.on("request:granted", (data) => console.log(data.pid));
 * bus.emit("request:granted", { pid: "P1" });
 * ```
 */
export function createEventBus<Events extends object>(): EventBus<Events> {
	let listeners: ListenerTable<Events> = {};

	function on<K extends keyof Events>(event: K, handler: (data: Events[K]) => void): void {
		const existing = listeners[event];
		if (existing) {
			existing.add(handler);
		} else {
			listeners[event] = new Set([handler]);
		}
	}

	return {
		on,

		off<K extends keyof Events>(event: K, handler: (data: Events[K]) => void): void {
			listeners[event]?.delete(handler);
		},

		emit<K extends keyof Events>(event: K, data: Events[K]): void {
			const handlers = listeners[event];
			if (!handlers) return;
			for (const handler of [...handlers]) {
				try {
					handler(data);
				} catch (err) {
					createLogger("events").error(`Listener for "${String(event)}" threw`, err);
				}
			}
		},

		once<K extends keyof Events>(event: K, handler: (data: Events[K]) => void): void {
			const wrapper = (data: Events[K]): void => {
				listeners[event]?.delete(wrapper);
				handler(data);
			};
			on(event, wrapper);
		},

		removeAll(event?: keyof Events): void {
			if (event !== undefined) {
				delete listeners[event];
			} else {
				listeners = {};
			}
		},
	};
}
