/**
 * Factory wiring an {@link AllocationMonitor} into a ready-to-start server.
 */

import { AllocationMonitor } from "@avarodha/engine";
import { AvarodhaServer } from "./http-server.js";
import type { ServerConfig } from "./http-server.js";
import { mountAllocationRoutes } from "./routes.js";

export interface AvarodhaAPI {
	server: AvarodhaServer;
	monitor: AllocationMonitor;
}

/**
 * Create a server with every allocation route mounted.
 *
 * Pass an existing monitor to share state with other callers; otherwise a
 * fresh one is created.
 *
 * @example
 * ```ts
 * const { server } = createAvarodhaAPI({ port: 0 });
 * const port = await server.start();
 * ```
 */
export function createAvarodhaAPI(config: ServerConfig = {}, monitor = new AllocationMonitor()): AvarodhaAPI {
	const server = new AvarodhaServer(config);
	mountAllocationRoutes(server, monitor);
	return { server, monitor };
}
