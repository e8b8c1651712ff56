/**
 * Dvaara: HTTP API server for Avarodha.
 * Sanskrit: Dvaara (द्वार) = gateway, door.
 *
 * A small JSON router on Node's built-in `http` module: exact-path routes,
 * JSON bodies with a size limit, request IDs, and localhost-only CORS by
 * default.
 */

import http from "node:http";
import { randomUUID } from "node:crypto";
import { createLogger } from "@avarodha/core";
import type { Logger } from "@avarodha/core";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ServerConfig {
	/** Port to listen on. `0` picks a free port. Default: 5000. */
	port?: number;
	/** Host to bind to. Default: "127.0.0.1". */
	host?: string;
	/** CORS origin. Default: localhost only. Set to "*" to allow all origins. */
	corsOrigin?: string;
	/** Log one line per request. Default: false. */
	enableLogging?: boolean;
	/** Maximum request body size in bytes. Default: 65_536. */
	maxBodySize?: number;
	logger?: Logger;
}

export interface RouteHandler {
	(req: ParsedRequest): Promise<RouteResponse>;
}

export interface ParsedRequest {
	method: string;
	/** URL path without the query string (e.g. "/api/state") */
	path: string;
	/** Parsed JSON body (POST/PUT/PATCH), `undefined` when empty */
	body: unknown;
	requestId: string;
}

export interface RouteResponse {
	status: number;
	/** Response body (JSON-serialized) */
	body: unknown;
}

/** Thrown while reading a request; carries the status to answer with. */
class RequestError extends Error {
	constructor(message: string, readonly status: number) {
		super(message);
		this.name = "RequestError";
	}
}

// ─── Server ──────────────────────────────────────────────────────────────────

const DEFAULT_PORT = 5000;
const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_MAX_BODY = 65_536;

const LOCAL_HOSTNAMES: ReadonlySet<string> = new Set(["localhost", "127.0.0.1", "[::1]"]);

/** True for http(s) origins whose host is the loopback interface, on any port. */
export function isLocalOrigin(origin: string): boolean {
	if (!URL.canParse(origin)) return false;
	const url = new URL(origin);
	return (url.protocol === "http:" || url.protocol === "https:") && LOCAL_HOSTNAMES.has(url.hostname);
}

export class AvarodhaServer {
	private server: http.Server | null = null;
	/** method → path → handler */
	private routes: Map<string, Map<string, RouteHandler>> = new Map();
	private startTime = 0;
	private readonly log: Logger;

	constructor(private config: ServerConfig = {}) {
		this.log = config.logger ?? createLogger("http-server");
	}

	/**
	 * Register a route handler.
	 *
	 * ```ts
	 * server.route("GET", "/api/state", handler);
	 * ```
	 */
	route(method: string, path: string, handler: RouteHandler): void {
		const upper = method.toUpperCase();
		const table = this.routes.get(upper) ?? new Map<string, RouteHandler>();
		table.set(path, handler);
		this.routes.set(upper, table);
	}

	/** Start the server. Returns the actual port. */
	async start(): Promise<number> {
		if (this.server) {
			throw new Error("Server is already running");
		}

		const port = this.config.port ?? DEFAULT_PORT;
		const host = this.config.host ?? DEFAULT_HOST;
		const server = http.createServer((req, res) => {
			this.handle(req, res).catch((err: unknown) => {
				this.log.error("Unhandled request failure", err);
				if (!res.headersSent) this.sendJSON(res, 500, { error: "Internal Server Error" });
			});
		});
		this.server = server;

		return new Promise<number>((resolve, reject) => {
			const fail = (err: Error): void => {
				this.server = null;
				reject(err);
			};
			server.once("error", fail);
			try {
				server.listen(port, host, () => {
					this.startTime = Date.now();
					const addr = server.address();
					const actualPort = typeof addr === "object" && addr !== null ? addr.port : port;
					this.log.info("listening", { host, port: actualPort });
					resolve(actualPort);
				});
			} catch (err) {
				// listen() throws synchronously for an out-of-range port
				fail(err instanceof Error ? err : new Error(String(err)));
			}
		});
	}

	/** Stop the server gracefully. */
	async stop(): Promise<void> {
		const server = this.server;
		if (!server) return;

		return new Promise<void>((resolve, reject) => {
			server.close((err) => {
				this.server = null;
				this.startTime = 0;
				if (err) reject(err);
				else resolve();
			});
		});
	}

	get isRunning(): boolean {
		return this.server !== null;
	}

	/** Server uptime in milliseconds. Returns 0 if not running. */
	get uptime(): number {
		return this.startTime > 0 ? Date.now() - this.startTime : 0;
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
		const requestId = randomUUID();
		const startMs = Date.now();

		const allowedOrigin = this.resolveOrigin(req.headers.origin);
		if (allowedOrigin) {
			res.setHeader("Access-Control-Allow-Origin", allowedOrigin);
			if (allowedOrigin !== "*") res.setHeader("Vary", "Origin");
		}
		res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
		res.setHeader("Access-Control-Allow-Headers", "Content-Type, X-Request-ID");
		res.setHeader("Content-Type", "application/json; charset=utf-8");
		res.setHeader("X-Request-ID", requestId);

		if (req.method === "OPTIONS") {
			res.writeHead(204);
			res.end();
			return;
		}

		let status: number;
		let path = (req.url ?? "/").split("?")[0];
		try {
			const parsed = await this.parseRequest(req, requestId);
			path = parsed.path;
			const handler = this.routes.get(parsed.method)?.get(parsed.path);

			if (!handler) {
				status = 404;
				this.sendJSON(res, status, { ok: false, error: "Not Found", path: parsed.path, requestId });
			} else {
				const response = await handler(parsed);
				status = response.status;
				this.sendJSON(res, status, response.body);
			}
		} catch (err) {
			status = err instanceof RequestError ? err.status : 500;
			const message = err instanceof Error ? err.message : String(err);
			this.sendJSON(res, status, { ok: false, error: message, requestId });
			if (status >= 500) {
				this.log.error(`Request failed: ${req.method ?? "?"} ${path}`, err, { requestId, status });
			}
		}

		if (this.config.enableLogging) {
			this.log.info(`${req.method ?? "?"} ${path} ${status}`, { requestId, duration: Date.now() - startMs });
		}
	}

	private resolveOrigin(origin: string | undefined): string {
		const corsConfig = this.config.corsOrigin;
		if (corsConfig) return corsConfig;
		if (origin && isLocalOrigin(origin)) {
			return origin;
		}
		return "";
	}

	private async parseRequest(req: http.IncomingMessage, requestId: string): Promise<ParsedRequest> {
		const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
		const method = (req.method ?? "GET").toUpperCase();

		let body: unknown = undefined;
		if (method === "POST" || method === "PUT" || method === "PATCH") {
			body = await this.readBody(req, this.config.maxBodySize ?? DEFAULT_MAX_BODY);
		}

		return { method, path: url.pathname, body, requestId };
	}

	private readBody(req: http.IncomingMessage, maxSize: number): Promise<unknown> {
		return new Promise((resolve, reject) => {
			const chunks: Buffer[] = [];
			let size = 0;
			let rejected = false;

			req.on("data", (chunk: Buffer) => {
				if (rejected) return;
				size += chunk.length;
				if (size > maxSize) {
					rejected = true;
					reject(new RequestError(`Request body exceeds maximum size of ${maxSize} bytes`, 413));
					return;
				}
				chunks.push(chunk);
			});

			req.on("end", () => {
				if (rejected) return;
				if (size === 0) {
					resolve(undefined);
					return;
				}
				try {
					resolve(JSON.parse(Buffer.concat(chunks).toString("utf-8")));
				} catch {
					reject(new RequestError("Invalid JSON in request body", 400));
				}
			});

			req.on("error", reject);
		});
	}

	private sendJSON(res: http.ServerResponse, status: number, body: unknown): void {
		res.writeHead(status);
		res.end(JSON.stringify(body));
	}
}
