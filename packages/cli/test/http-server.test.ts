import { describe, it, expect, afterEach } from "vitest";
import { LogLevel, Logger } from "@avarodha/core";
import type { LogEntry, LogTransport } from "@avarodha/core";
import { AvarodhaServer, isLocalOrigin } from "../src/http-server.js";
import type { ServerConfig } from "../src/http-server.js";

// ── Helpers ──────────────────────────────────────────────────────────────────

class TestTransport implements LogTransport {
	entries: LogEntry[] = [];
	write(entry: LogEntry): void {
		this.entries.push(entry);
	}
}

/** Minimal fetch wrapper for tests (Node 20+ has global fetch). */
async function req(
	port: number,
	path: string,
	opts: { method?: string; headers?: Record<string, string>; rawBody?: string } = {},
): Promise<{ status: number; headers: Headers; body: Record<string, unknown> }> {
	const res = await fetch(`http://127.0.0.1:${port}${path}`, {
		method: opts.method ?? "GET",
		headers: { "Content-Type": "application/json", ...(opts.headers ?? {}) },
		body: opts.rawBody,
	});
	const text = await res.text();
	const body = (text ? JSON.parse(text) : {}) as Record<string, unknown>;
	return { status: res.status, headers: res.headers, body };
}

// ── Tests ────────────────────────────────────────────────────────────────────

describe("AvarodhaServer", () => {
	let server: AvarodhaServer;
	let transport: TestTransport;

	function create(config: ServerConfig = {}): AvarodhaServer {
		transport = new TestTransport();
		server = new AvarodhaServer({
			port: 0,
			host: "127.0.0.1",
			logger: new Logger("http-server", { level: LogLevel.DEBUG, transports: [transport] }),
			...config,
		});
		return server;
	}

	afterEach(async () => {
		if (server?.isRunning) await server.stop();
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Lifecycle
	// ═══════════════════════════════════════════════════════════════════════

	describe("lifecycle", () => {
		it("should start on a free port and stop", async () => {
			create();
			const port = await server.start();
			expect(port).toBeGreaterThan(0);
			expect(server.isRunning).toBe(true);
			expect(transport.entries.find((e) => e.message === "listening")?.context).toEqual({
				host: "127.0.0.1",
				port,
			});

			await server.stop();
			expect(server.isRunning).toBe(false);
			expect(server.uptime).toBe(0);
		});

		it("should refuse to start twice", async () => {
			create();
			await server.start();
			await expect(server.start()).rejects.toThrow("Server is already running");
		});

		it("should reject an out-of-range port and stay stopped", async () => {
			create({ port: 99_999 });
			await expect(server.start()).rejects.toThrow(RangeError);
			expect(server.isRunning).toBe(false);
		});

		it("should treat stop on a stopped server as a no-op", async () => {
			create();
			await expect(server.stop()).resolves.toBeUndefined();
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Routing
	// ═══════════════════════════════════════════════════════════════════════

	describe("routing", () => {
		it("should respond to registered routes", async () => {
			create();
			server.route("GET", "/api/ping", async () => ({ status: 200, body: { pong: true } }));
			const port = await server.start();

			const { status, body, headers } = await req(port, "/api/ping");
			expect(status).toBe(200);
			expect(body).toEqual({ pong: true });
			expect(headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
		});

		it("should match the path without its query string", async () => {
			create();
			server.route("GET", "/api/state", async (r) => ({ status: 200, body: { path: r.path } }));
			const port = await server.start();

			const { status, body } = await req(port, "/api/state?verbose=1");
			expect(status).toBe(200);
			expect(body).toEqual({ path: "/api/state" });
		});

		it("should return 404 for unmatched routes", async () => {
			create();
			const port = await server.start();
			const { status, body } = await req(port, "/api/nonexistent");
			expect(status).toBe(404);
			expect(body.ok).toBe(false);
			expect(body.error).toBe("Not Found");
			expect(body.path).toBe("/api/nonexistent");
		});

		it("should match on method", async () => {
			create();
			server.route("POST", "/api/echo", async (r) => ({ status: 200, body: r.body }));
			const port = await server.start();
			expect((await req(port, "/api/echo")).status).toBe(404);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Bodies
	// ═══════════════════════════════════════════════════════════════════════

	describe("request bodies", () => {
		it("should parse JSON bodies", async () => {
			create();
			server.route("POST", "/api/echo", async (r) => ({ status: 200, body: { got: r.body } }));
			const port = await server.start();

			const { body } = await req(port, "/api/echo", { method: "POST", rawBody: '{"pid":"P1"}' });
			expect(body).toEqual({ got: { pid: "P1" } });
		});

		it("should pass an empty body as undefined", async () => {
			create();
			server.route("POST", "/api/echo", async (r) => ({ status: 200, body: { empty: r.body === undefined } }));
			const port = await server.start();

			const { body } = await req(port, "/api/echo", { method: "POST" });
			expect(body).toEqual({ empty: true });
		});

		it("should answer 400 for malformed JSON", async () => {
			create();
			server.route("POST", "/api/echo", async (r) => ({ status: 200, body: r.body }));
			const port = await server.start();

			const { status, body } = await req(port, "/api/echo", { method: "POST", rawBody: "{not json" });
			expect(status).toBe(400);
			expect(body.error).toBe("Invalid JSON in request body");
		});

		it("should answer 413 for oversize bodies", async () => {
			create({ maxBodySize: 16 });
			server.route("POST", "/api/echo", async (r) => ({ status: 200, body: r.body }));
			const port = await server.start();

			const { status, body } = await req(port, "/api/echo", {
				method: "POST",
				rawBody: JSON.stringify({ padding: "x".repeat(64) }),
			});
			expect(status).toBe(413);
			expect(body.error).toBe("Request body exceeds maximum size of 16 bytes");
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Errors & logging
	// ═══════════════════════════════════════════════════════════════════════

	describe("errors", () => {
		it("should answer 500 when a handler throws and log it", async () => {
			create();
			server.route("GET", "/api/boom", async () => {
				throw new Error("handler exploded");
			});
			const port = await server.start();

			const { status, body } = await req(port, "/api/boom");
			expect(status).toBe(500);
			expect(body.error).toBe("handler exploded");
			const logged = transport.entries.find((e) => e.level === LogLevel.ERROR);
			expect(logged?.message).toBe("Request failed: GET /api/boom");
			expect(logged?.context).toEqual({ status: 500 });
			expect(logged?.error?.message).toBe("handler exploded");
		});

		it("should log one line per request when enabled", async () => {
			create({ enableLogging: true });
			server.route("GET", "/api/ping", async () => ({ status: 200, body: {} }));
			const port = await server.start();

			await req(port, "/api/ping");
			const line = transport.entries.find((e) => e.message === "GET /api/ping 200");
			expect(line?.requestId).toMatch(/^[0-9a-f-]{36}$/);
			expect(line?.duration).toBeGreaterThanOrEqual(0);
		});

		it("should not log requests by default", async () => {
			create();
			server.route("GET", "/api/ping", async () => ({ status: 200, body: {} }));
			const port = await server.start();

			await req(port, "/api/ping");
			expect(transport.entries.map((e) => e.message)).toEqual(["listening"]);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// CORS
	// ═══════════════════════════════════════════════════════════════════════

	describe("CORS", () => {
		it("should echo localhost origins", async () => {
			create();
			server.route("GET", "/api/ping", async () => ({ status: 200, body: {} }));
			const port = await server.start();

			const { headers } = await req(port, "/api/ping", { headers: { Origin: "http://localhost:3000" } });
			expect(headers.get("access-control-allow-origin")).toBe("http://localhost:3000");
		});

		it("should not allow foreign origins by default", async () => {
			create();
			server.route("GET", "/api/ping", async () => ({ status: 200, body: {} }));
			const port = await server.start();

			const { headers } = await req(port, "/api/ping", { headers: { Origin: "http://example.com" } });
			expect(headers.get("access-control-allow-origin")).toBeNull();
		});

		it("should not allow origins that only start like localhost", async () => {
			create();
			server.route("GET", "/api/state", async () => ({ status: 200, body: {} }));
			const port = await server.start();

			const { headers } = await req(port, "/api/state", { headers: { Origin: "http://localhost.evil.example" } });
			expect(headers.get("access-control-allow-origin")).toBeNull();
		});

		it("should use a configured origin", async () => {
			create({ corsOrigin: "*" });
			server.route("GET", "/api/ping", async () => ({ status: 200, body: {} }));
			const port = await server.start();

			const { headers } = await req(port, "/api/ping");
			expect(headers.get("access-control-allow-origin")).toBe("*");
		});

		it("should answer preflight requests with 204", async () => {
			create();
			const port = await server.start();
			const { status, headers } = await req(port, "/api/anything", { method: "OPTIONS" });
			expect(status).toBe(204);
			expect(headers.get("access-control-allow-methods")).toBe("GET, POST, OPTIONS");
		});
	});
});

describe("isLocalOrigin", () => {
	it("should accept loopback origins on any port", () => {
		expect(isLocalOrigin("http://localhost")).toBe(true);
		expect(isLocalOrigin("http://localhost:3000")).toBe(true);
		expect(isLocalOrigin("https://127.0.0.1:8443")).toBe(true);
		expect(isLocalOrigin("http://[::1]:5000")).toBe(true);
	});

	it("should reject look-alike hosts and other schemes", () => {
		expect(isLocalOrigin("http://localhost.evil.example")).toBe(false);
		expect(isLocalOrigin("http://127.0.0.1.evil.example")).toBe(false);
		expect(isLocalOrigin("http://evil.example/localhost")).toBe(false);
		expect(isLocalOrigin("file://localhost")).toBe(false);
	});

	it("should reject values that are not URLs", () => {
		expect(isLocalOrigin("null")).toBe(false);
		expect(isLocalOrigin("")).toBe(false);
	});
});
