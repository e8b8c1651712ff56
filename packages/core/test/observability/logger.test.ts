import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	AvarodhaError,
	createLogger,
	configureLogging,
	getLoggingConfig,
	parseLogLevel,
	resetLoggingConfig,
} from "@avarodha/core";
import type { LogEntry, LogTransport } from "@avarodha/core";

// ─── Test Transport ──────────────────────────────────────────────────────────

class TestTransport implements LogTransport {
	entries: LogEntry[] = [];
	write(entry: LogEntry): void {
		this.entries.push(entry);
	}
	last(): LogEntry | undefined {
		return this.entries[this.entries.length - 1];
	}
}

class StringSink {
	chunks: string[] = [];
	write(chunk: string): boolean {
		this.chunks.push(chunk);
		return true;
	}
}

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
	return {
		timestamp: "2026-03-01T10:20:30.456Z",
		level: LogLevel.INFO,
		levelName: "INFO",
		message: "granted",
		context: {},
		logger: "engine:monitor",
		...overrides,
	};
}

describe("Logger", () => {
	let transport: TestTransport;

	beforeEach(() => {
		transport = new TestTransport();
		resetLoggingConfig();
		vi.stubEnv("AVARODHA_LOG_LEVEL", "");
	});

	afterEach(() => {
		resetLoggingConfig();
		vi.unstubAllEnvs();
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Log Level Filtering
	// ═══════════════════════════════════════════════════════════════════════

	describe("log level filtering", () => {
		it("should emit entries at or above the configured level", () => {
			const logger = new Logger("test", { level: LogLevel.INFO, transports: [transport] });
			logger.debug("should not appear");
			logger.info("should appear");
			logger.warn("should also appear");
			expect(transport.entries.map((e) => e.message)).toEqual(["should appear", "should also appear"]);
		});

		it("should drop everything at SILENT", () => {
			const logger = new Logger("test", { level: LogLevel.SILENT, transports: [transport] });
			logger.error("no");
			expect(transport.entries).toHaveLength(0);
		});

		it("should let AVARODHA_LOG_LEVEL override explicit config", () => {
			vi.stubEnv("AVARODHA_LOG_LEVEL", "error");
			const logger = new Logger("test", { level: LogLevel.DEBUG, transports: [transport] });
			expect(logger.getLevel()).toBe(LogLevel.ERROR);
		});

		it("should read AVARODHA_LOG_LEVEL from an injected environment", () => {
			const logger = new Logger("test", {
				level: LogLevel.DEBUG,
				transports: [transport],
				env: { AVARODHA_LOG_LEVEL: "warn" },
			});
			expect(logger.getLevel()).toBe(LogLevel.WARN);
		});

		it("should apply the globally configured environment to later loggers", () => {
			configureLogging({ transports: [transport], env: { AVARODHA_LOG_LEVEL: "error" } });
			expect(createLogger("test").getLevel()).toBe(LogLevel.ERROR);
		});

		it("should derive the default level from the injected NODE_ENV", () => {
			configureLogging({ transports: [transport], env: { NODE_ENV: "production" } });
			expect(createLogger("test").getLevel()).toBe(LogLevel.INFO);
		});

		it("should change level at runtime", () => {
			const logger = new Logger("test", { level: LogLevel.ERROR, transports: [transport] });
			logger.setLevel(LogLevel.DEBUG);
			logger.debug("now visible");
			expect(transport.entries).toHaveLength(1);
		});
	});

	describe("parseLogLevel", () => {
		it("should parse names case-insensitively", () => {
			expect(parseLogLevel(" Warn ")).toBe(LogLevel.WARN);
			expect(parseLogLevel("verbose")).toBeUndefined();
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Entry Shape
	// ═══════════════════════════════════════════════════════════════════════

	describe("entry shape", () => {
		it("should lift requestId and duration out of the context", () => {
			const logger = new Logger("http", { level: LogLevel.DEBUG, transports: [transport] });
			logger.info("request", { requestId: "abc", duration: 12, status: 200 });
			const last = transport.last();
			expect(last?.requestId).toBe("abc");
			expect(last?.duration).toBe(12);
			expect(last?.context).toEqual({ status: 200 });
			expect(last?.logger).toBe("http");
			expect(last?.levelName).toBe("INFO");
		});

		it("should serialise errors with their code", () => {
			const logger = new Logger("test", { level: LogLevel.DEBUG, transports: [transport] });
			logger.error("failed", new AvarodhaError("boom", "BOOM"));
			expect(transport.last()?.error).toMatchObject({ name: "AvarodhaError", code: "BOOM", message: "boom" });
		});

		it("should stringify non-Error thrown values", () => {
			const logger = new Logger("test", { level: LogLevel.DEBUG, transports: [transport] });
			logger.error("failed", "plain string");
			expect(transport.last()?.error).toEqual({ name: "Error", message: "plain string" });
		});
	});

	describe("child / withContext", () => {
		it("should name children parent:child and share transports", () => {
			const parent = new Logger("engine", { level: LogLevel.DEBUG, transports: [transport] });
			const child = parent.child("monitor");
			child.info("hello");
			expect(child.getName()).toBe("engine:monitor");
			expect(transport.last()?.logger).toBe("engine:monitor");
		});

		it("should merge context", () => {
			const logger = new Logger("test", {
				level: LogLevel.DEBUG,
				transports: [transport],
				defaultContext: { service: "api" },
			}).withContext({ pid: "P1" });
			logger.info("ctx", { rid: "R1" });
			expect(transport.last()?.context).toEqual({ service: "api", pid: "P1", rid: "R1" });
		});
	});

	describe("global configuration", () => {
		it("should apply configured transports to loggers created afterwards", () => {
			configureLogging({ level: LogLevel.WARN, transports: [transport] });
			const logger = createLogger("later");
			logger.info("dropped");
			logger.warn("kept");
			expect(transport.entries.map((e) => e.message)).toEqual(["kept"]);
			expect(getLoggingConfig().level).toBe(LogLevel.WARN);
		});

		it("should report transport failures on stderr and keep going", () => {
			const stderr = vi.spyOn(process.stderr, "write").mockReturnValue(true);
			const broken: LogTransport = {
				write: () => {
					throw new Error("disk full");
				},
			};
			const logger = new Logger("test", { level: LogLevel.DEBUG, transports: [broken, transport] });
			logger.info("still delivered");
			expect(stderr).toHaveBeenCalledWith("log transport failed: disk full\n");
			expect(transport.entries).toHaveLength(1);
		});
	});
});

// ═══════════════════════════════════════════════════════════════════════════
// Transports
// ═══════════════════════════════════════════════════════════════════════════

describe("ConsoleTransport", () => {
	it("should write plain lines to out below WARN", () => {
		const out = new StringSink();
		const err = new StringSink();
		new ConsoleTransport({ colors: false, out, err }).write(entry({ context: { pid: "P1" }, requestId: "r-1" }));
		expect(out.chunks).toEqual(['10:20:30.456 INFO  [engine:monitor] granted pid="P1" req=r-1\n']);
		expect(err.chunks).toEqual([]);
	});

	it("should route WARN and above to err", () => {
		const out = new StringSink();
		const err = new StringSink();
		new ConsoleTransport({ colors: false, out, err }).write(
			entry({ level: LogLevel.WARN, levelName: "WARN", message: "deadlock", duration: 3 }),
		);
		expect(err.chunks).toEqual(["10:20:30.456 WARN  [engine:monitor] deadlock duration=3ms\n"]);
		expect(out.chunks).toEqual([]);
	});
});

describe("JsonTransport", () => {
	it("should emit one JSON object per line", () => {
		const out = new StringSink();
		new JsonTransport({ out }).write(entry({ context: { rid: "R2" } }));
		expect(out.chunks).toHaveLength(1);
		expect(JSON.parse(out.chunks[0])).toEqual({
			timestamp: "2026-03-01T10:20:30.456Z",
			level: "INFO",
			logger: "engine:monitor",
			message: "granted",
			context: { rid: "R2" },
		});
	});

	it("should omit empty context", () => {
		const out = new StringSink();
		new JsonTransport({ out }).write(entry());
		expect(Object.keys(JSON.parse(out.chunks[0]))).toEqual(["timestamp", "level", "logger", "message"]);
	});
});
