/**
 * Drishti Logger: structured, pluggable logging for Avarodha.
 * Sanskrit: Drishti (दृष्टि) = vision, sight, observation.
 *
 * Level filtering, pluggable transports, child loggers and contextual
 * metadata. Entries below the threshold are dropped before they are built.
 */

// ─── Log Level ───────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	SILENT = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
	[LogLevel.SILENT]: "SILENT",
};

const LOG_LEVEL_PARSE: Record<string, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
	silent: LogLevel.SILENT,
};

/** Parse a level name (`"debug"`, `"warn"`, …). Returns undefined for unknown names. */
export function parseLogLevel(name: string): LogLevel | undefined {
	return LOG_LEVEL_PARSE[name.trim().toLowerCase()];
}

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	message: string;
	/** Structured context metadata */
	context: Record<string, unknown>;
	/** HTTP request ID for correlation */
	requestId?: string;
	error?: { name: string; code?: string; message: string; stack?: string };
	/** Duration in milliseconds for timed operations */
	duration?: number;
	/** Logger name, e.g. `"engine:monitor"` */
	logger: string;
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Minimum level to emit. */
	level?: LogLevel;
	/** Output transports. Defaults to [ConsoleTransport]. */
	transports?: LogTransport[];
	/** Default context merged into every log entry. */
	defaultContext?: Record<string, unknown>;
	/** Environment read for `AVARODHA_LOG_LEVEL` and `NODE_ENV`. Default: `process.env`. */
	env?: NodeJS.ProcessEnv;
}

// ─── Global Configuration ────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {};

/**
 * Configure global logging defaults. Affects loggers created after this call.
 */
export function configureLogging(config: LoggerConfig): void {
	globalConfig = { ...config };
}

/** Get the current global logging configuration. */
export function getLoggingConfig(): LoggerConfig {
	return { ...globalConfig };
}

/** Reset global config to defaults. Primarily for testing. */
export function resetLoggingConfig(): void {
	globalConfig = {};
}

// ─── ANSI Colors ─────────────────────────────────────────────────────────────

const ANSI_RESET = "\x1b[0m";
const ANSI_DIM = "\x1b[2m";
const ANSI_BOLD = "\x1b[1m";

const LEVEL_COLORS: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "\x1b[36m",
	[LogLevel.INFO]: "\x1b[32m",
	[LogLevel.WARN]: "\x1b[33m",
	[LogLevel.ERROR]: "\x1b[31m",
	[LogLevel.SILENT]: "",
};

/** Anything with a `write(string)` method, e.g. `process.stdout`. */
export interface LineSink {
	write(chunk: string): unknown;
}

// ─── Transports ──────────────────────────────────────────────────────────────

/**
 * Human-readable output with timestamps. WARN and above go to stderr.
 */
export class ConsoleTransport implements LogTransport {
	private readonly useColors: boolean;
	private readonly out: LineSink;
	private readonly err: LineSink;

	constructor(opts?: { colors?: boolean; out?: LineSink; err?: LineSink }) {
		this.useColors = opts?.colors ?? (process.stdout.isTTY ?? false);
		this.out = opts?.out ?? process.stdout;
		this.err = opts?.err ?? process.stderr;
	}

	write(entry: LogEntry): void {
		const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
		const lvl = entry.levelName.padEnd(5);
		const name = ` [${entry.logger}]`;

		let line = this.useColors
			? `${ANSI_DIM}${ts}${ANSI_RESET} ${LEVEL_COLORS[entry.level]}${lvl}${ANSI_RESET}${ANSI_BOLD}${name}${ANSI_RESET} ${entry.message}`
			: `${ts} ${lvl}${name} ${entry.message}`;

		const ctxKeys = Object.keys(entry.context);
		if (ctxKeys.length > 0) {
			const ctxStr = ctxKeys.map((k) => `${k}=${JSON.stringify(entry.context[k])}`).join(" ");
			line += this.useColors ? ` ${ANSI_DIM}${ctxStr}${ANSI_RESET}` : ` ${ctxStr}`;
		}
		if (entry.requestId) {
			line += ` req=${entry.requestId}`;
		}
		if (entry.duration !== undefined) {
			line += ` duration=${entry.duration}ms`;
		}
		if (entry.error) {
			line += `\n  ${entry.error.name}: ${entry.error.message}`;
		}

		const stream = entry.level >= LogLevel.WARN ? this.err : this.out;
		stream.write(line + "\n");
	}
}

/**
 * Structured JSON lines for log aggregation.
 */
export class JsonTransport implements LogTransport {
	private readonly out: LineSink;

	constructor(opts?: { out?: LineSink }) {
		this.out = opts?.out ?? process.stdout;
	}

	write(entry: LogEntry): void {
		const obj: Record<string, unknown> = {
			timestamp: entry.timestamp,
			level: entry.levelName,
			logger: entry.logger,
			message: entry.message,
		};
		if (Object.keys(entry.context).length > 0) obj.context = entry.context;
		if (entry.requestId) obj.requestId = entry.requestId;
		if (entry.error) obj.error = entry.error;
		if (entry.duration !== undefined) obj.duration = entry.duration;

		this.out.write(JSON.stringify(obj) + "\n");
	}
}

// ─── Logger ──────────────────────────────────────────────────────────────────

/**
 * Resolve the effective level: env var, then explicit config, then global
 * config, then INFO in production and DEBUG elsewhere.
 */
function resolveLevel(config?: LoggerConfig): LogLevel {
	const env = config?.env ?? globalConfig.env ?? process.env;
	const envLevel = env.AVARODHA_LOG_LEVEL;
	if (envLevel) {
		const parsed = parseLogLevel(envLevel);
		if (parsed !== undefined) return parsed;
	}
	if (config?.level !== undefined) return config.level;
	if (globalConfig.level !== undefined) return globalConfig.level;
	return env.NODE_ENV === "production" ? LogLevel.INFO : LogLevel.DEBUG;
}

function serializeError(error: unknown): NonNullable<LogEntry["error"]> {
	if (error instanceof Error) {
		const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
		return { name: error.name, message: error.message, stack: error.stack, ...(code ? { code } : {}) };
	}
	return { name: "Error", message: String(error) };
}

export class Logger {
	private readonly name: string;
	private level: LogLevel;
	private readonly transports: LogTransport[];
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.level = resolveLevel(config);
		this.transports = config?.transports ?? globalConfig.transports ?? [new ConsoleTransport()];
		this.context = {
			...(globalConfig.defaultContext ?? {}),
			...(config?.defaultContext ?? {}),
		};
	}

	debug(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, undefined, ctx);
	}

	info(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, undefined, ctx);
	}

	warn(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, undefined, ctx);
	}

	/** Log an ERROR message with an optional thrown value. */
	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	/**
	 * Create a child logger named `parent:child` sharing transports,
	 * level and context.
	 */
	child(childName: string): Logger {
		return new Logger(`${this.name}:${childName}`, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context },
		});
	}

	/** Return a new logger with additional context merged in. */
	withContext(ctx: Record<string, unknown>): Logger {
		return new Logger(this.name, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context, ...ctx },
		});
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	getName(): string {
		return this.name;
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private emit(level: LogLevel, message: string, error: unknown, ctx?: Record<string, unknown>): void {
		if (level < this.level) return;

		const { requestId, duration, ...rest } = { ...this.context, ...(ctx ?? {}) };
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LOG_LEVEL_NAMES[level],
			message,
			context: rest,
			logger: this.name,
		};
		if (requestId !== undefined) entry.requestId = String(requestId);
		if (duration !== undefined) entry.duration = Number(duration);
		if (error !== undefined) entry.error = serializeError(error);

		for (const transport of this.transports) {
			try {
				transport.write(entry);
			} catch (err) {
				process.stderr.write(`log transport failed: ${err instanceof Error ? err.message : String(err)}\n`);
			}
		}
	}
}

// ─── Factory ─────────────────────────────────────────────────────────────────

/**
 * Create a named logger with global defaults.
 *
 * @param name - Package or module identifier (e.g. "http-server", "engine:monitor")
 */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
