/**
 * @avarodha/core: Foundation types shared by every Avarodha package.
 */

// ─── Event Bus ───────────────────────────────────────────────────────────────

/** A synchronous event bus keyed by an event-name → payload map. */
export interface EventBus<Events extends object> {
	on<K extends keyof Events>(event: K, handler: (data: Events[K]) => void): void;
	off<K extends keyof Events>(event: K, handler: (data: Events[K]) => void): void;
	emit<K extends keyof Events>(event: K, data: Events[K]): void;
	once<K extends keyof Events>(event: K, handler: (data: Events[K]) => void): void;
	removeAll(event?: keyof Events): void;
}

// ─── Settings ────────────────────────────────────────────────────────────────

/** Output format for the console logger. */
export type LogFormat = "pretty" | "json";

/** Resolved runtime settings for the Avarodha server and CLI. */
export interface AvarodhaSettings {
	/** Interface the HTTP API binds to. */
	host: string;
	/** Port the HTTP API listens on. `0` picks a free port. */
	port: number;
	/** Console log format. */
	logFormat: LogFormat;
	/** Log one line per HTTP request. */
	requestLogging: boolean;
	/** Maximum accepted JSON body size in bytes. */
	maxBodySize: number;
}

export const DEFAULT_SETTINGS: AvarodhaSettings = {
	host: "127.0.0.1",
	port: 5000,
	logFormat: "pretty",
	requestLogging: false,
	maxBodySize: 65_536,
};
