import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "./errors.js";
import type { AvarodhaSettings, LogFormat } from "./types.js";
import { DEFAULT_SETTINGS } from "./types.js";
import { v, validate } from "./validation.js";

/** File name looked up in the project directory. */
export const PROJECT_CONFIG_FILE = "avarodha.json";

const settingsSchema = v.object({
	host: v.optional(v.string().min(1).validate).validate,
	port: v.optional(v.number().integer().min(0).max(65_535).validate).validate,
	logFormat: v.optional(v.union<LogFormat>(v.literal("pretty").validate, v.literal("json").validate).validate).validate,
	requestLogging: v.optional(v.boolean().validate).validate,
	maxBodySize: v.optional(v.number().integer().min(1).validate).validate,
}).validate;

type PartialSettings = Partial<AvarodhaSettings>;

export interface LoadSettingsOptions {
	/** Directory containing `avarodha.json`. Omit to skip the file layer. */
	projectPath?: string;
	/** Environment to read overrides from. Default: `process.env`. */
	env?: NodeJS.ProcessEnv;
}

function checked(source: string, raw: unknown): PartialSettings {
	const result = validate(raw, settingsSchema);
	if (!result.valid) {
		throw new ConfigError(`Invalid settings in ${source}: ${result.errors.map((e) => e.message).join("; ")}`);
	}
	// Undefined fields must not shadow lower layers when spread.
	const s = result.value;
	const layer: PartialSettings = {};
	if (s.host !== undefined) layer.host = s.host;
	if (s.port !== undefined) layer.port = s.port;
	if (s.logFormat !== undefined) layer.logFormat = s.logFormat;
	if (s.requestLogging !== undefined) layer.requestLogging = s.requestLogging;
	if (s.maxBodySize !== undefined) layer.maxBodySize = s.maxBodySize;
	return layer;
}

/**
 * Load `<projectPath>/avarodha.json`.
 *
 * Returns an empty layer if the file does not exist.
 *
 * @throws {ConfigError} If the file exists but is unreadable, not JSON, or invalid.
 */
export function loadProjectConfig(projectPath: string): PartialSettings {
	const configPath = path.join(projectPath, PROJECT_CONFIG_FILE);
	if (!fs.existsSync(configPath)) return {};

	let raw: unknown;
	try {
		raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Failed to parse ${configPath}`, err instanceof Error ? err : undefined);
	}
	return checked(configPath, raw);
}

/**
 * Read the `AVARODHA_*` environment overrides.
 *
 * Numeric and boolean variables are converted before validation, so
 * `AVARODHA_PORT=abc` is reported as a config error rather than ignored.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv): PartialSettings {
	const raw: Record<string, unknown> = {};
	if (env.AVARODHA_HOST !== undefined) raw.host = env.AVARODHA_HOST;
	if (env.AVARODHA_PORT !== undefined) raw.port = Number(env.AVARODHA_PORT);
	if (env.AVARODHA_LOG_FORMAT !== undefined) raw.logFormat = env.AVARODHA_LOG_FORMAT;
	if (env.AVARODHA_REQUEST_LOGGING !== undefined) {
		const flag = env.AVARODHA_REQUEST_LOGGING.toLowerCase();
		raw.requestLogging = flag === "1" || flag === "true" ? true : flag === "0" || flag === "false" ? false : flag;
	}
	return checked("environment", raw);
}

/**
 * Resolve settings by cascading defaults < project file < environment.
 *
 * @example
 * ```ts
 * const settings = loadSettings({ projectPath: process.cwd() });
 * server.listen(settings.port, settings.host);
 * ```
 */
export function loadSettings(opts: LoadSettingsOptions = {}): AvarodhaSettings {
	const fileLayer = opts.projectPath ? loadProjectConfig(opts.projectPath) : {};
	const envLayer = loadEnvConfig(opts.env ?? process.env);
	return { ...DEFAULT_SETTINGS, ...fileLayer, ...envLayer };
}
