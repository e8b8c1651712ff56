/**
 * @avarodha/cli: Command dispatch.
 *
 * Resolves settings, configures logging, then runs `serve`, `demo` or
 * `help`. Returns the exit code; only `cli.ts` sets `process.exitCode`.
 */

import {
	AvarodhaError,
	ConsoleTransport,
	JsonTransport,
	LogLevel,
	configureLogging,
	createLogger,
	loadSettings,
} from "@avarodha/core";
import type { AvarodhaSettings, LineSink } from "@avarodha/core";
import { createAvarodhaAPI } from "./api.js";
import type { AvarodhaAPI } from "./api.js";
import { parseArgs, printHelp } from "./args.js";
import type { ParsedArgs } from "./args.js";
import { runDemo } from "./demo.js";

export interface MainOptions {
	/** Directory searched for `avarodha.json`. Default: `process.cwd()`. */
	cwd?: string;
	env?: NodeJS.ProcessEnv;
	out?: LineSink;
	/** Called once the server is listening; used to hand the running API to callers. */
	onListening?: (api: AvarodhaAPI, port: number) => void;
	/** Install SIGINT/SIGTERM handlers for `serve`. Default: true. */
	handleSignals?: boolean;
}

function applyLogging(args: ParsedArgs, settings: AvarodhaSettings, env: NodeJS.ProcessEnv): void {
	const json = args.jsonLogs === true || settings.logFormat === "json";
	configureLogging({
		level: LogLevel.INFO,
		transports: [json ? new JsonTransport() : new ConsoleTransport()],
		env,
	});
}

async function serve(args: ParsedArgs, settings: AvarodhaSettings, opts: MainOptions): Promise<number> {
	const log = createLogger("cli");
	const api = createAvarodhaAPI({
		port: args.port ?? settings.port,
		host: args.host ?? settings.host,
		enableLogging: settings.requestLogging,
		maxBodySize: settings.maxBodySize,
	});

	const port = await api.server.start();
	(opts.out ?? process.stdout).write(`Avarodha API listening on http://${args.host ?? settings.host}:${port}\n`);

	if (opts.handleSignals ?? true) {
		const shutdown = (signal: string): void => {
			log.info("shutting down", { signal });
			api.server.stop().catch((err: unknown) => {
				log.error("server stop failed", err);
				process.exitCode = 1;
			});
		};
		process.once("SIGINT", () => shutdown("SIGINT"));
		process.once("SIGTERM", () => shutdown("SIGTERM"));
	}

	opts.onListening?.(api, port);
	return 0;
}

/**
 * Run the CLI with `argv` (without the node and script entries).
 *
 * @returns The exit code: 0 on success, 1 on a configuration or startup error.
 */
export async function main(argv: string[], opts: MainOptions = {}): Promise<number> {
	const args = parseArgs(argv);
	const out = opts.out ?? process.stdout;

	if (args.help || args.command === "help") {
		printHelp(out);
		return 0;
	}

	const env = opts.env ?? process.env;
	let settings: AvarodhaSettings;
	try {
		settings = loadSettings({ projectPath: opts.cwd ?? process.cwd(), env });
	} catch (err) {
		if (err instanceof AvarodhaError) {
			createLogger("cli").error("invalid configuration", err);
			return 1;
		}
		throw err;
	}
	applyLogging(args, settings, env);

	if (args.rest.length > 0) {
		createLogger("cli").warn("ignoring unrecognised arguments", { args: args.rest });
	}

	if (args.command === "demo") {
		runDemo(out);
		return 0;
	}

	try {
		return await serve(args, settings, opts);
	} catch (err) {
		createLogger("cli").error("server failed to start", err);
		return 1;
	}
}
