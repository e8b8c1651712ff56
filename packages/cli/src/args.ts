/**
 * @avarodha/cli: Argument parser.
 *
 * Parses the command, flags and leftover arguments from argv.
 */

export type CommandName = "serve" | "demo" | "help";

export interface ParsedArgs {
	command?: CommandName;
	/** --port for `serve` */
	port?: number;
	/** --host for `serve` */
	host?: string;
	/** --json-logs: emit JSON lines instead of pretty console output */
	jsonLogs?: boolean;
	help?: boolean;
	/** Unknown flags and extra positionals. */
	rest: string[];
}

const COMMANDS: ReadonlySet<string> = new Set<CommandName>(["serve", "demo", "help"]);

function isCommand(arg: string): arg is CommandName {
	return COMMANDS.has(arg);
}

const MAX_PORT = 65_535;

/** A decimal TCP port in 0..65535, or undefined. */
function parsePort(value: string | undefined): number | undefined {
	if (value === undefined || !/^\d+$/.test(value)) return undefined;
	const port = Number(value);
	return port <= MAX_PORT ? port : undefined;
}

/**
 * Parse process.argv (or a custom argv array) into structured arguments.
 *
 * Expects argv WITHOUT the leading `node` and script path entries,
 * i.e., pass `process.argv.slice(2)`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const result: ParsedArgs = { rest: [] };

	let i = 0;
	while (i < argv.length) {
		const arg = argv[i];

		// ─── Flags with values ──────────────────────────────────────────
		if (arg === "--port") {
			const port = parsePort(argv[i + 1]);
			if (port !== undefined) {
				result.port = port;
				i += 2;
			} else {
				result.rest.push(arg);
				i++;
			}
			continue;
		}

		if (arg === "--host") {
			i++;
			if (i < argv.length) {
				result.host = argv[i];
			}
			i++;
			continue;
		}

		// ─── Boolean flags ──────────────────────────────────────────────
		if (arg === "--json-logs") {
			result.jsonLogs = true;
			i++;
			continue;
		}

		if (arg === "-h" || arg === "--help") {
			result.help = true;
			i++;
			continue;
		}

		// ─── Command ────────────────────────────────────────────────────
		if (!result.command && isCommand(arg)) {
			result.command = arg;
			i++;
			continue;
		}

		result.rest.push(arg);
		i++;
	}

	return result;
}

export const HELP_TEXT = `Avarodha: deadlock detection and avoidance toolkit

Usage:
  avarodha [serve] [--port N] [--host H]   Start the HTTP API (default)
  avarodha demo                           Run the classic deadlock scenario
  avarodha help                           Show this help

Options:
  --port <n>          Port for the HTTP API (default 5000, or AVARODHA_PORT)
  --host <host>       Interface to bind (default 127.0.0.1, or AVARODHA_HOST)
  --json-logs         Log JSON lines instead of console text
  -h, --help          Show this help

Environment:
  AVARODHA_LOG_LEVEL  debug | info | warn | error | silent
`;

/**
 * Print the CLI help text.
 */
export function printHelp(out: { write(chunk: string): unknown } = process.stdout): void {
	out.write(HELP_TEXT);
}
