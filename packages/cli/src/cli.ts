#!/usr/bin/env node

/**
 * @avarodha/cli: Entry point.
 */

import { createLogger } from "@avarodha/core";
import { main } from "./main.js";

main(process.argv.slice(2))
	.then((code) => {
		if (code !== 0) process.exitCode = code;
	})
	.catch((err: unknown) => {
		createLogger("cli").error("fatal", err);
		process.exitCode = 1;
	});
