// @avarodha/cli: HTTP API and command-line entry points
export { AvarodhaServer, isLocalOrigin } from "./http-server.js";
export type { ServerConfig, RouteHandler, ParsedRequest, RouteResponse } from "./http-server.js";
export { mountAllocationRoutes, statusForCode, toGraphView } from "./routes.js";
export type { AllocationEdge, GraphView } from "./routes.js";
export { createAvarodhaAPI } from "./api.js";
export type { AvarodhaAPI } from "./api.js";
export { parseArgs, printHelp, HELP_TEXT } from "./args.js";
export type { CommandName, ParsedArgs } from "./args.js";
export { runDemo } from "./demo.js";
export type { DemoResult } from "./demo.js";
export { main } from "./main.js";
export type { MainOptions } from "./main.js";
