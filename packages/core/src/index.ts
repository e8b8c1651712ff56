// @avarodha/core: Foundation
export * from "./types.js";
export * from "./errors.js";
export { createEventBus } from "./events.js";
export { loadSettings, loadProjectConfig, loadEnvConfig, PROJECT_CONFIG_FILE } from "./config.js";
export type { LoadSettingsOptions } from "./config.js";

// Validation (Niyama)
export { v, validate, assertValid } from "./validation.js";
export type { ValidatorFn, ValidatorOutcome, ValidationError, ValidationResult } from "./validation.js";

// Observability (Drishti)
export * from "./observability/index.js";
