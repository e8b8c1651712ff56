/**
 * Typed error hierarchy for Avarodha.
 *
 * All Avarodha errors extend {@link AvarodhaError} with a machine-readable
 * `code` string so transports can map failures without parsing messages.
 */

/** The two kinds of entity the registry tracks. */
export type EntityKind = "resource" | "process";

/**
 * Base error class for all Avarodha errors.
 *
 * Carries a machine-readable `code` field (e.g. `"UNKNOWN_ENTITY"`) in
 * addition to the human-readable `message`.
 */
export class AvarodhaError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, { cause });
		this.name = "AvarodhaError";
		this.code = code;
	}
}

/**
 * An add operation used an ID that is already registered.
 */
export class DuplicateEntityError extends AvarodhaError {
	readonly kind: EntityKind;
	readonly id: string;

	constructor(kind: EntityKind, id: string) {
		super(`${capitalize(kind)} "${id}" already exists`, "DUPLICATE_ENTITY");
		this.name = "DuplicateEntityError";
		this.kind = kind;
		this.id = id;
	}
}

/**
 * An operation referenced a process or resource that was never registered.
 */
export class UnknownEntityError extends AvarodhaError {
	readonly kind: EntityKind;
	readonly id: string;

	constructor(kind: EntityKind, id: string) {
		super(`Unknown ${kind} "${id}"`, "UNKNOWN_ENTITY");
		this.name = "UnknownEntityError";
		this.kind = kind;
		this.id = id;
	}
}

/**
 * A count or capacity was negative, fractional, or not a number.
 */
export class InvalidCountError extends AvarodhaError {
	readonly value: number;

	constructor(label: string, value: number) {
		super(`${label} must be a non-negative integer, received ${value}`, "INVALID_COUNT");
		this.name = "InvalidCountError";
		this.value = value;
	}
}

/**
 * An entity ID was empty.
 */
export class InvalidIdentifierError extends AvarodhaError {
	readonly kind: EntityKind;

	constructor(kind: EntityKind) {
		super(`${capitalize(kind)} ID must be a non-empty string`, "INVALID_IDENTIFIER");
		this.name = "InvalidIdentifierError";
		this.kind = kind;
	}
}

/**
 * A guarded section was entered again while it was already held.
 */
export class ReentrancyError extends AvarodhaError {
	constructor(section: string) {
		super(`Re-entrant access to "${section}" while it is held`, "REENTRANT_ACCESS");
		this.name = "ReentrancyError";
	}
}

/**
 * Configuration error (unreadable file, invalid JSON, out-of-range value).
 */
export class ConfigError extends AvarodhaError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}

function capitalize(word: string): string {
	return word.charAt(0).toUpperCase() + word.slice(1);
}
