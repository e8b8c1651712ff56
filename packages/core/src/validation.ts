/**
 * Niyama: Runtime validation utilities.
 * Sanskrit: Niyama (नियम) = rule, regulation, observance.
 *
 * Fluent validator builders for configuration files and API payloads.
 * Every builder exposes a `validate` function that narrows `unknown` to
 * the typed value or reports why it could not.
 */

import { AvarodhaError } from "./errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type ValidatorOutcome<T> = { valid: true; value: T } | { valid: false; error: string };

export type ValidatorFn<T = unknown> = (value: unknown) => ValidatorOutcome<T>;

export interface ValidationError {
	path: string;
	message: string;
	received: unknown;
}

export type ValidationResult<T> =
	| { valid: true; errors: []; value: T }
	| { valid: false; errors: ValidationError[] };

// ─── Validator Classes ───────────────────────────────────────────────────────

class StringValidator {
	private minLen?: number;

	min(n: number): this {
		this.minLen = n;
		return this;
	}

	validate: ValidatorFn<string> = (value: unknown) => {
		if (typeof value !== "string") {
			return { valid: false, error: `Expected string, received ${describe(value)}` };
		}
		if (this.minLen !== undefined && value.length < this.minLen) {
			return { valid: false, error: `String length ${value.length} is below minimum ${this.minLen}` };
		}
		return { valid: true, value };
	};
}

class NumberValidator {
	private minVal?: number;
	private maxVal?: number;
	private intOnly = false;

	min(n: number): this {
		this.minVal = n;
		return this;
	}

	max(n: number): this {
		this.maxVal = n;
		return this;
	}

	integer(): this {
		this.intOnly = true;
		return this;
	}

	validate: ValidatorFn<number> = (value: unknown) => {
		if (typeof value !== "number" || Number.isNaN(value)) {
			return { valid: false, error: `Expected number, received ${describe(value)}` };
		}
		if (this.intOnly && !Number.isInteger(value)) {
			return { valid: false, error: `Expected integer, received ${value}` };
		}
		if (this.minVal !== undefined && value < this.minVal) {
			return { valid: false, error: `Number ${value} is below minimum ${this.minVal}` };
		}
		if (this.maxVal !== undefined && value > this.maxVal) {
			return { valid: false, error: `Number ${value} exceeds maximum ${this.maxVal}` };
		}
		return { valid: true, value };
	};
}

class BooleanValidator {
	validate: ValidatorFn<boolean> = (value: unknown) => {
		if (typeof value !== "boolean") {
			return { valid: false, error: `Expected boolean, received ${describe(value)}` };
		}
		return { valid: true, value };
	};
}

type InferSchema<T extends Record<string, ValidatorFn>> = {
	[K in keyof T]: T[K] extends ValidatorFn<infer U> ? U : unknown;
};

class ObjectValidator<T extends Record<string, ValidatorFn>> {
	constructor(private schema: T) {}

	validate: ValidatorFn<InferSchema<T>> = (value: unknown) => {
		if (typeof value !== "object" || value === null || Array.isArray(value)) {
			return { valid: false, error: `Expected object, received ${describe(value)}` };
		}
		const obj = value as Record<string, unknown>;
		const result: Record<string, unknown> = {};
		const errors: string[] = [];

		for (const [key, validator] of Object.entries(this.schema)) {
			const fieldResult = validator(obj[key]);
			if (fieldResult.valid) {
				result[key] = fieldResult.value;
			} else {
				errors.push(`${key}: ${fieldResult.error}`);
			}
		}

		if (errors.length > 0) {
			return { valid: false, error: errors.join("; ") };
		}
		return { valid: true, value: result as InferSchema<T> };
	};
}

class OptionalValidator<T> {
	constructor(private inner: ValidatorFn<T>) {}

	validate: ValidatorFn<T | undefined> = (value: unknown) => {
		if (value === undefined || value === null) {
			return { valid: true, value: undefined };
		}
		return this.inner(value);
	};
}

class UnionValidator<T> {
	constructor(private validators: ValidatorFn<T>[]) {}

	validate: ValidatorFn<T> = (value: unknown) => {
		const errors: string[] = [];
		for (const validator of this.validators) {
			const result = validator(value);
			if (result.valid) return result;
			errors.push(result.error);
		}
		return { valid: false, error: `Value did not match any variant: ${errors.join(" | ")}` };
	};
}

class LiteralValidator<T extends string | number | boolean> {
	constructor(private expected: T) {}

	validate: ValidatorFn<T> = (value: unknown) => {
		if (value !== this.expected) {
			return {
				valid: false,
				error: `Expected literal ${JSON.stringify(this.expected)}, received ${JSON.stringify(value)}`,
			};
		}
		return { valid: true, value: this.expected };
	};
}

function describe(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

// ─── Fluent Builder ──────────────────────────────────────────────────────────

/**
 * Fluent validator builders.
 *
 * ```ts
 * const countV = v.number().integer().min(0).validate;
 * const requestV = v.object({
 *   pid: v.string().min(1).validate,
 *   count: v.optional(countV).validate,
 * }).validate;
 * ```
 */
export const v = {
	string: () => new StringValidator(),
	number: () => new NumberValidator(),
	boolean: () => new BooleanValidator(),
	object: <T extends Record<string, ValidatorFn>>(schema: T) => new ObjectValidator<T>(schema),
	optional: <T>(validator: ValidatorFn<T>) => new OptionalValidator<T>(validator),
	union: <T>(...validators: ValidatorFn<T>[]) => new UnionValidator<T>(validators),
	literal: <T extends string | number | boolean>(value: T) => new LiteralValidator<T>(value),
};

// ─── Utility Functions ───────────────────────────────────────────────────────

/**
 * Validate a value and return a structured {@link ValidationResult}.
 */
export function validate<T>(value: unknown, validator: ValidatorFn<T>): ValidationResult<T> {
	const result = validator(value);
	if (result.valid) {
		return { valid: true, errors: [], value: result.value };
	}
	return {
		valid: false,
		errors: [{ path: "$", message: result.error, received: value }],
	};
}

/**
 * Assert that validation passes and return the typed value.
 *
 * @param label - Optional prefix for the error message (e.g. "request body").
 * @throws AvarodhaError with code `"VALIDATION_ERROR"` if validation fails.
 */
export function assertValid<T>(value: unknown, validator: ValidatorFn<T>, label?: string): T {
	const result = validate(value, validator);
	if (!result.valid) {
		const prefix = label ? `${label}: ` : "";
		const messages = result.errors.map((e) => e.message).join("; ");
		throw new AvarodhaError(`${prefix}${messages}`, "VALIDATION_ERROR");
	}
	return result.value;
}
