/**
 * Result\<T, E\> — Railway-Oriented Programming for restkit
 *
 * A lightweight discriminated union for expressing success/failure
 * pipelines without throwing. Coercion rules, validators and the
 * dispatch pipeline steps all speak `Result`.
 *
 * @example
 * ```typescript
 * import { succeed, fail, ValidationError, type Result } from 'restkit';
 *
 * function parseId(input: string): Result<number> {
 *     const id = Number.parseInt(input, 10);
 *     return Number.isNaN(id) ? fail(new ValidationError('Invalid ID')) : succeed(id);
 * }
 *
 * const result = parseId(raw);
 * if (!result.ok) return result.error;   // Failure path
 * const id = result.value;               // Narrowed to number
 * ```
 *
 * @module
 */
import { type ValidationError } from './errors.js';

// ── Discriminated Union ──────────────────────────────────

/**
 * Successful result containing a typed value.
 *
 * @typeParam T - The success value type
 */
export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/**
 * Failed result carrying the error that stopped the pipeline.
 *
 * @typeParam E - The error type (a {@link ValidationError} by default)
 */
export interface Failure<E> {
    readonly ok: false;
    readonly error: E;
}

/**
 * Either `Success<T>` or `Failure<E>`. Check `result.ok` to narrow.
 */
export type Result<T, E = ValidationError> = Success<T> | Failure<E>;

// ── Constructors ─────────────────────────────────────────

/**
 * Create a successful result.
 *
 * @example
 * ```typescript
 * return succeed(42);
 * return succeed(undefined); // Result<void>
 * ```
 */
export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

/**
 * Create a failed result.
 *
 * @example
 * ```typescript
 * return fail(new ValidationError('5 is not >= 10'));
 * ```
 */
export function fail<E>(error: E): Failure<E> {
    return { ok: false, error };
}

/** Shared `Result<void>` success instance. */
export const OK: Success<void> = Object.freeze(succeed(undefined));
