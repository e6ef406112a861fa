/**
 * Validators — pure checks run on already-coerced values.
 *
 * A validator never transforms its input: it answers `OK` or a
 * {@link ValidationError}. Descriptors evaluate their validators in order
 * and stop at the first failure; the owning {@link ParameterSet} or
 * {@link Serializer} then aggregates failures across descriptors.
 *
 * @example
 * ```typescript
 * import { param, validators } from 'restkit';
 *
 * param.int('age', {
 *     details: 'cat age in years',
 *     validators: [validators.range(0, 30)],
 * });
 * ```
 *
 * @module
 */
import { type ZodType, type ZodTypeDef } from 'zod';
import { ConfigurationError, ValidationError } from './errors.js';
import { type Result, OK, fail } from './result.js';
import { formatZodIssues } from './zod.js';

// ── Contract ─────────────────────────────────────────────

/** A check evaluated against a coerced value. */
export interface Validator<T> {
    /** Short label for debugging (e.g. `'min(0)'`) */
    readonly label?: string;
    validate(value: T): Result<void>;
}

/**
 * Run `validators` in order; the first failure wins.
 */
export function runValidators<T>(validators: readonly Validator<T>[], value: T): Result<void> {
    for (const validator of validators) {
        const result = validator.validate(value);
        if (!result.ok) return result;
    }
    return OK;
}

// ── Factories ────────────────────────────────────────────

/**
 * Build a validator from a predicate.
 *
 * @param predicate - Returns `true` when the value is acceptable
 * @param message - Failure message, or a function of the rejected value
 */
export function validator<T>(
    predicate: (value: T) => boolean,
    message: string | ((value: T) => string),
    label?: string,
): Validator<T> {
    return {
        label,
        validate(value) {
            if (predicate(value)) return OK;
            return fail(new ValidationError(typeof message === 'string' ? message : message(value)));
        },
    };
}

/** `value >= minValue` */
export function min(minValue: number): Validator<number> {
    return validator<number>(v => v >= minValue, v => `${v} is not >= ${minValue}`, `min(${minValue})`);
}

/** `value <= maxValue` */
export function max(maxValue: number): Validator<number> {
    return validator<number>(v => v <= maxValue, v => `${v} is not <= ${maxValue}`, `max(${maxValue})`);
}

/**
 * `minValue <= value <= maxValue`, reported with the same messages as
 * {@link min} and {@link max}.
 */
export function range(minValue: number, maxValue: number): Validator<number> {
    if (minValue > maxValue) {
        throw new ConfigurationError(`range(${minValue}, ${maxValue}): lower bound exceeds upper bound`);
    }
    const lower = min(minValue);
    const upper = max(maxValue);
    return {
        label: `range(${minValue}, ${maxValue})`,
        validate(value) {
            const result = lower.validate(value);
            return result.ok ? upper.validate(value) : result;
        },
    };
}

/** Value must be one of `values` (compared with `===`). */
export function choices<T extends string | number | boolean>(values: readonly T[]): Validator<T> {
    const allowed = new Set<T>(values);
    const listed = JSON.stringify(values);
    return validator<T>(v => allowed.has(v), v => `${String(v)} is not in ${listed}`, 'choices');
}

/**
 * Value must match `pattern`. A string pattern is compiled once, here;
 * an invalid one is a {@link ConfigurationError}.
 */
export function match(pattern: string | RegExp): Validator<string> {
    let compiled: RegExp;
    try {
        compiled = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
    } catch (err) {
        throw new ConfigurationError(`match(${String(pattern)}): invalid pattern`, { cause: err });
    }

    return validator<string>(
        v => {
            compiled.lastIndex = 0;
            return compiled.test(v);
        },
        v => `${v} does not match pattern: ${compiled.source}`,
        `match(${compiled.source})`,
    );
}

/**
 * Use any Zod schema as a validator. Only acceptance matters; the
 * schema's output is discarded.
 *
 * @example
 * ```typescript
 * validators.zodCheck(z.string().email())
 * ```
 */
export function zodCheck<T>(schema: ZodType<unknown, ZodTypeDef, unknown>): Validator<T> {
    return {
        label: 'zod',
        validate(value) {
            const parsed = schema.safeParse(value);
            if (parsed.success) return OK;
            return fail(new ValidationError(formatZodIssues(parsed.error.issues), undefined, { cause: parsed.error }));
        },
    };
}
