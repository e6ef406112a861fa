/**
 * Built-in field types.
 *
 * Decoding runs a Zod schema over the representation value; encoding is a
 * plain conversion. `int` and `float` take `min`/`max` shortcuts that
 * append the matching validators.
 *
 * @example
 * ```typescript
 * import { createSerializer, field } from 'restkit';
 *
 * const CatSerializer = createSerializer('Cat')
 *     .field(field.raw('id', { details: 'cat identifier', readOnly: true }))
 *     .field(field.string('name', { details: 'cat name' }))
 *     .field(field.int('age', { details: 'age in years', min: 0, max: 30 }))
 *     .field(field.bool('indoor', { details: 'lives indoors', representations: ['no', 'yes'] }));
 * ```
 *
 * @module
 */
import { z, type ZodType, type ZodTypeDef } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { succeed } from '../core/result.js';
import { INTEGER, DECIMAL, booleanToken } from '../core/tokens.js';
import { type Validator, min, max } from '../core/validators.js';
import { parseWith } from '../core/zod.js';
import {
    type FieldCoercion, type FieldDescriptor, type FieldFactory, type FieldOptions,
    defineFieldKind,
} from './FieldDescriptor.js';

// ── Coercion Schemas ─────────────────────────────────────

function describeRaw(raw: unknown): string {
    return typeof raw === 'string' ? `'${raw}'` : String(JSON.stringify(raw));
}

const integerSchema = z.unknown().transform((raw, ctx) => {
    let value = Number.NaN;
    if (typeof raw === 'number') value = raw;
    else if (typeof raw === 'string' && INTEGER.test(raw.trim())) value = Number(raw.trim());

    if (!Number.isSafeInteger(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${describeRaw(raw)} is not a valid integer` });
        return z.NEVER;
    }
    return value;
});

const floatSchema = z.unknown().transform((raw, ctx) => {
    let value = Number.NaN;
    if (typeof raw === 'number') value = raw;
    else if (typeof raw === 'string' && DECIMAL.test(raw.trim())) value = Number(raw.trim());

    if (!Number.isFinite(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${describeRaw(raw)} is not a valid number` });
        return z.NEVER;
    }
    return value;
});

const booleanSchema = z.unknown().transform((raw, ctx) => {
    if (typeof raw === 'boolean') return raw;
    if (raw === 1 || raw === 0) return raw === 1;
    const value = typeof raw === 'string' ? booleanToken(raw) : undefined;
    if (value !== undefined) return value;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${describeRaw(raw)} is not a valid boolean` });
    return z.NEVER;
});

/** Wrap a Zod schema and an encoder as a {@link FieldCoercion}. */
export function zodFieldCoercion<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    encode: (value: unknown) => unknown,
): FieldCoercion<T> {
    return { decode: raw => parseWith(schema, raw), encode };
}

// ── Options ──────────────────────────────────────────────

/** Numeric field options: `min`/`max` append range validators. */
export interface NumberFieldOptions extends FieldOptions<number> {
    readonly min?: number;
    readonly max?: number;
}

/** Boolean field options. */
export interface BoolFieldOptions extends FieldOptions<boolean> {
    /**
     * `[falseRepr, trueRepr]` used on the wire instead of `false`/`true`.
     * Decoding then accepts exactly these two values.
     */
    readonly representations?: readonly [falseRepr: unknown, trueRepr: unknown];
}

function withBounds(name: string, options: NumberFieldOptions): FieldOptions<number> {
    const { min: lower, max: upper, ...rest } = options;
    if (lower !== undefined && upper !== undefined && lower > upper) {
        throw new ConfigurationError(`Field "${name}": min (${lower}) exceeds max (${upper})`);
    }
    const bounds: Validator<number>[] = [];
    if (lower !== undefined) bounds.push(min(lower));
    if (upper !== undefined) bounds.push(max(upper));
    return { ...rest, validators: [...bounds, ...(rest.validators ?? [])] };
}

// ── Factories ────────────────────────────────────────────

/** Value passed through untouched both ways. */
export const rawField: FieldFactory<unknown> = defineFieldKind<unknown>({
    type: 'string',
    coercion: { decode: raw => succeed(raw), encode: value => value },
});

/** Must be a string on input; anything is stringified on output. */
export const stringField: FieldFactory<string> = defineFieldKind({
    type: 'string',
    coercion: zodFieldCoercion(z.string(), value => String(value)),
});

const intKind = defineFieldKind<number>({
    type: 'int',
    coercion: zodFieldCoercion(integerSchema, value => Math.trunc(Number(value))),
});

const floatKind = defineFieldKind<number>({
    type: 'float',
    coercion: zodFieldCoercion(floatSchema, value => Number(value)),
});

const boolKind = defineFieldKind<boolean>({
    type: 'bool',
    coercion: zodFieldCoercion(booleanSchema, value => Boolean(value)),
});

/** Integer, or a string holding one. */
export function intField(name: string, options: NumberFieldOptions): FieldDescriptor<number> {
    return intKind(name, withBounds(name, options));
}

/** Finite number, or a string holding one. */
export function floatField(name: string, options: NumberFieldOptions): FieldDescriptor<number> {
    return floatKind(name, withBounds(name, options));
}

/** Boolean, `0`/`1`, boolean tokens, or a custom representation pair. */
export function boolField(name: string, options: BoolFieldOptions): FieldDescriptor<boolean> {
    const { representations, ...rest } = options;
    if (representations === undefined) return boolKind(name, rest);

    const [falseRepr, trueRepr] = representations;
    if (Object.is(falseRepr, trueRepr)) {
        throw new ConfigurationError(`Field "${name}": both boolean representations are ${describeRaw(trueRepr)}`);
    }
    const pairSchema = z.unknown().transform((raw, ctx) => {
        if (Object.is(raw, trueRepr)) return true;
        if (Object.is(raw, falseRepr)) return false;
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${describeRaw(raw)} is not one of ${describeRaw(falseRepr)}, ${describeRaw(trueRepr)}`,
        });
        return z.NEVER;
    });
    return defineFieldKind({
        type: 'bool',
        coercion: zodFieldCoercion(pairSchema, value => (value ? trueRepr : falseRepr)),
    })(name, rest);
}
