/**
 * Built-in parameter types.
 *
 * Each coercion is a Zod schema over the raw query string, run with
 * `safeParse`; Zod issues surface as the parameter's error message.
 *
 * @example
 * ```typescript
 * import { param, validators } from 'restkit';
 *
 * const breed = param.string('breed', { details: 'filter cats by breed' });
 * const age = param.int('age', { details: 'age in years', validators: [validators.min(0)] });
 * const ids = param.int('id', { details: 'ids to fetch', many: true });
 * const order = param.enumOf(['asc', 'desc'])('order', { details: 'sort order', default: 'asc' });
 * ```
 *
 * @module
 */
import { z, type ZodType, type ZodTypeDef } from 'zod';
import { INTEGER, DECIMAL, booleanToken } from '../core/tokens.js';
import { parseWith } from '../core/zod.js';
import { type Coercion, type ParamFactory, type ParamSpec, defineParamKind } from './ParamDescriptor.js';

// ── Coercion Schemas ─────────────────────────────────────

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const integerSchema = z.string().transform((raw, ctx) => {
    const text = raw.trim();
    const value = Number(text);
    if (!INTEGER.test(text) || !Number.isSafeInteger(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${raw}' is not a valid integer` });
        return z.NEVER;
    }
    return value;
});

const floatSchema = z.string().transform((raw, ctx) => {
    const text = raw.trim();
    const value = Number(text);
    if (!DECIMAL.test(text) || !Number.isFinite(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${raw}' is not a valid number` });
        return z.NEVER;
    }
    return value;
});

const decimalSchema = z.string().transform((raw, ctx) => {
    const text = raw.trim();
    if (!DECIMAL.test(text)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${raw}' is not a valid decimal` });
        return z.NEVER;
    }
    return text;
});

const booleanSchema = z.string().transform((raw, ctx) => {
    const value = booleanToken(raw);
    if (value !== undefined) return value;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${raw}' is not a valid boolean` });
    return z.NEVER;
});

const utf8 = new TextDecoder('utf-8', { fatal: true });

const base64Schema = z.string().transform((raw, ctx) => {
    if (raw.length % 4 !== 0 || !BASE64.test(raw)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${raw}' is not valid base64` });
        return z.NEVER;
    }
    try {
        return utf8.decode(Buffer.from(raw, 'base64'));
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${raw}' does not decode to UTF-8 text (${reason})` });
        return z.NEVER;
    }
});

/** Wrap a Zod schema over strings as a {@link Coercion}. */
export function zodCoercion<T>(schema: ZodType<T, ZodTypeDef, string>): Coercion<T> {
    return raw => parseWith(schema, raw);
}

// ── Factories ────────────────────────────────────────────

/** Value passed through exactly as sent. */
export const stringParam: ParamFactory<string> = defineParamKind({
    type: 'string',
    coerce: zodCoercion(z.string()),
});

/** Base-10 integer within the safe integer range. */
export const intParam: ParamFactory<number> = defineParamKind({
    type: 'integer',
    coerce: zodCoercion(integerSchema),
});

/** Finite decimal number (`1`, `-2.5`, `1e3`). */
export const floatParam: ParamFactory<number> = defineParamKind({
    type: 'float',
    coerce: zodCoercion(floatSchema),
});

/**
 * Decimal number kept as its exact text (`'0.10'` stays `'0.10'`), for
 * amounts a float would round. Hand it to a decimal library of your choice.
 */
export const decimalParam: ParamFactory<string> = defineParamKind({
    type: 'decimal',
    coerce: zodCoercion(decimalSchema),
});

/** `true/t/yes/y/1/on` or `false/f/no/n/0/off`, case-insensitive. */
export const boolParam: ParamFactory<boolean> = defineParamKind({
    type: 'bool',
    coerce: zodCoercion(booleanSchema),
});

const RFC_4648: ParamSpec = ['RFC-4648 Section 4', 'https://tools.ietf.org/html/rfc4648#section-4'];

/** Base64-encoded UTF-8 text, decoded. */
export const base64Param: ParamFactory<string> = defineParamKind({
    type: 'string',
    spec: RFC_4648,
    coerce: zodCoercion(base64Schema),
});

/**
 * One of a fixed set of string values.
 *
 * ```typescript
 * param.enumOf(['asc', 'desc'])('order', { details: 'sort order' })
 * ```
 */
export function enumParam<V extends string>(values: readonly [V, ...V[]]): ParamFactory<V> {
    const schema = z.enum(values);
    return defineParamKind<V>({
        type: 'string',
        coerce: raw => parseWith(schema, raw),
    });
}

/**
 * Parameter type from any Zod schema over the raw string.
 *
 * ```typescript
 * const since = param.fromZod(z.string().datetime().transform(s => new Date(s)), 'datetime');
 * since('since', { details: 'only entries newer than this' });
 * ```
 */
export function zodParam<T>(
    schema: ZodType<T, ZodTypeDef, string>,
    type: string,
    spec?: ParamSpec,
): ParamFactory<T> {
    return defineParamKind({ type, spec, coerce: zodCoercion(schema) });
}
