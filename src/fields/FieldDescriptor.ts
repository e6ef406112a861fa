/**
 * FieldDescriptor — one key of a resource representation.
 *
 * A field binds a representation key (its `name`) to an attribute of the
 * internal object (its `source`) and carries a two-way coercion:
 *
 * - `decode`: representation value → internal value, then validators
 * - `encode`: internal value → representation value
 *
 * Attribute access goes through an {@link AttributeAccess} strategy so a
 * single field can read from, or fan out into, several internal keys.
 *
 * @example
 * ```typescript
 * const age = field.int('age', { details: 'age in years', source: 'ageYears', min: 0 });
 *
 * age.decode('3');                      // → { ok: true, value: 3 }
 * age.encode(3);                        // → 3
 * age.readInstance({ ageYears: 3 });    // → 3
 * ```
 *
 * @module
 */
import { ConfigurationError, ValidationError } from '../core/errors.js';
import { type Result, succeed, fail } from '../core/result.js';
import { type Validator, runValidators } from '../core/validators.js';
import { isPlainObject } from '../core/utils.js';

// ── Types ────────────────────────────────────────────────

/** Source marker passing the whole internal object to the field. */
export const WHOLE_OBJECT = '*';

/** Two-way conversion between representation and internal values. */
export interface FieldCoercion<T> {
    /** Representation → internal. Failures are data, never thrown. */
    decode(raw: unknown): Result<T>;
    /** Internal → representation. Errors thrown here propagate to the caller. */
    encode(value: unknown): unknown;
}

/** `[title, url]` pointing at the format a field follows. */
export type FieldSpec = readonly [title: string, url: string];

/**
 * How a field reads its value from an internal object and writes a
 * decoded value into the object dict.
 */
export interface AttributeAccess {
    read(instance: unknown, source: string): unknown;
    update(target: Record<string, unknown>, source: string, value: unknown): void;
}

/** Options accepted by every field factory. */
export interface FieldOptions<T> {
    /** Human description, shown in `OPTIONS` output */
    readonly details: string;
    readonly label?: string;
    /** Internal attribute name (default: the field name; `'*'` = whole object) */
    readonly source?: string;
    /** Representation is a list of values */
    readonly many?: boolean;
    /** Encoded but never decoded */
    readonly readOnly?: boolean;
    /** Decoded but never encoded */
    readonly writeOnly?: boolean;
    /** Report a missing key on a full (non-partial) decode */
    readonly required?: boolean;
    /** Run on every decoded value (each element when `many`) */
    readonly validators?: readonly Validator<T>[];
    /** Override attribute reading and/or writing */
    readonly access?: Partial<AttributeAccess>;
}

/** What a field type contributes: coercion plus documentation tags. */
export interface FieldKind<T> {
    readonly type: string;
    readonly spec?: FieldSpec;
    readonly coercion: FieldCoercion<T>;
}

/** Self-description entry, in the key order `OPTIONS` output uses. */
export interface FieldDescription {
    readonly details: string;
    readonly label: string | null;
    readonly type: string;
    readonly spec: FieldSpec | null;
}

// ── Default Access ───────────────────────────────────────

/**
 * Key-or-property lookup: `Map#get` for maps, property access for
 * everything else. Writes assign `target[source]`; with source `'*'` a
 * plain-object value is merged into the target instead.
 */
export const defaultAccess: AttributeAccess = Object.freeze({
    read(instance: unknown, source: string): unknown {
        if (source === WHOLE_OBJECT) return instance;
        if (instance === null || instance === undefined) return undefined;
        if (instance instanceof Map) return instance.get(source);
        if (typeof instance !== 'object' && typeof instance !== 'function') return undefined;
        return Reflect.get(instance, source);
    },
    update(target: Record<string, unknown>, source: string, value: unknown): void {
        if (source === WHOLE_OBJECT && isPlainObject(value)) {
            Object.assign(target, value);
            return;
        }
        target[source] = value;
    },
});

// ── Descriptor ───────────────────────────────────────────

/**
 * A declared representation field.
 *
 * @typeParam T - The internal value type of one element
 */
export class FieldDescriptor<T = unknown> {
    readonly name: string;
    readonly details: string;
    readonly label: string | undefined;
    readonly source: string;
    readonly many: boolean;
    readonly readOnly: boolean;
    readonly writeOnly: boolean;
    readonly required: boolean;
    readonly type: string;
    readonly spec: FieldSpec | undefined;

    private readonly _coercion: FieldCoercion<T>;
    private readonly _validators: readonly Validator<T>[];
    private readonly _access: AttributeAccess;

    constructor(name: string, kind: FieldKind<T>, options: FieldOptions<T>) {
        if (!name) {
            throw new ConfigurationError('Field name must be a non-empty string');
        }
        if (options.readOnly && options.writeOnly) {
            throw new ConfigurationError(`Field "${name}" cannot be both readOnly and writeOnly`);
        }
        if (options.readOnly && options.required) {
            throw new ConfigurationError(`Field "${name}" is readOnly and can never be required on input`);
        }

        this.name = name;
        this.details = options.details;
        this.label = options.label;
        this.source = options.source ?? name;
        this.many = options.many ?? false;
        this.readOnly = options.readOnly ?? false;
        this.writeOnly = options.writeOnly ?? false;
        this.required = options.required ?? false;
        this.type = kind.type;
        this.spec = kind.spec;
        this._coercion = kind.coercion;
        this._validators = Object.freeze([...(options.validators ?? [])]);
        this._access = {
            read: options.access?.read ?? defaultAccess.read,
            update: options.access?.update ?? defaultAccess.update,
        };
        Object.freeze(this);
    }

    /**
     * Representation value → internal value. With `many`, the input must
     * be an array; element failures are prefixed with their index.
     */
    decode(raw: unknown): Result<T | T[]> {
        if (!this.many) return this._decodeOne(raw);

        if (!Array.isArray(raw)) {
            return fail(new ValidationError('expected a list of values'));
        }
        const values: T[] = [];
        for (const [index, element] of raw.entries()) {
            const decoded = this._decodeOne(element);
            if (!decoded.ok) {
                return fail(new ValidationError(`[${index}] ${decoded.error.message}`, undefined, { cause: decoded.error }));
            }
            values.push(decoded.value);
        }
        return succeed(values);
    }

    /**
     * Internal value → representation value. `null`/`undefined` encode as
     * `null`, or `[]` for `many` fields.
     *
     * @throws TypeError when a `many` field's value is not a list
     */
    encode(value: unknown): unknown {
        if (value === null || value === undefined) return this.many ? [] : null;
        if (!this.many) return this._coercion.encode(value);

        if (Array.isArray(value) || value instanceof Set) {
            return Array.from(value, element => this._coercion.encode(element));
        }
        throw new TypeError(`Field "${this.name}" is many but its source "${this.source}" is not a list`);
    }

    /** Read this field's internal value from `instance`. */
    readInstance(instance: unknown): unknown {
        return this._access.read(instance, this.source);
    }

    /** Store a decoded value into the object dict under this field's source. */
    updateInstance(target: Record<string, unknown>, value: unknown): void {
        this._access.update(target, this.source, value);
    }

    describe(): FieldDescription {
        return {
            details: this.details,
            label: this.label ?? null,
            type: this.many ? `list of ${this.type}` : this.type,
            spec: this.spec ?? null,
        };
    }

    private _decodeOne(raw: unknown): Result<T> {
        const decoded = this._coercion.decode(raw);
        if (!decoded.ok) return decoded;
        const validated = runValidators(this._validators, decoded.value);
        if (!validated.ok) return validated;
        return decoded;
    }
}

// ── Factory ──────────────────────────────────────────────

/** Constructor function for one field type. */
export type FieldFactory<T> = (name: string, options: FieldOptions<T>) => FieldDescriptor<T>;

/**
 * Turn a {@link FieldKind} into a {@link FieldFactory}.
 *
 * @example
 * ```typescript
 * const isoDate = defineFieldKind<Date>({
 *     type: 'datetime',
 *     coercion: {
 *         decode: raw => typeof raw === 'string' && !Number.isNaN(Date.parse(raw))
 *             ? succeed(new Date(raw))
 *             : fail(new ValidationError('expected an ISO-8601 date')),
 *         encode: value => value instanceof Date ? value.toISOString() : String(value),
 *     },
 * });
 * ```
 */
export function defineFieldKind<T>(kind: FieldKind<T>): FieldFactory<T> {
    return (name, options) => new FieldDescriptor(name, kind, options);
}
