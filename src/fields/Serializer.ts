/**
 * Serializer — the representation schema of a resource.
 *
 * An ordered registry of {@link FieldDescriptor}s plus optional
 * object-level validation hooks, assembled with a fluent builder:
 *
 * ```typescript
 * const CatSerializer = createSerializer('Cat')
 *     .field(field.string('name', { details: 'cat name', required: true }))
 *     .field(field.int('age', { details: 'age in years', source: 'ageYears', min: 0, max: 30 }))
 *     .validate((cat, partial) => partial || cat['name'] !== 'nobody'
 *         ? []
 *         : [new ValidationError('"nobody" is reserved', 'name')]);
 *
 * CatSerializer.encode({ name: 'Molly', ageYears: 3 });
 * // → { name: 'Molly', age: 3 }
 *
 * CatSerializer.decode({ name: 'Molly', age: '3' });
 * // → { name: 'Molly', ageYears: 3 }
 * ```
 *
 * Encoding reads each field from the internal object by its source and
 * writes it under the field name. Decoding does the reverse into a fresh
 * "object dict" keyed by source, collecting every field failure before
 * the object-level hooks run.
 *
 * A serializer is sealed by its first encode, decode or describe call;
 * further builder calls throw. Use {@link Serializer.extend} to derive
 * a variant.
 *
 * @module
 */
import { type ZodType, type ZodTypeDef, ZodObject } from 'zod';
import { ConfigurationError, InvalidRepresentationError, ValidationError } from '../core/errors.js';
import { type Result, succeed, fail } from '../core/result.js';
import { isPlainObject } from '../core/utils.js';
import { issuesToErrors } from '../core/zod.js';
import { type FieldDescriptor, type FieldDescription } from './FieldDescriptor.js';

// ── Types ────────────────────────────────────────────────

/** Decoded values keyed by field source. */
export type ObjectDict = Record<string, unknown>;

/** Encoded representation keyed by field name. */
export type Representation = Record<string, unknown>;

/**
 * Object-level validation hook. Runs only when every field decoded
 * cleanly. Return the failures found (empty when valid); a thrown
 * {@link ValidationError} counts as one failure.
 */
export type ObjectValidator = (objectDict: Readonly<ObjectDict>, partial: boolean) => readonly ValidationError[];

// ── Serializer ───────────────────────────────────────────

export class Serializer {
    readonly name: string;

    private readonly _fields = new Map<string, FieldDescriptor>();
    private readonly _objectValidators: ObjectValidator[] = [];
    private _sealed = false;

    /** @internal Use {@link createSerializer} factory instead */
    constructor(name: string) {
        if (!name) throw new ConfigurationError('Serializer name must be a non-empty string');
        this.name = name;
    }

    private _assertNotSealed(): void {
        if (this._sealed) {
            throw new ConfigurationError(
                `Serializer "${this.name}" is sealed after first use. ` +
                `Add fields and validators before encoding, decoding or describing.`,
            );
        }
    }

    // ── Builder ──────────────────────────────────────────

    /**
     * Append a field.
     *
     * @throws ConfigurationError on a duplicate field name
     */
    field(descriptor: FieldDescriptor): this {
        this._assertNotSealed();
        if (this._fields.has(descriptor.name)) {
            throw new ConfigurationError(`Serializer "${this.name}": duplicate field "${descriptor.name}"`);
        }
        this._fields.set(descriptor.name, descriptor);
        return this;
    }

    /** Append several fields, in order. */
    fields(...descriptors: FieldDescriptor[]): this {
        for (const descriptor of descriptors) this.field(descriptor);
        return this;
    }

    /** Append an object-level validation hook. Hooks run in registration order. */
    validate(hook: ObjectValidator): this {
        this._assertNotSealed();
        this._objectValidators.push(hook);
        return this;
    }

    /**
     * Validate the decoded object dict against a Zod schema. On a partial
     * decode a `z.object` schema is relaxed with `.partial()`.
     *
     * @example
     * ```typescript
     * serializer.validateWith(z.object({ min: z.number(), max: z.number() })
     *     .refine(v => v.min <= v.max, { message: 'min exceeds max', path: ['min'] }));
     * ```
     */
    validateWith(schema: ZodType<unknown, ZodTypeDef, unknown>): this {
        const relaxed = schema instanceof ZodObject ? schema.partial() : schema;
        return this.validate((objectDict, partial) => {
            const parsed = (partial ? relaxed : schema).safeParse(objectDict);
            return parsed.success ? [] : issuesToErrors(parsed.error.issues);
        });
    }

    /**
     * New, unsealed serializer with this one's fields and hooks copied in.
     *
     * ```typescript
     * const CatDetail = CatSerializer.extend('CatDetail')
     *     .field(field.string('bio', { details: 'long description' }));
     * ```
     */
    extend(name: string): Serializer {
        const derived = new Serializer(name);
        for (const descriptor of this._fields.values()) derived.field(descriptor);
        for (const hook of this._objectValidators) derived.validate(hook);
        return derived;
    }

    // ── Introspection ────────────────────────────────────

    /** Field names in declaration order. */
    get fieldNames(): string[] {
        return [...this._fields.keys()];
    }

    /** Ordered description of every field. */
    describe(): Record<string, FieldDescription> {
        this._sealed = true;
        const description: Record<string, FieldDescription> = {};
        for (const descriptor of this._fields.values()) {
            description[descriptor.name] = descriptor.describe();
        }
        return description;
    }

    // ── Encode ───────────────────────────────────────────

    /**
     * Internal object → representation, in field declaration order.
     * Write-only fields are skipped. Errors raised by a field's encoder
     * propagate.
     */
    encode(instance: unknown): Representation {
        this._sealed = true;
        const representation: Representation = {};
        for (const descriptor of this._fields.values()) {
            if (descriptor.writeOnly) continue;
            representation[descriptor.name] = descriptor.encode(descriptor.readInstance(instance));
        }
        return representation;
    }

    /** {@link encode} applied to every element. */
    encodeMany(instances: Iterable<unknown>): Representation[] {
        return Array.from(instances, instance => this.encode(instance));
    }

    // ── Decode ───────────────────────────────────────────

    /**
     * Representation → object dict, without throwing.
     *
     * Field failures are collected across all fields. Object-level hooks
     * run only when no field failed.
     *
     * @param partial - Skip absent fields instead of reporting required ones
     */
    safeDecode(representation: unknown, partial = false): Result<ObjectDict, InvalidRepresentationError> {
        this._sealed = true;
        if (!isPlainObject(representation)) {
            return fail(new InvalidRepresentationError([
                new ValidationError('representation must be a JSON object'),
            ]));
        }

        const objectDict: ObjectDict = {};
        const errors: ValidationError[] = [];

        for (const descriptor of this._fields.values()) {
            if (descriptor.readOnly) continue;

            if (!Object.hasOwn(representation, descriptor.name)) {
                if (!partial && descriptor.required) {
                    errors.push(new ValidationError('missing required field', descriptor.name));
                }
                continue;
            }

            const decoded = descriptor.decode(representation[descriptor.name]);
            if (!decoded.ok) {
                errors.push(decoded.error.forField(descriptor.name));
                continue;
            }
            descriptor.updateInstance(objectDict, decoded.value);
        }

        if (errors.length === 0) {
            for (const hook of this._objectValidators) {
                errors.push(...this._runHook(hook, objectDict, partial));
            }
        }

        if (errors.length > 0) return fail(new InvalidRepresentationError(errors));
        return succeed(objectDict);
    }

    /**
     * Representation → object dict.
     *
     * @throws InvalidRepresentationError listing every failure
     */
    decode(representation: unknown, partial = false): ObjectDict {
        const result = this.safeDecode(representation, partial);
        if (!result.ok) throw result.error;
        return result.value;
    }

    private _runHook(hook: ObjectValidator, objectDict: ObjectDict, partial: boolean): readonly ValidationError[] {
        try {
            return hook(objectDict, partial);
        } catch (err) {
            if (err instanceof ValidationError) return [err];
            throw err;
        }
    }
}

/**
 * Create a new, empty {@link Serializer}.
 *
 * @param name - Used in error messages and `OPTIONS` output
 */
export function createSerializer(name: string): Serializer {
    return new Serializer(name);
}
