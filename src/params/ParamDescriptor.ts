/**
 * ParamDescriptor — one declared query-string parameter.
 *
 * Holds the parameter's name, documentation, required/default policy,
 * multiplicity and the read pipeline (coercion → selection or container →
 * validators). Instances are frozen at construction; a wiring mistake
 * such as `required` together with `default` fails right here, never
 * while serving a request.
 *
 * Use the {@link param} factories rather than this class directly.
 *
 * @module
 */
import { ConfigurationError, ParameterError, type ValidationError } from '../core/errors.js';
import { type Result, succeed } from '../core/result.js';
import { type Validator, runValidators } from '../core/validators.js';
import { type Container, type ContainerKind, list } from './Container.js';

// ── Types ────────────────────────────────────────────────

/** Coercion rule: raw query string → typed value, or a failure. */
export type Coercion<T> = (raw: string) => Result<T>;

/** `[title, url]` pointing at the format a parameter follows. */
export type ParamSpec = readonly [title: string, url: string];

/** Options shared by every parameter. */
export interface BaseParamOptions {
    /** Human description, shown in `OPTIONS` output */
    readonly details: string;
    /** Short human label */
    readonly label?: string;
    /** Reject requests that omit this parameter */
    readonly required?: boolean;
    /** Raw string used when the parameter is absent (coerced like client input) */
    readonly default?: string;
    /** Include the resolved value in `meta.params` and pagination links (default `true`) */
    readonly echo?: boolean;
}

/** Options for a single-valued parameter. */
export interface SingleParamOptions<T> extends BaseParamOptions {
    readonly many?: false;
    readonly validators?: readonly Validator<T>[];
}

/** Options for a multi-valued parameter; validators see the combined value. */
export interface ManyParamOptions<T, V> extends BaseParamOptions {
    readonly many: true;
    /** How coerced values are combined (default: ordered list) */
    readonly container?: Container<T, V>;
    readonly validators?: readonly Validator<V>[];
}

/** What a parameter type contributes: coercion plus documentation tags. */
export interface ParamKind<T> {
    readonly type: string;
    readonly spec?: ParamSpec;
    readonly coerce: Coercion<T>;
}

/** Outcome of resolving one parameter against the request's raw values. */
export type ParamResolution<V> =
    | { readonly status: 'omitted' }
    | { readonly status: 'resolved'; readonly value: V }
    | { readonly status: 'failed'; readonly error: ParameterError };

/** Self-description entry, in the key order `OPTIONS` output uses. */
export interface ParamDescription {
    readonly details: string;
    readonly label: string | null;
    readonly required: boolean;
    readonly default: string | null;
    readonly type: string;
    readonly spec: ParamSpec | null;
}

/** @internal Normalised constructor input */
export interface ParamDescriptorConfig<V> extends BaseParamOptions {
    readonly name: string;
    readonly type: string;
    readonly spec?: ParamSpec;
    readonly many: boolean;
    readonly containerKind?: ContainerKind;
    /** Raw values (never empty) → coerced, selected or combined value */
    readonly read: (raws: readonly string[]) => Result<V>;
    readonly validators: readonly Validator<V>[];
}

// ── Descriptor ───────────────────────────────────────────

/**
 * A declared query parameter.
 *
 * @typeParam V - The stored value type (the container's output for `many`)
 */
export class ParamDescriptor<V = unknown> {
    readonly name: string;
    readonly details: string;
    readonly label: string | undefined;
    readonly required: boolean;
    readonly default: string | undefined;
    readonly many: boolean;
    readonly containerKind: ContainerKind | undefined;
    readonly echo: boolean;
    readonly type: string;
    readonly spec: ParamSpec | undefined;

    private readonly _read: (raws: readonly string[]) => Result<V>;
    private readonly _validators: readonly Validator<V>[];

    constructor(config: ParamDescriptorConfig<V>) {
        if (!config.name) {
            throw new ConfigurationError('Parameter name must be a non-empty string');
        }
        if (config.default !== undefined && typeof config.default !== 'string') {
            throw new ConfigurationError(
                `Parameter "${config.name}": default must be a raw string, got ${typeof config.default}`,
            );
        }
        if (config.required && config.default !== undefined) {
            throw new ConfigurationError(
                `Parameter "${config.name}" (required, default='${config.default}'): ` +
                `initialization with both required and default makes no sense`,
            );
        }

        this.name = config.name;
        this.details = config.details;
        this.label = config.label;
        this.required = config.required ?? false;
        this.default = config.default;
        this.many = config.many;
        this.containerKind = config.containerKind;
        this.echo = config.echo ?? true;
        this.type = config.type;
        this.spec = config.spec;
        this._read = config.read;
        this._validators = Object.freeze([...config.validators]);

        if (this.default !== undefined) {
            const coerced = this._read([this.default]);
            if (!coerced.ok) {
                throw new ConfigurationError(
                    `Parameter "${this.name}": default '${this.default}' does not coerce: ${coerced.error.message}`,
                    { cause: coerced.error },
                );
            }
        }
        Object.freeze(this);
    }

    /**
     * Resolve this parameter from the raw values the client sent for it.
     *
     * - absent: missing-required failure, the default, or omitted
     * - present: coerce (last occurrence wins unless `many`), then validate
     */
    resolve(raws: readonly string[] | undefined): ParamResolution<V> {
        let values = raws;
        if (values === undefined || values.length === 0) {
            if (this.required) {
                return { status: 'failed', error: new ParameterError(this.name, 'missing required parameter') };
            }
            if (this.default === undefined) return { status: 'omitted' };
            values = [this.default];
        }

        const read = this._read(values);
        if (!read.ok) return { status: 'failed', error: this._toParameterError(read.error) };

        const validated = runValidators(this._validators, read.value);
        if (!validated.ok) return { status: 'failed', error: this._toParameterError(validated.error) };

        return { status: 'resolved', value: read.value };
    }

    /** Describe this parameter for `OPTIONS` output. */
    describe(): ParamDescription {
        return {
            details: this.details,
            label: this.label ?? null,
            required: this.required,
            default: this.default ?? null,
            type: this.type,
            spec: this.spec ?? null,
        };
    }

    private _toParameterError(error: ValidationError): ParameterError {
        return new ParameterError(this.name, error.message, { cause: error });
    }
}

// ── Readers ──────────────────────────────────────────────

/** @internal Coerce only the last raw value. */
export function readLast<T>(coerce: Coercion<T>): (raws: readonly string[]) => Result<T> {
    return raws => coerce(raws[raws.length - 1] ?? '');
}

/** @internal Coerce every raw value in order, then combine. */
export function readAll<T, V>(
    coerce: Coercion<T>,
    container: Container<T, V>,
): (raws: readonly string[]) => Result<V> {
    return raws => {
        const values: T[] = [];
        for (const raw of raws) {
            const coerced = coerce(raw);
            if (!coerced.ok) return coerced;
            values.push(coerced.value);
        }
        return succeed(container.combine(values));
    };
}

// ── Factory ──────────────────────────────────────────────

/**
 * Overloaded constructor function for one parameter type:
 * single-valued, or `many: true` with an optional container.
 */
export interface ParamFactory<T> {
    (name: string, options: SingleParamOptions<T>): ParamDescriptor<T>;
    <V = T[]>(name: string, options: ManyParamOptions<T, V>): ParamDescriptor<V>;
}

/**
 * Turn a {@link ParamKind} into a {@link ParamFactory}.
 *
 * @example
 * ```typescript
 * const hexParam = defineParamKind<number>({
 *     type: 'hex',
 *     coerce: raw => /^[0-9a-f]+$/i.test(raw)
 *         ? succeed(Number.parseInt(raw, 16))
 *         : fail(new ValidationError(`'${raw}' is not hexadecimal`)),
 * });
 * hexParam('color', { details: 'RGB color' });
 * ```
 */
export function defineParamKind<T>(kind: ParamKind<T>): ParamFactory<T> {
    function create(name: string, options: SingleParamOptions<T>): ParamDescriptor<T>;
    function create<V = T[]>(name: string, options: ManyParamOptions<T, V>): ParamDescriptor<V>;
    function create(
        name: string,
        options: SingleParamOptions<T> | ManyParamOptions<T, unknown>,
    ): ParamDescriptor<unknown> {
        const shared = {
            name,
            details: options.details,
            label: options.label,
            required: options.required,
            default: options.default,
            echo: options.echo,
            type: kind.type,
            spec: kind.spec,
        };

        if (options.many === true) {
            const container: Container<T, unknown> = options.container ?? list<T>();
            return new ParamDescriptor<unknown>({
                ...shared,
                many: true,
                containerKind: container.kind,
                read: readAll(kind.coerce, container),
                validators: options.validators ?? [],
            });
        }

        return new ParamDescriptor<T>({
            ...shared,
            many: false,
            read: readLast(kind.coerce),
            validators: options.validators ?? [],
        });
    }
    return create;
}
