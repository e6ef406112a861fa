/**
 * ParameterSet — ordered registry of query parameters for one resource.
 *
 * Resolution walks the descriptors in declaration order, collects every
 * failure, and only then fails with a single {@link InvalidParametersError}
 * so the client sees all problems at once. Parameters that are optional,
 * absent and default-free are simply left out of the result.
 *
 * A ParameterSet is immutable; {@link ParameterSet.extend} returns a new
 * set. Resolution allocates a fresh mapping per call and touches no
 * shared state.
 *
 * @example
 * ```typescript
 * const params = createParams(
 *     param.string('breed', { details: 'filter by breed' }),
 *     param.int('age', { details: 'filter by age', many: true }),
 * );
 *
 * params.resolve('breed=a&breed=b&age=1&age=2');
 * // → { breed: 'b', age: [1, 2] }
 * ```
 *
 * @module
 */
import { ConfigurationError, InvalidParametersError, type ParameterError } from '../core/errors.js';
import { type Result, succeed, fail } from '../core/result.js';
import { type ParamDescriptor, type ParamDescription } from './ParamDescriptor.js';
import { type QueryInput, type RawQuery, normalizeQuery, toEchoValue } from './query.js';

/** Resolved parameters: name → stored value. Absent optional parameters have no key. */
export type Params = Readonly<Record<string, unknown>>;

export class ParameterSet {
    private readonly _params: ReadonlyMap<string, ParamDescriptor>;

    constructor(descriptors: readonly ParamDescriptor[]) {
        const params = new Map<string, ParamDescriptor>();
        for (const descriptor of descriptors) {
            if (params.has(descriptor.name)) {
                throw new ConfigurationError(`Duplicate parameter "${descriptor.name}"`);
            }
            params.set(descriptor.name, descriptor);
        }
        this._params = params;
        Object.freeze(this);
    }

    /** Parameter names in declaration order. */
    get names(): string[] {
        return [...this._params.keys()];
    }

    get size(): number {
        return this._params.size;
    }

    get(name: string): ParamDescriptor | undefined {
        return this._params.get(name);
    }

    [Symbol.iterator](): IterableIterator<ParamDescriptor> {
        return this._params.values();
    }

    /**
     * New set with `descriptors` added. `'prepend'` places them ahead of
     * the existing parameters.
     *
     * @throws ConfigurationError on a name collision
     */
    extend(descriptors: readonly ParamDescriptor[], position: 'prepend' | 'append' = 'append'): ParameterSet {
        const current = [...this._params.values()];
        return new ParameterSet(position === 'prepend'
            ? [...descriptors, ...current]
            : [...current, ...descriptors]);
    }

    /**
     * Resolve without throwing.
     *
     * @returns The parameter mapping, or the aggregate of every failure
     */
    safeResolve(query: QueryInput | RawQuery | string | undefined): Result<Params, InvalidParametersError> {
        const raw = normalizeQuery(query);
        const params: Record<string, unknown> = {};
        const errors: ParameterError[] = [];

        for (const descriptor of this._params.values()) {
            const outcome = descriptor.resolve(raw.get(descriptor.name));
            switch (outcome.status) {
                case 'resolved':
                    params[descriptor.name] = outcome.value;
                    break;
                case 'failed':
                    errors.push(outcome.error);
                    break;
                case 'omitted':
                    break;
            }
        }

        if (errors.length > 0) return fail(new InvalidParametersError(errors));
        return succeed(params);
    }

    /**
     * Resolve a raw query into validated parameters.
     *
     * @throws InvalidParametersError listing every failing parameter
     */
    resolve(query: QueryInput | RawQuery | string | undefined): Params {
        const result = this.safeResolve(query);
        if (!result.ok) throw result.error;
        return result.value;
    }

    /**
     * The subset of `params` that may be echoed back to the client, in
     * declaration order and in JSON-friendly form.
     */
    echo(params: Params): Record<string, unknown> {
        const echoed: Record<string, unknown> = {};
        for (const descriptor of this._params.values()) {
            if (!descriptor.echo || !Object.hasOwn(params, descriptor.name)) continue;
            echoed[descriptor.name] = toEchoValue(params[descriptor.name]);
        }
        return echoed;
    }

    /**
     * The raw values the client sent for echoable parameters, in
     * declaration order. Single-valued parameters keep only their last
     * occurrence; absent parameters are left out.
     *
     * ```
     * params.echoQuery('tag=a&breed=x&breed=y&tag=b')
     * // → [['breed', ['y']], ['tag', ['a', 'b']]]
     * ```
     */
    echoQuery(query: QueryInput | RawQuery | string | undefined): Array<readonly [string, readonly string[]]> {
        const raw = normalizeQuery(query);
        const entries: Array<readonly [string, readonly string[]]> = [];
        for (const descriptor of this._params.values()) {
            const values = raw.get(descriptor.name);
            if (!descriptor.echo || values === undefined || values.length === 0) continue;
            entries.push([descriptor.name, descriptor.many ? values : values.slice(-1)]);
        }
        return entries;
    }

    /** Ordered description of every parameter. */
    describe(): Record<string, ParamDescription> {
        const description: Record<string, ParamDescription> = {};
        for (const descriptor of this._params.values()) {
            description[descriptor.name] = descriptor.describe();
        }
        return description;
    }
}

/** Build a {@link ParameterSet} from descriptors, in the given order. */
export function createParams(...descriptors: ParamDescriptor[]): ParameterSet {
    return new ParameterSet(descriptors);
}
