/**
 * Containers — how a `many` parameter combines its coerced values.
 *
 * A tagged variant: `list` keeps arrival order and duplicates, `set`
 * de-duplicates (first occurrence order), `custom` runs an arbitrary
 * reduction.
 *
 * @example
 * ```typescript
 * param.int('id', { details: 'ids to fetch', many: true, container: containers.set() });
 * param.int('n', { details: 'summed', many: true, container: containers.custom(ns => ns.reduce((a, b) => a + b, 0)) });
 * ```
 *
 * @module
 */

export type ContainerKind = 'list' | 'set' | 'custom';

/** Combines the coerced values of a `many` parameter into its stored value. */
export interface Container<T, V> {
    readonly kind: ContainerKind;
    combine(values: readonly T[]): V;
}

/** Ordered list. The default container. */
export function list<T>(): Container<T, T[]> {
    return { kind: 'list', combine: values => [...values] };
}

/** `Set` of the distinct values. */
export function set<T>(): Container<T, Set<T>> {
    return { kind: 'set', combine: values => new Set(values) };
}

/** Arbitrary reduction over the ordered values. */
export function custom<T, V>(combine: (values: readonly T[]) => V): Container<T, V> {
    return { kind: 'custom', combine };
}
