/**
 * Query-string plumbing: normalising the multi-map the host hands over,
 * turning resolved values back into echoable form, and rendering query
 * strings for pagination links.
 *
 * @module
 */

/**
 * Multi-valued query input. Hosts usually already hold a
 * `URLSearchParams`; a record of `string | string[]` is accepted too.
 */
export type QueryInput =
    | URLSearchParams
    | Readonly<Record<string, string | readonly string[] | undefined>>;

/** Normalised query: name → raw values in arrival order. */
export type RawQuery = ReadonlyMap<string, readonly string[]>;

/**
 * Normalise any {@link QueryInput} (or a raw `a=1&b=2` string) into a
 * {@link RawQuery}. An already normalised query is returned as-is.
 */
export function normalizeQuery(query: QueryInput | RawQuery | string | undefined): RawQuery {
    if (isRawQuery(query)) return query;
    const raw = new Map<string, string[]>();
    if (query === undefined) return raw;

    if (typeof query === 'string' || query instanceof URLSearchParams) {
        const search = typeof query === 'string' ? new URLSearchParams(query) : query;
        for (const [key, value] of search) {
            const values = raw.get(key);
            if (values) values.push(value);
            else raw.set(key, [value]);
        }
        return raw;
    }

    for (const [key, value] of Object.entries(query)) {
        if (value === undefined) continue;
        raw.set(key, typeof value === 'string' ? [value] : [...value]);
    }
    return raw;
}

function isRawQuery(query: QueryInput | RawQuery | string | undefined): query is RawQuery {
    return query instanceof Map;
}

/**
 * JSON-friendly form of a resolved value: `Set`s become arrays, `Date`s
 * ISO strings. Everything else is returned as-is.
 */
export function toEchoValue(value: unknown): unknown {
    if (value instanceof Set) return [...value].map(toEchoValue);
    if (Array.isArray(value)) return value.map(toEchoValue);
    if (value instanceof Date) return value.toISOString();
    return value;
}

/** Raw strings a resolved value would be written back as. */
export function toQueryValues(value: unknown): string[] {
    if (value === undefined || value === null) return [];
    if (value instanceof Set || Array.isArray(value)) {
        return [...value].flatMap(toQueryValues);
    }
    if (value instanceof Date) return [value.toISOString()];
    if (typeof value === 'object') return [JSON.stringify(value)];
    return [String(value)];
}

/**
 * Render `entries` as a query string, repeating keys for multi-valued
 * entries and keeping entry order.
 *
 * ```
 * buildQueryString([['page', 3], ['page_size', 10]]) // → 'page=3&page_size=10'
 * ```
 */
export function buildQueryString(entries: Iterable<readonly [string, unknown]>): string {
    const search = new URLSearchParams();
    for (const [key, value] of entries) {
        for (const raw of toQueryValues(value)) search.append(key, raw);
    }
    return search.toString();
}
