/**
 * Pagination — turns a list resource definition into a paginated one.
 *
 * Adds `page` (≥ 0, default 0) and `page_size` (1..max, default
 * configurable) ahead of the resource's own parameters and wraps the GET
 * handler. After the handler returns, `meta` gains:
 *
 * - `page`, `page_size`: the resolved values
 * - `next`: query string for `page + 1`, only when the handler set
 *   `meta.has_more = true`; `null` otherwise
 * - `prev`: query string for `page - 1`; `null` on the first page
 *
 * Links repeat the raw values the client sent for every other echoable
 * parameter, in declaration order, so following one resolves the same
 * parameters again.
 *
 * @example
 * ```typescript
 * const cats = defineResource(paginated({
 *     name: 'CatList',
 *     serializer: CatSerializer,
 *     params: createParams(param.string('breed', { details: 'filter by breed' })),
 *     handlers: {
 *         GET: ({ params, meta }) => {
 *             const page = store.page(params['page'], params['page_size']);
 *             meta['has_more'] = page.hasMore;
 *             return page.items;
 *         },
 *     },
 * }, { defaultPageSize: 20 }));
 *
 * // GET /cats?page=1&breed=tabby
 * // meta → { params: {...}, page: 1, page_size: 20,
 * //          next: 'page=2&page_size=20&breed=tabby', prev: 'page=0&page_size=20&breed=tabby' }
 * ```
 *
 * @module
 */
import { ConfigurationError } from '../core/errors.js';
import { min, range } from '../core/validators.js';
import { intParam } from '../params/builtins.js';
import { ParameterSet } from '../params/ParameterSet.js';
import { buildQueryString } from '../params/query.js';
import { assertOptions, paginationOptionsSchema } from './config.js';
import { type Handler, type HandlerCall, type ResourceDefinition } from './types.js';

export interface PaginationOptions {
    /** `page_size` when the client sends none (default 10) */
    readonly defaultPageSize?: number;
    /** Largest accepted `page_size` (default 100) */
    readonly maxPageSize?: number;
}

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

/**
 * Paginated variant of `definition`, typed `'list'`.
 *
 * @throws ConfigurationError for invalid options, a definition without
 *   a GET handler, or one already declaring `page` / `page_size`
 */
export function paginated<TContext>(
    definition: ResourceDefinition<TContext>,
    options: PaginationOptions = {},
): ResourceDefinition<TContext> {
    assertOptions(`Pagination of "${definition.name}"`, paginationOptionsSchema, options);
    const defaultPageSize = options.defaultPageSize ?? DEFAULT_PAGE_SIZE;
    const maxPageSize = options.maxPageSize ?? MAX_PAGE_SIZE;
    if (defaultPageSize > maxPageSize) {
        throw new ConfigurationError(
            `Pagination of "${definition.name}": defaultPageSize (${defaultPageSize}) exceeds maxPageSize (${maxPageSize})`,
        );
    }

    const get = definition.handlers.GET;
    if (get === undefined) {
        throw new ConfigurationError(`Pagination of "${definition.name}" requires a GET handler`);
    }

    const params = (definition.params ?? new ParameterSet([])).extend([
        intParam('page', {
            details: 'Page number, starting at 0',
            default: '0',
            validators: [min(0)],
        }),
        intParam('page_size', {
            details: `Items per page (1 to ${maxPageSize})`,
            default: String(defaultPageSize),
            validators: [range(1, maxPageSize)],
        }),
    ], 'prepend');

    const paginatedGet: Handler<TContext> = async call => {
        const result: unknown = await get(call);
        applyLinks(params, call);
        return result;
    };

    return {
        ...definition,
        type: 'list',
        params,
        handlers: { ...definition.handlers, GET: paginatedGet },
    };
}

/** Write `page`, `page_size`, `next` and `prev` into `meta`. */
function applyLinks<TContext>(paramSet: ParameterSet, call: HandlerCall<TContext>): void {
    const { params, meta } = call;
    const page = Number(params['page']);
    const pageSize = Number(params['page_size']);
    const carried = paramSet.echoQuery(call.query)
        .filter(([name]) => name !== 'page' && name !== 'page_size');

    const link = (target: number): string => buildQueryString([
        ['page', target],
        ['page_size', pageSize],
        ...carried,
    ]);

    meta['page'] = page;
    meta['page_size'] = pageSize;
    meta['next'] = meta['has_more'] === true ? link(page + 1) : null;
    meta['prev'] = page > 0 ? link(page - 1) : null;
}
