/**
 * DispatchPipeline — the discrete steps of one dispatch.
 *
 * Each step either succeeds (passes data to the next step) or fails
 * (short-circuits with a client error). Handler invocation is left to
 * the dispatcher; everything here is synchronous and pure.
 *
 * Pipeline: resolveVerb → resolveParams → decodeBody → (handler) → encodeResult → statusFor
 *
 * @module
 */
import { HttpError, type InvalidParametersError, type InvalidRepresentationError } from '../core/errors.js';
import { type Result, succeed, fail } from '../core/result.js';
import { type ObjectDict, type Serializer } from '../fields/Serializer.js';
import { type ParameterSet, type Params } from '../params/ParameterSet.js';
import { type QueryInput, type RawQuery } from '../params/query.js';
import { type Handler, type Handlers, type HttpMethod, HTTP_METHODS, isHttpMethod } from './types.js';

// ── Verb Table ───────────────────────────────────────────

/** Per-verb behaviour, resolved by lookup rather than branching. */
export interface VerbPolicy {
    /** Decode the request body through the serializer */
    readonly decodesBody: boolean;
    /** Decode with `partial = true` */
    readonly partial: boolean;
    /** Status when the handler produced content */
    readonly withContent: number;
    /** Status when it produced nothing */
    readonly withoutContent: number;
}

export const VERB_POLICIES: Readonly<Record<HttpMethod, VerbPolicy>> = Object.freeze({
    GET: { decodesBody: false, partial: false, withContent: 200, withoutContent: 204 },
    POST: { decodesBody: true, partial: false, withContent: 201, withoutContent: 201 },
    PUT: { decodesBody: true, partial: false, withContent: 200, withoutContent: 204 },
    PATCH: { decodesBody: true, partial: true, withContent: 200, withoutContent: 204 },
    DELETE: { decodesBody: false, partial: false, withContent: 200, withoutContent: 204 },
});

/** Verb plus the handler registered for it. */
export interface ResolvedVerb<TContext> {
    readonly method: HttpMethod;
    readonly handler: Handler<TContext>;
    readonly policy: VerbPolicy;
}

// ── Pipeline Steps (pure functions) ──────────────────────

/** Step 1: Find the handler for the request's verb. Unknown or unhandled → 405. */
export function resolveVerb<TContext>(
    handlers: Handlers<TContext>,
    method: string,
): Result<ResolvedVerb<TContext>, HttpError> {
    const verb = method.toUpperCase();
    const handler = isHttpMethod(verb) ? handlers[verb] : undefined;
    if (!isHttpMethod(verb) || handler === undefined) {
        const allowed = HTTP_METHODS.filter(m => handlers[m] !== undefined).join(', ');
        return fail(new HttpError(405, 'Method not allowed', `${verb} is not allowed. Allowed: ${allowed}`));
    }
    return succeed({ method: verb, handler, policy: VERB_POLICIES[verb] });
}

/** Step 2: Resolve query parameters, aggregating every failure. */
export function resolveParams(
    params: ParameterSet,
    query: QueryInput | RawQuery | string | undefined,
): Result<Params, InvalidParametersError> {
    return params.safeResolve(query);
}

/**
 * Step 3: Decode the body for verbs that take one. Resources without a
 * serializer, and GET/DELETE, yield `undefined`.
 */
export function decodeBody(
    serializer: Serializer | undefined,
    policy: VerbPolicy,
    body: unknown,
): Result<ObjectDict | undefined, InvalidRepresentationError> {
    if (serializer === undefined || !policy.decodesBody) return succeed(undefined);
    return serializer.safeDecode(body, policy.partial);
}

/**
 * Step 4: Encode the handler's result. `null`/`undefined` mean no
 * content; arrays are encoded element-wise. Encoder errors propagate.
 */
export function encodeResult(serializer: Serializer | undefined, result: unknown): unknown {
    if (result === null || result === undefined) return undefined;
    if (serializer === undefined) return result;
    if (Array.isArray(result)) return serializer.encodeMany(result);
    return serializer.encode(result);
}

/** Step 5: Success status for the verb. */
export function statusFor(policy: VerbPolicy, hasContent: boolean): number {
    return hasContent ? policy.withContent : policy.withoutContent;
}
