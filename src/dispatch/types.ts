/**
 * Dispatch types — resource definitions, handler calls and outcomes.
 *
 * @module
 */
import { type ErrorEnvelope, type RestkitError } from '../core/errors.js';
import { type ObjectDict, type Serializer } from '../fields/Serializer.js';
import { type ParameterSet, type Params } from '../params/ParameterSet.js';
import { type QueryInput, type RawQuery } from '../params/query.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type RestkitTracer } from '../observability/Tracing.js';

// ── Verbs ────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Canonical verb order, used for `methods` in `OPTIONS` output. */
export const HTTP_METHODS: readonly HttpMethod[] = Object.freeze(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']);

export function isHttpMethod(value: string): value is HttpMethod {
    return HTTP_METHODS.some(method => method === value);
}

/** `'object'` for single-item resources, `'list'` for collections. */
export type ResourceType = 'object' | 'list';

// ── Handlers ─────────────────────────────────────────────

/**
 * Out-of-band response metadata. Pre-populated with `params`; handlers
 * and pagination add their own keys.
 */
export type Meta = Record<string, unknown>;

/** Everything a handler receives for one request. */
export interface HandlerCall<TContext = unknown> {
    readonly method: HttpMethod;
    /** Resolved query parameters */
    readonly params: Params;
    /** Raw query values as the client sent them */
    readonly query: RawQuery;
    /** Fresh per request; mutate freely */
    readonly meta: Meta;
    /** Decoded body, for POST/PUT/PATCH on resources with a serializer */
    readonly validated: ObjectDict | undefined;
    /** URL template captures supplied by the host */
    readonly route: Readonly<Record<string, string>>;
    /** Host-supplied per-request context (auth, tenancy, ...) */
    readonly context: TContext;
}

/**
 * Application handler. Returns a domain object, a list of them, or
 * nothing; may be async. Errors thrown here propagate unchanged.
 */
export type Handler<TContext = unknown> = (call: HandlerCall<TContext>) => unknown;

export type Handlers<TContext = unknown> = Partial<Record<HttpMethod, Handler<TContext>>>;

/** Declarative definition of one resource. */
export interface ResourceDefinition<TContext = unknown> {
    /** Resource name, shown in `OPTIONS` output and spans */
    readonly name: string;
    /** Human description; dedented for `OPTIONS` output */
    readonly details?: string;
    /** Default `'object'` */
    readonly type?: ResourceType;
    readonly params?: ParameterSet;
    /** Encodes results and decodes POST/PUT/PATCH bodies */
    readonly serializer?: Serializer;
    readonly handlers: Handlers<TContext>;
    /** Debug event observer (see {@link createDebugObserver}) */
    readonly debug?: DebugObserverFn;
    /** OpenTelemetry-compatible tracer */
    readonly tracer?: RestkitTracer;
}

// ── Requests & Outcomes ──────────────────────────────────

/** One request, as the host hands it to the dispatcher. */
export interface DispatchRequest {
    readonly method: string;
    readonly query?: QueryInput | string;
    /** Body already decoded by the host's codec */
    readonly body?: unknown;
    readonly route?: Readonly<Record<string, string>>;
}

/** Success envelope. `content` is absent for bodyless responses. */
export interface Envelope {
    readonly content?: unknown;
    readonly meta: Meta;
}

/** Result of one dispatch. Handler errors are thrown, never returned here. */
export type DispatchOutcome =
    | { readonly ok: true; readonly status: number; readonly envelope: Envelope }
    | { readonly ok: false; readonly status: number; readonly error: ErrorEnvelope; readonly cause: RestkitError };
