/**
 * ResourceDispatcher — runs one request through a resource definition.
 *
 * ```
 * RECEIVED → PARSING_PARAMS → (PARSING_BODY) → INVOKING → SERIALIZING → DONE
 *                 │                 │
 *                 └──── 400 ────────┘
 * ```
 *
 * Parameter and body failures come back as a rejected
 * {@link DispatchOutcome}; the handler never sees invalid input. Anything
 * the handler (or a field encoder) throws propagates unchanged.
 *
 * One dispatcher serves every request to its route, concurrently. It
 * holds configuration only: params, meta and the decoded body are built
 * per call and live on the call stack.
 *
 * @example
 * ```typescript
 * const cat = defineResource<AppContext>({
 *     name: 'Cat',
 *     details: 'Single cat identified by its id',
 *     serializer: CatSerializer,
 *     handlers: {
 *         GET: ({ route, context }) => {
 *             const found = context.cats.get(route['cat_id']);
 *             if (!found) throw new NotFoundError();
 *             return found;
 *         },
 *         PATCH: ({ route, validated, context }) => context.cats.update(route['cat_id'], validated),
 *     },
 * });
 *
 * const outcome = await cat.dispatch({ method: 'GET', route: { cat_id: '1' } }, ctx);
 * ```
 *
 * @module
 */
import {
    type HttpError, type InvalidParametersError, type InvalidRepresentationError,
} from '../core/errors.js';
import { cleanDoc } from '../core/utils.js';
import { type ObjectDict, type Serializer } from '../fields/Serializer.js';
import { ParameterSet } from '../params/ParameterSet.js';
import { normalizeQuery } from '../params/query.js';
import { type DebugEvent, type DebugObserverFn } from '../observability/DebugObserver.js';
import { type RestkitTracer, SpanStatusCode } from '../observability/Tracing.js';
import { assertOptions, resourceOptionsSchema } from './config.js';
import { resolveVerb, resolveParams, decodeBody, encodeResult, statusFor } from './DispatchPipeline.js';
import {
    type DispatchOutcome, type DispatchRequest, type Envelope, type Handlers, type HttpMethod,
    type Meta, type ResourceDefinition, type ResourceType, HTTP_METHODS,
} from './types.js';
import { type ResourceDescription, describeResource } from './describe.js';

const NO_DESCRIPTION = 'This resource does not have description yet';

type ClientError = HttpError | InvalidParametersError | InvalidRepresentationError;

function rejected(cause: ClientError): DispatchOutcome {
    const status = cause.kind === 'http' ? cause.status : 400;
    return { ok: false, status, error: { title: cause.title, description: cause.message }, cause };
}

export class ResourceDispatcher<TContext = unknown> {
    readonly name: string;
    readonly details: string;
    readonly type: ResourceType;
    readonly params: ParameterSet;
    readonly serializer: Serializer | undefined;
    /** Handled verbs, in canonical order */
    readonly methods: readonly HttpMethod[];

    private readonly _handlers: Handlers<TContext>;
    private readonly _debug: DebugObserverFn | undefined;
    private readonly _tracer: RestkitTracer | undefined;

    /** @internal Use {@link defineResource} instead */
    constructor(definition: ResourceDefinition<TContext>) {
        assertOptions(`Resource "${definition.name}"`, resourceOptionsSchema, definition);

        this.name = definition.name;
        this.details = cleanDoc(definition.details ?? NO_DESCRIPTION);
        this.type = definition.type ?? 'object';
        this.params = definition.params ?? new ParameterSet([]);
        this.serializer = definition.serializer;
        this._handlers = Object.freeze({ ...definition.handlers });
        this.methods = Object.freeze(HTTP_METHODS.filter(method => this._handlers[method] !== undefined));
        this._debug = definition.debug;
        this._tracer = definition.tracer;
        Object.freeze(this);
    }

    /**
     * Self-description for `OPTIONS`. Pure and deterministic.
     *
     * @param path - Route template, supplied by the host
     */
    describe(path?: string): ResourceDescription {
        return describeResource(this, path);
    }

    /**
     * Dispatch one request.
     *
     * @returns Success envelope with status, or a rejected outcome for
     *   client errors (405, invalid parameters, invalid body)
     * @throws Whatever the handler or a field encoder throws
     */
    async dispatch(request: DispatchRequest, context: TContext): Promise<DispatchOutcome> {
        if (!this._tracer) return this._run(request, context);

        const method = request.method.toUpperCase();
        const span = this._tracer.startSpan(`restkit.${this.name}`, {
            attributes: { 'http.method': method },
        });
        try {
            const outcome = await this._run(request, context);
            span.setAttribute('http.status_code', outcome.status);
            span.setAttribute('restkit.outcome', outcome.ok ? 'success' : 'client_error');
            span.setStatus({ code: outcome.ok ? SpanStatusCode.OK : SpanStatusCode.UNSET });
            return outcome;
        } catch (err) {
            span.setAttribute('restkit.outcome', 'exception');
            span.recordException(err instanceof Error ? err : String(err));
            span.setStatus({
                code: SpanStatusCode.ERROR,
                message: err instanceof Error ? err.message : String(err),
            });
            throw err;
        } finally {
            span.end();
        }
    }

    // ── Internal ─────────────────────────────────────────

    private async _run(request: DispatchRequest, context: TContext): Promise<DispatchOutcome> {
        const started = performance.now();
        const method = request.method.toUpperCase();
        this._emit({ type: 'route', resource: this.name, method, timestamp: Date.now() });

        // RECEIVED
        const verb = resolveVerb(this._handlers, method);
        if (!verb.ok) return this._finish(method, started, rejected(verb.error));

        // PARSING_PARAMS
        let stepStarted = performance.now();
        const query = normalizeQuery(request.query);
        const params = resolveParams(this.params, query);
        this._emit({
            type: 'params', resource: this.name, method,
            valid: params.ok, error: params.ok ? undefined : params.error.message,
            durationMs: performance.now() - stepStarted, timestamp: Date.now(),
        });
        if (!params.ok) return this._finish(method, started, rejected(params.error));

        // PARSING_BODY
        let validated: ObjectDict | undefined;
        if (verb.value.policy.decodesBody && this.serializer) {
            stepStarted = performance.now();
            const body = decodeBody(this.serializer, verb.value.policy, request.body);
            this._emit({
                type: 'body', resource: this.name, method,
                valid: body.ok, error: body.ok ? undefined : body.error.message,
                durationMs: performance.now() - stepStarted, timestamp: Date.now(),
            });
            if (!body.ok) return this._finish(method, started, rejected(body.error));
            validated = body.value;
        }

        // INVOKING
        const meta: Meta = { params: this.params.echo(params.value) };
        let result: unknown;
        try {
            result = await verb.value.handler({
                method: verb.value.method,
                params: params.value,
                query,
                meta,
                validated,
                route: request.route ?? {},
                context,
            });
        } catch (err) {
            this._emitError(method, 'handler', err);
            throw err;
        }

        // SERIALIZING
        let content: unknown;
        try {
            content = encodeResult(this.serializer, result);
        } catch (err) {
            this._emitError(method, 'encode', err);
            throw err;
        }

        // DONE
        const envelope: Envelope = content === undefined ? { meta } : { content, meta };
        const status = statusFor(verb.value.policy, content !== undefined);
        return this._finish(method, started, { ok: true, status, envelope });
    }

    private _finish(method: string, started: number, outcome: DispatchOutcome): DispatchOutcome {
        this._emit({
            type: 'execute', resource: this.name, method,
            status: outcome.status, durationMs: performance.now() - started, timestamp: Date.now(),
        });
        return outcome;
    }

    private _emitError(method: string, step: 'handler' | 'encode', err: unknown): void {
        this._emit({
            type: 'error', resource: this.name, method, step,
            error: err instanceof Error ? err.message : String(err),
            timestamp: Date.now(),
        });
    }

    private _emit(event: DebugEvent): void {
        if (this._debug) this._debug(event);
    }
}

/**
 * Define a resource. Options are validated here, once; wiring mistakes
 * raise {@link ConfigurationError} at startup.
 */
export function defineResource<TContext = unknown>(
    definition: ResourceDefinition<TContext>,
): ResourceDispatcher<TContext> {
    return new ResourceDispatcher(definition);
}
