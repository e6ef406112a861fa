/**
 * serve — binds a {@link ResourceDispatcher} to a host HTTP server.
 *
 * Decodes the body through a {@link BodyCodec}, answers `OPTIONS` with
 * the resource's self-description, dispatches everything else, and
 * writes the success or error envelope through the {@link ResponseSink}.
 *
 * Status mapping: rejected outcomes keep their status (400, 405),
 * thrown {@link HttpError}s (including {@link NotFoundError}) use theirs,
 * thrown parameter or validation errors become 400. Anything else is
 * rethrown for the host to handle.
 *
 * @example
 * ```typescript
 * import { createServer } from 'node:http';
 *
 * createServer(async (req, res) => {
 *     const url = new URL(req.url ?? '/', 'http://localhost');
 *     await serve(cats, {
 *         method: req.method ?? 'GET',
 *         query: url.searchParams,
 *         body: await readBody(req),
 *         contentType: req.headers['content-type'],
 *         context: {},
 *     }, {
 *         status: code => { res.statusCode = code; },
 *         header: (name, value) => res.setHeader(name, value),
 *         end: body => res.end(body),
 *     });
 * });
 * ```
 *
 * @module
 */
import { ConfigurationError, HttpError, errorResponse } from '../core/errors.js';
import { type ResourceDispatcher } from '../dispatch/ResourceDispatcher.js';
import { jsonCodec } from './JsonCodec.js';
import { type BodyCodec, type HostRequest, type ResponseSink } from './types.js';

export interface ServeOptions {
    /** Body codec (default: compact JSON) */
    readonly codec?: BodyCodec;
}

const defaultCodec = jsonCodec();

/**
 * Serve one request.
 *
 * @throws Any handler error that is not a restkit error
 */
export async function serve<TContext>(
    resource: ResourceDispatcher<TContext>,
    request: HostRequest<TContext>,
    sink: ResponseSink,
    options: ServeOptions = {},
): Promise<void> {
    const codec = options.codec ?? defaultCodec;
    const method = request.method.toUpperCase();
    const allow = [...resource.methods, 'OPTIONS'].join(', ');

    if (method === 'OPTIONS') {
        sink.header('allow', allow);
        write(sink, codec, 200, resource.describe(request.path));
        return;
    }

    try {
        const outcome = await resource.dispatch({
            method,
            query: request.query,
            body: decodeRequestBody(codec, request),
            route: request.route,
        }, request.context);

        if (!outcome.ok) {
            if (outcome.status === 405) sink.header('allow', allow);
            write(sink, codec, outcome.status, outcome.error);
            return;
        }
        if (outcome.status === 204) {
            sink.status(204);
            sink.end();
            return;
        }
        write(sink, codec, outcome.status, outcome.envelope);
    } catch (err) {
        const response = err instanceof ConfigurationError ? undefined : errorResponse(err);
        if (response === undefined) throw err;
        write(sink, codec, response.status, response.body);
    }
}

function decodeRequestBody<TContext>(codec: BodyCodec, request: HostRequest<TContext>): unknown {
    if (request.body === undefined || request.body.length === 0) return undefined;
    if (request.contentType !== undefined && !codec.accepts(request.contentType)) {
        throw new HttpError(
            415,
            'Unsupported media type',
            `Content type '${request.contentType}' is not supported; use ${codec.mediaType}`,
        );
    }
    return codec.decode(request.body);
}

function write(sink: ResponseSink, codec: BodyCodec, status: number, payload: unknown): void {
    sink.status(status);
    sink.header('content-type', codec.mediaType);
    sink.end(codec.encode(payload));
}
