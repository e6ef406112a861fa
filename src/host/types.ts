/**
 * Host collaborator interfaces. Any HTTP server (node:http, express,
 * fastify) adapts to these.
 *
 * @module
 */
import { type QueryInput } from '../params/query.js';

/** One incoming request, as seen by {@link serve}. */
export interface HostRequest<TContext = unknown> {
    /** HTTP method (GET, POST, OPTIONS, ...) */
    readonly method: string;
    /** Multi-valued query string */
    readonly query?: QueryInput | string;
    /** Raw request body */
    readonly body?: Uint8Array | string;
    /** `content-type` header, if any */
    readonly contentType?: string;
    /** Route params (e.g. `/cats/:cat_id` → `{ cat_id: '1' }`) */
    readonly route?: Readonly<Record<string, string>>;
    /** Route template, echoed as `path` in `OPTIONS` output */
    readonly path?: string;
    /** Per-request context (auth, tenancy, ...) handed to handlers */
    readonly context: TContext;
}

/** Where {@link serve} writes the response. */
export interface ResponseSink {
    status(code: number): void;
    header(name: string, value: string): void;
    /** Final body; `undefined` for bodyless responses. Called exactly once. */
    end(body?: string): void;
}

/** Turns body bytes into a mapping and payloads back into text. */
export interface BodyCodec {
    /** Media type written as `content-type` */
    readonly mediaType: string;
    /** Whether this codec reads bodies of `contentType` */
    accepts(contentType: string): boolean;
    decode(body: Uint8Array | string): unknown;
    encode(payload: unknown): string;
}
