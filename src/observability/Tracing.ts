/**
 * Tracing — OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces structurally compatible with OpenTelemetry's
 * `Tracer` and `Span`, so `trace.getTracer('restkit')` can be passed
 * straight to a resource without an adapter or an `@opentelemetry/*`
 * dependency.
 *
 * Each dispatch opens one span named `restkit.<resource>` carrying
 * `http.method` and, once known, `http.status_code` and `restkit.outcome`.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const cats = defineResource({
 *     name: 'CatList',
 *     tracer: trace.getTracer('restkit'),
 *     handlers: { ... },
 * });
 * ```
 *
 * @module
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Span status codes matching OpenTelemetry's `SpanStatusCode` enum.
 *
 * - `UNSET` (0): client errors (bad parameters or body). No alert.
 * - `OK` (1): successful dispatch.
 * - `ERROR` (2): the handler or the encoder threw.
 */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

// ============================================================================
// Types
// ============================================================================

/** Matches OpenTelemetry's `SpanAttributeValue`. */
export type AttributeValue =
    | string
    | number
    | boolean
    | ReadonlyArray<string>
    | ReadonlyArray<number>
    | ReadonlyArray<boolean>;

/** Minimal span interface — structural subtype of OTel's `Span`. */
export interface RestkitSpan {
    setAttribute(key: string, value: AttributeValue): void;
    setStatus(status: { code: number; message?: string }): void;
    /** Called exactly once, in a `finally` block */
    end(): void;
    recordException(exception: Error | string): void;
}

/**
 * Minimal tracer interface — structural subtype of OTel's `Tracer`.
 *
 * Without OTel's `Context` API, spans opened inside handlers become
 * siblings of the dispatch span rather than its children.
 */
export interface RestkitTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, AttributeValue>;
    }): RestkitSpan;
}
