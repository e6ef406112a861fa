/**
 * DebugObserver — opt-in structured logging for dispatch
 *
 * Typed debug events are emitted at each stage of the dispatch pipeline.
 * With no observer configured (the default), nothing is emitted.
 *
 * @example
 * ```typescript
 * import { createDebugObserver, defineResource } from 'restkit';
 *
 * // Default: compact console.debug output
 * const debug = createDebugObserver();
 *
 * // Custom handler (e.g. forward to a log pipeline)
 * const debug = createDebugObserver((event) => {
 *     logger.info({ event }, event.type);
 * });
 *
 * const cats = defineResource({ name: 'CatList', debug, handlers: { ... } });
 * ```
 *
 * @module
 */

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** A request reached a resource. First event of every dispatch. */
export interface RouteEvent {
    readonly type: 'route';
    readonly resource: string;
    readonly method: string;
    readonly timestamp: number;
}

/** Query parameters were resolved (pass or fail). */
export interface ParamsEvent {
    readonly type: 'params';
    readonly resource: string;
    readonly method: string;
    readonly valid: boolean;
    /** Aggregated failure message if `valid` is false */
    readonly error?: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** The request body was decoded through the serializer (pass or fail). */
export interface BodyEvent {
    readonly type: 'body';
    readonly resource: string;
    readonly method: string;
    readonly valid: boolean;
    readonly error?: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Dispatch finished with an outcome (success or client error). */
export interface ExecuteEvent {
    readonly type: 'execute';
    readonly resource: string;
    readonly method: string;
    /** Status of the outcome */
    readonly status: number;
    /** Total milliseconds from route to outcome */
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * The handler, or encoding its result, threw. The error still
 * propagates to the caller.
 */
export interface ErrorEvent {
    readonly type: 'error';
    readonly resource: string;
    readonly method: string;
    readonly error: string;
    readonly step: 'handler' | 'encode';
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * ```typescript
 * function handle(event: DebugEvent) {
 *     switch (event.type) {
 *         case 'route':
 *         case 'params':
 *         case 'body':
 *         case 'execute':
 *         case 'error':
 *     }
 * }
 * ```
 */
export type DebugEvent =
    | RouteEvent
    | ParamsEvent
    | BodyEvent
    | ExecuteEvent
    | ErrorEvent;

/** Observer function that receives debug events. */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output.
 *
 * If a custom handler is provided it is returned as-is. The default
 * handler prints:
 *
 * ```
 * [restkit] route     GET CatList
 * [restkit] params    GET CatList ✓ 0.2ms
 * [restkit] execute   GET CatList 200 3.1ms
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[restkit]';
        const target = `${event.method} ${event.resource}`;

        switch (event.type) {
            case 'route':
                console.debug(`${prefix} route     ${target}`);
                break;

            case 'params':
            case 'body': {
                const status = event.valid ? '✓' : `✗ ${event.error ?? ''}`;
                console.debug(`${prefix} ${event.type.padEnd(9)} ${target} ${status} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'execute':
                console.debug(`${prefix} execute   ${target} ${event.status} ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'error':
                console.debug(`${prefix} ERROR     ${target} [${event.step}] ${event.error}`);
                break;
        }
    };
}
