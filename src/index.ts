/**
 * @module
 * @description
 * Declarative REST resource schemas: query parameters, representation
 * fields, serializers, dispatch and pagination.
 */
// ── Core ─────────────────────────────────────────────────
/** @category Core */
export { type Result, type Success, type Failure, succeed, fail, OK } from './core/result.js';
/** @category Core */
export {
    RestkitError, ConfigurationError, ParameterError, InvalidParametersError,
    ValidationError, InvalidRepresentationError, HttpError, NotFoundError, errorResponse,
    type ErrorKind, type ErrorEnvelope, type ErrorResponse,
} from './core/errors.js';
/** @category Core */
export * as validators from './core/validators.js';
/** @category Core */
export { type Validator } from './core/validators.js';

// ── Parameters ───────────────────────────────────────────
/** @category Parameters */
export * from './params/index.js';

// ── Fields ───────────────────────────────────────────────
/** @category Fields */
export * from './fields/index.js';

// ── Dispatch ─────────────────────────────────────────────
/** @category Dispatch */
export * from './dispatch/index.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export {
    createDebugObserver,
    type DebugEvent, type DebugObserverFn,
    type RouteEvent, type ParamsEvent, type BodyEvent, type ExecuteEvent, type ErrorEvent,
} from './observability/DebugObserver.js';
/** @category Observability */
export {
    SpanStatusCode, type AttributeValue, type RestkitSpan, type RestkitTracer,
} from './observability/Tracing.js';

// ── Host ─────────────────────────────────────────────────
/** @category Host */
export * from './host/index.js';
