/**
 * Error taxonomy
 *
 * - {@link ConfigurationError}: invalid descriptor wiring, raised while
 *   schemas and resources are being defined. Never raised per request.
 * - {@link ParameterError} / {@link InvalidParametersError}: one query
 *   parameter failed, and the aggregate of every failure in a request.
 * - {@link ValidationError} / {@link InvalidRepresentationError}: one field
 *   (or the whole object) failed to decode, and the aggregate.
 * - {@link HttpError} / {@link NotFoundError}: domain errors a handler
 *   throws. The dispatcher lets them through untouched.
 *
 * Every class carries a `kind` tag; {@link errorResponse} maps tags to
 * HTTP statuses through a lookup table.
 *
 * @module
 */

/** Tag identifying each error class of the taxonomy. */
export type ErrorKind =
    | 'configuration'
    | 'parameter'
    | 'invalid-parameters'
    | 'validation'
    | 'invalid-representation'
    | 'http';

/** Base class of every error raised by restkit. */
export abstract class RestkitError extends Error {
    abstract readonly kind: ErrorKind;
}

// ── Definition-time ──────────────────────────────────────

/**
 * Raised when a descriptor, serializer or resource is wired incorrectly
 * (e.g. `required` together with a `default`, or a duplicate name).
 */
export class ConfigurationError extends RestkitError {
    readonly kind = 'configuration' as const;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigurationError';
    }
}

// ── Parameters ───────────────────────────────────────────

/**
 * A single query parameter failure: missing, failed coercion or a
 * rejected validator.
 */
export class ParameterError extends RestkitError {
    readonly kind = 'parameter' as const;
    /** Query string key of the failing parameter */
    readonly param: string;

    constructor(param: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ParameterError';
        this.param = param;
    }
}

/** Every parameter failure of one request. */
export class InvalidParametersError extends RestkitError {
    readonly kind = 'invalid-parameters' as const;
    readonly title = 'Invalid parameters';
    readonly errors: readonly ParameterError[];

    constructor(errors: readonly ParameterError[]) {
        super(errors.map(e => `${e.param}: ${e.message}`).join('; '));
        this.name = 'InvalidParametersError';
        this.errors = Object.freeze([...errors]);
    }

    /** Names of the parameters that failed, in declaration order. */
    get params(): string[] {
        return this.errors.map(e => e.param);
    }
}

// ── Representations ──────────────────────────────────────

/**
 * A coercion or validator failure. `field` is set when the failure
 * belongs to one field; object-level failures leave it undefined.
 */
export class ValidationError extends RestkitError {
    readonly kind = 'validation' as const;
    readonly field: string | undefined;

    constructor(message: string, field?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ValidationError';
        this.field = field;
    }

    /** Copy of this error attributed to `field`. */
    forField(field: string): ValidationError {
        return new ValidationError(this.message, field, { cause: this.cause });
    }
}

/**
 * Every field-level (and then object-level) failure of one decode.
 */
export class InvalidRepresentationError extends RestkitError {
    readonly kind = 'invalid-representation' as const;
    readonly title = 'Representation deserialization failed';
    readonly errors: readonly ValidationError[];

    constructor(errors: readonly ValidationError[]) {
        super(errors.map(e => e.field === undefined ? e.message : `${e.field}: ${e.message}`).join('; '));
        this.name = 'InvalidRepresentationError';
        this.errors = Object.freeze([...errors]);
    }

    /** Messages grouped by field name; object-level messages sit under `'*'`. */
    byField(): Record<string, string[]> {
        const grouped: Record<string, string[]> = {};
        for (const error of this.errors) {
            const key = error.field ?? '*';
            (grouped[key] ??= []).push(error.message);
        }
        return grouped;
    }
}

// ── Domain ───────────────────────────────────────────────

/**
 * Domain error with an explicit HTTP status. Handlers throw these; the
 * dispatcher propagates them and the host binding renders them.
 */
export class HttpError extends RestkitError {
    readonly kind = 'http' as const;
    readonly status: number;
    readonly title: string;

    constructor(status: number, title: string, description?: string, options?: { cause?: unknown }) {
        super(description ?? title, options);
        this.name = 'HttpError';
        this.status = status;
        this.title = title;
    }
}

/** 404 — the addressed resource does not exist. */
export class NotFoundError extends HttpError {
    constructor(description = 'The requested resource could not be found') {
        super(404, 'Not found', description);
        this.name = 'NotFoundError';
    }
}

// ── Status Mapping ───────────────────────────────────────

/** Error envelope: `{ title, description }`. */
export interface ErrorEnvelope {
    readonly title: string;
    readonly description: string;
}

/** Status code plus envelope for a recognised error. */
export interface ErrorResponse {
    readonly status: number;
    readonly body: ErrorEnvelope;
}

const STATUS_BY_KIND: Readonly<Record<ErrorKind, { status: number; title: string }>> = {
    'http': { status: 500, title: 'Internal error' },
    'configuration': { status: 500, title: 'Resource misconfigured' },
    'parameter': { status: 400, title: 'Invalid parameter' },
    'invalid-parameters': { status: 400, title: 'Invalid parameters' },
    'validation': { status: 400, title: 'Validation failed' },
    'invalid-representation': { status: 400, title: 'Representation deserialization failed' },
};

/**
 * Map a restkit error to its status and error envelope.
 *
 * @returns `undefined` for anything that is not a {@link RestkitError};
 *   the host decides what to do with those.
 */
export function errorResponse(err: unknown): ErrorResponse | undefined {
    if (err instanceof HttpError) {
        return { status: err.status, body: { title: err.title, description: err.message } };
    }
    if (!(err instanceof RestkitError)) return undefined;

    const entry = STATUS_BY_KIND[err.kind];
    return { status: entry.status, body: { title: entry.title, description: err.message } };
}
