/**
 * Definition-time option validation.
 *
 * Resource and pagination options are checked once, when the resource is
 * defined, against Zod schemas. Every issue is reported in one
 * {@link ConfigurationError}.
 *
 * @internal
 * @module
 */
import { z, type ZodType, type ZodTypeDef } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { formatZodIssues } from '../core/zod.js';
import { Serializer } from '../fields/Serializer.js';
import { ParameterSet } from '../params/ParameterSet.js';

const fn = z.custom<(...args: never[]) => unknown>(
    value => typeof value === 'function',
    { message: 'Expected a function' },
);

const handlersSchema = z.object({
    GET: fn.optional(),
    POST: fn.optional(),
    PUT: fn.optional(),
    PATCH: fn.optional(),
    DELETE: fn.optional(),
}).strict().refine(
    handlers => Object.values(handlers).some(handler => handler !== undefined),
    { message: 'At least one handler is required' },
);

export const resourceOptionsSchema = z.object({
    name: z.string().min(1),
    details: z.string().optional(),
    type: z.enum(['object', 'list']).optional(),
    params: z.instanceof(ParameterSet).optional(),
    serializer: z.instanceof(Serializer).optional(),
    handlers: handlersSchema,
    debug: fn.optional(),
    tracer: z.object({ startSpan: fn }).passthrough().optional(),
});

export const paginationOptionsSchema = z.object({
    defaultPageSize: z.number().int().min(1).optional(),
    maxPageSize: z.number().int().min(1).optional(),
}).strict();

/**
 * Check `options` against `schema`.
 *
 * @throws ConfigurationError listing every issue with its path
 */
export function assertOptions(
    subject: string,
    schema: ZodType<unknown, ZodTypeDef, unknown>,
    options: unknown,
): void {
    const parsed = schema.safeParse(options);
    if (!parsed.success) {
        throw new ConfigurationError(`${subject}: ${formatZodIssues(parsed.error.issues)}`, { cause: parsed.error });
    }
}
