/**
 * Zod bridge — runs Zod schemas and flattens their issues into the
 * `Result` / {@link ValidationError} vocabulary used everywhere else.
 *
 * @internal
 * @module
 */
import { type ZodIssue, type ZodType, type ZodTypeDef } from 'zod';
import { ValidationError } from './errors.js';
import { type Result, succeed, fail } from './result.js';

/**
 * Join Zod issues into one human-readable message.
 * Nested issues are prefixed with their dotted path.
 */
export function formatZodIssues(issues: readonly ZodIssue[]): string {
    return issues
        .map(issue => issue.path.length > 0
            ? `${issue.path.join('.')}: ${issue.message}`
            : issue.message)
        .join('; ');
}

/**
 * Run `schema` against `input`, returning the parsed output or a
 * {@link ValidationError} whose `cause` is the original `ZodError`.
 */
export function parseWith<T, TInput>(
    schema: ZodType<T, ZodTypeDef, TInput>,
    input: unknown,
): Result<T> {
    const parsed = schema.safeParse(input);
    if (parsed.success) return succeed(parsed.data);
    return fail(new ValidationError(formatZodIssues(parsed.error.issues), undefined, { cause: parsed.error }));
}

/**
 * Split Zod issues into per-field errors, keyed by the first path segment.
 * Issues on the root become object-level errors.
 */
export function issuesToErrors(issues: readonly ZodIssue[]): ValidationError[] {
    return issues.map(issue => {
        const [head, ...rest] = issue.path;
        if (head === undefined) return new ValidationError(issue.message);
        const message = rest.length > 0 ? `${rest.join('.')}: ${issue.message}` : issue.message;
        return new ValidationError(message, String(head));
    });
}
