/**
 * Lexical rules shared by parameter and field coercions.
 * @internal
 * @module
 */

/** Optionally signed base-10 integer. */
export const INTEGER = /^[+-]?\d+$/;

/** Optionally signed decimal with optional exponent. */
export const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const TRUE_TOKENS = new Set(['true', 't', 'yes', 'y', '1', 'on']);
const FALSE_TOKENS = new Set(['false', 'f', 'no', 'n', '0', 'off']);

/** Case-insensitive boolean token, or `undefined` when unrecognised. */
export function booleanToken(text: string): boolean | undefined {
    const token = text.trim().toLowerCase();
    if (TRUE_TOKENS.has(token)) return true;
    if (FALSE_TOKENS.has(token)) return false;
    return undefined;
}
