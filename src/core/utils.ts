/**
 * Small shared helpers.
 * @internal
 * @module
 */

/** `true` for `{...}` literals and `Object.create(null)` records. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Normalise a multi-line doc string: trim blank leading/trailing lines and
 * remove the common indentation of every line after the first.
 *
 * ```
 * cleanDoc(`
 *     Single cat
 *       identified by id
 * `) // → 'Single cat\n  identified by id'
 * ```
 */
export function cleanDoc(text: string): string {
    const lines = text.replace(/\t/g, '    ').split('\n');
    const [first = '', ...rest] = lines;

    let margin = Infinity;
    for (const line of rest) {
        const content = line.trimStart();
        if (content.length === 0) continue;
        margin = Math.min(margin, line.length - content.length);
    }

    const dedented = [
        first.trim(),
        ...rest.map(line => (margin === Infinity ? line.trim() : line.slice(margin).trimEnd())),
    ];

    while (dedented.length > 0 && dedented[0] === '') dedented.shift();
    while (dedented.length > 0 && dedented[dedented.length - 1] === '') dedented.pop();

    return dedented.join('\n');
}
