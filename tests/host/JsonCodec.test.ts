import { describe, it, expect } from 'vitest';
import { jsonCodec } from '../../src/host/JsonCodec.js';
import { HttpError } from '../../src/core/errors.js';

describe('jsonCodec', () => {
    const codec = jsonCodec();

    it('accepts JSON media types, ignoring parameters and case', () => {
        expect(codec.accepts('application/json')).toBe(true);
        expect(codec.accepts('Application/JSON; charset=utf-8')).toBe(true);
        expect(codec.accepts('application/merge-patch+json')).toBe(true);
        expect(codec.accepts('text/plain')).toBe(false);
        expect(codec.accepts('application/x-www-form-urlencoded')).toBe(false);
    });

    it('decodes strings and UTF-8 bytes', () => {
        expect(codec.decode('{"name":"Molly"}')).toEqual({ name: 'Molly' });
        expect(codec.decode(new TextEncoder().encode('{"name":"Żaneta"}'))).toEqual({ name: 'Żaneta' });
    });

    it('treats blank bodies as absent', () => {
        expect(codec.decode('')).toBeUndefined();
        expect(codec.decode('  \n')).toBeUndefined();
    });

    it('rejects malformed JSON with a 400', () => {
        let caught: unknown;
        try {
            codec.decode('{"name":');
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(HttpError);
        if (!(caught instanceof HttpError)) return;
        expect(caught.status).toBe(400);
        expect(caught.title).toBe('Malformed JSON');
        expect(caught.message.startsWith('Could not decode the request body: ')).toBe(true);
    });

    it('encodes compactly by default', () => {
        expect(codec.encode({ content: [1], meta: {} })).toBe('{"content":[1],"meta":{}}');
    });

    it('pretty-prints on request', () => {
        expect(jsonCodec({ prettyPrint: true }).encode({ a: 1 })).toBe('{\n  "a": 1\n}');
        expect(jsonCodec({ prettyPrint: true, indent: 4 }).encode({ a: 1 })).toBe('{\n    "a": 1\n}');
        expect(jsonCodec({ indent: 4 }).encode({ a: 1 })).toBe('{"a":1}');
    });
});
