/**
 * JSON body codec.
 *
 * @module
 */
import { HttpError } from '../core/errors.js';
import { type BodyCodec } from './types.js';

export interface JsonCodecOptions {
    /** Indent responses for humans (default: compact) */
    readonly prettyPrint?: boolean;
    /** Spaces per level when pretty-printing (default 2) */
    readonly indent?: number;
}

const JSON_MEDIA_TYPE = 'application/json';

export function jsonCodec(options: JsonCodecOptions = {}): BodyCodec {
    const space = options.prettyPrint ? (options.indent ?? 2) : undefined;
    const utf8 = new TextDecoder('utf-8');

    return {
        mediaType: JSON_MEDIA_TYPE,

        accepts(contentType) {
            const [essence = ''] = contentType.split(';');
            const type = essence.trim().toLowerCase();
            return type === JSON_MEDIA_TYPE || type.endsWith('+json');
        },

        decode(body) {
            const text = typeof body === 'string' ? body : utf8.decode(body);
            if (text.trim().length === 0) return undefined;
            try {
                const parsed: unknown = JSON.parse(text);
                return parsed;
            } catch (err) {
                const reason = err instanceof Error ? err.message : String(err);
                throw new HttpError(400, 'Malformed JSON', `Could not decode the request body: ${reason}`, { cause: err });
            }
        },

        encode(payload) {
            return JSON.stringify(payload, null, space);
        },
    };
}
