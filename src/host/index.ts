/** Host Bounded Context — Barrel Export */
export { serve, type ServeOptions } from './serve.js';
export { jsonCodec, type JsonCodecOptions } from './JsonCodec.js';
export { type HostRequest, type ResponseSink, type BodyCodec } from './types.js';
