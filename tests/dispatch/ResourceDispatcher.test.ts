/**
 * ResourceDispatcher.test.ts
 *
 * Categories:
 * 1. Success paths — status codes and envelopes per verb
 * 2. Client errors — parameters, bodies, verbs
 * 3. Handler contract — call shape, error propagation, per-request state
 * 4. Definition-time validation
 */
import { describe, it, expect, vi } from 'vitest';
import { defineResource, type Handler, type HandlerCall } from '../../src/dispatch/index.js';
import { createParams, param } from '../../src/params/index.js';
import { createSerializer, field } from '../../src/fields/index.js';
import { ConfigurationError, NotFoundError } from '../../src/core/errors.js';

interface AppContext {
    readonly user: string;
}

function catSerializer() {
    return createSerializer('Cat')
        .field(field.raw('id', { details: 'id', readOnly: true }))
        .field(field.string('name', { details: 'name', required: true }))
        .field(field.int('age', { details: 'age', min: 0, max: 30 }));
}

// ============================================================================
// 1. Success Paths
// ============================================================================

describe('dispatch — success', () => {
    it('encodes a single object with 200', async () => {
        const cat = defineResource({
            name: 'Cat',
            serializer: catSerializer(),
            handlers: { GET: () => ({ id: 1, name: 'Molly', age: 3, secret: 'x' }) },
        });

        expect(await cat.dispatch({ method: 'GET' }, undefined)).toEqual({
            ok: true,
            status: 200,
            envelope: { content: { id: 1, name: 'Molly', age: 3 }, meta: { params: {} } },
        });
    });

    it('encodes lists element-wise', async () => {
        const cats = defineResource({
            name: 'CatList',
            type: 'list',
            serializer: catSerializer(),
            handlers: { GET: async () => [{ id: 1, name: 'Molly', age: 3 }, { id: 2, name: 'Max', age: '5' }] },
        });

        const outcome = await cats.dispatch({ method: 'GET' }, undefined);
        expect(outcome.ok && outcome.envelope.content).toEqual([
            { id: 1, name: 'Molly', age: 3 },
            { id: 2, name: 'Max', age: 5 },
        ]);
    });

    it('passes results through without a serializer', async () => {
        const health = defineResource({ name: 'Health', handlers: { GET: () => ({ up: true }) } });
        const outcome = await health.dispatch({ method: 'GET' }, undefined);
        expect(outcome.ok && outcome.envelope).toEqual({ content: { up: true }, meta: { params: {} } });
    });

    it('answers 204 without content when the handler returns nothing', async () => {
        const cat = defineResource({ name: 'Cat', handlers: { DELETE: () => undefined } });
        const outcome = await cat.dispatch({ method: 'DELETE' }, undefined);

        expect(outcome.status).toBe(204);
        expect(outcome.ok && 'content' in outcome.envelope).toBe(false);
    });

    it('answers 201 for POST, with the decoded body', async () => {
        const create = vi.fn<Handler>(({ validated }) => ({ id: 7, ...validated }));
        const cats = defineResource({ name: 'CatList', serializer: catSerializer(), handlers: { POST: create } });

        const outcome = await cats.dispatch({ method: 'POST', body: { id: 99, name: 'Luna', age: '2' } }, undefined);

        expect(outcome).toEqual({
            ok: true,
            status: 201,
            envelope: { content: { id: 7, name: 'Luna', age: 2 }, meta: { params: {} } },
        });
        expect(create.mock.calls[0]?.[0].validated).toEqual({ name: 'Luna', age: 2 });
    });

    it('decodes PATCH bodies partially', async () => {
        const update = vi.fn<Handler>(() => undefined);
        const cat = defineResource({ name: 'Cat', serializer: catSerializer(), handlers: { PATCH: update } });

        const outcome = await cat.dispatch({ method: 'PATCH', body: { age: 4 } }, undefined);

        expect(outcome.status).toBe(204);
        expect(update.mock.calls[0]?.[0].validated).toEqual({ age: 4 });
    });

    it('accepts lower-case verbs', async () => {
        const cat = defineResource({ name: 'Cat', handlers: { GET: () => 'ok' } });
        expect((await cat.dispatch({ method: 'get' }, undefined)).status).toBe(200);
    });
});

// ============================================================================
// 2. Client Errors
// ============================================================================

describe('dispatch — client errors', () => {
    it('rejects invalid parameters before the handler runs', async () => {
        const handler = vi.fn<Handler>(() => []);
        const cats = defineResource({
            name: 'CatList',
            params: createParams(
                param.int('age', { details: 'age' }),
                param.string('breed', { details: 'breed', required: true }),
            ),
            handlers: { GET: handler },
        });

        const outcome = await cats.dispatch({ method: 'GET', query: 'age=old' }, undefined);

        expect(outcome.ok).toBe(false);
        expect(outcome.status).toBe(400);
        expect(!outcome.ok && outcome.error).toEqual({
            title: 'Invalid parameters',
            description: "age: 'old' is not a valid integer; breed: missing required parameter",
        });
        expect(handler).not.toHaveBeenCalled();
    });

    it('rejects invalid bodies before the handler runs', async () => {
        const handler = vi.fn<Handler>(() => undefined);
        const cat = defineResource({ name: 'Cat', serializer: catSerializer(), handlers: { PUT: handler } });

        const outcome = await cat.dispatch({ method: 'PUT', body: { age: 40 } }, undefined);

        expect(outcome.status).toBe(400);
        expect(!outcome.ok && outcome.error).toEqual({
            title: 'Representation deserialization failed',
            description: 'name: missing required field; age: 40 is not <= 30',
        });
        expect(handler).not.toHaveBeenCalled();
    });

    it('answers 405 for verbs without a handler', async () => {
        const cats = defineResource({ name: 'CatList', handlers: { GET: () => [], POST: () => ({}) } });

        const outcome = await cats.dispatch({ method: 'DELETE' }, undefined);

        expect(outcome.status).toBe(405);
        expect(!outcome.ok && outcome.error).toEqual({
            title: 'Method not allowed',
            description: 'DELETE is not allowed. Allowed: GET, POST',
        });
    });
});

// ============================================================================
// 3. Handler Contract
// ============================================================================

describe('dispatch — handler contract', () => {
    it('passes params, meta, route and context', async () => {
        const handler = vi.fn<Handler<AppContext>>(() => 'ok');
        const cat = defineResource<AppContext>({
            name: 'Cat',
            params: createParams(param.bool('verbose', { details: 'verbose', default: 'no' })),
            handlers: { GET: handler },
        });

        await cat.dispatch({ method: 'GET', route: { cat_id: '1' } }, { user: 'tester' });

        const call: HandlerCall<AppContext> | undefined = handler.mock.calls[0]?.[0];
        expect(call?.method).toBe('GET');
        expect(call?.params).toEqual({ verbose: false });
        expect(call?.meta).toEqual({ params: { verbose: false } });
        expect(call?.validated).toBeUndefined();
        expect(call?.route).toEqual({ cat_id: '1' });
        expect(call?.context).toEqual({ user: 'tester' });
        expect(call?.query).toEqual(new Map());
    });

    it('hands over the raw query as sent', async () => {
        const handler = vi.fn<Handler>(() => 'ok');
        const cat = defineResource({
            name: 'Cat',
            params: createParams(param.bool('verbose', { details: 'verbose' })),
            handlers: { GET: handler },
        });

        await cat.dispatch({ method: 'GET', query: 'verbose=yes&x=1&x=2' }, undefined);

        const call = handler.mock.calls[0]?.[0];
        expect(call?.params).toEqual({ verbose: true });
        expect(call?.query).toEqual(new Map([['verbose', ['yes']], ['x', ['1', '2']]]));
    });

    it('lets handlers add meta keys', async () => {
        const cats = defineResource({
            name: 'CatList',
            handlers: {
                GET: ({ meta }) => {
                    meta['total'] = 2;
                    return [];
                },
            },
        });
        const outcome = await cats.dispatch({ method: 'GET' }, undefined);
        expect(outcome.ok && outcome.envelope.meta).toEqual({ params: {}, total: 2 });
    });

    it('propagates handler errors unchanged', async () => {
        const notFound = new NotFoundError();
        const cat = defineResource({
            name: 'Cat',
            handlers: {
                GET: () => {
                    throw notFound;
                },
            },
        });
        await expect(cat.dispatch({ method: 'GET' }, undefined)).rejects.toBe(notFound);
    });

    it('keeps per-request state off the resource', async () => {
        const cats = defineResource({
            name: 'CatList',
            params: createParams(param.string('breed', { details: 'breed' })),
            handlers: {
                GET: async ({ params, meta }) => {
                    meta['seen'] = params['breed'];
                    await new Promise(resolve => setTimeout(resolve, params['breed'] === 'a' ? 5 : 0));
                    return [params['breed']];
                },
            },
        });

        const [a, b] = await Promise.all([
            cats.dispatch({ method: 'GET', query: 'breed=a' }, undefined),
            cats.dispatch({ method: 'GET', query: 'breed=b' }, undefined),
        ]);

        expect(a.ok && a.envelope).toEqual({ content: ['a'], meta: { params: { breed: 'a' }, seen: 'a' } });
        expect(b.ok && b.envelope).toEqual({ content: ['b'], meta: { params: { breed: 'b' }, seen: 'b' } });
        expect(Object.isFrozen(cats)).toBe(true);
    });
});

// ============================================================================
// 4. Definition-time Validation
// ============================================================================

describe('defineResource — options', () => {
    it('requires a name', () => {
        expect(() => defineResource({ name: '', handlers: { GET: () => null } })).toThrow(ConfigurationError);
    });

    it('requires at least one handler', () => {
        expect(() => defineResource({ name: 'Empty', handlers: {} }))
            .toThrow('Resource "Empty": handlers: At least one handler is required');
    });

    it('lists the handled verbs in canonical order', () => {
        const cats = defineResource({ name: 'CatList', handlers: { POST: () => null, GET: () => [] } });
        expect(cats.methods).toEqual(['GET', 'POST']);
    });
});
