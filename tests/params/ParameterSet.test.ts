import { describe, it, expect } from 'vitest';
import { param, createParams, containers } from '../../src/params/index.js';
import { ConfigurationError, InvalidParametersError } from '../../src/core/errors.js';
import { range, validator } from '../../src/core/validators.js';

describe('ParameterSet.resolve', () => {
    it('returns an empty mapping when nothing is sent and nothing is required', () => {
        const params = createParams(
            param.string('breed', { details: 'filter by breed' }),
            param.int('age', { details: 'filter by age' }),
        );
        expect(params.resolve({})).toEqual({});
        expect(params.resolve(undefined)).toEqual({});
    });

    it('takes the last occurrence, deterministically', () => {
        const params = createParams(param.string('breed', { details: 'filter by breed' }));
        const first = params.resolve('breed=a&breed=b');
        const second = params.resolve('breed=a&breed=b');

        expect(first).toEqual({ breed: 'b' });
        expect(second).toEqual(first);
    });

    it('keeps every value, in order, for many parameters', () => {
        const params = createParams(param.int('x', { details: 'values', many: true }));
        expect(params.resolve('x=1&x=2&x=3')).toEqual({ x: [1, 2, 3] });
    });

    it('accepts URLSearchParams and records', () => {
        const params = createParams(
            param.string('breed', { details: 'filter by breed' }),
            param.int('age', { details: 'filter by age' }),
        );
        expect(params.resolve(new URLSearchParams('breed=tabby&age=3'))).toEqual({ breed: 'tabby', age: 3 });
        expect(params.resolve({ breed: ['a', 'b'], age: '3' })).toEqual({ breed: 'b', age: 3 });
    });

    it('aggregates every failure before failing', () => {
        const params = createParams(
            param.int('age', { details: 'age' }),
            param.string('name', { details: 'name', required: true }),
            param.string('breed', { details: 'breed' }),
        );

        const result = params.safeResolve('age=abc');
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.params).toEqual(['age', 'name']);
            expect(result.error.message).toBe("age: 'abc' is not a valid integer; name: missing required parameter");
        }
        expect(() => params.resolve('age=abc')).toThrow(InvalidParametersError);
    });

    it('runs validators and reports their messages', () => {
        const params = createParams(param.int('age', { details: 'age', validators: [range(0, 30)] }));
        expect(() => params.resolve('age=31')).toThrow('age: 31 is not <= 30');
        expect(params.resolve('age=30')).toEqual({ age: 30 });
    });

    it('runs many-parameter validators on the combined value', () => {
        const params = createParams(param.int('ids', {
            details: 'ids',
            many: true,
            validators: [validator<number[]>(ids => ids.length <= 2, 'too many ids')],
        }));
        expect(() => params.resolve('ids=1&ids=2&ids=3')).toThrow('ids: too many ids');
        expect(params.resolve('ids=1&ids=2')).toEqual({ ids: [1, 2] });
    });
});

describe('ParameterSet — registry', () => {
    it('rejects duplicate names', () => {
        expect(() => createParams(
            param.string('q', { details: 'a' }),
            param.int('q', { details: 'b' }),
        )).toThrow('Duplicate parameter "q"');
    });

    it('extend returns a new set in the requested order', () => {
        const base = createParams(param.string('breed', { details: 'breed' }));
        const extended = base.extend([param.int('page', { details: 'page' })], 'prepend');

        expect(extended.names).toEqual(['page', 'breed']);
        expect(base.names).toEqual(['breed']);
        expect(base.extend([param.int('page', { details: 'page' })]).names).toEqual(['breed', 'page']);
    });

    it('is frozen', () => {
        expect(Object.isFrozen(createParams())).toBe(true);
    });
});

describe('ParameterSet.echo', () => {
    it('echoes present, echoable parameters in declaration order', () => {
        const params = createParams(
            param.string('token', { details: 'api token', echo: false }),
            param.int('page', { details: 'page', default: '0' }),
            param.string('breed', { details: 'breed' }),
        );
        const resolved = params.resolve('token=test-secret');

        expect(resolved).toEqual({ token: 'test-secret', page: 0 });
        expect(params.echo(resolved)).toEqual({ page: 0 });
    });

    it('echoes sets as arrays', () => {
        const params = createParams(param.int('id', { details: 'ids', many: true, container: containers.set() }));
        expect(params.echo(params.resolve('id=1&id=1&id=2'))).toEqual({ id: [1, 2] });
    });

    it('ignores names inherited from Object.prototype', () => {
        const params = createParams(
            param.string('constructor', { details: 'constructor' }),
            param.string('toString', { details: 'toString' }),
        );
        const resolved = params.resolve('');

        expect(resolved).toEqual({});
        expect(params.echo(resolved)).toEqual({});
        expect(params.echo({})).toEqual({});
    });
});

describe('ParameterSet.echoQuery', () => {
    const params = createParams(
        param.string('token', { details: 'api token', echo: false }),
        param.base64('q', { details: 'search' }),
        param.string('breed', { details: 'breed' }),
        param.string('tag', { details: 'tags', many: true }),
    );

    it('returns raw values in declaration order, last occurrence for single values', () => {
        expect(params.echoQuery('tag=a&breed=x&q=aGk=&breed=y&tag=b&token=test-secret')).toEqual([
            ['q', ['aGk=']],
            ['breed', ['y']],
            ['tag', ['a', 'b']],
        ]);
    });

    it('leaves out absent parameters and unknown keys', () => {
        expect(params.echoQuery('other=1')).toEqual([]);
        expect(params.echoQuery(undefined)).toEqual([]);
    });
});

describe('ParameterSet.describe', () => {
    it('describes every parameter in declaration order', () => {
        const params = createParams(
            param.string('breed', { details: 'filter by breed' }),
            param.int('age', { details: 'filter by age', required: true }),
        );
        const description = params.describe();

        expect(Object.keys(description)).toEqual(['breed', 'age']);
        expect(description['age']).toEqual({
            details: 'filter by age',
            label: null,
            required: true,
            default: null,
            type: 'integer',
            spec: null,
        });
    });

    it('rejects wiring mistakes at definition time', () => {
        expect(() => createParams(param.int('page', { details: 'page', default: 'first' })))
            .toThrow(ConfigurationError);
    });
});
