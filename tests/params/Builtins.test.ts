import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { param, type ParamDescriptor } from '../../src/params/index.js';

function resolveOne<V>(descriptor: ParamDescriptor<V>, raw: string): V | string {
    const outcome = descriptor.resolve([raw]);
    switch (outcome.status) {
        case 'resolved': return outcome.value;
        case 'failed': return `error: ${outcome.error.message}`;
        case 'omitted': return 'omitted';
    }
}

describe('param.int', () => {
    const age = param.int('age', { details: 'age' });

    it('parses base-10 integers', () => {
        expect(resolveOne(age, '42')).toBe(42);
        expect(resolveOne(age, '+7')).toBe(7);
        expect(resolveOne(age, '-3')).toBe(-3);
        expect(resolveOne(age, ' 5 ')).toBe(5);
    });

    it('rejects decimals, words and unsafe integers', () => {
        expect(resolveOne(age, '4.2')).toBe("error: '4.2' is not a valid integer");
        expect(resolveOne(age, 'abc')).toBe("error: 'abc' is not a valid integer");
        expect(resolveOne(age, '99999999999999999999')).toBe("error: '99999999999999999999' is not a valid integer");
    });
});

describe('param.float', () => {
    const weight = param.float('weight', { details: 'weight' });

    it('parses decimals and exponents', () => {
        expect(resolveOne(weight, '-2.5')).toBe(-2.5);
        expect(resolveOne(weight, '1e3')).toBe(1000);
        expect(resolveOne(weight, '.5')).toBe(0.5);
    });

    it('rejects non-numbers', () => {
        expect(resolveOne(weight, 'abc')).toBe("error: 'abc' is not a valid number");
        expect(resolveOne(weight, 'Infinity')).toBe("error: 'Infinity' is not a valid number");
    });

    it('is typed float', () => {
        expect(weight.type).toBe('float');
    });
});

describe('param.decimal', () => {
    const price = param.decimal('price', { details: 'price' });

    it('keeps the exact decimal text', () => {
        expect(resolveOne(price, '0.10')).toBe('0.10');
        expect(resolveOne(price, '12345678901234567890.01')).toBe('12345678901234567890.01');
        expect(resolveOne(price, '1e3')).toBe('1e3');
        expect(resolveOne(price, ' -2.50 ')).toBe('-2.50');
    });

    it('rejects non-numbers', () => {
        expect(resolveOne(price, 'abc')).toBe("error: 'abc' is not a valid decimal");
        expect(resolveOne(price, '1.2.3')).toBe("error: '1.2.3' is not a valid decimal");
    });

    it('is typed decimal', () => {
        expect(price.type).toBe('decimal');
    });
});

describe('param.bool', () => {
    const indoor = param.bool('indoor', { details: 'indoor' });

    it('reads boolean tokens', () => {
        expect(resolveOne(indoor, 'Yes')).toBe(true);
        expect(resolveOne(indoor, 'TRUE')).toBe(true);
        expect(resolveOne(indoor, 'off')).toBe(false);
        expect(resolveOne(indoor, '0')).toBe(false);
    });

    it('rejects anything else', () => {
        expect(resolveOne(indoor, 'maybe')).toBe("error: 'maybe' is not a valid boolean");
    });
});

describe('param.base64', () => {
    const token = param.base64('token', { details: 'token' });

    it('decodes to UTF-8 text', () => {
        expect(resolveOne(token, 'aGVsbG8=')).toBe('hello');
        expect(resolveOne(token, '')).toBe('');
    });

    it('rejects malformed input', () => {
        expect(resolveOne(token, 'abc')).toBe("error: 'abc' is not valid base64");
        expect(resolveOne(token, 'a$c=')).toBe("error: 'a$c=' is not valid base64");
    });

    it('rejects bytes that are not UTF-8', () => {
        expect(resolveOne(token, '/w==')).toMatch(/^error: '\/w==' does not decode to UTF-8 text/);
    });
});

describe('param.enumOf', () => {
    const order = param.enumOf(['asc', 'desc'])('order', { details: 'sort order', default: 'asc' });

    it('accepts declared values', () => {
        expect(resolveOne(order, 'desc')).toBe('desc');
        expect(order.resolve(undefined)).toEqual({ status: 'resolved', value: 'asc' });
    });

    it('rejects others', () => {
        expect(resolveOne(order, 'up')).toMatch(/^error: Invalid enum value/);
    });
});

describe('param.fromZod', () => {
    const year = param.fromZod(z.string().regex(/^\d{4}$/).transform(Number), 'year')('year', { details: 'year' });

    it('runs the schema over the raw string', () => {
        expect(resolveOne(year, '2024')).toBe(2024);
        expect(resolveOne(year, '24')).toBe('error: Invalid');
        expect(year.describe().type).toBe('year');
    });
});

describe('param.string', () => {
    it('passes values through', () => {
        expect(resolveOne(param.string('q', { details: 'q' }), ' spaced ')).toBe(' spaced ');
    });
});
