import { describe, it, expect } from 'vitest';
import {
    ConfigurationError, ParameterError, InvalidParametersError, ValidationError,
    InvalidRepresentationError, HttpError, NotFoundError, RestkitError, errorResponse,
} from '../../src/core/errors.js';

describe('error taxonomy', () => {
    it('every class extends RestkitError and sets its name', () => {
        const errors = [
            new ConfigurationError('x'),
            new ParameterError('p', 'x'),
            new InvalidParametersError([]),
            new ValidationError('x'),
            new InvalidRepresentationError([]),
            new HttpError(409, 'Conflict'),
            new NotFoundError(),
        ];
        expect(errors.every(e => e instanceof RestkitError && e instanceof Error)).toBe(true);
        expect(errors.map(e => e.name)).toEqual([
            'ConfigurationError', 'ParameterError', 'InvalidParametersError', 'ValidationError',
            'InvalidRepresentationError', 'HttpError', 'NotFoundError',
        ]);
    });

    it('InvalidParametersError lists every parameter failure', () => {
        const error = new InvalidParametersError([
            new ParameterError('age', 'bad'),
            new ParameterError('name', 'missing required parameter'),
        ]);

        expect(error.message).toBe('age: bad; name: missing required parameter');
        expect(error.params).toEqual(['age', 'name']);
        expect(error.title).toBe('Invalid parameters');
    });

    it('InvalidRepresentationError groups messages by field', () => {
        const error = new InvalidRepresentationError([
            new ValidationError('too short', 'name'),
            new ValidationError('min exceeds max'),
            new ValidationError('not a word', 'name'),
        ]);

        expect(error.message).toBe('name: too short; min exceeds max; name: not a word');
        expect(error.byField()).toEqual({ 'name': ['too short', 'not a word'], '*': ['min exceeds max'] });
    });

    it('ValidationError.forField keeps message and cause', () => {
        const cause = new Error('root');
        const error = new ValidationError('bad', undefined, { cause }).forField('age');

        expect(error.field).toBe('age');
        expect(error.message).toBe('bad');
        expect(error.cause).toBe(cause);
    });

    it('HttpError falls back to its title as message', () => {
        expect(new HttpError(409, 'Conflict').message).toBe('Conflict');
        expect(new HttpError(409, 'Conflict', 'cat already exists').message).toBe('cat already exists');
    });
});

describe('errorResponse', () => {
    it('maps NotFoundError to 404', () => {
        expect(errorResponse(new NotFoundError())).toEqual({
            status: 404,
            body: { title: 'Not found', description: 'The requested resource could not be found' },
        });
    });

    it('maps parameter and representation failures to 400', () => {
        const params = errorResponse(new InvalidParametersError([new ParameterError('age', 'bad')]));
        const repr = errorResponse(new InvalidRepresentationError([new ValidationError('bad', 'age')]));

        expect(params).toEqual({ status: 400, body: { title: 'Invalid parameters', description: 'age: bad' } });
        expect(repr).toEqual({
            status: 400,
            body: { title: 'Representation deserialization failed', description: 'age: bad' },
        });
    });

    it('uses the status of any HttpError', () => {
        expect(errorResponse(new HttpError(418, 'Teapot', 'short and stout'))).toEqual({
            status: 418,
            body: { title: 'Teapot', description: 'short and stout' },
        });
    });

    it('maps ConfigurationError to 500', () => {
        expect(errorResponse(new ConfigurationError('bad wiring'))?.status).toBe(500);
    });

    it('returns undefined for foreign errors', () => {
        expect(errorResponse(new Error('boom'))).toBeUndefined();
        expect(errorResponse('boom')).toBeUndefined();
    });
});
