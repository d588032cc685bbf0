import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';
import { emailQuerySchema, parseRequest } from '../utils/validation.js';

describe('parseRequest', () => {
  it('returns the parsed value', () => {
    expect(parseRequest(emailQuerySchema, { email: 'alice@mergington.edu', extra: '1' }, 'query')).toEqual({
      email: 'alice@mergington.edu'
    });
  });

  it('rejects a repeated query parameter', () => {
    try {
      parseRequest(emailQuerySchema, { email: ['a@mergington.edu', 'b@mergington.edu'] }, 'query');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.status).toBe(422);
        expect(error.issues).toEqual([{ loc: ['query', 'email'], msg: 'Expected a single string', type: 'invalid_type' }]);
      }
    }
  });

  it('locates nested issues under the request part', () => {
    const schema = z.object({ roster: z.array(z.string()) });
    expect(() => parseRequest(schema, { roster: ['ok', 3] }, 'body')).toThrow(ValidationError);

    try {
      parseRequest(schema, { roster: ['ok', 3] }, 'body');
    } catch (error) {
      if (error instanceof ValidationError) {
        expect(error.issues[0].loc).toEqual(['body', 'roster', 1]);
      }
    }
  });
});
