import { describe, it, expect } from 'vitest';
import { describeError, fail, ok, outcome, statusForKind } from '../../src/lib/outcome.js';

describe('outcome', () => {
  it('should map each kind to its HTTP status', () => {
    expect(statusForKind('BadRequest')).toBe(400);
    expect(statusForKind('Unauthorized')).toBe(401);
    expect(statusForKind('NotFound')).toBe(404);
    expect(statusForKind('UnprocessableEntity')).toBe(422);
    expect(statusForKind('ServiceUnavailable')).toBe(503);
  });

  it('should omit detail when none is given', () => {
    expect(Object.keys(outcome('NotFound', 'missing'))).toEqual(['kind', 'message']);
    expect(outcome('NotFound', 'missing', { id: '1' })).toEqual({
      kind: 'NotFound',
      message: 'missing',
      detail: { id: '1' },
    });
  });

  it('should freeze outcomes', () => {
    expect(Object.isFrozen(outcome('BadRequest', 'bad'))).toBe(true);
  });

  it('should build results', () => {
    expect(ok(42)).toEqual({ ok: true, value: 42 });
    expect(fail('Unauthorized', 'denied')).toEqual({
      ok: false,
      error: { kind: 'Unauthorized', message: 'denied' },
    });
  });

  it('should describe thrown values', () => {
    expect(describeError(new Error('socket hang up'))).toBe('socket hang up');
    expect(describeError('plain')).toBe('plain');
  });
});
