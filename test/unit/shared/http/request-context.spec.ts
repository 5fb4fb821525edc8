import { describe, it, expect } from 'vitest';
import { resolveRequestId } from '../../../../src/shared/http/request-context';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('resolveRequestId', () => {
  it('keeps an incoming request id', () => {
    expect(resolveRequestId('req-123')).toBe('req-123');
  });

  it('trims surrounding whitespace', () => {
    expect(resolveRequestId('  req-456 ')).toBe('req-456');
  });

  it.each([undefined, '', '   ', ['a', 'b']])('generates a uuid for %j', (raw) => {
    expect(resolveRequestId(raw)).toMatch(UUID);
  });
});
