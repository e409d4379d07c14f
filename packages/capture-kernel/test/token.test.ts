import { describe, expect, it } from 'vitest';
import { ZodError } from '@correlator/shared/z';

import {
  createCorrelationToken,
  isCorrelationToken,
  parseCorrelationToken
} from '../src/token.js';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('correlation tokens', () => {
  it('creates random v4 uuids', () => {
    const first = createCorrelationToken();
    const second = createCorrelationToken();

    expect(first).toMatch(UUID_V4);
    expect(second).toMatch(UUID_V4);
    expect(first).not.toBe(second);
  });

  it('parses tokens received as text, ignoring whitespace and case', () => {
    expect(parseCorrelationToken('  3F2504E0-4F89-41D3-9A0C-0305E82C3301 ')).toBe(
      '3f2504e0-4f89-41d3-9a0c-0305e82c3301'
    );
  });

  it('rejects text that is not a uuid', () => {
    expect(() => parseCorrelationToken('not-a-token')).toThrow(ZodError);
  });

  it('recognises tokens', () => {
    expect(isCorrelationToken(createCorrelationToken())).toBe(true);
    expect(isCorrelationToken('order-1')).toBe(false);
    expect(isCorrelationToken(42)).toBe(false);
  });
});
