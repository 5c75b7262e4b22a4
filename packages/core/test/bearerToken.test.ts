import { describe, expect, it } from 'vitest';

import { extractBearerToken, hasCompactJwsShape } from '../src/utils/bearerToken.js';

describe('extractBearerToken', () => {
  it.each([undefined, null, ''])('treats %j as absent', (header) => {
    expect(extractBearerToken(header)).toEqual({ status: 'absent' });
  });

  it('treats another scheme as absent', () => {
    expect(extractBearerToken('Basic abc123')).toEqual({ status: 'absent' });
  });

  it('matches the scheme case-insensitively', () => {
    expect(extractBearerToken('bearer aaa.bbb.ccc')).toEqual({
      status: 'present',
      token: 'aaa.bbb.ccc',
    });
  });

  it('tolerates surrounding whitespace', () => {
    expect(extractBearerToken('  Bearer   aaa.bbb.ccc  ')).toEqual({
      status: 'present',
      token: 'aaa.bbb.ccc',
    });
  });

  it.each(['Bearer', 'Bearer a.b', 'Bearer aaa.bbb.ccc extra', 'Bearer a..c'])(
    'reports %j as malformed',
    (header) => {
      expect(extractBearerToken(header)).toEqual({ status: 'malformed' });
    },
  );
});

describe('hasCompactJwsShape', () => {
  it('requires three non-empty segments', () => {
    expect(hasCompactJwsShape('a.b.c')).toBe(true);
    expect(hasCompactJwsShape('a.b')).toBe(false);
    expect(hasCompactJwsShape('a.b.c.d.e')).toBe(false);
    expect(hasCompactJwsShape('.b.c')).toBe(false);
  });
});
