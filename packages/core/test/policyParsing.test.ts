import { describe, expect, it } from 'vitest';

import { parsePolicy } from '../src/utils/policyParsing.js';

describe('parsePolicy', () => {
  it('parses policies without a role', () => {
    expect(parsePolicy('public')).toEqual({ type: 'public' });
    expect(parsePolicy(' authenticated ')).toEqual({ type: 'authenticated' });
  });

  it('parses role policies', () => {
    expect(parsePolicy('role:admin')).toEqual({ type: 'role', role: 'admin' });
    expect(parsePolicy('owner-or-role:admin')).toEqual({ type: 'owner-or-role', role: 'admin' });
  });

  it('keeps colons inside the role name', () => {
    expect(parsePolicy('role:realm:admin')).toEqual({ type: 'role', role: 'realm:admin' });
  });

  it.each(['', 'admin', 'role', 'role:', 'public:admin', 'owner-or-role: '])(
    'rejects %j',
    (declaration) => {
      expect(() => parsePolicy(declaration)).toThrow(
        `[Policy] Invalid policy declaration '${declaration}'`,
      );
    },
  );
});
