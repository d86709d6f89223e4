import { isSafeMethod, permit, SAFE_METHODS } from './access-policy';
import type { Caller } from './interfaces/caller.interface';

const staff: Caller = { userId: 'staff-1', email: 'admin@test.com', isStaff: true };
const regular: Caller = { userId: 'user-1', email: 'user@test.com', isStaff: false };

const callers: Array<[string, Caller | null]> = [
  ['anonymous', null],
  ['regular user', regular],
  ['staff user', staff],
];

describe('AccessPolicy', () => {
  describe('safe methods', () => {
    it.each(['GET', 'HEAD', 'OPTIONS'])('%s is in the safe set', (method) => {
      expect(SAFE_METHODS.has(method)).toBe(true);
      expect(isSafeMethod(method)).toBe(true);
    });

    it.each(['GET', 'HEAD', 'OPTIONS'].flatMap((method) =>
      callers.map(([label, caller]) => [method, label, caller] as const),
    ))('permits %s for %s', (method, _label, caller) => {
      expect(permit(method, caller)).toBe(true);
    });

    it('compares method names case-insensitively', () => {
      expect(permit('get', null)).toBe(true);
      expect(permit('post', null)).toBe(false);
    });
  });

  describe('unsafe methods', () => {
    it.each(['POST', 'PUT', 'PATCH', 'DELETE'])('%s is not in the safe set', (method) => {
      expect(isSafeMethod(method)).toBe(false);
    });

    it.each(['POST', 'PUT', 'PATCH', 'DELETE'])('denies %s for anonymous callers', (method) => {
      expect(permit(method, null)).toBe(false);
    });

    it.each(['POST', 'PUT', 'PATCH', 'DELETE'])('denies %s for non-staff users', (method) => {
      expect(permit(method, regular)).toBe(false);
    });

    it.each(['POST', 'PUT', 'PATCH', 'DELETE'])('permits %s for staff users', (method) => {
      expect(permit(method, staff)).toBe(true);
    });
  });

  it('returns the same answer for the same input every time', () => {
    const results = Array.from({ length: 5 }, () => [
      permit('POST', regular),
      permit('POST', staff),
      permit('GET', null),
    ]);

    expect(new Set(results.map((row) => row.join(',')))).toEqual(
      new Set(['false,true,true']),
    );
  });

  it('does not modify the caller', () => {
    const caller: Caller = { ...regular };
    permit('DELETE', caller);
    expect(caller).toEqual(regular);
  });
});
