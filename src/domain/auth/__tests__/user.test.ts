import { describe, it, expect } from 'vitest';
import { createUser, toUserId } from '../user.js';
import { InvalidArgumentError, requireNonEmpty } from '../errors.js';

describe('createUser', () => {
  it('copies and freezes the row', () => {
    const row: Record<string, unknown> = { name: 'Fred' };
    const user = createUser(7, row);
    row.name = 'changed';

    expect(user.row).toEqual({ name: 'Fred' });
    expect(Object.isFrozen(user)).toBe(true);
    expect(Object.isFrozen(user.row)).toBe(true);
  });
});

describe('toUserId', () => {
  it('accepts strings and finite numbers', () => {
    expect(toUserId('abc')).toBe('abc');
    expect(toUserId(42)).toBe(42);
  });

  it('converts bigint ids', () => {
    expect(toUserId(5n)).toBe(5);
    expect(toUserId(2n ** 64n)).toBe('18446744073709551616');
  });

  it('returns null for missing or unusable values', () => {
    expect(toUserId(undefined)).toBeNull();
    expect(toUserId(null)).toBeNull();
    expect(toUserId('')).toBeNull();
    expect(toUserId(Number.NaN)).toBeNull();
  });
});

describe('requireNonEmpty', () => {
  it('throws InvalidArgumentError naming the argument', () => {
    expect(() => requireNonEmpty('', 'username')).toThrow(InvalidArgumentError);
    expect(() => requireNonEmpty('', 'username')).toThrow('must provide username');
  });

  it('accepts non-empty strings and numbers', () => {
    expect(() => requireNonEmpty('x', 'name')).not.toThrow();
    expect(() => requireNonEmpty(0, 'user id')).not.toThrow();
  });
});
