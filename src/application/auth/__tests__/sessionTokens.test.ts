import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { JwtSessionTokens } from '../sessionTokens.js';

describe('JwtSessionTokens', () => {
  const sessions = new JwtSessionTokens('test-secret', 3600);

  it('resolves numeric and string ids with their type', () => {
    expect(sessions.resolve(sessions.issue(42))).toBe(42);
    expect(sessions.resolve(sessions.issue('u-42'))).toBe('u-42');
  });

  it('rejects tokens signed with another secret', () => {
    const other = new JwtSessionTokens('other-secret', 3600);

    expect(sessions.resolve(other.issue(42))).toBeNull();
  });

  it('rejects expired tokens', () => {
    const expired = jwt.sign({ idType: 'number', exp: Math.floor(Date.now() / 1000) - 10 }, 'test-secret', {
      subject: '42',
    });

    expect(sessions.resolve(expired)).toBeNull();
  });

  it('rejects garbage and tokens without a subject', () => {
    expect(sessions.resolve('not-a-token')).toBeNull();
    expect(sessions.resolve(jwt.sign({ idType: 'number' }, 'test-secret'))).toBeNull();
  });
});
