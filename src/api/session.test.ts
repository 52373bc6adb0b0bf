import { describe, expect, it } from 'vitest';

import { createSession, sessionAuthenticated, sessionExpired, sessionFailed } from './session.js';

const credentials = { username: 'test@example.com', password: 'test-password' };

describe('session transitions', () => {
  it('should start unauthenticated with no fields', () => {
    expect(createSession()).toStrictEqual({ state: 'unauthenticated' });
  });

  it('should store token, account and credentials on login', () => {
    const session = sessionAuthenticated(createSession(), credentials, 'test-token', 'account-1');

    expect(session).toStrictEqual({
      state: 'authenticated',
      authToken: 'test-token',
      accountId: 'account-1',
      credentials,
    });
  });

  it('should drop the token but keep credentials when the session goes stale', () => {
    const authenticated = sessionAuthenticated(createSession(), credentials, 'test-token', 'account-1');

    const expired = sessionExpired(authenticated);

    expect(expired.state).toBe('unauthenticated');
    expect(expired.authToken).toBeUndefined();
    expect(expired.accountId).toBeUndefined();
    expect(expired.credentials).toBe(credentials);
  });

  it('should mark a failed renewal', () => {
    const expired = sessionExpired(sessionAuthenticated(createSession(), credentials, 'test-token'));

    const failed = sessionFailed(expired);

    expect(failed.state).toBe('failed');
    expect(failed.authToken).toBeUndefined();
    expect(failed.credentials).toBe(credentials);
  });

  it('should not mutate the previous session', () => {
    const initial = createSession();

    sessionAuthenticated(initial, credentials, 'test-token');

    expect(initial).toStrictEqual({ state: 'unauthenticated' });
  });

  it('should replace stored credentials on a new login', () => {
    const first = sessionAuthenticated(createSession(), credentials, 'test-token');
    const other = { username: 'other@example.com', password: 'other-password' };

    const second = sessionAuthenticated(first, other, 'second-token');

    expect(second.credentials).toBe(other);
    expect(second.authToken).toBe('second-token');
    expect(second.accountId).toBeUndefined();
  });
});
