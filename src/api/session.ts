/**
 * Session state for the Ariston NET client.
 *
 * The client owns one Session value and replaces it through the transitions below:
 *
 *   unauthenticated --login--> authenticated --stale (405)--> unauthenticated --re-login--> authenticated
 *                                                                         \--re-login fails--> failed
 */

export type SessionState = 'unauthenticated' | 'authenticated' | 'failed';

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

export interface Session {
  readonly state: SessionState;
  readonly authToken?: string;
  readonly accountId?: string;
  readonly credentials?: Credentials;
}

export function createSession(): Session {
  return { state: 'unauthenticated' };
}

/**
 * Successful login: store token, account and the credentials used for silent renewal
 */
export function sessionAuthenticated(
  session: Session,
  credentials: Credentials,
  authToken: string,
  accountId?: string,
): Session {
  return { ...session, state: 'authenticated', authToken, accountId, credentials };
}

/**
 * Token dropped (stale session, or a rejected login); credentials kept for renewal
 */
export function sessionExpired(session: Session): Session {
  return { state: 'unauthenticated', credentials: session.credentials };
}

/**
 * Renewal did not bring the session back
 */
export function sessionFailed(session: Session): Session {
  return { state: 'failed', credentials: session.credentials };
}
