import type { SessionUser } from '../../shared/api.js';
import { ExternalServiceError } from '../errors.js';

export interface IdentityProvider {
  /** Resolves the user behind an ID token, or null when the token is not accepted. */
  verifyIdToken(idToken: string): Promise<SessionUser | null>;
}

type LookupResponse = {
  users?: { localId: string; email?: string; disabled?: boolean }[];
};

const LOOKUP_URL = 'https://identitytoolkit.googleapis.com/v1/accounts:lookup';

/**
 * Checks Firebase ID tokens against the Identity Toolkit REST API, the same
 * backend the client SDK signs users in with.
 */
export class FirebaseIdentityProvider implements IdentityProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly apiKey: string, fetchImpl?: typeof fetch) {
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async verifyIdToken(idToken: string): Promise<SessionUser | null> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${LOOKUP_URL}?key=${encodeURIComponent(this.apiKey)}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ idToken }),
        signal: AbortSignal.timeout(8000),
      });
    } catch (e) {
      throw new ExternalServiceError('firebase', e instanceof Error ? e.message : String(e), 'session');
    }

    // Expired, revoked or malformed tokens come back as 400 INVALID_ID_TOKEN.
    if (res.status === 400) return null;
    if (!res.ok) throw new ExternalServiceError('firebase', `HTTP ${res.status}`, 'session');

    const data = (await res.json()) as LookupResponse;
    const user = data.users?.[0];
    if (!user || user.disabled) return null;

    return user.email ? { uid: user.localId, email: user.email } : { uid: user.localId };
  }
}
