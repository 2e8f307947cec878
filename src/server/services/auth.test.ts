import { ExternalServiceError } from '../errors';
import { FirebaseIdentityProvider } from './auth';

function stubFetch(result: Response | Error) {
  return jest.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    if (result instanceof Error) throw result;
    return result;
  });
}

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

describe('FirebaseIdentityProvider', () => {
  it('returns the user behind a valid token', async () => {
    const fetch = stubFetch(json({ users: [{ localId: 'user-1', email: 'user@example.com' }] }));
    const provider = new FirebaseIdentityProvider('test-key', fetch);

    await expect(provider.verifyIdToken('test-token')).resolves.toEqual({ uid: 'user-1', email: 'user@example.com' });

    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe('https://identitytoolkit.googleapis.com/v1/accounts:lookup?key=test-key');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ idToken: 'test-token' }));
  });

  it('omits the email when the account has none', async () => {
    const provider = new FirebaseIdentityProvider('test-key', stubFetch(json({ users: [{ localId: 'anon-1' }] })));
    await expect(provider.verifyIdToken('test-token')).resolves.toEqual({ uid: 'anon-1' });
  });

  it('returns null for rejected tokens', async () => {
    const fetch = stubFetch(json({ error: { message: 'INVALID_ID_TOKEN' } }, 400));
    const provider = new FirebaseIdentityProvider('test-key', fetch);
    await expect(provider.verifyIdToken('expired')).resolves.toBeNull();
  });

  it('returns null for disabled or unknown users', async () => {
    const disabled = new FirebaseIdentityProvider('test-key', stubFetch(json({ users: [{ localId: 'u', disabled: true }] })));
    const unknown = new FirebaseIdentityProvider('test-key', stubFetch(json({})));

    await expect(disabled.verifyIdToken('t')).resolves.toBeNull();
    await expect(unknown.verifyIdToken('t')).resolves.toBeNull();
  });

  it('raises an ExternalServiceError when the identity service fails', async () => {
    const provider = new FirebaseIdentityProvider('test-key', stubFetch(json({}, 503)));

    const err = await provider.verifyIdToken('t').catch(e => e);
    expect(err).toBeInstanceOf(ExternalServiceError);
    expect(err.message).toBe('External service error (firebase): HTTP 503');
    expect(err.stage).toBe('session');
  });

  it('raises an ExternalServiceError on network failure', async () => {
    const provider = new FirebaseIdentityProvider('test-key', stubFetch(new Error('socket hang up')));
    await expect(provider.verifyIdToken('t')).rejects.toThrow('External service error (firebase): socket hang up');
  });
});
