import { StaticTokenIdentityProvider } from './StaticTokenIdentityProvider';

describe('StaticTokenIdentityProvider', () => {
  it('should let everyone in as anonymous when no tokens are configured', async () => {
    const provider = new StaticTokenIdentityProvider([]);

    expect(provider.requiresToken).toBe(false);
    expect(await provider.authenticate(null)).toEqual({ id: 'anonymous', anonymous: true });
  });

  it('should name principals from name:token entries', async () => {
    const provider = new StaticTokenIdentityProvider(['ci:test-secret']);

    expect(await provider.authenticate('test-secret')).toEqual({ id: 'ci', anonymous: false });
  });

  it('should name bare tokens by position', async () => {
    const provider = new StaticTokenIdentityProvider(['first-secret', 'second-secret']);

    expect(await provider.authenticate('second-secret')).toEqual({ id: 'client-2', anonymous: false });
  });

  it('should reject missing and unknown tokens', async () => {
    const provider = new StaticTokenIdentityProvider(['ci:test-secret']);

    expect(provider.requiresToken).toBe(true);
    expect(await provider.authenticate(null)).toBeNull();
    expect(await provider.authenticate('wrong-secret')).toBeNull();
    expect(await provider.authenticate('ci:test-secret')).toBeNull();
  });
});
