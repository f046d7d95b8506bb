export interface Principal {
  id: string;
  anonymous: boolean;
}

/**
 * Resolves the caller behind a bearer token. Returns null when the token is
 * missing or not recognised.
 */
export interface IIdentityProvider {
  readonly requiresToken: boolean;
  authenticate(token: string | null): Promise<Principal | null>;
}

export const IDENTITY_PROVIDER = Symbol('IIdentityProvider');

export const ANONYMOUS: Principal = { id: 'anonymous', anonymous: true };
