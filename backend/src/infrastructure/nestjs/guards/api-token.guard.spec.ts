import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { StaticTokenIdentityProvider } from '../../identity';
import { ApiTokenGuard, AuthenticatedRequest, bearerToken } from './api-token.guard';

function contextFor(request: Pick<AuthenticatedRequest, 'headers' | 'principal'>): ExecutionContext {
  return new ExecutionContextHost([request, {}, undefined]);
}

describe('ApiTokenGuard', () => {
  describe('bearerToken', () => {
    it('should extract the token from the header', () => {
      expect(bearerToken('Bearer test-secret')).toBe('test-secret');
      expect(bearerToken('bearer test-secret ')).toBe('test-secret');
    });

    it('should ignore other schemes and missing headers', () => {
      expect(bearerToken('Basic dXNlcjpwYXNz')).toBeNull();
      expect(bearerToken(undefined)).toBeNull();
    });
  });

  it('should attach the principal for a valid token', async () => {
    const guard = new ApiTokenGuard(new StaticTokenIdentityProvider(['ci:test-secret']));
    const request: Pick<AuthenticatedRequest, 'headers' | 'principal'> = {
      headers: { authorization: 'Bearer test-secret' },
    };

    await expect(guard.canActivate(contextFor(request))).resolves.toBe(true);
    expect(request.principal).toEqual({ id: 'ci', anonymous: false });
  });

  it('should reject an invalid token', async () => {
    const guard = new ApiTokenGuard(new StaticTokenIdentityProvider(['ci:test-secret']));

    await expect(guard.canActivate(contextFor({ headers: { authorization: 'Bearer nope' } }))).rejects.toThrow(
      UnauthorizedException,
    );
  });

  it('should admit anonymous callers when no tokens are configured', async () => {
    const guard = new ApiTokenGuard(new StaticTokenIdentityProvider([]));
    const request: Pick<AuthenticatedRequest, 'headers' | 'principal'> = { headers: {} };

    await expect(guard.canActivate(contextFor(request))).resolves.toBe(true);
    expect(request.principal).toEqual({ id: 'anonymous', anonymous: true });
  });
});
