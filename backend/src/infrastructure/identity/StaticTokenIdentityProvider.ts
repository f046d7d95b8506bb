import { createHash, timingSafeEqual } from 'crypto';
import { ANONYMOUS, IIdentityProvider, Principal } from './IIdentityProvider';

interface TokenEntry {
  id: string;
  digest: Buffer;
}

function digestOf(token: string): Buffer {
  return createHash('sha256').update(token, 'utf8').digest();
}

/**
 * Identity from a fixed token list. Entries are either `name:token` or a bare
 * token, which is named by position. With no tokens every caller is anonymous.
 */
export class StaticTokenIdentityProvider implements IIdentityProvider {
  private readonly entries: TokenEntry[];

  constructor(tokens: string[]) {
    this.entries = tokens.map((entry, index) => {
      const separator = entry.indexOf(':');
      if (separator > 0 && separator < entry.length - 1) {
        return { id: entry.slice(0, separator), digest: digestOf(entry.slice(separator + 1)) };
      }
      return { id: `client-${index + 1}`, digest: digestOf(entry) };
    });
  }

  get requiresToken(): boolean {
    return this.entries.length > 0;
  }

  async authenticate(token: string | null): Promise<Principal | null> {
    if (!this.requiresToken) {
      return ANONYMOUS;
    }
    if (!token) {
      return null;
    }
    const digest = digestOf(token);
    const match = this.entries.find((entry) => timingSafeEqual(entry.digest, digest));
    return match ? { id: match.id, anonymous: false } : null;
  }
}
