/**
 * Identity service: the credential gate plus token issue and revocation.
 *
 * Tokens are opaque UUIDs mapped to a user id. They never expire and carry
 * no scope; any recorded token grants access to every collection.
 */

import { v4 as uuid } from 'uuid';
import { ServiceError, unauthenticatedError } from '../domain/errors';
import { ownEntry } from '../domain/guards';
import { MOCK_PROJECT, PasswordCredentials, TokenIssue } from '../domain/identity';
import { Logger, logger as rootLogger } from '../logger';
import { ResourceStore } from '../storage/resource-store';

export class IdentityService {
  private log: Logger;

  constructor(private store: ResourceStore, logger?: Logger) {
    this.log = logger ?? rootLogger.child({ module: 'identity' });
  }

  /**
   * Resolve a bearer token to its user id.
   * Throws AUTH.UNAUTHENTICATED for an absent, empty or unknown token.
   */
  authenticate(token: string | undefined): string {
    if (!token) {
      throw new ServiceError(unauthenticatedError('Invalid or missing token'));
    }
    const presented: string = token;
    const userId = this.store.read((state) => ownEntry(state.tokens, presented));
    if (userId === undefined) {
      throw new ServiceError(unauthenticatedError('Invalid or missing token'));
    }
    return userId;
  }

  /** Check a username/password pair and mint a token for it. */
  async login(credentials: PasswordCredentials): Promise<TokenIssue> {
    const user = this.store.read((state) => ownEntry(state.users, credentials.name));
    if (!user || user.password !== credentials.password) {
      this.log.warn('Login rejected', { username: credentials.name });
      throw new ServiceError(unauthenticatedError('Bad credentials'));
    }

    const token = uuid();
    await this.store.mutate((state) => {
      state.tokens[token] = user.id;
    });
    this.log.info('Token issued', { userId: user.id });

    return {
      token,
      user: { id: user.id, name: credentials.name, role: user.role },
      project: { ...MOCK_PROJECT },
    };
  }

  /**
   * Revoke a token. Unknown or absent tokens are not an error. The store is
   * flushed either way. Returns whether a token was removed.
   */
  async logout(token: string | undefined): Promise<boolean> {
    const revoked = await this.store.mutate((state) => {
      if (!token || ownEntry(state.tokens, token) === undefined) return false;
      delete state.tokens[token];
      return true;
    });
    if (revoked) {
      this.log.info('Token revoked');
    }
    return revoked;
  }
}
