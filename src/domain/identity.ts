/**
 * Identity domain model: seeded users, bearer tokens and the password
 * authentication request.
 *
 * Passwords are stored and compared as plaintext. This service is a test
 * double for clients of a cloud identity API, not an identity provider.
 */

import { isRecord, isString, readId, stringOr } from './guards';
import { ServiceError, validationError } from './errors';

/** A user record, keyed by username in the users collection. */
export interface UserRecord {
  password: string;
  id: string;
  role: string;
  domain: string;
}

/** Users collection: username -> record. */
export type UserDirectory = Record<string, UserRecord>;

/** Tokens collection: token -> owning user id. */
export type TokenTable = Record<string, string>;

/** Credentials extracted from a password authentication request. */
export interface PasswordCredentials {
  name: string;
  password: string;
}

/**
 * The nested body of `POST /v3/auth/tokens`. Every level is optional so the
 * parser can report a missing path as a bad request instead of failing on a
 * property lookup.
 */
export interface PasswordAuthRequest {
  auth?: {
    identity?: {
      password?: {
        user?: {
          name?: unknown;
          password?: unknown;
        };
      };
    };
  };
}

/** Summary of the authenticated user returned on login. */
export interface UserSummary {
  id: string;
  name: string;
  role: string;
}

/** Fixed project descriptor every token is issued against. */
export interface ProjectDescriptor {
  id: string;
  name: string;
}

export const MOCK_PROJECT: ProjectDescriptor = { id: 'mock-project', name: 'MockProject' };

/** Body returned by a successful login. */
export interface TokenIssue {
  token: string;
  user: UserSummary;
  project: ProjectDescriptor;
}

/**
 * Read one stored user entry. A user without a string password can never
 * log in and is skipped; a missing role or domain takes the defaults.
 */
export function readUserRecord(value: unknown): UserRecord | undefined {
  if (!isRecord(value)) return undefined;
  const { password } = value;
  const id = readId(value.id);
  if (!isString(password) || id === undefined) return undefined;
  return {
    ...value,
    password,
    id,
    role: stringOr(value.role, 'user'),
    domain: stringOr(value.domain, 'default'),
  };
}

function toAuthRequest(body: unknown): PasswordAuthRequest {
  const auth = isRecord(body) ? body.auth : undefined;
  const identity = isRecord(auth) ? auth.identity : undefined;
  const password = isRecord(identity) ? identity.password : undefined;
  const user = isRecord(password) ? password.user : undefined;
  if (!isRecord(user)) return {};
  return { auth: { identity: { password: { user: { name: user.name, password: user.password } } } } };
}

/**
 * Extract `auth.identity.password.user.{name,password}`.
 * Throws a VALIDATION.SCHEMA error when the path is missing or either
 * value is not a string.
 */
export function parseLoginRequest(body: unknown): PasswordCredentials {
  const user = toAuthRequest(body).auth?.identity?.password?.user;
  if (!user || !isString(user.name) || !isString(user.password)) {
    throw new ServiceError(
      validationError('Malformed authentication body', {
        requiredPaths: ['auth.identity.password.user.name', 'auth.identity.password.user.password'],
      }),
    );
  }
  return { name: user.name, password: user.password };
}
