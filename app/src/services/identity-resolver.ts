import type { User } from '../types/todo.js';

/** Maps a verified token subject to the internal user id. */
export interface IdentityResolver {
  resolveUserId(subject: string): Promise<string>;
}

/** No user is registered for the subject. Treated as an authentication failure. */
export class IdentityNotFoundError extends Error {
  readonly subject: string;

  constructor(subject: string) {
    super('no user registered for token subject');
    this.name = 'IdentityNotFoundError';
    this.subject = subject;
  }
}

export interface UserLookup {
  getByExternalSubject(subject: string): Promise<User | undefined>;
}

/**
 * Resolver backed by the user store. A missing user becomes
 * IdentityNotFoundError; store failures propagate unchanged.
 */
export function createUserIdentityResolver(users: UserLookup): IdentityResolver {
  return {
    async resolveUserId(subject: string): Promise<string> {
      const user = await users.getByExternalSubject(subject);
      if (!user) {
        throw new IdentityNotFoundError(subject);
      }
      return user.id;
    },
  };
}
