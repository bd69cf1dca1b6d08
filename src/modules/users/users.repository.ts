import type { User } from './user.types';

export abstract class UsersRepository {
  /** User owning a live (not revoked, not expired at `now`) session with this token hash. */
  abstract findBySessionTokenHash(tokenHash: string, now: Date): Promise<User | null>;
  abstract update(user: User): Promise<User>;
}
