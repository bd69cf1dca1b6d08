import { Injectable } from '@nestjs/common';
import { and, eq, gt, isNull } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import { sessions, users, type UserRow } from '../database/schema';
import { isUserAuthority, type User } from './user.types';
import { UsersRepository } from './users.repository';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    createdAt: row.createdAt,
    username: row.username,
    activeBlogId: row.activeBlogId ?? null,
    authorities: (row.authorities ?? []).filter(isUserAuthority),
  };
}

@Injectable()
export class DrizzleUsersRepository extends UsersRepository {
  constructor(private readonly database: DatabaseService) {
    super();
  }

  async findBySessionTokenHash(tokenHash: string, now: Date): Promise<User | null> {
    const [row] = await this.database
      .client()
      .select({ user: users })
      .from(sessions)
      .innerJoin(users, eq(users.id, sessions.userId))
      .where(and(eq(sessions.tokenHash, tokenHash), isNull(sessions.revokedAt), gt(sessions.expiresAt, now)))
      .limit(1);
    return row ? toUser(row.user) : null;
  }

  async update(user: User): Promise<User> {
    const [row] = await this.database
      .client()
      .update(users)
      .set({ activeBlogId: user.activeBlogId, authorities: user.authorities })
      .where(eq(users.id, user.id))
      .returning();
    if (!row) throw new Error(`User ${user.id} vanished during update.`);
    return toUser(row);
  }
}
