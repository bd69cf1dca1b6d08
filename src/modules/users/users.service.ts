import { Injectable } from '@nestjs/common';
import type { User } from './user.types';
import { UsersRepository } from './users.repository';

@Injectable()
export class UsersService {
  constructor(private readonly users: UsersRepository) {}

  async save(user: User): Promise<User> {
    return await this.users.update(user);
  }

  async findBySessionTokenHash(tokenHash: string, now: Date = new Date()): Promise<User | null> {
    const th = (tokenHash ?? '').trim();
    if (!th) return null;
    return await this.users.findBySessionTokenHash(th, now);
  }
}
