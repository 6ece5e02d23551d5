import type { Database } from 'better-sqlite3';
import { BaseRepository } from './base.repository.js';
import { readNullableString, readNumber, readString } from '../db/row-guards.js';

export interface UserRecord {
  id: number;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  password_hash: string;
  avatar: string | null;
  created_at: string;
}

export type NewUser = Omit<UserRecord, 'id' | 'avatar' | 'created_at'>;

export class UserRepository extends BaseRepository<UserRecord> {
  constructor(db: Database) {
    super(db, 'users');
  }

  protected parseEntity(row: Record<string, unknown>): UserRecord | null {
    const id = readNumber(row, 'id');
    const email = readString(row, 'email');
    const username = readString(row, 'username');
    const firstName = readString(row, 'first_name');
    const lastName = readString(row, 'last_name');
    const passwordHash = readString(row, 'password_hash');
    const avatar = readNullableString(row, 'avatar');
    const createdAt = readString(row, 'created_at');

    if (
      id === null ||
      email === null ||
      username === null ||
      firstName === null ||
      lastName === null ||
      passwordHash === null ||
      avatar === undefined ||
      createdAt === null
    ) {
      return null;
    }

    return {
      id,
      email,
      username,
      first_name: firstName,
      last_name: lastName,
      password_hash: passwordHash,
      avatar,
      created_at: createdAt,
    };
  }

  create(data: NewUser): UserRecord {
    const createdAt = this.timestamp();
    const result = this.db
      .prepare(
        `INSERT INTO users (email, username, first_name, last_name, password_hash, avatar, created_at)
         VALUES (?, ?, ?, ?, ?, NULL, ?)`
      )
      .run(data.email, data.username, data.first_name, data.last_name, data.password_hash, createdAt);

    return {
      id: Number(result.lastInsertRowid),
      ...data,
      avatar: null,
      created_at: createdAt,
    };
  }

  findByEmail(email: string): UserRecord | null {
    return this.queryOne('SELECT * FROM users WHERE email = ?', email);
  }

  findByUsername(username: string): UserRecord | null {
    return this.queryOne('SELECT * FROM users WHERE username = ?', username);
  }

  findByIds(ids: number[]): UserRecord[] {
    if (ids.length === 0) {
      return [];
    }
    const placeholders = ids.map(() => '?').join(', ');
    return this.queryMany(`SELECT * FROM users WHERE id IN (${placeholders})`, ...ids);
  }

  findAll(limit: number, offset: number): UserRecord[] {
    return this.queryMany('SELECT * FROM users ORDER BY username LIMIT ? OFFSET ?', limit, offset);
  }

  count(): number {
    const value = this.db.prepare('SELECT COUNT(*) FROM users').pluck().get();
    return typeof value === 'number' ? value : 0;
  }

  updateAvatar(id: number, avatar: string | null): boolean {
    const result = this.db.prepare('UPDATE users SET avatar = ? WHERE id = ?').run(avatar, id);
    return result.changes > 0;
  }

  updatePasswordHash(id: number, passwordHash: string): boolean {
    const result = this.db
      .prepare('UPDATE users SET password_hash = ? WHERE id = ?')
      .run(passwordHash, id);
    return result.changes > 0;
  }
}
