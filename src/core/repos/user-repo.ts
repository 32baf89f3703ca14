/**
 * User Repository - accounts, their single profile and their auth token
 */

import { randomBytes } from 'crypto';
import type { User } from '../types.js';
import {
  insertedId,
  sqliteGet,
  sqliteRun,
  toDateFromSQLite,
  toSQLiteBool,
  type SQLiteDatabase
} from '../sqlite-wrapper.js';

interface UserRow {
  id: number;
  email: string;
  username: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  is_staff: number;
  is_superuser: number;
  date_joined: string;
}

export interface ProfileRecord {
  userId: number;
  bio: string | null;
  location: string | null;
  createdAt: Date;
}

interface ProfileRow {
  user_id: number;
  bio: string | null;
  location: string | null;
  created_at: string;
}

export interface CreateUserInput {
  email: string;
  username: string;
  passwordHash: string;
  firstName?: string;
  lastName?: string;
  isStaff?: boolean;
  isSuperuser?: boolean;
}

export class UserRepo {
  constructor(private readonly db: SQLiteDatabase) {}

  create(input: CreateUserInput): User {
    const result = sqliteRun(
      this.db,
      `INSERT INTO users (email, username, password_hash, first_name, last_name, is_staff, is_superuser)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        input.email,
        input.username,
        input.passwordHash,
        input.firstName ?? '',
        input.lastName ?? '',
        toSQLiteBool(input.isStaff ?? false),
        toSQLiteBool(input.isSuperuser ?? false)
      ]
    );
    const user = this.get(insertedId(result));
    if (!user) {
      throw new Error(`User ${String(result.lastInsertRowid)} vanished after insert`);
    }
    return user;
  }

  get(id: number): User | null {
    const row = sqliteGet<UserRow>(this.db, `SELECT * FROM users WHERE id = ?`, [id]);
    return row ? toUser(row) : null;
  }

  findByEmail(email: string): User | null {
    const row = sqliteGet<UserRow>(this.db, `SELECT * FROM users WHERE lower(email) = lower(?)`, [email]);
    return row ? toUser(row) : null;
  }

  findByUsername(username: string): User | null {
    const row = sqliteGet<UserRow>(this.db, `SELECT * FROM users WHERE username = ?`, [username]);
    return row ? toUser(row) : null;
  }

  setPasswordHash(id: number, passwordHash: string): void {
    sqliteRun(this.db, `UPDATE users SET password_hash = ? WHERE id = ?`, [passwordHash, id]);
  }

  // ── Tokens ────────────────────────────────────────────

  /**
   * Return the user's token, creating one on first use.
   */
  getOrCreateToken(userId: number): string {
    const existing = sqliteGet<{ key: string }>(
      this.db,
      `SELECT key FROM auth_tokens WHERE user_id = ?`,
      [userId]
    );
    if (existing) return existing.key;

    const key = randomBytes(20).toString('hex');
    sqliteRun(this.db, `INSERT INTO auth_tokens (key, user_id) VALUES (?, ?)`, [key, userId]);
    return key;
  }

  findByToken(key: string): User | null {
    const row = sqliteGet<UserRow>(
      this.db,
      `SELECT u.* FROM users u JOIN auth_tokens t ON t.user_id = u.id WHERE t.key = ?`,
      [key]
    );
    return row ? toUser(row) : null;
  }

  deleteToken(userId: number): boolean {
    return sqliteRun(this.db, `DELETE FROM auth_tokens WHERE user_id = ?`, [userId]).changes > 0;
  }

  // ── Profile ───────────────────────────────────────────

  /**
   * Return the user's profile, creating an empty one if it is missing.
   */
  getOrCreateProfile(userId: number): ProfileRecord {
    sqliteRun(this.db, `INSERT OR IGNORE INTO profiles (user_id) VALUES (?)`, [userId]);
    const row = sqliteGet<ProfileRow>(this.db, `SELECT * FROM profiles WHERE user_id = ?`, [userId]);
    if (!row) {
      throw new Error(`Profile for user ${userId} could not be created`);
    }
    return {
      userId: row.user_id,
      bio: row.bio,
      location: row.location,
      createdAt: toDateFromSQLite(row.created_at)
    };
  }

  updateProfile(userId: number, patch: { bio?: string | null; location?: string | null }): ProfileRecord {
    const current = this.getOrCreateProfile(userId);
    const bio = patch.bio !== undefined ? patch.bio : current.bio;
    const location = patch.location !== undefined ? patch.location : current.location;
    sqliteRun(this.db, `UPDATE profiles SET bio = ?, location = ? WHERE user_id = ?`, [bio, location, userId]);
    return { ...current, bio, location };
  }
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    passwordHash: row.password_hash,
    firstName: row.first_name,
    lastName: row.last_name,
    isStaff: row.is_staff === 1,
    isSuperuser: row.is_superuser === 1,
    dateJoined: toDateFromSQLite(row.date_joined)
  };
}
