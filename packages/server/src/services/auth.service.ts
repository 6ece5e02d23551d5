import type { CreateUserInput, LoginInput, SetPasswordInput } from '@foodgram/shared';
import { info } from 'firebase-functions/logger';
import type { Repositories, UserRecord } from '../repositories/index.js';
import { ValidationError } from '../types/errors.js';
import { generateTokenKey, hashPassword, verifyPassword } from './password.js';

export class AuthService {
  constructor(private readonly repos: Repositories) {}

  /**
   * Create an account. Email and username must both be unused;
   * each clash is reported on its own field.
   */
  register(input: CreateUserInput): UserRecord {
    const details: Record<string, string[]> = {};
    if (this.repos.users.findByEmail(input.email) !== null) {
      details['email'] = ['A user with this email already exists.'];
    }
    if (this.repos.users.findByUsername(input.username) !== null) {
      details['username'] = ['A user with this username already exists.'];
    }
    if (Object.keys(details).length > 0) {
      throw new ValidationError('User already exists', details);
    }

    const user = this.repos.users.create({
      email: input.email,
      username: input.username,
      first_name: input.first_name,
      last_name: input.last_name,
      password_hash: hashPassword(input.password),
    });
    info('User registered', { userId: user.id });
    return user;
  }

  /** Issue (or return the existing) token for valid credentials. */
  login(input: LoginInput): string {
    const user = this.repos.users.findByEmail(input.email);
    if (user === null || !verifyPassword(input.password, user.password_hash)) {
      throw new ValidationError('Unable to log in with provided credentials.');
    }
    return this.repos.authTokens.findOrCreate(user.id, generateTokenKey);
  }

  logout(userId: number): void {
    this.repos.authTokens.deleteForUser(userId);
  }

  /** The user a token belongs to, or null for an unknown token. */
  authenticate(key: string): UserRecord | null {
    const userId = this.repos.authTokens.findUserId(key);
    if (userId === null) {
      return null;
    }
    return this.repos.users.findById(userId);
  }

  setPassword(user: UserRecord, input: SetPasswordInput): void {
    if (!verifyPassword(input.current_password, user.password_hash)) {
      throw ValidationError.forField('current_password', 'Invalid password.');
    }
    this.repos.users.updatePasswordHash(user.id, hashPassword(input.new_password));
  }
}
