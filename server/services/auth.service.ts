import bcrypt from 'bcryptjs';
import { Knex } from 'knex';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { USER_ROLES } from '../../shared/constants';
import { User } from '../../shared/types';
import { getConfig } from '../config';
import { getDb } from '../database/connection';
import { UserRow } from '../database/rows';
import { toTimestamp } from '../database/values';
import { DuplicateKeyError, NotFoundError, UnauthorizedError, ValidationError, isUniqueViolation } from '../errors';
import { parseInput } from '../schemas/common';
import { ChangePasswordSchema, LoginSchema } from '../schemas/cabinet.schema';

const BCRYPT_ROUNDS = 12;

const JwtPayloadSchema = z.object({
  userId: z.number().int(),
  email: z.string(),
  role: z.string(),
});

export type JwtPayload = z.infer<typeof JwtPayloadSchema>;

export interface LoginResult {
  token: string;
  user: User;
}

function mapUser(row: UserRow): User {
  return { id: row.id, email: row.email, role: row.role, created_at: toTimestamp(row.created_at) };
}

export class AuthService {
  async login(input: unknown): Promise<LoginResult> {
    const { email, password } = parseInput(LoginSchema, input);
    const db = getDb();

    const user: UserRow | undefined = await db('users').where({ email }).first();
    if (!user) throw new UnauthorizedError('Invalid email or password');

    const isValid = await bcrypt.compare(password, user.password_hash);
    if (!isValid) throw new UnauthorizedError('Invalid email or password');

    const payload: JwtPayload = { userId: user.id, email: user.email, role: user.role };
    const config = getConfig();
    const token = jwt.sign(payload, config.JWT_SECRET, { expiresIn: config.JWT_EXPIRES_IN });

    return { token, user: mapUser(user) };
  }

  verifyToken(token: string): JwtPayload {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, getConfig().JWT_SECRET);
    } catch {
      throw new UnauthorizedError('Invalid or expired token');
    }

    const payload = JwtPayloadSchema.safeParse(decoded);
    if (!payload.success) throw new UnauthorizedError('Invalid or expired token');
    return payload.data;
  }

  async getUser(userId: number): Promise<User> {
    const row: UserRow | undefined = await getDb()('users').where({ id: userId }).first();
    if (!row) throw new NotFoundError('User', userId);
    return mapUser(row);
  }

  async changePassword(userId: number, input: unknown): Promise<void> {
    const { current_password, new_password } = parseInput(ChangePasswordSchema, input);
    const db = getDb();

    const user: UserRow | undefined = await db('users').where({ id: userId }).first();
    if (!user) throw new NotFoundError('User', userId);

    const isValid = await bcrypt.compare(current_password, user.password_hash);
    if (!isValid) throw new ValidationError('Current password is incorrect');

    const newHash = await bcrypt.hash(new_password, BCRYPT_ROUNDS);
    await db('users').where({ id: userId }).update({ password_hash: newHash });
  }

  /** Creates a user with a hashed password; emails are stored lower-cased. */
  async createUser(
    email: string,
    password: string,
    role: string = USER_ROLES.ACCOUNTANT,
    db: Knex = getDb(),
  ): Promise<User> {
    const normalized = email.trim().toLowerCase();
    const passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);

    try {
      const [row]: UserRow[] = await db('users')
        .insert({ email: normalized, password_hash: passwordHash, role })
        .returning('*');
      return mapUser(row);
    } catch (error) {
      if (isUniqueViolation(error)) throw new DuplicateKeyError('User', 'email', normalized);
      throw error;
    }
  }
}

export const authService = new AuthService();
