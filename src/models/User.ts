import { z } from 'zod';
import { db } from '../config/database';

export const ROLE_USER = 'ROLE_USER';
export const ROLE_ADMIN = 'ROLE_ADMIN';

export type UserRole = typeof ROLE_USER | typeof ROLE_ADMIN;

export interface AuthenticatedUser {
  id: number;
  email: string;
  role: UserRole;
}

export interface UserCredentials {
  user: AuthenticatedUser;
  passwordHash: string;
}

const userRowSchema = z.object({
  id: z.coerce.number().int(),
  email: z.string(),
  role: z.enum([ROLE_USER, ROLE_ADMIN]),
  password_hash: z.string()
});

type UserRow = z.infer<typeof userRowSchema>;

const toUser = (row: UserRow): AuthenticatedUser => ({
  id: row.id,
  email: row.email,
  role: row.role
});

export class UserService {
  /**
   * Get user by ID
   */
  static async getUserById(id: number): Promise<AuthenticatedUser | null> {
    try {
      const rows = await db.select(
        'SELECT id, email, role, password_hash FROM users WHERE id = ?',
        [id]
      );
      return rows.length > 0 ? toUser(userRowSchema.parse(rows[0])) : null;
    } catch (error) {
      console.error('Error getting user by ID:', error);
      throw error;
    }
  }

  /**
   * Get user together with the stored password hash, for login
   */
  static async getCredentialsByEmail(email: string): Promise<UserCredentials | null> {
    try {
      const rows = await db.select(
        'SELECT id, email, role, password_hash FROM users WHERE email = ?',
        [email]
      );
      if (rows.length === 0) {
        return null;
      }

      const row = userRowSchema.parse(rows[0]);
      return { user: toUser(row), passwordHash: row.password_hash };
    } catch (error) {
      console.error('Error getting user by email:', error);
      throw error;
    }
  }
}
