import bcrypt from 'bcrypt';
import jwt, { JsonWebTokenError, JwtPayload, SignOptions } from 'jsonwebtoken';
import { config } from '../config/env';
import { AuthenticatedUser, ROLE_ADMIN, UserService } from '../models/User';

interface LoginResult {
  success: boolean;
  message?: string;
  token?: string;
  user?: AuthenticatedUser;
}

const readUserId = (decoded: string | JwtPayload): number | null => {
  if (typeof decoded === 'string') {
    return null;
  }
  const id = Number(decoded.sub);
  return Number.isInteger(id) && id > 0 ? id : null;
};

export class AuthService {
  /**
   * Check credentials and issue a signed token
   */
  static async login(email: string, password: string): Promise<LoginResult> {
    try {
      const credentials = await UserService.getCredentialsByEmail(email);

      if (!credentials) {
        return { success: false, message: 'Invalid email or password' };
      }

      const passwordMatch = await bcrypt.compare(password, credentials.passwordHash);
      if (!passwordMatch) {
        return { success: false, message: 'Invalid email or password' };
      }

      return {
        success: true,
        token: this.issueToken(credentials.user),
        user: credentials.user
      };
    } catch (error) {
      console.error('Login error:', error);
      return { success: false, message: 'Authentication failed' };
    }
  }

  static issueToken(user: AuthenticatedUser): string {
    const options: SignOptions = {
      subject: String(user.id),
      expiresIn: config.jwt.expiresIn
    };
    return jwt.sign({ email: user.email, role: user.role }, config.jwt.secret, options);
  }

  /**
   * Verify JWT token and return the user it belongs to. A bad or expired token
   * yields null; a failing user lookup is rethrown.
   */
  static async verifyToken(token: string): Promise<AuthenticatedUser | null> {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, config.jwt.secret);
    } catch (error) {
      // TokenExpiredError and NotBeforeError extend JsonWebTokenError
      if (error instanceof JsonWebTokenError) {
        console.error('Token verification error:', error.message);
        return null;
      }
      throw error;
    }

    const userId = readUserId(decoded);
    if (userId === null) {
      return null;
    }

    // Check the user still exists; role is always read fresh from the database
    return UserService.getUserById(userId);
  }

  static isAdmin(user: AuthenticatedUser | undefined): boolean {
    return user?.role === ROLE_ADMIN;
  }
}
