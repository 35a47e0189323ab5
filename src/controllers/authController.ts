import { Request, Response } from 'express';
import { AuthService } from '../services/AuthService';
import { render } from '../utils/responses';

/**
 * Login page; shows any pending notice such as "Access denied."
 */
export const showLogin = (req: Request, res: Response) => {
  render(req, res, 'security/login', { action: '/login' });
};

/**
 * Exchange email and password for a bearer token
 */
export const login = async (req: Request, res: Response) => {
  try {
    const body: unknown = req.body;
    const email = typeof body === 'object' && body !== null && 'email' in body ? body.email : undefined;
    const password = typeof body === 'object' && body !== null && 'password' in body ? body.password : undefined;

    if (typeof email !== 'string' || typeof password !== 'string' || !email || !password) {
      return res.status(400).json({ message: 'Email and password are required' });
    }

    const result = await AuthService.login(email, password);

    if (!result.success) {
      return res.status(401).json({ message: result.message });
    }

    console.log(`User ${result.user?.id} logged in`);
    res.json({
      message: 'Login successful',
      token: result.token,
      user: result.user
    });
  } catch (error) {
    console.error('Login error:', error);
    res.status(500).json({ message: 'An error occurred during login' });
  }
};
