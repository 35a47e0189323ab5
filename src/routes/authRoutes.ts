import { Router, Request, Response } from 'express';
import { login, showLogin } from '../controllers/authController';

const router = Router();

// Login page (app_login)
router.get('/login', (req: Request, res: Response) => {
  showLogin(req, res);
});

// Issue a bearer token
router.post('/login', async (req: Request, res: Response) => {
  await login(req, res);
});

export default router;
