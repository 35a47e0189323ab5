import 'express';
import { AuthenticatedUser } from '../models/User';
import { StoredRecipe } from '../models/Recipe';

declare global {
  namespace Express {
    // This extends the existing Request interface
    interface Request {
      user?: AuthenticatedUser;
      recipe?: StoredRecipe;
      sessionId?: string;
    }
  }
}
