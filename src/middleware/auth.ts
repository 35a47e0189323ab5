import { Request, Response, NextFunction } from 'express';
import { RecipeService } from '../models/Recipe';
import { canAccessRecipe } from '../security/recipeAccess';
import { AuthService } from '../services/AuthService';
import { trans } from '../translations/messages';
import { flash } from '../utils/responses';

/**
 * Resolve the acting identity from a bearer token. Requests without a valid
 * token simply continue anonymously.
 */
export const attachUser = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const authHeader = req.headers.authorization;

    if (authHeader && authHeader.startsWith('Bearer ')) {
      const token = authHeader.slice('Bearer '.length).trim();
      const user = await AuthService.verifyToken(token);
      if (user) {
        req.user = user;
      }
    }

    next();
  } catch (error) {
    console.error('User resolution error:', error);
    next(error);
  }
};

const parseRecipeId = (req: Request): number => Number(req.params.id);

/**
 * Load the recipe named in the path; unknown ids answer 404
 */
export const resolveRecipe = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const recipe = await RecipeService.getRecipeById(parseRecipeId(req));

    if (!recipe) {
      res.status(404).json({ message: 'Recipe not found' });
      return;
    }

    req.recipe = recipe;
    next();
  } catch (error) {
    console.error('Recipe resolution error:', error);
    res.status(500).json({ message: 'Failed to get recipe' });
  }
};

/**
 * Load the recipe and let through only its author or an administrator.
 * A missing recipe and a forbidden one get the same answer.
 */
export const requireRecipeAccess = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const recipe = await RecipeService.getRecipeById(parseRecipeId(req));

    if (!recipe || !canAccessRecipe(req.user, recipe)) {
      console.warn(`Recipe access denied: ${req.method} ${req.originalUrl} by user ${req.user?.id ?? 'anonymous'}`);
      flash(req, 'warning', trans('record_not_found'));
      res.redirect('/recipe');
      return;
    }

    req.recipe = recipe;
    next();
  } catch (error) {
    console.error('Recipe access check error:', error);
    res.status(500).json({ message: 'Failed to get recipe' });
  }
};
