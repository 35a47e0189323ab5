import { Recipe } from '../models/Recipe';
import { AuthenticatedUser } from '../models/User';
import { AuthService } from '../services/AuthService';

/**
 * A recipe is visible and mutable only to its author or an administrator.
 * Show, edit and delete all go through this one check.
 */
export const canAccessRecipe = (user: AuthenticatedUser | undefined, recipe: Pick<Recipe, 'authorId'>): boolean => {
  if (!user) {
    return false;
  }
  return AuthService.isAdmin(user) || recipe.authorId === user.id;
};
