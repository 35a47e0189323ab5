import { Request, Response } from 'express';
import { bindForm } from '../forms/form';
import { deleteFormSchema } from '../forms/deleteForm';
import { ratingFormSchema } from '../forms/ratingForm';
import { handleRecipeForm } from '../forms/recipeForm';
import { CategoryService } from '../models/Category';
import { Rating, RatingService } from '../models/Rating';
import { Recipe, RecipeService } from '../models/Recipe';
import { TagService } from '../models/Tag';
import { AuthService } from '../services/AuthService';
import { trans } from '../translations/messages';
import { parsePositiveInt } from '../utils/params';
import { flash, render } from '../utils/responses';

/**
 * List recipes. Anonymous visitors and administrators see every recipe,
 * everybody else only their own.
 */
export const listRecipes = async (req: Request, res: Response) => {
  try {
    const categoryId = parsePositiveInt(req.query.categoryId);
    const tagId = parsePositiveInt(req.query.tagId);
    const page = parsePositiveInt(req.query.page) ?? 1;

    const [categories, tags] = await Promise.all([CategoryService.findAll(), TagService.findAll()]);

    const pagination = !req.user || AuthService.isAdmin(req.user)
      ? await RecipeService.getAllPaginatedList(page, categoryId, tagId)
      : await RecipeService.getPaginatedList(page, req.user, categoryId, tagId);

    render(req, res, 'recipe/index', { pagination, categories, tags });
  } catch (error) {
    console.error('Error listing recipes:', error);
    res.status(500).json({ message: 'Failed to get recipes' });
  }
};

/**
 * Show one recipe (access already checked by requireRecipeAccess)
 */
export const showRecipe = (req: Request, res: Response) => {
  render(req, res, 'recipe/show', { recipe: req.recipe });
};

/**
 * Create a recipe owned by the current user
 */
export const createRecipe = async (req: Request, res: Response) => {
  try {
    if (!req.user) {
      flash(req, 'error', trans('access_denied'));
      return res.redirect('/login');
    }

    const form = await handleRecipeForm(req, { method: 'POST', action: '/recipe/create' });

    if (form.submitted && form.valid && form.data) {
      const recipe: Recipe = { ...form.data, authorId: req.user.id };
      const recipeId = await RecipeService.save(recipe);
      console.log(`Recipe ${recipeId} created by user ${req.user.id}`);

      flash(req, 'success', trans('created_successfully'));
      return res.redirect('/recipe');
    }

    render(req, res, 'recipe/create', { form: form.view }, form.submitted ? 422 : 200);
  } catch (error) {
    console.error('Error creating recipe:', error);
    res.status(500).json({ message: 'Failed to create recipe' });
  }
};

/**
 * Edit a recipe; the author stays whoever created it
 */
export const editRecipe = async (req: Request, res: Response) => {
  try {
    const recipe = req.recipe;
    if (!recipe) {
      return res.status(404).json({ message: 'Recipe not found' });
    }

    const form = await handleRecipeForm(req, { method: 'PUT', action: `/recipe/${recipe.id}/edit` }, recipe);

    if (form.submitted && form.valid && form.data) {
      await RecipeService.save({ ...form.data, id: recipe.id, authorId: recipe.authorId });

      flash(req, 'success', trans('edited_successfully'));
      return res.redirect('/recipe');
    }

    render(req, res, 'recipe/edit', { form: form.view, recipe }, form.submitted ? 422 : 200);
  } catch (error) {
    console.error('Error editing recipe:', error);
    res.status(500).json({ message: 'Failed to edit recipe' });
  }
};

/**
 * Delete a recipe after confirmation
 */
export const deleteRecipe = async (req: Request, res: Response) => {
  try {
    const recipe = req.recipe;
    if (!recipe) {
      return res.status(404).json({ message: 'Recipe not found' });
    }

    const form = bindForm(req, deleteFormSchema, { method: 'DELETE', action: `/recipe/${recipe.id}/delete` });

    if (form.submitted && form.valid) {
      await RecipeService.delete(recipe);

      flash(req, 'success', trans('deleted_successfully'));
      return res.redirect('/recipe');
    }

    render(req, res, 'recipe/delete', { form: form.view, recipe });
  } catch (error) {
    console.error('Error deleting recipe:', error);
    res.status(500).json({ message: 'Failed to delete recipe' });
  }
};

/**
 * Rate a recipe. Anonymous users are refused outright.
 */
export const rateRecipe = async (req: Request, res: Response) => {
  try {
    const recipe = req.recipe;
    if (!recipe) {
      return res.status(404).json({ message: 'Recipe not found' });
    }

    if (!req.user) {
      console.warn(`Anonymous rating attempt on recipe ${recipe.id}`);
      return res.status(403).json({ message: trans('access_denied') });
    }

    const form = bindForm(req, ratingFormSchema, { method: 'POST', action: `/recipe/${recipe.id}/rate` }, { score: null });

    if (form.submitted && form.valid && form.data) {
      const rating: Rating = { recipeId: recipe.id, userId: req.user.id, score: form.data.score };
      await RatingService.save(rating);

      flash(req, 'success', trans('rated_successfully'));
      return res.redirect('/recipe');
    }

    render(req, res, 'recipe/rate', { form: form.view, recipe }, form.submitted ? 422 : 200);
  } catch (error) {
    console.error('Error rating recipe:', error);
    res.status(500).json({ message: 'Failed to rate recipe' });
  }
};

/**
 * Best rated recipes
 */
export const getTopRatedRecipes = async (req: Request, res: Response) => {
  try {
    const recipes = await RecipeService.findTopRatedRecipes();
    render(req, res, 'recipe/top_rated', { recipes });
  } catch (error) {
    console.error('Error getting top rated recipes:', error);
    res.status(500).json({ message: 'Failed to get top rated recipes' });
  }
};
