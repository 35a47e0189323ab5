import { z } from 'zod';
import { CategoryService } from '../models/Category';
import { Recipe } from '../models/Recipe';
import { TagService } from '../models/Tag';
import { addFormError, bindForm, BoundForm, FormOptions, FormRequest } from './form';

// A single checkbox arrives as a scalar, none at all as undefined
const toList = (value: unknown): unknown[] => {
  if (value === undefined || value === null || value === '') {
    return [];
  }
  return Array.isArray(value) ? value : [value];
};

export const recipeFormSchema = z.object({
  title: z.string().trim().min(3).max(255),
  content: z.string().trim().min(1).max(10_000),
  categoryId: z.coerce.number().int().positive(),
  tagIds: z.preprocess(toList, z.array(z.coerce.number().int().positive()).max(50))
});

export type RecipeFormData = z.infer<typeof recipeFormSchema>;

const initialValues = (recipe: Recipe | null): Record<string, unknown> =>
  recipe
    ? { title: recipe.title, content: recipe.content, categoryId: recipe.categoryId, tagIds: recipe.tagIds }
    : { title: '', content: '', categoryId: null, tagIds: [] };

/**
 * Bind and validate a recipe form, including that the chosen category and
 * tags actually exist.
 */
export const handleRecipeForm = async (
  req: FormRequest,
  options: FormOptions,
  recipe: Recipe | null = null
): Promise<BoundForm<RecipeFormData>> => {
  let form = bindForm(req, recipeFormSchema, options, initialValues(recipe));

  if (!form.valid || !form.data) {
    return form;
  }

  const { categoryId, tagIds } = form.data;
  const [categories, tags] = await Promise.all([CategoryService.findAll(), TagService.findAll()]);

  if (!categories.some(category => category.id === categoryId)) {
    form = addFormError(form, 'categoryId', 'Unknown category');
  }

  const knownTags = new Set(tags.map(tag => tag.id));
  if (tagIds.some(tagId => !knownTags.has(tagId))) {
    form = addFormError(form, 'tagIds', 'Unknown tag');
  }

  return form;
};
