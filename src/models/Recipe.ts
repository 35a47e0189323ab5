import { z } from 'zod';
import { db, Queryable, SqlValue } from '../config/database';
import { config } from '../config/env';
import { buildPage, pageOffset, Paginated } from '../utils/pagination';
import { AuthenticatedUser } from './User';

export interface Recipe {
  id?: number;
  title: string;
  content: string;
  categoryId: number;
  authorId: number;
  tagIds: number[];
}

export interface StoredRecipe extends Recipe {
  id: number;
  categoryTitle: string | null;
  averageScore: number | null;
  ratingsCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface RecipeFilters {
  authorId?: number | null;
  categoryId?: number | null;
  tagId?: number | null;
}

const recipeRowSchema = z.object({
  id: z.coerce.number().int(),
  title: z.string(),
  content: z.string(),
  category_id: z.coerce.number().int(),
  category_title: z.string().nullable(),
  author_id: z.coerce.number().int(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
  // AVG() comes back as a DECIMAL string
  average_score: z.coerce.number().nullable(),
  ratings_count: z.coerce.number().int()
});

const recipeTagRowSchema = z.object({
  recipe_id: z.coerce.number().int(),
  tag_id: z.coerce.number().int()
});

const countRowSchema = z.object({
  total: z.coerce.number().int()
});

const RATING_STATS = `SELECT recipe_id, AVG(score) AS average_score, COUNT(*) AS ratings_count
   FROM ratings GROUP BY recipe_id`;

const SELECT_RECIPES = `SELECT r.id, r.title, r.content, r.category_id, c.title AS category_title,
         r.author_id, r.created_at, r.updated_at,
         s.average_score, COALESCE(s.ratings_count, 0) AS ratings_count
  FROM recipes r
  LEFT JOIN categories c ON c.id = r.category_id
  LEFT JOIN (${RATING_STATS}) s ON s.recipe_id = r.id`;

const toRecipe = (row: unknown): StoredRecipe => {
  const parsed = recipeRowSchema.parse(row);
  return {
    id: parsed.id,
    title: parsed.title,
    content: parsed.content,
    categoryId: parsed.category_id,
    categoryTitle: parsed.category_title,
    authorId: parsed.author_id,
    tagIds: [],
    averageScore: parsed.average_score,
    ratingsCount: parsed.ratings_count,
    createdAt: parsed.created_at,
    updatedAt: parsed.updated_at
  };
};

export class RecipeService {
  /**
   * Build the WHERE clause shared by the listing and its count query
   */
  static buildFilters(filters: RecipeFilters): { where: string; params: SqlValue[] } {
    const conditions: string[] = [];
    const params: SqlValue[] = [];

    if (filters.authorId != null) {
      conditions.push('r.author_id = ?');
      params.push(filters.authorId);
    }
    if (filters.categoryId != null) {
      conditions.push('r.category_id = ?');
      params.push(filters.categoryId);
    }
    if (filters.tagId != null) {
      conditions.push('EXISTS (SELECT 1 FROM recipes_tags rt WHERE rt.recipe_id = r.id AND rt.tag_id = ?)');
      params.push(filters.tagId);
    }

    return {
      where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
      params
    };
  }

  /**
   * Get one page of recipes authored by the given user
   */
  static async getPaginatedList(
    page: number,
    user: AuthenticatedUser,
    categoryId: number | null = null,
    tagId: number | null = null
  ): Promise<Paginated<StoredRecipe>> {
    return this.findPage(page, { authorId: user.id, categoryId, tagId });
  }

  /**
   * Get one page of recipes regardless of author
   */
  static async getAllPaginatedList(
    page: number,
    categoryId: number | null = null,
    tagId: number | null = null
  ): Promise<Paginated<StoredRecipe>> {
    return this.findPage(page, { categoryId, tagId });
  }

  static async findPage(page: number, filters: RecipeFilters): Promise<Paginated<StoredRecipe>> {
    try {
      const limit = config.itemsPerPage;
      const { where, params } = this.buildFilters(filters);

      const countRows = await db.select(`SELECT COUNT(*) AS total FROM recipes r ${where}`, params);
      const { total } = countRowSchema.parse(countRows[0]);

      const rows = await db.select(
        `${SELECT_RECIPES} ${where} ORDER BY r.updated_at DESC, r.id DESC LIMIT ? OFFSET ?`,
        [...params, limit, pageOffset(page, limit)]
      );

      const recipes = await this.attachTags(rows.map(toRecipe));
      return buildPage(recipes, page, limit, total);
    } catch (error) {
      console.error('Error getting paginated recipes:', error);
      throw error;
    }
  }

  /**
   * Get recipe by ID
   */
  static async getRecipeById(id: number): Promise<StoredRecipe | null> {
    try {
      const rows = await db.select(`${SELECT_RECIPES} WHERE r.id = ?`, [id]);
      if (rows.length === 0) {
        return null;
      }

      const [recipe] = await this.attachTags([toRecipe(rows[0])]);
      return recipe;
    } catch (error) {
      console.error('Error getting recipe by ID:', error);
      throw error;
    }
  }

  /**
   * Recipes with at least one rating, best average first
   */
  static async findTopRatedRecipes(): Promise<StoredRecipe[]> {
    try {
      const rows = await db.select(
        `${SELECT_RECIPES}
         WHERE s.recipe_id IS NOT NULL
         ORDER BY s.average_score DESC, s.ratings_count DESC, r.id ASC
         LIMIT ?`,
        [config.topRatedLimit]
      );
      return await this.attachTags(rows.map(toRecipe));
    } catch (error) {
      console.error('Error getting top rated recipes:', error);
      throw error;
    }
  }

  /**
   * Insert or update a recipe and replace its tag links
   */
  static async save(recipe: Recipe): Promise<number> {
    try {
      return await db.transaction(async tx => {
        let recipeId: number;

        if (recipe.id) {
          recipeId = recipe.id;
          await tx.run(
            `UPDATE recipes
             SET title = ?, content = ?, category_id = ?, updated_at = NOW()
             WHERE id = ?`,
            [recipe.title, recipe.content, recipe.categoryId, recipeId]
          );
          await tx.run('DELETE FROM recipes_tags WHERE recipe_id = ?', [recipeId]);
        } else {
          const result = await tx.run(
            `INSERT INTO recipes (title, content, category_id, author_id, created_at, updated_at)
             VALUES (?, ?, ?, ?, NOW(), NOW())`,
            [recipe.title, recipe.content, recipe.categoryId, recipe.authorId]
          );
          recipeId = result.insertId;
        }

        await this.insertTagLinks(tx, recipeId, recipe.tagIds);
        return recipeId;
      });
    } catch (error) {
      console.error('Error saving recipe:', error);
      throw error;
    }
  }

  /**
   * Delete a recipe; tag links and ratings go with it (ON DELETE CASCADE)
   */
  static async delete(recipe: Pick<Recipe, 'id'>): Promise<void> {
    if (!recipe.id) {
      return;
    }

    try {
      await db.run('DELETE FROM recipes WHERE id = ?', [recipe.id]);
    } catch (error) {
      console.error('Error deleting recipe:', error);
      throw error;
    }
  }

  private static async insertTagLinks(tx: Queryable, recipeId: number, tagIds: number[]): Promise<void> {
    const unique = [...new Set(tagIds)];
    if (unique.length === 0) {
      return;
    }

    await tx.run(
      'INSERT INTO recipes_tags (recipe_id, tag_id) VALUES ?',
      [unique.map(tagId => [recipeId, tagId])]
    );
  }

  private static async attachTags(recipes: StoredRecipe[]): Promise<StoredRecipe[]> {
    if (recipes.length === 0) {
      return recipes;
    }

    const rows = await db.select(
      'SELECT recipe_id, tag_id FROM recipes_tags WHERE recipe_id IN (?) ORDER BY tag_id ASC',
      [recipes.map(recipe => recipe.id)]
    );

    const tagsByRecipe = new Map<number, number[]>();
    for (const row of rows) {
      const { recipe_id, tag_id } = recipeTagRowSchema.parse(row);
      const list = tagsByRecipe.get(recipe_id) ?? [];
      list.push(tag_id);
      tagsByRecipe.set(recipe_id, list);
    }

    return recipes.map(recipe => ({ ...recipe, tagIds: tagsByRecipe.get(recipe.id) ?? [] }));
  }
}
