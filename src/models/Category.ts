import { z } from 'zod';
import { db } from '../config/database';

export interface Category {
  id: number;
  title: string;
  createdAt: Date;
  updatedAt: Date;
}

const categoryRowSchema = z.object({
  id: z.coerce.number().int(),
  title: z.string(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date()
});

export class CategoryService {
  /**
   * Get all categories, alphabetically
   */
  static async findAll(): Promise<Category[]> {
    try {
      const rows = await db.select(
        'SELECT id, title, created_at, updated_at FROM categories ORDER BY title ASC'
      );
      return rows.map(row => {
        const parsed = categoryRowSchema.parse(row);
        return {
          id: parsed.id,
          title: parsed.title,
          createdAt: parsed.created_at,
          updatedAt: parsed.updated_at
        };
      });
    } catch (error) {
      console.error('Error getting categories:', error);
      throw error;
    }
  }
}
