import { z } from 'zod';
import { db } from '../config/database';

export interface Tag {
  id?: number;
  title: string;
  createdAt: Date;
  updatedAt: Date;
}

const tagRowSchema = z.object({
  id: z.coerce.number().int(),
  title: z.string(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date()
});

export class TagService {
  /**
   * Get all tags, alphabetically
   */
  static async findAll(): Promise<Tag[]> {
    try {
      const rows = await db.select(
        'SELECT id, title, created_at, updated_at FROM tags ORDER BY title ASC, id ASC'
      );
      return rows.map(row => {
        const parsed = tagRowSchema.parse(row);
        return {
          id: parsed.id,
          title: parsed.title,
          createdAt: parsed.created_at,
          updatedAt: parsed.updated_at
        };
      });
    } catch (error) {
      console.error('Error getting tags:', error);
      throw error;
    }
  }

  /**
   * Insert many tags with a single statement, committed as one unit
   */
  static async saveAll(tags: Tag[]): Promise<number> {
    if (tags.length === 0) {
      return 0;
    }

    try {
      return await db.transaction(async tx => {
        const result = await tx.run(
          'INSERT INTO tags (title, created_at, updated_at) VALUES ?',
          [tags.map(tag => [tag.title, tag.createdAt, tag.updatedAt])]
        );
        return result.affectedRows;
      });
    } catch (error) {
      console.error('Error saving tags:', error);
      throw error;
    }
  }
}
