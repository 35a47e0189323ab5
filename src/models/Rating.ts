import { db } from '../config/database';

export interface Rating {
  id?: number;
  recipeId: number;
  userId: number;
  score: number;
}

export const MIN_SCORE = 1;
export const MAX_SCORE = 5;

export class RatingService {
  /**
   * Store a new rating. A user may rate the same recipe more than once.
   */
  static async save(rating: Rating): Promise<number> {
    try {
      const result = await db.run(
        `INSERT INTO ratings (recipe_id, user_id, score, created_at)
         VALUES (?, ?, ?, NOW())`,
        [rating.recipeId, rating.userId, rating.score]
      );
      return result.insertId;
    } catch (error) {
      console.error('Error saving rating:', error);
      throw error;
    }
  }
}
