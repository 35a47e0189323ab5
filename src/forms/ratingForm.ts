import { z } from 'zod';
import { MAX_SCORE, MIN_SCORE } from '../models/Rating';

export const ratingFormSchema = z.object({
  score: z.coerce.number().int().min(MIN_SCORE).max(MAX_SCORE)
});

export type RatingFormData = z.infer<typeof ratingFormSchema>;
