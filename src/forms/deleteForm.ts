import { z } from 'zod';

// Confirmation only: any DELETE submission is valid
export const deleteFormSchema = z.object({});
