import { z } from 'zod';
import { OUTPUT_FORMATS } from '../../config/client.config';

/** A season label ("2024/25") or raw id ("719"); omitted means the latest season. */
export const seasonField = z
  .string()
  .max(20)
  .regex(/^(\d+|\d{4}\/\d{2})$/, 'season must be a label like 2024/25 or a numeric id')
  .optional();

export const formatField = z.enum(OUTPUT_FORMATS).optional();

// ========== Season list ==========
export const seasonListSchema = z.object({
  format: formatField,
});

export type SeasonListInput = z.infer<typeof seasonListSchema>;

// ========== Season resolution ==========
export const resolveSeasonSchema = z.object({
  label: z.string().min(1).max(20).optional(),
});

export type ResolveSeasonInput = z.infer<typeof resolveSeasonSchema>;
