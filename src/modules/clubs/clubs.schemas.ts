import { z } from 'zod';
import { formatField, seasonField } from '../seasons/seasons.schemas';

const clubIdField = z.string().regex(/^\d+$/, 'id must be a numeric club id');

// ========== Club list / table ==========
export const clubListSchema = z.object({
  season: seasonField,
  format: formatField,
});

export type ClubListInput = z.infer<typeof clubListSchema>;

// ========== Club resolution ==========
export const resolveClubSchema = z.object({
  name: z.string().trim().min(1, 'name is required').max(100),
  season: seasonField,
});

export type ResolveClubInput = z.infer<typeof resolveClubSchema>;

// ========== Club detail ==========
export const clubIdParamsSchema = z.object({
  id: clubIdField,
});

export const clubDetailSchema = z.object({
  season: seasonField,
  stat: z.string().min(1).max(50).optional(),
  format: formatField,
});

export type ClubDetailInput = z.infer<typeof clubDetailSchema>;
