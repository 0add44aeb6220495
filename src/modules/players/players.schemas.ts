import { z } from 'zod';
import { formatField, seasonField } from '../seasons/seasons.schemas';

/** Comma-separated query value, e.g. `goals,assists`. */
const csvList = (max: number) =>
  z
    .string()
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    )
    .pipe(z.array(z.string().max(100)).min(1).max(max));

// ========== Player list ==========
export const playerListSchema = z.object({
  season: seasonField,
  format: formatField,
});

export type PlayerListInput = z.infer<typeof playerListSchema>;

// ========== Player search ==========
export const searchPlayersSchema = z.object({
  q: z.string().trim().min(1, 'q is required').max(100),
  season: seasonField,
  format: formatField,
});

export type SearchPlayersInput = z.infer<typeof searchPlayersSchema>;

// ========== Player resolution ==========
export const resolvePlayerSchema = z.object({
  name: z.string().trim().min(1, 'name is required').max(100),
  season: seasonField,
});

export type ResolvePlayerInput = z.infer<typeof resolvePlayerSchema>;

// ========== Player comparison ==========
export const comparePlayersSchema = z.object({
  players: csvList(10),
  metrics: csvList(20),
  season: seasonField,
  format: formatField,
});

export type ComparePlayersInput = z.infer<typeof comparePlayersSchema>;

// ========== Player detail ==========
export const playerIdParamsSchema = z.object({
  id: z.string().regex(/^\d+$/, 'id must be a numeric player id'),
});

export const playerDetailSchema = z.object({
  season: seasonField,
  format: formatField,
});
