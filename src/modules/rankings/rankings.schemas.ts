import { z } from 'zod';
import { SCOPES } from '../../constants/stat-types';
import { formatField, seasonField } from '../seasons/seasons.schemas';

// ========== Ranking route params ==========
export const rankingParamsSchema = z.object({
  scope: z.enum(SCOPES),
  metric: z.string().min(1).max(50),
});

export type RankingParamsInput = z.infer<typeof rankingParamsSchema>;

// ========== Ranking query ==========
export const rankingQuerySchema = z.object({
  season: seasonField,
  pageSize: z.coerce.number().int().min(1).max(100).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
  format: formatField,
});

export type RankingQueryInput = z.infer<typeof rankingQuerySchema>;

// ========== Stat type catalog ==========
export const statTypesParamsSchema = z.object({
  scope: z.enum(SCOPES),
});

export const statTypesQuerySchema = z.object({
  shape: z.enum(['list', 'dict']).default('dict'),
});
