/**
 * Detail Mapper
 *
 * Flattens `stats/player/{id}` and `stats/team/{id}` blobs into DetailRecord.
 * `entity` is required; a missing stats list or biography section becomes
 * null fields, never missing keys.
 */

import type { Scope } from '../../constants/stat-types';
import { canonicalMetric, getDetailMetrics } from '../../constants/stat-types';
import type {
  ClubDetailRecord,
  DetailRecord,
  PlayerDetailRecord,
  SeasonStats,
} from '../../domain/records';
import { toIdString } from '../../domain/records';
import {
  clubEntitySchema,
  detailBlobSchema,
  playerEntitySchema,
  statEntrySchema,
} from '../../integrations/pulselive/pulselive.schemas';
import { numberOrNull, orNull, parseOrThrow } from './utils';

/**
 * Build the fixed `seasonStats` block for a scope. Every catalog metric is
 * present; alias keys are folded onto their canonical names and stats outside
 * the catalog are dropped.
 */
export function statsFromList(stats: unknown[] | null | undefined, scope: Scope): SeasonStats {
  const metrics = getDetailMetrics(scope);
  const result: SeasonStats = Object.fromEntries(metrics.map((metric) => [metric, null]));

  for (const raw of stats ?? []) {
    const entry = statEntrySchema.safeParse(raw);
    if (!entry.success) continue;

    const key = canonicalMetric(entry.data.name, scope);
    if (key in result) {
      result[key] = numberOrNull(entry.data.value);
    }
  }

  return result;
}

export class DetailMapper {
  static playerFromBlob(raw: unknown): PlayerDetailRecord {
    const blob = parseOrThrow(detailBlobSchema, raw, 'player detail', { scope: 'player' });
    const entity = parseOrThrow(playerEntitySchema, blob.entity, 'player entity', { scope: 'player' });

    return {
      scope: 'player',
      identity: {
        id: toIdString(entity.id),
        name: entity.name.display,
        firstName: orNull(entity.name.first),
        lastName: orNull(entity.name.last),
      },
      biography: {
        position: entity.info?.position ?? null,
        shirtNumber: entity.info?.shirtNum ?? null,
        age: orNull(entity.age),
        birthDate: entity.birth?.date?.label ?? null,
        birthCountry: entity.birth?.country?.country ?? null,
        nationality: entity.nationalTeam?.country ?? null,
        currentClub: entity.currentTeam?.name ?? null,
        currentClubId: entity.currentTeam?.id != null ? toIdString(entity.currentTeam.id) : null,
        height: orNull(entity.height),
        weight: orNull(entity.weight),
      },
      seasonStats: statsFromList(blob.stats, 'player'),
    };
  }

  static clubFromBlob(raw: unknown): ClubDetailRecord {
    const blob = parseOrThrow(detailBlobSchema, raw, 'club detail', { scope: 'club' });
    const entity = parseOrThrow(clubEntitySchema, blob.entity, 'club entity', { scope: 'club' });
    const ground = entity.grounds?.[0];

    return {
      scope: 'club',
      identity: {
        id: toIdString(entity.id),
        name: entity.name,
        shortName: orNull(entity.shortName),
        abbreviation: entity.club?.abbr ?? null,
      },
      biography: {
        venue: ground?.name ?? null,
        city: ground?.city ?? null,
        capacity: ground?.capacity ?? null,
      },
      seasonStats: statsFromList(blob.stats, 'club'),
    };
  }
}

export function normalizeDetail(raw: unknown, scope: 'player'): PlayerDetailRecord;
export function normalizeDetail(raw: unknown, scope: 'club'): ClubDetailRecord;
export function normalizeDetail(raw: unknown, scope: Scope): DetailRecord;
export function normalizeDetail(raw: unknown, scope: Scope): DetailRecord {
  return scope === 'player' ? DetailMapper.playerFromBlob(raw) : DetailMapper.clubFromBlob(raw);
}
