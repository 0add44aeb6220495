/**
 * Canonical record schemas.
 *
 * Every record of a schema carries the same keys whatever upstream shape it
 * came from. A value the upstream did not supply is `null`; keys are never
 * omitted and missing numbers are never filled with zero.
 */
import type { Scope } from '../constants/stat-types';

export type SeasonId = string;

export interface Season {
  id: SeasonId;
  label: string;
}

/** A resolved player or club. */
export interface EntityRef {
  id: string;
  name: string;
}

export interface RankingRecord {
  scope: Scope;
  rank: number | null;
  entityId: string | null;
  entityName: string | null;
  /** Player's current club; always null for club rankings */
  club: string | null;
  /** Player's national team; always null for club rankings */
  nationality: string | null;
  metric: string;
  value: number | null;
}

export type SeasonStats = Record<string, number | null>;

export interface PlayerIdentity {
  id: string;
  name: string;
  firstName: string | null;
  lastName: string | null;
}

export interface PlayerBiography {
  position: string | null;
  shirtNumber: number | null;
  age: string | null;
  birthDate: string | null;
  birthCountry: string | null;
  nationality: string | null;
  currentClub: string | null;
  currentClubId: string | null;
  height: number | null;
  weight: number | null;
}

export interface PlayerDetailRecord {
  scope: 'player';
  identity: PlayerIdentity;
  biography: PlayerBiography;
  seasonStats: SeasonStats;
}

export interface ClubIdentity {
  id: string;
  name: string;
  shortName: string | null;
  abbreviation: string | null;
}

export interface ClubBiography {
  venue: string | null;
  city: string | null;
  capacity: number | null;
}

export interface ClubDetailRecord {
  scope: 'club';
  identity: ClubIdentity;
  biography: ClubBiography;
  seasonStats: SeasonStats;
}

export type DetailRecord = PlayerDetailRecord | ClubDetailRecord;

export interface ClubListRecord {
  id: string;
  name: string;
  shortName: string | null;
  abbreviation: string | null;
}

export interface PlayerListRecord {
  id: string;
  name: string;
  position: string | null;
  club: string | null;
  clubId: string | null;
  nationality: string | null;
}

export interface TableRecord {
  position: number;
  clubId: string | null;
  club: string;
  played: number | null;
  won: number | null;
  drawn: number | null;
  lost: number | null;
  goalsFor: number | null;
  goalsAgainst: number | null;
  goalDifference: number | null;
  points: number | null;
}

export interface ComparisonRecord {
  playerId: string;
  playerName: string;
  club: string | null;
  stats: SeasonStats;
}

/** Schema tag handed to formatters along with the records. */
export interface RecordSchemas {
  season: Season;
  ranking: RankingRecord;
  'player-detail': PlayerDetailRecord;
  'club-detail': ClubDetailRecord;
  'club-list': ClubListRecord;
  'player-list': PlayerListRecord;
  table: TableRecord;
  comparison: ComparisonRecord;
}

export type SchemaTag = keyof RecordSchemas;

export interface RecordSet<S extends SchemaTag = SchemaTag> {
  schema: S;
  records: RecordSchemas[S][];
}

export function recordSet<S extends SchemaTag>(schema: S, records: RecordSchemas[S][]): RecordSet<S> {
  return { schema, records };
}

/** Upstream ids arrive as floats (`65970.0`); callers see integer strings. */
export function toIdString(id: number): string {
  return String(Math.trunc(id));
}
