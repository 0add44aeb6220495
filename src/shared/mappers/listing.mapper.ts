/**
 * Listing Mappers
 *
 * Club lists, player lists and league table rows.
 */

import type { ClubListRecord, PlayerListRecord, Season, TableRecord } from '../../domain/records';
import { toIdString } from '../../domain/records';
import {
  RawPlayer,
  RawSeason,
  RawTeam,
  playerSchema,
  tableEntrySchema,
  teamSchema,
} from '../../integrations/pulselive/pulselive.schemas';
import { orNull, parseOrThrow } from './utils';

/** Upstream marks first teams with teamType FIRST; youth and women's sides are dropped. */
export const FIRST_TEAM = 'FIRST';

export class SeasonMapper {
  static fromRaw(raw: RawSeason): Season {
    return { id: toIdString(raw.id), label: raw.label };
  }
}

export class ClubListMapper {
  static fromRaw(team: RawTeam): ClubListRecord {
    return {
      id: toIdString(team.id),
      name: team.name ?? team.shortName ?? team.club?.name ?? toIdString(team.id),
      shortName: orNull(team.shortName),
      abbreviation: team.club?.abbr ?? null,
    };
  }

  static firstTeamsOnly(teams: RawTeam[]): ClubListRecord[] {
    return teams.filter((team) => team.teamType === FIRST_TEAM).map(ClubListMapper.fromRaw);
  }
}

export class PlayerListMapper {
  static parse(raw: unknown): RawPlayer {
    return parseOrThrow(playerSchema, raw, 'player list item');
  }

  static fromRaw(player: RawPlayer): PlayerListRecord {
    return {
      id: toIdString(player.id),
      name: player.name.display,
      position: player.info?.position ?? null,
      club: player.currentTeam?.name ?? null,
      clubId: player.currentTeam?.id != null ? toIdString(player.currentTeam.id) : null,
      nationality: player.nationalTeam?.country ?? null,
    };
  }
}

export class TableMapper {
  static fromRaw(raw: unknown): TableRecord {
    const entry = parseOrThrow(tableEntrySchema, raw, 'table entry');
    const overall = entry.overall;

    return {
      position: entry.position,
      clubId: entry.team.id != null ? toIdString(entry.team.id) : null,
      club: entry.team.name,
      played: overall?.played ?? null,
      won: overall?.won ?? null,
      drawn: overall?.drawn ?? null,
      lost: overall?.lost ?? null,
      goalsFor: overall?.goalsFor ?? null,
      goalsAgainst: overall?.goalsAgainst ?? null,
      goalDifference: overall?.goalsDifference ?? null,
      points: overall?.points ?? null,
    };
  }
}

export const normalizeTableEntry = TableMapper.fromRaw;

export function normalizeClubListItem(raw: unknown): ClubListRecord {
  return ClubListMapper.fromRaw(parseOrThrow(teamSchema, raw, 'club list item'));
}

export function normalizePlayerListItem(raw: unknown): PlayerListRecord {
  return PlayerListMapper.fromRaw(PlayerListMapper.parse(raw));
}
