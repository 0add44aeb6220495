#!/usr/bin/env ts-node
/**
 * Print the top scorers of a season, then look one player up by name.
 *
 * Usage: npm run demo -- [seasonLabel] [playerName]
 *   npm run demo -- 2024/25 "Erling Haaland"
 */

import { StatsClient, TabularRecordFormatter, toCsv } from '../src';
import { logger } from '../src/config/logger.config';
import { AppException } from '../src/utils/exceptions';

async function main(): Promise<void> {
  const [seasonLabel = '2024/25', playerName = 'Erling Haaland'] = process.argv.slice(2);
  const client = new StatsClient();
  const table = new TabularRecordFormatter();

  const season = await client.seasons.resolveSeason(seasonLabel);
  console.log(`Season ${seasonLabel} -> ${season}\n`);

  const scorers = await client.rankings.getRankings({ metric: 'goals', scope: 'player', season, limit: 10 });
  console.log(toCsv(table.render(scorers)));

  const matches = await client.players.searchPlayers(playerName.split(' ').pop() ?? playerName, season);
  console.log(`\n${matches.records.length} player(s) match '${playerName}'`);

  const player = await client.players.resolvePlayer(playerName, season);
  const detail = await client.players.getPlayerDetail(player.id, season);
  const { goals, goal_assist: assists, appearances } = detail.seasonStats;
  console.log(`${detail.identity.name} (${detail.biography.currentClub ?? 'no club'}): ${goals} goals, ${assists} assists in ${appearances} appearances`);
}

main().catch((error: unknown) => {
  if (error instanceof AppException) {
    logger.error('Demo failed', { code: error.errorCode, message: error.message, context: error.context });
  } else {
    logger.error('Demo failed', { error: String(error) });
  }
  process.exitCode = 1;
});
