import { AxiosAdapter } from 'axios';
import { ClientConfig, ClientConfigOverrides, createClientConfig } from './config/client.config';
import { logger } from './config/logger.config';
import { RecordSet, SchemaTag } from './domain/records';
import {
  PulseliveApiClient,
  RequestExecutor,
} from './integrations/pulselive/pulselive-api-client';
import { ClubService } from './modules/clubs/clubs.service';
import { PlayerService } from './modules/players/players.service';
import { RankingService } from './modules/rankings/rankings.service';
import { SeasonService } from './modules/seasons/seasons.service';
import { FormattedOutput, createFormatter } from './shared/formatters';

export interface StatsClientOptions {
  /** Replace the request executor entirely */
  executor?: RequestExecutor;
  /** Keep the default executor but swap its transport */
  adapter?: AxiosAdapter;
}

/**
 * Entry point for callers. Builds every service from one frozen config.
 *
 * @example
 * const client = new StatsClient({ timeoutSeconds: 60 });
 * const season = await client.seasons.resolveSeason('2024/25');
 * const scorers = await client.rankings.getRankings({ metric: 'goals', scope: 'player', season, limit: 10 });
 * console.log(client.format(scorers, 'table'));
 */
export class StatsClient {
  readonly config: ClientConfig;
  readonly seasons: SeasonService;
  readonly clubs: ClubService;
  readonly players: PlayerService;
  readonly rankings: RankingService;

  constructor(config: ClientConfigOverrides = {}, options: StatsClientOptions = {}) {
    this.config = createClientConfig(config);

    if (this.config.cacheEnabled) {
      logger.warn('Response caching is not implemented; cacheEnabled has no effect');
    }

    const executor =
      options.executor ?? new PulseliveApiClient(this.config, { adapter: options.adapter });

    this.seasons = new SeasonService(executor, this.config);
    this.clubs = new ClubService(executor, this.config);
    this.players = new PlayerService(executor, this.config, this.clubs);
    this.rankings = new RankingService(executor, this.config);
  }

  /**
   * Render a record set with the named formatter, or the configured default.
   */
  format<S extends SchemaTag>(set: RecordSet<S>, format: string = this.config.outputFormat): FormattedOutput {
    return createFormatter(format).render(set);
  }
}
