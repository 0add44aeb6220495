import { ClientConfig } from '../../config/client.config';
import { logger } from '../../config/logger.config';
import { RecordSet, Season, SeasonId, recordSet } from '../../domain/records';
import { RequestExecutor } from '../../integrations/pulselive/pulselive-api-client';
import { seasonListSchema } from '../../integrations/pulselive/pulselive.schemas';
import { SeasonMapper, parseOrThrow } from '../../shared/mappers';
import { ResolutionErrors, UpstreamShapeException } from '../../utils/exceptions';

/** A raw season id as the API returns it, e.g. "719". */
const SEASON_ID_PATTERN = /^\d+$/;

export class SeasonService {
  constructor(
    private readonly executor: RequestExecutor,
    private readonly config: ClientConfig
  ) {}

  async listSeasons(): Promise<RecordSet<'season'>> {
    const path = `competitions/${this.config.competitionId}/compseasons`;
    const body = await this.executor.execute(path);
    const { content } = parseOrThrow(seasonListSchema, body, 'season list', { path });
    return recordSet('season', content.map(SeasonMapper.fromRaw));
  }

  /**
   * Resolve a season label such as "2024/25" to its upstream id. The label
   * must match exactly as the API spells it. Without a label the latest
   * season (highest id) is returned.
   */
  async resolveSeason(label?: string): Promise<SeasonId> {
    const { records } = await this.listSeasons();

    if (label) {
      const season = records.find((s) => s.label === label);
      if (!season) {
        logger.info('Season label did not resolve', { label });
        throw ResolutionErrors.seasonNotFound(label);
      }
      return season.id;
    }

    const latest = records.reduce<Season | null>(
      (best, s) => (best === null || Number(s.id) > Number(best.id) ? s : best),
      null
    );
    if (!latest) {
      throw new UpstreamShapeException('Upstream season list is empty', {
        competitionId: this.config.competitionId,
      });
    }
    return latest.id;
  }

  /**
   * Accept either a raw season id or a label. Used where callers may pass
   * whichever they have (the HTTP surface, the comparison helper).
   */
  async toSeasonId(seasonOrLabel?: string): Promise<SeasonId> {
    if (seasonOrLabel && SEASON_ID_PATTERN.test(seasonOrLabel)) {
      return seasonOrLabel;
    }
    return this.resolveSeason(seasonOrLabel);
  }
}
