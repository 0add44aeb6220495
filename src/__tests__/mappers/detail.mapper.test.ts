import { getDetailMetrics } from '../../constants/stat-types';
import { normalizeDetail, statsFromList } from '../../shared/mappers';
import { UpstreamShapeException } from '../../utils/exceptions';
import { CITY_DETAIL, HAALAND_DETAIL } from '../helpers/fixtures';

describe('normalizeDetail (player)', () => {
  it('should flatten identity and biography', () => {
    const detail = normalizeDetail(HAALAND_DETAIL, 'player');

    expect(detail.scope).toBe('player');
    expect(detail.identity).toEqual({
      id: '65970',
      name: 'Erling Haaland',
      firstName: 'Erling',
      lastName: 'Haaland',
    });
    expect(detail.biography).toEqual({
      position: 'F',
      shirtNumber: 9,
      age: '24 years 100 days',
      birthDate: '21 July 2000',
      birthCountry: 'Norway',
      nationality: 'Norway',
      currentClub: 'Manchester City',
      currentClubId: '11',
      height: 195,
      weight: 88,
    });
  });

  it('should fold alias stat names onto canonical keys', () => {
    const { seasonStats } = normalizeDetail(HAALAND_DETAIL, 'player');

    expect(seasonStats.goals).toBe(22);
    expect(seasonStats.minsPlayed).toBe(2600);
    expect(seasonStats.goal_fastbreak).toBe(2);
    expect(seasonStats).not.toHaveProperty('oal_fastbreak');
    expect(seasonStats).not.toHaveProperty('not_a_catalog_stat');
  });

  it('should carry every catalog metric, null where upstream has no value', () => {
    const { seasonStats } = normalizeDetail(HAALAND_DETAIL, 'player');

    expect(Object.keys(seasonStats)).toEqual(getDetailMetrics('player'));
    expect(seasonStats.saves).toBeNull();
  });

  it('should keep every key when biography sections are missing', () => {
    const detail = normalizeDetail({ entity: { id: 1, name: { display: 'Nobody Known' } } }, 'player');

    expect(detail.biography).toEqual({
      position: null,
      shirtNumber: null,
      age: null,
      birthDate: null,
      birthCountry: null,
      nationality: null,
      currentClub: null,
      currentClubId: null,
      height: null,
      weight: null,
    });
    expect(Object.values(detail.seasonStats).every((v) => v === null)).toBe(true);
  });

  it('should null optional biography fields of an unexpected type', () => {
    const detail = normalizeDetail(
      {
        entity: {
          ...HAALAND_DETAIL.entity,
          info: { position: 'F', shirtNum: '9' },
          age: 24,
          height: '195cm',
        },
        stats: HAALAND_DETAIL.stats,
      },
      'player'
    );

    expect(detail.biography).toMatchObject({ position: 'F', shirtNumber: null, age: null, height: null, weight: 88 });
  });

  it('should survive a JSON round trip unchanged', () => {
    const detail = normalizeDetail(HAALAND_DETAIL, 'player');

    expect(JSON.parse(JSON.stringify(detail))).toEqual(detail);
  });

  it('should raise UpstreamShapeException when the entity is missing', () => {
    expect(() => normalizeDetail({ stats: [] }, 'player')).toThrow(UpstreamShapeException);
    expect(() => normalizeDetail({ stats: [] }, 'player')).toThrow(
      'Upstream player entity is missing required fields'
    );
  });
});

describe('normalizeDetail (club)', () => {
  it('should take venue details from the first ground', () => {
    const detail = normalizeDetail(CITY_DETAIL, 'club');

    expect(detail.identity).toEqual({
      id: '11',
      name: 'Manchester City',
      shortName: 'Man City',
      abbreviation: 'MCI',
    });
    expect(detail.biography).toEqual({ venue: 'Etihad Stadium', city: 'Manchester', capacity: 53400 });
  });

  it('should use the club stat list, with aliases folded', () => {
    const { seasonStats } = normalizeDetail(CITY_DETAIL, 'club');

    expect(Object.keys(seasonStats)).toEqual(getDetailMetrics('club'));
    expect(seasonStats.head_clearance).toBe(300);
    expect(seasonStats.attendance_average).toBe(52000);
    expect(seasonStats.gameweek).toBeNull();
  });
});

describe('statsFromList', () => {
  it('should skip malformed entries and non-numeric values', () => {
    const stats = statsFromList([{ value: 3 }, { name: 'goals', value: '3' }, { name: 'wins', value: 2 }], 'club');

    expect(stats.goals).toBeNull();
    expect(stats.wins).toBe(2);
  });

  it('should give all-null stats for a missing list', () => {
    expect(Object.values(statsFromList(null, 'player')).every((v) => v === null)).toBe(true);
  });
});
