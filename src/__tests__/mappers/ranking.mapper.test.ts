import { RankingMapper, normalizeRanking } from '../../shared/mappers';
import { UpstreamShapeException } from '../../utils/exceptions';

describe('RankingMapper', () => {
  it('should normalize a player ranking item', () => {
    const raw = {
      rank: 1,
      value: 22.0,
      owner: {
        id: 65970.0,
        name: { display: 'Erling Haaland', first: 'Erling', last: 'Haaland' },
        currentTeam: { id: 11, name: 'Manchester City' },
        nationalTeam: { country: 'Norway' },
        playerId: 223094,
      },
    };

    expect(normalizeRanking(raw, 'player', 'goals')).toEqual({
      scope: 'player',
      rank: 1,
      entityId: '65970',
      entityName: 'Erling Haaland',
      club: 'Manchester City',
      nationality: 'Norway',
      metric: 'goals',
      value: 22,
    });
  });

  it('should normalize a club ranking item with null player-only fields', () => {
    const raw = { rank: 2, value: 72, owner: { id: 11, name: 'Manchester City', shortName: 'Man City' } };

    expect(RankingMapper.fromRaw(raw, 'club', 'goals')).toEqual({
      scope: 'club',
      rank: 2,
      entityId: '11',
      entityName: 'Manchester City',
      club: null,
      nationality: null,
      metric: 'goals',
      value: 72,
    });
  });

  it('should null a value that is missing or not a number', () => {
    const owner = { id: 1, name: 'Arsenal' };

    expect(RankingMapper.fromRaw({ rank: 3, owner }, 'club', 'goals').value).toBeNull();
    expect(RankingMapper.fromRaw({ rank: 3, value: 'n/a', owner }, 'club', 'goals').value).toBeNull();
  });

  it('should null every value of a ranking whose values cannot be read', () => {
    const raw = { rank: 1, value: 512, owner: { id: 10, name: 'Liverpool' } };

    const record = RankingMapper.fromRaw(raw, 'club', 'head_clearance');

    expect(record.value).toBeNull();
    expect(record.entityName).toBe('Liverpool');
    expect(record.rank).toBe(1);
  });

  it('should keep player club and nationality null when upstream omits them', () => {
    const raw = { rank: 7, value: 3, owner: { id: 5, name: { display: 'Loan Player' } } };

    expect(RankingMapper.fromRaw(raw, 'player', 'goal_assist')).toMatchObject({
      club: null,
      nationality: null,
      entityId: '5',
    });
  });

  it('should raise UpstreamShapeException when the owner has no name', () => {
    const raw = { rank: 1, value: 1, owner: { id: 5 } };

    expect(() => RankingMapper.fromRaw(raw, 'player', 'goals')).toThrow(UpstreamShapeException);
    expect(() => RankingMapper.fromRaw(raw, 'player', 'goals')).toThrow(
      'Upstream ranking owner is missing required fields at name'
    );
  });

  it('should map a page of items in order', () => {
    const raws = [
      { rank: 1, value: 86, owner: { id: 10, name: 'Liverpool' } },
      { rank: 2, value: 72, owner: { id: 11, name: 'Manchester City' } },
    ];

    expect(RankingMapper.fromRaws(raws, 'club', 'goals').map((r) => r.entityName)).toEqual([
      'Liverpool',
      'Manchester City',
    ]);
  });
});
