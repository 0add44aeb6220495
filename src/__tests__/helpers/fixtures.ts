import { StatsClient } from '../../client';
import { ClientConfigOverrides } from '../../config/client.config';
import { FakeUpstream, pageOf } from './fake-upstream';

// ---------- Seasons ----------

export const SEASONS = [
  { id: 719, label: '2024/25' },
  { id: 578, label: '2023/24' },
  { id: 489, label: '2022/23' },
];

// ---------- Clubs ----------

export const TEAMS = [
  { id: 1, name: 'Arsenal', shortName: 'Arsenal', teamType: 'FIRST', club: { name: 'Arsenal', abbr: 'ARS' } },
  { id: 4, name: 'Chelsea', shortName: 'Chelsea', teamType: 'FIRST', club: { name: 'Chelsea', abbr: 'CHE' } },
  { id: 10, name: 'Liverpool', shortName: 'Liverpool', teamType: 'FIRST', club: { name: 'Liverpool', abbr: 'LIV' } },
  { id: 11, name: 'Manchester City', shortName: 'Man City', teamType: 'FIRST', club: { name: 'Manchester City', abbr: 'MCI' } },
  { id: 12, name: 'Manchester United', shortName: 'Man Utd', teamType: 'FIRST', club: { name: 'Manchester United', abbr: 'MUN' } },
  { id: 385, name: 'Arsenal Women', shortName: 'Arsenal', teamType: 'WOMEN', club: { name: 'Arsenal', abbr: 'ARS' } },
];

// ---------- Players ----------

function player(id: number, display: string, position: string, team: { id: number; name: string } | null, country: string) {
  const [first, ...rest] = display.split(' ');
  return {
    id,
    name: { display, first, last: rest.join(' ') },
    info: { position, shirtNum: null },
    currentTeam: team ? { ...team, shortName: team.name } : null,
    nationalTeam: { country, isoCode: null },
  };
}

const CITY = { id: 11, name: 'Manchester City' };

export const PLAYERS = [
  player(65970, 'Erling Haaland', 'F', CITY, 'Norway'),
  player(20002, 'Bukayo Saka', 'M', { id: 1, name: 'Arsenal' }, 'England'),
  player(20003, 'Phil Foden', 'M', CITY, 'England'),
  player(20004, 'Joško Gvardiol', 'D', CITY, 'Croatia'),
  player(20005, 'Bernardo Silva', 'M', CITY, 'Portugal'),
  player(20006, 'Thiago Silva', 'D', { id: 4, name: 'Chelsea' }, 'Brazil'),
  player(20007, 'Youth Prospect', 'M', { id: 999, name: 'Somewhere U21' }, 'England'),
  player(20008, 'Free Agent', 'F', null, 'Wales'),
];

// ---------- Detail blobs ----------

export const HAALAND_DETAIL = {
  entity: {
    id: 65970,
    name: { display: 'Erling Haaland', first: 'Erling', last: 'Haaland' },
    info: { position: 'F', shirtNum: 9 },
    age: '24 years 100 days',
    birth: { date: { label: '21 July 2000' }, country: { country: 'Norway' } },
    height: 195,
    weight: 88,
    currentTeam: { id: 11, name: 'Manchester City', shortName: 'Man City' },
    nationalTeam: { country: 'Norway', isoCode: 'NO' },
  },
  stats: [
    { name: 'goals', value: 22 },
    { name: 'goal_assist', value: 3 },
    { name: 'appearances', value: 31 },
    { name: 'mins_played', value: 2600 },
    { name: 'oal_fastbreak', value: 2 },
    { name: 'not_a_catalog_stat', value: 5 },
  ],
};

export const SAKA_DETAIL = {
  entity: {
    id: 20002,
    name: { display: 'Bukayo Saka', first: 'Bukayo', last: 'Saka' },
    currentTeam: { id: 1, name: 'Arsenal' },
  },
  stats: [
    { name: 'goals', value: 6 },
    { name: 'goal_assist', value: 10 },
  ],
};

export const CITY_DETAIL = {
  entity: {
    id: 11,
    name: 'Manchester City',
    shortName: 'Man City',
    club: { abbr: 'MCI' },
    grounds: [{ name: 'Etihad Stadium', city: 'Manchester', capacity: 53400 }],
  },
  stats: [
    { name: 'goals', value: 72 },
    { name: 'wins', value: 21 },
    { name: 'Headed clearances', value: 300 },
    { name: 'attendance_average', value: 52000 },
  ],
};

// ---------- Standings ----------

export const STANDINGS = {
  tables: [
    {
      entries: [
        {
          position: 1,
          team: { id: 10, name: 'Liverpool' },
          overall: { played: 38, won: 25, drawn: 9, lost: 4, goalsFor: 86, goalsAgainst: 41, goalsDifference: 45, points: 84 },
        },
        {
          position: 2,
          team: { id: 1, name: 'Arsenal' },
          overall: { played: 38, won: 20, drawn: 14, lost: 4, goalsFor: 69, goalsAgainst: 34, goalsDifference: 35, points: 74 },
        },
        { position: 3, team: { id: 11, name: 'Manchester City' } },
      ],
    },
  ],
};

// ---------- Rankings ----------

/** `count` ranked players, values descending from `count`. */
export function rankedPlayers(count: number) {
  return Array.from({ length: count }, (_, i) => ({
    rank: i + 1,
    value: count - i,
    owner: {
      id: 100000 + i,
      name: { display: `Ranked Player ${i + 1}` },
      currentTeam: { id: 11, name: 'Manchester City' },
      nationalTeam: { country: 'England' },
    },
  }));
}

export const RANKED_CLUBS = [
  { rank: 1, value: 86, owner: { id: 10, name: 'Liverpool', shortName: 'Liverpool' } },
  { rank: 2, value: 72, owner: { id: 11, name: 'Manchester City', shortName: 'Man City' } },
  { rank: 3, value: 69, owner: { id: 1, name: 'Arsenal', shortName: 'Arsenal' } },
];

// ---------- Client ----------

export const TEST_CONFIG: ClientConfigOverrides = {
  retryDelaySeconds: 0,
  maxRetries: 2,
  pageSize: 3,
};

/**
 * Upstream with season 719 (2024/25) fully populated. Tests override single
 * routes with `on` or `sequence`.
 */
export function createUpstream(): FakeUpstream {
  return new FakeUpstream()
    .on('competitions/1/compseasons', { body: { content: SEASONS } })
    .on('compseasons/719/teams', { body: TEAMS })
    .on('compseasons/719/standings', { body: STANDINGS })
    .on('players', (params) => ({ body: pageOf(PLAYERS, params) }))
    .on('stats/player/65970', { body: HAALAND_DETAIL })
    .on('stats/player/20002', { body: SAKA_DETAIL })
    .on('stats/team/11', { body: CITY_DETAIL })
    .on('stats/ranked/players/goals', (params) => ({ body: { stats: pageOf(rankedPlayers(150), params) } }))
    .on('stats/ranked/teams/goals', (params) => ({ body: { stats: pageOf(RANKED_CLUBS, params) } }));
}

export function createTestClient(upstream: FakeUpstream, overrides: ClientConfigOverrides = {}): StatsClient {
  return new StatsClient({ ...TEST_CONFIG, ...overrides }, { adapter: upstream.adapter });
}
