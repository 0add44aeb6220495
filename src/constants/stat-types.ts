import statTypes from '../data/stat-types.json';

export const SCOPES = ['player', 'club'] as const;
export type Scope = (typeof SCOPES)[number];

export type StatCategories = Record<string, string[]>;

interface StatCatalog {
  player: StatCategories;
  club: StatCategories;
  clubDetail: string[];
  aliases: Record<Scope, Record<string, string>>;
  unrecoverableRankings: Record<Scope, string[]>;
}

const catalog: StatCatalog = statTypes;

const flatten = (categories: StatCategories): string[] => Object.values(categories).flat();

const rankingMetrics: Record<Scope, ReadonlySet<string>> = {
  player: new Set(flatten(catalog.player)),
  club: new Set(flatten(catalog.club)),
};

export function isScope(value: string): value is Scope {
  return (SCOPES as readonly string[]).includes(value);
}

/** Categorised ranking metrics for a scope, e.g. `{ Attack: ['goals', ...] }`. */
export function getStatCategories(scope: Scope): StatCategories {
  const source = catalog[scope];
  return Object.fromEntries(Object.entries(source).map(([category, metrics]) => [category, [...metrics]]));
}

/** Every ranking metric for a scope, in catalog order. */
export function getRankingMetrics(scope: Scope): string[] {
  return flatten(catalog[scope]);
}

/**
 * Metrics that make up `seasonStats` on a detail record. Players use the
 * ranking catalog; clubs have a longer per-club stat list.
 */
export function getDetailMetrics(scope: Scope): string[] {
  return scope === 'club' ? [...catalog.clubDetail] : getRankingMetrics('player');
}

/**
 * Map a metric name onto its canonical form. Known-bad upstream keys
 * (`oal_fastbreak`, `interceptions`, `Headed clearances`) become the canonical
 * key; anything else is returned unchanged.
 */
export function canonicalMetric(metric: string, scope: Scope): string {
  return catalog.aliases[scope][metric] ?? metric;
}

export function isKnownMetric(metric: string, scope: Scope): boolean {
  return rankingMetrics[scope].has(canonicalMetric(metric, scope));
}

/**
 * Ranking metrics whose upstream values cannot be read. Rankings for these
 * still list entities and ranks, but every value is null.
 */
export function isUnrecoverableRankingMetric(metric: string, scope: Scope): boolean {
  return catalog.unrecoverableRankings[scope].includes(canonicalMetric(metric, scope));
}

/**
 * Ranking metrics for a scope, as a flat list or grouped by category.
 */
export function listStatTypes(scope: Scope, shape: 'list'): string[];
export function listStatTypes(scope: Scope, shape: 'dict'): StatCategories;
export function listStatTypes(scope: Scope, shape: 'list' | 'dict'): string[] | StatCategories;
export function listStatTypes(scope: Scope, shape: 'list' | 'dict'): string[] | StatCategories {
  return shape === 'list' ? getRankingMetrics(scope) : getStatCategories(scope);
}
