import type { EntityRef } from './records';

export type NameMatchResult =
  | { kind: 'matched'; ref: EntityRef }
  | { kind: 'ambiguous'; candidates: EntityRef[] }
  | { kind: 'not-found' };

/**
 * Normalize a name for comparison: trim, collapse whitespace, lower-case and
 * drop combining accents ("Gvardiol", "Ødegaard" keeps its Ø).
 */
export function normalizeName(name: string): string {
  return name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

/** Keep the first candidate per id, so one entity listed under several names counts once. */
function uniqueById(refs: EntityRef[]): EntityRef[] {
  const seen = new Set<string>();
  return refs.filter((ref) => {
    if (seen.has(ref.id)) return false;
    seen.add(ref.id);
    return true;
  });
}

/**
 * Match a name against resolved candidates.
 *
 * One exact (normalized) match wins outright. Otherwise a single substring
 * match is accepted. Several exact or several partial matches are ambiguous;
 * the candidates come back in input order and nothing is auto-picked.
 * An entity may appear more than once under alternative names (full and short
 * club names); it still counts as one candidate.
 */
export function matchByName(query: string, candidates: EntityRef[]): NameMatchResult {
  const needle = normalizeName(query);
  if (!needle) return { kind: 'not-found' };

  const exact = uniqueById(candidates.filter((c) => normalizeName(c.name) === needle));
  if (exact.length === 1) return { kind: 'matched', ref: exact[0] };
  if (exact.length > 1) return { kind: 'ambiguous', candidates: exact };

  const partial = uniqueById(candidates.filter((c) => normalizeName(c.name).includes(needle)));
  if (partial.length === 1) return { kind: 'matched', ref: partial[0] };
  if (partial.length > 1) return { kind: 'ambiguous', candidates: partial };

  return { kind: 'not-found' };
}

/** Every candidate whose normalized name contains the query, in input order. */
export function searchByName<T extends EntityRef>(query: string, candidates: T[]): T[] {
  const needle = normalizeName(query);
  if (!needle) return [];
  return candidates.filter((c) => normalizeName(c.name).includes(needle));
}
