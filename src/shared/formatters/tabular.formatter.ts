import type { RecordSet, SchemaTag } from '../../domain/records';
import type { RecordFormatter } from './record-formatter';

export type Cell = string | number | boolean | null;

export interface Table {
  schema: SchemaTag;
  columns: string[];
  rows: Cell[][];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Flatten nested sections into dotted keys:
 * `{ identity: { id: '1' } }` becomes `{ 'identity.id': '1' }`.
 */
export function flattenRecord(record: unknown, prefix = ''): Record<string, Cell> {
  const flat: Record<string, Cell> = {};
  if (!isPlainObject(record)) return flat;

  for (const [key, value] of Object.entries(record)) {
    const column = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value)) {
      Object.assign(flat, flattenRecord(value, column));
    } else {
      flat[column] = toCell(value);
    }
  }
  return flat;
}

/**
 * Fixed columns per schema, used when a set has no records to read them from.
 * Season stat columns depend on the records and are left out.
 */
const SCHEMA_COLUMNS: { readonly [S in SchemaTag]: readonly string[] } = {
  season: ['id', 'label'],
  ranking: ['scope', 'rank', 'entityId', 'entityName', 'club', 'nationality', 'metric', 'value'],
  'player-detail': [
    'scope',
    'identity.id',
    'identity.name',
    'identity.firstName',
    'identity.lastName',
    'biography.position',
    'biography.shirtNumber',
    'biography.age',
    'biography.birthDate',
    'biography.birthCountry',
    'biography.nationality',
    'biography.currentClub',
    'biography.currentClubId',
    'biography.height',
    'biography.weight',
  ],
  'club-detail': [
    'scope',
    'identity.id',
    'identity.name',
    'identity.shortName',
    'identity.abbreviation',
    'biography.venue',
    'biography.city',
    'biography.capacity',
  ],
  'club-list': ['id', 'name', 'shortName', 'abbreviation'],
  'player-list': ['id', 'name', 'position', 'club', 'clubId', 'nationality'],
  table: [
    'position',
    'clubId',
    'club',
    'played',
    'won',
    'drawn',
    'lost',
    'goalsFor',
    'goalsAgainst',
    'goalDifference',
    'points',
  ],
  comparison: ['playerId', 'playerName', 'club'],
};

/**
 * Tabular output: one row per record, one column per (flattened) field, in
 * first-seen order. Nulls stay null so missing values stay visible.
 */
export class TabularRecordFormatter implements RecordFormatter<Table> {
  readonly format = 'table' as const;

  render<S extends SchemaTag>(set: RecordSet<S>): Table {
    if (set.records.length === 0) {
      return { schema: set.schema, columns: [...SCHEMA_COLUMNS[set.schema]], rows: [] };
    }

    const flatRecords = set.records.map((record) => flattenRecord(record));

    const columns: string[] = [];
    const seen = new Set<string>();
    for (const flat of flatRecords) {
      for (const column of Object.keys(flat)) {
        if (!seen.has(column)) {
          seen.add(column);
          columns.push(column);
        }
      }
    }

    const rows = flatRecords.map((flat) => columns.map((column) => flat[column] ?? null));
    return { schema: set.schema, columns, rows };
  }
}

function escapeCsvField(field: string): string {
  if (/[",\n\r]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

/** Render a table as CSV. Null cells become empty fields. */
export function toCsv(table: Table): string {
  const lines = [table.columns.map(escapeCsvField).join(',')];
  for (const row of table.rows) {
    lines.push(row.map((cell) => escapeCsvField(cell === null ? '' : String(cell))).join(','));
  }
  return lines.join('\n');
}
