import type { RecordSet, SchemaTag } from '../../domain/records';
import type { RecordFormatter } from './record-formatter';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface JsonDocument {
  schema: SchemaTag;
  records: JsonValue[];
}

/**
 * Plain JSON output: the records as they are, detached from the caller's
 * objects, with null markers kept.
 */
export class JsonRecordFormatter implements RecordFormatter<JsonDocument> {
  readonly format = 'json' as const;

  render<S extends SchemaTag>(set: RecordSet<S>): JsonDocument {
    const records: JsonValue[] = JSON.parse(JSON.stringify(set.records));
    return { schema: set.schema, records };
  }

  stringify<S extends SchemaTag>(set: RecordSet<S>, indent = 2): string {
    return JSON.stringify(this.render(set), null, indent);
  }
}
