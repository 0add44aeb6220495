export { createFormatter, isOutputFormat } from './record-formatter';
export type { RecordFormatter, FormattedOutput } from './record-formatter';
export { JsonRecordFormatter } from './json.formatter';
export type { JsonDocument, JsonValue } from './json.formatter';
export { TabularRecordFormatter, flattenRecord, toCsv } from './tabular.formatter';
export type { Table, Cell } from './tabular.formatter';
