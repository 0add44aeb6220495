import { OUTPUT_FORMATS, OutputFormat } from '../../config/client.config';
import type { RecordSet, SchemaTag } from '../../domain/records';
import { ErrorCode, QueryException } from '../../utils/exceptions';
import { JsonDocument, JsonRecordFormatter } from './json.formatter';
import { Table, TabularRecordFormatter } from './tabular.formatter';

export type FormattedOutput = JsonDocument | Table;

/**
 * Renders a RecordSet. Formatters never see upstream shapes, only canonical
 * records plus their schema tag.
 */
export interface RecordFormatter<TOutput extends FormattedOutput = FormattedOutput> {
  readonly format: OutputFormat;
  render<S extends SchemaTag>(set: RecordSet<S>): TOutput;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export function createFormatter(format: 'json'): RecordFormatter<JsonDocument>;
export function createFormatter(format: 'table'): RecordFormatter<Table>;
export function createFormatter(format: string): RecordFormatter;
export function createFormatter(format: string): RecordFormatter {
  if (!isOutputFormat(format)) {
    throw new QueryException(
      `Invalid output format '${format}'; expected one of ${OUTPUT_FORMATS.join(', ')}`,
      { format },
      ErrorCode.INVALID_OUTPUT_FORMAT
    );
  }
  return format === 'table' ? new TabularRecordFormatter() : new JsonRecordFormatter();
}
