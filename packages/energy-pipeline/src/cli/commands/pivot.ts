/**
 * Pivot Command
 *
 * Usage:
 *   energy-pipeline pivot [--rows region] [--cols year] [filter options]
 *
 * @module cli/commands/pivot
 */

import { z } from 'zod';
import type { DatasetSnapshot } from '../../context/pipeline.js';
import { EXIT_CODES, type CommandResult } from '../lib/exit-codes.js';
import { filterOptionsSchema, readOptions, toFilterSpec } from '../lib/options.js';
import { formatJson, formatOutput, formatters, type TableColumn } from '../lib/output.js';

const dimensionSchema = z.enum(['year', 'region', 'energyType']);

const pivotOptionsSchema = filterOptionsSchema.extend({
  rows: dimensionSchema.default('region'),
  cols: dimensionSchema.default('year'),
});

export function runPivot(snapshot: DatasetSnapshot, options: unknown): CommandResult {
  const parsed = readOptions(pivotOptionsSchema, options);
  const view = snapshot.aggregator.filter(toFilterSpec(parsed, snapshot.yearRange));
  const table = view.pivot(parsed.rows, parsed.cols);

  if (parsed.format === 'json') {
    return { output: formatJson(table.toJSON()), exitCode: EXIT_CODES.SUCCESS };
  }

  const columns: TableColumn[] = [
    { key: '__row', header: parsed.rows },
    ...table.colKeys.map((key) => ({
      key: String(key),
      header: String(key),
      align: 'right' as const,
      formatter: formatters.mwh,
    })),
  ];
  const rows = table.rowKeys.map((rowKey, r) => {
    const row: Record<string, unknown> = { __row: rowKey };
    table.colKeys.forEach((colKey, c) => {
      row[String(colKey)] = table.values[r]?.[c] ?? 0;
    });
    return row;
  });

  return { output: formatOutput(rows, parsed.format, columns), exitCode: EXIT_CODES.SUCCESS };
}
