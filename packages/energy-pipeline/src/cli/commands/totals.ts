/**
 * Totals Command
 *
 * Production totals of the filtered view, grouped by region, energy type
 * or year.
 *
 * Usage:
 *   energy-pipeline totals [--by region|energyType|year] [filter options]
 *
 * @module cli/commands/totals
 */

import { z } from 'zod';
import type { DatasetSnapshot } from '../../context/pipeline.js';
import { EXIT_CODES, type CommandResult } from '../lib/exit-codes.js';
import { filterOptionsSchema, readOptions, toFilterSpec } from '../lib/options.js';
import { formatOutput, formatters } from '../lib/output.js';

const totalsOptionsSchema = filterOptionsSchema.extend({
  by: z.enum(['region', 'energyType', 'year']).default('region'),
});

export function runTotals(snapshot: DatasetSnapshot, options: unknown): CommandResult {
  const parsed = readOptions(totalsOptionsSchema, options);
  const view = snapshot.aggregator.filter(toFilterSpec(parsed, snapshot.yearRange));

  let rows: Array<{ key: string | number; name?: string; totalMwh: number }>;
  switch (parsed.by) {
    case 'region': {
      const names = new Map(view.regions().map((region) => [region.code, region.name] as const));
      rows = [...view.totalByRegion()].map(([key, totalMwh]) => ({
        key,
        name: names.get(key) ?? key,
        totalMwh,
      }));
      break;
    }
    case 'energyType':
      rows = [...view.totalByEnergyType()].map(([key, totalMwh]) => ({ key, totalMwh }));
      break;
    case 'year':
      rows = [...view.totalByYear()].map(([key, totalMwh]) => ({ key, totalMwh }));
      break;
  }

  const columns = [
    { key: 'key', header: parsed.by === 'energyType' ? 'Energy type' : parsed.by === 'year' ? 'Year' : 'Code' },
    ...(parsed.by === 'region' ? [{ key: 'name', header: 'Region' }] : []),
    { key: 'totalMwh', header: 'Total (MWh)', align: 'right' as const, formatter: formatters.mwh },
  ];

  return { output: formatOutput(rows, parsed.format, columns), exitCode: EXIT_CODES.SUCCESS };
}
