/**
 * Summary Command
 *
 * Key figures of the filtered view: total production, regions and energy
 * types covered, average annual production, first-to-last-year growth,
 * energy type shares and the top regions.
 *
 * Usage:
 *   energy-pipeline summary [--top <n>] [filter options]
 *
 * @module cli/commands/summary
 */

import { z } from 'zod';
import type { DatasetSnapshot } from '../../context/pipeline.js';
import { EXIT_CODES, type CommandResult } from '../lib/exit-codes.js';
import { filterOptionsSchema, readOptions, toFilterSpec } from '../lib/options.js';
import { formatCsv, formatJson, formatTable, formatters } from '../lib/output.js';

const summaryOptionsSchema = filterOptionsSchema.extend({
  top: z.number().int().min(1).default(5),
});

export function runSummary(snapshot: DatasetSnapshot, options: unknown): CommandResult {
  const parsed = readOptions(summaryOptionsSchema, options);
  const view = snapshot.aggregator.filter(toFilterSpec(parsed, snapshot.yearRange));
  const summary = view.summary();
  const shares = view.energyShares();
  const topRegions = view.topRegions(parsed.top);

  if (parsed.format === 'json') {
    return {
      output: formatJson({
        ...summary,
        energyShares: shares,
        productionChange: view.productionChange() ?? null,
        topRegions,
      }),
      exitCode: EXIT_CODES.SUCCESS,
    };
  }

  const metrics = [
    { metric: 'Total production (MWh)', value: formatters.mwh(summary.totalMwh) },
    { metric: 'Regions', value: summary.regionCount },
    { metric: 'Energy types', value: summary.energyTypeCount },
    { metric: 'Years covered', value: summary.yearsCovered },
    { metric: 'Average annual (MWh)', value: formatters.mwh(summary.averageAnnualMwh) },
    { metric: 'Growth first to last year', value: formatters.percent(summary.growthRate) },
  ];
  const metricColumns = [
    { key: 'metric', header: 'Metric' },
    { key: 'value', header: 'Value', align: 'right' as const },
  ];

  if (parsed.format === 'csv') {
    return { output: formatCsv(metrics, metricColumns), exitCode: EXIT_CODES.SUCCESS };
  }

  const sections = [
    formatTable(metrics, metricColumns),
    formatTable(
      shares.map((share) => ({ ...share })),
      [
        { key: 'energyType', header: 'Energy type' },
        { key: 'totalMwh', header: 'Total (MWh)', align: 'right', formatter: formatters.mwh },
        { key: 'share', header: 'Share', align: 'right', formatter: formatters.percent },
      ]
    ),
    formatTable(
      topRegions.map((region) => ({ ...region })),
      [
        { key: 'regionCode', header: 'Code' },
        { key: 'regionName', header: 'Region' },
        { key: 'totalMwh', header: 'Total (MWh)', align: 'right', formatter: formatters.mwh },
      ]
    ),
  ];

  return { output: sections.join('\n\n'), exitCode: EXIT_CODES.SUCCESS };
}
