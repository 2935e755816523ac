/**
 * Growth Command
 *
 * Year-over-year growth of one energy type, for one region or summed over
 * the filtered regions.
 *
 * Usage:
 *   energy-pipeline growth --type <type> [--region <code>] [--from] [--to]
 *
 * @module cli/commands/growth
 */

import { z } from 'zod';
import { ENERGY_TYPES } from '../../core/constants.js';
import type { DatasetSnapshot } from '../../context/pipeline.js';
import { EXIT_CODES, type CommandResult } from '../lib/exit-codes.js';
import { filterOptionsSchema, readOptions, toFilterSpec } from '../lib/options.js';
import { formatOutput, formatters } from '../lib/output.js';

const growthOptionsSchema = filterOptionsSchema.extend({
  type: z.array(z.enum(ENERGY_TYPES)).length(1, 'growth needs exactly one --type'),
});

export function runGrowth(snapshot: DatasetSnapshot, options: unknown): CommandResult {
  const parsed = readOptions(growthOptionsSchema, options);
  const [energyType] = parsed.type;
  if (energyType === undefined) {
    throw new Error('growth needs exactly one --type');
  }

  // The series is chosen by energyType; the view only narrows years and regions
  const view = snapshot.aggregator.filter(toFilterSpec({ ...parsed, type: [] }, snapshot.yearRange));
  const regionCode = parsed.region.length === 1 ? parsed.region[0] : undefined;
  const points = view.yoyGrowth(energyType, regionCode).map((point) => ({ ...point }));

  return {
    output: formatOutput(points, parsed.format, [
      { key: 'year', header: 'Year' },
      { key: 'previousValueMwh', header: 'Previous (MWh)', align: 'right', formatter: formatters.mwh },
      { key: 'valueMwh', header: 'Value (MWh)', align: 'right', formatter: formatters.mwh },
      { key: 'growth', header: 'Growth', align: 'right', formatter: formatters.percent },
    ]),
    exitCode: EXIT_CODES.SUCCESS,
  };
}
