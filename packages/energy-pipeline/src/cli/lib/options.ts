/**
 * Shared command options
 *
 * Filter flags (--from, --to, --region, --type) and --format are the same
 * on every read command. Commander hands actions untyped option bags, so
 * each command validates its bag with zod before use.
 *
 * @module cli/lib/options
 */

import { InvalidArgumentError, type Command } from 'commander';
import { z } from 'zod';
import { yearRangeFrom, type FilterSpec } from '../../analytics/filter-spec.js';
import { ConfigurationError } from '../../core/errors.js';
import type { YearRange } from '../../core/types.js';
import { OUTPUT_FORMATS } from './output.js';

/**
 * Commander argument parser for integer options
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

/**
 * Commander argument parser for repeatable, comma-separated lists
 */
export function collectList(value: string, previous: readonly string[] = []): string[] {
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return [...previous, ...items];
}

export function addFilterOptions(command: Command): Command {
  return command
    .option('--from <year>', 'First year (inclusive)', parseInteger)
    .option('--to <year>', 'Last year (inclusive)', parseInteger)
    .option('--region <codes>', 'Region code(s), comma-separated or repeated', collectList, [])
    .option('--type <types>', 'Energy type(s), comma-separated or repeated', collectList, [])
    .option('--format <fmt>', `Output format: ${OUTPUT_FORMATS.join('|')}`, 'table');
}

export const filterOptionsSchema = z.object({
  from: z.number().int().optional(),
  to: z.number().int().optional(),
  region: z.array(z.string()).default([]),
  type: z.array(z.string()).default([]),
  format: z.enum(['table', 'json', 'csv']).default('table'),
});

export type FilterOptions = z.infer<typeof filterOptionsSchema>;

/**
 * Validate a commander option bag against a command's schema.
 *
 * @throws ConfigurationError naming the first offending option
 */
export function readOptions<T extends z.ZodTypeAny>(schema: T, options: unknown): z.infer<T> {
  const result = schema.safeParse(options);
  if (!result.success) {
    const issue = result.error.issues[0];
    const option = issue?.path.join('.') ?? '';
    throw new ConfigurationError(`Invalid option --${option}: ${issue?.message ?? 'invalid'}`, {
      column: option,
    });
  }
  return result.data;
}

export function toFilterSpec(options: FilterOptions, available: YearRange): FilterSpec {
  return {
    yearRange: yearRangeFrom(options.from, options.to, available),
    regions: options.region,
    energyTypes: options.type,
  };
}
