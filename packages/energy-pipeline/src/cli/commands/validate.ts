/**
 * Validate Command
 *
 * Runs the whole pipeline on the source file and reports what the cleaner
 * and geo extractor did. Any fatal pipeline error ends the command before
 * this report is built.
 *
 * Usage:
 *   energy-pipeline validate [--format table|json]
 *
 * Exit codes:
 *   0 clean source, 1 cells were filled or geometry was omitted
 *
 * @module cli/commands/validate
 */

import { z } from 'zod';
import type { DatasetSnapshot } from '../../context/pipeline.js';
import { EXIT_CODES, type CommandResult } from '../lib/exit-codes.js';
import { readOptions } from '../lib/options.js';
import { formatJson, formatTable } from '../lib/output.js';

const validateOptionsSchema = z.object({
  format: z.enum(['table', 'json']).default('table'),
});

export interface ValidationReport {
  readonly sourcePath: string;
  readonly rows: number;
  readonly observations: number;
  readonly regions: number;
  readonly years: string;
  readonly energyTypes: readonly string[];
  readonly skippedEnergyTypes: readonly string[];
  readonly ignoredColumns: readonly string[];
  readonly zeroFilledCells: number;
  readonly forwardFilledCells: number;
  readonly geoFailures: readonly string[];
}

export function buildValidationReport(snapshot: DatasetSnapshot): ValidationReport {
  return {
    sourcePath: snapshot.sourcePath,
    rows: snapshot.wide.rows.length,
    observations: snapshot.observations.length,
    regions: snapshot.regions.length,
    years: `${snapshot.yearRange.min}-${snapshot.yearRange.max}`,
    energyTypes: snapshot.energyTypes,
    skippedEnergyTypes: snapshot.skippedEnergyTypes,
    ignoredColumns: snapshot.ignoredColumns,
    zeroFilledCells: snapshot.cleaning.zeroFilled.length,
    forwardFilledCells: snapshot.cleaning.forwardFilled,
    geoFailures: snapshot.geo.failedRegionCodes,
  };
}

export function runValidate(snapshot: DatasetSnapshot, options: unknown): CommandResult {
  const { format } = readOptions(validateOptionsSchema, options);
  const report = buildValidationReport(snapshot);
  const exitCode =
    report.zeroFilledCells > 0 || report.geoFailures.length > 0
      ? EXIT_CODES.WARNINGS
      : EXIT_CODES.SUCCESS;

  if (format === 'json') {
    return { output: formatJson(report), exitCode };
  }

  const list = (values: readonly string[]): string => (values.length === 0 ? '-' : values.join(', '));
  const rows = [
    { check: 'Source', value: report.sourcePath },
    { check: 'Rows', value: report.rows },
    { check: 'Observations', value: report.observations },
    { check: 'Regions', value: report.regions },
    { check: 'Years', value: report.years },
    { check: 'Energy types', value: list(report.energyTypes) },
    { check: 'Skipped energy types', value: list(report.skippedEnergyTypes) },
    { check: 'Ignored columns', value: list(report.ignoredColumns) },
    { check: 'Zero-filled cells', value: report.zeroFilledCells },
    { check: 'Forward-filled cells', value: report.forwardFilledCells },
    { check: 'Geometry omitted', value: list(report.geoFailures) },
  ];

  return {
    output: formatTable(rows, [
      { key: 'check', header: 'Check' },
      { key: 'value', header: 'Value' },
    ]),
    exitCode,
  };
}
