#!/usr/bin/env tsx
/**
 * Energy Pipeline CLI Entry Point
 *
 * Loads the regional production source through the pipeline and prints
 * validation reports, aggregates and map data, or serves them over HTTP.
 *
 * @module energy-pipeline-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { loadConfig, type PipelineConfig } from '../src/core/config.js';
import { errorMessage, isPipelineError } from '../src/core/errors.js';
import { configureLogging, logger } from '../src/core/utils/logger.js';
import { EnergyPipelineContext } from '../src/context/pipeline-context.js';
import type { DatasetSnapshot } from '../src/context/pipeline.js';
import {
  runGeo,
  runGrowth,
  runPivot,
  runSummary,
  runTotals,
  runValidate,
  serveCommand,
} from '../src/cli/commands/index.js';
import { EXIT_CODES, exitCodeFor, type CommandResult } from '../src/cli/lib/exit-codes.js';
import { addFilterOptions, parseInteger, readOptions } from '../src/cli/lib/options.js';
import { printError, printOutput } from '../src/cli/lib/output.js';

// ============================================================================
// Global State
// ============================================================================

interface GlobalContext {
  config: PipelineConfig;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

const globalOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  logJson: z.boolean().optional(),
  config: z.string().optional(),
  data: z.string().optional(),
});

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    const parsed = z.object({ version: z.string() }).safeParse(packageJson);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

async function initializeContext(options: unknown): Promise<GlobalContext> {
  const startTime = Date.now();
  const globals = readOptions(globalOptionsSchema, options);

  const config = await loadConfig({
    configPath: globals.config,
    overrides: {
      dataPath: globals.data,
      verbose: globals.verbose,
      json: globals.logJson,
    },
  });

  configureLogging(config.logging);

  globalContext = { config, startTime };
  return globalContext;
}

async function loadSnapshot(): Promise<DatasetSnapshot> {
  const context = await EnergyPipelineContext.fromConfig(getGlobalContext().config);
  return context.snapshot;
}

/**
 * Load the dataset, run a read command on it and print its output.
 */
function readAction(
  run: (snapshot: DatasetSnapshot, options: unknown) => CommandResult
): (options: unknown) => Promise<void> {
  return async (options) => {
    const result = run(await loadSnapshot(), options);
    printOutput(result.output);
    process.exitCode = result.exitCode;
  };
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('energy-pipeline')
    .description('Regional renewable energy production: validate, aggregate, map and serve')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--log-json', 'Write log lines as JSON')
    .option('--config <path>', 'Path to config file (default: .energy-pipelinerc)')
    .option('--data <path>', 'Path to the semicolon-delimited source file')
    .hook('preAction', async (thisCommand) => {
      try {
        await initializeContext(thisCommand.opts());
      } catch (error) {
        printError(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('validate')
    .description('Load the source and report cleaning and geometry results')
    .option('--format <fmt>', 'Output format: table|json', 'table')
    .action(readAction(runValidate));

  addFilterOptions(
    program.command('summary').description('Key figures, energy shares and top regions')
  )
    .option('--top <n>', 'Number of top regions', parseInteger, 5)
    .action(readAction(runSummary));

  addFilterOptions(program.command('totals').description('Production totals grouped by one dimension'))
    .option('--by <dim>', 'Group by: region|energyType|year', 'region')
    .action(readAction(runTotals));

  addFilterOptions(program.command('growth').description('Year-over-year growth of one energy type'))
    .action(readAction(runGrowth));

  addFilterOptions(program.command('pivot').description('Matrix of totals over two dimensions'))
    .option('--rows <dim>', 'Row dimension: region|energyType|year', 'region')
    .option('--cols <dim>', 'Column dimension: region|energyType|year', 'year')
    .action(readAction(runPivot));

  addFilterOptions(program.command('geo').description('Choropleth GeoJSON of production per region'))
    .action(readAction(runGeo));

  program
    .command('serve')
    .description('Start the HTTP API server')
    .option('--port <n>', 'Port to listen on', parseInteger)
    .option('--host <host>', 'Host to bind')
    .option('--cors-origins <origins>', 'Comma-separated allowed origins', '*')
    .action(async (options: unknown) => {
      const parsed = readOptions(
        z.object({
          port: z.number().int().min(0).max(65535).optional(),
          host: z.string().optional(),
          corsOrigins: z.string().default('*'),
        }),
        options
      );
      const { config } = getGlobalContext();
      await serveCommand(
        {
          ...config,
          server: {
            host: parsed.host ?? config.server.host,
            port: parsed.port ?? config.server.port,
          },
        },
        { corsOrigins: parsed.corsOrigins }
      );
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (isPipelineError(error)) {
      printError(error.toLogString());
    } else {
      printError(errorMessage(error));
    }
    if (globalContext) {
      logger.debug('Command failed', { duration_ms: Date.now() - globalContext.startTime });
    }
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
