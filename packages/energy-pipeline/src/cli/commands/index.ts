/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

export { runValidate, buildValidationReport, type ValidationReport } from './validate.js';
export { runSummary } from './summary.js';
export { runTotals } from './totals.js';
export { runGrowth } from './growth.js';
export { runPivot } from './pivot.js';
export { runGeo } from './geo.js';
export { serveCommand, type ServeOptions } from './serve.js';
