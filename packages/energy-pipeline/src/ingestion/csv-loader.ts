/**
 * Raw Loader
 *
 * Reads the semicolon-delimited production file, decodes it as strict UTF-8,
 * and parses every cell into a typed field. No cleaning happens here: empty
 * cells come out as `null` for the cleaner to handle.
 *
 * FAILURES:
 * - LoadError: file missing or unreadable, bytes not valid UTF-8
 * - FormatError: wrong delimiter, ragged rows, unbalanced quotes, bad cells
 * - SchemaError: required header columns missing
 */

import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import { SOURCE_DELIMITER, type EnergyType } from '../core/constants.js';
import { FormatError, LoadError, errorMessage } from '../core/errors.js';
import type { ColumnMap, RawRow, RawTable } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { resolveHeader, type ResolvedHeader } from './header.js';

const log = createLogger({ module: 'loader' });

/** Cell spellings read as an empty value */
const NULL_TOKENS = new Set(['', 'na', 'nan', 'null', 'n/a']);

/** Plain decimal: optional sign, digits, optional point or comma fraction */
const DECIMAL_CELL = /^[-+]?\d+(?:[.,]\d+)?$/;

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode file bytes as UTF-8, rejecting invalid sequences. A leading BOM
 * is dropped by the decoder.
 */
export function decodeUtf8(bytes: Uint8Array, sourcePath: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new LoadError(`${sourcePath} is not valid UTF-8 text`, { cause: error });
  }
}

// ============================================================================
// Cell Parsing
// ============================================================================

function isNullCell(cell: string): boolean {
  return NULL_TOKENS.has(cell.trim().toLowerCase());
}

export function parseTextCell(cell: string | undefined): string | null {
  if (cell === undefined || isNullCell(cell)) {
    return null;
  }
  return cell.trim();
}

export function parseYearCell(cell: string | undefined, row: number, column: string): number | null {
  if (cell === undefined || isNullCell(cell)) {
    return null;
  }
  const trimmed = cell.trim();
  if (!/^\d{4}$/.test(trimmed)) {
    throw new FormatError(`Year "${trimmed}" is not a four-digit integer`, { row, column });
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parse a production cell in GWh. A decimal comma ("12,5") is accepted;
 * hex, binary and exponent notations are not.
 */
export function parseNumberCell(cell: string | undefined, row: number, column: string): number | null {
  if (cell === undefined || isNullCell(cell)) {
    return null;
  }
  const trimmed = cell.trim();
  if (!DECIMAL_CELL.test(trimmed)) {
    throw new FormatError(`Value "${trimmed}" is not a number`, { row, column });
  }
  return Number(trimmed.replace(',', '.'));
}

// ============================================================================
// Table Parsing
// ============================================================================

function toColumnMap(header: ResolvedHeader): ColumnMap {
  const energy: Partial<Record<EnergyType, string>> = {};
  for (const [energyType, index] of header.energy) {
    energy[energyType] = header.names[index] ?? energyType;
  }
  const name = (index: number): string => header.names[index] ?? String(index);
  return {
    identity: {
      year: name(header.identity.year),
      regionName: name(header.identity.regionName),
      regionCode: name(header.identity.regionCode),
      geoShape: name(header.identity.geoShape),
      geoPoint: name(header.identity.geoPoint),
    },
    energy,
  };
}

function isBlankLine(cells: readonly string[]): boolean {
  return cells.length === 1 && (cells[0] ?? '').trim() === '';
}

function assertDelimiter(headerCells: readonly string[]): void {
  if (headerCells.length !== 1) {
    return;
  }
  const only = headerCells[0] ?? '';
  if (only.includes(',') || only.includes('\t')) {
    throw new FormatError(
      `Header has a single column; expected "${SOURCE_DELIMITER}" as delimiter`,
      { row: 0 }
    );
  }
}

/**
 * Parse decoded source text into a raw table.
 */
export function parseRawTable(text: string, sourcePath: string): RawTable {
  // Blank lines are dropped below, not by Papa, so that row numbers keep
  // counting them and delimiter-only rows still reach the cleaner
  const result = Papa.parse<string[]>(text, {
    delimiter: SOURCE_DELIMITER,
    skipEmptyLines: false,
  });

  const quoteError = result.errors.find((error) => error.type === 'Quotes');
  if (quoteError !== undefined) {
    // Papa counts the header as row 0, matching our 1-based data rows
    throw new FormatError(`Malformed quoting: ${quoteError.message}`, { row: quoteError.row });
  }

  const [headerCells, ...records] = result.data;
  if (headerCells === undefined || isBlankLine(headerCells)) {
    throw new FormatError(`${sourcePath} is empty`);
  }
  assertDelimiter(headerCells);

  const header = resolveHeader(headerCells);
  const columns = toColumnMap(header);
  const { identity } = header;

  const rows: RawRow[] = records.flatMap((cells, index): RawRow[] => {
    const row = index + 1;
    if (isBlankLine(cells)) {
      return [];
    }
    if (cells.length !== headerCells.length) {
      throw new FormatError(
        `Row has ${cells.length} fields, header has ${headerCells.length}`,
        { row }
      );
    }

    const productionGwh: Partial<Record<EnergyType, number | null>> = {};
    for (const [energyType, cellIndex] of header.energy) {
      productionGwh[energyType] = parseNumberCell(cells[cellIndex], row, columns.energy[energyType] ?? energyType);
    }

    return [
      {
        row,
        year: parseYearCell(cells[identity.year], row, columns.identity.year),
        regionName: parseTextCell(cells[identity.regionName]),
        regionCode: parseTextCell(cells[identity.regionCode]),
        productionGwh,
        geoShape: parseTextCell(cells[identity.geoShape]),
        geoPoint: parseTextCell(cells[identity.geoPoint]),
      },
    ];
  });

  return {
    sourcePath,
    columns,
    energyTypes: [...header.energy.keys()],
    ignoredColumns: header.ignored,
    rows,
  };
}

/**
 * Load the source file into a raw table.
 *
 * @param sourcePath - Path of the semicolon-delimited UTF-8 file
 */
export async function loadRawTable(sourcePath: string): Promise<RawTable> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(sourcePath);
  } catch (error) {
    throw new LoadError(`Cannot read ${sourcePath}: ${errorMessage(error)}`, { cause: error });
  }

  const table = parseRawTable(decodeUtf8(bytes, sourcePath), sourcePath);

  log.debug('Raw table loaded', {
    sourcePath,
    rows: table.rows.length,
    energyTypes: table.energyTypes,
    ignoredColumns: table.ignoredColumns,
  });

  return table;
}
