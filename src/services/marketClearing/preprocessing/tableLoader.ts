/**
 * Table Loader
 *
 * Reads the five market tables from CSV:
 *   region_demand.csv    region, demand
 *   generators.csv       region, generator_name, nameplate_capacity
 *   pricelevel.csv       pricelevel
 *   bids.csv             generator_name, pricelevel, bid_capacity
 *   interconnectors.csv  interconnector_id, region_start, region_end, interconnector_capacity (optional)
 *
 * Comma-delimited. Headers and cells are trimmed. Extra columns are ignored.
 */

import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import { TABLE_COLUMNS } from '@/_domain';
import type {
  BidRow,
  GeneratorRow,
  InterconnectorRow,
  MarketInputs,
  PriceLevelRow,
  RegionDemandRow
} from '../types';
import { InputValidationError } from '../errors';

type TableName = keyof typeof TABLE_COLUMNS;
type RawRow = Record<string, string | undefined>;

export interface MarketTableSources {
  region_demand: string;
  generators: string;
  pricelevel: string;
  bids: string;
  interconnectors?: string;
}

export type MarketTablePaths = MarketTableSources;

/**
 * Parse one CSV table into raw string rows, checking required headers
 */
function parseTable(table: TableName, csv: string): RawRow[] {
  const parsed = Papa.parse<RawRow>(csv, {
    header: true,
    // pricelevel has one column, which delimiter detection cannot work with
    delimiter: ',',
    skipEmptyLines: 'greedy',
    transformHeader: header => header.trim(),
    transform: value => value.trim()
  });

  if (parsed.errors.length > 0) {
    const details = parsed.errors.map(e =>
      e.row !== undefined ? `${table} row ${e.row + 1}: ${e.message}` : `${table}: ${e.message}`
    );
    throw new InputValidationError(`Could not parse ${table} table`, details);
  }

  const headers = parsed.meta.fields ?? [];
  const missing = TABLE_COLUMNS[table].filter(column => !headers.includes(column));
  if (missing.length > 0) {
    throw new InputValidationError(
      `${table} table is missing column(s): ${missing.join(', ')}`,
      [`found columns: ${headers.join(', ') || '(none)'}`]
    );
  }

  return parsed.data;
}

/**
 * Row accessor that reports the table, 1-based data row and column on failure
 */
function cellReader(table: TableName, row: RawRow, index: number) {
  const where = (column: string) => `${table} row ${index + 1}, column ${column}`;

  return {
    text(column: string): string {
      const value = row[column] ?? '';
      if (value === '') {
        throw new InputValidationError(`Empty value at ${where(column)}`);
      }
      return value;
    },
    number(column: string): number {
      const raw = row[column] ?? '';
      const value = Number(raw);
      if (raw === '' || !Number.isFinite(value)) {
        throw new InputValidationError(`Expected a number at ${where(column)}, got "${raw}"`);
      }
      return value;
    }
  };
}

function toRegionDemand(rows: RawRow[]): RegionDemandRow[] {
  return rows.map((row, i) => {
    const cell = cellReader('region_demand', row, i);
    return { region: cell.text('region'), demand: cell.number('demand') };
  });
}

function toGenerators(rows: RawRow[]): GeneratorRow[] {
  return rows.map((row, i) => {
    const cell = cellReader('generators', row, i);
    return {
      region: cell.text('region'),
      generator_name: cell.text('generator_name'),
      nameplate_capacity: cell.number('nameplate_capacity')
    };
  });
}

function toPriceLevels(rows: RawRow[]): PriceLevelRow[] {
  return rows.map((row, i) => {
    const cell = cellReader('pricelevel', row, i);
    return { pricelevel: cell.number('pricelevel') };
  });
}

function toBids(rows: RawRow[]): BidRow[] {
  return rows.map((row, i) => {
    const cell = cellReader('bids', row, i);
    return {
      generator_name: cell.text('generator_name'),
      pricelevel: cell.number('pricelevel'),
      bid_capacity: cell.number('bid_capacity')
    };
  });
}

function toInterconnectors(rows: RawRow[]): InterconnectorRow[] {
  return rows.map((row, i) => {
    const cell = cellReader('interconnectors', row, i);
    return {
      interconnector_id: cell.text('interconnector_id'),
      region_start: cell.text('region_start'),
      region_end: cell.text('region_end'),
      interconnector_capacity: cell.number('interconnector_capacity')
    };
  });
}

/**
 * Parse CSV text for each table into MarketInputs
 */
export function parseMarketTables(sources: MarketTableSources): MarketInputs {
  return {
    region_demand: toRegionDemand(parseTable('region_demand', sources.region_demand)),
    generators: toGenerators(parseTable('generators', sources.generators)),
    pricelevel: toPriceLevels(parseTable('pricelevel', sources.pricelevel)),
    bids: toBids(parseTable('bids', sources.bids)),
    interconnectors: sources.interconnectors === undefined
      ? []
      : toInterconnectors(parseTable('interconnectors', sources.interconnectors))
  };
}

/**
 * Read the CSV files and parse them
 */
export async function loadMarketTables(paths: MarketTablePaths): Promise<MarketInputs> {
  const [regionDemand, generators, pricelevel, bids, interconnectors] = await Promise.all([
    readFile(paths.region_demand, 'utf8'),
    readFile(paths.generators, 'utf8'),
    readFile(paths.pricelevel, 'utf8'),
    readFile(paths.bids, 'utf8'),
    paths.interconnectors === undefined ? Promise.resolve(undefined) : readFile(paths.interconnectors, 'utf8')
  ]);

  return parseMarketTables({
    region_demand: regionDemand,
    generators,
    pricelevel,
    bids,
    interconnectors
  });
}
