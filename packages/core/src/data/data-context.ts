/**
 * DataContext — one lazily loaded, memoized handle per snapshot table.
 *
 * Engines receive a DataContext instead of reading files themselves. The
 * first `get()` on a table reads and validates it; later calls return the
 * same frozen array for the lifetime of the context. Loading is
 * synchronous, so the first load cannot interleave with another caller on
 * the single JS thread; re-entry during a load is rejected.
 */

import fs from 'node:fs';
import path from 'node:path';
import { ConfigurationError, DataSchemaError } from '@branchlens/shared';
import { getAnalyticsConfig } from '../config';
import type { AnalyticsConfig } from '../config';
import { logger, setLogLevel } from '../observability/logger';
import { isParseError, parseCsv } from './csv-parser';
import { TABLE_DEFINITIONS, TABLE_KEYS } from './tables';
import type { TableDefinition, TableKey, TableRows } from './tables';

// ── LazyTable ────────────────────────────────────────────────────────

export class LazyTable<T> {
  private rows: readonly T[] | null = null;
  private loading = false;

  constructor(
    readonly name: string,
    private readonly loader: () => readonly T[],
  ) {}

  get(): readonly T[] {
    if (this.rows) return this.rows;
    if (this.loading) {
      throw new ConfigurationError(`Table ${this.name} requested while it is still loading`);
    }
    this.loading = true;
    try {
      this.rows = Object.freeze([...this.loader()]);
    } finally {
      this.loading = false;
    }
    return this.rows;
  }

  get isLoaded(): boolean {
    return this.rows !== null;
  }
}

export type DataContext = { readonly [K in TableKey]: LazyTable<TableRows[K]> };

export type TableSources = { [K in TableKey]?: readonly TableRows[K][] };

// ── CSV Loading ──────────────────────────────────────────────────────

export function tablePath(config: AnalyticsConfig, def: TableDefinition<unknown>): string {
  const dir = def.location === 'external' ? config.externalDir : config.processedDir;
  return path.join(dir, def.file);
}

/** Parse and validate CSV text against a table contract. */
export function parseTableCsv<T>(name: string, def: TableDefinition<T>, content: string): T[] {
  const parsed = parseCsv(content);
  if (isParseError(parsed)) {
    throw new DataSchemaError(name, parsed.message);
  }

  const missing = def.requiredColumns.filter((c) => !parsed.headers.includes(c));
  if (missing.length > 0) {
    throw new DataSchemaError(
      name,
      `missing required column(s): ${missing.join(', ')}`,
      missing.map((c) => ({ field: c, message: 'Required column is absent' })),
    );
  }

  const records: T[] = [];
  parsed.rows.forEach((cells, i) => {
    const raw: Record<string, string> = {};
    parsed.headers.forEach((h, col) => {
      raw[h] = cells[col] ?? '';
    });
    const result = def.parseRow(raw);
    if (!result.ok) {
      // +2: header is line 1
      throw new DataSchemaError(name, `invalid row at line ${i + 2}`, result.issues);
    }
    records.push(result.value);
  });
  return records;
}

export function loadTableFile<T>(name: string, def: TableDefinition<T>, filePath: string): T[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(
      `${def.file} not found at ${filePath}. Run the offline cleaning step or set BRANCHLENS_DATA_DIR.`,
    );
  }
  const start = Date.now();
  const records = parseTableCsv(name, def, fs.readFileSync(filePath, 'utf-8'));
  logger.info('Loaded snapshot table', {
    table: name,
    rows: records.length,
    durationMs: Date.now() - start,
  });
  return records;
}

// ── Factories ────────────────────────────────────────────────────────

function fileTable<K extends TableKey>(key: K, config: AnalyticsConfig): LazyTable<TableRows[K]> {
  const def: TableDefinition<TableRows[K]> = TABLE_DEFINITIONS[key];
  return new LazyTable(key, () => loadTableFile(key, def, tablePath(config, def)));
}

function memoryTable<K extends TableKey>(
  key: K,
  rows: readonly TableRows[K][] | undefined,
): LazyTable<TableRows[K]> {
  return new LazyTable(key, () => {
    if (!rows) throw new ConfigurationError(`Table ${key} was not provided to the data context`);
    return rows;
  });
}

/** Context backed by the CSV snapshots under `config.dataDir`. */
export function createFileDataContext(config: AnalyticsConfig = getAnalyticsConfig()): DataContext {
  return {
    basketLines: fileTable('basketLines', config),
    monthlySales: fileTable('monthlySales', config),
    channelSales: fileTable('channelSales', config),
    customerOrders: fileTable('customerOrders', config),
    itemSales: fileTable('itemSales', config),
    divisionChannels: fileTable('divisionChannels', config),
    attendance: fileTable('attendance', config),
    candidateAreas: fileTable('candidateAreas', config),
  };
}

/** Context backed by in-memory rows; tables left out fail on first access. */
export function createDataContext(sources: TableSources): DataContext {
  return {
    basketLines: memoryTable('basketLines', sources.basketLines),
    monthlySales: memoryTable('monthlySales', sources.monthlySales),
    channelSales: memoryTable('channelSales', sources.channelSales),
    customerOrders: memoryTable('customerOrders', sources.customerOrders),
    itemSales: memoryTable('itemSales', sources.itemSales),
    divisionChannels: memoryTable('divisionChannels', sources.divisionChannels),
    attendance: memoryTable('attendance', sources.attendance),
    candidateAreas: memoryTable('candidateAreas', sources.candidateAreas),
  };
}

export function loadedTables(ctx: DataContext): TableKey[] {
  return TABLE_KEYS.filter((k) => ctx[k].isLoaded);
}

// ── Process-wide Instance ────────────────────────────────────────────

let instance: DataContext | null = null;

export function getDataContext(): DataContext {
  if (!instance) {
    const config = getAnalyticsConfig();
    setLogLevel(config.logLevel);
    instance = createFileDataContext(config);
  }
  return instance;
}

export function setDataContext(ctx: DataContext | null): void {
  instance = ctx;
}
