import path from 'node:path';
import { describe, it, expect, afterEach } from 'vitest';
import { ConfigurationError, DataSchemaError } from '@branchlens/shared';
import { buildAnalyticsConfig } from '../config';
import {
  LazyTable,
  createDataContext,
  createFileDataContext,
  getDataContext,
  loadedTables,
  parseTableCsv,
  setDataContext,
  tablePath,
} from '../data/data-context';
import { TABLE_DEFINITIONS } from '../data/tables';

const FIXTURES = path.join(__dirname, 'fixtures');

function fixtureContext() {
  return createFileDataContext(buildAnalyticsConfig({ BRANCHLENS_DATA_DIR: FIXTURES, LOG_LEVEL: 'error' }));
}

describe('LazyTable', () => {
  it('loads once and returns the same frozen rows', () => {
    let calls = 0;
    const table = new LazyTable('numbers', () => {
      calls++;
      return [1, 2, 3];
    });
    expect(table.isLoaded).toBe(false);
    const first = table.get();
    expect(table.get()).toBe(first);
    expect(calls).toBe(1);
    expect(Object.isFrozen(first)).toBe(true);
    expect(table.isLoaded).toBe(true);
  });

  it('rejects re-entry while loading', () => {
    const table: LazyTable<number> = new LazyTable('loop', () => table.get());
    expect(() => table.get()).toThrow('Table loop requested while it is still loading');
    expect(table.isLoaded).toBe(false);
  });

  it('retries after a failed load', () => {
    let fail = true;
    const table = new LazyTable('flaky', () => {
      if (fail) throw new Error('disk');
      return ['ok'];
    });
    expect(() => table.get()).toThrow('disk');
    fail = false;
    expect(table.get()).toEqual(['ok']);
  });
});

describe('parseTableCsv', () => {
  const def = TABLE_DEFINITIONS.monthlySales;

  it('names the missing columns', () => {
    expect(() => parseTableCsv('monthlySales', def, 'branch,month\nHarbor,October\n')).toThrow(
      new DataSchemaError('monthlySales', 'missing required column(s): year, total'),
    );
  });

  it('reports the first bad row by file line', () => {
    const csv = 'branch,month,year,total\nHarbor,October,2025,10\nHarbor,Octember,2025,20\n';
    try {
      parseTableCsv('monthlySales', def, csv);
      throw new Error('expected a schema error');
    } catch (err) {
      expect(err).toBeInstanceOf(DataSchemaError);
      if (!(err instanceof DataSchemaError)) return;
      expect(err.message).toBe('monthlySales: invalid row at line 3');
      expect(err.details).toEqual([{ field: 'month', message: 'Unknown month name' }]);
    }
  });

  it('turns a CSV parse failure into a schema error', () => {
    expect(() => parseTableCsv('monthlySales', def, '')).toThrow(
      'monthlySales: File is empty (no header row)',
    );
  });

  it('fills short rows with empty cells', () => {
    expect(parseTableCsv('monthlySales', def, 'branch,month,year,total\nHarbor,May,2025\n')).toEqual([
      { branch: 'Harbor', month: 'May', monthIndex: 4, year: 2025, total: 0 },
    ]);
  });
});

describe('createFileDataContext', () => {
  it('resolves processed and external paths under the data directory', () => {
    const config = buildAnalyticsConfig({ BRANCHLENS_DATA_DIR: FIXTURES });
    expect(tablePath(config, TABLE_DEFINITIONS.attendance)).toBe(
      path.join(FIXTURES, 'processed', 'time_attendance.csv'),
    );
    expect(tablePath(config, TABLE_DEFINITIONS.candidateAreas)).toBe(
      path.join(FIXTURES, 'external', 'candidate_areas.csv'),
    );
  });

  it('loads tables lazily on first access', () => {
    const ctx = fixtureContext();
    expect(loadedTables(ctx)).toEqual([]);
    expect(ctx.monthlySales.get()).toEqual([
      { branch: 'Harbor', month: 'October', monthIndex: 9, year: 2025, total: 1300 },
      { branch: 'Harbor', month: 'September', monthIndex: 8, year: 2025, total: 1200.5 },
      { branch: 'Main Street', month: 'October', monthIndex: 9, year: 2025, total: 0 },
    ]);
    expect(loadedTables(ctx)).toEqual(['monthlySales']);
  });

  it('normalises attendance dates, hours and shift labels', () => {
    expect(fixtureContext().attendance.get()).toEqual([
      { empId: 'E1', branch: 'Harbor', punchInDate: '2025-12-01', punchInHour: 8, durationHours: 7.5, shift: null },
      { empId: 'E2', branch: 'Harbor', punchInDate: '2025-12-01', punchInHour: 18, durationHours: 6, shift: 'evening' },
      { empId: 'E3', branch: 'Main Street', punchInDate: '2025-12-02', punchInHour: null, durationHours: 4, shift: null },
    ]);
  });

  it('reads the external candidate areas and ignores extra columns', () => {
    expect(fixtureContext().candidateAreas.get()).toEqual([
      {
        area: 'Riverside',
        governorate: 'North',
        population: 200000,
        universityNearby: true,
        footTrafficTier: 4,
        rentTier: 2,
        cafeDensity: 'medium',
        chainPresent: false,
      },
      {
        area: 'Old Town',
        governorate: 'North',
        population: 80000,
        universityNearby: false,
        footTrafficTier: 3,
        rentTier: 3,
        cafeDensity: 'high',
        chainPresent: true,
      },
    ]);
  });

  it('fails with a configuration error when a file is missing', () => {
    const ctx = fixtureContext();
    expect(() => ctx.basketLines.get()).toThrow(ConfigurationError);
    expect(() => ctx.basketLines.get()).toThrow(
      `basket_lines.csv not found at ${path.join(FIXTURES, 'processed', 'basket_lines.csv')}. ` +
        'Run the offline cleaning step or set BRANCHLENS_DATA_DIR.',
    );
    expect(loadedTables(ctx)).toEqual([]);
  });
});

describe('createDataContext', () => {
  afterEach(() => setDataContext(null));

  it('serves in-memory rows and fails on tables left out', () => {
    const ctx = createDataContext({ monthlySales: [] });
    expect(ctx.monthlySales.get()).toEqual([]);
    expect(() => ctx.itemSales.get()).toThrow('Table itemSales was not provided to the data context');
  });

  it('lets callers install a process-wide context', () => {
    const ctx = createDataContext({});
    setDataContext(ctx);
    expect(getDataContext()).toBe(ctx);
  });
});
