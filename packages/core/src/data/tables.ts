/**
 * Column contracts for the snapshot tables.
 *
 * Each table maps CSV header names onto zod column schemas and then onto a
 * typed camelCase record. A missing required column or a cell that does not
 * coerce is a DataSchemaError at load time, never a silent default.
 */

import { z } from 'zod';
import { monthIndex } from '@branchlens/shared';

// ── Records ──────────────────────────────────────────────────────────

export interface BasketLine {
  basketId: string;
  branch: string;
  customerName: string;
  item: string;
  qty: number;
  price: number;
  lineTotal: number;
  isCancellation: boolean;
  isModifier: boolean;
}

export interface MonthlySalesRow {
  branch: string;
  month: string;
  /** Zero-based calendar month (January = 0). */
  monthIndex: number;
  year: number;
  total: number;
}

export interface ChannelSalesRow {
  branch: string;
  channel: string;
  numCustomers: number;
  sales: number;
  avgPerCustomer: number;
}

export interface CustomerOrderRow {
  branch: string;
  customerName: string;
  numOrders: number;
  total: number;
}

export interface ItemSalesRow {
  branch: string;
  division: string;
  group: string;
  description: string;
  qty: number;
  totalAmount: number;
}

export interface DivisionChannelRow {
  /** Branch name; the source report calls it a section. */
  section: string;
  /** Division name, or `ITEMS` for the product total row. */
  item: string;
  delivery: number;
  table: number;
  takeAway: number;
  total: number;
}

export interface AttendanceRow {
  empId: string;
  branch: string;
  /** ISO date `YYYY-MM-DD`. */
  punchInDate: string;
  punchInHour: number | null;
  durationHours: number;
  shift: string | null;
}

export type CafeDensity = 'low' | 'medium' | 'high';

export interface CandidateAreaRow {
  area: string;
  governorate: string;
  population: number;
  universityNearby: boolean;
  footTrafficTier: number;
  rentTier: number;
  cafeDensity: CafeDensity;
  chainPresent: boolean;
}

export interface TableRows {
  basketLines: BasketLine;
  monthlySales: MonthlySalesRow;
  channelSales: ChannelSalesRow;
  customerOrders: CustomerOrderRow;
  itemSales: ItemSalesRow;
  divisionChannels: DivisionChannelRow;
  attendance: AttendanceRow;
  candidateAreas: CandidateAreaRow;
}

export type TableKey = keyof TableRows;

export const TABLE_KEYS = [
  'basketLines',
  'monthlySales',
  'channelSales',
  'customerOrders',
  'itemSales',
  'divisionChannels',
  'attendance',
  'candidateAreas',
] as const satisfies readonly TableKey[];

// ── Column Schemas ───────────────────────────────────────────────────

function toNumberCell(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const cleaned = value.replace(/,/g, '').trim();
  return cleaned === '' ? undefined : Number(cleaned);
}

const TRUE_FLAGS = new Set(['1', '1.0', 'true', 'yes', 'y']);
const FALSE_FLAGS = new Set(['0', '0.0', 'false', 'no', 'n', '']);

function toFlagCell(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const key = value.trim().toLowerCase();
  if (TRUE_FLAGS.has(key)) return true;
  if (FALSE_FLAGS.has(key)) return false;
  return value;
}

const SHORT_MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/** Accepts `YYYY-MM-DD` or `DD-Mon-YY(YY)`; returns ISO or null. */
export function normalizeDate(value: string): string | null {
  const v = value.trim();
  const iso = /^(\d{4})-(\d{2})-(\d{2})/.exec(v);
  if (iso) return `${iso[1]}-${iso[2]}-${iso[3]}`;
  const dmy = /^(\d{1,2})-([A-Za-z]{3})-(\d{2}|\d{4})$/.exec(v);
  if (!dmy) return null;
  const [, day = '', mon = '', yr = ''] = dmy;
  const month = SHORT_MONTHS.indexOf(mon.toLowerCase());
  if (month < 0) return null;
  const year = yr.length === 2 ? 2000 + Number(yr) : Number(yr);
  return `${year}-${String(month + 1).padStart(2, '0')}-${day.padStart(2, '0')}`;
}

/** Hour of a `HH.MM.SS` / `HH:MM` punch time, or null. */
export function parseHour(value: string): number | null {
  const match = /^(\d{1,2})[.:]\d{2}/.exec(value.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  return hour >= 0 && hour < 24 ? hour : null;
}

const text = z.string().trim();
const name = z.string().trim().min(1);
const numeric = z.preprocess(toNumberCell, z.number().finite());
/** Aggregate columns: an empty cell reads as 0. */
const amount = z.preprocess((v) => toNumberCell(v) ?? 0, z.number().finite());
const flag = z.preprocess(toFlagCell, z.boolean());
const tier = z.preprocess(toNumberCell, z.number().int().min(1).max(5));
const monthName = name.refine((v) => monthIndex(v) !== null, { message: 'Unknown month name' });
const isoDate = name.refine((v) => normalizeDate(v) !== null, { message: 'Unrecognised date' });
const density = text.toLowerCase().pipe(z.enum(['low', 'medium', 'high']));

// ── Definitions ──────────────────────────────────────────────────────

export type TableLocation = 'processed' | 'external';

export type RowParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; issues: Array<{ field: string; message: string }> };

export interface TableDefinition<T> {
  file: string;
  location: TableLocation;
  requiredColumns: string[];
  parseRow(raw: Record<string, string>): RowParseResult<T>;
}

function defineTable<S extends z.ZodRawShape, T>(def: {
  file: string;
  location: TableLocation;
  columns: S;
  optionalColumns?: ReadonlyArray<keyof S & string>;
  toRecord: (row: z.objectOutputType<S, z.ZodTypeAny, 'strip'>) => T;
}): TableDefinition<T> {
  const schema = z.object(def.columns);
  const optional = new Set<string>(def.optionalColumns ?? []);
  return {
    file: def.file,
    location: def.location,
    requiredColumns: Object.keys(def.columns).filter((c) => !optional.has(c)),
    parseRow(raw) {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        return {
          ok: false,
          issues: parsed.error.issues.map((i) => ({ field: i.path.join('.'), message: i.message })),
        };
      }
      return { ok: true, value: def.toRecord(parsed.data) };
    },
  };
}

export const TABLE_DEFINITIONS: { [K in TableKey]: TableDefinition<TableRows[K]> } = {
  basketLines: defineTable({
    file: 'basket_lines.csv',
    location: 'processed',
    columns: {
      basket_id: name,
      Branch: name,
      'Customer Name': text,
      'Item Description': name,
      Qty: amount,
      Price: amount,
      'Line Total': amount,
      'Is Cancellation': flag,
      Is_Modifier: flag,
    },
    toRecord: (r) => ({
      basketId: r.basket_id,
      branch: r.Branch,
      customerName: r['Customer Name'],
      item: r['Item Description'],
      qty: r.Qty,
      price: r.Price,
      lineTotal: r['Line Total'],
      isCancellation: r['Is Cancellation'],
      isModifier: r.Is_Modifier,
    }),
  }),

  monthlySales: defineTable({
    file: 'monthly_sales_by_branch.csv',
    location: 'processed',
    columns: { branch: name, month: monthName, year: numeric, total: amount },
    toRecord: (r) => ({
      branch: r.branch,
      month: r.month,
      monthIndex: monthIndex(r.month) ?? 0,
      year: r.year,
      total: r.total,
    }),
  }),

  channelSales: defineTable({
    file: 'avg_sales_by_menu_channel.csv',
    location: 'processed',
    columns: {
      branch: name,
      channel: name,
      num_customers: amount,
      sales: amount,
      avg_per_customer: amount,
    },
    toRecord: (r) => ({
      branch: r.branch,
      channel: r.channel,
      numCustomers: r.num_customers,
      sales: r.sales,
      avgPerCustomer: r.avg_per_customer,
    }),
  }),

  customerOrders: defineTable({
    file: 'customer_orders_delivery.csv',
    location: 'processed',
    columns: { branch: name, customer_name: text.optional(), num_orders: amount, total: amount },
    optionalColumns: ['customer_name'],
    toRecord: (r) => ({
      branch: r.branch,
      customerName: r.customer_name ?? '',
      numOrders: r.num_orders,
      total: r.total,
    }),
  }),

  itemSales: defineTable({
    file: 'sales_by_items_and_groups.csv',
    location: 'processed',
    columns: {
      branch: name,
      division: name,
      group: text.optional(),
      description: name,
      qty: amount,
      total_amount: amount,
    },
    optionalColumns: ['group'],
    toRecord: (r) => ({
      branch: r.branch,
      division: r.division,
      group: r.group ?? '',
      description: r.description,
      qty: r.qty,
      totalAmount: r.total_amount,
    }),
  }),

  divisionChannels: defineTable({
    file: 'summary_by_division_channel.csv',
    location: 'processed',
    columns: {
      section: name,
      item: name,
      delivery: amount,
      table: amount,
      take_away: amount,
      total: amount,
    },
    toRecord: (r) => ({
      section: r.section,
      item: r.item,
      delivery: r.delivery,
      table: r.table,
      takeAway: r.take_away,
      total: r.total,
    }),
  }),

  attendance: defineTable({
    file: 'time_attendance.csv',
    location: 'processed',
    columns: {
      'Emp ID': name,
      Branch: name,
      'Punch In Date': isoDate,
      'Punch In Time': text.optional(),
      'Duration Hours': amount,
      shift: text.optional(),
    },
    optionalColumns: ['Punch In Time', 'shift'],
    toRecord: (r) => ({
      empId: r['Emp ID'],
      branch: r.Branch,
      punchInDate: normalizeDate(r['Punch In Date']) ?? r['Punch In Date'],
      punchInHour: r['Punch In Time'] ? parseHour(r['Punch In Time']) : null,
      durationHours: r['Duration Hours'],
      shift: r.shift ? r.shift.toLowerCase() : null,
    }),
  }),

  candidateAreas: defineTable({
    file: 'candidate_areas.csv',
    location: 'external',
    columns: {
      area: name,
      governorate: text,
      estimated_population: numeric,
      university_nearby: flag,
      foot_traffic_tier: tier,
      commercial_rent_tier: tier,
      estimated_cafe_density: density,
      chain_present: flag,
    },
    toRecord: (r) => ({
      area: r.area,
      governorate: r.governorate,
      population: r.estimated_population,
      universityNearby: r.university_nearby,
      footTrafficTier: r.foot_traffic_tier,
      rentTier: r.commercial_rent_tier,
      cafeDensity: r.estimated_cafe_density,
      chainPresent: r.chain_present,
    }),
  }),
};
