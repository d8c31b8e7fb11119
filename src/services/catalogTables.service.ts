import { csvRecords, parseCsv } from '../lib/csv';
import { toOptionalNumber } from '../lib/numbers';
import type { CatalogDocuments } from '../schemas/catalog.schema';
import { CatalogLoadError, type CatalogIssue, type CatalogSource } from './catalogLoader.service';

type TableRow = Record<string, string>;

export type CatalogTables = {
  salesHistory: string;
  itemParameters: string;
  currentInventory: string;
  salesForecasts?: string;
};

export const REQUIRED_COLUMNS: Record<CatalogSource, string[]> = {
  sales_history: ['month', 'item_id', 'actual_sales_qty'],
  item_parameters: ['item_id', 'item_name', 'supplier'],
  current_inventory: ['item_id', 'current_stock_qty'],
  sales_forecasts: ['item_id', 'month', 'forecasted_sales_qty']
};

const ITEM_NUMERIC_COLUMNS = [
  'order_lead_time_days',
  'minimum_order_qty',
  'order_multiple',
  'unit_cost',
  'shelf_life_days',
  'safety_stock_days',
  'max_stock_cover_months'
];

const TRUTHY = new Set(['1', 'TRUE', 'T', 'YES', 'Y']);

function wholeOrZero(value: string | undefined): number {
  return Math.trunc(toOptionalNumber(value) ?? 0);
}

function readTable(source: CatalogSource, text: string): { rows: TableRow[]; issue: CatalogIssue | null } {
  const parsed = parseCsv(text);
  const missing = REQUIRED_COLUMNS[source].filter((column) => !parsed.headers.includes(column));
  if (missing.length > 0) {
    return {
      rows: [],
      issue: { source, index: null, path: '', message: `Missing columns: ${missing.join(', ')}` }
    };
  }
  return { rows: csvRecords(parsed), issue: null };
}

function salesHistoryRows(rows: TableRow[]) {
  return rows.map((row) => ({
    month: row.month,
    item_id: row.item_id,
    item_name: row.item_name ?? '',
    actual_sales_qty: wholeOrZero(row.actual_sales_qty),
    stock_available: 'stock_available' in row ? TRUTHY.has(row.stock_available.toUpperCase()) : true,
    lost_sales_qty: wholeOrZero(row.lost_sales_qty),
    unit_price: toOptionalNumber(row.unit_price) ?? 0,
    category: row.category ?? ''
  }));
}

function itemParameterRows(rows: TableRow[]) {
  return rows.map((row) => {
    const record: Record<string, string | number | null> = {
      item_id: row.item_id,
      item_name: row.item_name,
      supplier: row.supplier,
      category: row.category ?? null,
      segment: row.segment ?? null
    };
    for (const column of ITEM_NUMERIC_COLUMNS) {
      // A column left out of the file keeps the loader default; an empty cell is "absent".
      if (column in row) record[column] = toOptionalNumber(row[column]);
    }
    return record;
  });
}

function currentInventoryRows(rows: TableRow[]) {
  return rows.map((row) => ({
    item_id: row.item_id,
    current_stock_qty: wholeOrZero(row.current_stock_qty),
    in_transit_qty: wholeOrZero(row.in_transit_qty),
    in_transit_arrival_date: row.in_transit_arrival_date ? row.in_transit_arrival_date : null,
    committed_qty: wholeOrZero(row.committed_qty)
  }));
}

type ForecastDocumentRow = {
  month: string;
  forecasted_sales_qty: number;
  forecast_source: string;
  confidence_score: number;
};

function salesForecastMap(rows: TableRow[]): Record<string, ForecastDocumentRow[]> {
  const byItem = new Map<string, ForecastDocumentRow[]>();
  for (const row of rows) {
    const pool = byItem.get(row.item_id) ?? [];
    pool.push({
      month: row.month,
      forecasted_sales_qty: wholeOrZero(row.forecasted_sales_qty),
      forecast_source: row.forecast_source ?? '',
      confidence_score: toOptionalNumber(row.confidence_score) ?? 0.7
    });
    byItem.set(row.item_id, pool);
  }
  return Object.fromEntries(byItem);
}

/**
 * Turns uploaded CSV tables into catalog documents, coercing numbers the
 * way spreadsheet exports need. Missing required columns in any table fail
 * the whole conversion.
 */
export function catalogDocumentsFromCsv(tables: CatalogTables): CatalogDocuments {
  const sales = readTable('sales_history', tables.salesHistory);
  const items = readTable('item_parameters', tables.itemParameters);
  const inventory = readTable('current_inventory', tables.currentInventory);
  const forecasts =
    tables.salesForecasts !== undefined
      ? readTable('sales_forecasts', tables.salesForecasts)
      : { rows: [], issue: null };

  const issues = [sales.issue, items.issue, inventory.issue, forecasts.issue].filter(
    (issue): issue is CatalogIssue => issue !== null
  );
  if (issues.length > 0) {
    throw new CatalogLoadError('CATALOG_INVALID', issues);
  }

  return {
    salesHistory: salesHistoryRows(sales.rows),
    itemParameters: itemParameterRows(items.rows),
    currentInventory: currentInventoryRows(inventory.rows),
    salesForecasts: salesForecastMap(forecasts.rows)
  };
}
