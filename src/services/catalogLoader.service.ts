import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { ZodError } from 'zod';
import { buildCatalog, type PlanningCatalog } from '../domains/planning';
import {
  CATALOG_SCHEMA_VERSION,
  currentInventoryDocumentSchema,
  itemParametersDocumentSchema,
  salesForecastsDocumentSchema,
  salesHistoryDocumentSchema,
  type CatalogDocuments
} from '../schemas/catalog.schema';

export type CatalogSource = 'sales_history' | 'item_parameters' | 'current_inventory' | 'sales_forecasts';

export type CatalogIssue = {
  source: CatalogSource;
  index: number | null;
  path: string;
  message: string;
};

export class CatalogLoadError extends Error {
  code: 'CATALOG_INVALID' | 'CATALOG_FILE_MISSING';
  schemaVersion: number;
  issues: CatalogIssue[];

  constructor(code: CatalogLoadError['code'], issues: CatalogIssue[]) {
    super(code);
    this.name = 'CatalogLoadError';
    this.code = code;
    this.schemaVersion = CATALOG_SCHEMA_VERSION;
    this.issues = issues;
  }
}

export const CATALOG_FILES: Record<CatalogSource, string> = {
  sales_history: 'sales_history.json',
  item_parameters: 'item_parameters.json',
  current_inventory: 'current_inventory.json',
  sales_forecasts: 'sales_forecasts_n12.json'
};

function toIssues(source: CatalogSource, error: ZodError): CatalogIssue[] {
  return error.issues.map((issue) => {
    const index = issue.path.find((segment): segment is number => typeof segment === 'number');
    return {
      source,
      index: index ?? null,
      path: issue.path.join('.'),
      message: issue.message
    };
  });
}

/**
 * Validates the four catalog documents and assembles the planning catalog.
 * Every problem across all documents is reported at once; nothing is
 * loaded when any document is malformed.
 */
export function loadCatalog(documents: CatalogDocuments): PlanningCatalog {
  const issues: CatalogIssue[] = [];

  const salesHistory = salesHistoryDocumentSchema.safeParse(documents.salesHistory);
  if (!salesHistory.success) issues.push(...toIssues('sales_history', salesHistory.error));

  const itemParams = itemParametersDocumentSchema.safeParse(documents.itemParameters);
  if (!itemParams.success) issues.push(...toIssues('item_parameters', itemParams.error));

  const inventory = currentInventoryDocumentSchema.safeParse(documents.currentInventory);
  if (!inventory.success) issues.push(...toIssues('current_inventory', inventory.error));

  const forecasts = salesForecastsDocumentSchema.safeParse(documents.salesForecasts ?? {});
  if (!forecasts.success) issues.push(...toIssues('sales_forecasts', forecasts.error));

  if (!salesHistory.success || !itemParams.success || !inventory.success || !forecasts.success) {
    throw new CatalogLoadError('CATALOG_INVALID', issues);
  }

  return buildCatalog({
    salesHistory: salesHistory.data,
    itemParams: itemParams.data,
    currentInventory: inventory.data,
    salesForecasts: forecasts.data
  });
}

async function readJsonFile(source: CatalogSource, dir: string): Promise<unknown> {
  const fileName = CATALOG_FILES[source];
  let text: string;
  try {
    text = await readFile(path.join(dir, fileName), 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return undefined;
    throw error;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
    throw new CatalogLoadError('CATALOG_INVALID', [
      { source, index: null, path: fileName, message: `Malformed JSON: ${error.message}` }
    ]);
  }
}

export async function readCatalogDirectory(dir: string): Promise<CatalogDocuments> {
  const [salesHistory, itemParameters, currentInventory, salesForecasts] = await Promise.all([
    readJsonFile('sales_history', dir),
    readJsonFile('item_parameters', dir),
    readJsonFile('current_inventory', dir),
    readJsonFile('sales_forecasts', dir)
  ]);

  const missing: CatalogIssue[] = [];
  const required: Array<[CatalogSource, unknown]> = [
    ['sales_history', salesHistory],
    ['item_parameters', itemParameters],
    ['current_inventory', currentInventory]
  ];
  for (const [source, document] of required) {
    if (document === undefined) {
      missing.push({ source, index: null, path: CATALOG_FILES[source], message: 'File not found.' });
    }
  }
  if (missing.length > 0) {
    throw new CatalogLoadError('CATALOG_FILE_MISSING', missing);
  }

  return { salesHistory, itemParameters, currentInventory, salesForecasts: salesForecasts ?? {} };
}

export async function loadCatalogFromDirectory(dir: string): Promise<PlanningCatalog> {
  return loadCatalog(await readCatalogDirectory(dir));
}
