/* eslint-disable no-console */
import { config } from 'dotenv';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { getPlanningDefaults, type PlanningDefaults } from '../src/config/planningDefaults';
import { isMonthKey, monthOf } from '../src/lib/months';
import { loadCatalogFromDirectory } from '../src/services/catalogLoader.service';
import { toCsvExport, toJsonExport } from '../src/services/planExport.service';
import { generatePurchasePlan, resolvePlanParameters, summarizePlan } from '../src/services/purchasePlan.service';
import { planParamsSchema, type PlanParamsInput } from '../src/schemas/planning.schema';

export type GeneratePlanOptions = {
  dataDir: string;
  out: string | null;
  params: PlanParamsInput;
};

function readOption(name: string, argv: string[]): string | undefined {
  const direct = `--${name}`;
  const index = argv.findIndex((entry) => entry === direct || entry.startsWith(`${direct}=`));
  if (index < 0) return undefined;
  const entry = argv[index];
  if (entry.includes('=')) return entry.slice(entry.indexOf('=') + 1);
  const next = argv[index + 1];
  if (next === undefined || next.startsWith('--')) {
    throw new Error(`Missing value for ${direct}`);
  }
  return next;
}

function hasFlag(name: string, argv: string[]): boolean {
  return argv.includes(`--${name}`);
}

function parseNumberOption(name: string, argv: string[]): number | undefined {
  const raw = readOption(name, argv);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`--${name} must be a number, got "${raw}"`);
  }
  return parsed;
}

export function parseGeneratePlanArgs(
  argv: string[] = process.argv.slice(2),
  defaults: PlanningDefaults = getPlanningDefaults(),
  today: Date = new Date()
): GeneratePlanOptions {
  const startMonth = readOption('start', argv) ?? monthOf(today);
  if (!isMonthKey(startMonth)) {
    throw new Error(`--start must be YYYY-MM, got "${startMonth}"`);
  }
  const out = readOption('out', argv) ?? null;
  if (out !== null && !/\.(json|csv)$/i.test(out)) {
    throw new Error('--out must end in .json or .csv');
  }

  return {
    dataDir: readOption('data-dir', argv) ?? defaults.dataDir,
    out,
    params: planParamsSchema.parse({
      startMonth,
      numMonths: parseNumberOption('months', argv),
      serviceLevel: parseNumberOption('service-level', argv),
      reviewPeriodDays: parseNumberOption('review-days', argv),
      includeInTransit: hasFlag('no-in-transit', argv) ? false : undefined
    })
  };
}

export async function run(options: GeneratePlanOptions) {
  const catalog = await loadCatalogFromDirectory(options.dataDir);
  const params = resolvePlanParameters(options.params);
  const rows = generatePurchasePlan(catalog, params);
  console.log(JSON.stringify({ params, summary: summarizePlan(rows) }, null, 2));

  if (options.out) {
    const target = path.resolve(options.out);
    const body = target.toLowerCase().endsWith('.csv')
      ? toCsvExport(rows)
      : `${JSON.stringify(toJsonExport(rows), null, 2)}\n`;
    await writeFile(target, body, 'utf8');
    console.log(JSON.stringify({ event: 'purchase_plan_exported', path: target, rowCount: rows.length }));
  }
}

if (require.main === module) {
  config();
  Promise.resolve()
    .then(() => run(parseGeneratePlanArgs()))
    .then(() => process.exit(0))
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}
