import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('plan_run_lines', {
    id: { type: 'uuid', primaryKey: true },
    plan_run_id: { type: 'uuid', notNull: true, references: 'plan_runs', onDelete: 'CASCADE' },
    forecast_month: { type: 'text', notNull: true },
    sku: { type: 'text', notNull: true },
    item_name: { type: 'text' },
    supplier: { type: 'text' },
    demand: { type: 'numeric(18,6)', notNull: true },
    order_qty: { type: 'numeric(18,6)', notNull: true },
    unit_cost: { type: 'numeric(18,6)', notNull: true },
    total_cost: { type: 'numeric(18,6)', notNull: true },
    notes: { type: 'text' },
    metadata_json: { type: 'jsonb' }
  });

  pgm.addConstraint('plan_run_lines', 'unique_plan_run_lines_scope', {
    unique: ['plan_run_id', 'sku', 'forecast_month']
  });

  pgm.addConstraint('plan_run_lines', 'chk_plan_run_lines_quantities', {
    check:
      'demand >= 0 AND order_qty >= 0 AND unit_cost >= 0 AND total_cost >= 0 AND ' +
      "forecast_month ~ '^[0-9]{4}-[0-9]{2}$'"
  });

  pgm.createIndex('plan_run_lines', ['sku'], { name: 'idx_plan_run_lines_sku' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('plan_run_lines');
}
