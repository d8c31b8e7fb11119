import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('plan_runs', {
    id: { type: 'uuid', primaryKey: true },
    started_at: { type: 'timestamptz', notNull: true },
    params_json: { type: 'jsonb', notNull: true },
    source_files: { type: 'jsonb', notNull: true, default: pgm.func("'[]'::jsonb") },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.createIndex('plan_runs', ['started_at'], { name: 'idx_plan_runs_started_at' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('plan_runs');
}
