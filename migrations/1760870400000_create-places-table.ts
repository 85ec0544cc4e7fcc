import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('places', {
    id: { type: 'serial', primaryKey: true },
    city: { type: 'varchar(80)', notNull: true },
    county: { type: 'varchar(80)' },
    country: { type: 'varchar(80)', notNull: true },
  });

  // Population summaries group on country
  pgm.createIndex('places', 'country', { name: 'idx_places_country' });
};

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('places');
};
