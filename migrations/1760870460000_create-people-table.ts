import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('people', {
    id: { type: 'serial', primaryKey: true },
    given_name: { type: 'varchar(80)', notNull: true },
    family_name: { type: 'varchar(80)', notNull: true },
    date_of_birth: { type: 'varchar(80)' },
    place_of_birth_id: { type: 'integer', references: 'places(id)' },
  });

  pgm.createIndex('people', 'place_of_birth_id', {
    name: 'idx_people_place_of_birth_id',
  });
};

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('people');
};
