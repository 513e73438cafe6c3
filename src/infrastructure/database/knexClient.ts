import knex, { Knex } from "knex";
import * as initialSchema from "./migrations/001_status_pipeline";

export type DbClient = Knex;

interface NamedMigration extends Knex.Migration {
  name: string;
}

const MIGRATIONS: NamedMigration[] = [{ name: "001_status_pipeline", ...initialSchema }];

/**
 * Migrations are compiled in rather than read from a directory, so the same
 * list runs from sources under test and from dist/ in production.
 */
class BundledMigrationSource implements Knex.MigrationSource<NamedMigration> {
  async getMigrations(): Promise<NamedMigration[]> {
    return MIGRATIONS;
  }

  getMigrationName(migration: NamedMigration): string {
    return migration.name;
  }

  async getMigration(migration: NamedMigration): Promise<Knex.Migration> {
    return migration;
  }
}

export const createDb = (connectionString: string): DbClient =>
  knex({
    client: "pg",
    connection: connectionString,
    pool: { min: 0, max: 10 },
  });

export const runMigrations = async (db: DbClient): Promise<void> => {
  await db.migrate.latest({ migrationSource: new BundledMigrationSource() });
};

export const closeDb = async (db: DbClient): Promise<void> => {
  await db.destroy();
};
