import { getLogger } from '../utils/logger.js';
import { toError } from '../../../shared/errors.js';

const logger = getLogger('Migrations');

export interface Migration<C = unknown> {
  version: number;
  description: string;
  /** Must be safe to re-run: IF NOT EXISTS tables, guarded ADD COLUMN. */
  apply(connection: C): void;
}

/**
 * Applies migrations newer than the recorded version in ascending version
 * order, regardless of registration order.
 *
 * A failing migration is logged and rethrown. Earlier migrations in the run
 * stay applied and have already been reported through `onApplied`.
 */
export class MigrationManager<C> {
  private readonly migrations: Migration<C>[];

  constructor(migrations: Migration<C>[]) {
    const seen = new Set<number>();
    for (const m of migrations) {
      if (seen.has(m.version)) {
        throw new Error(`Duplicate migration version ${m.version}`);
      }
      seen.add(m.version);
    }
    this.migrations = [...migrations].sort((a, b) => a.version - b.version);
  }

  pending(currentVersion: number): Migration<C>[] {
    return this.migrations.filter(m => m.version > currentVersion);
  }

  latestVersion(): number {
    const last = this.migrations[this.migrations.length - 1];
    return last ? last.version : 0;
  }

  apply(connection: C, currentVersion: number, onApplied?: (version: number) => void): number {
    let newVersion = currentVersion;

    for (const migration of this.pending(currentVersion)) {
      try {
        logger.info(`Applying migration ${migration.version}`, { description: migration.description });
        migration.apply(connection);
        newVersion = migration.version;
        onApplied?.(newVersion);
      } catch (error) {
        logger.error(`Migration ${migration.version} failed`, toError(error), {
          lastAppliedVersion: newVersion,
        });
        throw error;
      }
    }

    return newVersion;
  }
}

export function applyMigrations<C>(connection: C, currentVersion: number, migrations: Migration<C>[]): number {
  return new MigrationManager(migrations).apply(connection, currentVersion);
}
