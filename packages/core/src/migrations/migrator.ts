/**
 * Versioned, reversible schema migrations.
 *
 * The applied version lives in a one-row `schema_version` table. Every step
 * runs in its own transaction together with the version update, so a failed
 * step leaves the schema exactly at the last committed version.
 */

import type Database from 'better-sqlite3';
import { MigrationError, errorMessage, type MigrationDirection } from '../errors.js';
import { MIGRATIONS, type Migration } from './registry.js';

export interface MigrationStep {
  readonly migration: Migration;
  readonly direction: MigrationDirection;
  readonly fromVersion: number;
  readonly toVersion: number;
}

/**
 * Result of running migrations
 */
export interface MigrationResult {
  /** Previous schema version */
  readonly fromVersion: number;
  /** New schema version */
  readonly toVersion: number;
  /** Versions whose `up` or `down` ran, in execution order */
  readonly applied: readonly number[];
  readonly direction: MigrationDirection | null;
}

/** Versions must be positive integers in strictly increasing order */
export function validateMigrations(migrations: readonly Migration[]): void {
  let previous = 0;
  for (const migration of migrations) {
    const { version } = migration;
    if (!Number.isSafeInteger(version) || version <= 0) {
      throw new MigrationError(`Migration version ${version} is not a positive integer`, {
        version, direction: 'up', reachedVersion: 0,
      });
    }
    if (version <= previous) {
      const problem = version === previous ? 'is duplicated' : `comes after ${previous}`;
      throw new MigrationError(`Migration version ${version} ${problem}`, {
        version, direction: 'up', reachedVersion: 0,
      });
    }
    previous = version;
  }
}

function latestOf(migrations: readonly Migration[]): number {
  return migrations[migrations.length - 1]?.version ?? 0;
}

/**
 * Work out the steps that take the schema from `current` to `target`.
 *
 * Upgrading runs `current < v <= target` ascending. Downgrading runs
 * `target < v <= current` descending, each step landing on the previous
 * registered version (or 0). An empty plan means nothing to do.
 */
export function planMigration(
  current: number,
  target: number,
  migrations: readonly Migration[],
): MigrationStep[] {
  validateMigrations(migrations);
  const versions = migrations.map(m => m.version);
  const latest = latestOf(migrations);

  if (current > latest) {
    throw new MigrationError(
      `Schema version ${current} is newer than the latest known version ${latest}`,
      { version: current, direction: 'up', reachedVersion: current },
    );
  }
  if (current !== 0 && !versions.includes(current)) {
    throw new MigrationError(`Schema version ${current} is not a known migration`, {
      version: current, direction: 'up', reachedVersion: current,
    });
  }
  if (target !== 0 && !versions.includes(target)) {
    throw new MigrationError(`Target version ${target} is not a known migration`, {
      version: target, direction: target > current ? 'up' : 'down', reachedVersion: current,
    });
  }

  if (target > current) {
    const steps: MigrationStep[] = [];
    let from = current;
    for (const migration of migrations) {
      if (migration.version <= current || migration.version > target) continue;
      steps.push({ migration, direction: 'up', fromVersion: from, toVersion: migration.version });
      from = migration.version;
    }
    return steps;
  }

  const steps: MigrationStep[] = [];
  for (let i = migrations.length - 1; i >= 0; i--) {
    const migration = migrations[i]!;
    if (migration.version > current || migration.version <= target) continue;
    const toVersion = migrations[i - 1]?.version ?? 0;
    steps.push({ migration, direction: 'down', fromVersion: migration.version, toVersion });
  }
  return steps;
}

export class Migrator {
  readonly migrations: readonly Migration[];
  private readonly raw: Database.Database;

  constructor(raw: Database.Database, migrations: readonly Migration[] = MIGRATIONS) {
    validateMigrations(migrations);
    this.raw = raw;
    this.migrations = migrations;
    this.ensureVersionTable();
  }

  get latestVersion(): number {
    return latestOf(this.migrations);
  }

  currentVersion(): number {
    const row = this.raw.prepare<[], { version: number }>('SELECT version FROM schema_version').get();
    return row?.version ?? 0;
  }

  /** Migrations not yet applied, oldest first */
  pending(): Migration[] {
    const current = this.currentVersion();
    return this.migrations.filter(m => m.version > current);
  }

  /**
   * Move the schema to `target`, one transaction per step. Stops at the
   * first failing step and raises MigrationError naming the version reached.
   */
  migrateTo(target: number): MigrationResult {
    const fromVersion = this.currentVersion();
    const steps = planMigration(fromVersion, target, this.migrations);

    const applied: number[] = [];
    for (const step of steps) {
      this.apply(step);
      applied.push(step.migration.version);
    }

    return {
      fromVersion,
      toVersion: this.currentVersion(),
      applied,
      direction: steps[0]?.direction ?? null,
    };
  }

  /** Apply every pending migration. Never downgrades. */
  migrateToLatest(): MigrationResult {
    return this.migrateTo(this.latestVersion);
  }

  private apply(step: MigrationStep): void {
    const { migration, direction, toVersion } = step;
    const run = this.raw.transaction(() => {
      this.raw.exec(direction === 'up' ? migration.up : migration.down);
      this.raw.prepare('UPDATE schema_version SET version = ?').run(toVersion);
    });

    try {
      run();
    } catch (err: unknown) {
      throw new MigrationError(
        `Migration ${migration.version} (${migration.description}) failed going ${direction}: ${errorMessage(err)}`,
        { version: migration.version, direction, reachedVersion: this.currentVersion() },
        err,
      );
    }
  }

  private ensureVersionTable(): void {
    const run = this.raw.transaction(() => {
      this.raw.exec('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER NOT NULL)');
      const row = this.raw.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM schema_version').get();
      if (!row || row.n === 0) {
        this.raw.prepare('INSERT INTO schema_version (version) VALUES (0)').run();
      }
    });
    run();
  }
}
