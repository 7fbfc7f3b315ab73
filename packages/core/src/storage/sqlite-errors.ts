import Database from 'better-sqlite3';
import { ValidationError } from '../errors.js';

export function isSqliteError(err: unknown): err is Error & { code: string } {
  return err instanceof Database.SqliteError;
}

/**
 * Turn a constraint violation into a ValidationError. Everything else is
 * returned as is.
 */
export function mapSqliteError(err: unknown): unknown {
  if (!isSqliteError(err) || !err.code.startsWith('SQLITE_CONSTRAINT')) return err;

  if (err.code === 'SQLITE_CONSTRAINT_UNIQUE' || err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
    if (err.message.includes('categories.name')) {
      return new ValidationError('A category with that name already exists', { field: 'name' }, err);
    }
    if (err.message.includes('idx_tasks_live_title')) {
      return new ValidationError('A task with that title already exists in the category', { field: 'title' }, err);
    }
    return new ValidationError('Duplicate value', {}, err);
  }
  if (err.code === 'SQLITE_CONSTRAINT_CHECK') {
    return new ValidationError(`Value rejected by the store: ${err.message}`, {}, err);
  }
  return new ValidationError(`Constraint violated: ${err.message}`, {}, err);
}
