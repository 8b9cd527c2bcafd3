// Column helpers shared by Repo implementations

import { ValidationError, type Entity } from '@armature/runtime';
import type { RepoParams, RepoRecord } from './repo.js';

/**
 * Keep the entity's columns, in column order. Missing values are left out.
 */
export function toRow(entity: Entity, data: RepoRecord): RepoRecord {
  const columns = entity.columns();
  const values = entity.values(data);
  const row: RepoRecord = {};
  columns.forEach((column, index) => {
    if (values[index] !== undefined) {
      row[column] = values[index];
    }
  });
  return row;
}

/**
 * Check that every key names a column of the entity.
 *
 * @throws ValidationError for unknown columns
 */
export function assertColumns(entity: Entity, keys: string[]): void {
  const columns = entity.columns();
  const unknown = keys.find((key) => !columns.includes(key));
  if (unknown !== undefined) {
    throw new ValidationError(`Unknown column ${unknown} for entity ${entity.type}`, {
      field: unknown,
      code: 'UNKNOWN_COLUMN',
    });
  }
}

/**
 * Filters for update and delete must name at least one column.
 *
 * @throws ValidationError for empty or unknown filters
 */
export function assertFilter(entity: Entity, params: RepoParams): void {
  const keys = Object.keys(params);
  if (keys.length === 0) {
    throw new ValidationError(`Refusing to change every ${entity.type} record without a filter`, {
      code: 'EMPTY_FILTER',
    });
  }
  assertColumns(entity, keys);
}
