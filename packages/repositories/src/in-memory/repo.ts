// In-memory Repo for development and testing
//
// Rows live in a map keyed by table name. Data does not persist between
// restarts.

import type { Entity } from '@armature/runtime';
import { assertColumns, assertFilter, toRow } from '../interfaces/columns.js';
import type { Repo, RepoParams, RepoRecord } from '../interfaces/repo.js';

function matches(row: RepoRecord, params: RepoParams): boolean {
  return Object.entries(params).every(([key, value]) => row[key] === value);
}

export function createInMemoryRepo(): Repo & { clear(): void; tables(): string[] } {
  const tables = new Map<string, RepoRecord[]>();

  function rowsOf(entity: Entity): RepoRecord[] {
    const table = entity.tableName();
    const rows = tables.get(table) ?? [];
    tables.set(table, rows);
    return rows;
  }

  function select(entity: Entity, params: RepoParams = {}): RepoRecord[] {
    assertColumns(entity, Object.keys(params));
    return rowsOf(entity).filter((row) => matches(row, params));
  }

  return {
    async save(entity: Entity, data: RepoRecord): Promise<RepoRecord> {
      entity.validate(data);
      const row = toRow(entity, data);
      rowsOf(entity).push(row);
      return { ...row };
    },

    async update(entity: Entity, data: RepoRecord, params: RepoParams): Promise<RepoRecord[]> {
      entity.validate(data, { partial: true });
      assertFilter(entity, params);
      const changes = toRow(entity, data);
      const updated: RepoRecord[] = [];

      for (const row of select(entity, params)) {
        Object.assign(row, changes);
        updated.push({ ...row });
      }

      return updated;
    },

    async delete(entity: Entity, params: RepoParams): Promise<number> {
      assertFilter(entity, params);
      const rows = rowsOf(entity);
      const kept = rows.filter((row) => !matches(row, params));
      tables.set(entity.tableName(), kept);
      return rows.length - kept.length;
    },

    async find(entity: Entity, params: RepoParams): Promise<RepoRecord | null> {
      const [row] = select(entity, params);
      return row ? { ...row } : null;
    },

    async findAll(entity: Entity, params?: RepoParams): Promise<RepoRecord[]> {
      return select(entity, params).map((row) => ({ ...row }));
    },

    clear() {
      tables.clear();
    },

    tables() {
      return Array.from(tables.keys());
    },
  };
}
