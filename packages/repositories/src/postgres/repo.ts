// Postgres Repo
//
// Statements are built with drizzle's sql template so table and column names
// are quoted identifiers and every value is a bound parameter.

import { sql, type SQL } from 'drizzle-orm';
import { ValidationError, type Entity, type RuntimeConfig } from '@armature/runtime';
import { assertColumns, assertFilter, toRow } from '../interfaces/columns.js';
import type { Repo, RepoParams, RepoRecord } from '../interfaces/repo.js';
import { createDatabase, createQueryRunner, type QueryRunner } from './db.js';

const COMMA = sql`, `;

function identifiers(names: string[]): SQL {
  return sql.join(
    names.map((name) => sql.identifier(name)),
    COMMA
  );
}

function where(params: RepoParams): SQL {
  const entries = Object.entries(params);
  if (entries.length === 0) {
    return sql``;
  }
  const conditions = entries.map(([column, value]) => sql`${sql.identifier(column)} = ${value}`);
  return sql` where ${sql.join(conditions, sql` and `)}`;
}

export function insertQuery(entity: Entity, row: RepoRecord): SQL {
  const columns = Object.keys(row);
  const values = sql.join(
    columns.map((column) => sql`${row[column]}`),
    COMMA
  );
  return sql`insert into ${sql.identifier(entity.tableName())} (${identifiers(columns)}) values (${values}) returning *`;
}

export function updateQuery(entity: Entity, changes: RepoRecord, params: RepoParams): SQL {
  const assignments = sql.join(
    Object.entries(changes).map(([column, value]) => sql`${sql.identifier(column)} = ${value}`),
    COMMA
  );
  return sql`update ${sql.identifier(entity.tableName())} set ${assignments}${where(params)} returning *`;
}

export function deleteQuery(entity: Entity, params: RepoParams): SQL {
  return sql`delete from ${sql.identifier(entity.tableName())}${where(params)} returning *`;
}

export function selectQuery(entity: Entity, params: RepoParams = {}, limit?: number): SQL {
  const query = sql`select ${identifiers(entity.columns())} from ${sql.identifier(entity.tableName())}${where(params)}`;
  return limit === undefined ? query : sql`${query} limit ${limit}`;
}

export class PgRepo implements Repo {
  constructor(private runner: QueryRunner) {}

  async save(entity: Entity, data: RepoRecord): Promise<RepoRecord> {
    entity.validate(data);
    const [row] = await this.runner.run(insertQuery(entity, toRow(entity, data)));
    return row ?? toRow(entity, data);
  }

  async update(entity: Entity, data: RepoRecord, params: RepoParams): Promise<RepoRecord[]> {
    entity.validate(data, { partial: true });
    assertFilter(entity, params);
    const changes = toRow(entity, data);
    if (Object.keys(changes).length === 0) {
      return this.findAll(entity, params);
    }
    return this.runner.run(updateQuery(entity, changes, params));
  }

  async delete(entity: Entity, params: RepoParams): Promise<number> {
    assertFilter(entity, params);
    const rows = await this.runner.run(deleteQuery(entity, params));
    return rows.length;
  }

  async find(entity: Entity, params: RepoParams): Promise<RepoRecord | null> {
    assertColumns(entity, Object.keys(params));
    const [row] = await this.runner.run(selectQuery(entity, params, 1));
    return row ?? null;
  }

  async findAll(entity: Entity, params: RepoParams = {}): Promise<RepoRecord[]> {
    assertColumns(entity, Object.keys(params));
    return this.runner.run(selectQuery(entity, params));
  }
}

/**
 * Connect a PgRepo to DATABASE_URL. The caller owns the returned client and
 * ends it on shutdown.
 *
 * @throws ValidationError when no database URL is configured
 */
export function createPgRepoFromConfig(
  config: Pick<RuntimeConfig, 'databaseUrl'>,
  options: { maxConnections?: number } = {}
) {
  if (!config.databaseUrl) {
    throw new ValidationError('DATABASE_URL is required for the Postgres repo', {
      field: 'DATABASE_URL',
    });
  }
  const { db, client } = createDatabase({
    connectionString: config.databaseUrl,
    maxConnections: options.maxConnections,
  });
  return { repo: new PgRepo(createQueryRunner(db)), client };
}
