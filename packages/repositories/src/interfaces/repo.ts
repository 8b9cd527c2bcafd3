import type { Entity } from '@armature/runtime';

/**
 * A stored row, keyed by column
 */
export type RepoRecord = Record<string, unknown>;

/**
 * Equality filter on columns, e.g. { id: 'c-1' }
 */
export type RepoParams = Record<string, unknown>;

/**
 * Storage contract for declared entities.
 *
 * Writes validate against the entity schema first and throw
 * DataValidationError on bad data. A missing record is not an error:
 * find resolves to null.
 */
export interface Repo {
  /**
   * Insert a record. Only the entity's columns are stored.
   */
  save(entity: Entity, data: RepoRecord): Promise<RepoRecord>;

  /**
   * Set the given columns on every record matching `params`.
   * Returns the updated records.
   */
  update(entity: Entity, data: RepoRecord, params: RepoParams): Promise<RepoRecord[]>;

  /**
   * Delete every record matching `params`. Returns how many were removed.
   */
  delete(entity: Entity, params: RepoParams): Promise<number>;

  /**
   * First record matching `params`, or null.
   */
  find(entity: Entity, params: RepoParams): Promise<RepoRecord | null>;

  /**
   * Every record matching `params`; all records without params.
   */
  findAll(entity: Entity, params?: RepoParams): Promise<RepoRecord[]>;
}
