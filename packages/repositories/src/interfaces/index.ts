// Repo interfaces
// The storage contract for declared entities, independent of the backing store.

export type { Repo, RepoParams, RepoRecord } from './repo.js';
export { assertColumns, assertFilter, toRow } from './columns.js';
