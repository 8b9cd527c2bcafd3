// @armature/repositories
// Repo implementations for declared entities.
//
// The Repo interface is the storage contract; the in-memory and Postgres
// implementations fulfill it, so components can depend on Repo alone.

export * from './interfaces/index.js';
export * as memory from './in-memory/index.js';
export * as postgres from './postgres/index.js';
