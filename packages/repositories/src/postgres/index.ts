export {
  createDatabase,
  createQueryRunner,
  type Database,
  type DatabaseConfig,
  type QueryRunner,
} from './db.js';
export {
  PgRepo,
  createPgRepoFromConfig,
  deleteQuery,
  insertQuery,
  selectQuery,
  updateQuery,
} from './repo.js';
