export {
  initPool,
  closePool,
  getPool,
  withTransaction,
  runInTransaction,
  isStoreUnavailableError,
  asClient,
  type Queryable,
  type PoolOptions,
  type TransactionClient,
  type ConnectionSource,
} from './client';
export { applyMigrations, MIGRATIONS_DIR } from './migrations';
export { PgUserRepository } from './repositories/user-repository';
export { PgCommunityRepository } from './repositories/community-repository';
export { PgMembershipRepository } from './repositories/membership-repository';
export { PgInviteCodeRepository } from './repositories/invite-code-repository';
