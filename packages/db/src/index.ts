export { initPool, closePool, getPool, withTransaction } from './client';
export { checkDatabase } from './health';
export { PgUserRepository } from './repositories/user-repository';
