export { db, closeDb, schema } from './client';
export type { Database } from './client';
export * from './schema';
