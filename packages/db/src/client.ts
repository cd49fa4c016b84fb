import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';

export type Database = PostgresJsDatabase<typeof schema>;

let instance: Database | null = null;
let client: postgres.Sql | null = null;

function getDb(): Database {
  if (!instance) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) {
      throw new Error('DATABASE_URL environment variable is required');
    }
    // The access tables are read once at startup and written one entity at a
    // time afterwards, so a small pool is enough.
    client = postgres(connectionString, {
      max: parseInt(process.env.DB_POOL_MAX || '2', 10),
      idle_timeout: 20,
      max_lifetime: 300,
      connect_timeout: 10,
      onnotice: (notice) => {
        console.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
      },
    });
    instance = drizzle(client, { schema });
  }
  return instance;
}

/** Lazily connected handle; the pool is created on first property access. */
export const db: Database = new Proxy({} as Database, {
  get(_target, prop) {
    const target = getDb();
    const value = Reflect.get(target, prop, target);
    if (typeof value === 'function') {
      return value.bind(target);
    }
    return value;
  },
});

export async function closeDb(): Promise<void> {
  if (client) {
    await client.end();
  }
  client = null;
  instance = null;
}

export { schema };
