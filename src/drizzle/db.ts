import type { PgDatabase } from "drizzle-orm/pg-core";
import { drizzle as drizzlePglite } from "drizzle-orm/pglite";
import { migrate as migratePglite } from "drizzle-orm/pglite/migrator";
import { drizzle as drizzlePostgres } from "drizzle-orm/postgres-js";
import { migrate as migratePostgres } from "drizzle-orm/postgres-js/migrator";
import postgres from "postgres";
import { getEnvConfig } from "@/lib/config/env.schema";
import { logger } from "@/lib/logger";
import * as schema from "./schema";

export type DbInstance = PgDatabase<any, typeof schema>;

interface DbHandle {
  instance: DbInstance;
  /** Applies a drizzle-kit migrations folder with the driver's own migrator */
  migrate: (migrationsFolder: string) => Promise<void>;
  close: () => Promise<void>;
}

let handle: DbHandle | null = null;

function openEmbedded(dataDir: string): DbHandle {
  const instance = drizzlePglite({ connection: { dataDir }, schema });
  logger.info("[Database] Using embedded PGlite database", { dataDir });
  return {
    instance,
    migrate: (migrationsFolder) => migratePglite(instance, { migrationsFolder }),
    close: () => instance.$client.close(),
  };
}

function openPostgres(connectionString: string, isProduction: boolean): DbHandle {
  const env = getEnvConfig();
  const client = postgres(connectionString, {
    max: env.DB_POOL_MAX ?? (isProduction ? 20 : 10),
    idle_timeout: env.DB_POOL_IDLE_TIMEOUT ?? 20,
    connect_timeout: env.DB_POOL_CONNECT_TIMEOUT ?? 10,
  });
  const instance = drizzlePostgres(client, { schema });
  return {
    instance,
    migrate: (migrationsFolder) => migratePostgres(instance, { migrationsFolder }),
    close: () => client.end({ timeout: 5 }),
  };
}

function openHandle(): DbHandle {
  const env = getEnvConfig();
  const isProduction = env.NODE_ENV === "production";

  // The embedded database never backs a production deployment
  if (!isProduction && env.EMBEDDED_DB) {
    return openEmbedded(env.EMBEDDED_DB_DIR ?? "data/pglite");
  }

  if (!env.DSN) {
    throw new Error("DSN environment variable is not set");
  }

  return openPostgres(env.DSN, isProduction);
}

function getHandle(): DbHandle {
  if (!handle) {
    handle = openHandle();
  }

  return handle;
}

export function getDb(): DbInstance {
  return getHandle().instance;
}

export function applyMigrationFolder(migrationsFolder: string): Promise<void> {
  return getHandle().migrate(migrationsFolder);
}

/**
 * Closes the underlying connection pool. The next `getDb()` reconnects.
 */
export async function closeDb(): Promise<void> {
  if (!handle) return;

  const current = handle;
  handle = null;
  await current.close();
}

/**
 * Lazily connected handle; the connection is opened on first property access.
 */
export const db = new Proxy({} as DbInstance, {
  get(_target, prop, receiver) {
    const instance = getDb();
    const value = Reflect.get(instance, prop, receiver);

    return typeof value === "function" ? value.bind(instance) : value;
  },
});
