import { existsSync } from "node:fs";
import path from "node:path";
import { generateDrizzleJson, generateMigration } from "drizzle-kit/api";
import { and, eq, sql } from "drizzle-orm";
import { pgSchema, varchar } from "drizzle-orm/pg-core";
import { applyMigrationFolder, type DbInstance, getDb } from "@/drizzle/db";
import * as schema from "@/drizzle/schema";
import { logger, toLogError } from "@/lib/logger";

const informationSchema = pgSchema("information_schema");

const catalogTables = informationSchema.table("tables", {
  tableSchema: varchar("table_schema"),
  tableName: varchar("table_name"),
});

export function defaultMigrationsFolder(): string {
  return path.join(process.cwd(), "drizzle");
}

async function hasLibrarySchema(database: DbInstance): Promise<boolean> {
  const rows = await database
    .select({ tableName: catalogTables.tableName })
    .from(catalogTables)
    .where(and(eq(catalogTables.tableSchema, "public"), eq(catalogTables.tableName, "users")))
    .limit(1);

  return rows.length > 0;
}

/**
 * Creates every table, enum and index of `@/drizzle/schema` on a database that
 * has none of them yet. The DDL is diffed from the schema module by drizzle-kit,
 * so it cannot drift from the table definitions.
 *
 * @returns true when the schema was created, false when `users` already existed
 */
export async function ensureSchema(database: DbInstance = getDb()): Promise<boolean> {
  if (await hasLibrarySchema(database)) {
    return false;
  }

  const empty = generateDrizzleJson({});
  const target = generateDrizzleJson(schema, empty.id);
  const statements = await generateMigration(empty, target);

  await database.transaction(async (tx) => {
    for (const statement of statements) {
      await tx.execute(sql.raw(statement));
    }
  });

  logger.info("[Migrate] Created library schema", { statements: statements.length });
  return true;
}

/**
 * Applies the drizzle-kit migrations folder when one has been generated
 * (`npm run db:generate`), otherwise bootstraps an empty database from the schema.
 */
export async function runMigrations(migrationsFolder = defaultMigrationsFolder()): Promise<void> {
  if (!existsSync(path.join(migrationsFolder, "meta", "_journal.json"))) {
    await ensureSchema();
    return;
  }

  logger.info("[Migrate] Applying migrations", { migrationsFolder });
  try {
    await applyMigrationFolder(migrationsFolder);
  } catch (error) {
    logger.error("[Migrate] Migration failed", { migrationsFolder, error: toLogError(error) });
    throw error;
  }
  logger.info("[Migrate] Migrations completed");
}
