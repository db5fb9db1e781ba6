import { mkdir } from "node:fs/promises";
import { PGlite } from "@electric-sql/pglite";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { drizzle as drizzlePglite } from "drizzle-orm/pglite";
import { drizzle as drizzlePostgres } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { type Config, MEMORY_DATA_DIR } from "./config.js";
import * as schema from "./db/schema/index.js";
import { StoreAccessError } from "./errors.js";

export type DB = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface Database {
  db: DB;
  close(): Promise<void>;
}

function openPostgres(config: Config): Database {
  const queryClient = postgres(config.databaseUrl, {
    max: 1,
    idle_timeout: 20,
    connect_timeout: 10,
    // CREATE TABLE IF NOT EXISTS raises a notice on every run
    onnotice: () => undefined,
  });

  return {
    db: drizzlePostgres(queryClient, { schema }),
    close: () => queryClient.end(),
  };
}

async function openEmbedded(config: Config): Promise<Database> {
  if (config.dataDir !== MEMORY_DATA_DIR) {
    await mkdir(config.dataDir, { recursive: true });
  }

  const client = new PGlite(config.dataDir);
  await client.waitReady;

  return {
    db: drizzlePglite(client, { schema }),
    close: () => client.close(),
  };
}

export async function openDatabase(config: Config): Promise<Database> {
  try {
    return config.databaseUrl ? openPostgres(config) : await openEmbedded(config);
  } catch (err) {
    const target = config.databaseUrl ? "the configured database" : config.dataDir;
    throw new StoreAccessError(`Could not open the article store at ${target}`, { cause: err });
  }
}

/**
 * Runs `fn` with a connection that is released on every exit path.
 */
export async function withDatabase<T>(config: Config, fn: (db: DB) => Promise<T>): Promise<T> {
  const database = await openDatabase(config);
  try {
    return await fn(database.db);
  } finally {
    await database.close();
  }
}
