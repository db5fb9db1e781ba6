import { sql } from "drizzle-orm";
import { afterAll, beforeAll, beforeEach } from "vitest";
import { MEMORY_DATA_DIR } from "../src/config.js";
import { type Database, openDatabase } from "../src/database.js";
import { initializeStore } from "../src/services/article-service.js";

let database: Database;

beforeAll(async () => {
  database = await openDatabase({
    databaseUrl: "",
    dataDir: MEMORY_DATA_DIR,
    environment: "test",
  });
  await initializeStore(database.db);
}, 60000);

afterAll(async () => {
  await database.close();
});

beforeEach(async () => {
  await database.db.execute(sql`TRUNCATE articles`);
});

export function getTestDb() {
  return database.db;
}
