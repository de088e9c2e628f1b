import "dotenv/config";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import { createDatabase } from "../src";

/**
 * Applies the SQL migrations generated by `drizzle-kit generate` into
 * `packages/db/migrations`. Run once per deploy, before the API starts.
 */
async function run() {
  const { db, pool } = createDatabase(process.env.DATABASE_URL);
  try {
    await migrate(db, { migrationsFolder: "./migrations" });
    console.log("Database migrations applied successfully.");
  } finally {
    await pool.end();
  }
}

run().catch((error: unknown) => {
  console.error("Migration failed:", error);
  process.exit(1);
});
