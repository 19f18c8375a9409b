import { loadEnv } from "../config/env";
import { createPool } from "./pool";
import { runMigrations } from "./migrationRunner";

const env = loadEnv();
const pool = createPool(env.DATABASE_URL);

async function main(): Promise<void> {
  const applied = await runMigrations(pool);
  if (applied.length === 0) {
    console.log("No new migrations to apply.");
  } else {
    console.log(`Applied migrations: ${applied.join(", ")}`);
  }
}

main()
  .catch((error) => {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
