import { Pool } from "pg";

export function createPool(databaseUrl: string): Pool {
  // Hosted Postgres asks for SSL through the URL; local and internal URLs do not.
  const useSsl = /sslmode=require/.test(databaseUrl);
  return new Pool({
    connectionString: databaseUrl,
    ...(useSsl && { ssl: { rejectUnauthorized: true } })
  });
}

export async function assertDatabaseConnection(pool: Pool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query("SELECT 1");
  } finally {
    client.release();
  }
}
