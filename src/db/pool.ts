import { Pool } from "pg";

export function createPool(databaseUrl: string): Pool {
  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: databaseUrl.includes("sslmode=require") ? { rejectUnauthorized: false } : undefined,
  });

  pool.on("error", (err) => {
    console.error("[Store] Idle Postgres client error:", err);
  });

  return pool;
}
