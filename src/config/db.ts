import { Pool } from "pg";
import type { DatabaseSettings } from "./settings";

export function createPool(settings: DatabaseSettings): Pool {
  const pool = settings.connectionString
    ? new Pool({ connectionString: settings.connectionString })
    : new Pool({
        host: settings.host,
        port: settings.port,
        user: settings.user,
        password: settings.password,
        database: settings.database,
        ssl: settings.ssl ? { rejectUnauthorized: false } : undefined
      });

  pool.on("error", (error: Error) => {
    console.error("Unexpected PostgreSQL error", error);
  });

  return pool;
}
