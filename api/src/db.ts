// api/src/db.ts
import { Pool } from "pg";
import { env } from "./env";
import { PgPanelStore } from "./lib/panels/pgStore";

// Avoid creating multiple pools in dev (hot-reload) by caching on global
declare global {
  // eslint-disable-next-line no-var
  var __PG_POOL__: Pool | undefined;
}

const pool =
  global.__PG_POOL__ ??
  new Pool({
    connectionString: env.DATABASE_URL,
    max: env.PG_POOL_MAX,
  });

pool.on("error", (err) => {
  console.error("[pg] idle client error:", err);
});

if (env.NODE_ENV !== "production") {
  global.__PG_POOL__ = pool;
}

export { pool };
export const panelStore = new PgPanelStore(pool);
export default panelStore;
