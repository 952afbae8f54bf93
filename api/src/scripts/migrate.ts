// api/src/scripts/migrate.ts
import fs from "fs";
import path from "path";
import { pool } from "../db";

async function migrate() {
  const schemaPath = path.join(__dirname, "../../sql/schema.sql");
  const sql = fs.readFileSync(schemaPath, "utf8");

  console.log(`Applying ${path.relative(process.cwd(), schemaPath)}...`);
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    await client.query(sql);
    await client.query("COMMIT");
    console.log("✅ Schema is up to date");
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

void migrate()
  .catch((err) => {
    console.error("❌ Migration failed:", err);
    process.exitCode = 1;
  })
  .finally(() => pool.end().catch((err) => console.error("[pg] pool shutdown failed:", err)));
