// api/src/scripts/seed.ts
import fs from "fs";
import path from "path";
import { z } from "zod";
import { pool } from "../db";

const panelTemplate = z.object({
  name: z.string(),
  manufacturer: z.string(),
  model: z.string(),
  series: z.string().nullable().default(null),
  rows: z.number().int().min(1),
  slots_per_row: z.number().int().min(1),
  voltage: z.number().nullable().default(null),
  max_current: z.number().nullable().default(null),
  description: z.string().nullable().default(null),
});

const deviceTemplate = z.object({
  name: z.string(),
  manufacturer: z.string(),
  model: z.string(),
  series: z.string().nullable().default(null),
  device_type: z.string(),
  category: z.string(),
  slots_required: z.number().int().min(1),
  width_in_modules: z.number().positive(),
  rated_current: z.number().nullable().default(null),
  description: z.string().nullable().default(null),
});

const catalogSchema = z.object({
  panel_templates: z.array(panelTemplate),
  device_templates: z.array(deviceTemplate),
});

/** Upserts the starter catalog by (manufacturer, model). Existing slot spans are never rewritten. */
async function seed() {
  const catalogPath = path.join(__dirname, "../../sql/seed-catalog.json");
  const catalog = catalogSchema.parse(JSON.parse(fs.readFileSync(catalogPath, "utf8")));

  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    for (const t of catalog.panel_templates) {
      await client.query(
        `INSERT INTO panel_templates (name, manufacturer, model, series, rows, slots_per_row, voltage, max_current, description)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         ON CONFLICT (manufacturer, model) DO UPDATE SET name = EXCLUDED.name, description = EXCLUDED.description`,
        [t.name, t.manufacturer, t.model, t.series, t.rows, t.slots_per_row, t.voltage, t.max_current, t.description]
      );
    }
    for (const t of catalog.device_templates) {
      await client.query(
        `INSERT INTO device_templates (name, manufacturer, model, series, device_type, category, slots_required,
           width_in_modules, rated_current, description)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         ON CONFLICT (manufacturer, model) DO UPDATE SET name = EXCLUDED.name, description = EXCLUDED.description`,
        [
          t.name,
          t.manufacturer,
          t.model,
          t.series,
          t.device_type,
          t.category,
          t.slots_required,
          t.width_in_modules,
          t.rated_current,
          t.description,
        ]
      );
    }
    await client.query("COMMIT");
    console.log(
      `✅ Seeded ${catalog.panel_templates.length} panel templates and ${catalog.device_templates.length} device templates`
    );
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

void seed()
  .catch((err) => {
    console.error("❌ Seed failed:", err);
    process.exitCode = 1;
  })
  .finally(() => pool.end().catch((err) => console.error("[pg] pool shutdown failed:", err)));
