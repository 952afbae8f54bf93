// api/src/lib/panels/pgStore.ts
import { DatabaseError, type Pool, type PoolClient } from "pg";
import type { NewSlot, Slot, SlotPatch } from "panel-shared";
import { PanelError, PersistenceError } from "./errors";
import type {
  DeviceTemplateFilter,
  DeviceTemplateRecord,
  PanelChanges,
  PanelInsert,
  PanelRecord,
  PanelStore,
  PanelTemplateRecord,
  PanelTx,
  WireChanges,
  WireInsert,
  WireRecord,
} from "./store";

const SLOT_COLUMNS = `id, panel_id, slot_number, "row", "column", is_occupied, device_template_id,
  spans_slots, device_label, current_setting, custom_properties`;

const PANEL_COLUMNS = `id, name, panel_template_id, manufacturer, model, rows, slots_per_row,
  voltage, current_rating, description, created_at, updated_at`;

const WIRE_COLUMNS = `id, panel_id, label, wire_type, cross_section, color, source_slot_id,
  destination_slot_id, external_source, external_destination, length, orphaned`;

/** Writable slot columns; keys of SlotPatch["changes"]. */
const SLOT_PATCH_COLUMNS = [
  "is_occupied",
  "device_template_id",
  "spans_slots",
  "device_label",
  "current_setting",
  "custom_properties",
] as const;

const WIRE_CHANGE_COLUMNS = [
  "label",
  "wire_type",
  "cross_section",
  "color",
  "source_slot_id",
  "destination_slot_id",
  "external_source",
  "external_destination",
  "length",
  "orphaned",
] as const;

const PANEL_CHANGE_COLUMNS = ["name", "voltage", "current_rating", "description"] as const;

interface PanelRow extends Omit<PanelRecord, "created_at" | "updated_at"> {
  created_at: Date;
  updated_at: Date | null;
}

function toPanel(row: PanelRow): PanelRecord {
  return {
    ...row,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at ? row.updated_at.toISOString() : null,
  };
}

/** jsonb parameters go over the wire as text so arrays are not mistaken for pg arrays. */
function param(column: string, value: unknown): unknown {
  if (column === "custom_properties" && value !== null && value !== undefined) return JSON.stringify(value);
  return value;
}

function quoteIdent(column: string): string {
  return `"${column}"`;
}

/** Builds `"a" = $2, "b" = $3` for the keys present in `changes`, in `allowed` order. */
function setClause<K extends string>(
  allowed: readonly K[],
  changes: Partial<Record<K, unknown>>,
  firstIndex: number
): { sql: string; values: unknown[] } {
  const parts: string[] = [];
  const values: unknown[] = [];
  for (const column of allowed) {
    if (!(column in changes)) continue;
    const value = changes[column];
    if (value === undefined) continue;
    values.push(param(column, value));
    const cast = column === "custom_properties" ? "::jsonb" : "";
    parts.push(`${quoteIdent(column)} = $${firstIndex + values.length - 1}${cast}`);
  }
  return { sql: parts.join(", "), values };
}

class PgPanelTx implements PanelTx {
  constructor(private readonly client: PoolClient) {}

  async lockPanelSlots(panelId: number): Promise<Slot[]> {
    const { rows } = await this.client.query<Slot>(
      `SELECT ${SLOT_COLUMNS} FROM panel_slots WHERE panel_id = $1 ORDER BY slot_number FOR UPDATE`,
      [panelId]
    );
    return rows;
  }

  async listSlots(panelId: number): Promise<Slot[]> {
    const { rows } = await this.client.query<Slot>(
      `SELECT ${SLOT_COLUMNS} FROM panel_slots WHERE panel_id = $1 ORDER BY slot_number`,
      [panelId]
    );
    return rows;
  }

  async findSlot(slotId: number): Promise<Slot | null> {
    const { rows } = await this.client.query<Slot>(`SELECT ${SLOT_COLUMNS} FROM panel_slots WHERE id = $1`, [slotId]);
    return rows[0] ?? null;
  }

  async updateSlots(patches: readonly SlotPatch[]): Promise<void> {
    for (const patch of patches) {
      const set = setClause(SLOT_PATCH_COLUMNS, patch.changes, 2);
      if (!set.values.length) continue;
      await this.client.query(`UPDATE panel_slots SET ${set.sql} WHERE id = $1`, [patch.id, ...set.values]);
    }
  }

  async insertSlots(slots: readonly NewSlot[]): Promise<Slot[]> {
    if (!slots.length) return [];
    const values: unknown[] = [];
    const tuples = slots.map((slot) => {
      values.push(slot.panel_id, slot.slot_number, slot.row, slot.column);
      const base = values.length - 3;
      return `($${base}, $${base + 1}, $${base + 2}, $${base + 3})`;
    });
    const { rows } = await this.client.query<Slot>(
      `INSERT INTO panel_slots (panel_id, slot_number, "row", "column")
       VALUES ${tuples.join(", ")}
       RETURNING ${SLOT_COLUMNS}`,
      values
    );
    return rows.sort((a, b) => a.slot_number - b.slot_number);
  }

  async findDeviceTemplate(id: number): Promise<DeviceTemplateRecord | null> {
    const { rows } = await this.client.query<DeviceTemplateRecord>(`SELECT * FROM device_templates WHERE id = $1`, [id]);
    return rows[0] ?? null;
  }

  async listDeviceTemplates(filter: DeviceTemplateFilter = {}): Promise<DeviceTemplateRecord[]> {
    const where: string[] = [];
    const values: unknown[] = [];
    if (filter.manufacturer) {
      values.push(filter.manufacturer);
      where.push(`lower(manufacturer) = lower($${values.length})`);
    }
    if (filter.category) {
      values.push(filter.category);
      where.push(`category = $${values.length}`);
    }
    if (filter.device_type) {
      values.push(filter.device_type);
      where.push(`device_type = $${values.length}`);
    }
    if (filter.active_only) where.push("is_active");
    const { rows } = await this.client.query<DeviceTemplateRecord>(
      `SELECT * FROM device_templates ${where.length ? `WHERE ${where.join(" AND ")}` : ""} ORDER BY manufacturer, name`,
      values
    );
    return rows;
  }

  async findPanelTemplate(id: number): Promise<PanelTemplateRecord | null> {
    const { rows } = await this.client.query<PanelTemplateRecord>(`SELECT * FROM panel_templates WHERE id = $1`, [id]);
    return rows[0] ?? null;
  }

  async listPanelTemplates(activeOnly = false): Promise<PanelTemplateRecord[]> {
    const { rows } = await this.client.query<PanelTemplateRecord>(
      `SELECT * FROM panel_templates ${activeOnly ? "WHERE is_active" : ""} ORDER BY manufacturer, rows * slots_per_row`
    );
    return rows;
  }

  async insertPanel(input: PanelInsert): Promise<PanelRecord> {
    const { rows } = await this.client.query<PanelRow>(
      `INSERT INTO panels (name, panel_template_id, manufacturer, model, rows, slots_per_row, voltage, current_rating, description)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING ${PANEL_COLUMNS}`,
      [
        input.name,
        input.panel_template_id,
        input.manufacturer,
        input.model,
        input.rows,
        input.slots_per_row,
        input.voltage,
        input.current_rating,
        input.description,
      ]
    );
    return toPanel(rows[0]);
  }

  async findPanel(id: number): Promise<PanelRecord | null> {
    const { rows } = await this.client.query<PanelRow>(`SELECT ${PANEL_COLUMNS} FROM panels WHERE id = $1`, [id]);
    return rows[0] ? toPanel(rows[0]) : null;
  }

  async listPanels(skip: number, limit: number): Promise<PanelRecord[]> {
    const { rows } = await this.client.query<PanelRow>(
      `SELECT ${PANEL_COLUMNS} FROM panels ORDER BY id OFFSET $1 LIMIT $2`,
      [skip, limit]
    );
    return rows.map(toPanel);
  }

  async updatePanel(id: number, changes: PanelChanges): Promise<PanelRecord | null> {
    const set = setClause(PANEL_CHANGE_COLUMNS, changes, 2);
    const assignments = set.sql ? `${set.sql}, updated_at = now()` : "updated_at = now()";
    const { rows } = await this.client.query<PanelRow>(
      `UPDATE panels SET ${assignments} WHERE id = $1 RETURNING ${PANEL_COLUMNS}`,
      [id, ...set.values]
    );
    return rows[0] ? toPanel(rows[0]) : null;
  }

  async deletePanel(id: number): Promise<boolean> {
    const result = await this.client.query(`DELETE FROM panels WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async listWires(panelId: number, orphanedOnly = false): Promise<WireRecord[]> {
    const { rows } = await this.client.query<WireRecord>(
      `SELECT ${WIRE_COLUMNS} FROM wires WHERE panel_id = $1 ${orphanedOnly ? "AND orphaned" : ""} ORDER BY id`,
      [panelId]
    );
    return rows;
  }

  async findWire(id: number): Promise<WireRecord | null> {
    const { rows } = await this.client.query<WireRecord>(`SELECT ${WIRE_COLUMNS} FROM wires WHERE id = $1`, [id]);
    return rows[0] ?? null;
  }

  async insertWire(input: WireInsert): Promise<WireRecord> {
    const { rows } = await this.client.query<WireRecord>(
      `INSERT INTO wires (panel_id, label, wire_type, cross_section, color, source_slot_id, destination_slot_id,
         external_source, external_destination, length)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING ${WIRE_COLUMNS}`,
      [
        input.panel_id,
        input.label,
        input.wire_type,
        input.cross_section,
        input.color,
        input.source_slot_id,
        input.destination_slot_id,
        input.external_source,
        input.external_destination,
        input.length,
      ]
    );
    return rows[0];
  }

  async updateWire(id: number, changes: WireChanges): Promise<WireRecord | null> {
    const set = setClause(WIRE_CHANGE_COLUMNS, changes, 2);
    if (!set.values.length) return this.findWire(id);
    const { rows } = await this.client.query<WireRecord>(
      `UPDATE wires SET ${set.sql} WHERE id = $1 RETURNING ${WIRE_COLUMNS}`,
      [id, ...set.values]
    );
    return rows[0] ?? null;
  }

  async deleteWire(id: number): Promise<boolean> {
    const result = await this.client.query(`DELETE FROM wires WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async flagWiresForSlots(panelId: number, slotIds: readonly number[]): Promise<number[]> {
    if (!slotIds.length) return [];
    const { rows } = await this.client.query<{ id: number }>(
      `UPDATE wires SET orphaned = TRUE
       WHERE panel_id = $1 AND (source_slot_id = ANY($2::int[]) OR destination_slot_id = ANY($2::int[]))
       RETURNING id`,
      [panelId, [...slotIds]]
    );
    return rows.map((r) => r.id).sort((a, b) => a - b);
  }
}

function isDriverFailure(err: unknown): boolean {
  if (err instanceof DatabaseError) return true;
  // Socket-level failures (ECONNRESET, ECONNREFUSED, ...) carry a string code.
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

export class PgPanelStore implements PanelStore {
  constructor(private readonly pool: Pool) {}

  async transaction<T>(fn: (tx: PanelTx) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new PersistenceError("could not acquire a database connection", { cause: err });
    }

    try {
      await client.query("BEGIN");
      const result = await fn(new PgPanelTx(client));
      await client.query("COMMIT");
      return result;
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        console.error("[pg] rollback failed:", rollbackErr);
      }
      if (!(err instanceof PanelError) && isDriverFailure(err)) {
        console.error("[pg] transaction aborted:", err);
        throw new PersistenceError("the write did not complete and was rolled back", { cause: err });
      }
      throw err;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
