// In-process stand-in for PgPanelStore. Transactions run one at a time against
// a copy of the tables and swap it in only on success, which gives tests the
// same all-or-nothing and last-validated-wins behavior as row locks in Postgres.
import type { NewSlot, Slot, SlotPatch } from "panel-shared";
import { PersistenceError } from "../../src/lib/panels/errors";
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
} from "../../src/lib/panels/store";

interface Tables {
  panelTemplates: Map<number, PanelTemplateRecord>;
  deviceTemplates: Map<number, DeviceTemplateRecord>;
  panels: Map<number, PanelRecord>;
  slots: Map<number, Slot>;
  wires: Map<number, WireRecord>;
  seq: { panelTemplate: number; deviceTemplate: number; panel: number; slot: number; wire: number };
}

function emptyTables(): Tables {
  return {
    panelTemplates: new Map(),
    deviceTemplates: new Map(),
    panels: new Map(),
    slots: new Map(),
    wires: new Map(),
    seq: { panelTemplate: 0, deviceTemplate: 0, panel: 0, slot: 0, wire: 0 },
  };
}

const bySlotNumber = (a: Slot, b: Slot) => a.slot_number - b.slot_number;

class MemoryTx implements PanelTx {
  constructor(private readonly t: Tables, private readonly store: MemoryPanelStore) {}

  async lockPanelSlots(panelId: number) {
    return this.listSlots(panelId);
  }

  async listSlots(panelId: number) {
    return [...this.t.slots.values()].filter((s) => s.panel_id === panelId).sort(bySlotNumber).map((s) => ({ ...s }));
  }

  async findSlot(slotId: number) {
    const slot = this.t.slots.get(slotId);
    return slot ? { ...slot } : null;
  }

  async updateSlots(patches: readonly SlotPatch[]) {
    for (const patch of patches) {
      this.store.noteSlotWrite();
      const slot = this.t.slots.get(patch.id);
      if (slot) this.t.slots.set(patch.id, { ...slot, ...patch.changes });
    }
  }

  async insertSlots(slots: readonly NewSlot[]) {
    return slots.map((s) => {
      const slot: Slot = { ...s, id: ++this.t.seq.slot };
      this.t.slots.set(slot.id, slot);
      return { ...slot };
    });
  }

  async findDeviceTemplate(id: number) {
    return this.t.deviceTemplates.get(id) ?? null;
  }

  async listDeviceTemplates(filter: DeviceTemplateFilter = {}) {
    return [...this.t.deviceTemplates.values()].filter(
      (d) =>
        (!filter.manufacturer || d.manufacturer.toLowerCase() === filter.manufacturer.toLowerCase()) &&
        (!filter.category || d.category === filter.category) &&
        (!filter.device_type || d.device_type === filter.device_type) &&
        (!filter.active_only || d.is_active)
    );
  }

  async findPanelTemplate(id: number) {
    return this.t.panelTemplates.get(id) ?? null;
  }

  async listPanelTemplates(activeOnly = false) {
    return [...this.t.panelTemplates.values()].filter((p) => !activeOnly || p.is_active);
  }

  async insertPanel(input: PanelInsert) {
    const panel: PanelRecord = {
      ...input,
      id: ++this.t.seq.panel,
      created_at: new Date(0).toISOString(),
      updated_at: null,
    };
    this.t.panels.set(panel.id, panel);
    return { ...panel };
  }

  async findPanel(id: number) {
    const panel = this.t.panels.get(id);
    return panel ? { ...panel } : null;
  }

  async listPanels(skip: number, limit: number) {
    return [...this.t.panels.values()].sort((a, b) => a.id - b.id).slice(skip, skip + limit);
  }

  async updatePanel(id: number, changes: PanelChanges) {
    const panel = this.t.panels.get(id);
    if (!panel) return null;
    const next: PanelRecord = { ...panel, ...changes, updated_at: new Date(0).toISOString() };
    this.t.panels.set(id, next);
    return { ...next };
  }

  async deletePanel(id: number) {
    if (!this.t.panels.delete(id)) return false;
    for (const [slotId, slot] of this.t.slots) if (slot.panel_id === id) this.t.slots.delete(slotId);
    for (const [wireId, wire] of this.t.wires) if (wire.panel_id === id) this.t.wires.delete(wireId);
    return true;
  }

  async listWires(panelId: number, orphanedOnly = false) {
    return [...this.t.wires.values()]
      .filter((w) => w.panel_id === panelId && (!orphanedOnly || w.orphaned))
      .sort((a, b) => a.id - b.id);
  }

  async findWire(id: number) {
    return this.t.wires.get(id) ?? null;
  }

  async insertWire(input: WireInsert) {
    const wire: WireRecord = { ...input, id: ++this.t.seq.wire, orphaned: false };
    this.t.wires.set(wire.id, wire);
    return { ...wire };
  }

  async updateWire(id: number, changes: WireChanges) {
    const wire = this.t.wires.get(id);
    if (!wire) return null;
    const next: WireRecord = { ...wire, ...changes };
    this.t.wires.set(id, next);
    return { ...next };
  }

  async deleteWire(id: number) {
    return this.t.wires.delete(id);
  }

  async flagWiresForSlots(panelId: number, slotIds: readonly number[]) {
    const freed = new Set(slotIds);
    const flagged: number[] = [];
    for (const wire of this.t.wires.values()) {
      if (wire.panel_id !== panelId) continue;
      const touches =
        (wire.source_slot_id !== null && freed.has(wire.source_slot_id)) ||
        (wire.destination_slot_id !== null && freed.has(wire.destination_slot_id));
      if (!touches) continue;
      this.t.wires.set(wire.id, { ...wire, orphaned: true });
      flagged.push(wire.id);
    }
    return flagged.sort((a, b) => a - b);
  }
}

export class MemoryPanelStore implements PanelStore {
  private tables = emptyTables();
  private queue: Promise<unknown> = Promise.resolve();
  private slotWrites = 0;
  private failOnWrite: number | null = null;
  committed = 0;
  rolledBack = 0;

  async transaction<T>(fn: (tx: PanelTx) => Promise<T>): Promise<T> {
    const run = async () => {
      const working = structuredClone(this.tables);
      this.slotWrites = 0;
      try {
        const result = await fn(new MemoryTx(working, this));
        this.tables = working;
        this.committed++;
        return result;
      } catch (err) {
        this.rolledBack++;
        throw err;
      }
    };
    const next = this.queue.then(run, run);
    this.queue = next.catch(() => undefined);
    return next;
  }

  async close() {}

  /** The next transaction fails with a PersistenceError on its `n`th slot write (1-based), after earlier writes landed. */
  failOnSlotWrite(n: number) {
    this.failOnWrite = n;
  }

  noteSlotWrite() {
    this.slotWrites++;
    if (this.failOnWrite !== null && this.slotWrites === this.failOnWrite) {
      this.failOnWrite = null;
      throw new PersistenceError("simulated write failure");
    }
  }

  addPanelTemplate(fields: Partial<PanelTemplateRecord> = {}): PanelTemplateRecord {
    const template: PanelTemplateRecord = {
      id: ++this.tables.seq.panelTemplate,
      name: "Volta 12 Way",
      manufacturer: "Hager",
      model: `VD1${this.tables.seq.panelTemplate}`,
      series: "Volta",
      rows: 2,
      slots_per_row: 6,
      voltage: 230,
      max_current: 63,
      description: null,
      is_active: true,
      ...fields,
    };
    this.tables.panelTemplates.set(template.id, template);
    return template;
  }

  addDeviceTemplate(fields: Partial<DeviceTemplateRecord> = {}): DeviceTemplateRecord {
    const slots = fields.slots_required ?? 1;
    const template: DeviceTemplateRecord = {
      id: ++this.tables.seq.deviceTemplate,
      name: `Device ${slots}M`,
      manufacturer: "Hager",
      model: `DEV-${this.tables.seq.deviceTemplate}`,
      series: null,
      device_type: "MCB",
      category: "Protection",
      slots_required: slots,
      width_in_modules: slots,
      rated_current: null,
      description: null,
      is_active: true,
      ...fields,
    };
    this.tables.deviceTemplates.set(template.id, template);
    return template;
  }

  /** Committed slots of a panel, ordered by slot_number. */
  slots(panelId: number): Slot[] {
    return [...this.tables.slots.values()].filter((s) => s.panel_id === panelId).sort(bySlotNumber);
  }

  slotId(panelId: number, slotNumber: number): number {
    const slot = this.slots(panelId).find((s) => s.slot_number === slotNumber);
    if (!slot) throw new Error(`panel ${panelId} has no slot ${slotNumber}`);
    return slot.id;
  }

  wire(id: number): WireRecord | undefined {
    return this.tables.wires.get(id);
  }
}
