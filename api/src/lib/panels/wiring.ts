// api/src/lib/panels/wiring.ts
import { NotFoundError, PanelError } from "./errors";
import type { PanelStore, PanelTx, WireChanges, WireInsert, WireRecord } from "./store";

export class WireEndpointError extends PanelError {
  readonly status = 400;
  readonly code = "invalid_wire_endpoint";

  constructor(message: string) {
    super(message);
    this.name = "WireEndpointError";
  }
}

/** A wire may only terminate on slots of its own panel. */
async function assertEndpoint(tx: PanelTx, panelId: number, slotId: number | null | undefined, end: string) {
  if (slotId === null || slotId === undefined) return;
  const slot = await tx.findSlot(slotId);
  if (!slot) throw new NotFoundError("slot", slotId);
  if (slot.panel_id !== panelId) {
    throw new WireEndpointError(`${end} slot ${slotId} belongs to panel ${slot.panel_id}, not ${panelId}`);
  }
}

export async function listWires(store: PanelStore, panelId: number, orphanedOnly = false): Promise<WireRecord[]> {
  return store.transaction(async (tx) => {
    if (!(await tx.findPanel(panelId))) throw new NotFoundError("panel", panelId);
    return tx.listWires(panelId, orphanedOnly);
  });
}

export async function getWire(store: PanelStore, wireId: number): Promise<WireRecord> {
  return store.transaction(async (tx) => {
    const wire = await tx.findWire(wireId);
    if (!wire) throw new NotFoundError("wire", wireId);
    return wire;
  });
}

export async function createWire(store: PanelStore, input: WireInsert): Promise<WireRecord> {
  return store.transaction(async (tx) => {
    if (!(await tx.findPanel(input.panel_id))) throw new NotFoundError("panel", input.panel_id);
    await assertEndpoint(tx, input.panel_id, input.source_slot_id, "source");
    await assertEndpoint(tx, input.panel_id, input.destination_slot_id, "destination");
    return tx.insertWire(input);
  });
}

/** Re-terminating a wire (changing either endpoint) clears its orphaned flag. */
export async function updateWire(store: PanelStore, wireId: number, changes: WireChanges): Promise<WireRecord> {
  return store.transaction(async (tx) => {
    const wire = await tx.findWire(wireId);
    if (!wire) throw new NotFoundError("wire", wireId);
    await assertEndpoint(tx, wire.panel_id, changes.source_slot_id, "source");
    await assertEndpoint(tx, wire.panel_id, changes.destination_slot_id, "destination");

    const reterminated = changes.source_slot_id !== undefined || changes.destination_slot_id !== undefined;
    const updated = await tx.updateWire(wireId, reterminated ? { ...changes, orphaned: false } : changes);
    if (!updated) throw new NotFoundError("wire", wireId);
    return updated;
  });
}

export async function deleteWire(store: PanelStore, wireId: number): Promise<void> {
  await store.transaction(async (tx) => {
    if (!(await tx.deleteWire(wireId))) throw new NotFoundError("wire", wireId);
  });
}
