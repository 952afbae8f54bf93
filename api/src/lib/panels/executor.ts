// api/src/lib/panels/executor.ts
import {
  SlotGrid,
  applyPatches,
  canPlace,
  canReconfigure,
  findGridViolations,
  planPlacement,
  planReconfigure,
  planRemoval,
  type DeviceMeta,
  type PlacementCheck,
  type Slot,
  type SlotPatch,
} from "panel-shared";
import { GridIntegrityError, NotConfigurableError, NotFoundError, PlacementConflictError } from "./errors";
import type { DeviceTemplateRecord, PanelStore, PanelTx } from "./store";
import { flagOrphanedWires, type WiringGuard } from "./wiringGuard";

export interface SpanResult {
  panelId: number;
  /** Slots this operation wrote, ordered by slot_number. */
  span: Slot[];
  /** The panel's whole slot collection as committed. */
  slots: Slot[];
}

export interface RemovalResult extends SpanResult {
  freedSlotIds: number[];
  flaggedWireIds: number[];
}

export interface PlacementDryRun {
  check: PlacementCheck;
  slot: Slot;
  template: DeviceTemplateRecord | null;
}

/** Body of `PUT /devices/slots/:id`: a template id places or reconfigures, null removes. */
export interface SlotUpdate extends DeviceMeta {
  device_template_id: number | null;
}

export type SlotUpdateResult =
  | ({ action: "placed" | "reconfigured" } & SpanResult)
  | ({ action: "removed" } & RemovalResult);

function violationKeys(slots: readonly Slot[]): Set<string> {
  return new Set(findGridViolations(slots).map((v) => `${v.kind}:${v.slotId}`));
}

/**
 * The only writer of slot occupancy. Every operation locks the panel's slots,
 * validates against what it locked, and writes the whole span in the same
 * transaction, so a concurrent request for an overlapping span re-validates
 * against committed state and is rejected.
 */
export class PlacementExecutor {
  constructor(
    private readonly store: PanelStore,
    private readonly guard: WiringGuard = flagOrphanedWires
  ) {}

  /** Same validation as `place`, without writing anything. */
  async checkPlacement(slotId: number, deviceTemplateId: number): Promise<PlacementDryRun> {
    return this.store.transaction(async (tx) => {
      const slot = await this.requireSlot(tx, slotId);
      const grid = new SlotGrid(await tx.listSlots(slot.panel_id));
      const template = await tx.findDeviceTemplate(deviceTemplateId);
      return { check: canPlace(grid, slot, template), slot, template };
    });
  }

  async place(slotId: number, deviceTemplateId: number, meta: DeviceMeta = {}): Promise<SpanResult> {
    return this.store.transaction(async (tx) => {
      const { slot, slots } = await this.lockAround(tx, slotId);
      return this.placeLocked(tx, slot, slots, deviceTemplateId, meta);
    });
  }

  /** Idempotent: removing from a free slot succeeds without writing. */
  async remove(slotId: number): Promise<RemovalResult> {
    return this.store.transaction(async (tx) => {
      const { slot, slots } = await this.lockAround(tx, slotId);
      return this.removeLocked(tx, slot, slots);
    });
  }

  async reconfigure(slotId: number, meta: DeviceMeta): Promise<SpanResult> {
    return this.store.transaction(async (tx) => {
      const { slot, slots } = await this.lockAround(tx, slotId);
      return this.reconfigureLocked(tx, slot, slots, meta);
    });
  }

  /**
   * PUT semantics. Sending the anchor's current template again edits its
   * metadata; any other template is a new placement and is rejected if the
   * slot is occupied (devices are never swapped implicitly).
   */
  async applySlotUpdate(slotId: number, update: SlotUpdate): Promise<SlotUpdateResult> {
    return this.store.transaction(async (tx): Promise<SlotUpdateResult> => {
      const { slot, slots } = await this.lockAround(tx, slotId);
      const { device_template_id: templateId, ...meta } = update;

      if (templateId === null) {
        return { action: "removed", ...(await this.removeLocked(tx, slot, slots)) };
      }
      if (slot.is_occupied && slot.device_template_id === templateId) {
        return { action: "reconfigured", ...(await this.reconfigureLocked(tx, slot, slots, meta)) };
      }
      return { action: "placed", ...(await this.placeLocked(tx, slot, slots, templateId, meta)) };
    });
  }

  private async requireSlot(tx: PanelTx, slotId: number): Promise<Slot> {
    const slot = await tx.findSlot(slotId);
    if (!slot) throw new NotFoundError("slot", slotId);
    return slot;
  }

  /** Locks the slot's whole panel and returns the slot as seen under the lock. */
  private async lockAround(tx: PanelTx, slotId: number): Promise<{ slot: Slot; slots: Slot[] }> {
    const found = await this.requireSlot(tx, slotId);
    const slots = await tx.lockPanelSlots(found.panel_id);
    const slot = slots.find((s) => s.id === slotId);
    if (!slot) throw new NotFoundError("slot", slotId);
    return { slot, slots };
  }

  private async placeLocked(
    tx: PanelTx,
    slot: Slot,
    slots: Slot[],
    deviceTemplateId: number,
    meta: DeviceMeta
  ): Promise<SpanResult> {
    // Always read the template inside the transaction; a cached span length could corrupt the grid.
    const template = await tx.findDeviceTemplate(deviceTemplateId);
    if (!template) throw new NotFoundError("device_template", deviceTemplateId);

    const grid = new SlotGrid(slots);
    const check = canPlace(grid, slot, template);
    if (!check.allowed) {
      console.log(`[placement] panel ${slot.panel_id}: rejected template ${template.id} at slot ${slot.slot_number} (${check.reason})`);
      throw new PlacementConflictError(check);
    }

    const result = await this.write(tx, slot.panel_id, slots, planPlacement(grid, slot, template, meta));
    console.log(
      `[placement] panel ${slot.panel_id}: placed template ${template.id} at slot ${slot.slot_number} spanning ${check.requiredSlots}`
    );
    return result;
  }

  private async removeLocked(tx: PanelTx, slot: Slot, slots: Slot[]): Promise<RemovalResult> {
    const plan = planRemoval(new SlotGrid(slots), slot);
    if (!plan.patches.length) {
      const ordered = [...slots].sort((a, b) => a.slot_number - b.slot_number);
      return { panelId: slot.panel_id, span: [], slots: ordered, freedSlotIds: [], flaggedWireIds: [] };
    }
    if (!plan.anchor) {
      console.warn(`[placement] panel ${slot.panel_id}: slot ${slot.slot_number} was blocked with no owning device; freeing it alone`);
    }

    const result = await this.write(tx, slot.panel_id, slots, plan.patches);
    const flaggedWireIds = await this.guard.onSlotsFreed(tx, slot.panel_id, plan.freedSlotIds);
    console.log(`[placement] panel ${slot.panel_id}: freed slots ${result.span.map((s) => s.slot_number).join(", ")}`);
    return { ...result, freedSlotIds: plan.freedSlotIds, flaggedWireIds };
  }

  private async reconfigureLocked(tx: PanelTx, slot: Slot, slots: Slot[], meta: DeviceMeta): Promise<SpanResult> {
    if (!canReconfigure(new SlotGrid(slots), slot)) throw new NotConfigurableError(slot.id);
    return this.write(tx, slot.panel_id, slots, planReconfigure(slot, meta));
  }

  /** Refuses any write that would add a grid violation, then persists the patches. */
  private async write(tx: PanelTx, panelId: number, slots: Slot[], patches: SlotPatch[]): Promise<SpanResult> {
    const next = applyPatches(slots, patches);
    const before = violationKeys(slots);
    const introduced = findGridViolations(next).filter((v) => !before.has(`${v.kind}:${v.slotId}`));
    if (introduced.length) throw new GridIntegrityError(panelId, introduced.map((v) => v.message));

    await tx.updateSlots(patches);

    const touched = new Set(patches.map((p) => p.id));
    const ordered = [...next].sort((a, b) => a.slot_number - b.slot_number);
    return { panelId, span: ordered.filter((s) => touched.has(s.id)), slots: ordered };
  }
}
