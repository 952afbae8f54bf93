// shared/src/plan.ts
import type { SlotGrid } from "./grid";
import { assertValidSpan } from "./validator";
import type { DeviceMeta, DeviceTemplateRef, Slot, SlotPatch } from "./types";

const FREED: SlotPatch["changes"] = {
  is_occupied: false,
  device_template_id: null,
  spans_slots: 1,
  device_label: null,
  current_setting: null,
  custom_properties: null,
};

const BLOCKED: SlotPatch["changes"] = {
  is_occupied: true,
  device_template_id: null,
  spans_slots: 1,
  device_label: null,
  current_setting: null,
  custom_properties: null,
};

export interface RemovalPlan {
  /** Null when the slot was already free or was a blocked slot no anchor covers. */
  anchor: Slot | null;
  freedSlotIds: number[];
  patches: SlotPatch[];
}

/**
 * Writes for anchoring `template` at `anchor`. Does not validate; run
 * `canPlace` against the same grid first.
 */
export function planPlacement(
  grid: SlotGrid,
  anchor: Slot,
  template: DeviceTemplateRef,
  meta: DeviceMeta = {}
): SlotPatch[] {
  const n = assertValidSpan(template);
  const start = grid.positionOf(anchor);
  const span = grid.slotsInRow(anchor.row).slice(start, start + n);

  return span.map((slot, i) =>
    i === 0
      ? {
          id: slot.id,
          changes: {
            is_occupied: true,
            device_template_id: template.id,
            spans_slots: n,
            device_label: meta.device_label ?? null,
            current_setting: meta.current_setting ?? null,
            custom_properties: meta.custom_properties ?? null,
          },
        }
      : { id: slot.id, changes: { ...BLOCKED } }
  );
}

/** Frees the whole span containing `slot`, whichever cell of it was picked. */
export function planRemoval(grid: SlotGrid, slot: Slot): RemovalPlan {
  const current = grid.require(slot.id);
  if (!current.is_occupied) return { anchor: null, freedSlotIds: [], patches: [] };

  const anchor = grid.resolveAnchor(current);
  const span = anchor ? grid.spanOf(anchor) : [current];

  return {
    anchor,
    freedSlotIds: span.map((s) => s.id),
    patches: span.map((s) => ({ id: s.id, changes: { ...FREED } })),
  };
}

/** Only label, current setting and custom properties change; the span is untouched. */
export function planReconfigure(anchor: Slot, meta: DeviceMeta): SlotPatch[] {
  const changes: SlotPatch["changes"] = {};
  if (meta.device_label !== undefined) changes.device_label = meta.device_label;
  if (meta.current_setting !== undefined) changes.current_setting = meta.current_setting;
  if (meta.custom_properties !== undefined) changes.custom_properties = meta.custom_properties;
  return [{ id: anchor.id, changes }];
}

export function applyPatches(slots: readonly Slot[], patches: readonly SlotPatch[]): Slot[] {
  if (!patches.length) return [...slots];
  const byId = new Map(patches.map((p) => [p.id, p.changes]));
  return slots.map((slot) => {
    const changes = byId.get(slot.id);
    return changes ? { ...slot, ...changes } : slot;
  });
}
