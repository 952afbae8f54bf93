import { SlotGrid, applyPatches, materializeSlots, planPlacement } from "../src";
import type { DeviceMeta, DeviceTemplateRef, PanelTemplateShape, Slot } from "../src";

export const VOLTA_12: PanelTemplateShape = { rows: 2, slots_per_row: 6 };

export const MCB: DeviceTemplateRef = { id: 1, slots_required: 1 };
export const RCBO: DeviceTemplateRef = { id: 2, slots_required: 2 };
export const SMART_METER: DeviceTemplateRef = { id: 4, slots_required: 4 };

/** Slot ids are offset from slot numbers so tests catch the two being mixed up. */
export function buildSlots(shape: PanelTemplateShape = VOLTA_12, panelId = 1): Slot[] {
  return materializeSlots(panelId, shape).map((slot) => ({ ...slot, id: slot.slot_number + 100 }));
}

export function slotNo(slots: readonly Slot[], n: number): Slot {
  const slot = slots.find((s) => s.slot_number === n);
  if (!slot) throw new Error(`no slot number ${n}`);
  return slot;
}

export function placeAt(
  slots: readonly Slot[],
  slotNumber: number,
  template: DeviceTemplateRef,
  meta?: DeviceMeta
): Slot[] {
  const grid = new SlotGrid(slots);
  return applyPatches(slots, planPlacement(grid, slotNo(slots, slotNumber), template, meta));
}

export function occupiedNumbers(slots: readonly Slot[]): number[] {
  return slots.filter((s) => s.is_occupied).map((s) => s.slot_number).sort((a, b) => a - b);
}
