import { SlotGrid, applyPatches, materializeSlots, planPlacement, type DeviceTemplateRef, type Slot } from "panel-shared";

export const PANEL_ID = 7;
export const MCB: DeviceTemplateRef = { id: 1, slots_required: 1 };
export const METER: DeviceTemplateRef = { id: 4, slots_required: 4 };

/** Slot id for a slot number; offset so the two never coincide. */
export const id = (slotNumber: number) => slotNumber + 500;

export function emptyPanel(): Slot[] {
  return materializeSlots(PANEL_ID, { rows: 2, slots_per_row: 6 }).map((s) => ({ ...s, id: id(s.slot_number) }));
}

export function withDevice(slots: Slot[], slotNumber: number, template: DeviceTemplateRef, label: string | null = null): Slot[] {
  const grid = new SlotGrid(slots);
  return applyPatches(slots, planPlacement(grid, grid.require(id(slotNumber)), template, { device_label: label }));
}

export function occupiedNumbers(slots: readonly Slot[]): number[] {
  return slots.filter((s) => s.is_occupied).map((s) => s.slot_number);
}
