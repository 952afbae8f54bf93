// web/src/lib/panel/selectors.ts
import { SlotGrid, stateOf, type Slot, type SlotState } from "panel-shared";
import type { PanelState } from "./reducer";

export type SlotAppearance = SlotState | "drop-valid" | "drop-invalid" | "pending";

/** What the grid should draw: the prediction while a request is in flight, otherwise server truth. */
export function visibleSlots(state: PanelState): Slot[] {
  return state.speculative ?? state.slots;
}

/** Slot ids the hovered device would cover, clipped to the anchor's row. */
export function dropFootprint(state: PanelState): Set<number> {
  const target = state.dropTarget;
  if (!target) return new Set();
  const grid = new SlotGrid(state.slots);
  const anchor = grid.slotById(target.slotId);
  if (!anchor) return new Set();
  const start = grid.positionOf(anchor);
  const width = Math.max(1, target.check.requiredSlots);
  return new Set(grid.slotsInRow(anchor.row).slice(start, start + width).map((s) => s.id));
}

export function slotAppearance(state: PanelState, slot: Slot, footprint = dropFootprint(state)): SlotAppearance {
  if (state.pending?.slotIds.includes(slot.id)) return "pending";
  if (footprint.has(slot.id)) return state.dropTarget?.check.allowed ? "drop-valid" : "drop-invalid";
  return stateOf(slot);
}

export interface SlotHint {
  slotId: number;
  tone: "rejected" | "failed";
  message: string;
}

/**
 * Message to show on the grid itself: the local rejection of the hovered drop,
 * otherwise the server's reason for the last failed request on a slot.
 */
export function slotHint(state: PanelState): SlotHint | null {
  const target = state.dropTarget;
  if (target && !target.check.allowed) {
    const { reason, requiredSlots, availableContiguousSlots } = target.check;
    return {
      slotId: target.slotId,
      tone: "rejected",
      message: `${reason ?? "not allowed"} (needs ${requiredSlots}, ${availableContiguousSlots} free)`,
    };
  }
  const notice = state.notice;
  if (notice && notice.slotId !== null) return { slotId: notice.slotId, tone: "failed", message: notice.message };
  return null;
}
