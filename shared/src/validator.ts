// shared/src/validator.ts
import { TemplateConfigurationError } from "./errors";
import type { SlotGrid } from "./grid";
import {
  PLACEMENT_REASONS,
  type DeviceTemplateRef,
  type PlacementCheck,
  type PlacementReasonCode,
  type Slot,
} from "./types";

function rejected(
  code: PlacementReasonCode,
  requiredSlots: number,
  availableContiguousSlots: number
): PlacementCheck {
  return {
    allowed: false,
    code,
    reason: PLACEMENT_REASONS[code],
    requiredSlots,
    availableContiguousSlots,
  };
}

export function assertValidSpan(template: DeviceTemplateRef): number {
  const n = template.slots_required;
  if (!Number.isInteger(n) || n < 1) {
    throw new TemplateConfigurationError(template.id, n);
  }
  return n;
}

/**
 * Decide whether `template` may be anchored at `slot`.
 *
 * Spans run strictly left to right inside the anchor's row and are never
 * shifted to another start position. The row boundary is checked before
 * overlap, so a span that would leave the row reports
 * `insufficient_contiguous_slots` even when it would also overlap.
 *
 * @throws TemplateConfigurationError when `slots_required` is not a positive integer
 */
export function canPlace(
  grid: SlotGrid,
  slot: Slot,
  template: DeviceTemplateRef | null | undefined
): PlacementCheck {
  const anchor = grid.require(slot.id);
  const available = grid.contiguousFreeRun(anchor);

  if (!template) return rejected("template_not_found", 0, available);

  const n = assertValidSpan(template);

  if (anchor.is_occupied) return rejected("slot_occupied", n, 0);

  if (n > 1) {
    if (grid.remainingInRow(anchor) < n) {
      return rejected("insufficient_contiguous_slots", n, available);
    }
    if (available < n) {
      return rejected("overlaps_existing_device", n, available);
    }
  }

  return {
    allowed: true,
    code: null,
    reason: null,
    requiredSlots: n,
    availableContiguousSlots: available,
  };
}

/** Metadata edits skip spatial checks; they only need an anchor. */
export function canReconfigure(grid: SlotGrid, slot: Slot): boolean {
  return grid.stateOf(slot) === "anchor";
}
