// shared/src/integrity.ts
import { slotNumberFor, stateOf } from "./grid";
import type { Slot } from "./types";

export type GridViolationKind =
  | "invalid_span"
  | "span_exceeds_row"
  | "span_member_free"
  | "span_member_is_anchor"
  | "overlapping_spans"
  | "orphan_blocked_slot"
  | "free_slot_not_cleared"
  | "misnumbered_slot";

export interface GridViolation {
  kind: GridViolationKind;
  slotId: number;
  message: string;
}

/**
 * Every place where the slot collection stops being a partition of occupied
 * slots into disjoint, row-local spans. An empty result means the grid is
 * consistent.
 */
export function findGridViolations(slots: readonly Slot[], slotsPerRow?: number): GridViolation[] {
  const violations: GridViolation[] = [];
  const owner = new Map<number, number>();
  const rows = new Map<number, Slot[]>();

  for (const slot of slots) {
    const row = rows.get(slot.row);
    if (row) row.push(slot);
    else rows.set(slot.row, [slot]);

    if (slotsPerRow !== undefined && slot.slot_number !== slotNumberFor(slot.row, slot.column, slotsPerRow)) {
      violations.push({
        kind: "misnumbered_slot",
        slotId: slot.id,
        message: `slot ${slot.id} has number ${slot.slot_number} at row ${slot.row} column ${slot.column}`,
      });
    }
  }

  for (const row of rows.values()) {
    row.sort((a, b) => a.column - b.column);
    row.forEach((anchor, position) => {
      if (stateOf(anchor) !== "anchor") return;
      const n = anchor.spans_slots;
      if (!Number.isInteger(n) || n < 1) {
        violations.push({ kind: "invalid_span", slotId: anchor.id, message: `anchor ${anchor.id} spans ${n} slots` });
        return;
      }
      for (let k = 0; k < n; k++) {
        const member = row[position + k];
        if (!member) {
          violations.push({
            kind: "span_exceeds_row",
            slotId: anchor.id,
            message: `anchor ${anchor.id} spans ${n} slots but its row ends after ${k}`,
          });
          break;
        }
        const claimedBy = owner.get(member.id);
        if (claimedBy !== undefined) {
          violations.push({
            kind: "overlapping_spans",
            slotId: member.id,
            message: `slot ${member.id} is covered by anchors ${claimedBy} and ${anchor.id}`,
          });
          continue;
        }
        owner.set(member.id, anchor.id);
        if (k === 0) continue;
        if (!member.is_occupied) {
          violations.push({
            kind: "span_member_free",
            slotId: member.id,
            message: `slot ${member.id} lies inside the span of anchor ${anchor.id} but is free`,
          });
        } else if (member.device_template_id !== null) {
          violations.push({
            kind: "span_member_is_anchor",
            slotId: member.id,
            message: `slot ${member.id} lies inside the span of anchor ${anchor.id} but holds its own device`,
          });
        }
      }
    });
  }

  for (const slot of slots) {
    const state = stateOf(slot);
    if (state === "blocked" && !owner.has(slot.id)) {
      violations.push({
        kind: "orphan_blocked_slot",
        slotId: slot.id,
        message: `slot ${slot.id} is blocked but no anchor covers it`,
      });
    }
    if (state === "free" && (slot.device_template_id !== null || slot.spans_slots !== 1)) {
      violations.push({
        kind: "free_slot_not_cleared",
        slotId: slot.id,
        message: `slot ${slot.id} is free but still carries device fields`,
      });
    }
  }

  return violations;
}
