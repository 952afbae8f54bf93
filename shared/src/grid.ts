// shared/src/grid.ts
import { SlotNotInGridError } from "./errors";
import type { PanelTemplateShape, Slot, SlotState } from "./types";

export type NewSlot = Omit<Slot, "id">;

export function slotNumberFor(row: number, column: number, slotsPerRow: number): number {
  return (row - 1) * slotsPerRow + column;
}

export function stateOf(slot: Slot): SlotState {
  if (!slot.is_occupied) return "free";
  return slot.device_template_id !== null ? "anchor" : "blocked";
}

/** Row-major layout for a freshly created panel; ids are assigned by the store. */
export function materializeSlots(panelId: number, shape: PanelTemplateShape): NewSlot[] {
  const slots: NewSlot[] = [];
  for (let row = 1; row <= shape.rows; row++) {
    for (let column = 1; column <= shape.slots_per_row; column++) {
      slots.push({
        panel_id: panelId,
        slot_number: slotNumberFor(row, column, shape.slots_per_row),
        row,
        column,
        is_occupied: false,
        device_template_id: null,
        spans_slots: 1,
        device_label: null,
        current_setting: null,
        custom_properties: null,
      });
    }
  }
  return slots;
}

/**
 * Read-only view over one panel's slot collection.
 *
 * Keeps, per row, an index from position to the position of the anchor that
 * owns it, so a blocked slot resolves to its device without scanning.
 * Positions are indexes into the column-ordered row, not raw column numbers.
 */
export class SlotGrid {
  private readonly byId = new Map<number, Slot>();
  private readonly byNumber = new Map<number, Slot>();
  private readonly rowMap = new Map<number, Slot[]>();
  private readonly ownerIndex = new Map<number, Map<number, number>>();

  constructor(slots: readonly Slot[]) {
    for (const slot of slots) {
      this.byId.set(slot.id, slot);
      this.byNumber.set(slot.slot_number, slot);
      const row = this.rowMap.get(slot.row);
      if (row) row.push(slot);
      else this.rowMap.set(slot.row, [slot]);
    }
    for (const [rowNumber, row] of this.rowMap) {
      row.sort((a, b) => a.column - b.column);
      this.ownerIndex.set(rowNumber, buildOwnerIndex(row));
    }
  }

  all(): Slot[] {
    return [...this.byId.values()].sort((a, b) => a.slot_number - b.slot_number);
  }

  rows(): number[] {
    return [...this.rowMap.keys()].sort((a, b) => a - b);
  }

  slotsInRow(row: number): readonly Slot[] {
    return this.rowMap.get(row) ?? [];
  }

  slotByNumber(n: number): Slot | undefined {
    return this.byNumber.get(n);
  }

  slotById(id: number): Slot | undefined {
    return this.byId.get(id);
  }

  require(id: number): Slot {
    const slot = this.byId.get(id);
    if (!slot) throw new SlotNotInGridError(id);
    return slot;
  }

  /** Zero-based index of the slot within its column-ordered row. */
  positionOf(slot: Slot): number {
    const position = this.slotsInRow(slot.row).findIndex((s) => s.id === slot.id);
    if (position < 0) throw new SlotNotInGridError(slot.id);
    return position;
  }

  stateOf(slot: Slot): SlotState {
    return stateOf(this.require(slot.id));
  }

  /** Consecutive free slots from this slot (inclusive) to the end of its row. */
  contiguousFreeRun(slot: Slot): number {
    const row = this.slotsInRow(slot.row);
    let run = 0;
    for (let i = this.positionOf(slot); i < row.length; i++) {
      if (row[i].is_occupied) break;
      run++;
    }
    return run;
  }

  /** Positions left in the row from this slot, inclusive. */
  remainingInRow(slot: Slot): number {
    return this.slotsInRow(slot.row).length - this.positionOf(slot);
  }

  /**
   * The anchor owning this slot: itself for an anchor, the covering anchor for
   * a blocked slot, null for a free slot or a blocked slot nothing covers.
   */
  resolveAnchor(slot: Slot): Slot | null {
    const current = this.require(slot.id);
    const state = stateOf(current);
    if (state === "free") return null;
    if (state === "anchor") return current;
    const ownerPosition = this.ownerIndex.get(current.row)?.get(this.positionOf(current));
    if (ownerPosition === undefined) return null;
    return this.slotsInRow(current.row)[ownerPosition] ?? null;
  }

  /** Slots covered by an anchor's span, clipped to its row. */
  spanOf(anchor: Slot): Slot[] {
    const current = this.require(anchor.id);
    if (stateOf(current) !== "anchor") return [];
    const start = this.positionOf(current);
    return this.slotsInRow(current.row).slice(start, start + Math.max(1, current.spans_slots));
  }
}

function buildOwnerIndex(row: readonly Slot[]): Map<number, number> {
  const index = new Map<number, number>();
  row.forEach((slot, position) => {
    if (stateOf(slot) !== "anchor") return;
    const end = Math.min(row.length, position + Math.max(1, slot.spans_slots));
    for (let i = position; i < end; i++) {
      // An anchor always owns itself; otherwise the first claimant keeps the cell.
      if (i === position || !index.has(i)) index.set(i, position);
    }
  });
  return index;
}
