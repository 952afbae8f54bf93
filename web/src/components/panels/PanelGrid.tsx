"use client";

import { SlotGrid, type Slot } from "panel-shared";
import type { SlotAppearance, SlotHint } from "@/lib/panel/selectors";
import { SlotCell } from "./SlotCell";

interface PanelGridProps {
  slots: Slot[];
  slotsPerRow: number;
  appearanceOf: (slot: Slot) => SlotAppearance;
  /** Message drawn on one cell: a rejected hover or the last failed request. */
  hint: SlotHint | null;
  deviceName: (templateId: number | null) => string | null;
  onDragOver: (slot: Slot) => void;
  onDragLeave: () => void;
  onDrop: (slot: Slot) => void;
  onRemove: (slot: Slot) => void;
  onConfigure: (slot: Slot) => void;
}

/**
 * One CSS grid per row. An anchor's cell stretches over its span and the
 * blocked slots it covers are not drawn separately.
 */
export function PanelGrid({ slots, slotsPerRow, appearanceOf, hint, deviceName, ...handlers }: PanelGridProps) {
  const grid = new SlotGrid(slots);
  const hintSlot = hint ? grid.slotById(hint.slotId) : undefined;
  // A blocked slot is drawn as part of its anchor's cell.
  const hintCellId = hintSlot ? (grid.resolveAnchor(hintSlot) ?? hintSlot).id : null;

  return (
    <div className="space-y-3 rounded-xl border border-slate-300 bg-slate-100 p-4 shadow-card">
      {grid.rows().map((row) => (
        <div key={row} className="grid gap-1.5" style={{ gridTemplateColumns: `repeat(${slotsPerRow}, minmax(0, 1fr))` }}>
          {grid.slotsInRow(row).map((slot) => {
            const state = grid.stateOf(slot);
            const owner = state === "blocked" ? grid.resolveAnchor(slot) : null;
            if (owner) return null;
            const width = state === "anchor" ? grid.spanOf(slot).length : 1;
            const appearance = appearanceOf(slot);
            return (
              <SlotCell
                key={slot.id}
                slot={slot}
                appearance={appearance}
                hint={hint && slot.id === hintCellId ? hint : null}
                width={width}
                deviceName={deviceName(slot.device_template_id)}
                {...handlers}
              />
            );
          })}
        </div>
      ))}
    </div>
  );
}
