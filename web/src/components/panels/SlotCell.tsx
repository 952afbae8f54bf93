"use client";

import type { DragEvent } from "react";
import { Loader2, Settings2, X } from "lucide-react";
import type { Slot } from "panel-shared";
import { Button } from "@/components/ui/button";
import type { SlotAppearance, SlotHint } from "@/lib/panel/selectors";
import { appearanceClasses } from "./slotStyles";
import { cn } from "@/lib/utils";

interface SlotCellProps {
  slot: Slot;
  appearance: SlotAppearance;
  hint: SlotHint | null;
  /** Grid columns this cell covers: the device span for an anchor, otherwise 1. */
  width: number;
  deviceName: string | null;
  onDragOver: (slot: Slot) => void;
  onDragLeave: () => void;
  onDrop: (slot: Slot) => void;
  onRemove: (slot: Slot) => void;
  onConfigure: (slot: Slot) => void;
}

export function SlotCell({
  slot,
  appearance,
  hint,
  width,
  deviceName,
  onDragOver,
  onDragLeave,
  onDrop,
  onRemove,
  onConfigure,
}: SlotCellProps) {
  const hasDevice = slot.is_occupied;
  const isAnchor = slot.device_template_id !== null;

  return (
    <div
      data-slot-number={slot.slot_number}
      className={cn(
        "relative flex h-24 flex-col justify-between rounded-md border p-2 text-xs transition-colors",
        appearanceClasses[appearance]
      )}
      style={{ gridColumn: `${slot.column} / span ${width}` }}
      onDragOver={(e: DragEvent<HTMLDivElement>) => {
        e.preventDefault();
        onDragOver(slot);
      }}
      onDragLeave={onDragLeave}
      onDrop={(e: DragEvent<HTMLDivElement>) => {
        e.preventDefault();
        onDrop(slot);
      }}
    >
      <div className="flex items-start justify-between gap-1">
        <span className="font-mono text-[10px] text-slate-400">{slot.slot_number}</span>
        {appearance === "pending" && <Loader2 className="h-3.5 w-3.5 animate-spin" />}
      </div>

      {hasDevice && (
        <div className="min-w-0">
          <div className="truncate font-medium">{slot.device_label || deviceName || "Device"}</div>
          {slot.current_setting !== null && <div className="text-[11px] text-slate-500">{slot.current_setting}A</div>}
        </div>
      )}

      {hint && (
        <p
          role={hint.tone === "failed" ? "alert" : undefined}
          className={cn(
            "rounded bg-white/90 px-1 py-0.5 text-[10px] leading-tight",
            hint.tone === "rejected" ? "text-rose-700" : "text-amber-800"
          )}
        >
          {hint.message}
        </p>
      )}

      {hasDevice && appearance !== "pending" && (
        <div className="absolute right-1 top-1 flex gap-0.5">
          {isAnchor && (
            <Button variant="ghost" size="icon" aria-label="Configure device" onClick={() => onConfigure(slot)}>
              <Settings2 className="h-3.5 w-3.5" />
            </Button>
          )}
          <Button variant="ghost" size="icon" aria-label="Remove device" onClick={() => onRemove(slot)}>
            <X className="h-3.5 w-3.5" />
          </Button>
        </div>
      )}
    </div>
  );
}
