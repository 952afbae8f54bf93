"use client";

import { useState } from "react";
import { AlertTriangle, Cable, Pencil, Plus, Trash2 } from "lucide-react";
import { toast } from "sonner";
import type { Slot } from "panel-shared";
import { Button } from "@/components/ui/button";
import { useWiring } from "@/hooks/useWiring";
import { failureMessage } from "@/lib/panel/session";
import type { Wire, WireFields } from "@/lib/panels-api";
import { cn } from "@/lib/utils";
import { endpointLabel, wireChanges } from "@/lib/wiring";
import { WireDialog } from "./WireDialog";

interface WiringPanelProps {
  slots: Slot[];
  wiring: ReturnType<typeof useWiring>;
}

/** Wire list for one panel. Wires left on a removed device stay listed, marked orphaned, until moved or deleted. */
export function WiringPanel({ slots, wiring }: WiringPanelProps) {
  const { wires, orphanedCount, isLoading, error, colors, crossSections } = wiring;
  const [editing, setEditing] = useState<Wire | null>(null);
  const [dialogOpen, setDialogOpen] = useState(false);

  function open(wire: Wire | null) {
    setEditing(wire);
    setDialogOpen(true);
  }

  async function submit(fields: WireFields) {
    try {
      if (editing) {
        const changes = wireChanges(editing, fields);
        if (Object.keys(changes).length) await wiring.update(editing.id, changes);
      } else {
        await wiring.create(fields);
      }
      setDialogOpen(false);
    } catch (err) {
      console.error("[wiring] save failed:", err);
      toast.error(failureMessage(err));
    }
  }

  async function remove(wire: Wire) {
    if (!window.confirm(`Delete wire "${wire.label}"?`)) return;
    try {
      await wiring.remove(wire.id);
    } catch (err) {
      console.error("[wiring] delete failed:", err);
      toast.error(failureMessage(err));
    }
  }

  return (
    <section className="space-y-3 rounded-xl border border-slate-200 bg-white p-4 shadow-card">
      <div className="flex items-center justify-between">
        <h2 className="flex items-center gap-2 font-semibold text-slate-900">
          <Cable className="h-4 w-4 text-brand-500" /> Wiring
          {orphanedCount > 0 && (
            <span className="rounded-full bg-amber-100 px-2 py-0.5 text-xs font-medium text-amber-800">
              {orphanedCount} orphaned
            </span>
          )}
        </h2>
        <Button size="sm" onClick={() => open(null)}>
          <Plus className="h-4 w-4" /> Add wire
        </Button>
      </div>

      {error && <p className="text-sm text-rose-600">{error}</p>}
      {isLoading ? (
        <p className="text-sm text-slate-500">Loading wiring…</p>
      ) : wires.length === 0 ? (
        <p className="text-sm text-slate-500">No wires yet.</p>
      ) : (
        <table className="w-full text-left text-sm">
          <thead className="text-xs uppercase text-slate-500">
            <tr>
              <th className="py-1">Label</th>
              <th>Type</th>
              <th>mm²</th>
              <th>Colour</th>
              <th>From</th>
              <th>To</th>
              <th>Length</th>
              <th />
            </tr>
          </thead>
          <tbody className="divide-y divide-slate-100">
            {wires.map((w) => (
              <tr key={w.id} className={cn(w.orphaned && "bg-amber-50")}>
                <td className="py-1.5 font-medium">
                  <span className="flex items-center gap-1.5">
                    {w.orphaned && (
                      <AlertTriangle className="h-3.5 w-3.5 text-amber-600" aria-label="Orphaned: its device was removed" />
                    )}
                    {w.label}
                  </span>
                </td>
                <td>{w.wire_type}</td>
                <td>{w.cross_section}</td>
                <td>{w.color ?? "-"}</td>
                <td>{endpointLabel(slots, w.source_slot_id, w.external_source)}</td>
                <td>{endpointLabel(slots, w.destination_slot_id, w.external_destination)}</td>
                <td>{w.length === null ? "-" : `${w.length} m`}</td>
                <td className="text-right">
                  <Button variant="ghost" size="icon" aria-label="Edit wire" onClick={() => open(w)}>
                    <Pencil className="h-3.5 w-3.5" />
                  </Button>
                  <Button variant="ghost" size="icon" aria-label="Delete wire" onClick={() => void remove(w)}>
                    <Trash2 className="h-3.5 w-3.5" />
                  </Button>
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}

      <WireDialog
        open={dialogOpen}
        wire={editing}
        slots={slots}
        colors={colors}
        crossSections={crossSections}
        onClose={() => setDialogOpen(false)}
        onSubmit={(fields) => void submit(fields)}
      />
    </section>
  );
}
