"use client";

import { useEffect, useState } from "react";
import type { Slot } from "panel-shared";
import { Button } from "@/components/ui/button";
import { Dialog } from "@/components/ui/dialog";
import type { CrossSectionRow, Wire, WireColorStandards, WireFields } from "@/lib/panels-api";
import {
  WIRE_TYPES,
  conductorColors,
  emptyWireForm,
  endpointLabel,
  parseWireForm,
  wireToForm,
  type WireForm,
  type WireFormErrors,
} from "@/lib/wiring";

interface WireDialogProps {
  open: boolean;
  /** The wire being edited, or null for a new one. */
  wire: Wire | null;
  slots: Slot[];
  colors: WireColorStandards | undefined;
  crossSections: CrossSectionRow[];
  onClose: () => void;
  onSubmit: (fields: WireFields) => void;
}

const inputClass = "mt-1 h-9 w-full rounded-md border border-slate-300 px-2";

export function WireDialog({ open, wire, slots, colors, crossSections, onClose, onSubmit }: WireDialogProps) {
  const [form, setForm] = useState<WireForm>(emptyWireForm);
  const [errors, setErrors] = useState<WireFormErrors>({});

  useEffect(() => {
    if (!open) return;
    setForm(wire ? wireToForm(wire) : emptyWireForm());
    setErrors({});
  }, [open, wire]);

  const set = (key: keyof WireForm) => (e: { target: { value: string } }) => setForm((f) => ({ ...f, [key]: e.target.value }));

  const devices = slots.filter((s) => s.device_template_id !== null);
  const colorOptions = conductorColors(colors, form.wire_type);

  function submit() {
    const parsed = parseWireForm(form);
    if (!parsed.ok) {
      setErrors(parsed.errors);
      return;
    }
    onSubmit(parsed.fields);
  }

  const slotSelect = (key: "source_slot_id" | "destination_slot_id", externalKey: "external_source" | "external_destination") => {
    const current = wire?.[key] ?? null;
    // A wire left on a freed slot keeps that slot selectable until it is moved.
    const stale = current !== null && !devices.some((s) => s.id === current);
    return (
      <div className="grid grid-cols-2 gap-2">
        <select value={form[key]} onChange={set(key)} className={inputClass}>
          <option value="">External</option>
          {stale && <option value={String(current)}>{endpointLabel(slots, current, null)} (freed)</option>}
          {devices.map((s) => (
            <option key={s.id} value={String(s.id)}>
              {endpointLabel(slots, s.id, null)}
            </option>
          ))}
        </select>
        <input
          value={form[externalKey]}
          onChange={set(externalKey)}
          disabled={form[key] !== ""}
          placeholder="e.g. Kitchen sockets"
          className={inputClass}
        />
      </div>
    );
  };

  return (
    <Dialog
      open={open}
      onOpenChange={(next) => {
        if (!next) onClose();
      }}
      title={wire ? `Edit ${wire.label}` : "Add wire"}
      footer={
        <>
          <Button variant="outline" onClick={onClose}>
            Cancel
          </Button>
          <Button onClick={submit}>{wire ? "Save" : "Add"}</Button>
        </>
      }
    >
      <div className="space-y-3 text-sm">
        <label className="block">
          <span className="text-slate-600">Label</span>
          <input value={form.label} onChange={set("label")} className={inputClass} />
          {errors.label && <span className="mt-1 block text-xs text-rose-600">{errors.label}</span>}
        </label>

        <div className="grid grid-cols-2 gap-3">
          <label className="block">
            <span className="text-slate-600">Type</span>
            <select value={form.wire_type} onChange={set("wire_type")} className={inputClass}>
              {WIRE_TYPES.map((t) => (
                <option key={t}>{t}</option>
              ))}
            </select>
          </label>
          <label className="block">
            <span className="text-slate-600">Colour</span>
            <select value={form.color} onChange={set("color")} className={inputClass}>
              <option value="">Unspecified</option>
              {form.color && !colorOptions.includes(form.color) && <option>{form.color}</option>}
              {colorOptions.map((c) => (
                <option key={c}>{c}</option>
              ))}
            </select>
          </label>
        </div>

        <div className="grid grid-cols-2 gap-3">
          <label className="block">
            <span className="text-slate-600">Cross section (mm²)</span>
            <input value={form.cross_section} onChange={set("cross_section")} inputMode="decimal" list="cross-sections" className={inputClass} />
            <datalist id="cross-sections">
              {crossSections.map((row) => (
                <option key={`${row.current}-${row.cross_section}`} value={row.cross_section}>
                  {row.current}, {row.typical_use}
                </option>
              ))}
            </datalist>
            {errors.cross_section && <span className="mt-1 block text-xs text-rose-600">{errors.cross_section}</span>}
          </label>
          <label className="block">
            <span className="text-slate-600">Length (m)</span>
            <input value={form.length} onChange={set("length")} inputMode="decimal" className={inputClass} />
            {errors.length && <span className="mt-1 block text-xs text-rose-600">{errors.length}</span>}
          </label>
        </div>

        <div>
          <span className="text-slate-600">From</span>
          {slotSelect("source_slot_id", "external_source")}
        </div>
        <div>
          <span className="text-slate-600">To</span>
          {slotSelect("destination_slot_id", "external_destination")}
        </div>
      </div>
    </Dialog>
  );
}
