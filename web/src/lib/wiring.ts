// web/src/lib/wiring.ts
import type { Slot } from "panel-shared";
import type { WireColorStandards, Wire, WireFields } from "./panels-api";

export const WIRE_TYPES = ["Live", "Neutral", "Earth", "Switched Live"] as const;

/** Editable wire fields as the form holds them: text inputs, "" for unset. */
export interface WireForm {
  label: string;
  wire_type: string;
  cross_section: string;
  color: string;
  source_slot_id: string;
  destination_slot_id: string;
  external_source: string;
  external_destination: string;
  length: string;
}

export type WireFormErrors = Partial<Record<keyof WireForm, string>>;

export type ParsedWireForm = { ok: true; fields: WireFields } | { ok: false; errors: WireFormErrors };

export function emptyWireForm(): WireForm {
  return {
    label: "",
    wire_type: "Live",
    cross_section: "2.5",
    color: "",
    source_slot_id: "",
    destination_slot_id: "",
    external_source: "",
    external_destination: "",
    length: "",
  };
}

const text = (value: string | number | null) => (value === null ? "" : String(value));

export function wireToForm(wire: Wire): WireForm {
  return {
    label: wire.label,
    wire_type: wire.wire_type,
    cross_section: text(wire.cross_section),
    color: text(wire.color),
    source_slot_id: text(wire.source_slot_id),
    destination_slot_id: text(wire.destination_slot_id),
    external_source: text(wire.external_source),
    external_destination: text(wire.external_destination),
    length: text(wire.length),
  };
}

const orNull = (value: string) => value.trim() || null;

/** null for an empty input, NaN for one that is not a positive number. */
function positive(value: string): number | null {
  if (!value.trim()) return null;
  const n = Number(value);
  return Number.isFinite(n) && n > 0 ? n : NaN;
}

function slotRef(value: string): number | null {
  const n = positive(value);
  return n !== null && Number.isInteger(n) ? n : null;
}

export function parseWireForm(form: WireForm): ParsedWireForm {
  const errors: WireFormErrors = {};
  const label = form.label.trim();
  const crossSection = positive(form.cross_section);
  const length = positive(form.length);

  if (!label) errors.label = "Label is required";
  if (crossSection === null || Number.isNaN(crossSection)) errors.cross_section = "Enter a cross section in mm²";
  if (length !== null && Number.isNaN(length)) errors.length = "Enter a positive length";
  if (Object.keys(errors).length || crossSection === null) return { ok: false, errors };

  // An end terminates either on a slot or somewhere outside the panel.
  const source = slotRef(form.source_slot_id);
  const destination = slotRef(form.destination_slot_id);

  return {
    ok: true,
    fields: {
      label,
      wire_type: form.wire_type,
      cross_section: crossSection,
      color: orNull(form.color),
      source_slot_id: source,
      destination_slot_id: destination,
      external_source: source === null ? orNull(form.external_source) : null,
      external_destination: destination === null ? orNull(form.external_destination) : null,
      length,
    },
  };
}

/**
 * Only the fields that changed. The API clears a wire's orphaned flag when an
 * endpoint is sent, so unchanged endpoints must stay out of the update.
 */
export function wireChanges(wire: Wire, fields: WireFields): Partial<WireFields> {
  const changes: Partial<WireFields> = {};
  if (fields.label !== wire.label) changes.label = fields.label;
  if (fields.wire_type !== wire.wire_type) changes.wire_type = fields.wire_type;
  if (fields.cross_section !== wire.cross_section) changes.cross_section = fields.cross_section;
  if (fields.color !== wire.color) changes.color = fields.color;
  if (fields.source_slot_id !== wire.source_slot_id) changes.source_slot_id = fields.source_slot_id;
  if (fields.destination_slot_id !== wire.destination_slot_id) changes.destination_slot_id = fields.destination_slot_id;
  if (fields.external_source !== wire.external_source) changes.external_source = fields.external_source;
  if (fields.external_destination !== wire.external_destination) changes.external_destination = fields.external_destination;
  if (fields.length !== wire.length) changes.length = fields.length;
  return changes;
}

export function endpointLabel(slots: readonly Slot[], slotId: number | null, external: string | null): string {
  if (slotId === null) return external ?? "-";
  const slot = slots.find((s) => s.id === slotId);
  if (!slot) return `Slot #${slotId}`;
  return slot.device_label ? `${slot.slot_number}: ${slot.device_label}` : `Slot ${slot.slot_number}`;
}

/** Allowed colours for a conductor role, merged across every standard that lists it. */
export function conductorColors(standards: WireColorStandards | undefined, wireType: string): string[] {
  if (!standards) return [];
  const colors = new Set<string>();
  for (const roles of Object.values(standards)) {
    for (const color of roles[wireType] ?? []) colors.add(color);
  }
  return [...colors];
}
