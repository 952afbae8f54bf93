// shared/src/types.ts

/** A single mounting position on a panel. Field names match the wire format. */
export interface Slot {
  id: number;
  panel_id: number;
  slot_number: number;
  row: number;
  column: number;
  is_occupied: boolean;
  /** Set only on the anchor (lowest slot_number) of a placed device. */
  device_template_id: number | null;
  /** Authoritative only on the anchor. */
  spans_slots: number;
  device_label: string | null;
  current_setting: number | null;
  custom_properties: Record<string, unknown> | null;
}

export interface PanelTemplateShape {
  rows: number;
  slots_per_row: number;
}

/** The only template fields the engine reads. */
export interface DeviceTemplateRef {
  id: number;
  slots_required: number;
}

export type SlotState = "free" | "anchor" | "blocked";

export type PlacementReasonCode =
  | "template_not_found"
  | "slot_occupied"
  | "insufficient_contiguous_slots"
  | "overlaps_existing_device";

export const PLACEMENT_REASONS: Record<PlacementReasonCode, string> = {
  template_not_found: "template not found",
  slot_occupied: "slot occupied",
  insufficient_contiguous_slots: "insufficient contiguous slots in row",
  overlaps_existing_device: "overlaps existing device",
};

export interface PlacementCheck {
  allowed: boolean;
  code: PlacementReasonCode | null;
  reason: string | null;
  requiredSlots: number;
  availableContiguousSlots: number;
}

export interface DeviceMeta {
  device_label?: string | null;
  current_setting?: number | null;
  custom_properties?: Record<string, unknown> | null;
}

/** A partial write against one slot, keyed by id. */
export interface SlotPatch {
  id: number;
  changes: Partial<
    Pick<
      Slot,
      | "is_occupied"
      | "device_template_id"
      | "spans_slots"
      | "device_label"
      | "current_setting"
      | "custom_properties"
    >
  >;
}
