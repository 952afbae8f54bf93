// api/src/lib/panels/store.ts
import type { NewSlot, Slot, SlotPatch } from "panel-shared";

export interface PanelRecord {
  id: number;
  name: string;
  panel_template_id: number;
  manufacturer: string | null;
  model: string | null;
  rows: number;
  slots_per_row: number;
  voltage: number | null;
  current_rating: number | null;
  description: string | null;
  created_at: string;
  updated_at: string | null;
}

export type PanelInsert = Omit<PanelRecord, "id" | "created_at" | "updated_at">;
/** Grid shape and template link are fixed at creation. */
export type PanelChanges = Partial<Pick<PanelRecord, "name" | "voltage" | "current_rating" | "description">>;

export interface PanelTemplateRecord {
  id: number;
  name: string;
  manufacturer: string;
  model: string;
  series: string | null;
  rows: number;
  slots_per_row: number;
  voltage: number | null;
  max_current: number | null;
  description: string | null;
  is_active: boolean;
}

export interface DeviceTemplateRecord {
  id: number;
  name: string;
  manufacturer: string;
  model: string;
  series: string | null;
  device_type: string;
  category: string;
  slots_required: number;
  width_in_modules: number;
  rated_current: number | null;
  description: string | null;
  is_active: boolean;
}

export interface DeviceTemplateFilter {
  manufacturer?: string;
  category?: string;
  device_type?: string;
  active_only?: boolean;
}

export interface WireRecord {
  id: number;
  panel_id: number;
  label: string;
  wire_type: string;
  cross_section: number;
  color: string | null;
  source_slot_id: number | null;
  destination_slot_id: number | null;
  external_source: string | null;
  external_destination: string | null;
  length: number | null;
  /** Set when a slot this wire ends on was freed. */
  orphaned: boolean;
}

export type WireInsert = Omit<WireRecord, "id" | "orphaned">;
export type WireChanges = Partial<Omit<WireRecord, "id" | "panel_id">>;

/**
 * Everything the engine and the CRUD routes read or write, scoped to one
 * transaction. Nothing here validates; callers do that first.
 */
export interface PanelTx {
  /** Whole slot collection of a panel, locked against concurrent writers until commit. */
  lockPanelSlots(panelId: number): Promise<Slot[]>;
  listSlots(panelId: number): Promise<Slot[]>;
  findSlot(slotId: number): Promise<Slot | null>;
  updateSlots(patches: readonly SlotPatch[]): Promise<void>;
  insertSlots(slots: readonly NewSlot[]): Promise<Slot[]>;

  findDeviceTemplate(id: number): Promise<DeviceTemplateRecord | null>;
  listDeviceTemplates(filter?: DeviceTemplateFilter): Promise<DeviceTemplateRecord[]>;
  findPanelTemplate(id: number): Promise<PanelTemplateRecord | null>;
  listPanelTemplates(activeOnly?: boolean): Promise<PanelTemplateRecord[]>;

  insertPanel(input: PanelInsert): Promise<PanelRecord>;
  findPanel(id: number): Promise<PanelRecord | null>;
  listPanels(skip: number, limit: number): Promise<PanelRecord[]>;
  updatePanel(id: number, changes: PanelChanges): Promise<PanelRecord | null>;
  /** Removes the panel with its slots and wires. */
  deletePanel(id: number): Promise<boolean>;

  listWires(panelId: number, orphanedOnly?: boolean): Promise<WireRecord[]>;
  findWire(id: number): Promise<WireRecord | null>;
  insertWire(input: WireInsert): Promise<WireRecord>;
  updateWire(id: number, changes: WireChanges): Promise<WireRecord | null>;
  deleteWire(id: number): Promise<boolean>;
  /** Marks wires touching any of the slots as orphaned; returns their ids. */
  flagWiresForSlots(panelId: number, slotIds: readonly number[]): Promise<number[]>;
}

export interface PanelStore {
  /**
   * Runs `fn` in one indivisible transaction. If `fn` throws, nothing it wrote
   * becomes visible. Persistence failures surface as PersistenceError.
   */
  transaction<T>(fn: (tx: PanelTx) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
