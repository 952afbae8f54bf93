// web/src/lib/panels-api.ts
import type { DeviceMeta, Slot } from "panel-shared";
import { apiFetch } from "./api";

export interface PanelSummary {
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
}

export interface PanelTemplate {
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
}

export interface NewPanel {
  name: string;
  panel_template_id: number;
  voltage?: number | null;
  current_rating?: number | null;
  description?: string | null;
}

export interface Wire {
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
  orphaned: boolean;
}

export type WireFields = Omit<Wire, "id" | "panel_id" | "orphaned">;

/** Colour codes keyed by standard (e.g. "UK"), then by conductor role. */
export type WireColorStandards = Record<string, Record<string, string[]>>;

export interface CrossSectionRow {
  current: string;
  cross_section: number;
  typical_use: string;
}

export type CrossSectionStandards = Record<string, CrossSectionRow[]>;

export interface PanelView extends PanelSummary {
  total_slots: number;
  slots: Slot[];
}

export interface DeviceTemplate {
  id: number;
  name: string;
  manufacturer: string;
  model: string;
  series: string | null;
  device_type: string;
  category: string;
  slots_required: number;
  rated_current: number | null;
  description: string | null;
  is_active: boolean;
}

export interface SlotMutationResponse {
  action: "placed" | "reconfigured" | "removed";
  panel_id: number;
  span: Slot[];
  slots: Slot[];
  freed_slot_ids?: number[];
  flagged_wire_ids?: number[];
}

export interface RemovalResponse {
  message: string;
  panel_id: number;
  freed_slot_ids: number[];
  flagged_wire_ids: number[];
  slots: Slot[];
}

/** The endpoints the panel editor calls. Every mutation answers with the whole slot collection. */
export interface PanelsApi {
  getPanel(panelId: number): Promise<PanelView>;
  placeDevice(slotId: number, deviceTemplateId: number, meta?: DeviceMeta): Promise<SlotMutationResponse>;
  reconfigureDevice(slotId: number, deviceTemplateId: number, meta: DeviceMeta): Promise<SlotMutationResponse>;
  removeDevice(slotId: number): Promise<RemovalResponse>;
  listDeviceTemplates(): Promise<DeviceTemplate[]>;
}

export const DEVICE_TEMPLATES_PATH = "/templates/device-templates";

export const panelsApi: PanelsApi = {
  getPanel: (panelId) => apiFetch<PanelView>(`/panels/${panelId}`),

  placeDevice: (slotId, deviceTemplateId, meta = {}) =>
    apiFetch<SlotMutationResponse>(`/devices/slots/${slotId}`, {
      method: "PUT",
      json: { device_template_id: deviceTemplateId, ...meta },
    }),

  // Same template id on the anchor means "edit metadata" to the API.
  reconfigureDevice: (slotId, deviceTemplateId, meta) =>
    apiFetch<SlotMutationResponse>(`/devices/slots/${slotId}`, {
      method: "PUT",
      json: { device_template_id: deviceTemplateId, ...meta },
    }),

  removeDevice: (slotId) => apiFetch<RemovalResponse>(`/devices/slots/${slotId}/device`, { method: "DELETE" }),

  listDeviceTemplates: () => apiFetch<DeviceTemplate[]>(DEVICE_TEMPLATES_PATH),
};

export const PANELS_PATH = "/panels";
export const PANEL_TEMPLATES_PATH = "/templates/panel-templates";

/** Panel list and lifecycle, used by the index page. */
export const panelAdminApi = {
  listPanels: () => apiFetch<PanelSummary[]>(PANELS_PATH),
  listPanelTemplates: () => apiFetch<PanelTemplate[]>(PANEL_TEMPLATES_PATH),
  createPanel: (panel: NewPanel) => apiFetch<PanelView>(PANELS_PATH, { method: "POST", json: panel }),
  deletePanel: (panelId: number) => apiFetch<{ message: string }>(`${PANELS_PATH}/${panelId}`, { method: "DELETE" }),
};

export const wiresPath = (panelId: number) => `/wiring/panel/${panelId}`;
export const WIRE_COLORS_PATH = "/wiring/standards/colors";
export const WIRE_CROSS_SECTIONS_PATH = "/wiring/standards/cross-sections";

export const wiringApi = {
  listWires: (panelId: number) => apiFetch<Wire[]>(wiresPath(panelId)),
  createWire: (panelId: number, fields: WireFields) =>
    apiFetch<Wire>("/wiring", { method: "POST", json: { panel_id: panelId, ...fields } }),
  updateWire: (wireId: number, changes: Partial<WireFields>) =>
    apiFetch<Wire>(`/wiring/${wireId}`, { method: "PUT", json: changes }),
  deleteWire: (wireId: number) => apiFetch<{ message: string }>(`/wiring/${wireId}`, { method: "DELETE" }),
  colorStandards: () => apiFetch<WireColorStandards>(WIRE_COLORS_PATH),
  crossSections: () => apiFetch<CrossSectionStandards>(WIRE_CROSS_SECTIONS_PATH),
};
