import { createPanel, type PanelWithSlots } from "../../src/lib/panels/panels";
import type { DeviceTemplateRecord, WireInsert } from "../../src/lib/panels/store";
import { MemoryPanelStore } from "./memoryStore";

export interface Workbench {
  store: MemoryPanelStore;
  panel: PanelWithSlots;
  mcb: DeviceTemplateRecord;
  rcbo: DeviceTemplateRecord;
  meter: DeviceTemplateRecord;
  /** Slot id for a slot number of the workbench panel. */
  slot(n: number): number;
}

/** A 2 x 6 panel with a 1, 2 and 4 module device in the catalog. */
export async function workbench(): Promise<Workbench> {
  const store = new MemoryPanelStore();
  const template = store.addPanelTemplate();
  const mcb = store.addDeviceTemplate({ name: "MCB 16A", slots_required: 1, rated_current: 16 });
  const rcbo = store.addDeviceTemplate({ name: "RCBO 32A", slots_required: 2, device_type: "RCBO", rated_current: 32 });
  const meter = store.addDeviceTemplate({ name: "Smart Meter", slots_required: 4, device_type: "Meter", category: "Metering" });

  // A panel created first keeps slot ids from lining up with slot numbers.
  await createPanel(store, { name: "Garage", panel_template_id: template.id });
  const panel = await createPanel(store, { name: "Kitchen", panel_template_id: template.id });

  return { store, panel, mcb, rcbo, meter, slot: (n) => store.slotId(panel.id, n) };
}

export function wireInput(panelId: number, fields: Partial<WireInsert> = {}): WireInsert {
  return {
    panel_id: panelId,
    label: "L1",
    wire_type: "T&E",
    cross_section: 2.5,
    color: "Brown",
    source_slot_id: null,
    destination_slot_id: null,
    external_source: null,
    external_destination: null,
    length: null,
    ...fields,
  };
}
