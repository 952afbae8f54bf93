// api/src/lib/panels/panels.ts
import { materializeSlots, type Slot } from "panel-shared";
import { NotFoundError } from "./errors";
import type { PanelChanges, PanelRecord, PanelStore } from "./store";

export interface PanelWithSlots extends PanelRecord {
  total_slots: number;
  slots: Slot[];
}

export interface CreatePanelInput {
  name: string;
  panel_template_id: number;
  voltage?: number | null;
  current_rating?: number | null;
  description?: string | null;
}

function withSlots(panel: PanelRecord, slots: Slot[]): PanelWithSlots {
  return { ...panel, total_slots: panel.rows * panel.slots_per_row, slots };
}

/**
 * Creates a panel and every slot of its grid in one transaction. The grid
 * shape is copied from the template and never changes afterwards.
 */
export async function createPanel(store: PanelStore, input: CreatePanelInput): Promise<PanelWithSlots> {
  return store.transaction(async (tx) => {
    const template = await tx.findPanelTemplate(input.panel_template_id);
    if (!template) throw new NotFoundError("panel_template", input.panel_template_id);

    const panel = await tx.insertPanel({
      name: input.name,
      panel_template_id: template.id,
      manufacturer: template.manufacturer,
      model: template.model,
      rows: template.rows,
      slots_per_row: template.slots_per_row,
      voltage: input.voltage ?? template.voltage,
      current_rating: input.current_rating ?? template.max_current,
      description: input.description ?? null,
    });
    const slots = await tx.insertSlots(materializeSlots(panel.id, template));
    console.log(`[panels] created panel ${panel.id} from template ${template.id} with ${slots.length} slots`);
    return withSlots(panel, slots);
  });
}

export async function getPanel(store: PanelStore, panelId: number): Promise<PanelWithSlots> {
  return store.transaction(async (tx) => {
    const panel = await tx.findPanel(panelId);
    if (!panel) throw new NotFoundError("panel", panelId);
    return withSlots(panel, await tx.listSlots(panelId));
  });
}

export async function listPanels(store: PanelStore, skip = 0, limit = 100): Promise<PanelRecord[]> {
  return store.transaction((tx) => tx.listPanels(skip, limit));
}

export async function updatePanel(store: PanelStore, panelId: number, changes: PanelChanges): Promise<PanelRecord> {
  return store.transaction(async (tx) => {
    const panel = await tx.updatePanel(panelId, changes);
    if (!panel) throw new NotFoundError("panel", panelId);
    return panel;
  });
}

export async function deletePanel(store: PanelStore, panelId: number): Promise<void> {
  await store.transaction(async (tx) => {
    if (!(await tx.deletePanel(panelId))) throw new NotFoundError("panel", panelId);
  });
  console.log(`[panels] deleted panel ${panelId}`);
}
