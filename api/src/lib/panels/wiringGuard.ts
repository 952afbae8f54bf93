// api/src/lib/panels/wiringGuard.ts
import type { PanelTx } from "./store";

export interface WiringGuard {
  /**
   * Told about slots whose device was removed, inside the removal's
   * transaction. Returns the ids of wires it flagged.
   */
  onSlotsFreed(tx: PanelTx, panelId: number, slotIds: readonly number[]): Promise<number[]>;
}

/**
 * Wires ending on a freed slot are kept and marked `orphaned`, so the wiring
 * view can list them for the user to re-terminate or delete.
 */
export const flagOrphanedWires: WiringGuard = {
  async onSlotsFreed(tx, panelId, slotIds) {
    if (!slotIds.length) return [];
    const flagged = await tx.flagWiresForSlots(panelId, slotIds);
    if (flagged.length) {
      console.log(`[wiring] panel ${panelId}: flagged ${flagged.length} wire(s) as orphaned (${flagged.join(", ")})`);
    }
    return flagged;
  },
};
