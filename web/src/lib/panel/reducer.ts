// web/src/lib/panel/reducer.ts
import {
  SlotGrid,
  TemplateConfigurationError,
  applyPatches,
  canPlace,
  planPlacement,
  planReconfigure,
  planRemoval,
  type DeviceMeta,
  type DeviceTemplateRef,
  type PlacementCheck,
  type Slot,
  type SlotPatch,
} from "panel-shared";

export interface PanelNotice {
  id: number;
  message: string;
  /** Slot the failed request targeted, so the grid can show the message in place. */
  slotId: number | null;
}

export interface DropTarget {
  slotId: number;
  template: DeviceTemplateRef;
  check: PlacementCheck;
}

export interface PendingMutation {
  kind: "place" | "remove" | "reconfigure";
  slotId: number;
  /** Slots the request is expected to change; rendered as pending until it settles. */
  slotIds: number[];
}

export interface PanelState {
  /** Last collection the server returned. Never patched locally. */
  slots: Slot[];
  /** Locally predicted collection while a request is in flight, if the local check allowed one. */
  speculative: Slot[] | null;
  dropTarget: DropTarget | null;
  pending: PendingMutation | null;
  notice: PanelNotice | null;
  loaded: boolean;
  /**
   * Order in which the session issued the view `slots` came from. A load that
   * was started before a later load or a committed mutation is older than it.
   */
  generation: number;
}

export type PanelAction =
  | { type: "loaded"; slots: Slot[]; generation: number }
  | { type: "hover"; slotId: number; template: DeviceTemplateRef }
  | { type: "hoverEnd" }
  | { type: "dropStarted"; slotId: number; template: DeviceTemplateRef; meta?: DeviceMeta }
  | { type: "removeStarted"; slotId: number }
  | { type: "reconfigureStarted"; slotId: number; meta: DeviceMeta }
  | { type: "mutationSucceeded"; slots: Slot[]; generation: number }
  | { type: "mutationFailed"; notice: PanelNotice }
  | { type: "noticeCleared"; id: number };

export const initialPanelState: PanelState = {
  slots: [],
  speculative: null,
  dropTarget: null,
  pending: null,
  notice: null,
  loaded: false,
  generation: 0,
};

/**
 * Runs the server's validator against the last authoritative grid. Null when
 * the slot is not on this panel or the template's span is malformed; the
 * server will answer those.
 */
export function localCheck(slots: readonly Slot[], slotId: number, template: DeviceTemplateRef): PlacementCheck | null {
  const grid = new SlotGrid(slots);
  const slot = grid.slotById(slotId);
  if (!slot) return null;
  try {
    return canPlace(grid, slot, template);
  } catch (err) {
    if (err instanceof TemplateConfigurationError) return null;
    throw err;
  }
}

function speculate(slots: Slot[], patches: SlotPatch[]): Pick<PanelState, "speculative"> & { slotIds: number[] } {
  return { speculative: applyPatches(slots, patches), slotIds: patches.map((p) => p.id) };
}

function startDrop(state: PanelState, slotId: number, template: DeviceTemplateRef, meta?: DeviceMeta): PanelState {
  const check = localCheck(state.slots, slotId, template);
  const pending = { kind: "place" as const, slotId };
  const base = { ...state, dropTarget: null };

  // A drop the local grid rejects is still sent; it just renders no prediction.
  if (!check?.allowed) return { ...base, speculative: null, pending: { ...pending, slotIds: [slotId] } };

  const grid = new SlotGrid(state.slots);
  const { speculative, slotIds } = speculate(state.slots, planPlacement(grid, grid.require(slotId), template, meta));
  return { ...base, speculative, pending: { ...pending, slotIds } };
}

function startRemove(state: PanelState, slotId: number): PanelState {
  const grid = new SlotGrid(state.slots);
  const slot = grid.slotById(slotId);
  const pending = { kind: "remove" as const, slotId };
  if (!slot) return { ...state, speculative: null, pending: { ...pending, slotIds: [slotId] } };

  const { speculative, slotIds } = speculate(state.slots, planRemoval(grid, slot).patches);
  return { ...state, speculative, pending: { ...pending, slotIds: slotIds.length ? slotIds : [slotId] } };
}

function startReconfigure(state: PanelState, slotId: number, meta: DeviceMeta): PanelState {
  const grid = new SlotGrid(state.slots);
  const slot = grid.slotById(slotId);
  const pending = { kind: "reconfigure" as const, slotId, slotIds: [slotId] };
  if (!slot || grid.stateOf(slot) !== "anchor") return { ...state, speculative: null, pending };
  return { ...state, speculative: speculate(state.slots, planReconfigure(slot, meta)).speculative, pending };
}

export function panelReducer(state: PanelState, action: PanelAction): PanelState {
  switch (action.type) {
    case "loaded":
      if (action.generation < state.generation) return state;
      // A refresh mid-request keeps the prediction until the request settles.
      return {
        ...state,
        slots: action.slots,
        speculative: state.pending ? state.speculative : null,
        loaded: true,
        generation: action.generation,
      };

    case "hover": {
      const check = localCheck(state.slots, action.slotId, action.template);
      return { ...state, dropTarget: check ? { slotId: action.slotId, template: action.template, check } : null };
    }

    case "hoverEnd":
      return state.dropTarget ? { ...state, dropTarget: null } : state;

    case "dropStarted":
      return startDrop(state, action.slotId, action.template, action.meta);

    case "removeStarted":
      return startRemove(state, action.slotId);

    case "reconfigureStarted":
      return startReconfigure(state, action.slotId, action.meta);

    case "mutationSucceeded":
      // The server's view replaces ours wholesale.
      return {
        ...state,
        slots: action.slots,
        speculative: null,
        pending: null,
        loaded: true,
        generation: Math.max(state.generation, action.generation),
      };

    case "mutationFailed":
      return { ...state, speculative: null, pending: null, notice: action.notice };

    case "noticeCleared":
      return state.notice?.id === action.id ? { ...state, notice: null } : state;
  }
}
