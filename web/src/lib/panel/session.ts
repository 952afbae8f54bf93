// web/src/lib/panel/session.ts
import type { DeviceMeta, DeviceTemplateRef, Slot } from "panel-shared";
import { ApiError } from "../api";
import type { PanelsApi } from "../panels-api";
import type { PanelAction, PanelState } from "./reducer";

/** How long a failure notice stays up before it clears itself. */
export const NOTICE_TIMEOUT_MS = 4000;

export interface PanelSessionOptions {
  panelId: number;
  noticeTimeoutMs?: number;
  /** Called after a removal left wires pointing at freed slots. */
  onWiresFlagged?: (wireIds: number[]) => void;
}

/**
 * User intents against one panel. Each resolves true when the server accepted
 * the change, false when it was refused, failed, or another change was still
 * in flight. None of them reject.
 */
export interface PanelSession {
  drop(slotId: number, template: DeviceTemplateRef, meta?: DeviceMeta): Promise<boolean>;
  remove(slotId: number): Promise<boolean>;
  reconfigure(slotId: number, meta: DeviceMeta): Promise<boolean>;
  refresh(): Promise<void>;
  /** Cancels pending notice timers. */
  dispose(): void;
}

export function failureMessage(err: unknown): string {
  if (err instanceof ApiError) return err.reason ?? err.message;
  if (err instanceof Error) return err.message;
  return "Request failed";
}

/**
 * Two-phase protocol: render a local prediction, send the request, then either
 * replace the whole slot collection with the server's or drop the prediction,
 * show the server's reason and re-fetch.
 */
export function createPanelSession(
  api: PanelsApi,
  dispatch: (action: PanelAction) => void,
  getState: () => PanelState,
  { panelId, noticeTimeoutMs = NOTICE_TIMEOUT_MS, onWiresFlagged }: PanelSessionOptions
): PanelSession {
  const timers = new Set<ReturnType<typeof setTimeout>>();
  let noticeSeq = 0;
  // Loads take a generation when they are sent, mutations when their answer arrives.
  let generation = 0;

  function notify(message: string, slotId: number | null = null) {
    const id = ++noticeSeq;
    dispatch({ type: "mutationFailed", notice: { id, message, slotId } });
    const timer = setTimeout(() => {
      timers.delete(timer);
      dispatch({ type: "noticeCleared", id });
    }, noticeTimeoutMs);
    timers.add(timer);
  }

  /** After a failed mutation the rejection stays the visible notice, not the reload's. */
  async function reload(reportFailure: boolean) {
    const issued = ++generation;
    try {
      const panel = await api.getPanel(panelId);
      dispatch({ type: "loaded", slots: panel.slots, generation: issued });
    } catch (err) {
      console.error(`[panels] failed to load panel ${panelId}:`, err);
      if (reportFailure) notify(failureMessage(err));
    }
  }

  async function mutate<R extends { slots: Slot[] }>(
    start: Extract<PanelAction, { type: "dropStarted" | "removeStarted" | "reconfigureStarted" }>,
    request: () => Promise<R>,
    onSuccess?: (res: R) => void
  ): Promise<boolean> {
    if (getState().pending) return false;
    dispatch(start);
    try {
      const res = await request();
      dispatch({ type: "mutationSucceeded", slots: res.slots, generation: ++generation });
      onSuccess?.(res);
      return true;
    } catch (err) {
      notify(failureMessage(err), start.slotId);
      await reload(false);
      return false;
    }
  }

  return {
    drop: (slotId, template, meta) =>
      mutate({ type: "dropStarted", slotId, template, meta }, () => api.placeDevice(slotId, template.id, meta)),

    remove: (slotId) =>
      mutate({ type: "removeStarted", slotId }, () => api.removeDevice(slotId), (res) => {
        if (res.flagged_wire_ids.length) onWiresFlagged?.(res.flagged_wire_ids);
      }),

    reconfigure: (slotId, meta) => {
      if (getState().pending) return Promise.resolve(false);
      const anchor = getState().slots.find((s) => s.id === slotId);
      if (!anchor || anchor.device_template_id === null) {
        notify("This slot has no device to configure", slotId);
        return Promise.resolve(false);
      }
      const templateId = anchor.device_template_id;
      return mutate({ type: "reconfigureStarted", slotId, meta }, () => api.reconfigureDevice(slotId, templateId, meta));
    },

    refresh: () => reload(true),

    dispose() {
      for (const timer of timers) clearTimeout(timer);
      timers.clear();
    },
  };
}
