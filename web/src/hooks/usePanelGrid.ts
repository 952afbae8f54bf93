'use client';

import { useCallback, useEffect, useMemo, useReducer, useRef } from 'react';
import type { DeviceTemplateRef, Slot } from 'panel-shared';
import { panelsApi, type PanelsApi } from '@/lib/panels-api';
import { initialPanelState, panelReducer } from '@/lib/panel/reducer';
import { dropFootprint, slotAppearance, slotHint, visibleSlots, type SlotAppearance } from '@/lib/panel/selectors';
import { createPanelSession } from '@/lib/panel/session';

/**
 * Panel editor state for one panel: loads the grid, keeps drag feedback local,
 * and routes every change through the reconciling session.
 */
export function usePanelGrid(
  panelId: number,
  { api = panelsApi, onWiresFlagged }: { api?: PanelsApi; onWiresFlagged?: (wireIds: number[]) => void } = {}
) {
  const [state, dispatch] = useReducer(panelReducer, initialPanelState);
  const stateRef = useRef(state);
  const flaggedRef = useRef(onWiresFlagged);

  useEffect(() => {
    stateRef.current = state;
  }, [state]);

  useEffect(() => {
    flaggedRef.current = onWiresFlagged;
  }, [onWiresFlagged]);

  const session = useMemo(
    () =>
      createPanelSession(api, dispatch, () => stateRef.current, {
        panelId,
        onWiresFlagged: (wireIds) => flaggedRef.current?.(wireIds),
      }),
    [api, panelId]
  );

  useEffect(() => {
    void session.refresh();
    return () => session.dispose();
  }, [session]);

  const hover = useCallback((slotId: number, template: DeviceTemplateRef) => {
    const current = stateRef.current.dropTarget;
    if (current?.slotId === slotId && current.template.id === template.id) return;
    dispatch({ type: 'hover', slotId, template });
  }, []);

  const hoverEnd = useCallback(() => dispatch({ type: 'hoverEnd' }), []);

  const slots = visibleSlots(state);
  const footprint = useMemo(() => dropFootprint(state), [state]);
  const appearanceOf = useCallback(
    (slot: Slot): SlotAppearance => slotAppearance(state, slot, footprint),
    [state, footprint]
  );

  return {
    slots,
    loaded: state.loaded,
    pending: state.pending,
    notice: state.notice,
    dropTarget: state.dropTarget,
    hint: slotHint(state),
    appearanceOf,
    hover,
    hoverEnd,
    session,
  };
}
