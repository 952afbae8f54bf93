'use client';

import useSWR from 'swr';
import {
  WIRE_COLORS_PATH,
  WIRE_CROSS_SECTIONS_PATH,
  wiresPath,
  wiringApi,
  type WireFields,
} from '@/lib/panels-api';

const lookupOptions = { revalidateOnFocus: false, revalidateIfStale: false } as const;

/** Wires of one panel plus the colour and cross-section lookups the wire form offers. */
export function useWiring(panelId: number) {
  const { data, error, isLoading, mutate } = useSWR(wiresPath(panelId), () => wiringApi.listWires(panelId));
  const { data: colors } = useSWR(WIRE_COLORS_PATH, () => wiringApi.colorStandards(), lookupOptions);
  const { data: crossSections } = useSWR(WIRE_CROSS_SECTIONS_PATH, () => wiringApi.crossSections(), lookupOptions);

  const wires = data ?? [];

  async function create(fields: WireFields) {
    await wiringApi.createWire(panelId, fields);
    await mutate();
  }

  async function update(wireId: number, changes: Partial<WireFields>) {
    await wiringApi.updateWire(wireId, changes);
    await mutate();
  }

  async function remove(wireId: number) {
    await wiringApi.deleteWire(wireId);
    await mutate();
  }

  return {
    wires,
    orphanedCount: wires.filter((w) => w.orphaned).length,
    isLoading,
    error: error instanceof Error ? error.message : null,
    colors,
    crossSections: crossSections?.domestic ?? [],
    reload: mutate,
    create,
    update,
    remove,
  };
}
