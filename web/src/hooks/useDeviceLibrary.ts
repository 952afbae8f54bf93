'use client';

import useSWR from 'swr';
import { apiFetch } from '@/lib/api';
import { DEVICE_TEMPLATES_PATH, type DeviceTemplate } from '@/lib/panels-api';

const fetcher = (path: string) => apiFetch<DeviceTemplate[]>(path);

/** Device catalog for the drag source. Refreshed in the background so spans never go stale for long. */
export function useDeviceLibrary() {
  const { data, error, isLoading, mutate } = useSWR<DeviceTemplate[]>(DEVICE_TEMPLATES_PATH, fetcher, {
    refreshInterval: 60_000,
    revalidateOnFocus: true,
  });

  return {
    templates: data ?? [],
    isLoading,
    error: error instanceof Error ? error.message : null,
    reload: mutate,
  };
}
