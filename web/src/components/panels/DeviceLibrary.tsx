"use client";

import { useMemo, useState, type DragEvent } from "react";
import { GripVertical, Search } from "lucide-react";
import type { DeviceTemplate } from "@/lib/panels-api";
import { cn } from "@/lib/utils";

interface DeviceLibraryProps {
  templates: DeviceTemplate[];
  isLoading: boolean;
  error: string | null;
  dragging: DeviceTemplate | null;
  onDragStart: (template: DeviceTemplate) => void;
  onDragEnd: () => void;
}

export function DeviceLibrary({ templates, isLoading, error, dragging, onDragStart, onDragEnd }: DeviceLibraryProps) {
  const [query, setQuery] = useState("");

  const groups = useMemo(() => {
    const q = query.trim().toLowerCase();
    const byCategory = new Map<string, DeviceTemplate[]>();
    for (const t of templates) {
      const haystack = `${t.name} ${t.manufacturer} ${t.model} ${t.device_type}`.toLowerCase();
      if (q && !haystack.includes(q)) continue;
      const list = byCategory.get(t.category);
      if (list) list.push(t);
      else byCategory.set(t.category, [t]);
    }
    return [...byCategory.entries()].sort(([a], [b]) => a.localeCompare(b));
  }, [templates, query]);

  return (
    <aside className="w-72 shrink-0 space-y-3">
      <div className="relative">
        <Search className="absolute left-2 top-2.5 h-4 w-4 text-slate-400" />
        <input
          value={query}
          onChange={(e) => setQuery(e.target.value)}
          placeholder="Search devices"
          className="h-9 w-full rounded-md border border-slate-300 pl-8 pr-2 text-sm"
        />
      </div>

      {isLoading && <p className="text-sm text-slate-500">Loading devices…</p>}
      {error && <p className="text-sm text-rose-600">Could not load devices: {error}</p>}

      {groups.map(([category, list]) => (
        <section key={category}>
          <h3 className="mb-1 text-xs font-semibold uppercase tracking-wide text-slate-500">{category}</h3>
          <ul className="space-y-1">
            {list.map((t) => (
              <li
                key={t.id}
                draggable
                onDragStart={(e: DragEvent<HTMLLIElement>) => {
                  e.dataTransfer.effectAllowed = "copy";
                  e.dataTransfer.setData("text/plain", String(t.id));
                  onDragStart(t);
                }}
                onDragEnd={onDragEnd}
                className={cn(
                  "flex cursor-grab items-center gap-2 rounded-md border border-slate-200 bg-white px-2 py-1.5 text-sm",
                  dragging?.id === t.id && "opacity-50"
                )}
              >
                <GripVertical className="h-4 w-4 text-slate-300" />
                <span className="flex-1 truncate">{t.name}</span>
                <span className="rounded bg-slate-100 px-1.5 text-[11px] text-slate-600">{t.slots_required}M</span>
              </li>
            ))}
          </ul>
        </section>
      ))}
    </aside>
  );
}
