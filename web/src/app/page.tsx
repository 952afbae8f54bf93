"use client";

import { useState } from "react";
import Link from "next/link";
import { useRouter } from "next/navigation";
import useSWR from "swr";
import { LayoutGrid, Plus, Trash2 } from "lucide-react";
import { toast } from "sonner";
import { CreatePanelDialog } from "@/components/panels/CreatePanelDialog";
import { Button } from "@/components/ui/button";
import { failureMessage } from "@/lib/panel/session";
import { PANELS_PATH, panelAdminApi, type NewPanel, type PanelSummary } from "@/lib/panels-api";

export default function PanelsIndexPage() {
  const router = useRouter();
  const { data, error, isLoading, mutate } = useSWR(PANELS_PATH, () => panelAdminApi.listPanels(), {
    revalidateOnFocus: false,
  });
  const [creating, setCreating] = useState(false);

  async function create(panel: NewPanel) {
    try {
      const created = await panelAdminApi.createPanel(panel);
      setCreating(false);
      await mutate();
      toast.success(`${created.name} created with ${created.total_slots} slots`);
      router.push(`/panels/${created.id}`);
    } catch (err) {
      console.error("[panels] create failed:", err);
      toast.error(failureMessage(err));
    }
  }

  async function remove(panel: PanelSummary) {
    if (!window.confirm(`Delete ${panel.name} with all of its devices and wiring?`)) return;
    try {
      await panelAdminApi.deletePanel(panel.id);
      await mutate();
    } catch (err) {
      console.error("[panels] delete failed:", err);
      toast.error(failureMessage(err));
    }
  }

  return (
    <main className="mx-auto max-w-3xl space-y-4 p-8">
      <div className="flex items-center justify-between">
        <h1 className="text-2xl font-semibold text-slate-900">Panels</h1>
        <Button onClick={() => setCreating(true)}>
          <Plus className="h-4 w-4" /> New panel
        </Button>
      </div>
      {isLoading && <p className="text-sm text-slate-500">Loading…</p>}
      {error instanceof Error && <p className="text-sm text-rose-600">{error.message}</p>}
      <ul className="divide-y divide-slate-200 rounded-xl border border-slate-200 bg-white">
        {(data ?? []).map((p) => (
          <li key={p.id} className="flex items-center pr-2 hover:bg-slate-50">
            <Link href={`/panels/${p.id}`} className="flex flex-1 items-center gap-3 px-4 py-3">
              <LayoutGrid className="h-4 w-4 text-brand-500" />
              <span className="flex-1 font-medium">{p.name}</span>
              <span className="text-sm text-slate-500">
                {p.manufacturer} {p.model} · {p.rows} × {p.slots_per_row}
              </span>
            </Link>
            <Button variant="ghost" size="icon" aria-label={`Delete ${p.name}`} onClick={() => void remove(p)}>
              <Trash2 className="h-4 w-4" />
            </Button>
          </li>
        ))}
      </ul>
      <CreatePanelDialog open={creating} onClose={() => setCreating(false)} onCreate={(panel) => void create(panel)} />
    </main>
  );
}
