"use client";

import { useEffect, useState } from "react";
import useSWR from "swr";
import { Button } from "@/components/ui/button";
import { Dialog } from "@/components/ui/dialog";
import { PANEL_TEMPLATES_PATH, panelAdminApi, type NewPanel } from "@/lib/panels-api";

interface CreatePanelDialogProps {
  open: boolean;
  onClose: () => void;
  onCreate: (panel: NewPanel) => void;
}

const inputClass = "mt-1 h-9 w-full rounded-md border border-slate-300 px-2";

/** Picks a panel template; the API lays out every slot from its rows and columns. */
export function CreatePanelDialog({ open, onClose, onCreate }: CreatePanelDialogProps) {
  const { data: templates, error } = useSWR(open ? PANEL_TEMPLATES_PATH : null, () => panelAdminApi.listPanelTemplates());
  const [name, setName] = useState("");
  const [templateId, setTemplateId] = useState("");
  const [description, setDescription] = useState("");

  useEffect(() => {
    if (!open) return;
    setName("");
    setTemplateId("");
    setDescription("");
  }, [open]);

  const chosen = templates?.find((t) => String(t.id) === templateId);
  const canCreate = name.trim() !== "" && chosen !== undefined;

  return (
    <Dialog
      open={open}
      onOpenChange={(next) => {
        if (!next) onClose();
      }}
      title="New panel"
      footer={
        <>
          <Button variant="outline" onClick={onClose}>
            Cancel
          </Button>
          <Button
            disabled={!canCreate}
            onClick={() => {
              if (!chosen) return;
              onCreate({
                name: name.trim(),
                panel_template_id: chosen.id,
                voltage: chosen.voltage,
                current_rating: chosen.max_current,
                description: description.trim() || null,
              });
            }}
          >
            Create
          </Button>
        </>
      }
    >
      <div className="space-y-3 text-sm">
        <label className="block">
          <span className="text-slate-600">Name</span>
          <input value={name} onChange={(e) => setName(e.target.value)} className={inputClass} />
        </label>
        <label className="block">
          <span className="text-slate-600">Panel template</span>
          <select value={templateId} onChange={(e) => setTemplateId(e.target.value)} className={inputClass}>
            <option value="">Choose…</option>
            {(templates ?? []).map((t) => (
              <option key={t.id} value={String(t.id)}>
                {t.manufacturer} {t.model}: {t.rows} × {t.slots_per_row}
              </option>
            ))}
          </select>
          {error instanceof Error && <span className="mt-1 block text-xs text-rose-600">{error.message}</span>}
        </label>
        {chosen?.description && <p className="text-xs text-slate-500">{chosen.description}</p>}
        <label className="block">
          <span className="text-slate-600">Location / notes</span>
          <input value={description} onChange={(e) => setDescription(e.target.value)} className={inputClass} />
        </label>
      </div>
    </Dialog>
  );
}
