"use client";

import { useEffect, useState } from "react";
import type { DeviceMeta, Slot } from "panel-shared";
import { Button } from "@/components/ui/button";
import { Dialog } from "@/components/ui/dialog";

interface ConfigureDeviceDialogProps {
  /** The anchor being edited; null keeps the dialog closed. */
  slot: Slot | null;
  deviceName: string | null;
  onClose: () => void;
  onSave: (slot: Slot, meta: DeviceMeta) => void;
}

export function ConfigureDeviceDialog({ slot, deviceName, onClose, onSave }: ConfigureDeviceDialogProps) {
  const [label, setLabel] = useState("");
  const [setting, setSetting] = useState("");

  useEffect(() => {
    setLabel(slot?.device_label ?? "");
    setSetting(slot?.current_setting != null ? String(slot.current_setting) : "");
  }, [slot]);

  const parsedSetting = setting.trim() === "" ? null : Number(setting);
  const settingInvalid = parsedSetting !== null && (!Number.isFinite(parsedSetting) || parsedSetting < 0);

  return (
    <Dialog
      open={slot !== null}
      onOpenChange={(open) => {
        if (!open) onClose();
      }}
      title={`Configure ${deviceName ?? "device"}`}
      description={slot ? `Slot ${slot.slot_number}, spanning ${slot.spans_slots}` : undefined}
      footer={
        <>
          <Button variant="outline" onClick={onClose}>
            Cancel
          </Button>
          <Button
            disabled={settingInvalid}
            onClick={() => {
              if (!slot) return;
              onSave(slot, { device_label: label.trim() || null, current_setting: parsedSetting });
            }}
          >
            Save
          </Button>
        </>
      }
    >
      <div className="space-y-3">
        <label className="block text-sm">
          <span className="text-slate-600">Circuit label</span>
          <input
            value={label}
            onChange={(e) => setLabel(e.target.value)}
            maxLength={120}
            className="mt-1 h-9 w-full rounded-md border border-slate-300 px-2"
          />
        </label>
        <label className="block text-sm">
          <span className="text-slate-600">Current setting (A)</span>
          <input
            value={setting}
            onChange={(e) => setSetting(e.target.value)}
            inputMode="decimal"
            className="mt-1 h-9 w-full rounded-md border border-slate-300 px-2"
          />
          {settingInvalid && <span className="mt-1 block text-xs text-rose-600">Enter a non-negative number</span>}
        </label>
      </div>
    </Dialog>
  );
}
