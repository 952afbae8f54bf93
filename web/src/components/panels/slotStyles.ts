// web/src/components/panels/slotStyles.ts
import type { SlotAppearance } from "@/lib/panel/selectors";

export const appearanceClasses: Record<SlotAppearance, string> = {
  free: "border-dashed border-slate-300 bg-white text-slate-400",
  anchor: "border-brand-500 bg-brand-50 text-slate-800",
  blocked: "border-slate-400 bg-slate-200 text-slate-500",
  "drop-valid": "border-emerald-500 bg-emerald-50 text-emerald-700 ring-2 ring-emerald-300",
  "drop-invalid": "border-rose-500 bg-rose-50 text-rose-700 ring-2 ring-rose-300",
  pending: "border-brand-300 bg-brand-100 text-brand-700 animate-pulse",
};
