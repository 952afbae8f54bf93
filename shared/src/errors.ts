/**
 * Raised when a device template declares a span the grid can never satisfy
 * (zero, negative or fractional). This is a catalog defect, not a rejected
 * placement, so it is thrown instead of being reported through PlacementCheck.
 */
export class TemplateConfigurationError extends Error {
  readonly templateId: number;
  readonly slotsRequired: number;

  constructor(templateId: number, slotsRequired: number) {
    super(`Device template ${templateId} has invalid slots_required: ${slotsRequired}`);
    this.name = "TemplateConfigurationError";
    this.templateId = templateId;
    this.slotsRequired = slotsRequired;
  }
}

/** A slot id was looked up in a grid that does not contain it. */
export class SlotNotInGridError extends Error {
  readonly slotId: number;

  constructor(slotId: number) {
    super(`Slot ${slotId} is not part of this grid`);
    this.name = "SlotNotInGridError";
    this.slotId = slotId;
  }
}
