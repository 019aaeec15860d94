/**
 * Safety rule engine.
 *
 * Every rule runs on every candidate; each is pure and independent of the
 * others. The engine never changes the candidate: `applySafety` returns a new
 * frozen order carrying the warnings.
 */

import { DRUG_CLASSES, IMAGING_CATALOG, MEDICATION_CATALOG } from "../catalog/catalogs";
import type { ImagingEntry, MedicationEntry } from "../catalog/types";
import type { Order, SafetyWarning, WarningSeverity } from "./types";

export interface SafetyContext {
  /** Confirmed orders already in the queue. */
  queue: readonly Order[];
  allergies: readonly string[];
  medications: readonly string[];
}

export function evaluateOrderSafety(order: Order, context: SafetyContext): SafetyWarning[] {
  const warnings: SafetyWarning[] = [];

  const duplicate = checkDuplicate(order, context.queue);
  if (duplicate) warnings.push(duplicate);

  if (order.type === "medication") {
    const entry = medicationFor(order);
    if (entry) {
      warnings.push(...checkAllergies(entry, context.allergies));
      warnings.push(...checkInteractions(entry, context.medications));
    }
  }

  if (order.type === "imaging") {
    const entry = imagingFor(order);
    const contraindication = entry ? checkContrastMetformin(order, entry, context.medications) : null;
    if (contraindication) warnings.push(contraindication);
  }

  return warnings;
}

export function applySafety(order: Order, warnings: readonly SafetyWarning[]): Order {
  return Object.freeze({
    ...order,
    warnings: Object.freeze([...warnings]),
    requiresConfirmation: warnings.length > 0,
  });
}

// ============================================================================
// Rules
// ============================================================================

export function checkDuplicate(order: Order, queue: readonly Order[]): SafetyWarning | null {
  const existing = queue.find((queued) => queued.type === order.type && queued.name === order.name);
  if (!existing) return null;
  return {
    type: "duplicate_order",
    severity: "moderate",
    message: `Duplicate order: ${order.name} is already ordered`,
    details: `Existing order: ${existing.displayName}`,
  };
}

/**
 * One warning per matched allergy. A direct name match wins over a class match
 * for the same allergy, so an allergy never produces two warnings.
 */
export function checkAllergies(entry: MedicationEntry, allergies: readonly string[]): SafetyWarning[] {
  const warnings: SafetyWarning[] = [];
  const names = [entry.name.toLowerCase(), ...entry.aliases];

  for (const allergy of allergies) {
    const allergyNormalized = allergy.toLowerCase().trim();
    if (!allergyNormalized) continue;

    if (names.some((name) => overlaps(name, allergyNormalized))) {
      warnings.push({
        type: "allergy",
        severity: "high",
        message: `Allergy alert: patient is allergic to ${allergy}`,
        details: `${entry.name} matches the documented allergy`,
      });
      continue;
    }

    const classes = entry.allergyClasses.filter((drugClass) => overlaps(drugClass.toLowerCase(), allergyNormalized));
    if (classes.length > 0) {
      warnings.push({
        type: "allergy",
        severity: "high",
        message: `Allergy alert: patient is allergic to ${allergy}`,
        details: `${entry.name} may cross-react (${classes.join(", ")})`,
      });
    }
  }

  return warnings;
}

export function checkInteractions(entry: MedicationEntry, medications: readonly string[]): SafetyWarning[] {
  const warnings: SafetyWarning[] = [];

  for (const interacting of entry.interactsWith) {
    const className = interacting.toLowerCase();
    const members = [className, ...(DRUG_CLASSES[className] ?? [])];
    const matched = medications.find((med) => {
      const normalized = med.toLowerCase().trim();
      return normalized.length > 0 && members.some((member) => normalized.includes(member));
    });
    if (!matched) continue;

    warnings.push({
      type: "drug_interaction",
      severity: interactionSeverity(entry, className),
      message: `Drug interaction: ${entry.name} with ${matched}`,
      details: `${entry.name} interacts with ${className}`,
    });
  }

  return warnings;
}

export function interactionSeverity(entry: MedicationEntry, interacting: string): WarningSeverity {
  const drugClass = entry.drugClass.toLowerCase();
  if (drugClass === "opioid" && (interacting === "benzodiazepine" || interacting === "alcohol")) return "high";
  if (interacting === "warfarin") return "high";
  if (drugClass === "nsaid" && interacting === "lithium") return "high";
  return "moderate";
}

export function checkContrastMetformin(
  order: Order,
  entry: ImagingEntry,
  medications: readonly string[]
): SafetyWarning | null {
  const contrast = order.contrast ?? null;
  const contrastGiven = contrast === true || (contrast === null && entry.contrastSupported);
  if (!contrastGiven) return null;
  if (!medications.some((med) => med.toLowerCase().includes("metformin"))) return null;
  return {
    type: "contraindication",
    severity: "high",
    message: "Contrast with metformin: hold metformin for 48 hours around the study",
    details: `${order.displayName} may be given with iodinated contrast`,
  };
}

// ============================================================================
// Helpers
// ============================================================================

function overlaps(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}

function medicationFor(order: Order): MedicationEntry | undefined {
  return MEDICATION_CATALOG.find((entry) => entry.name === order.name);
}

function imagingFor(order: Order): ImagingEntry | undefined {
  return IMAGING_CATALOG.find((entry) => entry.name === order.name);
}
