/**
 * Alias Resolver
 *
 * Maps a spoken utterance to a catalog entry: the first entry (declaration
 * order) with an alias contained in the lower-cased utterance wins. No scoring
 * and no fuzzy matching, so the same utterance always resolves the same way.
 * Returns null rather than throwing when nothing matches.
 */

import { IMAGING_CATALOG, LAB_CATALOG, MEDICATION_CATALOG, ORDER_SETS } from "./catalogs";
import type { Aliased, ImagingEntry, LabEntry, MedicationEntry, OrderSet } from "./types";

export function resolveAlias<T extends Aliased>(text: string, entries: readonly T[]): T | null {
  const lower = text.toLowerCase();
  for (const entry of entries) {
    if (entry.aliases.some((alias) => lower.includes(alias))) {
      return entry;
    }
  }
  return null;
}

export function resolveLab(text: string): LabEntry | null {
  return resolveAlias(text, LAB_CATALOG);
}

export function resolveImaging(text: string): ImagingEntry | null {
  return resolveAlias(text, IMAGING_CATALOG);
}

export function resolveMedication(text: string): MedicationEntry | null {
  return resolveAlias(text, MEDICATION_CATALOG);
}

export function resolveOrderSet(text: string): OrderSet | null {
  return resolveAlias(text, ORDER_SETS);
}

/**
 * Looser match used only for previews ("what's in chest pain"): aliases first,
 * then the set name without its trailing bundle word.
 */
export function resolveOrderSetForPreview(text: string): OrderSet | null {
  const byAlias = resolveOrderSet(text);
  if (byAlias) return byAlias;
  const lower = text.toLowerCase();
  return (
    ORDER_SETS.find((set) => {
      const stem = set.name.toLowerCase().replace(/\s+(workup|bundle|protocol|labs|exacerbation)$/, "");
      return new RegExp(`\\b${escapeRegExp(stem)}\\b`).test(lower);
    }) ?? null
  );
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
