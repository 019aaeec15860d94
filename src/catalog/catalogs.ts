/**
 * Static order catalogs.
 *
 * Loaded once at module load from the JSON tables in ../data, validated with
 * zod and frozen. Declaration order matters: the alias resolver returns the
 * first entry whose alias appears in the utterance.
 */

import { z } from "zod";
import labsJson from "../data/labs.json";
import imagingJson from "../data/imaging.json";
import medicationsJson from "../data/medications.json";
import orderSetsJson from "../data/orderSets.json";
import drugClassesJson from "../data/drugClasses.json";
import {
  CatalogKind,
  DrugClassTable,
  ImagingEntry,
  LabEntry,
  MedicationEntry,
  OrderSet,
  drugClassTableSchema,
  imagingEntrySchema,
  labEntrySchema,
  medicationEntrySchema,
  orderSetSchema,
} from "./types";

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
}

function parseTable<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  idOf: (entry: T) => string
): T[] {
  const parsed = z.array(schema).safeParse(raw);
  if (!parsed.success) {
    // Catalog files ship with the build; a bad table is a packaging error.
    throw new Error(`[catalogs] ${name} table is invalid: ${parsed.error.message}`);
  }
  const ids = new Set<string>();
  for (const entry of parsed.data) {
    const id = idOf(entry);
    if (ids.has(id)) throw new Error(`[catalogs] ${name} table has duplicate key ${id}`);
    ids.add(id);
  }
  return parsed.data;
}

export const LAB_CATALOG: readonly LabEntry[] = deepFreeze(
  parseTable("labs", labEntrySchema, labsJson, (e) => e.key).map((entry) => ({ ...entry, kind: "lab" as const }))
);

export const IMAGING_CATALOG: readonly ImagingEntry[] = deepFreeze(
  parseTable("imaging", imagingEntrySchema, imagingJson, (e) => e.key).map((entry) => ({
    ...entry,
    kind: "imaging" as const,
  }))
);

export const MEDICATION_CATALOG: readonly MedicationEntry[] = deepFreeze(
  parseTable("medications", medicationEntrySchema, medicationsJson, (e) => e.key).map((entry) => ({
    ...entry,
    kind: "medication" as const,
  }))
);

export const ORDER_SETS: readonly OrderSet[] = deepFreeze(
  parseTable("orderSets", orderSetSchema, orderSetsJson, (set) => set.id)
);

export const DRUG_CLASSES: DrugClassTable = deepFreeze(drugClassTableSchema.parse(drugClassesJson));

type EntryByKind = {
  lab: LabEntry;
  imaging: ImagingEntry;
  medication: MedicationEntry;
};

const CATALOG_BY_KIND: { [K in CatalogKind]: readonly EntryByKind[K][] } = {
  lab: LAB_CATALOG,
  imaging: IMAGING_CATALOG,
  medication: MEDICATION_CATALOG,
};

/** Look up a catalog entry by its key (order-set items reference entries this way). */
export function findByKey<K extends CatalogKind>(kind: K, key: string): EntryByKind[K] | null {
  const entries: readonly EntryByKind[K][] = CATALOG_BY_KIND[kind];
  return entries.find((entry) => entry.key === key) ?? null;
}

export function findOrderSetById(id: string): OrderSet | null {
  return ORDER_SETS.find((set) => set.id === id) ?? null;
}
