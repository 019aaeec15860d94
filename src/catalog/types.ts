import { z } from "zod";

// ============================================================================
// Catalog schemas (validated once when the JSON tables load)
// ============================================================================

const aliasList = z.array(z.string().min(1).transform((alias) => alias.toLowerCase())).min(1);

export const labEntrySchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  code: z.string().min(1),
  aliases: aliasList,
});

export const imagingModalitySchema = z.enum(["XR", "CT", "MRI", "US", "ECG"]);

export const imagingEntrySchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  code: z.string().min(1),
  aliases: aliasList,
  bodyPart: z.string().min(1),
  modality: imagingModalitySchema,
  contrastSupported: z.boolean(),
});

export const medicationEntrySchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  code: z.string().min(1),
  aliases: aliasList,
  drugClass: z.string().min(1),
  doses: z.array(z.string().min(1)).min(1),
  frequencies: z.array(z.string().min(1)).min(1),
  durations: z.array(z.string().min(1)).min(1),
  route: z.string().min(1),
  interactsWith: z.array(z.string().min(1)),
  allergyClasses: z.array(z.string().min(1)),
  controlled: z.boolean(),
});

export const orderSetItemSchema = z.object({
  type: z.enum(["lab", "imaging"]),
  catalogKey: z.string().min(1),
  detailHint: z.string().optional(),
});

export const orderSetSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().min(1),
  items: z.array(orderSetItemSchema).min(1),
  aliases: aliasList,
});

export const drugClassTableSchema = z.record(z.array(z.string().min(1)));

// ============================================================================
// Catalog types
// ============================================================================

export type ImagingModality = z.infer<typeof imagingModalitySchema>;

export type LabEntry = Readonly<z.infer<typeof labEntrySchema>> & { readonly kind: "lab" };
export type ImagingEntry = Readonly<z.infer<typeof imagingEntrySchema>> & { readonly kind: "imaging" };
export type MedicationEntry = Readonly<z.infer<typeof medicationEntrySchema>> & { readonly kind: "medication" };

/** One orderable lab test, imaging study or medication. */
export type CatalogEntry = LabEntry | ImagingEntry | MedicationEntry;

export type CatalogKind = CatalogEntry["kind"];

export type OrderSetItem = Readonly<z.infer<typeof orderSetItemSchema>>;

/** A named bundle of labs and imaging ordered together for one clinical scenario. */
export type OrderSet = Readonly<z.infer<typeof orderSetSchema>>;

/** Drug class name (lower-case) to member drug names (lower-case). */
export type DrugClassTable = Readonly<Record<string, readonly string[]>>;

/** Anything with spoken aliases can go through the alias resolver. */
export interface Aliased {
  readonly aliases: readonly string[];
}
