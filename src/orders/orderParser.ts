/**
 * Order Parser for Spoken Orders
 *
 * Once the alias resolver has identified the catalog entry, pull the
 * structured fields (dose, frequency, duration, contrast, laterality, PRN)
 * out of the utterance and build a pending candidate order. Anything the
 * clinician did not say falls back to the catalog's first default, so a
 * medication order never leaves dose, frequency or duration unset.
 */

import type { CatalogEntry, ImagingEntry, LabEntry, MedicationEntry } from "../catalog/types";
import { generateOrderId } from "../idGenerator";
import type { Laterality, Order } from "./types";

export type BuildOptions = {
  now?: number;
  /** Overrides the computed details string (order sets pass the coding identifier). */
  details?: string;
  orderSetId?: string;
};

// ============================================================================
// Field patterns
// ============================================================================

const DOSE_PATTERN =
  /(\d+(?:\.\d+)?)\s*(mcg|mg|ml|g|units?|micrograms?|milligrams?|milliliters?|grams?)\b/i;

const UNIT_NORMALIZATION: Record<string, string> = {
  mcg: "mcg",
  microgram: "mcg",
  micrograms: "mcg",
  mg: "mg",
  milligram: "mg",
  milligrams: "mg",
  ml: "ml",
  milliliter: "ml",
  milliliters: "ml",
  g: "g",
  gram: "g",
  grams: "g",
  unit: " units",
  units: " units",
};

/** Checked in order; the first pattern found in the utterance wins. */
const FREQUENCY_ALIASES: Array<{ pattern: RegExp; code: string }> = [
  { pattern: /\b(four times (a day|daily)|qid)\b/, code: "QID" },
  { pattern: /\b(three times (a day|daily)|tid)\b/, code: "TID" },
  { pattern: /\b(twice (a day|daily)|two times (a day|daily)|bid)\b/, code: "BID" },
  { pattern: /\b(at bedtime|nightly|qhs)\b/, code: "QHS" },
  { pattern: /\b(once (a day|daily)|every day|daily|qd)\b/, code: "daily" },
  { pattern: /\b(as needed|when needed|prn)\b/, code: "PRN" },
];

const HOURLY_PATTERN = /\b(?:every\s+(\d+)\s+hours?|q\s?(\d+)\s?h)\b/;

const PRN_PATTERN = /\b(prn|as needed|when needed)\b/;

const NUMBER_WORDS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  twenty: 20,
  thirty: 30,
};

const DURATION_PATTERN = new RegExp(
  `\\bfor\\s+(\\d+|${Object.keys(NUMBER_WORDS).join("|")})\\s+(days?|weeks?|months?)\\b`
);

// ============================================================================
// Field extraction
// ============================================================================

export function parseDose(text: string): string | undefined {
  const match = text.match(DOSE_PATTERN);
  if (!match) return undefined;
  const unit = UNIT_NORMALIZATION[match[2].toLowerCase()] ?? match[2].toLowerCase();
  return `${match[1]}${unit}`;
}

export function parseFrequency(text: string): string | undefined {
  const lower = text.toLowerCase();
  for (const { pattern, code } of FREQUENCY_ALIASES) {
    if (code === "PRN") continue;
    if (pattern.test(lower)) return code;
  }
  const hourly = lower.match(HOURLY_PATTERN);
  if (hourly) return `Q${hourly[1] ?? hourly[2]}H`;
  return PRN_PATTERN.test(lower) ? "PRN" : undefined;
}

export function parseDuration(text: string): string | undefined {
  const match = text.toLowerCase().match(DURATION_PATTERN);
  if (!match) return undefined;
  const count = NUMBER_WORDS[match[1]] ?? Number(match[1]);
  const unit = match[2].replace(/s$/, "");
  return `${count} ${count === 1 ? unit : `${unit}s`}`;
}

export function isPrn(text: string): boolean {
  return PRN_PATTERN.test(text.toLowerCase());
}

/**
 * "with and without" means both phases; it stays unspecified rather than
 * collapsing into `true`.
 */
export function parseContrast(text: string): boolean | null {
  const lower = text.toLowerCase();
  if (isBothContrastPhases(lower)) return null;
  if (lower.includes("without contrast")) return false;
  if (lower.includes("with contrast")) return true;
  return null;
}

function isBothContrastPhases(lower: string): boolean {
  return /\bwith (and|or) without\b/.test(lower);
}

export function parseLaterality(text: string): Laterality | undefined {
  const lower = text.toLowerCase();
  if (/\bbilateral\b/.test(lower)) return "bilateral";
  if (/\bleft\b/.test(lower)) return "left";
  if (/\bright\b/.test(lower)) return "right";
  return undefined;
}

// ============================================================================
// Candidate builders
// ============================================================================

export function buildLabOrder(text: string, entry: LabEntry, options: BuildOptions = {}): Order {
  return {
    id: generateOrderId("lab"),
    type: "lab",
    name: entry.name,
    displayName: entry.name,
    details: options.details ?? entry.code,
    code: entry.code,
    status: "pending",
    createdAt: options.now ?? Date.now(),
    warnings: [],
    requiresConfirmation: false,
    ...(options.orderSetId ? { orderSetId: options.orderSetId } : {}),
  };
}

export function buildImagingOrder(text: string, entry: ImagingEntry, options: BuildOptions = {}): Order {
  const lower = text.toLowerCase();
  const contrast = parseContrast(lower);
  const laterality = parseLaterality(lower);

  const contrastPhrase = isBothContrastPhases(lower)
    ? "with and without contrast"
    : contrast === true
    ? "with contrast"
    : contrast === false
    ? "without contrast"
    : undefined;
  const lateralityLabel = laterality ? laterality[0].toUpperCase() + laterality.slice(1) : undefined;

  const displayName = [lateralityLabel, entry.name, contrastPhrase].filter(Boolean).join(" ");
  const details = [entry.modality, entry.bodyPart, laterality, contrastPhrase].filter(Boolean).join(", ");

  return {
    id: generateOrderId("imaging"),
    type: "imaging",
    name: entry.name,
    displayName,
    details: options.details ?? details,
    code: entry.code,
    status: "pending",
    createdAt: options.now ?? Date.now(),
    warnings: [],
    requiresConfirmation: false,
    contrast,
    bodyPart: entry.bodyPart,
    ...(laterality ? { laterality } : {}),
    ...(options.orderSetId ? { orderSetId: options.orderSetId } : {}),
  };
}

export function buildMedicationOrder(text: string, entry: MedicationEntry, options: BuildOptions = {}): Order {
  const dose = parseDose(text) ?? entry.doses[0];
  const frequency = parseFrequency(text) ?? entry.frequencies[0];
  const duration = parseDuration(text) ?? entry.durations[0];
  const prn = isPrn(text);

  const prnSuffix = prn && frequency !== "PRN" ? " PRN" : "";
  const details = `${dose} ${entry.route} ${frequency}${prnSuffix} for ${duration}`;

  return {
    id: generateOrderId("medication"),
    type: "medication",
    name: entry.name,
    displayName: `${entry.name} ${details}`,
    details: options.details ?? details,
    code: entry.code,
    status: "pending",
    createdAt: options.now ?? Date.now(),
    warnings: [],
    requiresConfirmation: false,
    dose,
    frequency,
    duration,
    route: entry.route,
    prn,
    ...(options.orderSetId ? { orderSetId: options.orderSetId } : {}),
  };
}

/** Build a pending candidate for whichever kind of entry was resolved. */
export function buildCandidateOrder(text: string, entry: CatalogEntry, options: BuildOptions = {}): Order {
  switch (entry.kind) {
    case "lab":
      return buildLabOrder(text, entry, options);
    case "imaging":
      return buildImagingOrder(text, entry, options);
    case "medication":
      return buildMedicationOrder(text, entry, options);
  }
}
