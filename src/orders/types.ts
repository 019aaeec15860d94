import type { ImagingEntry, LabEntry, MedicationEntry, OrderSet } from "../catalog/types";

// ============================================================================
// Orders
// ============================================================================

export type OrderType = "lab" | "imaging" | "medication";

export type OrderStatus = "pending" | "confirmed" | "cancelled";

export type Laterality = "left" | "right" | "bilateral";

export type WarningType = "allergy" | "drug_interaction" | "duplicate_order" | "contraindication";

export type WarningSeverity = "high" | "moderate" | "low";

export interface SafetyWarning {
  readonly type: WarningType;
  readonly severity: WarningSeverity;
  readonly message: string;
  readonly details?: string;
}

export interface Order {
  readonly id: string;
  readonly type: OrderType;
  /** Canonical catalog name; duplicate detection compares this. */
  readonly name: string;
  readonly displayName: string;
  readonly details: string;
  readonly code: string;
  readonly status: OrderStatus;
  readonly createdAt: number;
  readonly warnings: readonly SafetyWarning[];
  readonly requiresConfirmation: boolean;
  readonly orderSetId?: string;
  // Medication fields
  readonly dose?: string;
  readonly frequency?: string;
  readonly duration?: string;
  readonly route?: string;
  readonly prn?: boolean;
  // Imaging fields
  /** true = with contrast, false = without, null = unspecified (or both phases) */
  readonly contrast?: boolean | null;
  readonly bodyPart?: string;
  readonly laterality?: Laterality;
}

// ============================================================================
// Patient context (read-only, supplied by the EHR layer)
// ============================================================================

export interface PatientContext {
  readonly id: string;
  readonly name?: string;
  readonly allergies: readonly string[];
  readonly medications: readonly string[];
}

// ============================================================================
// Intents
// ============================================================================

/** A finalized transcript, classified once before the engine sees it. */
export type Intent =
  | { kind: "order_lab"; text: string; entry: LabEntry }
  | { kind: "order_imaging"; text: string; entry: ImagingEntry }
  | { kind: "prescribe_medication"; text: string; entry: MedicationEntry }
  | { kind: "order_set"; text: string; orderSet: OrderSet }
  | { kind: "confirm_pending" }
  | { kind: "reject_pending" }
  | { kind: "cancel_last" }
  | { kind: "clear_orders" }
  | { kind: "list_orders" }
  | { kind: "remove_order"; position: number }
  | { kind: "list_order_sets" }
  | { kind: "preview_order_set"; orderSet: OrderSet }
  | { kind: "unrecognized"; text: string; hint: UnrecognizedHint };

export type IntentKind = Intent["kind"];

/** Which vocabulary the user seemed to be reaching for when nothing matched. */
export type UnrecognizedHint = "command" | "order" | "medication" | "order_set";

// ============================================================================
// Engine results
// ============================================================================

export interface OverlayPayload {
  title: string;
  body: string;
}

export interface UtteranceResult {
  feedback: string;
  overlay?: OverlayPayload;
  intent: IntentKind;
}
