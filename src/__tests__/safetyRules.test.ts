import { findByKey } from "../catalog/catalogs";
import type { CatalogEntry } from "../catalog/types";
import { withStatus } from "../orders/confirmation";
import { buildCandidateOrder } from "../orders/orderParser";
import { applySafety, evaluateOrderSafety, SafetyContext } from "../orders/safetyRules";
import type { Order } from "../orders/types";

function entry(kind: "lab" | "imaging" | "medication", key: string): CatalogEntry {
  const found = findByKey(kind, key);
  if (!found) throw new Error(`missing ${kind} ${key}`);
  return found;
}

function candidate(kind: "lab" | "imaging" | "medication", key: string, text = ""): Order {
  return buildCandidateOrder(text, entry(kind, key));
}

const emptyContext: SafetyContext = { queue: [], allergies: [], medications: [] };

describe("evaluateOrderSafety", () => {
  it("returns no warnings for a clean order", () => {
    expect(evaluateOrderSafety(candidate("lab", "cbc"), emptyContext)).toEqual([]);
  });

  describe("duplicate orders", () => {
    it("flags the same test already queued", () => {
      const queued = withStatus(candidate("lab", "cbc"), "confirmed");
      const warnings = evaluateOrderSafety(candidate("lab", "cbc"), { ...emptyContext, queue: [queued] });
      expect(warnings).toEqual([
        {
          type: "duplicate_order",
          severity: "moderate",
          message: "Duplicate order: Complete Blood Count is already ordered",
          details: "Existing order: Complete Blood Count",
        },
      ]);
    });

    it("ignores a different test", () => {
      const queued = withStatus(candidate("lab", "bmp"), "confirmed");
      expect(evaluateOrderSafety(candidate("lab", "cbc"), { ...emptyContext, queue: [queued] })).toEqual([]);
    });
  });

  describe("allergies", () => {
    it("flags a class cross-reaction", () => {
      const warnings = evaluateOrderSafety(candidate("medication", "amoxicillin"), {
        ...emptyContext,
        allergies: ["Penicillin", "Sulfa"],
      });
      expect(warnings).toEqual([
        {
          type: "allergy",
          severity: "high",
          message: "Allergy alert: patient is allergic to Penicillin",
          details: "Amoxicillin may cross-react (penicillin)",
        },
      ]);
    });

    it("flags a direct name match once", () => {
      const warnings = evaluateOrderSafety(candidate("medication", "amoxicillin"), {
        ...emptyContext,
        allergies: ["amoxicillin"],
      });
      expect(warnings).toHaveLength(1);
      expect(warnings[0].details).toBe("Amoxicillin matches the documented allergy");
    });

    it("flags cephalosporins for a penicillin allergy", () => {
      const warnings = evaluateOrderSafety(candidate("medication", "cephalexin"), {
        ...emptyContext,
        allergies: ["penicillin"],
      });
      expect(warnings.map((warning) => warning.details)).toEqual(["Cephalexin may cross-react (penicillin)"]);
    });

    it("never matches blank allergy strings", () => {
      expect(
        evaluateOrderSafety(candidate("medication", "amoxicillin"), { ...emptyContext, allergies: ["", "   "] })
      ).toEqual([]);
    });

    it("does not check allergies on labs", () => {
      expect(evaluateOrderSafety(candidate("lab", "cbc"), { ...emptyContext, allergies: ["Complete"] })).toEqual([]);
    });
  });

  describe("drug interactions", () => {
    it("rates an opioid with a benzodiazepine high", () => {
      const warnings = evaluateOrderSafety(candidate("medication", "oxycodone"), {
        ...emptyContext,
        medications: ["Lorazepam 1mg"],
      });
      expect(warnings).toEqual([
        {
          type: "drug_interaction",
          severity: "high",
          message: "Drug interaction: Oxycodone with Lorazepam 1mg",
          details: "Oxycodone interacts with benzodiazepine",
        },
      ]);
    });

    it("emits one warning per interacting class", () => {
      const warnings = evaluateOrderSafety(candidate("medication", "ibuprofen"), {
        ...emptyContext,
        medications: ["Lisinopril 10mg", "Lithium 300mg"],
      });
      expect(warnings.map((warning) => [warning.severity, warning.message])).toEqual([
        ["high", "Drug interaction: Ibuprofen with Lithium 300mg"],
        ["moderate", "Drug interaction: Ibuprofen with Lisinopril 10mg"],
      ]);
    });

    it("treats warfarin brand names as warfarin", () => {
      const warnings = evaluateOrderSafety(candidate("medication", "heparin"), {
        ...emptyContext,
        medications: ["Coumadin 5mg daily"],
      });
      expect(warnings).toHaveLength(1);
      expect(warnings[0].severity).toBe("high");
    });
  });

  describe("contrast with metformin", () => {
    const onMetformin: SafetyContext = { ...emptyContext, medications: ["Metformin 500mg BID"] };

    it("flags explicit contrast", () => {
      const warnings = evaluateOrderSafety(candidate("imaging", "ct_head", "with contrast"), onMetformin);
      expect(warnings).toEqual([
        {
          type: "contraindication",
          severity: "high",
          message: "Contrast with metformin: hold metformin for 48 hours around the study",
          details: "CT Head with contrast may be given with iodinated contrast",
        },
      ]);
    });

    it("flags unspecified contrast on a contrast-capable study", () => {
      expect(evaluateOrderSafety(candidate("imaging", "ct_head"), onMetformin)).toHaveLength(1);
    });

    it("ignores studies without contrast", () => {
      expect(evaluateOrderSafety(candidate("imaging", "ct_head", "without contrast"), onMetformin)).toEqual([]);
      expect(evaluateOrderSafety(candidate("imaging", "cxr"), onMetformin)).toEqual([]);
    });
  });
});

describe("applySafety", () => {
  it("returns a new frozen order and leaves the candidate alone", () => {
    const original = candidate("lab", "cbc");
    const warning = {
      type: "duplicate_order" as const,
      severity: "moderate" as const,
      message: "Duplicate order: Complete Blood Count is already ordered",
    };
    const checked = applySafety(original, [warning]);
    expect(checked).not.toBe(original);
    expect(checked.requiresConfirmation).toBe(true);
    expect(checked.warnings).toEqual([warning]);
    expect(Object.isFrozen(checked)).toBe(true);
    expect(original.warnings).toEqual([]);
    expect(original.requiresConfirmation).toBe(false);
  });

  it("does not require confirmation without warnings", () => {
    expect(applySafety(candidate("lab", "cbc"), []).requiresConfirmation).toBe(false);
  });
});
