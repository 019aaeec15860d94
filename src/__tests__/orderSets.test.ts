import { findOrderSetById } from "../catalog/catalogs";
import type { OrderSet } from "../catalog/types";
import { OrderQueue } from "../orders/orderQueue";
import { listOrderSets, previewOrderSet, processOrderSet } from "../orders/orderSets";
import { MemoryQueueStore } from "../persistence";
import { PlanLineStager } from "../planSection";

async function createQueue(): Promise<OrderQueue> {
  const queue = new OrderQueue({ store: new MemoryQueueStore(), storageKey: "sets", stager: new PlanLineStager() });
  await queue.loadForPatient("patient-1");
  return queue;
}

function orderSet(id: string): OrderSet {
  const set = findOrderSetById(id);
  if (!set) throw new Error(`missing order set ${id}`);
  return set;
}

describe("processOrderSet", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("queues every item in order", async () => {
    const queue = await createQueue();
    const result = await processOrderSet(orderSet("uti"), { queue, allergies: [], medications: [] });

    expect(result.ordered.map((order) => order.displayName)).toEqual([
      "Urinalysis",
      "Urine Culture",
      "Complete Blood Count",
      "Basic Metabolic Panel",
    ]);
    expect(result.ordered.every((order) => order.status === "confirmed" && order.orderSetId === "uti")).toBe(true);
    expect(result.ordered[0].details).toBe("24356-8");
    expect(queue.size).toBe(4);
    expect(result.warnings).toEqual([]);
    expect(result.skipped).toEqual([]);
  });

  it("queues duplicates with their warning instead of pausing", async () => {
    const queue = await createQueue();
    await processOrderSet(orderSet("uti"), { queue, allergies: [], medications: [] });
    const result = await processOrderSet(orderSet("preop"), { queue, allergies: [], medications: [] });

    expect(queue.size).toBe(10);
    expect(result.warnings).toEqual([
      "Complete Blood Count: Duplicate order: Complete Blood Count is already ordered",
      "Basic Metabolic Panel: Duplicate order: Basic Metabolic Panel is already ordered",
    ]);
    expect(result.highSeverity).toEqual([]);
  });

  it("reports unknown catalog keys as skipped", async () => {
    const queue = await createQueue();
    const custom: OrderSet = {
      id: "custom",
      name: "Custom Set",
      description: "Test bundle",
      aliases: ["custom set"],
      items: [
        { type: "lab", catalogKey: "cbc" },
        { type: "lab", catalogKey: "unobtainium" },
        { type: "imaging", catalogKey: "cbc" },
      ],
    };

    const result = await processOrderSet(custom, { queue, allergies: [], medications: [] });
    expect(result.ordered.map((order) => order.name)).toEqual(["Complete Blood Count"]);
    expect(result.skipped).toEqual(["unobtainium", "cbc"]);
  });

  it("applies detail hints to imaging items", async () => {
    const queue = await createQueue();
    const result = await processOrderSet(orderSet("stroke"), { queue, allergies: [], medications: [] });
    const ct = result.ordered[0];
    expect(ct.displayName).toBe("CT Head without contrast");
    expect(ct.contrast).toBe(false);
    expect(ct.details).toBe("70450");
  });
});

describe("listOrderSets / previewOrderSet", () => {
  it("lists the shipped bundles", () => {
    expect(listOrderSets().map((set) => set.id)).toEqual([
      "chest_pain",
      "sepsis",
      "stroke",
      "chf",
      "copd",
      "dka",
      "pe",
      "pneumonia",
      "uti",
      "abdominal_pain",
      "admission",
      "preop",
    ]);
  });

  it("names each item with its hint", () => {
    expect(previewOrderSet(orderSet("chest_pain"))).toEqual([
      "Troponin I",
      "Complete Blood Count",
      "Basic Metabolic Panel",
      "PT/INR",
      "Chest X-Ray",
      "Echocardiogram",
    ]);
    expect(previewOrderSet(orderSet("pe"))[5]).toBe("CT Angiography Chest (with contrast)");
  });
});
