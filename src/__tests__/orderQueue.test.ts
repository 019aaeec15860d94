import { findByKey } from "../catalog/catalogs";
import { buildCandidateOrder } from "../orders/orderParser";
import { OrderQueue } from "../orders/orderQueue";
import type { Order } from "../orders/types";
import { MemoryQueueStore, QueueSnapshot, QueueStore } from "../persistence";
import { PlanLineStager } from "../planSection";

function labOrder(key: string): Order {
  const entry = findByKey("lab", key);
  if (!entry) throw new Error(`missing lab ${key}`);
  return buildCandidateOrder("", entry);
}

/** Memory store whose reads and writes can be switched to fail. */
class FlakyStore implements QueueStore {
  readonly inner = new MemoryQueueStore();
  failSaves = false;
  failLoads = false;
  saveAttempts = 0;

  async load(key: string): Promise<QueueSnapshot | null> {
    if (this.failLoads) throw new Error("store offline");
    return this.inner.load(key);
  }

  async save(key: string, snapshot: QueueSnapshot): Promise<void> {
    this.saveAttempts++;
    if (this.failSaves) throw new Error("store offline");
    await this.inner.save(key, snapshot);
  }
}

describe("OrderQueue", () => {
  let store: MemoryQueueStore;
  let stager: PlanLineStager;
  let queue: OrderQueue;

  beforeEach(async () => {
    store = new MemoryQueueStore();
    stager = new PlanLineStager();
    queue = new OrderQueue({ store, storageKey: "test-queue", stager, now: () => 5000 });
    await queue.loadForPatient("patient-1");
  });

  it("adds confirmed orders and persists at once", async () => {
    const added = await queue.add(labOrder("cbc"));
    expect(added.status).toBe("confirmed");
    expect(queue.size).toBe(1);

    const snapshot = await store.load("test-queue");
    expect(snapshot?.patientId).toBe("patient-1");
    expect(snapshot?.savedAt).toBe(5000);
    expect(snapshot?.orders.map((order) => order.name)).toEqual(["Complete Blood Count"]);
  });

  it("stages a plan line for every add", async () => {
    await queue.add(labOrder("cbc"));
    await queue.add(labOrder("bmp"));
    expect(stager.pendingLines).toEqual(["• Order Complete Blood Count", "• Order Basic Metabolic Panel"]);
  });

  it("cancels the most recent order", async () => {
    await queue.add(labOrder("cbc"));
    await queue.add(labOrder("bmp"));
    const removed = await queue.cancelLast();
    expect(removed?.name).toBe("Basic Metabolic Panel");
    expect(removed?.status).toBe("cancelled");
    expect(queue.list().map((order) => order.name)).toEqual(["Complete Blood Count"]);
  });

  it("returns null when cancelling an empty queue", async () => {
    expect(await queue.cancelLast()).toBeNull();
  });

  it("removes by 1-based position within bounds only", async () => {
    await queue.add(labOrder("cbc"));
    await queue.add(labOrder("bmp"));
    await queue.add(labOrder("troponin"));

    expect(await queue.removeAt(0)).toBeNull();
    expect(await queue.removeAt(4)).toBeNull();
    expect(await queue.removeAt(1.5)).toBeNull();

    const removed = await queue.removeAt(2);
    expect(removed?.name).toBe("Basic Metabolic Panel");
    expect(queue.list().map((order) => order.name)).toEqual(["Complete Blood Count", "Troponin I"]);
  });

  it("drops the staged plan line of a cancelled order", async () => {
    await queue.add(labOrder("cbc"));
    await queue.add(labOrder("bmp"));
    await queue.cancelLast();
    expect(stager.pendingLines).toEqual(["• Order Complete Blood Count"]);
  });

  it("drops the staged plan line of an order removed by position", async () => {
    await queue.add(labOrder("cbc"));
    await queue.add(labOrder("bmp"));
    await queue.add(labOrder("troponin"));
    await queue.removeAt(2);
    expect(stager.pendingLines).toEqual(["• Order Complete Blood Count", "• Order Troponin I"]);
  });

  it("keeps the queue when the same patient is loaded again", async () => {
    await queue.add(labOrder("cbc"));
    await queue.loadForPatient("patient-1");
    expect(queue.list().map((order) => order.name)).toEqual(["Complete Blood Count"]);
  });

  it("clears orders and staged lines", async () => {
    await queue.add(labOrder("cbc"));
    await queue.add(labOrder("bmp"));
    expect(await queue.clearAll()).toBe(2);
    expect(queue.size).toBe(0);
    expect(stager.pendingLines).toEqual([]);
    expect((await store.load("test-queue"))?.orders).toEqual([]);
  });

  it("restores only for the same patient", async () => {
    await queue.add(labOrder("cbc"));

    const other = new OrderQueue({ store, storageKey: "test-queue", stager: new PlanLineStager() });
    await other.loadForPatient("patient-2");
    expect(other.size).toBe(0);
    expect(other.patientId).toBe("patient-2");

    await other.loadForPatient("patient-1");
    expect(other.list().map((order) => order.name)).toEqual(["Complete Blood Count"]);
  });

  it("does not persist without a patient", async () => {
    const noPatient = new OrderQueue({ store, storageKey: "unused", stager: new PlanLineStager() });
    await noPatient.loadForPatient(null);
    await noPatient.add(labOrder("cbc"));
    expect(await store.load("unused")).toBeNull();
  });
});

describe("OrderQueue persistence failures", () => {
  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("keeps the in-memory queue and rewrites everything on the next mutation", async () => {
    const store = new FlakyStore();
    const queue = new OrderQueue({ store, storageKey: "flaky", stager: new PlanLineStager() });
    await queue.loadForPatient("patient-1");

    store.failSaves = true;
    await queue.add(labOrder("cbc"));
    expect(queue.size).toBe(1);
    expect(queue.persistenceHealthy).toBe(false);
    expect(await store.inner.load("flaky")).toBeNull();

    store.failSaves = false;
    await queue.add(labOrder("bmp"));
    expect(queue.persistenceHealthy).toBe(true);
    expect(store.saveAttempts).toBe(2);
    expect((await store.inner.load("flaky"))?.orders.map((order) => order.name)).toEqual([
      "Complete Blood Count",
      "Basic Metabolic Panel",
    ]);
  });

  it("starts empty when the stored queue cannot be read", async () => {
    const store = new FlakyStore();
    store.failLoads = true;
    const queue = new OrderQueue({ store, storageKey: "flaky", stager: new PlanLineStager() });
    await queue.loadForPatient("patient-1");
    expect(queue.size).toBe(0);
    expect(queue.persistenceHealthy).toBe(false);
  });

  it("never overwrites a stored queue it could not read", async () => {
    const store = new FlakyStore();
    const before = new OrderQueue({ store, storageKey: "flaky", stager: new PlanLineStager() });
    await before.loadForPatient("patient-1");
    await before.add(labOrder("cbc"));
    await before.add(labOrder("bmp"));

    store.failLoads = true;
    const after = new OrderQueue({ store, storageKey: "flaky", stager: new PlanLineStager() });
    await after.loadForPatient("patient-1");
    await after.add(labOrder("troponin"));

    expect(after.size).toBe(1);
    expect(store.saveAttempts).toBe(2);
    expect((await store.inner.load("flaky"))?.orders.map((order) => order.name)).toEqual([
      "Complete Blood Count",
      "Basic Metabolic Panel",
    ]);

    store.failLoads = false;
    await after.add(labOrder("lipase"));

    const expected = ["Complete Blood Count", "Basic Metabolic Panel", "Troponin I", "Lipase"];
    expect(after.list().map((order) => order.name)).toEqual(expected);
    expect((await store.inner.load("flaky"))?.orders.map((order) => order.name)).toEqual(expected);
    expect(after.persistenceHealthy).toBe(true);
  });

  it("keeps unsaved orders when the same patient is loaded again, then saves them", async () => {
    const store = new FlakyStore();
    const queue = new OrderQueue({ store, storageKey: "flaky", stager: new PlanLineStager() });
    await queue.loadForPatient("patient-1");

    store.failSaves = true;
    await queue.add(labOrder("cbc"));
    await queue.loadForPatient("patient-1");
    expect(queue.size).toBe(1);
    expect(queue.persistenceHealthy).toBe(false);

    store.failSaves = false;
    await queue.loadForPatient("patient-1");
    expect(queue.persistenceHealthy).toBe(true);
    expect((await store.inner.load("flaky"))?.orders.map((order) => order.name)).toEqual(["Complete Blood Count"]);
  });
});
