import { StorageFailureError } from "../src/domain/errors";
import { MemoryNutritionStore } from "../src/services/store/memoryStore";
import { makeDailyLog, makeEntry, makeProduct } from "./fixtures";

describe("MemoryNutritionStore", () => {
  it("commits a transaction when the work resolves", async () => {
    const store = new MemoryNutritionStore();
    await store.transaction((tx) => tx.insert("products", makeProduct({ id: "p-1" })));

    expect((await store.get("products", "p-1"))?.name).toBe("Greek Yogurt");
  });

  it("discards every write of a transaction that throws", async () => {
    const store = MemoryNutritionStore.fromGraph({ dailyLogs: [makeDailyLog({ id: "log-1" })] });

    await expect(
      store.transaction(async (tx) => {
        await tx.insert("products", makeProduct({ id: "p-1" }));
        await tx.remove("dailyLogs", "log-1");
        throw new Error("abort");
      })
    ).rejects.toThrow("abort");

    expect(await store.list("products")).toEqual([]);
    expect(await store.get("dailyLogs", "log-1")).toBeDefined();
  });

  it("rejects duplicate inserts and updates of missing rows", async () => {
    const store = MemoryNutritionStore.fromGraph({ products: [makeProduct({ id: "p-1" })] });

    await expect(store.transaction((tx) => tx.insert("products", makeProduct({ id: "p-1" })))).rejects.toThrow(
      StorageFailureError
    );
    await expect(store.transaction((tx) => tx.update("products", makeProduct({ id: "p-2" })))).rejects.toThrow(
      "No products row with id p-2"
    );
  });

  it("hands out copies, not the stored objects", async () => {
    const store = MemoryNutritionStore.fromGraph({ products: [makeProduct({ id: "p-1" })] });
    const copy = await store.get("products", "p-1");
    if (copy) copy.name = "Changed";

    expect((await store.get("products", "p-1"))?.name).toBe("Greek Yogurt");
  });

  it("copies nested nutrient maps, images and dates", async () => {
    const seeded = makeEntry({ id: "e-1", nutrients: { iron: 2 } });
    const store = MemoryNutritionStore.fromGraph({
      products: [makeProduct({ id: "p-1", imageData: Buffer.from([1, 2, 3]) })],
      foodEntries: [seeded],
    });
    seeded.nutrients.iron = 7;

    const entry = await store.get("foodEntries", "e-1");
    if (entry) {
      entry.nutrients.iron = 999;
      entry.timestamp.setFullYear(2000);
    }
    const [product] = await store.list("products");
    product.imageData?.fill(0);

    const again = await store.get("foodEntries", "e-1");
    expect(again?.nutrients).toEqual({ iron: 2 });
    expect(again?.timestamp.getFullYear()).toBe(2026);
    expect((await store.get("products", "p-1"))?.imageData).toEqual(Buffer.from([1, 2, 3]));
  });

  it("rolls back nested writes of a transaction that throws", async () => {
    const store = MemoryNutritionStore.fromGraph({ products: [makeProduct({ id: "p-1", nutrients: { iron: 2 } })] });

    await expect(
      store.transaction(async (tx) => {
        const product = await tx.get("products", "p-1");
        if (product) {
          product.nutrients.iron = 50;
          await tx.update("products", product);
        }
        throw new Error("abort");
      })
    ).rejects.toThrow("abort");

    expect((await store.get("products", "p-1"))?.nutrients).toEqual({ iron: 2 });
  });

  it("runs transactions one at a time in call order", async () => {
    const store = new MemoryNutritionStore();
    const order: string[] = [];

    const slow = store.transaction(async (tx) => {
      order.push("slow:start");
      await new Promise((resolve) => setTimeout(resolve, 20));
      await tx.insert("products", makeProduct({ id: "slow" }));
      order.push("slow:end");
    });
    const fast = store.transaction(async (tx) => {
      order.push("fast:start");
      expect(await tx.get("products", "slow")).toBeDefined();
      order.push("fast:end");
    });
    await Promise.all([slow, fast]);

    expect(order).toEqual(["slow:start", "slow:end", "fast:start", "fast:end"]);
  });

  it("snapshots every table", async () => {
    const store = MemoryNutritionStore.fromGraph({
      products: [makeProduct({ id: "p-1" })],
      dailyLogs: [makeDailyLog({ id: "log-1" })],
    });
    const snapshot = await store.snapshot();

    expect(snapshot.products.map((p) => p.id)).toEqual(["p-1"]);
    expect(snapshot.dailyLogs.map((l) => l.id)).toEqual(["log-1"]);
    expect(snapshot.foodEntries).toEqual([]);
  });
});
