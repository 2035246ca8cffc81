import type { EntityGraph } from "../src/domain/types";
import type { DecodedGraph } from "../src/services/backup/backupCodec";
import {
  countSkipped,
  describeImportSummary,
  emptyImportSummary,
  planImport,
} from "../src/services/backup/importReconciler";
import {
  makeDailyLog,
  makeEntry,
  makeProduct,
  makeSupplement,
  makeSupplementEntry,
  makeTemplate,
  sequentialIds,
} from "./fixtures";

function graph(partial: Partial<EntityGraph> = {}): EntityGraph {
  return {
    products: [],
    supplements: [],
    dailyLogs: [],
    foodEntries: [],
    supplementEntries: [],
    aiTemplates: [],
    ...partial,
  };
}

function decoded(partial: Partial<EntityGraph>): DecodedGraph {
  return { ...graph(partial), version: 1, exportDate: new Date(2026, 0, 20) };
}

describe("planImport", () => {
  it("imports everything into an empty store and nothing the second time", () => {
    const backup = decoded({
      products: [makeProduct({ id: "p-1" })],
      supplements: [makeSupplement({ id: "s-1" })],
      dailyLogs: [makeDailyLog({ id: "log-1" })],
      foodEntries: [makeEntry({ id: "e-1", productId: "p-1", dailyLogId: "log-1" })],
      supplementEntries: [makeSupplementEntry({ id: "se-1", supplementId: "s-1", dailyLogId: "log-1" })],
      aiTemplates: [makeTemplate({ id: "t-1" })],
    });

    const first = planImport(backup, graph(), sequentialIds());
    expect(describeImportSummary(first.summary)).toBe(
      "Imported: 1 products, 1 supplements, 1 days, 1 entries, 1 supplement doses, 1 templates"
    );
    expect(first.creates.foodEntries[0]).toMatchObject({ id: "e-1", productId: "p-1", dailyLogId: "log-1" });

    const second = planImport(backup, first.creates, sequentialIds());
    expect(second.creates).toEqual(graph());
    expect(countSkipped(second.summary)).toBe(6);
    expect(describeImportSummary(second.summary)).toBe("No new data imported (all items already exist)");
  });

  it("folds a backup day into the existing log for the same local day", () => {
    const existing = graph({ dailyLogs: [makeDailyLog({ id: "local-log", date: new Date(2026, 0, 15) })] });
    const backup = decoded({
      dailyLogs: [makeDailyLog({ id: "remote-log", date: new Date(2026, 0, 15, 14, 30), calorieTarget: 1800 })],
      foodEntries: [makeEntry({ id: "e-1", dailyLogId: "remote-log" })],
    });

    const { creates, summary } = planImport(backup, existing, sequentialIds());

    expect(summary.dailyLogs).toEqual({ imported: 0, skipped: 1 });
    expect(creates.dailyLogs).toEqual([]);
    expect(creates.foodEntries[0].dailyLogId).toBe("local-log");
  });

  it("creates new days at local midnight with the backup's targets", () => {
    const backup = decoded({
      dailyLogs: [makeDailyLog({ id: "remote-log", date: new Date(2026, 0, 16, 14, 30), calorieTarget: 1800 })],
    });

    const { creates } = planImport(backup, graph(), sequentialIds());

    expect(creates.dailyLogs[0].date).toEqual(new Date(2026, 0, 16));
    expect(creates.dailyLogs[0].calorieTarget).toBe(1800);
  });

  it("drops a reference to a product missing from the backup and counts it", () => {
    const backup = decoded({
      foodEntries: [makeEntry({ id: "e-1", productId: "ghost", productName: "Ghost Bar", calories: 210 })],
    });

    const { creates, summary } = planImport(backup, graph(), sequentialIds());

    expect(creates.foodEntries[0]).toMatchObject({ productId: null, productName: "Ghost Bar", calories: 210 });
    expect(summary.danglingReferences).toBe(1);
  });

  it("points imported entries at the existing Oats by Quaker", () => {
    const existing = graph({ products: [makeProduct({ id: "local-oats", name: "Oats", brand: "Quaker" })] });
    const backup = decoded({
      products: [makeProduct({ id: "remote-oats", name: "Oats", brand: "Quaker", barcode: null })],
      foodEntries: [makeEntry({ id: "e-1", productId: "remote-oats" })],
    });

    const { creates, summary } = planImport(backup, existing, sequentialIds());

    expect(summary.products).toEqual({ imported: 0, skipped: 1 });
    expect(creates.foodEntries[0].productId).toBe("local-oats");
  });

  it("mints a fresh id when an incoming id is already taken by a different entity", () => {
    const existing = graph({ products: [makeProduct({ id: "p-1", name: "Apple" })] });
    const backup = decoded({
      products: [makeProduct({ id: "p-1", name: "Banana" })],
      foodEntries: [makeEntry({ id: "e-1", productId: "p-1" })],
    });

    const { creates } = planImport(backup, existing, sequentialIds());

    expect(creates.products[0]).toMatchObject({ id: "generated-1", name: "Banana" });
    expect(creates.foodEntries[0].productId).toBe("generated-1");
  });

  it("deduplicates within the backup itself", () => {
    const backup = decoded({
      products: [
        makeProduct({ id: "a", name: "Rice", brand: null }),
        makeProduct({ id: "b", name: "Rice", brand: null }),
      ],
      foodEntries: [makeEntry({ id: "e-1", productId: "b" })],
      aiTemplates: [makeTemplate({ id: "t-1", name: "Pho" }), makeTemplate({ id: "t-2", name: "PHO" })],
    });

    const { creates, summary } = planImport(backup, graph(), sequentialIds());

    expect(creates.products.map((p) => p.id)).toEqual(["a"]);
    expect(creates.foodEntries[0].productId).toBe("a");
    expect(summary.aiTemplates).toEqual({ imported: 1, skipped: 1 });
  });

  it("keeps entry snapshots exactly as exported", () => {
    const existing = graph({ products: [makeProduct({ id: "p-1", calories: 999 })] });
    const backup = decoded({
      products: [makeProduct({ id: "p-1" })],
      foodEntries: [makeEntry({ id: "e-1", productId: "p-1", calories: 188.6, protein: 10.35 })],
    });

    const { creates } = planImport(backup, existing, sequentialIds());

    expect(creates.foodEntries[0]).toMatchObject({ calories: 188.6, protein: 10.35 });
  });

  it("remaps supplement entries and skips doses already logged", () => {
    const existing = graph({
      supplements: [makeSupplement({ id: "local-d3" })],
      supplementEntries: [makeSupplementEntry({ id: "dose-1", supplementId: "local-d3" })],
    });
    const backup = decoded({
      supplements: [makeSupplement({ id: "remote-d3" })],
      supplementEntries: [
        makeSupplementEntry({ id: "dose-1-copy", supplementId: "remote-d3" }),
        makeSupplementEntry({ id: "dose-2", supplementId: "remote-d3", timestamp: new Date(2026, 0, 16, 9, 0) }),
      ],
    });

    const { creates, summary } = planImport(backup, existing, sequentialIds());

    expect(summary.supplementEntries).toEqual({ imported: 1, skipped: 1 });
    expect(creates.supplementEntries[0]).toMatchObject({ id: "dose-2", supplementId: "local-d3" });
  });
});

describe("describeImportSummary", () => {
  it("lists only the kinds that were imported", () => {
    const summary = emptyImportSummary();
    summary.products.imported = 2;
    summary.dailyLogs.imported = 1;
    summary.foodEntries.skipped = 4;

    expect(describeImportSummary(summary)).toBe("Imported: 2 products, 1 days");
  });
});
