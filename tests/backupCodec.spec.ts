import { MalformedBackupError, UnsupportedVersionError } from "../src/domain/errors";
import type { EntityGraph } from "../src/domain/types";
import {
  backupFileName,
  decodeBackup,
  encodeBackup,
  exportBackupBytes,
  RECORD_CODECS,
} from "../src/services/backup/backupCodec";
import {
  makeDailyLog,
  makeEntry,
  makeProduct,
  makeSupplement,
  makeSupplementEntry,
  makeTemplate,
} from "./fixtures";

const EXPORT_DATE = new Date("2026-01-15T09:30:00.000Z");

function emptyGraph(): EntityGraph {
  return { products: [], supplements: [], dailyLogs: [], foodEntries: [], supplementEntries: [], aiTemplates: [] };
}

function sampleGraph(): EntityGraph {
  return {
    products: [
      makeProduct({ id: "p-2", name: "Oats", brand: "Quaker", nutrients: { iron: 4.3 } }),
      makeProduct({ id: "p-1", barcode: "4006381333931", imageData: Buffer.from([1, 2, 3]) }),
    ],
    supplements: [makeSupplement({ id: "s-1" })],
    dailyLogs: [makeDailyLog({ id: "log-1" })],
    foodEntries: [
      makeEntry({ id: "e-1", productId: "p-1", productName: "Greek Yogurt", dailyLogId: "log-1", sugar: 4 }),
    ],
    supplementEntries: [makeSupplementEntry({ id: "se-1", supplementId: "s-1", dailyLogId: "log-1" })],
    aiTemplates: [makeTemplate({ id: "t-1", nutrients: { vitaminC: 30 } })],
  };
}

describe("exportBackupBytes", () => {
  it("writes sorted keys with two-space indentation", () => {
    const text = exportBackupBytes(emptyGraph(), EXPORT_DATE).toString("utf8");
    expect(text).toBe(
      [
        "{",
        '  "aiTemplates": [],',
        '  "dailyLogs": [],',
        '  "exportDate": "2026-01-15T09:30:00.000Z",',
        '  "foodEntries": [],',
        '  "products": [],',
        '  "supplementEntries": [],',
        '  "supplements": [],',
        '  "version": 1',
        "}",
      ].join("\n")
    );
  });

  it("is byte-identical for the same data regardless of list order", () => {
    const graph = sampleGraph();
    const shuffled = { ...graph, products: [...graph.products].reverse() };

    expect(exportBackupBytes(shuffled, EXPORT_DATE).equals(exportBackupBytes(graph, EXPORT_DATE))).toBe(true);
  });

  it("sorts each list by id and flattens product nutrients", () => {
    const doc = encodeBackup(sampleGraph(), EXPORT_DATE);

    expect(doc.products.map((p) => p.id)).toEqual(["p-1", "p-2"]);
    expect(doc.products[1]).toMatchObject({ name: "Oats", brand: "Quaker", iron: 4.3 });
    expect(doc.products[0].imageDataBase64).toBe("AQID");
  });

  it("omits absent product fields but writes null entry sugars", () => {
    const written = JSON.parse(exportBackupBytes(sampleGraph(), EXPORT_DATE).toString("utf8"));

    expect(Object.keys(written.products[1])).not.toContain("barcode");
    expect(written.foodEntries[0].sugar).toBe(4);
    expect(written.foodEntries[0].fibre).toBeNull();
  });
});

describe("decodeBackup", () => {
  it("restores what was exported", () => {
    const graph = sampleGraph();
    const decoded = decodeBackup(exportBackupBytes(graph, EXPORT_DATE));

    expect(decoded.version).toBe(1);
    expect(decoded.exportDate).toEqual(EXPORT_DATE);
    expect(decoded.products).toEqual([graph.products[1], graph.products[0]]);
    expect(decoded.foodEntries).toEqual(graph.foodEntries);
    expect(decoded.dailyLogs).toEqual(graph.dailyLogs);
    expect(decoded.aiTemplates).toEqual(graph.aiTemplates);
    expect(decoded.supplements).toEqual(graph.supplements);
    expect(decoded.supplementEntries).toEqual(graph.supplementEntries);
  });

  it("treats missing entity lists as empty", () => {
    const decoded = decodeBackup('{"version":1,"exportDate":"2026-01-15T09:30:00.000Z"}');

    expect(decoded.products).toEqual([]);
    expect(decoded.foodEntries).toEqual([]);
    expect(decoded.supplementEntries).toEqual([]);
  });

  it("rejects an unknown integer version", () => {
    expect(() => decodeBackup('{"version":2,"exportDate":"2026-01-15T09:30:00.000Z"}')).toThrow(
      UnsupportedVersionError
    );
  });

  it.each([
    ["not JSON", "{oops"],
    ["a non-object root", "[1,2]"],
    ["a missing version", '{"exportDate":"2026-01-15T09:30:00.000Z"}'],
    ["a string version", '{"version":"1"}'],
    ["a fractional version", '{"version":1.5}'],
  ])("rejects %s as malformed", (_label, text) => {
    expect(() => decodeBackup(text)).toThrow(MalformedBackupError);
  });

  it("lists the paths that failed validation", () => {
    const text = JSON.stringify({
      version: 1,
      exportDate: "2026-01-15T09:30:00.000Z",
      products: [{ id: "p-1", calories: 1, protein: 1, carbohydrates: 1, fat: 1, dateAdded: "2026-01-01" }],
    });

    try {
      decodeBackup(text);
      throw new Error("expected decodeBackup to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedBackupError);
      if (err instanceof MalformedBackupError) {
        expect(err.issues).toEqual(["products.0.name: Required"]);
      }
    }
  });

  it("drops unknown nutrient keys and falls back to tablet for unknown dosage forms", () => {
    const text = JSON.stringify({
      version: 1,
      exportDate: "2026-01-15T09:30:00.000Z",
      supplements: [{ id: "s-1", name: "Mystery", dosageForm: "patch", dateAdded: "2026-01-01T00:00:00.000Z" }],
      supplementEntries: [
        {
          id: "se-1",
          amount: 1,
          unit: "patch",
          timestamp: "2026-01-15T08:00:00.000Z",
          nutrients: { zinc: 5, unobtainium: 1 },
        },
      ],
    });
    const decoded = decodeBackup(text);

    expect(decoded.supplements[0].dosageForm).toBe("tablet");
    expect(decoded.supplementEntries[0].nutrients).toEqual({ zinc: 5 });
  });
});

describe("RECORD_CODECS", () => {
  it("validates single stored records", () => {
    const log = makeDailyLog();
    expect(RECORD_CODECS.dailyLogs.decode(RECORD_CODECS.dailyLogs.encode(log))).toEqual(log);
    expect(() => RECORD_CODECS.dailyLogs.decode({ id: "x" })).toThrow("Invalid daily log record");
  });
});

describe("backupFileName", () => {
  it("stamps the local date and time", () => {
    expect(backupFileName(new Date(2026, 0, 15, 9, 30, 0))).toBe("NutritionLedger_Backup_2026-01-15_093000.json");
  });
});
