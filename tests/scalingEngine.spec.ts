import { InvalidAmountError } from "../src/domain/errors";
import {
  adjustAmount,
  clampAmount,
  derivePer100gFromWeight,
  rescale,
  scaleFromPer100g,
  scaleFromPortions,
  scaleFromServings,
  scaleNutrients,
} from "../src/services/scalingEngine";
import { makeEntry, makeProduct, makeSupplement } from "./fixtures";

describe("scaleFromPer100g", () => {
  it("multiplies every present field by grams / 100", () => {
    const product = makeProduct({ fibre: 2, nutrients: { calcium: 120 } });
    const snapshot = scaleFromPer100g(product, 250);

    expect(snapshot.calories).toBeCloseTo(205, 10);
    expect(snapshot.protein).toBeCloseTo(11.25, 10);
    expect(snapshot.carbohydrates).toBeCloseTo(15, 10);
    expect(snapshot.fat).toBeCloseTo(10, 10);
    expect(snapshot.fibre).toBeCloseTo(5, 10);
    expect(snapshot.nutrients.calcium).toBeCloseTo(300, 10);
  });

  it("keeps absent values absent and zeros present", () => {
    const product = makeProduct({ sugar: null, sodium: 0, nutrients: { iron: 0 } });
    const snapshot = scaleFromPer100g(product, 50);

    expect(snapshot.sugar).toBeNull();
    expect(snapshot.naturalSugar).toBeNull();
    expect(snapshot.sodium).toBe(0);
    expect(snapshot.nutrients).toEqual({ iron: 0 });
    expect("vitaminC" in snapshot.nutrients).toBe(false);
  });

  it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])("rejects %p grams", (grams) => {
    expect(() => scaleFromPer100g(makeProduct(), grams)).toThrow(InvalidAmountError);
  });
});

describe("scaleFromPortions", () => {
  it("logs two 115 g portions of an 82 kcal / 4.5 g protein product", () => {
    const yogurt = makeProduct({ calories: 82, protein: 4.5, portionSize: 115 });
    const snapshot = scaleFromPortions(yogurt, 2);

    expect(snapshot.calories).toBeCloseTo(188.6, 10);
    expect(snapshot.protein).toBeCloseTo(10.35, 10);
  });

  it("requires a portion size", () => {
    expect(() => scaleFromPortions(makeProduct({ portionSize: null }), 1)).toThrow("Product has no portion size");
  });
});

describe("sugar split policy", () => {
  const product = makeProduct({ sugar: 10, naturalSugar: null, addedSugar: null });

  it("copies the declared split by default", () => {
    const snapshot = scaleFromPer100g(product, 200);
    expect(snapshot.sugar).toBeCloseTo(20, 10);
    expect(snapshot.addedSugar).toBeNull();
    expect(snapshot.naturalSugar).toBeNull();
  });

  it("counts undeclared sugar as added when asked to", () => {
    const snapshot = scaleFromPer100g(product, 200, { sugarPolicy: "undeclaredAsAdded" });
    expect(snapshot.addedSugar).toBeCloseTo(20, 10);
    expect(snapshot.naturalSugar).toBe(0);
  });

  it("leaves a declared split alone under undeclaredAsAdded", () => {
    const split = makeProduct({ sugar: 10, naturalSugar: 4, addedSugar: 6 });
    const snapshot = scaleFromPer100g(split, 100, { sugarPolicy: "undeclaredAsAdded" });
    expect(snapshot.naturalSugar).toBe(4);
    expect(snapshot.addedSugar).toBe(6);
  });
});

describe("derivePer100gFromWeight", () => {
  it("inverts scaleFromPer100g", () => {
    const product = makeProduct({ sugar: 3.2, nutrients: { vitaminC: 12 } });
    const per100g = derivePer100gFromWeight(scaleFromPer100g(product, 250), 250);

    expect(per100g.calories).toBeCloseTo(product.calories, 9);
    expect(per100g.protein).toBeCloseTo(product.protein, 9);
    expect(per100g.sugar).toBeCloseTo(3.2, 9);
    expect(per100g.nutrients.vitaminC).toBeCloseTo(12, 9);
  });

  it("treats weights under 1 g as 1 g", () => {
    const per100g = derivePer100gFromWeight(makeEntry({ calories: 5 }), 0);
    expect(per100g.calories).toBe(500);
  });
});

describe("rescale", () => {
  it("uses the pre-change amount as the base", () => {
    const entry = makeEntry({ amount: 100, calories: 250, nutrients: { iron: 2 } });
    const { amount, snapshot } = rescale(entry, 150);

    expect(amount).toBe(150);
    expect(snapshot.calories).toBeCloseTo(375, 10);
    expect(snapshot.nutrients.iron).toBeCloseTo(3, 10);
  });

  it("composes: rescaling to a then b equals rescaling to b", () => {
    const entry = makeEntry({ amount: 80, calories: 200, protein: 7, fat: 0 });
    const first = rescale(entry, 130);
    const twice = rescale({ ...first.snapshot, amount: first.amount }, 45);
    const once = rescale(entry, 45);

    expect(twice.amount).toBe(once.amount);
    expect(twice.snapshot.calories).toBeCloseTo(once.snapshot.calories, 9);
    expect(twice.snapshot.protein).toBeCloseTo(once.snapshot.protein, 9);
    expect(twice.snapshot.fat).toBe(0);
  });

  it("clamps to at least 1 and to the maximum when given", () => {
    const entry = makeEntry({ amount: 100, calories: 250 });

    expect(rescale(entry, 0.2).amount).toBe(1);
    expect(rescale(entry, 0.2).snapshot.calories).toBeCloseTo(2.5, 10);
    expect(rescale(entry, 9000, { maxAmount: 5000 }).amount).toBe(5000);
    expect(rescale(entry, 9000).amount).toBe(9000);
  });

  it("refuses an entry whose amount is zero", () => {
    expect(() => rescale(makeEntry({ amount: 0 }), 10)).toThrow(InvalidAmountError);
  });
});

describe("adjustAmount", () => {
  it("steps by a delta without an upper clamp", () => {
    const entry = makeEntry({ amount: 100, calories: 250 });

    expect(adjustAmount(entry, 10000).amount).toBe(10100);
    expect(adjustAmount(entry, -150).amount).toBe(1);
    expect(adjustAmount(entry, 25).snapshot.calories).toBeCloseTo(312.5, 10);
  });
});

describe("scaleFromServings", () => {
  it("scales per-serving nutrients by servings / serving size", () => {
    const supplement = makeSupplement({ servingSize: 2, nutrients: { vitaminC: 100, zinc: 10 } });
    expect(scaleFromServings(supplement, 3)).toEqual({ vitaminC: 150, zinc: 15 });
  });

  it("rejects non-positive servings", () => {
    expect(() => scaleFromServings(makeSupplement(), 0)).toThrow(InvalidAmountError);
  });
});

describe("helpers", () => {
  it("scaleNutrients only touches present keys", () => {
    expect(scaleNutrients({ folate: 100 }, 0.5)).toEqual({ folate: 50 });
  });

  it("clampAmount applies the floor before the ceiling", () => {
    expect(clampAmount(-3)).toBe(1);
    expect(clampAmount(7000, 5000)).toBe(5000);
  });
});
