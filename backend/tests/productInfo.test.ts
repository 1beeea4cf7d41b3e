import assert from "node:assert/strict";
import { describe, it } from "node:test";

import {
  buildPriceQuery,
  extractProductInfo,
  extractProductName,
  extractWeight,
  weightInGrams,
} from "../src/productInfo.js";
import type { RawFragment } from "../src/types.js";

const frontOfPack: RawFragment[] = [
  { text: "NET WT 500g", confidence: 0.9, centerX: 0.5, centerY: 0.05 },
  { text: "Crispy Rice", confidence: 0.8, centerX: 0.3, centerY: 0.2 },
  { text: "Crackers", confidence: 0.35, centerX: 0.7, centerY: 0.205 },
  { text: "₫45.000", confidence: 0.9, centerX: 0.5, centerY: 0.5 },
  { text: "smudge", confidence: 0.2, centerX: 0.5, centerY: 0.6 },
];

describe("extractProductInfo", () => {
  it("takes the name from the top lines and the weight from anywhere", () => {
    assert.deepEqual(extractProductInfo(frontOfPack), {
      name: "Crispy Rice Crackers",
      weight: { value: 500, unit: "g", text: "500g" },
    });
  });

  it("returns nulls when nothing was recognised", () => {
    assert.deepEqual(extractProductInfo([]), { name: null, weight: null });
  });
});

describe("extractProductName", () => {
  it("skips weight, price and very short lines", () => {
    assert.equal(extractProductName(["250g", "$3", "Tea", "Green Tea"]), null);
    assert.equal(extractProductName(["Oat Milk", "1L", "Barista Edition", "Unsweetened"]), "Oat Milk Barista Edition");
  });
});

describe("extractWeight", () => {
  it("lower-cases the unit", () => {
    assert.deepEqual(extractWeight("Net 1 KG"), { value: 1, unit: "kg", text: "1kg" });
  });

  it("falls back to spelled-out units", () => {
    assert.deepEqual(extractWeight("Net 1 kilogram"), { value: 1, unit: "kg", text: "1kilogram" });
  });

  it("returns null without a weight", () => {
    assert.equal(extractWeight("Crispy Rice Crackers"), null);
  });
});

describe("weightInGrams", () => {
  it("scales kilograms and keeps grams and millilitres", () => {
    assert.equal(weightInGrams({ value: 2, unit: "kg", text: "2kg" }), 2000);
    assert.equal(weightInGrams({ value: 250, unit: "g", text: "250g" }), 250);
    assert.equal(weightInGrams({ value: 330, unit: "ml", text: "330ml" }), 330);
  });
});

describe("buildPriceQuery", () => {
  it("joins the name and weight", () => {
    const info = extractProductInfo(frontOfPack);
    assert.equal(buildPriceQuery(info), "Crispy Rice Crackers 500g");
  });

  it("uses caller grams when the pack shows no weight", () => {
    assert.equal(buildPriceQuery({ name: "Green Tea", weight: null }, 250), "Green Tea 250g");
    assert.equal(buildPriceQuery({ name: null, weight: null }, 250), "250g");
  });

  it("returns null when there is nothing to search for", () => {
    assert.equal(buildPriceQuery({ name: null, weight: null }), null);
  });
});
