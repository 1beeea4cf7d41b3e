import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { detectHeader, segmentSections, splitSections } from "../src/labelSections.js";

describe("detectHeader", () => {
  it("cuts the longest matching header off the line", () => {
    assert.deepEqual(detectHeader("Allergens: milk, soy"), { section: "allergens", remainder: "milk, soy" });
  });

  it("finds a header that follows a colon mid-line", () => {
    assert.deepEqual(detectHeader("Product of Vietnam: Ingredients rice, salt"), {
      section: "ingredients",
      remainder: "rice, salt",
    });
  });

  it("cuts at the right place when lower-casing changes the line length", () => {
    assert.deepEqual(detectHeader("İİ: Ingredients rice, salt"), { section: "ingredients", remainder: "rice, salt" });
  });

  it("recognises headers in other languages", () => {
    assert.deepEqual(detectHeader("Zutaten: Zucker"), { section: "ingredients", remainder: "Zucker" });
  });

  it("returns null for ordinary lines", () => {
    assert.equal(detectHeader("Sugar, salt"), null);
  });
});

describe("splitSections", () => {
  it("recovers allergens listed before ingredients", () => {
    const sections = splitSections("Allergens: milk, soy\nIngredients: sugar, milk powder");
    assert.equal(sections.ingredients, "sugar, milk powder");
    assert.equal(sections.allergens, "milk, soy");
  });

  it("treats text before any header as ingredients", () => {
    const sections = splitSections("sugar, salt\nwater");
    assert.equal(sections.ingredients, "sugar, salt\nwater");
    assert.equal(sections.allergens, null);
  });

  it("collects other named sections", () => {
    const sections = splitSections("Ingredients: oats\nNutrition Facts\nEnergy 120 kcal\nStorage: keep dry");
    assert.equal(sections.ingredients, "oats");
    assert.deepEqual(sections.other, { nutrition: "Energy 120 kcal", storage: "keep dry" });
  });

  it("keeps blank-line paragraph breaks inside a section", () => {
    const sections = splitSections("Ingredients: sugar\n\nsalt\nAllergens: milk");
    assert.equal(sections.ingredients, "sugar\n\nsalt");
    assert.equal(sections.allergens, "milk");
  });

  it("does not seed a section with a long header remainder", () => {
    const sections = splitSections(`Ingredients: ${"x".repeat(120)}\nsugar`);
    assert.equal(sections.ingredients, "sugar");
  });

  it("falls back to the whole text when no ingredients were found", () => {
    const sections = splitSections("Allergens: milk");
    assert.equal(sections.ingredients, "Allergens: milk");
    assert.equal(sections.allergens, "milk");
  });
});

describe("segmentSections", () => {
  it("formats ingredient and allergen slots as bullet lists", () => {
    const sections = segmentSections("Allergens: milk, soy\nIngredients: sugar, milk powder");
    assert.deepEqual(sections, {
      ingredientsText: "• milk powder\n• sugar",
      allergenText: "• milk\n• soy",
      otherSections: {},
    });
  });
});
