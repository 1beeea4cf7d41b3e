import assert from "node:assert/strict";
import { describe, it } from "node:test";

import {
  classify,
  CLASSIFICATION_RULES,
  createDietaryClassifier,
  DietaryKeywordsSchema,
  loadDefaultKeywords,
} from "../src/dietaryClassifier.js";
import { DIETARY_CATEGORY_LABELS } from "../src/types.js";

describe("classify", () => {
  it("flags meat and points at the line it came from", () => {
    const result = classify("contains chicken and soy sauce");
    assert.equal(result.category, "NonVegetarian");
    assert.equal(result.rule, "non_vegetarian");
    assert.equal(
      result.reason,
      'Found non-vegetarian ingredients: chicken\n\nFound in: "contains chicken and soy sauce" (contains: chicken)',
    );
    assert.deepEqual(result.evidence, [{ keyword: "chicken", sourceLine: "contains chicken and soy sauce" }]);
  });

  it("groups several keywords found on one line", () => {
    const result = classify("sugar\npork gelatin, salt");
    assert.equal(
      result.reason,
      'Found non-vegetarian ingredients: pork, gelatin\n\nFound in: "pork gelatin, salt" (contains: pork, gelatin)',
    );
  });

  it("summarises long keyword lists", () => {
    const result = classify("beef, pork, chicken, fish");
    assert.match(result.reason, /^Found non-vegetarian ingredients: beef, pork, chicken and 1 more\n\n/);
    assert.equal(result.evidence.length, 3);
  });

  it("calls dairy vegetarian", () => {
    const result = classify("milk, sugar, salt");
    assert.equal(result.category, "Vegetarian");
    assert.equal(result.rule, "vegetarian_dairy_egg");
    assert.equal(result.reason, "Found dairy: milk");
  });

  it("names both dairy and egg", () => {
    assert.equal(classify("egg, butter").reason, "Found dairy: butter and eggs: egg");
  });

  it("calls vegan-safe ingredients vegan", () => {
    const result = classify("soy, lentils, rice");
    assert.equal(result.category, "Vegan");
    assert.equal(result.reason, "Found vegan-safe ingredients: soy, lentils, rice");
  });

  it("lets dairy outrank vegan-safe ingredients", () => {
    assert.equal(classify("soy milk").rule, "vegetarian_dairy_egg");
  });

  it("falls back to common plant ingredients", () => {
    const result = classify("potato, corn oil, salt");
    assert.equal(result.category, "Vegetarian");
    assert.equal(result.rule, "vegetarian_plant");
    assert.equal(result.reason, "Found plant-based ingredients: potato, corn, oil. No animal products detected.");
  });

  it("is undecided on readable text without keywords", () => {
    const result = classify("xyz qrs tuvw");
    assert.equal(result.category, "PossiblyNonVegetarian");
    assert.equal(result.rule, "undetermined");
  });

  it("asks for a rescan when the text is too short", () => {
    const result = classify("");
    assert.equal(result.category, "PossiblyNonVegetarian");
    assert.equal(result.rule, "unreadable");
    assert.equal(result.reason, "Could not read ingredients clearly. Please try scanning again with better lighting.");
    assert.equal(DIETARY_CATEGORY_LABELS[result.category], "Possibly Non-Vegetarian");
  });

  it("gives the same answer for the same text", () => {
    assert.deepEqual(classify("milk, sugar"), classify("milk, sugar"));
  });
});

describe("createDietaryClassifier", () => {
  it("accepts custom keyword lists", () => {
    const keywords = DietaryKeywordsSchema.parse({
      ...loadDefaultKeywords(),
      nonVeg: [" Cricket "],
    });
    const classifier = createDietaryClassifier(keywords);

    assert.equal(classifier.classify("cricket flour").rule, "non_vegetarian");
    assert.equal(classifier.classify("beef stock cubes").rule, "undetermined");
  });

  it("explains the ambiguous vegan rule when it runs on its own", () => {
    const ambiguous = CLASSIFICATION_RULES[4];
    assert.equal(ambiguous?.id, "ambiguous_vegan");

    const classifier = createDietaryClassifier(loadDefaultKeywords(), ambiguous ? [ambiguous] : []);
    assert.deepEqual(classifier.classify("soy, lentils"), {
      category: "PossiblyNonVegetarian",
      rule: "ambiguous_vegan",
      reason:
        "Found plant-based ingredients (soy, lentils) but unable to confirm if fully vegan. May contain hidden animal products.",
      evidence: [{ keyword: "soy" }, { keyword: "lentils" }],
    });
  });

  it("falls back to the unreadable rule when no rule applies", () => {
    const classifier = createDietaryClassifier(loadDefaultKeywords(), []);
    assert.equal(classifier.classify("chicken").rule, "unreadable");
  });
});
