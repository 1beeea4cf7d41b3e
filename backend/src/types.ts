export interface RawFragment {
  text: string;
  confidence: number;
  centerX: number;
  /** Grows downward: 0 is the top edge of the capture */
  centerY: number;
}

export interface TextLine {
  text: string;
  /** Vertical position of the fragment that opened the line */
  y: number;
}

export interface LabelSections {
  ingredientsText: string;
  allergenText: string | null;
  otherSections: Record<string, string>;
}

export type DietaryCategory = "Vegan" | "Vegetarian" | "NonVegetarian" | "PossiblyNonVegetarian";

export const DIETARY_CATEGORY_LABELS: Record<DietaryCategory, string> = {
  Vegan: "Vegan",
  Vegetarian: "Vegetarian",
  NonVegetarian: "Non-Vegetarian",
  PossiblyNonVegetarian: "Possibly Non-Vegetarian",
};

export const CLASSIFICATION_RULE_IDS = [
  "non_vegetarian",
  "vegan",
  "vegetarian_dairy_egg",
  "vegetarian_plant",
  "ambiguous_vegan",
  "undetermined",
  "unreadable",
] as const;

export type ClassificationRuleId = (typeof CLASSIFICATION_RULE_IDS)[number];

export interface ClassificationEvidence {
  keyword: string;
  sourceLine?: string;
}

export interface ClassificationResult {
  category: DietaryCategory;
  rule: ClassificationRuleId;
  reason: string;
  evidence: ClassificationEvidence[];
}

export type WeightUnit = "g" | "kg" | "ml";

export interface ProductWeight {
  value: number;
  unit: WeightUnit;
  text: string;
}

export interface ProductInfo {
  name: string | null;
  weight: ProductWeight | null;
}

export type PriceCurrency = "VND" | "INR" | "unsupported" | "unparsed";

export interface PriceInfo {
  localAmountText: string;
  convertedAmountText: string;
  perKilogramText: string | null;
  currency: PriceCurrency;
}

export type SourceLanguage = "en" | "es" | "zh" | "ja" | "ko" | "th" | "vi";

export interface LabelScanResult {
  originalText: string;
  translatedText: string;
  sourceLanguage: SourceLanguage;
  sections: LabelSections;
  classification: ClassificationResult;
  calories: string;
}

export type LabelScanOutcome =
  | { status: "ok"; result: LabelScanResult }
  | { status: "no_text"; message: string };

export interface FrontScanResult {
  productInfo: ProductInfo;
  price: PriceInfo | null;
}
