export const CALORIES_NOT_LISTED = "Calories not listed";

// Order matters: the first pattern with any match wins, even if a later
// pattern would match earlier in the text.
const CALORIE_PATTERNS: RegExp[] = [
  /(\d+)\s*(?:kcal|calories?|cal)\s*(?:per\s*(?:serving|100g|100\s*g)?)?/i,
  /calories?[:\s]+(\d+)/i,
  /energy[:\s]+(\d+)\s*(?:kcal|cal)/i,
];

export const extractCalories = (text: string): string => {
  const lowered = text.toLowerCase();

  for (const pattern of CALORIE_PATTERNS) {
    const value = pattern.exec(lowered)?.[1];
    if (value) {
      return `${value} kcal`;
    }
  }

  return CALORIES_NOT_LISTED;
};
