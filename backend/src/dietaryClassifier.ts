/**
 * Dietary classifier
 * Keyword rule engine over formatted ingredient text. Rules run in a fixed
 * order and the first one that applies decides the category; insufficient
 * evidence always lands on Possibly Non-Vegetarian.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type {
    ClassificationEvidence,
    ClassificationResult,
    ClassificationRuleId,
    DietaryCategory,
} from './types.js';

// ============================================================================
// KEYWORD CONFIGURATION
// ============================================================================

const KeywordListSchema = z.array(z.string().trim().min(1).toLowerCase());

export const DietaryKeywordsSchema = z.object({
    nonVeg: KeywordListSchema,
    veganSafe: KeywordListSchema,
    dairy: KeywordListSchema,
    egg: KeywordListSchema,
    commonPlant: KeywordListSchema,
});

export type DietaryKeywords = z.infer<typeof DietaryKeywordsSchema>;

const KEYWORDS_PATH = new URL('../data/dietaryKeywords.json', import.meta.url);

let defaultKeywords: DietaryKeywords | null = null;

export function loadDefaultKeywords(): DietaryKeywords {
    if (!defaultKeywords) {
        const raw: unknown = JSON.parse(readFileSync(KEYWORDS_PATH, 'utf8'));
        defaultKeywords = DietaryKeywordsSchema.parse(raw);
    }
    return defaultKeywords;
}

// ============================================================================
// MATCHING
// ============================================================================

export interface LineHit {
    line: string;
    keywords: string[];
}

export interface KeywordMatches {
    text: string;
    nonVeg: string[];
    nonVegLines: LineHit[];
    veganSafe: string[];
    dairy: string[];
    egg: string[];
    commonPlant: string[];
}

function findKeywords(lowerText: string, keywords: readonly string[]): string[] {
    const found: string[] = [];
    for (const keyword of keywords) {
        if (lowerText.includes(keyword) && !found.includes(keyword)) {
            found.push(keyword);
        }
    }
    return found;
}

/**
 * Attribute each non-veg keyword to the first line that contains it.
 */
function findKeywordLines(text: string, keywords: readonly string[]): LineHit[] {
    const seen = new Set<string>();
    const hits: LineHit[] = [];

    for (const line of text.split(/\r?\n/)) {
        const lowerLine = line.toLowerCase();
        const lineKeywords = keywords.filter((keyword) => !seen.has(keyword) && lowerLine.includes(keyword));
        if (lineKeywords.length === 0) continue;
        lineKeywords.forEach((keyword) => seen.add(keyword));
        hits.push({ line: line.trim(), keywords: lineKeywords });
    }

    return hits;
}

function collectMatches(text: string, keywords: DietaryKeywords): KeywordMatches {
    const lower = text.toLowerCase();
    return {
        text: lower,
        nonVeg: findKeywords(lower, keywords.nonVeg),
        nonVegLines: findKeywordLines(text, keywords.nonVeg),
        veganSafe: findKeywords(lower, keywords.veganSafe),
        dairy: findKeywords(lower, keywords.dairy),
        egg: findKeywords(lower, keywords.egg),
        commonPlant: findKeywords(lower, keywords.commonPlant),
    };
}

// ============================================================================
// RULES
// ============================================================================

export interface RuleVerdict {
    reason: string;
    evidence: ClassificationEvidence[];
}

export interface ClassificationRule {
    id: ClassificationRuleId;
    category: DietaryCategory;
    applies: (m: KeywordMatches) => boolean;
    explain: (m: KeywordMatches) => RuleVerdict;
}

const MIN_READABLE_LENGTH = 10;

function listWithOverflow(keywords: readonly string[], limit: number): string {
    const shown = keywords.slice(0, limit).join(', ');
    const extra = keywords.length - limit;
    return extra > 0 ? `${shown} and ${extra} more` : shown;
}

function asEvidence(keywords: readonly string[], limit: number): ClassificationEvidence[] {
    return keywords.slice(0, limit).map((keyword) => ({ keyword }));
}

function hasDairyOrEgg(m: KeywordMatches): boolean {
    return m.dairy.length > 0 || m.egg.length > 0;
}

const UNREADABLE_RULE: ClassificationRule = {
    id: 'unreadable',
    category: 'PossiblyNonVegetarian',
    applies: () => true,
    explain: () => ({
        reason: 'Could not read ingredients clearly. Please try scanning again with better lighting.',
        evidence: [],
    }),
};

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
    {
        id: 'non_vegetarian',
        category: 'NonVegetarian',
        applies: (m) => m.nonVeg.length > 0,
        explain: (m) => {
            let reason = `Found non-vegetarian ingredients: ${listWithOverflow(m.nonVeg, 3)}`;
            const lines = m.nonVegLines.slice(0, 2);
            if (lines.length > 0) {
                const highlighted = lines.map((hit) => `"${hit.line}" (contains: ${hit.keywords.join(', ')})`);
                reason += `\n\nFound in: ${highlighted.join('\n')}`;
            }
            const evidence = m.nonVeg.slice(0, 3).map((keyword) => {
                const hit = m.nonVegLines.find((candidate) => candidate.keywords.includes(keyword));
                return hit ? { keyword, sourceLine: hit.line } : { keyword };
            });
            return { reason, evidence };
        },
    },
    {
        id: 'vegan',
        category: 'Vegan',
        applies: (m) => m.veganSafe.length > 0 && !hasDairyOrEgg(m),
        explain: (m) => ({
            reason: `Found vegan-safe ingredients: ${listWithOverflow(m.veganSafe, 3)}`,
            evidence: asEvidence(m.veganSafe, 3),
        }),
    },
    {
        id: 'vegetarian_dairy_egg',
        category: 'Vegetarian',
        applies: hasDairyOrEgg,
        explain: (m) => {
            const parts: string[] = [];
            if (m.dairy.length > 0) parts.push(`dairy: ${m.dairy.slice(0, 2).join(', ')}`);
            if (m.egg.length > 0) parts.push(`eggs: ${m.egg.slice(0, 2).join(', ')}`);
            return {
                reason: `Found ${parts.join(' and ')}`,
                evidence: [...asEvidence(m.dairy, 2), ...asEvidence(m.egg, 2)],
            };
        },
    },
    {
        id: 'vegetarian_plant',
        category: 'Vegetarian',
        applies: (m) => m.commonPlant.length > 0 && !hasDairyOrEgg(m),
        explain: (m) => ({
            reason: `Found plant-based ingredients: ${m.commonPlant.slice(0, 3).join(', ')}. No animal products detected.`,
            evidence: asEvidence(m.commonPlant, 3),
        }),
    },
    {
        // Unreachable in this order: every veganSafe match is taken by the vegan or dairy/egg rule above
        id: 'ambiguous_vegan',
        category: 'PossiblyNonVegetarian',
        applies: (m) => m.veganSafe.length > 0,
        explain: (m) => ({
            reason: `Found plant-based ingredients (${m.veganSafe.slice(0, 2).join(', ')}) but unable to confirm if fully vegan. May contain hidden animal products.`,
            evidence: asEvidence(m.veganSafe, 2),
        }),
    },
    {
        id: 'undetermined',
        category: 'PossiblyNonVegetarian',
        applies: (m) => m.text.length > MIN_READABLE_LENGTH,
        explain: () => ({
            reason: 'Unable to determine classification from ingredients. Ingredients may contain animal products not clearly listed.',
            evidence: [],
        }),
    },
    UNREADABLE_RULE,
];

// ============================================================================
// CLASSIFIER
// ============================================================================

export interface DietaryClassifier {
    classify: (ingredientsText: string) => ClassificationResult;
}

export function createDietaryClassifier(
    keywords: DietaryKeywords = loadDefaultKeywords(),
    rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): DietaryClassifier {
    return {
        classify(ingredientsText: string): ClassificationResult {
            const matches = collectMatches(ingredientsText, keywords);
            const rule = rules.find((candidate) => candidate.applies(matches)) ?? UNREADABLE_RULE;
            const { reason, evidence } = rule.explain(matches);
            return { category: rule.category, rule: rule.id, reason, evidence };
        },
    };
}

let sharedClassifier: DietaryClassifier | null = null;

/** Classify with the bundled keyword lists */
export function classify(ingredientsText: string): ClassificationResult {
    if (!sharedClassifier) {
        sharedClassifier = createDietaryClassifier();
    }
    return sharedClassifier.classify(ingredientsText);
}
