/**
 * Front-of-pack extraction
 * Product name from the top lines of the capture, declared weight from anywhere
 */

import { FRONT_CONFIDENCE_THRESHOLD, groupLines, type NormalizeOptions } from './textNormalizer.js';
import type { ProductInfo, ProductWeight, RawFragment, WeightUnit } from './types.js';

const NAME_LINE_COUNT = 3;

const LEADING_WEIGHT = /^\d+[gkml]/i;
const LEADING_CURRENCY = /^[₫₹$]/;

const WEIGHT_PATTERNS: RegExp[] = [
    /(\d+)\s*(g|kg|ml)/i,
    /(\d+)\s*(grams?|kilograms?)/i,
];

const UNIT_ALIASES: Record<string, WeightUnit> = {
    g: 'g',
    gram: 'g',
    grams: 'g',
    kg: 'kg',
    kilogram: 'kg',
    kilograms: 'kg',
    ml: 'ml',
};

function isNameCandidate(line: string): boolean {
    const lower = line.toLowerCase();
    return (
        !lower.includes('net')
        && !lower.includes('weight')
        && !LEADING_WEIGHT.test(lower)
        && !LEADING_CURRENCY.test(lower)
        && line.length > 3
    );
}

/**
 * Product name: the top three lines minus weight, price and "net weight" noise.
 */
export function extractProductName(lines: readonly string[]): string | null {
    const name = lines
        .slice(0, NAME_LINE_COUNT)
        .filter(isNameCandidate)
        .join(' ')
        .trim();
    return name || null;
}

export function extractWeight(text: string): ProductWeight | null {
    for (const pattern of WEIGHT_PATTERNS) {
        const match = pattern.exec(text);
        if (!match) continue;

        const [, digits, unitRaw] = match;
        const unitText = unitRaw.toLowerCase();
        const unit = UNIT_ALIASES[unitText];
        if (!unit) continue;

        return {
            value: Number(digits),
            unit,
            text: `${digits}${unitText}`,
        };
    }
    return null;
}

/** Kilograms scale to grams; grams and millilitres are taken 1:1 */
export function weightInGrams(weight: ProductWeight): number {
    return weight.unit === 'kg' ? weight.value * 1000 : weight.value;
}

export function extractProductInfo(fragments: readonly RawFragment[], options: NormalizeOptions = {}): ProductInfo {
    const lines = groupLines(fragments, {
        minConfidence: options.minConfidence ?? FRONT_CONFIDENCE_THRESHOLD,
        lineTolerance: options.lineTolerance,
    }).map((line) => line.text);

    return {
        name: extractProductName(lines),
        weight: extractWeight(lines.join(' ')),
    };
}

/**
 * Search query for an online price lookup: product name followed by weight.
 * The caller's grams stand in when the pack showed no weight.
 */
export function buildPriceQuery(info: ProductInfo, fallbackGrams?: number | null): string | null {
    const weightText = info.weight?.text ?? (fallbackGrams ? `${fallbackGrams}g` : null);
    const query = [info.name, weightText].filter((part): part is string => Boolean(part)).join(' ');
    return query || null;
}
