/**
 * Ingredient list formatting
 * Denoise a raw section, split it into entries, sort, and render as bullets
 */

import { hasNonLatinLetter } from './languageFilter.js';

export const BULLET = '•';

const LEADING_INGREDIENTS_HEADER = /^\s*ingredients?\s*:?/i;

const UNWANTED_FRAGMENTS = [
    'address',
    'phone',
    'tel:',
    'email',
    '@',
    'www.',
    'http',
    'website',
    'contact',
    'manufactured',
    'packed by',
    'distributed by',
    'imported by',
];

const LEADING_LONG_NUMBER = /^\d{4,}/;
const LONG_NUMBER = /\d{4,}/;
const WORD_PUNCTUATION = /^[.,;:!?()[\]{}'"]+|[.,;:!?()[\]{}'"]+$/g;

const SEPARATORS = [',', ';', '\n'];

function isUnwantedLine(lowerLine: string): boolean {
    return (
        UNWANTED_FRAGMENTS.some((fragment) => lowerLine.includes(fragment))
        || LEADING_LONG_NUMBER.test(lowerLine)
        || (LONG_NUMBER.test(lowerLine) && lowerLine.length < 20)
    );
}

function keepLatinLines(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 2)
        .filter((line) => !hasNonLatinLetter(line) && !isUnwantedLine(line.toLowerCase()));
}

function extractLatinWords(text: string): string[] {
    return text
        .split(/\s+/)
        .map((word) => word.replace(WORD_PUNCTUATION, ''))
        .filter((word) => word.length > 0 && !hasNonLatinLetter(word));
}

export function splitEntries(text: string): string[] {
    const separator = SEPARATORS.find((sep) => text.includes(sep));
    if (!separator) {
        const whole = text.trim();
        return whole ? [whole] : [];
    }

    const entries = text
        .split(separator)
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 1);

    if (entries.length === 0) {
        const whole = text.trim();
        return whole ? [whole] : [];
    }
    return entries;
}

/** Case-insensitive ascending; ties keep their original order */
export function sortEntries(entries: readonly string[]): string[] {
    return [...entries].sort((a, b) => {
        const left = a.toLowerCase();
        const right = b.toLowerCase();
        if (left < right) return -1;
        if (left > right) return 1;
        return 0;
    });
}

/**
 * Raw section text → bulleted, sorted ingredient list.
 * Entries that differ only by case, or repeat exactly, are all kept.
 */
export function formatIngredients(text: string): string {
    const stripped = text.replace(LEADING_INGREDIENTS_HEADER, '').trim();

    const lines = keepLatinLines(stripped);
    let cleaned = stripped;
    if (lines.length > 0) {
        cleaned = lines.join('\n');
    } else {
        const words = extractLatinWords(stripped);
        if (words.length > 0) {
            cleaned = words.join(' ');
        }
    }

    return sortEntries(splitEntries(cleaned))
        .map((entry) => `${BULLET} ${entry}`)
        .join('\n');
}
