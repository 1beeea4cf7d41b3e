/**
 * English-line filter
 * Approximates "translate to English" by keeping the English lines that most
 * bilingual packs already print, and dropping everything else.
 */

import type { SourceLanguage } from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

const ENGLISH_HEADERS = ['ingredients', 'ingredient', 'contains', 'allergen'];

const NOISE_FRAGMENTS = ['address', 'phone', 'email', '@', 'www.', 'http'];
const LONG_NUMBER = /\d{4,}/;

// Any letter or combining mark outside ASCII A-Z / a-z
const NON_LATIN_LETTER = /(?![A-Za-z])[\p{L}\p{M}]/u;

// ============================================================================
// CHARACTER TESTS
// ============================================================================

export function hasNonLatinLetter(text: string): boolean {
    return NON_LATIN_LETTER.test(text);
}

export function isEnglishLine(line: string): boolean {
    const lower = line.toLowerCase();
    if (hasNonLatinLetter(line)) return false;
    if (NOISE_FRAGMENTS.some((noise) => lower.includes(noise))) return false;
    if (LONG_NUMBER.test(lower)) return false;
    return line.length > 2;
}

function startsWithEnglishHeader(lowerLine: string): boolean {
    return ENGLISH_HEADERS.some((header) => lowerLine.startsWith(header));
}

// ============================================================================
// FILTER
// ============================================================================

/**
 * Keep English lines. When an English section header is present, only lines
 * from that header onward are considered; otherwise the whole text is scanned.
 * Falls back to the untouched input when nothing qualifies.
 */
export function filterEnglish(text: string): string {
    const lines = text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);

    const sectionLines: string[] = [];
    let inEnglishSection = false;

    for (const line of lines) {
        if (!inEnglishSection && startsWithEnglishHeader(line.toLowerCase())) {
            inEnglishSection = true;
        }
        if (inEnglishSection && isEnglishLine(line)) {
            sectionLines.push(line);
        }
    }

    if (sectionLines.length > 0) {
        return sectionLines.join('\n');
    }

    const englishLines = lines.filter(isEnglishLine);
    return englishLines.length > 0 ? englishLines.join('\n') : text;
}

// ============================================================================
// SCRIPT DETECTION
// ============================================================================

const VIETNAMESE_ONLY = /[ạảầấậẩẫăằắặẳẵẹẻẽềếệểễịỉĩọỏồốộổỗơờớợởỡụủũưừứựửữỳỵỷỹđ]/;
const LATIN_ACCENTS = /[àáâãäåæçèéêëìíîïðñòóôõöøùúûüýþÿ]/;
const HAN = /[一-龥]/;
const HIRAGANA = /[ぁ-ん]/;
const HANGUL = /[가-힣]/;
const THAI = /[ก-๙]/;

/**
 * Rough script-based language guess for the original label text.
 * Japanese is checked before Han because Japanese labels mix both.
 */
export function detectLanguage(text: string): SourceLanguage {
    const lower = text.toLowerCase();
    if (VIETNAMESE_ONLY.test(lower)) return 'vi';
    if (HIRAGANA.test(lower)) return 'ja';
    if (HAN.test(lower)) return 'zh';
    if (HANGUL.test(lower)) return 'ko';
    if (THAI.test(lower)) return 'th';
    if (LATIN_ACCENTS.test(lower)) return 'es';
    return 'en';
}
