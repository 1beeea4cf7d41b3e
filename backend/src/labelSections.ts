/**
 * Label section segmentation
 * Split filtered label text into ingredients / allergens / other named blocks
 * using multilingual header detection.
 */

import { formatIngredients } from './ingredientFormatter.js';
import type { LabelSections } from './types.js';

// ============================================================================
// HEADERS
// ============================================================================

export const INGREDIENT_HEADERS = [
    'ingredients',
    'ingredient',
    'ingrédients',
    'ingredientes',
    'ingredienti',
    'zutaten',
    '成分',
    '材料',
    'ingrediënten',
];

export const ALLERGEN_HEADERS = [
    'allergen',
    'allergens',
    'allergen information',
    'allergen info',
    'contains',
    'may contain',
    'contains:',
    'may contain:',
    'allergène',
    'allergènes',
    'alérgenos',
    'allergeni',
    'allergene',
    'アレルゲン',
    '过敏原',
    'allergenen',
];

/** Named blocks that are neither ingredients nor allergens */
export const OTHER_SECTION_HEADERS: Record<string, string[]> = {
    nutrition: ['nutrition facts', 'nutrition information', 'nutritional information', 'nutritional values'],
    storage: ['storage', 'store in'],
    directions: ['directions', 'how to use', 'preparation'],
};

export interface SectionHeaders {
    ingredients: readonly string[];
    allergens: readonly string[];
    other: Readonly<Record<string, readonly string[]>>;
}

export const DEFAULT_SECTION_HEADERS: SectionHeaders = {
    ingredients: INGREDIENT_HEADERS,
    allergens: ALLERGEN_HEADERS,
    other: OTHER_SECTION_HEADERS,
};

const HEADER_LINE_CONTENT_LIMIT = 100;

/** 'ingredients', 'allergens', or the key of an other-section header group */
type SectionName = string;

interface HeaderMatch {
    section: SectionName;
    /** Text left on the header line once the header token is removed */
    remainder: string;
}

// ============================================================================
// HEADER DETECTION
// ============================================================================

function matchesHeader(lowerLine: string, header: string): boolean {
    return lowerLine.startsWith(header) || lowerLine === header || lowerLine.includes(`: ${header}`);
}

function trimHeaderPunctuation(value: string): string {
    return value.replace(/^[:\s]+|[:\s]+$/g, '');
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Strip the header token from the line. A leading header is cut at its
 * longest matching variant ("allergens" rather than "allergen"); an inline
 * ": header" cuts everything up to and including it. Matching runs on the
 * line itself since lower-casing can change its length.
 */
function stripHeader(line: string, headers: readonly string[]): string {
    const leading = headers
        .map((header) => new RegExp(`^${escapeRegExp(header)}`, 'i').exec(line)?.[0])
        .filter((match): match is string => match !== undefined)
        .sort((a, b) => b.length - a.length)[0];
    if (leading !== undefined) {
        return trimHeaderPunctuation(line.slice(leading.length));
    }

    for (const header of headers) {
        const match = new RegExp(`: ${escapeRegExp(header)}`, 'i').exec(line);
        if (match) {
            return trimHeaderPunctuation(line.slice(match.index + match[0].length));
        }
    }
    return trimHeaderPunctuation(line);
}

export function detectHeader(line: string, headers: SectionHeaders = DEFAULT_SECTION_HEADERS): HeaderMatch | null {
    const lowerLine = line.toLowerCase();

    if (headers.ingredients.some((header) => matchesHeader(lowerLine, header))) {
        return { section: 'ingredients', remainder: stripHeader(line, headers.ingredients) };
    }

    if (headers.allergens.some((header) => matchesHeader(lowerLine, header))) {
        return { section: 'allergens', remainder: stripHeader(line, headers.allergens) };
    }

    for (const [section, sectionHeaders] of Object.entries(headers.other)) {
        if (sectionHeaders.some((header) => lowerLine.startsWith(header))) {
            return { section, remainder: stripHeader(line, sectionHeaders) };
        }
    }

    return null;
}

// ============================================================================
// SEGMENTATION
// ============================================================================

interface RawSections {
    ingredients: string;
    allergens: string | null;
    other: Record<string, string>;
}

/**
 * Walk the lines with a current-section pointer and a line buffer, flushing
 * the buffer into its slot whenever a new header starts.
 */
export function splitSections(text: string, headers: SectionHeaders = DEFAULT_SECTION_HEADERS): RawSections {
    const sections: RawSections = { ingredients: '', allergens: null, other: {} };
    let currentSection: SectionName | null = null;
    let buffer: string[] = [];

    const flush = () => {
        if (buffer.length === 0 || currentSection === null) return;
        const content = buffer.join('\n').trim();
        if (currentSection === 'ingredients') {
            sections.ingredients = content;
        } else if (currentSection === 'allergens') {
            sections.allergens = content;
        } else {
            sections.other[currentSection] = content;
        }
    };

    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line) {
            // Paragraph break inside an open section
            if (buffer.length > 0 && currentSection !== null) {
                buffer.push('');
            }
            continue;
        }

        const header = detectHeader(line, headers);
        if (header) {
            flush();
            currentSection = header.section;
            buffer = [];
            if (header.remainder && header.remainder.length < HEADER_LINE_CONTENT_LIMIT) {
                buffer.push(header.remainder);
            }
            continue;
        }

        if (currentSection === null) {
            currentSection = 'ingredients';
        }
        buffer.push(line);
    }

    flush();

    if (!sections.ingredients) {
        sections.ingredients = text;
    }

    return sections;
}

/**
 * Filtered text → LabelSections with ingredient and allergen slots formatted
 * as bulleted lists. Other sections are kept as plain text.
 */
export function segmentSections(text: string, headers: SectionHeaders = DEFAULT_SECTION_HEADERS): LabelSections {
    const raw = splitSections(text, headers);
    return {
        ingredientsText: formatIngredients(raw.ingredients) || raw.ingredients,
        allergenText: raw.allergens !== null ? formatIngredients(raw.allergens) : null,
        otherSections: raw.other,
    };
}
