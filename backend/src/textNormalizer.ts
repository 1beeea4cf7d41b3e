/**
 * OCR Text Normalization
 * Group positioned fragments into reading-order lines and clean common OCR noise
 */

import type { RawFragment, TextLine } from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

/** Ingredient-label capture: only high-confidence text is trusted */
export const LABEL_CONFIDENCE_THRESHOLD = 0.5;

/** Front-of-pack capture: large stylised type recognises with lower confidence */
export const FRONT_CONFIDENCE_THRESHOLD = 0.3;

/** Fragments whose centres are this close vertically share a line */
export const LINE_TOLERANCE = 0.02;

export interface NormalizeOptions {
    minConfidence?: number;
    lineTolerance?: number;
}

// ============================================================================
// LINE GROUPING
// ============================================================================

/**
 * Cluster fragments into lines, top to bottom.
 * A line is anchored at the y of its first fragment; later fragments join it
 * while they stay within the tolerance of that anchor.
 */
export function groupLines(fragments: readonly RawFragment[], options: NormalizeOptions = {}): TextLine[] {
    const minConfidence = options.minConfidence ?? LABEL_CONFIDENCE_THRESHOLD;
    const tolerance = options.lineTolerance ?? LINE_TOLERANCE;

    const accepted = fragments
        .filter((f) => f.confidence >= minConfidence)
        .map((f) => ({ ...f, text: f.text.trim() }))
        .filter((f) => f.text.length > 0);

    if (accepted.length === 0) return [];

    // Array.prototype.sort is stable, so equal keys keep input order
    const sorted = [...accepted].sort((a, b) => a.centerY - b.centerY);

    const lines: TextLine[] = [];
    let current: RawFragment[] = [];
    let lineY = sorted[0].centerY;

    for (const fragment of sorted) {
        if (current.length > 0 && Math.abs(fragment.centerY - lineY) > tolerance) {
            lines.push(createLine(current, lineY));
            current = [];
            lineY = fragment.centerY;
        }
        current.push(fragment);
    }

    if (current.length > 0) {
        lines.push(createLine(current, lineY));
    }

    return lines;
}

function createLine(fragments: RawFragment[], y: number): TextLine {
    const ordered = [...fragments].sort((a, b) => a.centerX - b.centerX);
    return {
        text: cleanLine(ordered.map((f) => f.text).join(' ')),
        y,
    };
}

// ============================================================================
// CLEANUP
// ============================================================================

function cleanLine(line: string): string {
    return line
        .replace(/\s+/g, ' ')
        .replace(/,\s*,/g, ',')
        .trim();
}

/**
 * Clean OCR text that is already joined: collapse whitespace runs and doubled
 * commas line by line, keeping line breaks intact.
 */
export function cleanOcrText(text: string): string {
    return text
        .split(/\r?\n/)
        .map(cleanLine)
        .join('\n')
        .trim();
}

/**
 * Fragments → NormalizedText (lines joined with line breaks).
 * Returns an empty string when nothing survives the confidence filter.
 */
export function normalizeFragments(fragments: readonly RawFragment[], options: NormalizeOptions = {}): string {
    return groupLines(fragments, options)
        .map((line) => line.text)
        .filter((text) => text.length > 0)
        .join('\n');
}
