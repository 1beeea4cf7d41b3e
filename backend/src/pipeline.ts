/**
 * Label understanding pipeline
 * Fragments → normalized text → English-only text → sections → classification
 * and calories. Every stage is synchronous; the entry points resolve once.
 */

import { extractCalories } from './calories.js';
import { classify as classifyWithDefaults, type DietaryClassifier } from './dietaryClassifier.js';
import { segmentSections, DEFAULT_SECTION_HEADERS, type SectionHeaders } from './labelSections.js';
import { detectLanguage, filterEnglish } from './languageFilter.js';
import { incrementMetric } from './metrics.js';
import { convertPrice, DEFAULT_VND_TO_INR_RATE } from './price.js';
import { buildPriceQuery, extractProductInfo, weightInGrams } from './productInfo.js';
import { cleanOcrText, FRONT_CONFIDENCE_THRESHOLD, LABEL_CONFIDENCE_THRESHOLD, normalizeFragments } from './textNormalizer.js';
import type { FrontScanResult, LabelScanOutcome, ProductInfo, RawFragment } from './types.js';

export const NO_TEXT_MESSAGE = 'No text found. Please try again with a clearer image.';

export interface LabelPipelineOptions {
    minConfidence?: number;
    lineTolerance?: number;
    classifier?: DietaryClassifier;
    headers?: SectionHeaders;
}

export interface FrontPipelineOptions {
    priceText?: string | null;
    /** Overrides the weight read from the pack */
    weightInGrams?: number | null;
    minConfidence?: number;
    lineTolerance?: number;
    vndToInrRate?: number;
}

// ============================================================================
// LABEL
// ============================================================================

function runLabelStages(originalText: string, options: LabelPipelineOptions): LabelScanOutcome {
    if (!originalText) {
        incrementMetric('label_scan_no_text');
        console.log('[LabelScan] no text after normalization');
        return { status: 'no_text', message: NO_TEXT_MESSAGE };
    }

    const translatedText = filterEnglish(originalText);
    const sections = segmentSections(translatedText, options.headers ?? DEFAULT_SECTION_HEADERS);
    const classification = options.classifier
        ? options.classifier.classify(sections.ingredientsText)
        : classifyWithDefaults(sections.ingredientsText);
    const calories = extractCalories(sections.ingredientsText);
    const sourceLanguage = detectLanguage(originalText);

    incrementMetric('label_scan_ok');
    incrementMetric(`classification_${classification.rule}`);
    console.log(
        `[LabelScan] ok chars=${originalText.length} lang=${sourceLanguage} category=${classification.category} rule=${classification.rule}`
    );

    return {
        status: 'ok',
        result: {
            originalText,
            translatedText,
            sourceLanguage,
            sections,
            classification,
            calories,
        },
    };
}

/**
 * Run the full pipeline over recognized fragments from an ingredient label.
 */
export async function analyzeLabel(
    fragments: readonly RawFragment[],
    options: LabelPipelineOptions = {}
): Promise<LabelScanOutcome> {
    const originalText = normalizeFragments(fragments, {
        minConfidence: options.minConfidence ?? LABEL_CONFIDENCE_THRESHOLD,
        lineTolerance: options.lineTolerance,
    });
    return runLabelStages(originalText, options);
}

/** Same pipeline for text that was already joined into lines */
export async function analyzeLabelText(text: string, options: LabelPipelineOptions = {}): Promise<LabelScanOutcome> {
    return runLabelStages(cleanOcrText(text), options);
}

// ============================================================================
// FRONT OF PACK
// ============================================================================

export function analyzeFront(fragments: readonly RawFragment[], options: FrontPipelineOptions = {}): FrontScanResult {
    const productInfo = extractProductInfo(fragments, {
        minConfidence: options.minConfidence ?? FRONT_CONFIDENCE_THRESHOLD,
        lineTolerance: options.lineTolerance,
    });

    const priceText = options.priceText?.trim();
    if (!priceText) {
        return { productInfo, price: null };
    }

    const grams = options.weightInGrams ?? (productInfo.weight ? weightInGrams(productInfo.weight) : null);
    const price = convertPrice(priceText, grams, options.vndToInrRate ?? DEFAULT_VND_TO_INR_RATE);
    incrementMetric(price.currency === 'unparsed' ? 'price_convert_failed' : 'price_convert_ok');

    return { productInfo, price };
}

export interface FrontPriceQuery {
    productInfo: ProductInfo;
    query: string | null;
    /** Caller grams first, else the weight read from the pack */
    grams: number | null;
}

export function buildFrontPriceQuery(
    fragments: readonly RawFragment[],
    options: Omit<FrontPipelineOptions, 'priceText' | 'vndToInrRate'> = {}
): FrontPriceQuery {
    const productInfo = extractProductInfo(fragments, {
        minConfidence: options.minConfidence ?? FRONT_CONFIDENCE_THRESHOLD,
        lineTolerance: options.lineTolerance,
    });
    return {
        productInfo,
        query: buildPriceQuery(productInfo, options.weightInGrams),
        grams: options.weightInGrams ?? (productInfo.weight ? weightInGrams(productInfo.weight) : null),
    };
}
