/**
 * Price parsing and currency conversion
 * Dong prices convert to rupees at a fixed rate; rupee prices pass through.
 */

import type { PriceCurrency, PriceInfo } from './types.js';

/** Approximate: 1 VND ≈ 0.0033 INR */
export const DEFAULT_VND_TO_INR_RATE = 0.0033;

export const UNABLE_TO_CONVERT = 'Unable to convert';
export const CURRENCY_NOT_SUPPORTED = 'Currency not supported';

// Decimal points are stripped along with the symbols, so "₹99.50" reads as 9950
const PRICE_SYMBOLS = /[₫₹$,.]/g;
const INTEGER_LITERAL = /^-?\d+$/;

export function convertDongToInr(dongAmount: number, rate: number = DEFAULT_VND_TO_INR_RATE): number {
    return dongAmount * rate;
}

export function parsePriceAmount(price: string): number | null {
    const cleaned = price.replace(PRICE_SYMBOLS, '');
    return INTEGER_LITERAL.test(cleaned) ? Number(cleaned) : null;
}

export function detectCurrency(price: string): Exclude<PriceCurrency, 'unparsed'> {
    if (price.includes('₫') || price.includes('đ')) return 'VND';
    if (price.includes('₹')) return 'INR';
    return 'unsupported';
}

function perKilogram(amount: number, weightInGrams: number): number {
    return (amount / weightInGrams) * 1000;
}

/**
 * Parse a local price string and express it in rupees, with a per-kilogram
 * figure when a positive weight is known.
 */
export function convertPrice(
    price: string,
    weightInGrams?: number | null,
    rate: number = DEFAULT_VND_TO_INR_RATE
): PriceInfo {
    const amount = parsePriceAmount(price);
    if (amount === null) {
        return {
            localAmountText: price,
            convertedAmountText: UNABLE_TO_CONVERT,
            perKilogramText: null,
            currency: 'unparsed',
        };
    }

    const currency = detectCurrency(price);
    const weight = weightInGrams && weightInGrams > 0 ? weightInGrams : null;

    switch (currency) {
        case 'VND': {
            const perKgDong = weight ? perKilogram(amount, weight) : null;
            return {
                localAmountText: price,
                convertedAmountText: `₹${convertDongToInr(amount, rate).toFixed(2)}`,
                perKilogramText: perKgDong === null
                    ? null
                    : `₫${perKgDong.toFixed(0)}/kg (₹${convertDongToInr(perKgDong, rate).toFixed(2)}/kg)`,
                currency,
            };
        }
        case 'INR':
            return {
                localAmountText: price,
                convertedAmountText: price,
                perKilogramText: weight ? `₹${perKilogram(amount, weight).toFixed(2)}/kg` : null,
                currency,
            };
        default:
            return {
                localAmountText: price,
                convertedAmountText: CURRENCY_NOT_SUPPORTED,
                perKilogramText: null,
                currency,
            };
    }
}
