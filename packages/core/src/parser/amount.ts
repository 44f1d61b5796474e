/**
 * Amount conversion for the ledger export.
 *
 * The export writes amounts with '.' as thousands separator, ',' as decimal
 * separator and a trailing '-' for negative values: "1.234,56-".
 */

import { Decimal } from 'decimal.js';

const PLAIN_DECIMAL = /^-?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Convert an export amount to a Decimal.
 *
 * @param raw - Amount text as exported (already trimmed or not)
 * @returns Parsed amount, or null if the text is not a number
 */
export function parseLocalAmount(raw: string): Decimal | null {
    let value = raw.trim().replace(/\./g, '').replace(/,/g, '.');

    let negative = false;
    if (value.endsWith('-')) {
        negative = true;
        value = value.slice(0, -1).trimEnd();
    }

    if (!PLAIN_DECIMAL.test(value) || (negative && value.startsWith('-'))) {
        return null;
    }

    const amount = new Decimal(value);
    return negative ? amount.negated() : amount;
}

/**
 * Format a Decimal the way amounts are stored: plain notation, no exponent.
 * Negative zero collapses to "0".
 */
export function formatAmount(amount: Decimal): string {
    return amount.isZero() ? '0' : amount.toFixed();
}
