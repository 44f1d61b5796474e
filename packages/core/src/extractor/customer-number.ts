import type { LineItem } from '../types/index.js';
import { CHEQUE_SENTINEL_ACCOUNT } from '../types/index.js';

/**
 * Branch or head-office number typed into the posting text:
 * seven digits starting with 1 or 4, preceded by a non-digit and not followed by one.
 */
const CUSTOMER_NUMBER_IN_TEXT = /\D([14]\d{6})(?!\d)/;

/**
 * Extract the first customer number mentioned in a posting text.
 *
 * @param text - Free posting text
 * @returns Seven-digit customer number, or null when the text names none
 */
export function extractCustomerNumber(text: string): number | null {
    const match = CUSTOMER_NUMBER_IN_TEXT.exec(text);
    return match ? Number(match[1]) : null;
}

export type CustomerNumberSource = 'text' | 'offsetting_account' | 'none';

/**
 * Derive the customer number of a line item.
 *
 * The text wins. Without a number in the text the offsetting account is used,
 * except for the cheque clearing account which never identifies a customer.
 */
export function deriveCustomerNumber(
    item: Pick<LineItem, 'text' | 'offsetting_account'>
): { customerNumber: number | null; source: CustomerNumberSource } {
    const fromText = extractCustomerNumber(item.text);
    if (fromText !== null) {
        return { customerNumber: fromText, source: 'text' };
    }

    if (item.offsetting_account !== CHEQUE_SENTINEL_ACCOUNT) {
        return { customerNumber: item.offsetting_account, source: 'offsetting_account' };
    }

    return { customerNumber: null, source: 'none' };
}
