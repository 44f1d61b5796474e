import type { LineItem, CompactedLineItem, CompactResult, CompactStats } from '../types/index.js';
import { NUMERIC_LIMITS } from '../types/index.js';
import { EmptyInputError } from '../errors.js';
import { deriveCustomerNumber } from './customer-number.js';

/**
 * Line item as delivered by a batch; text may be missing.
 */
export type BatchLineItem = Omit<LineItem, 'text'> & { text?: string | null };

/**
 * Concatenate per-company batches and derive a customer number for every line item.
 *
 * PURE FUNCTION: input batches are not mutated.
 * Output order is batch order, then line order within the batch.
 *
 * @param batches - One table per exported company code, in export order
 * @returns CompactResult with compacted line items, warnings and extraction stats
 * @throws EmptyInputError when no batch is given
 */
export function compactBatches(batches: BatchLineItem[][]): CompactResult {
    if (batches.length === 0) {
        throw new EmptyInputError('The input data contains no batches');
    }

    const warnings: string[] = [];
    const stats: CompactStats = { from_text: 0, from_offsetting_account: 0, unassigned: 0 };
    const lineItems: CompactedLineItem[] = [];

    for (const batch of batches) {
        for (const item of batch) {
            const text = item.text ?? '';
            let { customerNumber, source } = deriveCustomerNumber({
                text,
                offsetting_account: item.offsetting_account,
            });

            if (customerNumber !== null && customerNumber > NUMERIC_LIMITS.UINT32_MAX) {
                warnings.push(
                    `Offsetting account ${customerNumber} (${item.company_code}/${item.gl_account}) ` +
                    'is out of customer number range, left unassigned'
                );
                customerNumber = null;
                source = 'none';
            }

            if (source === 'text') stats.from_text++;
            else if (source === 'offsetting_account') stats.from_offsetting_account++;
            else stats.unassigned++;

            lineItems.push({ ...item, text, customer_number: customerNumber });
        }
    }

    return { lineItems, warnings, stats };
}
