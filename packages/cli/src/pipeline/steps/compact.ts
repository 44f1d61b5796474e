import { compactBatches } from '@gl-deductions/core';
import type { PipelineStep } from '../types.js';
import { log, errorMessage } from '../../utils/console.js';

/**
 * Step 4: Compaction
 * Concatenates the batches and derives a customer number for every line item.
 */
export const compactLineItems: PipelineStep = async (state) => {
    try {
        const result = compactBatches(state.lineItemBatches);

        if (result.lineItems.length === 0) {
            state.errors.push({
                step: 'compact',
                message: `No line items found in the exported data for ${state.month}.`,
                fatal: true
            });
            return state;
        }

        state.compacted = result;
        state.warnings.push(...result.warnings);

        const { from_text, from_offsetting_account, unassigned } = result.stats;
        log(`Line items: ${result.lineItems.length} (customer from text: ${from_text}, ` +
            `from offsetting account: ${from_offsetting_account}, unassigned: ${unassigned})`);
    } catch (err) {
        state.errors.push({
            step: 'compact',
            message: errorMessage(err),
            fatal: true,
            error: err
        });
    }

    return state;
};
