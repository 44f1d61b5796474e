import { parseExportText } from '@gl-deductions/core';
import type { PipelineStep } from '../types.js';
import { errorMessage } from '../../utils/console.js';

/**
 * Step 3: Conversion
 * Parses the raw export text of each batch into line items.
 * With --skip-invalid-lines malformed data lines are reported and dropped;
 * otherwise the first one ends the run.
 */
export const convertBatches: PipelineStep = async (state) => {
    const onInvalidLine = state.options.skipInvalidLines ? 'skip' : 'throw';

    for (const batch of state.batches) {
        try {
            const result = parseExportText(batch.text, { onInvalidLine });

            state.lineItemBatches.push(result.lineItems);

            for (const warning of result.warnings) {
                state.warnings.push(`[${batch.source}] ${warning}`);
            }
            if (result.lineItems.length === 0) {
                state.warnings.push(`[${batch.source}] No line items exported for company code ${batch.companyCode}`);
            }
        } catch (err) {
            state.errors.push({
                step: 'convert',
                message: `Failed to convert ${batch.source}: ${errorMessage(err)}`,
                fatal: true,
                error: err
            });
            break;
        }
    }

    return state;
};
