import type { PipelineStep } from '../types.js';
import { isConnectionLost } from '../../export/session.js';
import { withRetry } from '../../utils/retry.js';
import { arrow, warn, errorMessage } from '../../utils/console.js';

/**
 * Step 2: Export
 * Exports line items of every active company code, in rules order.
 * A lost connection is retried up to export.max_attempts; any other
 * export failure ends the run.
 */
export const exportData: PipelineStep = async (state) => {
    const { session } = state;

    try {
        await session.open();
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Cannot open export session: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
        return state;
    }

    try {
        for (const [companyCode, rule] of Object.entries(state.rules)) {
            arrow(`Exporting data for country: ${rule.country} (${companyCode})`);

            const batch = await withRetry(
                () => session.exportItems({ companyCode, accounts: rule.accounts, dateRange: state.dateRange }),
                {
                    maxAttempts: state.config.export.max_attempts,
                    isRetryable: isConnectionLost,
                    onRetry: (err, attempt) => {
                        warn(`${errorMessage(err)} (attempt ${attempt} of ${state.config.export.max_attempts})`);
                    },
                }
            );

            state.batches.push(batch);
        }
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Export failed: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    } finally {
        await session.close();
    }

    return state;
};
