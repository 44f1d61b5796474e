import type { AppConfig, ProcessingRules } from '@gl-deductions/shared';
import type { PipelineState, PipelineStep } from './types.js';
import { outputCheck } from './steps/output-check.js';
import { exportData } from './steps/export.js';
import { convertBatches } from './steps/convert.js';
import { compactLineItems } from './steps/compact.js';
import { assignCustomerNames } from './steps/assign.js';
import { writeReport } from './steps/report.js';
import { uploadReport } from './steps/upload.js';
import { FileExportSession, type ExportSession } from '../export/session.js';
import { getImportsPath } from '../workspace/paths.js';
import { monthDateRange } from '../utils/dates.js';
import type { Workspace, ProcessOptions } from '../types.js';

export const PIPELINE_STEPS: { name: string; fn: PipelineStep }[] = [
    { name: 'Output Check', fn: outputCheck },
    { name: 'Export', fn: exportData },
    { name: 'Conversion', fn: convertBatches },
    { name: 'Compaction', fn: compactLineItems },
    { name: 'Customer Assignment', fn: assignCustomerNames },
    { name: 'Report', fn: writeReport },
    { name: 'Upload', fn: uploadReport },
];

/**
 * Orchestrates the execution of the processing pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 *
 * @param session - Export source; defaults to the drop folder imports/<month>/
 */
export async function runPipeline(
    month: string,
    workspace: Workspace,
    config: AppConfig,
    rules: ProcessingRules,
    options: ProcessOptions,
    session: ExportSession = new FileExportSession(getImportsPath(workspace, month))
): Promise<PipelineState> {
    let state: PipelineState = {
        month,
        dateRange: monthDateRange(month),
        workspace,
        config,
        rules,
        options,
        session,
        batches: [],
        lineItemBatches: [],
        warnings: [],
        errors: [],
    };

    for (let i = 0; i < PIPELINE_STEPS.length; i++) {
        const step = PIPELINE_STEPS[i];
        console.log(`\n→ Step ${i + 1}/${PIPELINE_STEPS.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            console.error(`\n✖ Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
