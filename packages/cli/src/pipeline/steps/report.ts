import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { RunManifestSchema, type RunManifest } from '@gl-deductions/shared';
import type { PipelineStep } from '../types.js';
import { getOutputsPath } from '../../workspace/paths.js';
import { generateReportExcel, reportFileName } from '../../excel/report.js';
import { MANIFEST_FILE } from './output-check.js';
import { errorMessage } from '../../utils/console.js';
import { VERSION } from '../../version.js';

/**
 * Step 6: Report
 * Writes the Excel report and the run manifest to outputs/<month>/.
 */
export const writeReport: PipelineStep = async (state) => {
    if (!state.compacted || !state.resolved) {
        return state;
    }

    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping report export.');
        return state;
    }

    const outputPath = getOutputsPath(state.workspace, state.month);
    const reportName = reportFileName(state.config.reports.name, state.month);

    try {
        await mkdir(outputPath, { recursive: true });

        const workbook = await generateReportExcel(
            state.compacted.lineItems,
            state.resolved.rows,
            state.config.reports
        );
        const reportPath = join(outputPath, reportName);
        const content = await workbook.xlsx.writeBuffer();
        await writeFile(reportPath, new Uint8Array(content));
        state.reportPath = reportPath;

        const manifest: RunManifest = RunManifestSchema.parse({
            month: state.month,
            run_timestamp: new Date().toISOString(),
            date_range: state.dateRange,
            input_files: Object.fromEntries(state.batches.map(b => [b.source, b.hash])),
            line_item_count: state.compacted.lineItems.length,
            aggregated_row_count: state.resolved.rows.length,
            resolve_stats: state.resolved.stats,
            report_file: reportName,
            version: VERSION,
        });

        await writeFile(join(outputPath, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
    } catch (err) {
        state.errors.push({
            step: 'report',
            message: `Failed to write report to ${outputPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
