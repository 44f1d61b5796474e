import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { PipelineStep } from '../types.js';
import { getOutputsPath } from '../../workspace/paths.js';
import { reportFileName } from '../../excel/report.js';

export const MANIFEST_FILE = 'run_manifest.json';

/**
 * Step 1: Output Check
 * Prevents accidental overwrite of a processed month unless --force is used.
 */
export const outputCheck: PipelineStep = async (state) => {
    if (state.options.dryRun || state.options.force) {
        return state;
    }

    const outputPath = getOutputsPath(state.workspace, state.month);
    const criticalFiles = [MANIFEST_FILE, reportFileName(state.config.reports.name, state.month)];

    const existingFiles = criticalFiles.filter(f => existsSync(join(outputPath, f)));

    if (existingFiles.length > 0) {
        state.errors.push({
            step: 'output-check',
            message: `Output for ${state.month} already exists (found: ${existingFiles.join(', ')}). Use --force to overwrite.`,
            fatal: true
        });
    }

    return state;
};
