import { mkdir, copyFile, rename, unlink } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { PipelineStep } from '../types.js';
import { resolveWorkspacePath } from '../../workspace/paths.js';
import { errorMessage } from '../../utils/console.js';

function isCrossDevice(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'EXDEV';
}

/**
 * Step 7: Upload
 * Moves the report into reports.upload_dir, replacing a report of the same name.
 * Without an upload_dir the report stays in the outputs folder.
 */
export const uploadReport: PipelineStep = async (state) => {
    const uploadDir = state.config.reports.upload_dir;
    if (!uploadDir || !state.reportPath) {
        return state;
    }

    if (state.errors.some(e => e.fatal)) {
        state.warnings.push('Upload skipped due to previous fatal errors.');
        return state;
    }

    const targetDir = resolveWorkspacePath(state.workspace, uploadDir);
    const dest = join(targetDir, basename(state.reportPath));

    try {
        await mkdir(targetDir, { recursive: true });

        try {
            await rename(state.reportPath, dest);
        } catch (err) {
            if (!isCrossDevice(err)) throw err;
            await copyFile(state.reportPath, dest);
            await unlink(state.reportPath);
        }
        state.uploadedPath = dest;
    } catch (err) {
        state.errors.push({
            step: 'upload',
            message: `Failed to upload report to ${targetDir}: ${errorMessage(err)}`,
            fatal: false,
            error: err
        });
    }

    return state;
};
