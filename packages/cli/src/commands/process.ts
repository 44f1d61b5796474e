import type { AppConfig, ProcessingRules } from '@gl-deductions/shared';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadAppConfig, loadRules } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { parseMonth } from '../utils/dates.js';
import { log, success, warn, error, arrow, errorMessage } from '../utils/console.js';
import type { ProcessOptions } from '../types.js';

/**
 * Runs the monthly deductions report.
 *
 * @returns process exit code: 0 on success or nothing to do, 1 on any fatal error
 */
export async function processMonth(month: string, options: ProcessOptions): Promise<number> {
    log(`\nGL Deductions Report - Processing ${month}`);

    if (!parseMonth(month)) {
        error(`Invalid month "${month}". Use YYYY-MM (e.g., 2026-09).`);
        return 1;
    }

    // 1. Workspace detection
    arrow('Detecting workspace...');
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        error('Workspace not found.');
        console.error('Expected "config/app.yaml" in the workspace root.');
        return 1;
    }
    const workspace = resolveWorkspace(root);
    success(`Workspace: ${workspace.root}`);

    // 2. Configuration and rules
    let config: AppConfig;
    let rules: ProcessingRules;
    try {
        config = loadAppConfig(workspace);
        const loaded = loadRules(workspace);
        rules = loaded.rules;
        for (const w of loaded.warnings) {
            warn(w);
        }
    } catch (err) {
        error(`Failed to load configuration. ${errorMessage(err)}`);
        return 1;
    }

    if (Object.keys(rules).length === 0) {
        warn('No active company code found. Nothing to process.');
        return 0;
    }

    // 3. Run Pipeline
    const state = await runPipeline(month, workspace, config, rules, options);

    // 4. Report Final Status
    log('\n--- Processing Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            error(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Processing failed with fatal errors.');
            return 1;
        }
    }

    success(`Processing complete for ${month}.`);
    arrow(`Line items: ${state.compacted?.lineItems.length ?? 0}`);
    arrow(`Aggregated rows: ${state.resolved?.rows.length ?? 0}`);

    if (state.options.dryRun) {
        log('\n[DRY RUN] No files were written or uploaded.');
    } else if (state.uploadedPath) {
        arrow(`Report uploaded to: ${state.uploadedPath}`);
    } else if (state.reportPath) {
        arrow(`Report saved to: ${state.reportPath}`);
    }

    return 0;
}
