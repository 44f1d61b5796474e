import { readFile } from 'node:fs/promises';
import { loadCustomerMaster, assignCustomers } from '@gl-deductions/core';
import type { PipelineStep } from '../types.js';
import { resolveWorkspacePath } from '../../workspace/paths.js';
import { log, errorMessage } from '../../utils/console.js';

/**
 * Step 5: Customer Assignment
 * Loads the customer master, aggregates line items into deduction buckets
 * and attaches a customer name to every aggregated row.
 */
export const assignCustomerNames: PipelineStep = async (state) => {
    if (!state.compacted) {
        return state;
    }

    const { customers } = state.config;
    const branchesPath = resolveWorkspacePath(state.workspace, customers.branches_path);
    const headOfficesPath = resolveWorkspacePath(state.workspace, customers.head_offices_path);

    try {
        const [branches, headOffices] = await Promise.all([readFile(branchesPath), readFile(headOfficesPath)]);

        const master = loadCustomerMaster(branches, headOffices, {
            branches: customers.branches_encoding,
            headOffices: customers.head_offices_encoding,
        });
        state.warnings.push(...master.warnings);

        const result = assignCustomers(state.compacted.lineItems, master);
        state.resolved = result;
        state.warnings.push(...result.warnings);

        const { branch_matches, head_office_matches, unmatched, unassigned } = result.stats;
        log(`Aggregated rows: ${result.rows.length} (branch: ${branch_matches}, head office: ${head_office_matches}, ` +
            `unknown: ${unmatched}, no customer: ${unassigned})`);
    } catch (err) {
        state.errors.push({
            step: 'assign',
            message: `Customer assignment failed: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
