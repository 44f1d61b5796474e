import type {
    AggregatedRow,
    CompactedLineItem,
    CustomerMaster,
    MasterRecord,
    ResolvedRow,
    ResolveResult,
    ResolveStats,
} from '../types/index.js';
import { NO_CUSTOMER } from '../types/index.js';
import { ConsistencyError, EmptyInputError } from '../errors.js';
import { aggregateDeductions } from '../aggregator/deductions.js';

/**
 * Name lookups built from the merged customer master.
 */
export interface CustomerNameIndex {
    /** `${branch_number}|${company_code}` -> branch customer name */
    branches: Map<string, string>;
    /** head_office -> head-office name */
    headOffices: Map<number, string>;
    warnings: string[];
}

function branchKey(customerNumber: number, companyCode: string): string {
    return `${customerNumber}|${companyCode}`;
}

/**
 * Build the two lookups used for name resolution.
 *
 * Branch lookup is scoped by company code, the head-office lookup is global.
 * Each key resolves to exactly one name so that lookups never fan out rows:
 * the first branch record wins for a repeated (branch, company code) pair,
 * and a head office takes its own name, else the first branch name listed under it.
 */
export function buildNameIndex(records: MasterRecord[]): CustomerNameIndex {
    const branches = new Map<string, string>();
    const candidates = new Map<number, string[]>();
    const warnings: string[] = [];
    let duplicateBranches = 0;

    // Head-office names first so they take precedence over branch names.
    for (const record of records) {
        if (record.head_office !== null && record.head_office_name) {
            candidates.set(record.head_office, [record.head_office_name]);
        }
    }

    for (const record of records) {
        if (record.branch_number !== null && record.company_code !== null && record.customer_name) {
            const key = branchKey(record.branch_number, record.company_code);
            if (branches.has(key)) {
                duplicateBranches++;
            } else {
                branches.set(key, record.customer_name);
            }
        }

        if (record.head_office !== null && record.customer_name) {
            const names = candidates.get(record.head_office) ?? [];
            if (!names.includes(record.customer_name)) {
                names.push(record.customer_name);
            }
            candidates.set(record.head_office, names);
        }
    }

    const headOffices = new Map<number, string>();
    for (const [headOffice, names] of candidates) {
        headOffices.set(headOffice, names[0]);
        if (names.length > 1) {
            warnings.push(
                `Head office ${headOffice} has ${names.length} different names, using "${names[0]}"`
            );
        }
    }

    if (duplicateBranches) {
        warnings.push(`${duplicateBranches} duplicate branch records ignored`);
    }

    return { branches, headOffices, warnings };
}

/**
 * Name resolution must return exactly one row per aggregated row.
 *
 * @throws ConsistencyError when the counts differ
 */
export function assertRowCount(input: readonly AggregatedRow[], output: readonly ResolvedRow[]): void {
    if (output.length !== input.length) {
        throw new ConsistencyError(
            `Input and output data rows not equal: ${input.length} in, ${output.length} out`
        );
    }
}

/**
 * Attach a customer name to every aggregated row.
 *
 * Pass 1 matches (customer_number, company_code) against branches, pass 2
 * matches customer_number against head offices. A branch match always wins.
 * Customer number 0 means "no customer" and is never looked up.
 *
 * PURE FUNCTION: returns new rows; input rows are not mutated.
 *
 * @throws EmptyInputError when there are no rows
 * @throws ConsistencyError when the output row count differs from the input
 */
export function resolveCustomerNames(rows: AggregatedRow[], master: CustomerMaster): ResolveResult {
    if (rows.length === 0) {
        throw new EmptyInputError('Input data contains no records');
    }

    const index = buildNameIndex(master.records);
    const warnings = [...index.warnings];
    const stats: ResolveStats = { branch_matches: 0, head_office_matches: 0, unmatched: 0, unassigned: 0 };

    const resolved: ResolvedRow[] = rows.map((row) => {
        if (row.customer_number === NO_CUSTOMER) {
            stats.unassigned++;
            return { ...row, customer_name: null };
        }

        const branchName = index.branches.get(branchKey(row.customer_number, row.company_code));
        if (branchName !== undefined) {
            stats.branch_matches++;
            return { ...row, customer_name: branchName };
        }

        const headOfficeName = index.headOffices.get(row.customer_number);
        if (headOfficeName !== undefined) {
            stats.head_office_matches++;
            return { ...row, customer_name: headOfficeName };
        }

        stats.unmatched++;
        return { ...row, customer_name: null };
    });

    assertRowCount(rows, resolved);

    if (stats.unmatched) {
        warnings.push(`${stats.unmatched} aggregated rows reference an unknown customer`);
    }

    return { rows: resolved, warnings, stats };
}

/**
 * Aggregate compacted line items and attach customer names.
 *
 * @throws EmptyInputError when there are no line items
 */
export function assignCustomers(compacted: CompactedLineItem[], master: CustomerMaster): ResolveResult {
    if (compacted.length === 0) {
        throw new EmptyInputError('Input data contains no records');
    }

    return resolveCustomerNames(aggregateDeductions(compacted), master);
}
