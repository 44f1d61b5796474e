/**
 * Customer master loading.
 *
 * Two ';'-separated files with a header row:
 * - branches: head_office;branch_number;employee_id;Customer_Name;Company_Code;country
 * - head offices: head_office;country;Company_Code;type (optionally Customer_Name)
 *
 * Both are legacy 8-bit files with different encodings; decoding happens
 * before parsing so accented customer names survive.
 */

import type { BranchRecord, HeadOfficeRecord, MasterRecord, CustomerMaster } from '../types/index.js';
import {
    BRANCH_MASTER_COLUMNS,
    HEAD_OFFICE_MASTER_COLUMNS,
    MASTER_ENCODINGS,
    NUMERIC_LIMITS,
} from '../types/index.js';
import { MasterFormatError } from '../errors.js';
import { decodeText, parseDelimited } from '../utils/csv.js';

const MASTER_DELIMITER = ';';

export interface MasterFileResult<T> {
    records: T[];
    warnings: string[];
}

export interface MasterEncodings {
    branches?: string;
    headOffices?: string;
}

/**
 * Header-indexed access to the data rows of a master file.
 */
interface Table {
    rows: string[][];
    column: (row: string[], name: string) => string;
    has: (name: string) => boolean;
}

function readTable(text: string, source: string, required: readonly string[]): Table {
    const [header, ...rows] = parseDelimited(text, MASTER_DELIMITER);
    if (!header) {
        throw new MasterFormatError(source, 'file is empty');
    }

    const missing = required.filter((col) => !header.includes(col));
    if (missing.length > 0) {
        throw new MasterFormatError(
            source,
            `missing required columns: ${missing.join(', ')}. Found: ${header.join(', ')}`
        );
    }

    const index = new Map(header.map((name, i): [string, number] => [name, i]));

    return {
        rows,
        column: (row, name) => {
            const i = index.get(name);
            return i === undefined ? '' : (row[i] ?? '');
        },
        has: (name) => index.has(name),
    };
}

function parseKey(value: string, source: string, field: string, rowNumber: number): number {
    if (!/^\d+$/.test(value) || Number(value) > NUMERIC_LIMITS.UINT32_MAX) {
        throw new MasterFormatError(source, `row ${rowNumber}: invalid ${field} "${value}"`);
    }
    return Number(value);
}

/**
 * Parse the branch master.
 *
 * employee_id must fit 0-255. Values outside that range are not truncated:
 * they become null and are reported as warnings.
 *
 * @throws MasterFormatError on missing columns or unreadable branch/head office numbers
 */
export function parseBranchMaster(text: string, source = 'branches'): MasterFileResult<BranchRecord> {
    const table = readTable(text, source, BRANCH_MASTER_COLUMNS);
    const records: BranchRecord[] = [];
    const warnings: string[] = [];
    let invalidEmployees = 0;

    table.rows.forEach((row, i) => {
        // Header is row 1
        const rowNumber = i + 2;
        const headOffice = table.column(row, 'head_office');
        const employee = table.column(row, 'employee_id');

        let employeeId: number | null = null;
        if (employee !== '') {
            if (/^\d+$/.test(employee) && Number(employee) <= NUMERIC_LIMITS.UINT8_MAX) {
                employeeId = Number(employee);
            } else {
                invalidEmployees++;
                warnings.push(`${source} row ${rowNumber}: employee_id "${employee}" outside 0-255, left empty`);
            }
        }

        records.push({
            head_office: headOffice === '' ? null : parseKey(headOffice, source, 'head_office', rowNumber),
            branch_number: parseKey(table.column(row, 'branch_number'), source, 'branch_number', rowNumber),
            employee_id: employeeId,
            customer_name: table.column(row, 'Customer_Name'),
            company_code: table.column(row, 'Company_Code'),
            country: table.column(row, 'country'),
        });
    });

    if (invalidEmployees) {
        warnings.push(`${invalidEmployees} ${source} rows with invalid employee_id`);
    }

    return { records, warnings };
}

/**
 * Parse the head-office master.
 * A repeated head_office keeps its first row.
 *
 * @throws MasterFormatError on missing columns or unreadable head office numbers
 */
export function parseHeadOfficeMaster(
    text: string,
    source = 'head offices'
): MasterFileResult<HeadOfficeRecord> {
    const table = readTable(text, source, HEAD_OFFICE_MASTER_COLUMNS);
    const records: HeadOfficeRecord[] = [];
    const warnings: string[] = [];
    const seen = new Set<number>();
    const hasNames = table.has('Customer_Name');

    table.rows.forEach((row, i) => {
        const rowNumber = i + 2;
        const headOffice = parseKey(table.column(row, 'head_office'), source, 'head_office', rowNumber);

        if (seen.has(headOffice)) {
            warnings.push(`${source} row ${rowNumber}: duplicate head_office ${headOffice} ignored`);
            return;
        }
        seen.add(headOffice);

        const name = hasNames ? table.column(row, 'Customer_Name') : '';

        records.push({
            head_office: headOffice,
            country: table.column(row, 'country'),
            company_code: table.column(row, 'Company_Code'),
            type: table.column(row, 'type'),
            customer_name: name === '' ? null : name,
        });
    });

    return { records, warnings };
}

/**
 * Outer-join branches and head offices on head_office.
 *
 * Every branch and every head office appears at least once: a branch without
 * a head office row keeps null head-office fields, a head office without
 * branches yields a record with null branch fields.
 */
export function mergeCustomerMaster(
    branches: BranchRecord[],
    headOffices: HeadOfficeRecord[]
): CustomerMaster {
    const warnings: string[] = [];
    const headOfficeIndex = new Map(headOffices.map((h): [number, HeadOfficeRecord] => [h.head_office, h]));
    const withBranches = new Set<number>();
    const records: MasterRecord[] = [];
    let orphanBranches = 0;

    for (const branch of branches) {
        const headOffice = branch.head_office === null ? undefined : headOfficeIndex.get(branch.head_office);

        if (headOffice) {
            withBranches.add(headOffice.head_office);
        } else {
            orphanBranches++;
        }

        records.push({
            head_office: branch.head_office,
            branch_number: branch.branch_number,
            employee_id: branch.employee_id,
            customer_name: branch.customer_name === '' ? null : branch.customer_name,
            company_code: branch.company_code,
            country: branch.country,
            head_office_name: headOffice?.customer_name ?? null,
            head_office_company_code: headOffice?.company_code ?? null,
            head_office_country: headOffice?.country ?? null,
            type: headOffice?.type ?? null,
        });
    }

    let withoutBranches = 0;
    for (const headOffice of headOffices) {
        if (withBranches.has(headOffice.head_office)) continue;
        withoutBranches++;
        records.push({
            head_office: headOffice.head_office,
            branch_number: null,
            employee_id: null,
            customer_name: null,
            company_code: null,
            country: null,
            head_office_name: headOffice.customer_name,
            head_office_company_code: headOffice.company_code,
            head_office_country: headOffice.country,
            type: headOffice.type,
        });
    }

    if (orphanBranches) {
        warnings.push(`${orphanBranches} branches reference no known head office`);
    }

    return {
        records,
        warnings,
        stats: {
            branches: branches.length,
            head_offices: headOffices.length,
            orphan_branches: orphanBranches,
            head_offices_without_branches: withoutBranches,
        },
    };
}

/**
 * Decode, parse and merge both customer master files.
 *
 * @param branchesData - Raw branch file bytes
 * @param headOfficesData - Raw head-office file bytes
 * @param encodings - Override of the legacy file encodings
 */
export function loadCustomerMaster(
    branchesData: ArrayBuffer | Uint8Array,
    headOfficesData: ArrayBuffer | Uint8Array,
    encodings: MasterEncodings = {}
): CustomerMaster {
    const branches = parseBranchMaster(
        decodeText(branchesData, encodings.branches ?? MASTER_ENCODINGS.BRANCHES)
    );
    const headOffices = parseHeadOfficeMaster(
        decodeText(headOfficesData, encodings.headOffices ?? MASTER_ENCODINGS.HEAD_OFFICES)
    );
    const master = mergeCustomerMaster(branches.records, headOffices.records);

    return {
        ...master,
        warnings: [...branches.warnings, ...headOffices.warnings, ...master.warnings],
    };
}
