import { Decimal } from 'decimal.js';
import type { CellValue, Workbook, Worksheet } from 'exceljs';
import {
    AGGREGATED_COLUMNS,
    DEDUCTION_BUCKETS,
    DETAIL_COLUMNS,
    NO_CUSTOMER,
    type AggregatedRow,
    type CompactedLineItem,
    type DeductionBucket,
    type ReportConfig,
    type ResolvedRow,
} from '@gl-deductions/shared';
import { EmptyInputError, formatAmount } from '@gl-deductions/core';
import { createWorkbook, formatHeaderRow, autoFitColumns, formatMoneyColumn, toHeader } from './utils.js';

export type ReportSheetNames = Pick<
    ReportConfig,
    'exported_datasheet_name' | 'processed_datasheet_name' | 'pivotted_datasheet_name'
>;

type Row = Record<string, CellValue>;

/**
 * Deductions of one company code and bucket, summed over accounts, periods and customers.
 */
export interface DeductionSummary {
    company_code: string;
    deduction: DeductionBucket;
    deductions_count: number;
    deductions_total: string;
}

const PIVOT_COLUMNS = ['Company_Code', 'Deductions', 'Deductions_Count', 'Deductions_Total'] as const;

/**
 * Report file name from a template such as 'Deductions_$calendar_year$-$calendar_month$'.
 * '.xlsx' is appended when the template has no such extension.
 */
export function reportFileName(template: string, month: string): string {
    const [year, calendarMonth] = month.split('-');
    const name = template
        .replaceAll('$calendar_year$', year)
        .replaceAll('$calendar_month$', calendarMonth);
    return name.toLowerCase().endsWith('.xlsx') ? name : `${name}.xlsx`;
}

function customerCell(customerNumber: number | null): CellValue {
    return customerNumber === null || customerNumber === NO_CUSTOMER ? null : customerNumber;
}

function detailRow(item: CompactedLineItem): Row {
    const values: Record<(typeof DETAIL_COLUMNS)[number], CellValue> = {
        Company_Code: item.company_code,
        Year: item.year,
        Period: item.period,
        Document_Type: item.document_type,
        GL_Account: item.gl_account,
        Customer_Number: customerCell(item.customer_number),
        Currency: item.currency,
        LC_Amount: Number(item.local_amount),
        Text: item.text,
        Offsetting_Account: item.offsetting_account,
        Offsetting_Account_Type: item.offsetting_account_type,
    };
    return values;
}

function aggregatedRow(row: ResolvedRow): Row {
    const values: Record<(typeof AGGREGATED_COLUMNS)[number], CellValue> = {
        Company_Code: row.company_code,
        GL_Account: row.gl_account,
        Period: row.period,
        Year: row.year,
        Customer_Number: customerCell(row.customer_number),
        Customer_Name: row.customer_name,
        Currency: row.currency,
        Deductions: row.deduction,
        Deductions_Count: row.deductions_count,
        Deductions_Total: Number(row.deductions_total),
    };
    return values;
}

function addTable(
    workbook: Workbook,
    name: string,
    columns: readonly string[],
    rows: Row[],
    moneyColumn: string
): Worksheet {
    const sheet = workbook.addWorksheet(name);
    sheet.columns = columns.map((key) => ({ header: toHeader(key), key }));

    for (const row of rows) {
        sheet.addRow(row);
    }

    formatHeaderRow(sheet);
    formatMoneyColumn(sheet, moneyColumn);
    autoFitColumns(sheet);
    return sheet;
}

/**
 * Count and total per company code and bucket.
 * Company codes keep their first-appearance order, buckets their size order.
 */
export function summarizeDeductions(rows: AggregatedRow[]): DeductionSummary[] {
    const byCompany = new Map<string, Map<DeductionBucket, { count: number; total: Decimal }>>();

    for (const row of rows) {
        let buckets = byCompany.get(row.company_code);
        if (!buckets) {
            buckets = new Map(DEDUCTION_BUCKETS.map((b): [DeductionBucket, { count: number; total: Decimal }] => [
                b,
                { count: 0, total: new Decimal(0) },
            ]));
            byCompany.set(row.company_code, buckets);
        }
        const bucket = buckets.get(row.deduction);
        if (bucket) {
            bucket.count += row.deductions_count;
            bucket.total = bucket.total.plus(row.deductions_total);
        }
    }

    const summary: DeductionSummary[] = [];
    for (const [companyCode, buckets] of byCompany) {
        for (const [deduction, { count, total }] of buckets) {
            summary.push({
                company_code: companyCode,
                deduction,
                deductions_count: count,
                deductions_total: formatAmount(total),
            });
        }
    }
    return summary;
}

/**
 * Generates the monthly report workbook:
 * exported line items, aggregated deductions with customer names,
 * and a per-company summary of deduction buckets.
 *
 * Customer number 0 or missing is written as an empty cell.
 *
 * @throws EmptyInputError when either table is empty
 */
export async function generateReportExcel(
    items: CompactedLineItem[],
    rows: ResolvedRow[],
    sheets: ReportSheetNames,
    created: Date = new Date()
): Promise<Workbook> {
    if (rows.length === 0) {
        throw new EmptyInputError('The processed data contains no records');
    }
    if (items.length === 0) {
        throw new EmptyInputError('The exported data contains no records');
    }

    const workbook = createWorkbook(created);

    addTable(workbook, sheets.exported_datasheet_name, DETAIL_COLUMNS, items.map(detailRow), 'LC_Amount');
    addTable(workbook, sheets.processed_datasheet_name, AGGREGATED_COLUMNS, rows.map(aggregatedRow), 'Deductions_Total');

    const pivot = summarizeDeductions(rows).map((s): Row => ({
        Company_Code: s.company_code,
        Deductions: s.deduction,
        Deductions_Count: s.deductions_count,
        Deductions_Total: Number(s.deductions_total),
    }));
    addTable(workbook, sheets.pivotted_datasheet_name, PIVOT_COLUMNS, pivot, 'Deductions_Total');

    return workbook;
}
