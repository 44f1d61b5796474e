/**
 * Ledger line item export parser.
 *
 * Format:
 * - Plain text list output, one posting per line
 * - Data lines look like "| EUR |0075|66010030|2026|  9|DZ|555000|D|   25,50-|Text|"
 * - Headers, separator rows ("|----|") and totals are interleaved and ignored
 * - Field order is fixed: Currency, Company Code, G/L Account, Year, Period,
 *   Document Type, Offsetting Account, Offsetting Account Type, LC Amount, Text
 * - Amounts use "1.234,56-" notation (see parseLocalAmount)
 *
 * A malformed data line fails the whole batch unless the caller opts into
 * skipping, in which case it is reported as a warning.
 */

import type { LineItem, ExportParseResult } from '../types/index.js';
import { EXPORT_FIELD_COUNT, NUMERIC_LIMITS, LineItemSchema } from '../types/index.js';
import { ExportDecodeError, ExportFormatError, GlDeductionsError } from '../errors.js';
import { parseLocalAmount, formatAmount } from './amount.js';

const DATA_LINE = /^\|\s*\w{3}\s*\|.*\|$/;

/** Maps line item properties back to export field names for error reporting. */
const PROPERTY_FIELDS: Record<keyof LineItem, string> = {
    currency: 'Currency',
    company_code: 'Company_Code',
    gl_account: 'GL_Account',
    year: 'Year',
    period: 'Period',
    document_type: 'Document_Type',
    offsetting_account: 'Offsetting_Account',
    offsetting_account_type: 'Offsetting_Account_Type',
    local_amount: 'LC_Amount',
    text: 'Text',
};

export interface ExportParseOptions {
    /**
     * 'throw' (default) fails on the first malformed data line.
     * 'skip' drops malformed lines and reports them as warnings.
     */
    onInvalidLine?: 'throw' | 'skip';
}

/**
 * Check whether a raw export line carries a posting.
 */
export function isDataLine(line: string): boolean {
    return DATA_LINE.test(line);
}

/**
 * Split a data line into its trimmed field values.
 * Double quotes are typing noise in the free text and are dropped.
 */
export function splitDataLine(line: string, lineNumber: number): string[] {
    const inner = line.slice(1, -1).replace(/"/g, '');
    const fields = inner.split('|').map((f) => f.trim());

    if (fields.length !== EXPORT_FIELD_COUNT) {
        throw new ExportFormatError(
            lineNumber,
            `expected ${EXPORT_FIELD_COUNT} fields, found ${fields.length}`
        );
    }

    return fields;
}

function decodeUnsigned(value: string, field: string, lineNumber: number, max: number): number {
    if (!/^\d+$/.test(value)) {
        throw new ExportDecodeError(lineNumber, field, value, 'not an unsigned integer');
    }
    const parsed = Number(value);
    if (parsed > max) {
        throw new ExportDecodeError(lineNumber, field, value, `exceeds ${max}`);
    }
    return parsed;
}

/**
 * Decode one data line into a line item.
 */
export function decodeDataLine(line: string, lineNumber: number): LineItem {
    const [
        currency,
        companyCode,
        glAccount,
        year,
        period,
        documentType,
        offsettingAccount,
        offsettingAccountType,
        amount,
        text,
    ] = splitDataLine(line, lineNumber);

    const localAmount = parseLocalAmount(amount);
    if (!localAmount) {
        throw new ExportDecodeError(lineNumber, 'LC_Amount', amount, 'not a number');
    }

    const item: LineItem = {
        currency,
        company_code: companyCode,
        gl_account: decodeUnsigned(glAccount, 'GL_Account', lineNumber, Number.MAX_SAFE_INTEGER),
        year: decodeUnsigned(year, 'Year', lineNumber, NUMERIC_LIMITS.UINT16_MAX),
        period: decodeUnsigned(period, 'Period', lineNumber, NUMERIC_LIMITS.UINT8_MAX),
        document_type: documentType,
        offsetting_account: decodeUnsigned(
            offsettingAccount,
            'Offsetting_Account',
            lineNumber,
            Number.MAX_SAFE_INTEGER
        ),
        offsetting_account_type: offsettingAccountType,
        local_amount: formatAmount(localAmount),
        text,
    };

    const checked = LineItemSchema.safeParse(item);
    if (!checked.success) {
        const issue = checked.error.issues[0];
        const property = issue.path[0];
        const field = Object.entries(PROPERTY_FIELDS).find(([key]) => key === property);
        const raw = Object.entries(item).find(([key]) => key === property);
        throw new ExportDecodeError(
            lineNumber,
            field ? field[1] : 'line',
            raw ? String(raw[1]) : line,
            issue.message
        );
    }

    return checked.data;
}

/**
 * Parse a plain text ledger export into line items.
 *
 * @param text - Export contents, already decoded to a string
 * @param options - Handling of malformed data lines
 * @returns ExportParseResult with line items, warnings, and skip count
 */
export function parseExportText(text: string, options: ExportParseOptions = {}): ExportParseResult {
    const mode = options.onInvalidLine ?? 'throw';
    const lineItems: LineItem[] = [];
    const warnings: string[] = [];
    let skippedRows = 0;

    const lines = text.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (!isDataLine(line)) {
            continue;
        }

        try {
            lineItems.push(decodeDataLine(line, i + 1));
        } catch (err) {
            if (mode === 'skip' && err instanceof GlDeductionsError) {
                warnings.push(err.message);
                skippedRows++;
                continue;
            }
            throw err;
        }
    }

    if (skippedRows) {
        warnings.push(`Skipped ${skippedRows} malformed data lines`);
    }

    return { lineItems, warnings, skippedRows };
}
