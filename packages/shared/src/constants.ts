/**
 * Constants for the GL deductions report.
 */

/**
 * Offsetting account used for cheque clearing.
 * Postings against it never fall back to the offsetting account as customer number.
 */
export const CHEQUE_SENTINEL_ACCOUNT = 48505240;

/**
 * Customer number used for grouping when no customer could be derived.
 * Never a valid master key.
 */
export const NO_CUSTOMER = 0;

/**
 * Deduction size classes, ordered by upper bound.
 * Bounds are right-closed: 30 falls into 'under 30', 50 into '30 - 50'.
 */
export const DEDUCTION_BUCKETS = ['under 30', '30 - 50', 'over 50'] as const;

export const DEDUCTION_BOUNDS = {
    SMALL_MAX: 30,
    MEDIUM_MAX: 50,
} as const;

/**
 * Integer ranges of the export's numeric fields.
 */
export const NUMERIC_LIMITS = {
    UINT8_MAX: 0xff,
    UINT16_MAX: 0xffff,
    UINT32_MAX: 0xffffffff,
} as const;

/**
 * Number of pipe-delimited fields in an export data line.
 */
export const EXPORT_FIELD_COUNT = 10;

/**
 * Legacy 8-bit encodings of the customer master files.
 */
export const MASTER_ENCODINGS = {
    BRANCHES: 'windows-1252',
    HEAD_OFFICES: 'iso-8859-15',
} as const;

// ============================================================================
// Report layout
// ============================================================================

/**
 * External column names of the detail table, in report order.
 */
export const DETAIL_COLUMNS = [
    'Company_Code',
    'Year',
    'Period',
    'Document_Type',
    'GL_Account',
    'Customer_Number',
    'Currency',
    'LC_Amount',
    'Text',
    'Offsetting_Account',
    'Offsetting_Account_Type',
] as const;

/**
 * External column names of the aggregated table, in report order.
 */
export const AGGREGATED_COLUMNS = [
    'Company_Code',
    'GL_Account',
    'Period',
    'Year',
    'Customer_Number',
    'Customer_Name',
    'Currency',
    'Deductions',
    'Deductions_Count',
    'Deductions_Total',
] as const;

/**
 * Column names required in the branch master file.
 */
export const BRANCH_MASTER_COLUMNS = [
    'head_office',
    'branch_number',
    'employee_id',
    'Customer_Name',
    'Company_Code',
    'country',
] as const;

/**
 * Column names required in the head-office master file.
 */
export const HEAD_OFFICE_MASTER_COLUMNS = ['head_office', 'country', 'Company_Code', 'type'] as const;
