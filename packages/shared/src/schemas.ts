/**
 * Zod schemas for GL deductions data structures.
 *
 * IMPORTANT: Amounts are stored as decimal strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { DEDUCTION_BUCKETS, NUMERIC_LIMITS, MASTER_ENCODINGS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Signed decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

/**
 * Categorical code (company code, currency, document type).
 * The label set comes from upstream data and is not enumerated here.
 */
const code = z.string().regex(/^\S*$/, 'Must not contain whitespace');

const requiredCode = code.min(1);

const unsignedInt = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

const uint32 = z.number().int().min(0).max(NUMERIC_LIMITS.UINT32_MAX);

const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

// ============================================================================
// Line Item Schemas
// ============================================================================

/**
 * One posting from the ledger export.
 */
export const LineItemSchema = z.object({
    currency: requiredCode,
    company_code: requiredCode,
    gl_account: unsignedInt,
    year: z.number().int().min(0).max(NUMERIC_LIMITS.UINT16_MAX),
    // 1-12 expected; the export is trusted and out-of-range months pass through.
    period: z.number().int().min(0).max(NUMERIC_LIMITS.UINT8_MAX),
    document_type: code,
    offsetting_account: unsignedInt,
    offsetting_account_type: code,
    local_amount: decimalString,
    text: z.string(),
});

export type LineItem = z.infer<typeof LineItemSchema>;

/**
 * Line item after customer number extraction.
 * `null` means no customer could be derived.
 */
export const CompactedLineItemSchema = LineItemSchema.extend({
    customer_number: uint32.nullable(),
});

export type CompactedLineItem = z.infer<typeof CompactedLineItemSchema>;

/**
 * Result returned by the export text parser.
 * Parsers return data, not side effects. Warnings are returned as data.
 */
export const ExportParseResultSchema = z.object({
    lineItems: z.array(LineItemSchema),
    warnings: z.array(z.string()),
    skippedRows: z.number().int().min(0),
});

export type ExportParseResult = z.infer<typeof ExportParseResultSchema>;

export const CompactStatsSchema = z.object({
    from_text: z.number().int().min(0),
    from_offsetting_account: z.number().int().min(0),
    unassigned: z.number().int().min(0),
});

export type CompactStats = z.infer<typeof CompactStatsSchema>;

export const CompactResultSchema = z.object({
    lineItems: z.array(CompactedLineItemSchema),
    warnings: z.array(z.string()),
    stats: CompactStatsSchema,
});

export type CompactResult = z.infer<typeof CompactResultSchema>;

// ============================================================================
// Aggregation Schemas
// ============================================================================

export const DeductionBucketSchema = z.enum(DEDUCTION_BUCKETS);

export type DeductionBucket = z.infer<typeof DeductionBucketSchema>;

/**
 * Deduction totals for one grouping key and bucket.
 * customer_number 0 stands for "no customer".
 */
export const AggregatedRowSchema = z.object({
    company_code: requiredCode,
    gl_account: unsignedInt,
    year: z.number().int().min(0),
    period: z.number().int().min(0),
    customer_number: uint32,
    currency: requiredCode,
    deduction: DeductionBucketSchema,
    deductions_count: z.number().int().min(0),
    deductions_total: decimalString,
});

export type AggregatedRow = z.infer<typeof AggregatedRowSchema>;

export const ResolvedRowSchema = AggregatedRowSchema.extend({
    customer_name: z.string().nullable(),
});

export type ResolvedRow = z.infer<typeof ResolvedRowSchema>;

export const ResolveStatsSchema = z.object({
    branch_matches: z.number().int().min(0),
    head_office_matches: z.number().int().min(0),
    unmatched: z.number().int().min(0),
    unassigned: z.number().int().min(0),
});

export type ResolveStats = z.infer<typeof ResolveStatsSchema>;

export const ResolveResultSchema = z.object({
    rows: z.array(ResolvedRowSchema),
    warnings: z.array(z.string()),
    stats: ResolveStatsSchema,
});

export type ResolveResult = z.infer<typeof ResolveResultSchema>;

// ============================================================================
// Customer Master Schemas
// ============================================================================

export const BranchRecordSchema = z.object({
    head_office: uint32.nullable(),
    branch_number: uint32,
    employee_id: z.number().int().min(0).max(NUMERIC_LIMITS.UINT8_MAX).nullable(),
    customer_name: z.string(),
    company_code: z.string(),
    country: z.string(),
});

export type BranchRecord = z.infer<typeof BranchRecordSchema>;

export const HeadOfficeRecordSchema = z.object({
    head_office: uint32,
    country: z.string(),
    company_code: z.string(),
    type: z.string(),
    customer_name: z.string().nullable(),
});

export type HeadOfficeRecord = z.infer<typeof HeadOfficeRecordSchema>;

/**
 * One row of the branch/head-office outer join.
 * Branch fields are null for head offices without branches,
 * head-office fields are null for branches without a head office row.
 */
export const MasterRecordSchema = z.object({
    head_office: uint32.nullable(),
    branch_number: uint32.nullable(),
    employee_id: z.number().int().min(0).max(NUMERIC_LIMITS.UINT8_MAX).nullable(),
    customer_name: z.string().nullable(),
    company_code: z.string().nullable(),
    country: z.string().nullable(),
    head_office_name: z.string().nullable(),
    head_office_company_code: z.string().nullable(),
    head_office_country: z.string().nullable(),
    type: z.string().nullable(),
});

export type MasterRecord = z.infer<typeof MasterRecordSchema>;

export const CustomerMasterSchema = z.object({
    records: z.array(MasterRecordSchema),
    warnings: z.array(z.string()),
    stats: z.object({
        branches: z.number().int().min(0),
        head_offices: z.number().int().min(0),
        orphan_branches: z.number().int().min(0),
        head_offices_without_branches: z.number().int().min(0),
    }),
});

export type CustomerMaster = z.infer<typeof CustomerMasterSchema>;

// ============================================================================
// Configuration Schemas
// ============================================================================

/**
 * Report sheet and file settings.
 * Only these keys are recognized; anything else is a configuration error.
 */
export const ReportConfigSchema = z.object({
    name: z.string().min(1),
    exported_datasheet_name: z.string().min(1).max(31),
    processed_datasheet_name: z.string().min(1).max(31),
    pivotted_datasheet_name: z.string().min(1).max(31),
    upload_dir: z.string().min(1).optional(),
}).strict();

export type ReportConfig = z.infer<typeof ReportConfigSchema>;

export const AppConfigSchema = z.object({
    customers: z.object({
        branches_path: z.string().min(1).default('data/customers/branches.csv'),
        branches_encoding: z.string().min(1).default(MASTER_ENCODINGS.BRANCHES),
        head_offices_path: z.string().min(1).default('data/customers/head_offices.csv'),
        head_offices_encoding: z.string().min(1).default(MASTER_ENCODINGS.HEAD_OFFICES),
    }).strict().default({}),
    export: z.object({
        max_attempts: z.number().int().min(1).max(10).default(3),
    }).strict().default({}),
    reports: ReportConfigSchema,
}).strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Export rule for one company code.
 */
export const CompanyRuleSchema = z.object({
    country: z.string().min(1),
    active: z.boolean().default(true),
    accounts: z.array(unsignedInt).min(1),
});

export type CompanyRule = z.infer<typeof CompanyRuleSchema>;

/**
 * Company code -> export rule. Order of keys is the batch order.
 */
export const ProcessingRulesSchema = z.record(requiredCode, CompanyRuleSchema);

export type ProcessingRules = z.infer<typeof ProcessingRulesSchema>;

// ============================================================================
// Run Manifest Schema
// ============================================================================

export const RunManifestSchema = z.object({
    month: z.string().regex(/^\d{4}-\d{2}$/, 'Must be YYYY-MM format'),
    run_timestamp: z.string(),
    date_range: z.object({ from: isoDateString, to: isoDateString }),
    input_files: z.record(z.string(), z.string()),
    line_item_count: z.number().int().min(0),
    aggregated_row_count: z.number().int().min(0),
    resolve_stats: ResolveStatsSchema,
    report_file: z.string().nullable(),
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
