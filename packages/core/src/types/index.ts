/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    LineItem,
    CompactedLineItem,
    ExportParseResult,
    CompactStats,
    CompactResult,
    DeductionBucket,
    AggregatedRow,
    ResolvedRow,
    ResolveStats,
    ResolveResult,
    BranchRecord,
    HeadOfficeRecord,
    MasterRecord,
    CustomerMaster,
} from '@gl-deductions/shared';

export {
    LineItemSchema,
    CHEQUE_SENTINEL_ACCOUNT,
    NO_CUSTOMER,
    DEDUCTION_BUCKETS,
    DEDUCTION_BOUNDS,
    NUMERIC_LIMITS,
    EXPORT_FIELD_COUNT,
    MASTER_ENCODINGS,
    BRANCH_MASTER_COLUMNS,
    HEAD_OFFICE_MASTER_COLUMNS,
} from '@gl-deductions/shared';
