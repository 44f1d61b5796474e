// Schemas
export {
    LineItemSchema,
    CompactedLineItemSchema,
    ExportParseResultSchema,
    CompactStatsSchema,
    CompactResultSchema,
    DeductionBucketSchema,
    AggregatedRowSchema,
    ResolvedRowSchema,
    ResolveStatsSchema,
    ResolveResultSchema,
    BranchRecordSchema,
    HeadOfficeRecordSchema,
    MasterRecordSchema,
    CustomerMasterSchema,
    ReportConfigSchema,
    AppConfigSchema,
    CompanyRuleSchema,
    ProcessingRulesSchema,
    RunManifestSchema,
} from './schemas.js';

// Types
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
    ReportConfig,
    AppConfig,
    CompanyRule,
    ProcessingRules,
    RunManifest,
} from './schemas.js';

// Constants
export {
    CHEQUE_SENTINEL_ACCOUNT,
    NO_CUSTOMER,
    DEDUCTION_BUCKETS,
    DEDUCTION_BOUNDS,
    NUMERIC_LIMITS,
    EXPORT_FIELD_COUNT,
    MASTER_ENCODINGS,
    DETAIL_COLUMNS,
    AGGREGATED_COLUMNS,
    BRANCH_MASTER_COLUMNS,
    HEAD_OFFICE_MASTER_COLUMNS,
} from './constants.js';
