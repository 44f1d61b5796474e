// Types (re-exported from shared)
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
} from './types/index.js';

export {
    CHEQUE_SENTINEL_ACCOUNT,
    NO_CUSTOMER,
    DEDUCTION_BUCKETS,
    MASTER_ENCODINGS,
} from './types/index.js';

// Errors
export {
    GlDeductionsError,
    ExportFormatError,
    ExportDecodeError,
    MasterFormatError,
    EmptyInputError,
    ConsistencyError,
} from './errors.js';
export type { ErrorKind } from './errors.js';

// Utils
export { stripBom, decodeText } from './utils/index.js';

// Parser
export { parseExportText, parseLocalAmount, formatAmount } from './parser/index.js';
export type { ExportParseOptions } from './parser/index.js';

// Extractor
export { extractCustomerNumber, deriveCustomerNumber, compactBatches } from './extractor/index.js';
export type { BatchLineItem, CustomerNumberSource } from './extractor/index.js';

// Aggregator
export { classifyDeduction, aggregateDeductions } from './aggregator/index.js';

// Customer master
export {
    parseBranchMaster,
    parseHeadOfficeMaster,
    mergeCustomerMaster,
    loadCustomerMaster,
} from './customers/index.js';
export type { MasterFileResult, MasterEncodings } from './customers/index.js';

// Resolver
export { buildNameIndex, resolveCustomerNames, assignCustomers, assertRowCount } from './resolver/index.js';
