export {
    parseBranchMaster,
    parseHeadOfficeMaster,
    mergeCustomerMaster,
    loadCustomerMaster,
} from './master.js';
export type { MasterFileResult, MasterEncodings } from './master.js';
