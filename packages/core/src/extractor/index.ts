export { extractCustomerNumber, deriveCustomerNumber } from './customer-number.js';
export type { CustomerNumberSource } from './customer-number.js';
export { compactBatches } from './compact.js';
export type { BatchLineItem } from './compact.js';
