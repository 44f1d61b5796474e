export { buildNameIndex, resolveCustomerNames, assignCustomers, assertRowCount } from './resolve-customers.js';
export type { CustomerNameIndex } from './resolve-customers.js';
