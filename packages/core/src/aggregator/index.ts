export { classifyDeduction, aggregateDeductions } from './deductions.js';
