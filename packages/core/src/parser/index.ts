export { parseLocalAmount, formatAmount } from './amount.js';
export { parseExportText, isDataLine, splitDataLine, decodeDataLine } from './export-text.js';
export type { ExportParseOptions } from './export-text.js';
