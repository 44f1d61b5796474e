export { stripBom, decodeText, parseDelimited } from './csv.js';
