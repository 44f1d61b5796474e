/**
 * CSV parsing utilities.
 */

import { parse } from 'csv-parse/sync';
import iconv from 'iconv-lite';
import { z } from 'zod';

const RowsSchema = z.array(z.array(z.string()));

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

/**
 * Decode a legacy 8-bit file into a string.
 *
 * @param data - Raw file bytes
 * @param encoding - Encoding name, e.g. 'windows-1252' or 'iso-8859-15'
 * @throws RangeError for an unknown encoding
 */
export function decodeText(data: ArrayBuffer | Uint8Array, encoding: string): string {
    if (!iconv.encodingExists(encoding)) {
        throw new RangeError(`Unknown encoding: ${encoding}`);
    }
    const bytes = data instanceof Uint8Array ? Buffer.from(data) : Buffer.from(new Uint8Array(data));
    return stripBom(iconv.decode(bytes, encoding));
}

/**
 * Split delimited text into trimmed cell rows, header row included.
 * Blank lines are skipped; quoted cells may contain the delimiter.
 */
export function parseDelimited(text: string, delimiter: string): string[][] {
    const rows: unknown = parse(stripBom(text), {
        delimiter,
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
    });
    return RowsSchema.parse(rows);
}
