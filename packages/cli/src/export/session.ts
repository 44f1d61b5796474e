import { access, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { decodeText } from '@gl-deductions/core';
import { hashContent } from '../utils/hash.js';
import type { DateRange } from '../utils/dates.js';

/**
 * The export cannot be produced; retrying will not help.
 */
export class DataExportError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DataExportError';
    }
}

/**
 * The connection to the export source dropped mid-export; the export may be retried.
 */
export class ExportConnectionLostError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ExportConnectionLostError';
    }
}

export function isConnectionLost(err: unknown): boolean {
    return err instanceof ExportConnectionLostError;
}

/**
 * Line items to export for one company code.
 */
export interface ExportRequest {
    companyCode: string;
    accounts: number[];
    dateRange: DateRange;
}

/**
 * Raw export text of one company code.
 */
export interface ExportedBatch {
    companyCode: string;
    /** File or job the text came from, used to label warnings */
    source: string;
    text: string;
    hash: string;
}

/**
 * A session against the ledger export. open() must be called before
 * exportItems(), and close() releases whatever open() acquired.
 */
export interface ExportSession {
    open(): Promise<void>;
    exportItems(request: ExportRequest): Promise<ExportedBatch>;
    close(): Promise<void>;
}

function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

/**
 * Reads exports that the ledger automation dropped into a folder,
 * one `<company_code>.txt` file per company code.
 *
 * The drop files already hold the requested accounts and period, so the
 * request only selects the file.
 */
export class FileExportSession implements ExportSession {
    private opened = false;

    constructor(
        private readonly directory: string,
        private readonly encoding: string = 'utf-8'
    ) {}

    async open(): Promise<void> {
        try {
            await access(this.directory);
        } catch {
            throw new DataExportError(`Export folder not found: ${this.directory}`);
        }
        this.opened = true;
    }

    async exportItems(request: ExportRequest): Promise<ExportedBatch> {
        if (!this.opened) {
            throw new DataExportError('Export session is not open');
        }

        const source = `${request.companyCode}.txt`;
        const path = join(this.directory, source);

        let content: Uint8Array;
        try {
            content = await readFile(path);
        } catch (err) {
            const code = errorCode(err);
            if (code === 'ENOENT') {
                throw new DataExportError(`No export found for company code ${request.companyCode}: ${path}`);
            }
            if (code === 'EBUSY' || code === 'EAGAIN') {
                throw new ExportConnectionLostError(`Export file ${path} is locked (${code})`);
            }
            throw err;
        }

        return {
            companyCode: request.companyCode,
            source,
            text: decodeText(content, this.encoding),
            hash: hashContent(content),
        };
    }

    async close(): Promise<void> {
        this.opened = false;
    }
}
