import { AppConfigSchema, type AppConfig } from '@gl-deductions/shared';
import {
    ExportConnectionLostError,
    DataExportError,
    type ExportSession,
    type ExportRequest,
    type ExportedBatch,
} from '../src/export/session.js';
import type { PipelineState } from '../src/pipeline/types.js';
import { resolveWorkspace } from '../src/workspace/paths.js';
import { hashContent } from '../src/utils/hash.js';

export function makeConfig(reports: Partial<AppConfig['reports']> = {}): AppConfig {
    return AppConfigSchema.parse({
        reports: {
            name: 'Deductions_$calendar_year$_$calendar_month$',
            exported_datasheet_name: 'Export',
            processed_datasheet_name: 'Summary',
            pivotted_datasheet_name: 'Pivot',
            ...reports,
        },
    });
}

/**
 * Export session over in-memory texts. `dropConnection` makes the next
 * N exports of a company code fail as if the connection was lost.
 */
export class MemoryExportSession implements ExportSession {
    readonly requests: ExportRequest[] = [];
    opened = false;
    closed = false;

    constructor(
        private readonly texts: Record<string, string>,
        private readonly dropConnection: Record<string, number> = {}
    ) {}

    async open(): Promise<void> {
        this.opened = true;
    }

    async exportItems(request: ExportRequest): Promise<ExportedBatch> {
        this.requests.push(request);

        const drops = this.dropConnection[request.companyCode] ?? 0;
        if (drops > 0) {
            this.dropConnection[request.companyCode] = drops - 1;
            throw new ExportConnectionLostError(`connection lost while exporting ${request.companyCode}`);
        }

        const text = this.texts[request.companyCode];
        if (text === undefined) {
            throw new DataExportError(`No export found for company code ${request.companyCode}`);
        }

        return { companyCode: request.companyCode, source: `${request.companyCode}.txt`, text, hash: hashContent(text) };
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

export function makeState(overrides: Partial<PipelineState> = {}): PipelineState {
    return {
        month: '2026-09',
        dateRange: { from: '2026-09-01', to: '2026-09-30' },
        workspace: resolveWorkspace('/ws'),
        config: makeConfig(),
        rules: { '0075': { country: 'AT', active: true, accounts: [66010030] } },
        options: { dryRun: false, force: false, skipInvalidLines: false },
        session: new MemoryExportSession({}),
        batches: [],
        lineItemBatches: [],
        warnings: [],
        errors: [],
        ...overrides,
    };
}
