import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { outputCheck } from '../src/pipeline/steps/output-check.js';
import { exportData } from '../src/pipeline/steps/export.js';
import { convertBatches } from '../src/pipeline/steps/convert.js';
import { compactLineItems } from '../src/pipeline/steps/compact.js';
import { uploadReport } from '../src/pipeline/steps/upload.js';
import { RetryExhaustedError } from '../src/utils/retry.js';
import { makeConfig, makeState, MemoryExportSession } from './helpers.js';

vi.mock('node:fs');
vi.mock('node:fs/promises');

const LINE = '| EUR |0075|66010030|2026|  9|DZ  |555000    |D  |   25,50-|Skonto|';
const BAD_LINE = '| EUR |0075|66010030|2026|  9|DZ  |555000    |D  |   25,5x-|Skonto|';

describe('Pipeline Step: Output Check', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should stop when the month was already processed', async () => {
        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => p.toString().endsWith('run_manifest.json'));

        const state = await outputCheck(makeState());

        expect(state.errors).toEqual([{
            step: 'output-check',
            message: 'Output for 2026-09 already exists (found: run_manifest.json). Use --force to overwrite.',
            fatal: true,
        }]);
    });

    it('should look for the configured report name', async () => {
        vi.spyOn(fs, 'existsSync').mockReturnValue(true);

        const state = await outputCheck(makeState());

        expect(state.errors[0].message).toContain('run_manifest.json, Deductions_2026_09.xlsx');
    });

    it('should not check with --force', async () => {
        vi.spyOn(fs, 'existsSync').mockReturnValue(true);

        const state = await outputCheck(makeState({ options: { dryRun: false, force: true, skipInvalidLines: false } }));

        expect(state.errors).toHaveLength(0);
        expect(fs.existsSync).not.toHaveBeenCalled();
    });
});

describe('Pipeline Step: Export', () => {
    it('should export every company code in rules order', async () => {
        const session = new MemoryExportSession({ '0075': LINE, '0080': LINE });
        const state = await exportData(makeState({
            session,
            rules: {
                '0080': { country: 'CZ', active: true, accounts: [66010030] },
                '0075': { country: 'AT', active: true, accounts: [66010030, 66010040] },
            },
        }));

        expect(state.errors).toHaveLength(0);
        expect(state.batches.map(b => b.source)).toEqual(['0080.txt', '0075.txt']);
        expect(session.requests[1]).toEqual({
            companyCode: '0075',
            accounts: [66010030, 66010040],
            dateRange: { from: '2026-09-01', to: '2026-09-30' },
        });
        expect(session.closed).toBe(true);
    });

    it('should retry a lost connection', async () => {
        const session = new MemoryExportSession({ '0075': LINE }, { '0075': 2 });

        const state = await exportData(makeState({ session }));

        expect(state.errors).toHaveLength(0);
        expect(state.batches).toHaveLength(1);
        expect(session.requests).toHaveLength(3);
    });

    it('should stop after max_attempts lost connections', async () => {
        const session = new MemoryExportSession({ '0075': LINE }, { '0075': 3 });

        const state = await exportData(makeState({ session }));

        expect(state.batches).toHaveLength(0);
        expect(state.errors[0].fatal).toBe(true);
        expect(state.errors[0].error).toBeInstanceOf(RetryExhaustedError);
        expect(session.requests).toHaveLength(3);
        expect(session.closed).toBe(true);
    });

    it('should not retry a missing export', async () => {
        const session = new MemoryExportSession({});

        const state = await exportData(makeState({ session }));

        expect(state.errors[0].message).toBe('Export failed: No export found for company code 0075');
        expect(session.requests).toHaveLength(1);
        expect(session.closed).toBe(true);
    });
});

describe('Pipeline Step: Conversion', () => {
    const batch = (text: string) => ({ companyCode: '0075', source: '0075.txt', text, hash: 'sha256:test' });

    it('should parse each batch and label warnings', async () => {
        const state = await convertBatches(makeState({
            batches: [batch([LINE, BAD_LINE].join('\n'))],
            options: { dryRun: false, force: false, skipInvalidLines: true },
        }));

        expect(state.errors).toHaveLength(0);
        expect(state.lineItemBatches[0]).toHaveLength(1);
        expect(state.warnings).toEqual([
            '[0075.txt] Export line 2: cannot decode LC_Amount "25,5x-" (not a number)',
            '[0075.txt] Skipped 1 malformed data lines',
        ]);
    });

    it('should stop on a malformed line by default', async () => {
        const state = await convertBatches(makeState({ batches: [batch(BAD_LINE)] }));

        expect(state.errors).toEqual([expect.objectContaining({
            step: 'convert',
            message: 'Failed to convert 0075.txt: Export line 1: cannot decode LC_Amount "25,5x-" (not a number)',
            fatal: true,
        })]);
    });

    it('should warn about an empty export', async () => {
        const state = await convertBatches(makeState({ batches: [batch('No items selected')] }));

        expect(state.lineItemBatches).toEqual([[]]);
        expect(state.warnings).toEqual(['[0075.txt] No line items exported for company code 0075']);
    });
});

describe('Pipeline Step: Compaction', () => {
    it('should stop when no batch holds line items', async () => {
        const state = await compactLineItems(makeState({ lineItemBatches: [[]] }));

        expect(state.compacted).toBeUndefined();
        expect(state.errors[0].message).toBe('No line items found in the exported data for 2026-09.');
    });
});

describe('Pipeline Step: Upload', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should leave the report in place without an upload folder', async () => {
        const state = await uploadReport(makeState({ reportPath: '/ws/outputs/2026-09/r.xlsx' }));

        expect(state.uploadedPath).toBeUndefined();
        expect(fsPromises.rename).not.toHaveBeenCalled();
    });

    it('should move the report into the upload folder', async () => {
        const state = await uploadReport(makeState({
            config: makeConfig({ upload_dir: '/mnt/share' }),
            reportPath: '/ws/outputs/2026-09/r.xlsx',
        }));

        expect(fsPromises.rename).toHaveBeenCalledWith('/ws/outputs/2026-09/r.xlsx', '/mnt/share/r.xlsx');
        expect(state.uploadedPath).toBe('/mnt/share/r.xlsx');
    });

    it('should copy across devices', async () => {
        vi.mocked(fsPromises.rename).mockRejectedValueOnce(Object.assign(new Error('EXDEV'), { code: 'EXDEV' }));

        const state = await uploadReport(makeState({
            config: makeConfig({ upload_dir: 'upload' }),
            reportPath: '/ws/outputs/2026-09/r.xlsx',
        }));

        expect(fsPromises.copyFile).toHaveBeenCalledWith('/ws/outputs/2026-09/r.xlsx', '/ws/upload/r.xlsx');
        expect(fsPromises.unlink).toHaveBeenCalledWith('/ws/outputs/2026-09/r.xlsx');
        expect(state.uploadedPath).toBe('/ws/upload/r.xlsx');
    });

    it('should record a failed upload as non-fatal', async () => {
        vi.mocked(fsPromises.rename).mockRejectedValueOnce(Object.assign(new Error('EACCES: denied'), { code: 'EACCES' }));

        const state = await uploadReport(makeState({
            config: makeConfig({ upload_dir: '/mnt/share' }),
            reportPath: '/ws/outputs/2026-09/r.xlsx',
        }));

        expect(state.errors).toEqual([expect.objectContaining({
            step: 'upload',
            message: 'Failed to upload report to /mnt/share: EACCES: denied',
            fatal: false,
        })]);
        expect(state.uploadedPath).toBeUndefined();
    });
});
