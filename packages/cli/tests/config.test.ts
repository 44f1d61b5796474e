import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'node:fs';
import { loadAppConfig, loadRules, ConfigError } from '../src/workspace/config.js';
import { resolveWorkspace } from '../src/workspace/paths.js';

vi.mock('node:fs');

const APP_YAML = `
reports:
  name: Deductions_$calendar_year$_$calendar_month$
  exported_datasheet_name: Export
  processed_datasheet_name: Summary
  pivotted_datasheet_name: Pivot
`;

const RULES_YAML = `
"0075":
  country: AT
  active: true
  accounts: [66010030, 66010040]
"0080":
  country: CZ
  active: false
  accounts: [66010030]
"0112":
  country: SK
  accounts: [66010030]
`;

function useFiles(files: Record<string, string>): void {
    vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => p.toString() in files);
    vi.mocked(fs.readFileSync).mockImplementation((p) => {
        const content = files[p.toString()];
        if (content === undefined) throw new Error(`ENOENT: ${p.toString()}`);
        return content;
    });
}

describe('loadAppConfig', () => {
    const workspace = resolveWorkspace('/ws');

    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should apply defaults for customers and export', () => {
        useFiles({ '/ws/config/app.yaml': APP_YAML });

        const config = loadAppConfig(workspace);

        expect(config.customers).toEqual({
            branches_path: 'data/customers/branches.csv',
            branches_encoding: 'windows-1252',
            head_offices_path: 'data/customers/head_offices.csv',
            head_offices_encoding: 'iso-8859-15',
        });
        expect(config.export.max_attempts).toBe(3);
        expect(config.reports.pivotted_datasheet_name).toBe('Pivot');
        expect(config.reports.upload_dir).toBeUndefined();
    });

    it('should reject unknown report keys', () => {
        useFiles({ '/ws/config/app.yaml': `${APP_YAML}  pivot_macro: macro.xlsm\n` });

        expect(() => loadAppConfig(workspace)).toThrow(ConfigError);
        expect(() => loadAppConfig(workspace)).toThrow(/reports: Unrecognized key\(s\) in object: 'pivot_macro'/);
    });

    it('should reject sheet names Excel cannot hold', () => {
        useFiles({
            '/ws/config/app.yaml': APP_YAML.replace('Summary', 'A sheet name that is far too long'),
        });

        expect(() => loadAppConfig(workspace)).toThrow(/reports\.processed_datasheet_name/);
    });

    it('should report a missing file', () => {
        useFiles({});
        expect(() => loadAppConfig(workspace)).toThrow('Configuration file not found: /ws/config/app.yaml');
    });
});

describe('loadRules', () => {
    const workspace = resolveWorkspace('/ws');

    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should drop inactive company codes with a warning and keep order', () => {
        useFiles({ '/ws/config/rules.yaml': RULES_YAML });

        const { rules, warnings } = loadRules(workspace);

        expect(Object.keys(rules)).toEqual(['0075', '0112']);
        expect(rules['0075'].accounts).toEqual([66010030, 66010040]);
        expect(rules['0112'].active).toBe(true);
        expect(warnings).toEqual(['Processing of CZ (0080) disabled.']);
    });

    it('should treat an empty rules file as no rules', () => {
        useFiles({ '/ws/config/rules.yaml': '' });
        expect(loadRules(workspace)).toEqual({ rules: {}, warnings: [] });
    });

    it('should reject a rule without accounts', () => {
        useFiles({ '/ws/config/rules.yaml': '"0075":\n  country: AT\n  accounts: []\n' });
        expect(() => loadRules(workspace)).toThrow(/Invalid rules in \/ws\/config\/rules.yaml: 0075\.accounts/);
    });
});
