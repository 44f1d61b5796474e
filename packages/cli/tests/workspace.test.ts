import { describe, it, expect, vi, beforeEach } from 'vitest';
import { detectWorkspaceRoot } from '../src/workspace/detect.js';
import { resolveWorkspace, resolveWorkspacePath, getImportsPath, getOutputsPath } from '../src/workspace/paths.js';
import * as fs from 'node:fs';
import * as path from 'node:path';

// Mocking fs to avoid actual disk I/O in simple unit tests
vi.mock('node:fs');

describe('Workspace Detection', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should detect workspace root when config/app.yaml exists', () => {
        const mockCwd = '/srv/reports/deductions';
        vi.spyOn(process, 'cwd').mockReturnValue(mockCwd);

        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => {
            return p.toString() === '/srv/reports/deductions/config/app.yaml';
        });

        expect(detectWorkspaceRoot()).toBe(mockCwd);
    });

    it('should find the workspace from a nested directory', () => {
        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => {
            return p.toString() === '/srv/reports/config/app.yaml';
        });

        expect(detectWorkspaceRoot('/srv/reports/imports/2026-09')).toBe('/srv/reports');
    });

    it('should return null if no workspace is found in parents', () => {
        vi.spyOn(process, 'cwd').mockReturnValue('/');
        vi.spyOn(fs, 'existsSync').mockReturnValue(false);

        expect(detectWorkspaceRoot()).toBeNull();
    });
});

describe('Path Resolution', () => {
    const root = '/work';
    const workspace = resolveWorkspace(root);

    it('should resolve standard paths correctly', () => {
        expect(workspace.root).toBe(root);
        expect(workspace.imports).toBe(path.join(root, 'imports'));
        expect(workspace.outputs).toBe(path.join(root, 'outputs'));
        expect(workspace.config.appConfigPath).toBe(path.join(root, 'config/app.yaml'));
        expect(workspace.config.rulesPath).toBe(path.join(root, 'config/rules.yaml'));
    });

    it('should generate monthly paths', () => {
        expect(getImportsPath(workspace, '2026-09')).toBe(path.join(root, 'imports/2026-09'));
        expect(getOutputsPath(workspace, '2026-09')).toBe(path.join(root, 'outputs/2026-09'));
    });

    it('should resolve configured paths against the root', () => {
        expect(resolveWorkspacePath(workspace, 'data/customers/branches.csv')).toBe('/work/data/customers/branches.csv');
        expect(resolveWorkspacePath(workspace, '/mnt/share/reports')).toBe('/mnt/share/reports');
    });
});
