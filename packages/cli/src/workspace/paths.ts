import { isAbsolute, join } from 'node:path';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        imports: join(root, 'imports'),
        outputs: join(root, 'outputs'),
        config: {
            appConfigPath: join(root, 'config', 'app.yaml'),
            rulesPath: join(root, 'config', 'rules.yaml'),
        },
    };
}

/**
 * Resolves a path from app.yaml; relative paths are taken from the workspace root.
 */
export function resolveWorkspacePath(workspace: Workspace, path: string): string {
    return isAbsolute(path) ? path : join(workspace.root, path);
}

export function getImportsPath(workspace: Workspace, month: string): string {
    return join(workspace.imports, month);
}

export function getOutputsPath(workspace: Workspace, month: string): string {
    return join(workspace.outputs, month);
}
