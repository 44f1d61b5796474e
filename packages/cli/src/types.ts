/**
 * GL Deductions CLI - Core Types
 */

export interface ProcessOptions {
    dryRun: boolean;
    force: boolean;
    skipInvalidLines: boolean;
    workspace?: string;
}

export interface WorkspaceConfig {
    appConfigPath: string;
    rulesPath: string;
}

export interface Workspace {
    root: string;
    imports: string;
    outputs: string;
    config: WorkspaceConfig;
}
