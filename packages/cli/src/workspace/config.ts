import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import type { ZodError } from 'zod';
import {
    AppConfigSchema,
    ProcessingRulesSchema,
    type AppConfig,
    type ProcessingRules,
} from '@gl-deductions/shared';
import type { Workspace } from '../types.js';
import { errorMessage } from '../utils/console.js';

/**
 * Raised when a workspace configuration file is missing or invalid.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface RulesResult {
    rules: ProcessingRules;
    warnings: string[];
}

function describeIssues(error: ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

function readYaml(path: string): unknown {
    if (!existsSync(path)) {
        throw new ConfigError(`Configuration file not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');
    try {
        const data: unknown = parse(content);
        return data;
    } catch (err) {
        throw new ConfigError(`Cannot read ${path}: ${errorMessage(err)}`);
    }
}

/**
 * Loads the application configuration (config/app.yaml).
 */
export function loadAppConfig(workspace: Workspace): AppConfig {
    const path = workspace.config.appConfigPath;
    const result = AppConfigSchema.safeParse(readYaml(path));
    if (!result.success) {
        throw new ConfigError(`Invalid configuration in ${path}: ${describeIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Loads the company-code rules (config/rules.yaml).
 * Inactive company codes are dropped with a warning; key order is kept.
 */
export function loadRules(workspace: Workspace): RulesResult {
    const path = workspace.config.rulesPath;
    const result = ProcessingRulesSchema.safeParse(readYaml(path) ?? {});
    if (!result.success) {
        throw new ConfigError(`Invalid rules in ${path}: ${describeIssues(result.error)}`);
    }

    const rules: ProcessingRules = {};
    const warnings: string[] = [];

    for (const [companyCode, rule] of Object.entries(result.data)) {
        if (rule.active) {
            rules[companyCode] = rule;
        } else {
            warnings.push(`Processing of ${rule.country} (${companyCode}) disabled.`);
        }
    }

    return { rules, warnings };
}
