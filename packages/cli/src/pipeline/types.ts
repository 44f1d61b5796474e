import type {
    AppConfig,
    LineItem,
    ProcessingRules,
} from '@gl-deductions/shared';
import type { CompactResult, ResolveResult } from '@gl-deductions/core';
import type { Workspace, ProcessOptions } from '../types.js';
import type { ExportSession, ExportedBatch } from '../export/session.js';
import type { DateRange } from '../utils/dates.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the processing pipeline.
 */
export interface PipelineState {
    month: string;
    dateRange: DateRange;
    workspace: Workspace;
    config: AppConfig;
    rules: ProcessingRules;
    options: ProcessOptions;
    session: ExportSession;

    // Accumulated during pipeline execution
    batches: ExportedBatch[];
    lineItemBatches: LineItem[][];
    compacted?: CompactResult;
    resolved?: ResolveResult;
    reportPath?: string;
    uploadedPath?: string;

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
