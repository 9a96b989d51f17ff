import type { NamingRules, SceneIssue, SceneNode } from '@framecheck/shared';
import type { Workspace, CheckOptions } from '../types.js';

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
 * State object passed through the scene check pipeline.
 */
export interface PipelineState {
    scenePath: string;
    workspace: Workspace | null;
    rules: NamingRules;
    options: CheckOptions;

    // Accumulated during pipeline execution
    nodes: SceneNode[];
    issues: SceneIssue[];
    reportPath?: string;

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
