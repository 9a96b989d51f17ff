import type { NamingRules } from '@framecheck/shared';
import type { PipelineState, PipelineStep } from './types.js';
import { loadScene } from './steps/load-scene.js';
import { checkRules } from './steps/check-rules.js';
import { checkNodes } from './steps/check-nodes.js';
import { exportReport } from './steps/export.js';
import { arrow, failure } from '../utils/console.js';
import type { Workspace, CheckOptions } from '../types.js';

export const PIPELINE_STEPS: { name: string; fn: PipelineStep }[] = [
    { name: 'Scene Loading', fn: loadScene },
    { name: 'Rules Check', fn: checkRules },
    { name: 'Node Checks', fn: checkNodes },
    { name: 'Report Export', fn: exportReport },
];

/**
 * Orchestrates the scene check pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    scenePath: string,
    workspace: Workspace | null,
    rules: NamingRules,
    options: CheckOptions,
    steps: { name: string; fn: PipelineStep }[] = PIPELINE_STEPS
): Promise<PipelineState> {
    let state: PipelineState = {
        scenePath,
        workspace,
        rules,
        options,
        nodes: [],
        issues: [],
        warnings: [],
        errors: [],
    };

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            failure(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
