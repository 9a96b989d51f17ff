import { checkSceneNodes } from '@framecheck/core';
import type { PipelineStep } from '../types.js';
import { errorMessage } from '../../utils/console.js';

/**
 * Step 3: Node Checks
 * Runs filename and colorspace checks over every enabled node.
 */
export const checkNodes: PipelineStep = async (state) => {
    try {
        state.issues = checkSceneNodes(state.nodes, state.rules);
    } catch (err) {
        state.errors.push({
            step: 'check-nodes',
            message: `Failed to check nodes: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }
    return state;
};
