import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse } from 'yaml';
import { SceneSchema } from '@framecheck/shared';
import type { PipelineStep } from '../types.js';
import { errorMessage } from '../../utils/console.js';

/**
 * Step 1: Scene Loading
 * Reads the exported scene description (JSON or YAML) and validates it.
 */
export const loadScene: PipelineStep = async (state) => {
    let data: unknown;
    try {
        const content = await readFile(state.scenePath, 'utf8');
        data = extname(state.scenePath).toLowerCase() === '.json' ? JSON.parse(content) : parse(content);
    } catch (err) {
        state.errors.push({
            step: 'load-scene',
            message: `Failed to read scene ${state.scenePath}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
        return state;
    }

    const parsed = SceneSchema.safeParse(data);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        state.errors.push({
            step: 'load-scene',
            message: `Invalid scene ${state.scenePath}: ${issues.join('; ')}`,
            fatal: true,
        });
        return state;
    }

    state.nodes = parsed.data.nodes;

    const seen = new Set<string>();
    for (const node of state.nodes) {
        if (seen.has(node.name)) {
            state.warnings.push(`Duplicate node name "${node.name}" in scene.`);
        }
        seen.add(node.name);
    }

    if (state.nodes.length === 0) {
        state.warnings.push('Scene contains no nodes.');
    }

    return state;
};
