import { compileTemplate, CompileError } from '@framecheck/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 2: Rules Check
 * Compiles the filename template up front so a broken template stops the run
 * before any node is checked, and notes which checks are not configured.
 */
export const checkRules: PipelineStep = async (state) => {
    const { filename, colorspaces } = state.rules;

    if (!filename) {
        state.warnings.push('No filename rule configured; file names are not checked.');
    } else {
        try {
            compileTemplate(filename.template);
        } catch (err) {
            if (!(err instanceof CompileError)) throw err;
            state.errors.push({
                step: 'check-rules',
                message: err.message,
                fatal: true,
                error: err,
            });
            return state;
        }
    }

    for (const [nodeClass, rule] of Object.entries(colorspaces)) {
        if (!rule.allowed.some((a) => a.trim() !== '')) {
            state.warnings.push(`Colorspace rule for ${nodeClass} lists no allowed values; check skipped.`);
        }
    }

    return state;
};
