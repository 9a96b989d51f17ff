import { fuzzyMatch } from '@framecheck/core';
import type { NamingRules } from '@framecheck/core';
import { findWorkspace } from '../workspace/detect.js';
import { loadRules } from '../workspace/config.js';
import { success, failure, info, arrow, fail, errorMessage } from '../utils/console.js';
import type { ColorspaceOptions } from '../types.js';

/**
 * Checks one colorspace value against the allow-list of a node class.
 */
export async function checkColorspaceValue(value: string, options: ColorspaceOptions): Promise<void> {
    const workspace = findWorkspace(options.workspace);

    let rules: NamingRules;
    try {
        rules = loadRules(workspace);
    } catch (err) {
        fail(`Failed to load naming rules. ${errorMessage(err)}`);
    }

    const allowed = (rules.colorspaces[options.class]?.allowed ?? []).filter((a) => a.trim() !== '');
    if (allowed.length === 0) {
        info(`No colorspace rule configured for ${options.class}.`);
        return;
    }

    const match = fuzzyMatch(value, allowed);
    if (match.accepted) {
        success(`'${value}' is allowed for ${options.class}`);
        arrow(`Matched '${match.matched}' (${match.stage})`);
    } else {
        failure(`'${value}' is not allowed for ${options.class}`);
        arrow(`Allowed: ${allowed.join(', ')}`);
        process.exitCode = 1;
    }
}
