import { compileTemplate } from '@framecheck/core';
import type { CompiledPattern, NamingRules } from '@framecheck/core';
import { findWorkspace } from '../workspace/detect.js';
import { loadRules, rulesPathFor } from '../workspace/config.js';
import { log, arrow, fail, errorMessage } from '../utils/console.js';
import type { WorkspaceOptions } from '../types.js';

/**
 * Prints the compiled form of the configured filename template.
 */
export async function showCompiled(options: WorkspaceOptions): Promise<void> {
    const workspace = findWorkspace(options.workspace);
    const rulesPath = rulesPathFor(workspace);

    let rules: NamingRules;
    try {
        rules = loadRules(workspace);
    } catch (err) {
        fail(`Failed to load naming rules. ${errorMessage(err)}`);
    }

    if (!rules.filename) {
        fail('No filename rule configured.', `Add a "filename" section to ${rulesPath}.`);
    }

    let compiled: CompiledPattern;
    try {
        compiled = compileTemplate(rules.filename.template);
    } catch (err) {
        fail(errorMessage(err));
    }

    log(`\nFilename template from ${rulesPath}`);
    arrow(`Pattern:     ${compiled.source}`);
    arrow(`Example:     ${compiled.example}`);
    arrow(`Fingerprint: ${compiled.fingerprint}`);
    if (compiled.override) {
        arrow(`Override:    ${compiled.override.source}`);
    }
}
