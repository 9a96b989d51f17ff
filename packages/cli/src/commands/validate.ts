import { createFilenameValidator, suggestFilename } from '@framecheck/core';
import type { FilenameValidator, NamingRules } from '@framecheck/core';
import { findWorkspace } from '../workspace/detect.js';
import { loadRules, rulesPathFor } from '../workspace/config.js';
import { log, success, warn, failure, arrow, info, fail, errorMessage } from '../utils/console.js';
import type { ValidateOptions } from '../types.js';

export async function validateNames(names: string[], options: ValidateOptions): Promise<void> {
    const workspace = findWorkspace(options.workspace);

    let rules: NamingRules;
    try {
        rules = loadRules(workspace);
    } catch (err) {
        fail(`Failed to load naming rules. ${errorMessage(err)}`);
    }

    if (!rules.filename) {
        fail('No filename rule configured.', `Add a "filename" section to ${rulesPathFor(workspace)}.`);
    }

    let validator: FilenameValidator;
    try {
        validator = createFilenameValidator(rules.filename.template);
    } catch (err) {
        fail(errorMessage(err));
    }

    const results = names.map((name) => {
        const result = validator.validate(name);
        if (!options.fix) return result;
        const suggestion = result.valid ? null : suggestFilename(validator.template.entries, name);
        return { ...result, suggestion };
    });

    const invalid = results.filter((r) => !r.valid).length;
    if (invalid > 0) {
        process.exitCode = 1;
    }

    if (options.json) {
        log(JSON.stringify(results, null, 2));
        return;
    }

    for (const result of results) {
        if (result.valid) {
            success(result.filename);
        } else {
            failure(result.filename);
            for (const message of result.diagnosis) {
                arrow(message);
            }
        }
        for (const w of result.warnings) {
            warn(w);
        }
        if ('suggestion' in result && !result.valid) {
            if (result.suggestion) {
                arrow(`Suggested: ${result.suggestion}`);
            } else {
                info('No automatic fix available.');
            }
        }
    }

    log(`\n${results.length - invalid}/${results.length} file name(s) valid.`);
}
