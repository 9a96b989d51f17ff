/**
 * Filename validation: fast path first, detailed walk only on rejection.
 *
 * When a template carries a pattern override, the override decides
 * acceptance. The token walk then only explains rejections, and a name the
 * override accepts but the token template would reject is reported as a
 * warning rather than reconciled.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import { compileTemplate } from '../compiler/index.js';
import type { CompiledPattern } from '../compiler/index.js';
import { fastMatch, matchesTemplate, checkVersionPadding, diagnoseEntries } from '../matcher/index.js';
import { isLiteralEntry } from '../template/index.js';
import { MAX_FILENAME_LENGTH } from '../types/index.js';
import type { DiagnosisEntry, FilenameValidationResult, NamingTemplate } from '../types/index.js';

export interface FilenameValidator {
    template: NamingTemplate;
    compiled: CompiledPattern;
    validate(filename: string): FilenameValidationResult;
}

/**
 * Compile a template once and return a validator bound to it.
 *
 * @throws CompileError when the template or its override cannot be compiled
 */
export function createFilenameValidator(template: NamingTemplate): FilenameValidator {
    const compiled = compileTemplate(template);
    return {
        template,
        compiled,
        validate: (filename) => validateFilename(template, compiled, filename),
    };
}

/**
 * Validate one filename against a template and its compiled pattern.
 */
export function validateFilename(
    template: NamingTemplate,
    compiled: CompiledPattern,
    filename: string
): FilenameValidationResult {
    if (!filename) {
        return failed(filename, 'fast', [{ kind: 'token', message: 'Empty filename' }]);
    }
    if (filename.length > MAX_FILENAME_LENGTH) {
        return failed(filename, 'fast', [
            { kind: 'token', message: `Filename is longer than ${MAX_FILENAME_LENGTH} characters` },
        ]);
    }
    if (!template.entries.some((e) => !isLiteralEntry(e))) {
        return failed(filename, 'fast', [{ kind: 'token', message: 'No template configured' }]);
    }

    const warnings: string[] = [];

    if (fastMatch(compiled, filename)) {
        if (!compiled.override) {
            return result(filename, 'fast', [], warnings);
        }

        if (!matchesTemplate(compiled, filename)) {
            warnings.push(`'${filename}' is accepted by pattern override but not by the token template`);
        }
        return result(filename, 'fast', checkVersionPadding(template.entries, filename), warnings);
    }

    const entries = diagnoseEntries(template.entries, filename);
    if (entries.length === 0 && compiled.override) {
        entries.push({
            kind: 'override',
            expected: compiled.override.source,
            found: filename,
            message: `'${filename}' does not match the pattern override ${compiled.override.source}`,
        });
    }

    return result(filename, 'detailed', entries, warnings);
}

function result(
    filename: string,
    path: FilenameValidationResult['path'],
    entries: DiagnosisEntry[],
    warnings: string[]
): FilenameValidationResult {
    return {
        filename,
        valid: entries.length === 0,
        path,
        diagnosis: entries.map((e) => e.message),
        entries,
        warnings,
    };
}

function failed(filename: string, path: FilenameValidationResult['path'], entries: DiagnosisEntry[]): FilenameValidationResult {
    return result(filename, path, entries, []);
}
