/**
 * Fast matcher: one anchored whole-string match, no diagnosis.
 */

import { resolveInstance, isLiteralEntry } from '../template/instance.js';
import type { ResolvedInstance } from '../template/instance.js';
import { DIAGNOSIS_PREVIEW_LENGTH } from '../types/index.js';
import type { CompiledPattern } from '../compiler/index.js';
import type { DiagnosisEntry, TemplateEntry } from '../types/index.js';

/**
 * Accept or reject a filename in a single match attempt.
 * Uses the pattern override when the template has one.
 */
export function fastMatch(pattern: CompiledPattern, filename: string): boolean {
    return (pattern.override?.regex ?? pattern.regex).test(filename);
}

/**
 * Accept or reject against the structured pattern only, ignoring any override.
 */
export function matchesTemplate(pattern: CompiledPattern, filename: string): boolean {
    return pattern.regex.test(filename);
}

/**
 * Sanity check after a fast accept: every `v<digits>` run must carry at least
 * as many digits as the template's version tokens require.
 *
 * A run only counts when the `v` does not follow a letter, so words such as
 * "rev2" are not read as versions.
 */
export function checkVersionPadding(entries: readonly TemplateEntry[], filename: string): DiagnosisEntry[] {
    const versions: ResolvedInstance[] = [];
    for (const entry of entries) {
        if (isLiteralEntry(entry) || entry.kind !== 'version') continue;
        versions.push(resolveInstance(entry));
    }

    const issues: DiagnosisEntry[] = [];

    // One finding per under-padded run, however many version tokens it falls short of
    for (const match of filename.matchAll(/(?<![A-Za-z])v(\d+)/g)) {
        const digits = match[1];
        const short = versions.find((v) => v.digitWidth !== undefined && digits.length < v.digitWidth);
        if (!short?.digitWidth) continue;

        const width = short.digitWidth;
        const found = match[0].slice(0, DIAGNOSIS_PREVIEW_LENGTH);
        issues.push({
            kind: 'padding',
            label: short.label,
            expected: `${width} digits`,
            found,
            message: `${short.label}: '${found}' - Version is under-padded, expected ${width} digits (e.g. ${short.sample})`,
        });
    }

    return issues;
}
