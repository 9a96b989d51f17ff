/**
 * Diagnosis message formatting.
 */

import { DIAGNOSIS_PREVIEW_LENGTH } from '../types/index.js';
import type { DiagnosisEntry } from '../types/index.js';

/**
 * Leading content of the unconsumed filename, cut at the next occurrence of
 * the expected separator and capped at DIAGNOSIS_PREVIEW_LENGTH characters.
 */
export function previewOf(remaining: string, separator: string): string {
    const cut = separator ? remaining.indexOf(separator) : -1;
    const head = cut >= 0 ? remaining.slice(0, cut) : remaining;
    return head.length > DIAGNOSIS_PREVIEW_LENGTH
        ? `${head.slice(0, DIAGNOSIS_PREVIEW_LENGTH)}...`
        : head;
}

export function tokenMismatch(label: string, found: string, expected: string, example: string): DiagnosisEntry {
    return {
        kind: 'token',
        label,
        expected,
        found,
        message: `${label}: '${found}' - Expected ${expected} (e.g. ${example})`,
    };
}

/**
 * Separator missing between two tokens. Either side may be absent when the
 * separator opens or closes the template.
 */
export function missingSeparator(separator: string, before: string | undefined, after: string | undefined, found: string): DiagnosisEntry {
    let where: string;
    if (before && after) {
        where = `between ${before} and ${after}`;
    } else if (after) {
        where = `before ${after}`;
    } else if (before) {
        where = `after ${before}`;
    } else {
        where = 'in filename';
    }

    return {
        kind: 'separator',
        label: after ?? before,
        expected: separator,
        found,
        message: `Missing separator '${separator}' ${where}`,
    };
}

export function patternError(label: string, detail: string): DiagnosisEntry {
    return {
        kind: 'pattern-error',
        label,
        message: `Pattern error in ${label}: ${detail}`,
    };
}

export function trailingContent(remaining: string): DiagnosisEntry {
    const dot = remaining.lastIndexOf('.');
    const extension = dot >= 0 ? remaining.slice(dot + 1) : '';
    const message = extension
        ? `Unexpected trailing content '${remaining}' (looks like a misplaced extension '.${extension}')`
        : `Unexpected trailing content '${remaining}'`;

    return { kind: 'trailing', found: remaining, message };
}
