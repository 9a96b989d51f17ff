/**
 * Incremental token matcher.
 *
 * Walks a filename left to right, consuming one template entry at a time, and
 * reports the first place where the filename stops conforming.
 *
 * Each step first tries an alignment that leaves the rest of the template
 * still matchable, so a filename the compiled pattern accepts always walks
 * cleanly. Only when no such alignment exists does the step fall back to the
 * entry's own pattern and carry on until something fails.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Mismatches are returned as data.
 */

import { buildEntryPiece, PatternError } from '../compiler/index.js';
import type { EntryPiece } from '../compiler/index.js';
import { isLiteralEntry, labelOf } from '../template/instance.js';
import { tokenMismatch, missingSeparator, patternError, trailingContent, previewOf } from './messages.js';
import type { DiagnosisEntry, TemplateEntry } from '../types/index.js';

type Step =
    | { outcome: 'matched'; length: number }
    | { outcome: 'absent' }
    | { outcome: 'failed' };

/**
 * Diagnose a filename against template entries.
 *
 * @returns Structured entries; empty when the filename conforms
 */
export function diagnoseEntries(entries: readonly TemplateEntry[], filename: string): DiagnosisEntry[] {
    const count = entries.length;
    const built: (EntryPiece | PatternError)[] = entries.map((_, index) => {
        try {
            return buildEntryPiece(entries, index);
        } catch (e) {
            if (e instanceof PatternError) return e;
            throw e;
        }
    });
    const rest = restSources(built);

    let remaining = filename;

    for (let i = 0; i < count; i++) {
        const piece = built[i];
        if (piece instanceof PatternError) {
            return [patternError(piece.label, piece.detail)];
        }

        const step = matchStep(piece, remaining, rest[i + 1]);

        if (step.outcome === 'matched') {
            remaining = remaining.slice(step.length);
            continue;
        }
        if (step.outcome === 'absent') {
            continue;
        }

        return describeFailure(entries, i, piece, remaining);
    }

    return remaining ? [trailingContent(remaining)] : [];
}

/**
 * Diagnose a filename and return the human-readable messages only.
 */
export function diagnose(entries: readonly TemplateEntry[], filename: string): string[] {
    return diagnoseEntries(entries, filename).map((e) => e.message);
}

/**
 * Pattern source for entries i..n-1, or null when any of them cannot be built.
 * Index n holds the empty source.
 */
function restSources(built: readonly (EntryPiece | PatternError)[]): (string | null)[] {
    const sources: (string | null)[] = new Array(built.length + 1);
    sources[built.length] = '';
    for (let i = built.length - 1; i >= 0; i--) {
        const piece = built[i];
        const after = sources[i + 1];
        sources[i] = piece instanceof PatternError || after === null ? null : piece.piece + after;
    }
    return sources;
}

function matchStep(piece: EntryPiece, remaining: string, rest: string | null): Step {
    const optional = piece.instance?.descriptor.optional ?? false;

    if (rest !== null) {
        const aligned = new RegExp(`^(?:${piece.required})(?=${rest}$)`).exec(remaining);
        if (aligned) {
            return { outcome: 'matched', length: aligned[0].length };
        }
        if (optional && new RegExp(`^(?=${rest}$)`).test(remaining)) {
            return { outcome: 'absent' };
        }
    }

    const own = new RegExp(`^(?:${piece.required})`).exec(remaining);
    if (own) {
        return { outcome: 'matched', length: own[0].length };
    }
    return optional ? { outcome: 'absent' } : { outcome: 'failed' };
}

function describeFailure(
    entries: readonly TemplateEntry[],
    index: number,
    piece: EntryPiece,
    remaining: string
): DiagnosisEntry[] {
    const entry = entries[index];

    if (isLiteralEntry(entry)) {
        return [
            missingSeparator(
                entry.literal,
                previousTokenLabel(entries, index),
                nextTokenLabel(entries, index),
                previewOf(remaining, '')
            ),
        ];
    }

    const { instance } = piece;
    if (!instance) {
        return [];
    }

    const next = entries[index + 1];
    const cutAt = piece.separator || (next && isLiteralEntry(next) ? next.literal : '');

    const tokenOnly = piece.separator ? new RegExp(`^(?:${instance.fragment})`).exec(remaining) : null;
    if (tokenOnly && !remaining.slice(tokenOnly[0].length).startsWith(piece.separator)) {
        // The token itself is fine; only its separator is missing
        return [
            tokenMismatch(instance.label, previewOf(tokenOnly[0], ''), instance.expected, instance.sample),
            missingSeparator(
                piece.separator,
                instance.label,
                nextTokenLabel(entries, index),
                previewOf(remaining.slice(tokenOnly[0].length), '')
            ),
        ];
    }

    return [tokenMismatch(instance.label, previewOf(remaining, cutAt), instance.expected, instance.sample)];
}

function nextTokenLabel(entries: readonly TemplateEntry[], index: number): string | undefined {
    for (let j = index + 1; j < entries.length; j++) {
        const entry = entries[j];
        if (!isLiteralEntry(entry)) return labelOf(entry);
    }
    return undefined;
}

function previousTokenLabel(entries: readonly TemplateEntry[], index: number): string | undefined {
    for (let j = index - 1; j >= 0; j--) {
        const entry = entries[j];
        if (!isLiteralEntry(entry)) return labelOf(entry);
    }
    return undefined;
}
