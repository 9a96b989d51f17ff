/**
 * Rename suggestion.
 *
 * Repairs under-padded digit tokens and missing token separators. Anything
 * else is left to the user: a name is only suggested when it then matches the
 * template exactly.
 */

import { buildEntryPiece, PatternError } from '../compiler/index.js';
import type { EntryPiece } from '../compiler/index.js';
import type { ResolvedInstance } from '../template/index.js';
import { diagnoseEntries } from '../matcher/index.js';
import { tryCompile } from '../utils/regex.js';
import type { TemplateEntry } from '../types/index.js';

interface Repair {
    text: string;
    consumed: number;
}

/**
 * Suggest a conforming name for a filename that fails the template.
 *
 * @returns The repaired name, or null when the filename already conforms or
 *   cannot be repaired
 */
export function suggestFilename(entries: readonly TemplateEntry[], filename: string): string | null {
    const pieces = buildPieces(entries);
    if (!pieces) return null;

    const compiled = tryCompile(`^${pieces.map((p) => p.piece).join('')}$`);
    if ('error' in compiled || compiled.regex.test(filename)) return null;

    let remaining = filename;
    let repaired = '';

    for (const piece of pieces) {
        const own = new RegExp(`^(?:${piece.required})`).exec(remaining);
        if (own) {
            repaired += own[0];
            remaining = remaining.slice(own[0].length);
            continue;
        }

        if (!piece.instance) {
            // Missing literal separator
            repaired += piece.example;
            continue;
        }

        const fix = repairToken(piece.instance, piece.lead, piece.separator, remaining);
        if (fix) {
            repaired += fix.text;
            remaining = remaining.slice(fix.consumed);
            continue;
        }

        if (!piece.instance.descriptor.optional) return null;
    }

    if (remaining) return null;
    if (!compiled.regex.test(repaired) || diagnoseEntries(entries, repaired).length > 0) return null;

    return repaired;
}

function buildPieces(entries: readonly TemplateEntry[]): EntryPiece[] | null {
    try {
        return entries.map((_, index) => buildEntryPiece(entries, index));
    } catch (e) {
        if (e instanceof PatternError) return null;
        throw e;
    }
}

/**
 * Match one token leniently: pad a short digit run, then take or insert the
 * separator that must follow it. A token with a lead is only repaired when
 * the lead is there.
 */
function repairToken(instance: ResolvedInstance, lead: string, separator: string, remaining: string): Repair | null {
    if (!remaining.startsWith(lead)) return null;

    const matched = matchToken(instance, remaining.slice(lead.length));
    if (!matched) return null;
    const token = { text: lead + matched.text, consumed: lead.length + matched.consumed };

    const after = remaining.slice(token.consumed);
    if (!separator) return token;
    if (after.startsWith(separator)) {
        return { text: token.text + separator, consumed: token.consumed + separator.length };
    }
    return { text: token.text + separator, consumed: token.consumed };
}

function matchToken(instance: ResolvedInstance, remaining: string): Repair | null {
    const exact = new RegExp(`^(?:${instance.fragment})`).exec(remaining);
    if (exact) {
        return { text: exact[0], consumed: exact[0].length };
    }

    const width = instance.digitWidth;
    if (width === undefined || width < 2) return null;

    const digits = `\\d{${width}}`;
    const at = instance.fragment.indexOf(digits);
    if (at < 0) return null;

    const before = instance.fragment.slice(0, at);
    const after = instance.fragment.slice(at + digits.length);
    const short = new RegExp(`^((?:${before}))(\\d{1,${width - 1}})((?:${after}))`).exec(remaining);
    if (!short) return null;

    const [whole, head, run, tail] = short;
    if (/^\d/.test(remaining.slice(whole.length))) return null;

    return { text: head + run.padStart(width, '0') + tail, consumed: whole.length };
}
