/**
 * Pattern compiler.
 *
 * Assembles an ordered template into one anchored pattern plus a matching
 * example filename.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Failures throw CompileError.
 */

import { resolveInstance, isLiteralEntry } from '../template/instance.js';
import type { ResolvedInstance } from '../template/instance.js';
import { CompileError, PatternError } from './errors.js';
import { escapeRegExp, tryCompile } from '../utils/regex.js';
import { fingerprintTemplate } from '../utils/fingerprint.js';
import type { NamingTemplate, TemplateEntry } from '../types/index.js';

export interface CompiledOverride {
    source: string;
    regex: RegExp;
}

/**
 * Derived, cached form of a template.
 */
export interface CompiledPattern {
    /** Anchored pattern source; byte-identical for identical templates */
    source: string;
    regex: RegExp;
    /** Example filename that the pattern accepts */
    example: string;
    fingerprint: string;
    /** Free-text override, used by the fast path in place of `regex` */
    override?: CompiledOverride;
}

/**
 * Pattern piece contributed by one template entry.
 */
export interface EntryPiece {
    /** Piece as placed in the composite pattern (separators and optional group included) */
    piece: string;
    /** Piece without the optional wrapper */
    required: string;
    example: string;
    /** Set for token entries */
    instance?: ResolvedInstance;
    /** Separator this entry must be preceded by ('' when none applies) */
    lead: string;
    /** Separator this entry must be followed by ('' when none applies) */
    separator: string;
}

/**
 * Build the pattern piece for entry `index` of a template.
 *
 * A token's separator is appended unless only optional tokens follow it. In
 * that optional tail each token carries the separator of the entry before it
 * as a lead inside its own optional group, so a name that ends before the
 * tail needs no separator. An optional token's separator sits inside its
 * optional group, so an absent token consumes nothing.
 *
 * @throws PatternError when the token cannot be resolved
 */
export function buildEntryPiece(entries: readonly TemplateEntry[], index: number): EntryPiece {
    const entry = entries[index];
    if (isLiteralEntry(entry)) {
        const piece = escapeRegExp(entry.literal);
        return { piece, required: piece, example: entry.literal, lead: '', separator: '' };
    }

    const instance = resolveInstance(entry);
    const tail = optionalTailStart(entries);
    const before = index > 0 ? entries[index - 1] : undefined;
    const lead = index >= tail && before && !isLiteralEntry(before) ? before.separator : '';
    const separator = index + 1 < tail ? entry.separator : '';
    const required = escapeRegExp(lead) + instance.fragment + escapeRegExp(separator);

    return {
        piece: entry.optional ? `(?:${required})?` : required,
        required,
        example: lead + instance.sample + separator,
        instance,
        lead,
        separator,
    };
}

/**
 * Index of the first entry of the trailing run of optional tokens; the entry
 * count when the template does not end in one.
 */
function optionalTailStart(entries: readonly TemplateEntry[]): number {
    let start = entries.length;
    while (start > 0) {
        const entry = entries[start - 1];
        if (isLiteralEntry(entry) || !entry.optional) break;
        start--;
    }
    return start;
}

/**
 * Compile a template.
 *
 * @throws CompileError identifying the first entry that cannot be compiled;
 *   no partial pattern is ever returned
 */
export function compileTemplate(template: NamingTemplate): CompiledPattern {
    const { entries } = template;
    const pieces: EntryPiece[] = [];

    entries.forEach((entry, index) => {
        try {
            pieces.push(buildEntryPiece(entries, index));
        } catch (e) {
            if (e instanceof PatternError) {
                throw new CompileError(index, e.label, e.detail);
            }
            throw e;
        }
    });

    assertSeparable(pieces);

    const parts = pieces.map((p) => p.piece);
    const example = pieces.map((p) => p.example);
    const source = `^${parts.join('')}$`;
    const compiled = tryCompile(source);
    if ('error' in compiled) {
        throw new CompileError(-1, 'template', compiled.error);
    }

    return {
        source,
        regex: compiled.regex,
        example: example.join(''),
        fingerprint: fingerprintTemplate(template),
        override: template.pattern_override !== undefined
            ? compileOverride(template.pattern_override)
            : undefined,
    };
}

/**
 * Reject two adjacent unbounded tokens whose separator the first token could
 * swallow. Matching such a pair backtracks polynomially in the filename length.
 *
 * @throws CompileError naming the second token
 */
function assertSeparable(pieces: readonly EntryPiece[]): void {
    for (let i = 0; i + 1 < pieces.length; i++) {
        const first = pieces[i].instance;
        const second = pieces[i + 1].instance;
        if (!first?.unbounded || !second?.unbounded) continue;

        const between = pieces[i].separator + pieces[i + 1].lead;
        const joined = first.sample + between + second.sample;
        if (new RegExp(`^(?:${first.fragment})$`).test(joined)) {
            const shown = between ? `separator '${between}'` : 'no separator';
            throw new CompileError(
                i + 1,
                second.label,
                `Follows ${first.label} with ${shown}; the two cannot be told apart`
            );
        }
    }
}

/**
 * Compile a free-text override. The override is anchored at both ends.
 *
 * @throws CompileError with entryIndex -1
 */
export function compileOverride(source: string): CompiledOverride {
    const compiled = tryCompile(`^(?:${source})$`);
    if ('error' in compiled) {
        throw new CompileError(-1, 'pattern_override', compiled.error);
    }
    return { source, regex: compiled.regex };
}
