/**
 * Token instance resolution.
 *
 * Turns one persisted descriptor into the concrete pattern fragment, preview
 * sample and expected-shape phrase used by the compiler and both matchers.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Bad configuration throws PatternError.
 */

import { getTokenKind } from '../catalog/index.js';
import type { TokenKind, SpinnerKind, RangeKind, ChoiceKind } from '../catalog/index.js';
import { PatternError } from '../compiler/errors.js';
import { escapeRegExp, caselessLiteral, alternation, tryCompile } from '../utils/regex.js';
import type { TokenDescriptor, TokenValue, TemplateEntry, LiteralEntry } from '../types/index.js';

/**
 * A descriptor with its catalog kind applied.
 */
export interface ResolvedInstance {
    descriptor: TokenDescriptor;
    kind: TokenKind;
    label: string;
    /** Own pattern, prefix and suffix included; no separator, no optional wrapper */
    fragment: string;
    /** Example text for this instance, prefix and suffix included */
    sample: string;
    /** Expected-shape phrase, e.g. "4 digits" or "one of exr, mov" */
    expected: string;
    /** Digit width enforced by the instance, when it is a fixed-width number */
    digitWidth?: number;
    /** The fragment can repeat without limit */
    unbounded: boolean;
}

interface CoreResolution {
    pattern: string;
    sample: string;
    expected: string;
    digitWidth?: number;
}

export function isLiteralEntry(entry: TemplateEntry): entry is LiteralEntry {
    return 'literal' in entry;
}

/**
 * Display label for a descriptor, falling back to `<kind>` for unknown kinds.
 */
export function labelOf(descriptor: TokenDescriptor): string {
    return descriptor.label ?? getTokenKind(descriptor.kind)?.label ?? `<${descriptor.kind}>`;
}

/**
 * Resolve a descriptor against the catalog.
 *
 * @throws PatternError for unknown kinds, out-of-range widths, values outside
 *   the kind's options, or a fragment that does not compile
 */
export function resolveInstance(descriptor: TokenDescriptor): ResolvedInstance {
    const label = labelOf(descriptor);
    const kind = getTokenKind(descriptor.kind);
    if (!kind) {
        throw new PatternError(label, `Unknown token kind "${descriptor.kind}"`);
    }

    const core = resolveCore(kind, descriptor, label);
    const fragment = escapeRegExp(descriptor.prefix) + core.pattern + escapeRegExp(descriptor.suffix);

    const compiled = tryCompile(fragment);
    if ('error' in compiled) {
        throw new PatternError(label, `Invalid pattern fragment "${fragment}": ${compiled.error}`);
    }

    return {
        descriptor,
        kind,
        label,
        fragment,
        sample: descriptor.prefix + core.sample + descriptor.suffix,
        expected: core.expected,
        digitWidth: core.digitWidth,
        unbounded: /(?<!\\)[+*]|\{\d+,\}/.test(core.pattern),
    };
}

function resolveCore(kind: TokenKind, descriptor: TokenDescriptor, label: string): CoreResolution {
    const { value } = descriptor;

    switch (kind.control) {
        case 'spinner':
            return resolveSpinner(kind, value, label);
        case 'range':
            return resolveRange(kind, value, label);
        case 'choice':
        case 'multichoice':
            return resolveChoice(kind, value, descriptor.ignore_case, label);
        case 'static':
            if (value !== null) {
                throw new PatternError(label, `Token kind "${kind.name}" takes no value`);
            }
            return { pattern: kind.template, sample: kind.example, expected: kind.expect };
        case 'text': {
            const text = typeof value === 'number' ? String(value) : value;
            if (typeof text !== 'string' || text === '') {
                throw new PatternError(label, 'Text token requires a non-empty literal value');
            }
            return {
                pattern: descriptor.ignore_case ? caselessLiteral(text) : escapeRegExp(text),
                sample: text,
                expected: `literal value '${text}'`,
            };
        }
    }
}

function resolveSpinner(kind: SpinnerKind, value: TokenValue | null, label: string): CoreResolution {
    let width: number;
    if (value === null) {
        width = kind.defaultWidth;
    } else if (typeof value === 'number') {
        width = value;
    } else if (isRange(value) && value.min === value.max) {
        width = value.min;
    } else {
        throw new PatternError(label, `Token kind "${kind.name}" takes a single width`);
    }

    if (width < kind.bounds.min || width > kind.bounds.max) {
        throw new PatternError(
            label,
            `Width ${width} is outside ${kind.bounds.min}-${kind.bounds.max}`
        );
    }

    const sample = kind.sample(width);
    return {
        pattern: kind.template.replace('{n}', String(width)),
        sample,
        expected: kind.expect.replace('{n}', String(width)),
        digitWidth: kind.template.includes('\\d') ? width : undefined,
    };
}

function resolveRange(kind: RangeKind, value: TokenValue | null, label: string): CoreResolution {
    let range: { min: number; max: number };
    if (value === null) {
        range = kind.defaultRange;
    } else if (typeof value === 'number') {
        range = { min: value, max: value };
    } else if (isRange(value)) {
        range = value;
    } else {
        throw new PatternError(label, `Token kind "${kind.name}" takes a width range`);
    }

    if (range.min < kind.bounds.min || range.max > kind.bounds.max || range.min > range.max) {
        throw new PatternError(
            label,
            `Range ${range.min}-${range.max} is outside ${kind.bounds.min}-${kind.bounds.max}`
        );
    }

    const fill = (template: string) =>
        template.replaceAll('{min}', String(range.min)).replaceAll('{max}', String(range.max));

    return {
        pattern: fill(kind.template),
        sample: kind.sample(range.min, range.max),
        expected: fill(kind.expect),
    };
}

function resolveChoice(
    kind: ChoiceKind,
    value: TokenValue | null,
    ignoreCase: boolean,
    label: string
): CoreResolution {
    let selected: string[];
    if (value === null) {
        selected = [...kind.options];
    } else if (typeof value === 'string' || typeof value === 'number') {
        selected = [String(value)];
    } else if (Array.isArray(value)) {
        if (kind.control === 'choice' && value.length > 1) {
            throw new PatternError(label, `Token kind "${kind.name}" takes a single choice`);
        }
        selected = value;
    } else {
        throw new PatternError(label, `Token kind "${kind.name}" takes one of its options`);
    }

    const fold = (s: string) => (ignoreCase ? s.toLowerCase() : s);
    const known = new Set(kind.options.map(fold));
    const unknown = selected.filter((v) => !known.has(fold(v)));
    if (unknown.length > 0) {
        throw new PatternError(
            label,
            `Unknown option(s) ${unknown.map((v) => `"${v}"`).join(', ')}; expected ${kind.options.join(', ')}`
        );
    }

    return {
        pattern: alternation(selected, ignoreCase),
        sample: selected[0],
        expected: selected.length === 1 ? `'${selected[0]}'` : `one of ${selected.join(', ')}`,
    };
}

function isRange(value: TokenValue): value is { min: number; max: number } {
    return typeof value === 'object' && !Array.isArray(value);
}
