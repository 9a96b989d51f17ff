import { NamingTemplateSchema } from '../src/types/index.js';
import type { NamingTemplate, TemplateEntryInput } from '../src/types/index.js';

/**
 * Parse template entries the way a rules file would be parsed.
 */
export function template(entries: TemplateEntryInput[], patternOverride?: string): NamingTemplate {
    return NamingTemplateSchema.parse({ entries, pattern_override: patternOverride });
}

/**
 * Sequence + shot + version + extension: matches ABCD0123_v001.exr
 */
export const SHOT_ENTRIES: TemplateEntryInput[] = [
    { kind: 'sequence', value: 4 },
    { kind: 'shotNumber', value: 4, separator: '_' },
    { kind: 'version', value: 3, separator: '.' },
    { kind: 'extension', value: ['exr', 'mov'] },
];

export const SHOT_TEMPLATE = template(SHOT_ENTRIES);
