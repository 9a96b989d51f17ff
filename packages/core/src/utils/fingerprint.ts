/**
 * Template fingerprinting.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 so core stays free of node:crypto.
 */

import { sha256 } from 'js-sha256';
import { FINGERPRINT } from '../types/index.js';
import type { NamingTemplate } from '../types/index.js';

/**
 * Deterministic fingerprint of a template's semantic content.
 *
 * Entries are serialized with sorted keys so two templates that differ only
 * in property order share a fingerprint.
 */
export function fingerprintTemplate(template: NamingTemplate): string {
    const payload = canonicalJson({
        entries: template.entries,
        pattern_override: template.pattern_override ?? null,
    });
    return sha256(payload).slice(0, FINGERPRINT.LENGTH);
}

function canonicalJson(value: unknown): string {
    if (Array.isArray(value)) {
        return `[${value.map(canonicalJson).join(',')}]`;
    }
    if (value !== null && typeof value === 'object') {
        const fields: [string, unknown][] = Object.entries(value)
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return `{${fields.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
    }
    return JSON.stringify(value);
}
