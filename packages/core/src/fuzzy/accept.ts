/**
 * Configured-value fuzzy matcher.
 *
 * Accepts a candidate against an allow-list in five stages of decreasing
 * precision. The first stage that succeeds decides; the allow-list entry that
 * satisfied it is reported alongside.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Pure functions only.
 */

import { VENDOR_COLORSPACE_CODES, COLORSPACE_SYNONYM_GROUPS, COLORSPACE_KEY_TERMS } from '../types/index.js';
import { normalizeConfiguredValue } from '../utils/normalize.js';

export type FuzzyStage = 'exact' | 'normalized' | 'vendor' | 'synonym' | 'key-term';

export type FuzzyMatch =
    | { accepted: true; stage: FuzzyStage; matched: string }
    | { accepted: false };

/**
 * Decide whether a candidate is acceptable for an allow-list, and why.
 */
export function fuzzyMatch(candidate: string, allowed: readonly string[]): FuzzyMatch {
    if (allowed.includes(candidate)) {
        return { accepted: true, stage: 'exact', matched: candidate };
    }

    const normalized = normalizeConfiguredValue(candidate);
    const entries = allowed.map((raw) => ({ raw, norm: normalizeConfiguredValue(raw) }));

    const sameNorm = entries.find((e) => e.norm === normalized);
    if (sameNorm) {
        return { accepted: true, stage: 'normalized', matched: sameNorm.raw };
    }

    const vendorName = candidate.toLowerCase();
    if (Object.hasOwn(VENDOR_COLORSPACE_CODES, vendorName)) {
        const code = VENDOR_COLORSPACE_CODES[vendorName];
        const byCode = entries.find((e) => e.norm.includes(code));
        if (byCode) {
            return { accepted: true, stage: 'vendor', matched: byCode.raw };
        }
    }

    for (const spellings of Object.values(COLORSPACE_SYNONYM_GROUPS)) {
        if (!inGroup(normalized, spellings)) continue;
        const sameGroup = entries.find((e) => inGroup(e.norm, spellings));
        if (sameGroup) {
            return { accepted: true, stage: 'synonym', matched: sameGroup.raw };
        }
    }

    const terms = keyTerms(normalized);
    if (terms.length > 0) {
        const shared = entries.find((e) => keyTerms(e.norm).some((t) => terms.includes(t)));
        if (shared) {
            return { accepted: true, stage: 'key-term', matched: shared.raw };
        }
    }

    return { accepted: false };
}

/**
 * Boolean form of {@link fuzzyMatch}.
 */
export function fuzzyAccept(candidate: string, allowed: readonly string[]): boolean {
    return fuzzyMatch(candidate, allowed).accepted;
}

function inGroup(normalized: string, spellings: readonly string[]): boolean {
    return spellings.includes(normalized);
}

function keyTerms(normalized: string): string[] {
    return COLORSPACE_KEY_TERMS.filter((term) => normalized.includes(term));
}
