/**
 * Normalization for configured-value comparison.
 *
 * Transformations:
 * - Convert to lowercase
 * - Remove spaces, hyphens and underscores
 *
 * Other punctuation (dots, parentheses) is kept: `rec.709` stays distinct from `rec709`
 * at this level and is reconciled through the synonym groups instead.
 */
export function normalizeConfiguredValue(raw: string): string {
    return raw.toLowerCase().replace(/[\s\-_]/g, '');
}
