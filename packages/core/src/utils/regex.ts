/**
 * Regular expression helpers shared by the compiler and the matchers.
 */

/**
 * Escape a string so it matches itself literally inside a pattern.
 */
export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

/**
 * Escape a literal and make its letters match either case.
 *
 * Node 20 has no inline `(?i:...)` group, so case-insensitivity is spelled
 * out per character: `exr` becomes `[eE][xX][rR]`.
 */
export function caselessLiteral(text: string): string {
    let out = '';
    for (const ch of text) {
        const lower = ch.toLowerCase();
        const upper = ch.toUpperCase();
        out += lower !== upper && lower.length === 1 && upper.length === 1
            ? `[${lower}${upper}]`
            : escapeRegExp(ch);
    }
    return out;
}

/**
 * Non-capturing alternation of literal values.
 */
export function alternation(values: readonly string[], ignoreCase = false): string {
    const parts = values.map((v) => (ignoreCase ? caselessLiteral(v) : escapeRegExp(v)));
    return `(?:${parts.join('|')})`;
}

/**
 * Compile a pattern source, returning the syntax error message instead of throwing.
 */
export function tryCompile(source: string): { regex: RegExp } | { error: string } {
    try {
        return { regex: new RegExp(source) };
    } catch (e) {
        return { error: e instanceof Error ? e.message : String(e) };
    }
}
