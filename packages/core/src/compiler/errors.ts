/**
 * Errors raised while turning template entries into patterns.
 *
 * A filename that simply does not conform is never an error: that outcome is
 * a Diagnosis returned as data.
 */

/**
 * One token instance cannot be resolved to a valid pattern fragment.
 * Recoverable: the incremental matcher records it as a diagnosis entry.
 */
export class PatternError extends Error {
    readonly label: string;
    /** Reason without the label prefix */
    readonly detail: string;

    constructor(label: string, detail: string) {
        super(`${label}: ${detail}`);
        this.name = 'PatternError';
        this.label = label;
        this.detail = detail;
    }
}

/**
 * The template as a whole cannot be compiled. Fatal to the validation run.
 */
export class CompileError extends Error {
    /** Index of the offending template entry, or -1 for the pattern override */
    readonly entryIndex: number;
    readonly label: string;

    constructor(entryIndex: number, label: string, detail: string) {
        super(
            entryIndex >= 0
                ? `Cannot compile template entry ${entryIndex} (${label}): ${detail}`
                : `Cannot compile ${label}: ${detail}`
        );
        this.name = 'CompileError';
        this.entryIndex = entryIndex;
        this.label = label;
    }
}
