/**
 * Constants for framecheck.
 */

/**
 * Maximum number of characters of unconsumed filename quoted in a diagnosis.
 * Longer previews are truncated and suffixed with "...".
 */
export const DIAGNOSIS_PREVIEW_LENGTH = 15;

/**
 * Longest filename the validator will match. Longer names are rejected
 * without running either matcher.
 */
export const MAX_FILENAME_LENGTH = 255;

/**
 * Template fingerprint configuration.
 * Fingerprints key the compiled-pattern cache.
 */
export const FINGERPRINT = {
    LENGTH: 16,
} as const;

/**
 * Severity assigned to a rule when the rules file does not name one.
 */
export const DEFAULT_SEVERITY = 'warning';

/**
 * Node classes whose `file` parameter is checked against the filename rule.
 */
export const FILE_NODE_CLASSES = ['Read', 'Write'] as const;

// ============================================================================
// Colorspace matching tables
// ============================================================================

/**
 * Long-form vendor colorspace names mapped to short canonical codes.
 * Keys are lowercase; lookups lowercase the candidate but do not normalize it.
 */
export const VENDOR_COLORSPACE_CODES: Readonly<Record<string, string>> = {
    'aces - aces2065-1': 'aces2065',
    'aces - acescg': 'acescg',
    'aces - acescct': 'acescct',
    'default (aces - acescg)': 'acescg',
    'scene_linear (aces - acescg)': 'acescg',
    'compositing_linear (aces - acescg)': 'acescg',
    'rendering (aces - acescg)': 'acescg',
    'default (srgb)': 'srgb',
    'default (scene_linear)': 'linear',
    'input - arri - v3 logc (ei800) - alexa': 'logc',
    'input - red - log3g10 - redwidegamutrgb': 'log3g10',
    'input - sony - slog3 - sgamut3.cine': 'slog3',
    'input - srgb': 'srgb',
    'input - rec.709': 'rec709',
    'output - srgb': 'srgb',
    'output - rec.709': 'rec709',
    'output - rec.2020': 'rec2020',
    'output - p3-dci': 'p3',
    'utility - linear - srgb': 'linear',
    'utility - raw': 'raw',
};

/**
 * Interchangeable spellings of one colorspace concept.
 * A normalized name belongs to a group when it equals one of its spellings.
 */
export const COLORSPACE_SYNONYM_GROUPS: Readonly<Record<string, readonly string[]>> = {
    acescg: ['acescg', 'aces', 'acesacescg', 'acesapplied'],
    linear: ['linear', 'scenelinear', 'scenereferred', 'lin'],
    srgb: ['srgb', 'inputsrgb', 'outputsrgb'],
    rec709: ['rec709', 'rec.709', 'inputrec709', 'outputrec709', 'r709'],
    log: ['log', 'logc', 'alog', 'arri'],
    p3: ['p3', 'p3d65', 'displayp3', 'dcip3'],
    rec2020: ['rec2020', 'rec.2020', 'bt2020', 'bt.2020'],
};

/**
 * Key terms for the last-resort shared-term comparison.
 */
export const COLORSPACE_KEY_TERMS = ['acescg', 'linear', 'srgb', 'rec709', 'log', 'p3', 'rec2020'] as const;
