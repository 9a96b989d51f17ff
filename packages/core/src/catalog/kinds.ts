/**
 * Token catalog: the fixed set of filename component kinds.
 *
 * Each kind carries a pattern template whose placeholders are resolved per
 * instance:
 * - `{n}`         chosen width (spinner kinds)
 * - `{min}/{max}` chosen width range (range kinds)
 *
 * Choice kinds build an alternation from their options; text kinds escape the
 * configured literal. Every template must yield a valid pattern fragment once
 * its placeholders are filled.
 */

export type ControlShape = 'spinner' | 'range' | 'choice' | 'multichoice' | 'static' | 'text';

interface BaseKind {
    /** Catalog identifier, as persisted in rules files */
    name: string;
    /** Display label used in diagnoses */
    label: string;
    description: string;
}

export interface SpinnerKind extends BaseKind {
    control: 'spinner';
    template: string;
    bounds: { min: number; max: number };
    defaultWidth: number;
    /** Expected-shape phrase; `{n}` is replaced by the width */
    expect: string;
    sample: (width: number) => string;
}

export interface RangeKind extends BaseKind {
    control: 'range';
    template: string;
    bounds: { min: number; max: number };
    defaultRange: { min: number; max: number };
    expect: string;
    sample: (min: number, max: number) => string;
}

export interface ChoiceKind extends BaseKind {
    control: 'choice' | 'multichoice';
    options: readonly string[];
}

export interface StaticKind extends BaseKind {
    control: 'static';
    template: string;
    example: string;
    expect: string;
}

export interface TextKind extends BaseKind {
    control: 'text';
}

export type TokenKind = SpinnerKind | RangeKind | ChoiceKind | StaticKind | TextKind;

const TOKEN_KINDS: readonly TokenKind[] = [
    {
        name: 'sequence',
        label: '<sequence>',
        description: 'Sequence code (letters)',
        control: 'spinner',
        template: '[A-Za-z]{{n}}',
        bounds: { min: 2, max: 8 },
        defaultWidth: 4,
        expect: '{n} letters',
        sample: (n) => 'A'.repeat(n),
    },
    {
        name: 'shotNumber',
        label: '<shotNumber>',
        description: 'Shot number (digits)',
        control: 'spinner',
        template: '\\d{{n}}',
        bounds: { min: 2, max: 8 },
        defaultWidth: 4,
        expect: '{n} digits',
        sample: (n) => '10'.padStart(n, '0'),
    },
    {
        name: 'description',
        label: '<description>',
        description: 'Description (letters, numbers, hyphens)',
        control: 'static',
        template: '[A-Za-z0-9]+(?:-[A-Za-z0-9]+)*',
        example: 'comp',
        expect: 'letters, numbers and hyphens (e.g. comp, roto-main)',
    },
    {
        name: 'pixelMappingName',
        label: '<pixelMappingName>',
        description: 'Pixel mapping name',
        control: 'choice',
        options: ['LL180', 'LL360'],
    },
    {
        name: 'resolution',
        label: '<resolution>',
        description: 'Resolution abbreviation (e.g. 1k, 4k)',
        control: 'static',
        template: '\\d{1,2}[kK]',
        example: '4k',
        expect: 'a resolution like 2k, 4k or 12k',
    },
    {
        name: 'colorspaceGamma',
        label: '<colorspaceGamma>',
        description: 'Colorspace and gamma',
        control: 'multichoice',
        options: ['r709g24', 'sRGBg22', 'acescglin', 'ap0lin', 'ap1g22', 'p3g26', 'rec2020lin'],
    },
    {
        name: 'fps',
        label: '<fps>',
        description: 'Frames per second',
        control: 'choice',
        options: ['2997', '5994', '24', '25', '30', '50', '60'],
    },
    {
        name: 'version',
        label: '<version>',
        description: 'Version (v + digits)',
        control: 'spinner',
        template: 'v\\d{{n}}',
        bounds: { min: 2, max: 6 },
        defaultWidth: 3,
        expect: 'v followed by {n} digits',
        sample: (n) => `v${'1'.padStart(n, '0')}`,
    },
    {
        name: 'frame_padding',
        label: '<frame_padding>',
        description: 'Frame padding (%04d, ####, or frame digits)',
        control: 'range',
        template: '(?:%0[{min}-{max}]d|#{{min},{max}}|\\d{{min},{max}})',
        bounds: { min: 1, max: 9 },
        defaultRange: { min: 4, max: 8 },
        expect: 'frame padding of {min} to {max} (e.g. %0{min}d, ####)',
        sample: (min) => '#'.repeat(min),
    },
    {
        name: 'extension',
        label: '<extension>',
        description: 'File extension',
        control: 'multichoice',
        options: ['exr', 'jpg', 'jpeg', 'png', 'mxf', 'mov', 'tiff', 'dpx'],
    },
    {
        name: 'text',
        label: '<text>',
        description: 'Fixed text',
        control: 'text',
    },
];

const BY_NAME = new Map(TOKEN_KINDS.map((k) => [k.name, k]));

/**
 * Look up a token kind by catalog name.
 */
export function getTokenKind(name: string): TokenKind | undefined {
    return BY_NAME.get(name);
}

/**
 * All catalog kinds in authoring order.
 */
export function listTokenKinds(): readonly TokenKind[] {
    return TOKEN_KINDS;
}
