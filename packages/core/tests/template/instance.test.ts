import { describe, it, expect } from 'vitest';
import { resolveInstance, labelOf } from '../../src/template/index.js';
import { PatternError } from '../../src/compiler/index.js';
import { TokenDescriptorSchema } from '../../src/types/index.js';
import type { TokenDescriptorInput } from '../../src/types/index.js';

const descriptor = (input: TokenDescriptorInput) => TokenDescriptorSchema.parse(input);

describe('resolveInstance', () => {
    it('resolves a fixed-width digit token', () => {
        const instance = resolveInstance(descriptor({ kind: 'shotNumber', value: 4 }));
        expect(instance.fragment).toBe('\\d{4}');
        expect(instance.sample).toBe('0010');
        expect(instance.expected).toBe('4 digits');
        expect(instance.digitWidth).toBe(4);
    });

    it('uses the default width when no value is set', () => {
        const instance = resolveInstance(descriptor({ kind: 'sequence' }));
        expect(instance.fragment).toBe('[A-Za-z]{4}');
        expect(instance.expected).toBe('4 letters');
        expect(instance.digitWidth).toBeUndefined();
    });

    it('wraps the fragment in escaped prefix and suffix', () => {
        const instance = resolveInstance(descriptor({ kind: 'shotNumber', value: 3, prefix: 'sh', suffix: '.' }));
        expect(instance.fragment).toBe('sh\\d{3}\\.');
        expect(instance.sample).toBe('sh010.');
    });

    it('builds a non-capturing alternation for choice values', () => {
        const instance = resolveInstance(descriptor({ kind: 'extension', value: ['exr', 'mov'] }));
        expect(instance.fragment).toBe('(?:exr|mov)');
        expect(instance.sample).toBe('exr');
        expect(instance.expected).toBe('one of exr, mov');
    });

    it('uses every option when a choice has no value', () => {
        const instance = resolveInstance(descriptor({ kind: 'pixelMappingName' }));
        expect(instance.fragment).toBe('(?:LL180|LL360)');
    });

    it('accepts a numeric choice value', () => {
        const instance = resolveInstance(descriptor({ kind: 'fps', value: 24 }));
        expect(instance.fragment).toBe('(?:24)');
        expect(instance.expected).toBe("'24'");
    });

    it('spells out case-insensitive choices', () => {
        const instance = resolveInstance(descriptor({ kind: 'extension', value: 'exr', ignore_case: true }));
        expect(instance.fragment).toBe('(?:[eE][xX][rR])');
    });

    it('escapes text values', () => {
        const instance = resolveInstance(descriptor({ kind: 'text', value: 'beauty.v2' }));
        expect(instance.fragment).toBe('beauty\\.v2');
        expect(instance.expected).toBe("literal value 'beauty.v2'");
    });

    it('resolves frame padding ranges', () => {
        const instance = resolveInstance(descriptor({ kind: 'frame_padding', value: { min: 4, max: 6 } }));
        expect(instance.fragment).toBe('(?:%0[4-6]d|#{4,6}|\\d{4,6})');
        expect(instance.sample).toBe('####');
        expect(new RegExp(`^${instance.fragment}$`).test('%05d')).toBe(true);
        expect(new RegExp(`^${instance.fragment}$`).test('###')).toBe(false);
    });

    it('rejects widths outside the kind bounds', () => {
        expect(() => resolveInstance(descriptor({ kind: 'version', value: 7 }))).toThrow(
            new PatternError('<version>', 'Width 7 is outside 2-6')
        );
    });

    it('rejects values on static kinds', () => {
        expect(() => resolveInstance(descriptor({ kind: 'resolution', value: '4k' }))).toThrow(
            'Token kind "resolution" takes no value'
        );
    });

    it('rejects options the kind does not offer', () => {
        expect(() => resolveInstance(descriptor({ kind: 'extension', value: ['exr', 'gif'] }))).toThrow(
            'Unknown option(s) "gif"; expected exr, jpg, jpeg, png, mxf, mov, tiff, dpx'
        );
    });

    it('rejects several values on a single-choice kind', () => {
        expect(() => resolveInstance(descriptor({ kind: 'fps', value: ['24', '25'] }))).toThrow(
            'Token kind "fps" takes a single choice'
        );
    });

    it('rejects text tokens without a value', () => {
        expect(() => resolveInstance(descriptor({ kind: 'text' }))).toThrow(
            'Text token requires a non-empty literal value'
        );
    });

    it('rejects unknown kinds', () => {
        expect(() => resolveInstance(descriptor({ kind: 'shot' }))).toThrow('Unknown token kind "shot"');
    });
});

describe('labelOf', () => {
    it('prefers the configured label', () => {
        expect(labelOf(descriptor({ kind: 'shotNumber', label: 'shot' }))).toBe('shot');
    });

    it('falls back to the kind label', () => {
        expect(labelOf(descriptor({ kind: 'shotNumber' }))).toBe('<shotNumber>');
        expect(labelOf(descriptor({ kind: 'shot' }))).toBe('<shot>');
    });
});
