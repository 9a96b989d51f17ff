import { describe, it, expect } from 'vitest';
import { suggestFilename } from '../../src/validator/index.js';
import { template, SHOT_TEMPLATE } from '../helpers.js';

describe('suggestFilename', () => {
    const entries = SHOT_TEMPLATE.entries;

    it('pads a short shot number', () => {
        expect(suggestFilename(entries, 'ABCD123_v001.exr')).toBe('ABCD0123_v001.exr');
    });

    it('pads a short version', () => {
        expect(suggestFilename(entries, 'ABCD0123_v01.exr')).toBe('ABCD0123_v001.exr');
    });

    it('inserts a missing token separator', () => {
        expect(suggestFilename(entries, 'ABCD0123v001.exr')).toBe('ABCD0123_v001.exr');
    });

    it('repairs several faults at once', () => {
        expect(suggestFilename(entries, 'ABCD12v1.exr')).toBe('ABCD0012_v001.exr');
    });

    it('inserts a missing literal entry', () => {
        const t = template([{ kind: 'sequence' }, { literal: '_' }, { kind: 'shotNumber' }]);
        expect(suggestFilename(t.entries, 'ABCD0123')).toBe('ABCD_0123');
    });

    it('pads an optional trailing token behind its separator', () => {
        const t = template([
            { kind: 'shotNumber', separator: '_' },
            { kind: 'version', optional: true },
        ]);
        expect(suggestFilename(t.entries, '0010_v01')).toBe('0010_v001');
        expect(suggestFilename(t.entries, '0010')).toBeNull();
    });

    it('returns null for names that already conform', () => {
        expect(suggestFilename(entries, 'ABCD0123_v001.exr')).toBeNull();
    });

    it('returns null when a fault is not a padding or separator fault', () => {
        expect(suggestFilename(entries, 'ABCD0123_v001.png')).toBeNull();
        expect(suggestFilename(entries, 'XY0123_v001.exr')).toBeNull();
        expect(suggestFilename(entries, 'ABCD01234_v001.exr')).toBeNull();
    });

    it('returns null when the template itself is broken', () => {
        const t = template([{ kind: 'shotNumber', value: 20 }]);
        expect(suggestFilename(t.entries, '12')).toBeNull();
    });
});
