import { describe, it, expect } from 'vitest';
import { fastMatch, matchesTemplate, checkVersionPadding } from '../../src/matcher/index.js';
import { compileTemplate } from '../../src/compiler/index.js';
import { template, SHOT_ENTRIES, SHOT_TEMPLATE } from '../helpers.js';

describe('fastMatch', () => {
    const compiled = compileTemplate(SHOT_TEMPLATE);

    it('accepts conforming names', () => {
        expect(fastMatch(compiled, 'ABCD0123_v001.exr')).toBe(true);
        expect(fastMatch(compiled, 'wxyz9999_v120.mov')).toBe(true);
    });

    it('rejects names that do not match end to end', () => {
        expect(fastMatch(compiled, 'ABCD0123_v001.exr.bak')).toBe(false);
        expect(fastMatch(compiled, 'render/ABCD0123_v001.exr')).toBe(false);
        expect(fastMatch(compiled, 'ABCD0123_v01.exr')).toBe(false);
    });

    it('compares enumerated values case-sensitively by default', () => {
        expect(fastMatch(compiled, 'ABCD0123_v001.EXR')).toBe(false);
    });

    it('uses the pattern override when one is set', () => {
        const withOverride = compileTemplate(template(SHOT_ENTRIES, '.*\\.exr'));
        expect(fastMatch(withOverride, 'anything.exr')).toBe(true);
        expect(fastMatch(withOverride, 'ABCD0123_v001.mov')).toBe(false);
        expect(matchesTemplate(withOverride, 'anything.exr')).toBe(false);
        expect(matchesTemplate(withOverride, 'ABCD0123_v001.mov')).toBe(true);
    });
});

describe('checkVersionPadding', () => {
    const entries = SHOT_TEMPLATE.entries;

    it('flags a short version digit run', () => {
        expect(checkVersionPadding(entries, 'ABCD0123_v01.exr')).toEqual([
            {
                kind: 'padding',
                label: '<version>',
                expected: '3 digits',
                found: 'v01',
                message: "<version>: 'v01' - Version is under-padded, expected 3 digits (e.g. v001)",
            },
        ]);
    });

    it('reports a short run once when several version tokens apply', () => {
        const twoVersions = template([
            { kind: 'version', value: 3, separator: '_' },
            { kind: 'version', value: 3, label: 'comp version' },
        ]).entries;
        expect(checkVersionPadding(twoVersions, 'v01_v001').map((e) => e.message)).toEqual([
            "<version>: 'v01' - Version is under-padded, expected 3 digits (e.g. v001)",
        ]);
    });

    it('passes padded versions', () => {
        expect(checkVersionPadding(entries, 'ABCD0123_v001.exr')).toEqual([]);
        expect(checkVersionPadding(entries, 'ABCD0123_v0012.exr')).toEqual([]);
    });

    it('ignores a v that is part of a word', () => {
        expect(checkVersionPadding(entries, 'rev2_v001.exr')).toEqual([]);
    });

    it('does nothing without a version token', () => {
        expect(checkVersionPadding(template([{ kind: 'shotNumber' }]).entries, 'v1')).toEqual([]);
    });
});
