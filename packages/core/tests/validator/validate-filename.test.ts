import { describe, it, expect } from 'vitest';
import { createFilenameValidator } from '../../src/validator/index.js';
import { CompileError } from '../../src/compiler/index.js';
import { template, SHOT_ENTRIES, SHOT_TEMPLATE } from '../helpers.js';

describe('createFilenameValidator', () => {
    const validator = createFilenameValidator(SHOT_TEMPLATE);

    it('accepts conforming names on the fast path', () => {
        expect(validator.validate('ABCD0123_v001.exr')).toEqual({
            filename: 'ABCD0123_v001.exr',
            valid: true,
            path: 'fast',
            diagnosis: [],
            entries: [],
            warnings: [],
        });
    });

    it('diagnoses rejected names on the detailed path', () => {
        const result = validator.validate('ABCD123_v001.exr');
        expect(result.valid).toBe(false);
        expect(result.path).toBe('detailed');
        expect(result.diagnosis).toEqual(["<shotNumber>: '123' - Expected 4 digits (e.g. 0010)"]);
        expect(result.entries[0]).toMatchObject({ kind: 'token', label: '<shotNumber>', found: '123' });
    });

    it('rejects an empty filename', () => {
        const result = validator.validate('');
        expect(result.valid).toBe(false);
        expect(result.diagnosis).toEqual(['Empty filename']);
    });

    it('rejects over-long names before matching', () => {
        const result = validator.validate(`ABCD0123_v001.${'x'.repeat(300)}`);
        expect(result).toMatchObject({
            valid: false,
            path: 'fast',
            diagnosis: ['Filename is longer than 255 characters'],
        });
    });

    it('refuses templates whose adjacent tokens cannot be told apart', () => {
        const ambiguous = template([{ kind: 'description' }, { kind: 'description' }, { kind: 'version' }]);
        expect(() => createFilenameValidator(ambiguous)).toThrow(CompileError);
    });

    it('rejects everything when the template has no tokens', () => {
        expect(createFilenameValidator(template([])).validate('ABCD').diagnosis).toEqual(['No template configured']);
        expect(createFilenameValidator(template([{ literal: '_' }])).validate('_').diagnosis).toEqual([
            'No template configured',
        ]);
    });

    it('throws CompileError for a template that cannot compile', () => {
        expect(() => createFilenameValidator(template([{ kind: 'sequence', value: 1 }]))).toThrow(CompileError);
    });

    describe('with a pattern override', () => {
        const loose = createFilenameValidator(template(SHOT_ENTRIES, '[A-Z]{4}_\\d+_v\\d+\\.exr'));

        it('lets the override decide acceptance and warns when the template disagrees', () => {
            const result = loose.validate('ABCD_10_v001.exr');
            expect(result.valid).toBe(true);
            expect(result.path).toBe('fast');
            expect(result.warnings).toEqual([
                "'ABCD_10_v001.exr' is accepted by pattern override but not by the token template",
            ]);
        });

        it('still catches under-padded versions', () => {
            const result = loose.validate('ABCD_10_v01.exr');
            expect(result.valid).toBe(false);
            expect(result.diagnosis).toEqual([
                "<version>: 'v01' - Version is under-padded, expected 3 digits (e.g. v001)",
            ]);
        });

        it('does not warn when both agree', () => {
            const both = createFilenameValidator(template(SHOT_ENTRIES, '.*\\.exr'));
            expect(both.validate('ABCD0123_v001.exr').warnings).toEqual([]);
        });

        it('names the override when only the override rejects', () => {
            const strict = createFilenameValidator(template(SHOT_ENTRIES, '.*\\.mov'));
            const result = strict.validate('ABCD0123_v001.exr');
            expect(result.valid).toBe(false);
            expect(result.path).toBe('detailed');
            expect(result.entries).toEqual([
                {
                    kind: 'override',
                    expected: '.*\\.mov',
                    found: 'ABCD0123_v001.exr',
                    message: "'ABCD0123_v001.exr' does not match the pattern override .*\\.mov",
                },
            ]);
        });

        it('explains rejections with the token walk', () => {
            const strict = createFilenameValidator(template(SHOT_ENTRIES, '.*\\.mov'));
            expect(strict.validate('ABCD123_v001.exr').diagnosis).toEqual([
                "<shotNumber>: '123' - Expected 4 digits (e.g. 0010)",
            ]);
        });
    });
});
