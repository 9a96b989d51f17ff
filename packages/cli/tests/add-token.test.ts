import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import { NamingRulesSchema } from '@framecheck/shared';
import { addToken, buildDescriptor, parseTokenValue } from '../src/commands/add-token.js';
import * as detect from '../src/workspace/detect.js';
import * as config from '../src/workspace/config.js';
import * as yamlTemplate from '../src/yaml/template.js';
import type { Workspace } from '../src/types.js';

vi.mock('node:fs');
vi.mock('../src/workspace/detect.js');
vi.mock('../src/workspace/config.js');
vi.mock('../src/yaml/template.js');

const WORKSPACE: Workspace = {
    root: '/mock/root',
    reports: '/mock/root/reports',
    config: {
        rulesPath: '/mock/root/config/naming-rules.yaml',
        defaultRulesPath: '/mock/default-rules.yaml',
    },
};

describe('add-token command', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        vi.spyOn(process, 'exit').mockImplementation(() => {
            throw new Error('process.exit');
        });

        vi.mocked(detect.findWorkspace).mockReturnValue(WORKSPACE);
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(config.loadRulesFile).mockReturnValue(
            NamingRulesSchema.parse({
                filename: {
                    template: {
                        entries: [
                            { kind: 'sequence', value: 4 },
                            { kind: 'shotNumber', value: 4, separator: '_' },
                        ],
                    },
                },
            })
        );
        vi.mocked(yamlTemplate.appendTokenToYaml).mockResolvedValue(undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should append a valid token to the workspace rules', async () => {
        await addToken('version', { value: '3', separator: '.' });

        expect(config.loadRulesFile).toHaveBeenCalledWith('/mock/root/config/naming-rules.yaml');
        expect(yamlTemplate.appendTokenToYaml).toHaveBeenCalledWith('/mock/root/config/naming-rules.yaml', {
            kind: 'version',
            value: 3,
            separator: '.',
        });
        expect(console.log).toHaveBeenCalledWith('→ Example: AAAA0010_v001');
    });

    it('should start a new template when the rules file does not exist', async () => {
        vi.mocked(fs.existsSync).mockReturnValue(false);

        await addToken('extension', { value: 'exr,mov' });

        expect(config.loadRulesFile).not.toHaveBeenCalled();
        expect(yamlTemplate.appendTokenToYaml).toHaveBeenCalledWith('/mock/root/config/naming-rules.yaml', {
            kind: 'extension',
            value: ['exr', 'mov'],
        });
    });

    it('should reject unknown token kinds', async () => {
        await expect(addToken('frameRate', {})).rejects.toThrow('process.exit');

        expect(console.error).toHaveBeenCalledWith('\n✖ Error: Unknown token kind "frameRate".');
        expect(yamlTemplate.appendTokenToYaml).not.toHaveBeenCalled();
    });

    it('should fail outside a workspace', async () => {
        vi.mocked(detect.findWorkspace).mockReturnValue(null);

        await expect(addToken('version', {})).rejects.toThrow('process.exit');

        expect(console.error).toHaveBeenCalledWith('\n✖ Error: Workspace not found.');
    });

    it('should reject values the token kind cannot take', async () => {
        await expect(addToken('version', { value: '9' })).rejects.toThrow('process.exit');

        expect(console.error).toHaveBeenCalledWith('\n✖ Error: <version>: Width 9 is outside 2-6');
        expect(yamlTemplate.appendTokenToYaml).not.toHaveBeenCalled();
    });

    it('should report write failures', async () => {
        vi.mocked(yamlTemplate.appendTokenToYaml).mockRejectedValue(new Error('read-only file system'));

        await expect(addToken('version', {})).rejects.toThrow('process.exit');

        expect(console.error).toHaveBeenCalledWith('\n✖ Failed to add token: read-only file system');
    });
});

describe('parseTokenValue', () => {
    it('should read widths, ranges, lists and single values', () => {
        expect(parseTokenValue('4')).toBe(4);
        expect(parseTokenValue(' 4-8 ')).toEqual({ min: 4, max: 8 });
        expect(parseTokenValue('exr, mov,')).toEqual(['exr', 'mov']);
        expect(parseTokenValue('LL180')).toBe('LL180');
    });
});

describe('buildDescriptor', () => {
    it('should keep only the options that were set', () => {
        expect(buildDescriptor('version', {})).toEqual({ kind: 'version' });
        expect(
            buildDescriptor('text', {
                value: 'plate',
                separator: '_',
                optional: true,
                prefix: 'x',
                suffix: 'y',
                ignoreCase: true,
                label: 'Plate tag',
            })
        ).toEqual({
            kind: 'text',
            value: 'plate',
            separator: '_',
            optional: true,
            prefix: 'x',
            suffix: 'y',
            ignore_case: true,
            label: 'Plate tag',
        });
    });
});
