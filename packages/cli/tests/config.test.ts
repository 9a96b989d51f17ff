import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync, unlinkSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { compileTemplate } from '@framecheck/core';
import { loadRulesFile, loadRules, rulesPathFor } from '../src/workspace/config.js';
import { resolveDefaultRulesPath, resolveWorkspace } from '../src/workspace/paths.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const TEMP_RULES_FILE = join(__dirname, 'temp-config-rules.yaml');

describe('Rules Loading', () => {
    afterEach(() => {
        if (existsSync(TEMP_RULES_FILE)) {
            unlinkSync(TEMP_RULES_FILE);
        }
    });

    it('should load the packaged default rules', () => {
        const rules = loadRulesFile(resolveDefaultRulesPath());

        expect(rules.filename?.severity).toBe('warning');
        expect(rules.filename?.template.entries).toHaveLength(4);
        expect(rules.colorspaces.Read.allowed).toEqual(['ACES - ACEScg', 'Output - Rec.709', 'sRGB']);
        expect(rules.colorspaces.Write.severity).toBe('error');
    });

    it('should ship default rules that compile', () => {
        const rules = loadRulesFile(resolveDefaultRulesPath());
        const template = rules.filename?.template ?? { entries: [] };

        expect(compileTemplate(template).example).toBe('AAAA0010_v001.exr');
    });

    it('should fall back to the default rules outside a workspace', () => {
        expect(rulesPathFor(null)).toBe(resolveDefaultRulesPath());
        expect(rulesPathFor(resolveWorkspace(join(__dirname, 'no-such-workspace')))).toBe(resolveDefaultRulesPath());
        expect(loadRules(null).filename).toBeDefined();
    });

    it('should treat an empty rules file as no rules', () => {
        writeFileSync(TEMP_RULES_FILE, '# nothing yet\n', 'utf8');

        expect(loadRulesFile(TEMP_RULES_FILE)).toEqual({ colorspaces: {} });
    });

    it('should report where a rules file is invalid', () => {
        writeFileSync(TEMP_RULES_FILE, 'colorspaces:\n  Read:\n    severity: fatal\n', 'utf8');

        expect(() => loadRulesFile(TEMP_RULES_FILE)).toThrow(/^Invalid rules file .*colorspaces\.Read\.severity: /);
    });

    it('should report a missing rules file', () => {
        expect(() => loadRulesFile(TEMP_RULES_FILE)).toThrow(`Rules file not found: ${TEMP_RULES_FILE}`);
    });
});
