import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { NamingRulesSchema, type NamingRules } from '@framecheck/shared';
import { resolveDefaultRulesPath } from './paths.js';
import type { Workspace } from '../types.js';

/**
 * Path of the rules file in effect: the workspace's own rules when present,
 * the packaged defaults otherwise.
 */
export function rulesPathFor(workspace: Workspace | null): string {
    if (workspace && existsSync(workspace.config.rulesPath)) {
        return workspace.config.rulesPath;
    }
    return workspace ? workspace.config.defaultRulesPath : resolveDefaultRulesPath();
}

/**
 * Loads the naming rules in effect for a workspace.
 */
export function loadRules(workspace: Workspace | null): NamingRules {
    return loadRulesFile(rulesPathFor(workspace));
}

/**
 * Loads and validates one naming rules file.
 */
export function loadRulesFile(path: string): NamingRules {
    if (!existsSync(path)) {
        throw new Error(`Rules file not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);

    const parsed = NamingRulesSchema.safeParse(data ?? {});
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new Error(`Invalid rules file ${path}: ${issues.join('; ')}`);
    }
    return parsed.data;
}
