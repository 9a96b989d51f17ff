import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { resolveWorkspace } from './paths.js';
import type { Workspace } from '../types.js';

/**
 * Searches for the workspace root by looking for 'config/naming-rules.yaml'.
 * Starts at startPath and bubbles up to the root.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        const configPath = join(current, 'config', 'naming-rules.yaml');
        if (existsSync(configPath)) {
            return current;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}

/**
 * Workspace for a command: the explicit --workspace root, else the detected one.
 */
export function findWorkspace(explicitRoot?: string): Workspace | null {
    const root = explicitRoot || detectWorkspaceRoot();
    return root ? resolveWorkspace(root) : null;
}
