import { join, dirname, basename, extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        reports: join(root, 'reports'),
        config: {
            rulesPath: join(root, 'config', 'naming-rules.yaml'),
            defaultRulesPath: resolveDefaultRulesPath(),
        },
    };
}

/**
 * Rules shipped with the CLI, used when no workspace rules file exists.
 */
export function resolveDefaultRulesPath(): string {
    // In dev: packages/cli/src/workspace/paths.ts -> __dirname = packages/cli/src/workspace
    // In dist: packages/cli/dist/workspace/paths.js -> __dirname = packages/cli/dist/workspace
    const pkgRoot = join(__dirname, '..', '..');
    return join(pkgRoot, 'assets', 'default-rules.yaml');
}

/**
 * Default report location for a scene: reports/<scene name>-issues.xlsx
 */
export function getReportPath(workspace: Workspace, scenePath: string): string {
    const name = basename(scenePath, extname(scenePath));
    return join(workspace.reports, `${name}-issues.xlsx`);
}
