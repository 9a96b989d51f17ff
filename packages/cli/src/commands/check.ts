import { basename } from 'node:path';
import type { NamingRules, SceneIssue } from '@framecheck/core';
import { findWorkspace } from '../workspace/detect.js';
import { loadRules } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { log, success, warn, info, arrow, failure, fail, errorMessage } from '../utils/console.js';
import type { CheckOptions } from '../types.js';

export async function checkScene(scenePath: string, options: CheckOptions): Promise<void> {
    log(`\nframecheck - Checking ${basename(scenePath)}`);

    // 1. Workspace detection
    arrow('Detecting workspace...');
    const workspace = findWorkspace(options.workspace);
    if (workspace) {
        success(`Workspace: ${workspace.root}`);
    } else {
        info('No workspace found; using the default naming rules.');
    }

    // 2. Load rules
    let rules: NamingRules;
    try {
        rules = loadRules(workspace);
    } catch (err) {
        fail(`Failed to load naming rules. ${errorMessage(err)}`);
    }

    // 3. Run Pipeline
    const state = await runPipeline(scenePath, workspace, rules, options);

    // 4. Report Final Status
    log('\n--- Check Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            console.error(`✖ ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Check failed with fatal errors.');
            process.exit(1);
        }
    }

    for (const issue of state.issues) {
        reportIssue(issue);
    }

    const checked = state.nodes.filter((n) => !n.disabled).length;
    success(`Checked ${checked} node(s): ${state.issues.length} issue(s) found.`);

    if (state.reportPath) {
        arrow(`Report saved to: ${state.reportPath}`);
    } else if (state.options.dryRun) {
        log('\n[DRY RUN] No report was written.');
    }

    if (state.issues.some((i) => i.severity === 'error')) {
        process.exitCode = 1;
    }
}

function reportIssue(issue: SceneIssue): void {
    const line = `[${issue.severity}] ${issue.node} (${issue.node_class}) ${issue.check}: ${issue.current}`;
    if (issue.severity === 'error') {
        failure(line);
    } else if (issue.severity === 'warning') {
        warn(line);
    } else {
        info(line);
    }
    for (const message of issue.messages) {
        arrow(message);
    }
}
