/**
 * Scene node checks.
 *
 * Applies the filename rule to the `file` of Read/Write nodes and the
 * colorspace allow-lists to every node class that has one.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Issues returned as data.
 */

import { createFilenameValidator } from '../validator/index.js';
import type { FilenameValidator } from '../validator/index.js';
import { fuzzyAccept } from '../fuzzy/index.js';
import { FILE_NODE_CLASSES } from '../types/index.js';
import type { NamingRules, SceneIssue, SceneNode } from '../types/index.js';

/**
 * Check scene nodes against naming rules.
 *
 * @throws CompileError when the filename template cannot be compiled
 */
export function checkSceneNodes(nodes: readonly SceneNode[], rules: NamingRules): SceneIssue[] {
    const validator = rules.filename ? createFilenameValidator(rules.filename.template) : null;
    const issues: SceneIssue[] = [];

    for (const node of nodes) {
        if (node.disabled) continue;

        if (validator && rules.filename) {
            const issue = checkFilename(node, validator, rules.filename.severity);
            if (issue) issues.push(issue);
        }

        const issue = checkColorspace(node, rules);
        if (issue) issues.push(issue);
    }

    return issues;
}

/**
 * Last path component; both separators are accepted since scenes are often
 * authored on one platform and checked on another.
 */
export function fileBasename(path: string): string {
    const cut = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\'));
    return path.slice(cut + 1);
}

function isFileNode(node: SceneNode): boolean {
    return FILE_NODE_CLASSES.some((c) => c === node.class);
}

function checkFilename(
    node: SceneNode,
    validator: FilenameValidator,
    severity: SceneIssue['severity']
): SceneIssue | null {
    if (!isFileNode(node) || !node.file) return null;

    const name = fileBasename(node.file);
    const result = validator.validate(name);
    if (result.valid) return null;

    return {
        node: node.name,
        node_class: node.class,
        check: 'filename',
        severity,
        current: name,
        expected: validator.compiled.example,
        messages: result.diagnosis,
    };
}

function checkColorspace(node: SceneNode, rules: NamingRules): SceneIssue | null {
    if (!Object.hasOwn(rules.colorspaces, node.class) || node.colorspace === undefined) return null;
    const rule = rules.colorspaces[node.class];

    const allowed = rule.allowed.filter((a) => a.trim() !== '');
    if (allowed.length === 0) return null;

    if (fuzzyAccept(node.colorspace, allowed)) return null;

    return {
        node: node.name,
        node_class: node.class,
        check: 'colorspace',
        severity: rule.severity,
        current: node.colorspace,
        expected: allowed.join(', '),
        messages: [`Colorspace '${node.colorspace}' is not one of ${allowed.join(', ')}`],
    };
}
