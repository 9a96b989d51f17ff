import { existsSync } from 'node:fs';
import {
    getTokenKind,
    listTokenKinds,
    resolveInstance,
    compileTemplate,
    TokenDescriptorSchema,
} from '@framecheck/core';
import type { CompiledPattern, NamingRules, TokenDescriptor, TokenDescriptorInput, TokenValue } from '@framecheck/core';
import { findWorkspace } from '../workspace/detect.js';
import { loadRulesFile } from '../workspace/config.js';
import { appendTokenToYaml } from '../yaml/template.js';
import { success, log, arrow, fail, errorMessage } from '../utils/console.js';
import type { AddTokenOptions } from '../types.js';

export async function addToken(kind: string, options: AddTokenOptions): Promise<void> {
    if (!getTokenKind(kind)) {
        fail(
            `Unknown token kind "${kind}".`,
            `Known kinds: ${listTokenKinds().map((k) => k.name).join(', ')}`
        );
    }

    // 1. Workspace detection
    const workspace = findWorkspace(options.workspace);
    if (!workspace) {
        fail('Workspace not found.', 'Expected "config/naming-rules.yaml" in the workspace root.');
    }
    const rulesPath = workspace.config.rulesPath;

    // 2. Validate the descriptor on its own
    const input = buildDescriptor(kind, options);
    const parsed = TokenDescriptorSchema.safeParse(input);
    if (!parsed.success) {
        fail(`Invalid token: ${parsed.error.issues.map((i) => i.message).join(', ')}`);
    }
    const descriptor: TokenDescriptor = parsed.data;

    try {
        resolveInstance(descriptor);
    } catch (err) {
        fail(errorMessage(err));
    }

    // 3. The template must still compile with the token appended
    let rules: NamingRules;
    try {
        rules = existsSync(rulesPath) ? loadRulesFile(rulesPath) : { colorspaces: {} };
    } catch (err) {
        fail(`Failed to load naming rules. ${errorMessage(err)}`);
    }

    const template = rules.filename?.template ?? { entries: [] };
    let compiled: CompiledPattern;
    try {
        compiled = compileTemplate({ ...template, entries: [...template.entries, descriptor] });
    } catch (err) {
        fail(errorMessage(err));
    }

    // 4. Perform addition
    log(`Adding new token to: ${rulesPath}`);

    try {
        await appendTokenToYaml(rulesPath, input);
    } catch (err) {
        console.error(`\n✖ Failed to add token: ${errorMessage(err)}`);
        process.exit(1);
    }

    success('Token successfully added!');
    arrow(`Kind:    ${kind}`);
    if (input.value !== undefined) {
        arrow(`Value:   ${JSON.stringify(input.value)}`);
    }
    arrow(`Pattern: ${compiled.source}`);
    arrow(`Example: ${compiled.example}`);
}

/**
 * Descriptor with only the fields the user set, so the rules file stays terse.
 */
export function buildDescriptor(kind: string, options: AddTokenOptions): TokenDescriptorInput {
    const descriptor: TokenDescriptorInput = { kind };
    if (options.value !== undefined) descriptor.value = parseTokenValue(options.value);
    if (options.separator) descriptor.separator = options.separator;
    if (options.optional) descriptor.optional = true;
    if (options.prefix) descriptor.prefix = options.prefix;
    if (options.suffix) descriptor.suffix = options.suffix;
    if (options.ignoreCase) descriptor.ignore_case = true;
    if (options.label) descriptor.label = options.label;
    return descriptor;
}

/**
 * Reads a --value argument: "4" is a width, "4-8" a width range,
 * "exr,mov" a list, anything else a single value.
 */
export function parseTokenValue(raw: string): TokenValue {
    const trimmed = raw.trim();
    if (/^\d+$/.test(trimmed)) {
        return parseInt(trimmed, 10);
    }
    const range = trimmed.match(/^(\d+)-(\d+)$/);
    if (range) {
        return { min: parseInt(range[1], 10), max: parseInt(range[2], 10) };
    }
    if (trimmed.includes(',')) {
        return trimmed.split(',').map((v) => v.trim()).filter((v) => v !== '');
    }
    return trimmed;
}
