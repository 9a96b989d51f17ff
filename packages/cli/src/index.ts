#!/usr/bin/env node
/**
 * framecheck CLI
 *
 * Thin shell around @framecheck/core:
 * - CLI handles all file I/O (rules, scenes, reports)
 * - Core receives plain data and returns diagnoses, never logs
 */

import { Command } from 'commander';
import { validateNames } from './commands/validate.js';
import { showCompiled } from './commands/compile.js';
import { listTokens } from './commands/tokens.js';
import { checkColorspaceValue } from './commands/colorspace.js';
import { addToken } from './commands/add-token.js';
import { checkScene } from './commands/check.js';
import { errorMessage } from './utils/console.js';

const program = new Command();

program
    .name('framecheck')
    .description('Validate render file names and colorspaces against naming rules')
    .version('1.0.0');

// ============================================
// FILENAME COMMANDS
// ============================================

program
    .command('validate <names...>')
    .description('Validate file names against the filename template')
    .option('--fix', 'Suggest a conforming name for each invalid file name')
    .option('--json', 'Output results as JSON')
    .option('-w, --workspace <path>', 'Workspace root')
    .action(validateNames);

program
    .command('compile')
    .description('Show the compiled pattern and an example file name')
    .option('-w, --workspace <path>', 'Workspace root')
    .action(showCompiled);

program
    .command('tokens')
    .description('List the available token kinds')
    .action(listTokens);

program
    .command('add-token <kind>')
    .description('Append a token to the filename template')
    .option('--value <value>', 'Width (4), width range (4-8), choice list (exr,mov) or literal text')
    .option('--separator <text>', 'Separator that follows the token')
    .option('--optional', 'Token may be absent')
    .option('--prefix <text>', 'Literal text before the token')
    .option('--suffix <text>', 'Literal text after the token')
    .option('--ignore-case', 'Match choice or text values case-insensitively')
    .option('--label <label>', 'Display label used in diagnoses')
    .option('-w, --workspace <path>', 'Workspace root')
    .action(addToken);

// ============================================
// SCENE COMMANDS
// ============================================

program
    .command('colorspace <value>')
    .description('Check a colorspace against the allow-list of a node class')
    .requiredOption('--class <class>', 'Node class (Read, Write)')
    .option('-w, --workspace <path>', 'Workspace root')
    .action(checkColorspaceValue);

program
    .command('check <scene>')
    .description('Check an exported scene (JSON or YAML) and write an issues report')
    .option('--report <file>', 'Report path (.xlsx)')
    .option('--dry-run', 'Check without writing a report', false)
    .option('-w, --workspace <path>', 'Workspace root')
    .action(checkScene);

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(`\n✖ Unexpected error: ${errorMessage(err)}`);
    process.exit(1);
});
