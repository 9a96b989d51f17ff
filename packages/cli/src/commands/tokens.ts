import { listTokenKinds } from '@framecheck/core';
import type { TokenKind } from '@framecheck/core';
import { log } from '../utils/console.js';

/**
 * Lists the token catalog.
 */
export async function listTokens(): Promise<void> {
    log('\nToken kinds:');
    for (const kind of listTokenKinds()) {
        log(`  ${kind.name.padEnd(18)} ${kind.control.padEnd(12)} ${kind.description}${optionsOf(kind)}`);
    }
}

function optionsOf(kind: TokenKind): string {
    switch (kind.control) {
        case 'choice':
        case 'multichoice':
            return ` [${kind.options.join(', ')}]`;
        case 'spinner':
        case 'range':
            return ` [${kind.bounds.min}-${kind.bounds.max}]`;
        default:
            return '';
    }
}
