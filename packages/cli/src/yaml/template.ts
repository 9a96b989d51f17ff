import { parseDocument, isSeq, isScalar } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';
import type { TokenDescriptorInput } from '@framecheck/shared';

const ENTRIES_PATH = ['filename', 'template', 'entries'];

/**
 * Appends a token descriptor to the filename template of a rules file while
 * preserving comments and formatting of everything already there.
 */
export async function appendTokenToYaml(filePath: string, descriptor: TokenDescriptorInput): Promise<void> {
    let content = '';
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (isMissingFile(err)) {
            content = '# Naming rules\n';
        } else {
            throw err;
        }
    }

    const doc = parseDocument(content);
    const entries = doc.getIn(ENTRIES_PATH, true);

    if (isSeq(entries)) {
        entries.add(doc.createNode(descriptor));
    } else if (entries === undefined || (isScalar(entries) && entries.value === null)) {
        doc.setIn(ENTRIES_PATH, doc.createNode([descriptor]));
    } else {
        throw new Error(`Invalid YAML structure in ${filePath}: "${ENTRIES_PATH.join('.')}" must be a list.`);
    }

    await writeFile(filePath, doc.toString());
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
