/**
 * Template store: the authoring-side owner of a naming template.
 *
 * Every edit replaces the current snapshot with a new frozen one and notifies
 * subscribers. Readers validate against a snapshot, so an edit in flight never
 * changes a template that is being matched.
 */

import { compileTemplate } from '../compiler/index.js';
import type { CompiledPattern } from '../compiler/index.js';
import { NamingTemplateSchema, TemplateEntrySchema } from '../types/index.js';
import { fingerprintTemplate } from '../utils/fingerprint.js';
import type { NamingTemplate, NamingTemplateInput, TemplateEntryInput } from '../types/index.js';

export type TemplateListener = (template: NamingTemplate) => void;

export class TemplateStore {
    private snapshot: NamingTemplate;
    private cache: { fingerprint: string; pattern: CompiledPattern } | null = null;
    private readonly listeners = new Set<TemplateListener>();

    constructor(initial: NamingTemplateInput = { entries: [] }) {
        this.snapshot = freeze(NamingTemplateSchema.parse(initial));
    }

    /**
     * Current template snapshot.
     */
    current(): NamingTemplate {
        return this.snapshot;
    }

    /**
     * Compiled pattern of the current snapshot, compiled at most once per
     * distinct template.
     *
     * @throws CompileError
     */
    compiled(): CompiledPattern {
        const fingerprint = fingerprintTemplate(this.snapshot);
        if (this.cache && this.cache.fingerprint === fingerprint) {
            return this.cache.pattern;
        }
        const pattern = compileTemplate(this.snapshot);
        this.cache = { fingerprint, pattern };
        return pattern;
    }

    add(entry: TemplateEntryInput): void {
        this.insert(this.snapshot.entries.length, entry);
    }

    insert(index: number, entry: TemplateEntryInput): void {
        this.assertIndex(index, this.snapshot.entries.length);
        const entries = [...this.snapshot.entries];
        entries.splice(index, 0, TemplateEntrySchema.parse(entry));
        this.commit({ ...this.snapshot, entries });
    }

    remove(index: number): void {
        this.assertIndex(index, this.snapshot.entries.length - 1);
        const entries = this.snapshot.entries.filter((_, i) => i !== index);
        this.commit({ ...this.snapshot, entries });
    }

    move(from: number, to: number): void {
        const last = this.snapshot.entries.length - 1;
        this.assertIndex(from, last);
        this.assertIndex(to, last);
        const entries = [...this.snapshot.entries];
        const [moved] = entries.splice(from, 1);
        entries.splice(to, 0, moved);
        this.commit({ ...this.snapshot, entries });
    }

    update(index: number, entry: TemplateEntryInput): void {
        this.assertIndex(index, this.snapshot.entries.length - 1);
        const entries = [...this.snapshot.entries];
        entries[index] = TemplateEntrySchema.parse(entry);
        this.commit({ ...this.snapshot, entries });
    }

    setPatternOverride(pattern: string | undefined): void {
        const entries = this.snapshot.entries;
        this.commit(pattern ? { entries, pattern_override: pattern } : { entries });
    }

    replace(template: NamingTemplateInput): void {
        this.commit(NamingTemplateSchema.parse(template));
    }

    /**
     * Register a change listener.
     *
     * @returns Function that removes the listener
     */
    subscribe(listener: TemplateListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private commit(next: NamingTemplate): void {
        this.snapshot = freeze(next);
        for (const listener of this.listeners) {
            listener(this.snapshot);
        }
    }

    private assertIndex(index: number, max: number): void {
        if (!Number.isInteger(index) || index < 0 || index > max) {
            throw new RangeError(`Template index ${index} is out of range 0-${Math.max(max, 0)}`);
        }
    }
}

function freeze(template: NamingTemplate): NamingTemplate {
    for (const entry of template.entries) {
        Object.freeze(entry);
    }
    Object.freeze(template.entries);
    return Object.freeze(template);
}
