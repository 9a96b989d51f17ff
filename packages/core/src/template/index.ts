export { resolveInstance, isLiteralEntry, labelOf } from './instance.js';
export type { ResolvedInstance } from './instance.js';
export { TemplateStore } from './store.js';
export type { TemplateListener } from './store.js';
