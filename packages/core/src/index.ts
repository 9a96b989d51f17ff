// Types (re-exported from shared)
export type {
    Severity,
    TokenValue,
    TokenDescriptor,
    TokenDescriptorInput,
    LiteralEntry,
    TemplateEntry,
    TemplateEntryInput,
    NamingTemplate,
    NamingTemplateInput,
    FilenameRule,
    ColorspaceRule,
    NamingRules,
    SceneNode,
    Scene,
    DiagnosisEntry,
    FilenameValidationResult,
    SceneIssue,
} from './types/index.js';

export {
    TokenDescriptorSchema,
    TemplateEntrySchema,
    NamingTemplateSchema,
    NamingRulesSchema,
    SceneSchema,
    DIAGNOSIS_PREVIEW_LENGTH,
    MAX_FILENAME_LENGTH,
    FILE_NODE_CLASSES,
} from './types/index.js';

// Catalog
export { getTokenKind, listTokenKinds } from './catalog/index.js';
export type { TokenKind, ControlShape } from './catalog/index.js';

// Template
export { resolveInstance, isLiteralEntry, labelOf, TemplateStore } from './template/index.js';
export type { ResolvedInstance, TemplateListener } from './template/index.js';

// Compiler
export { compileTemplate, compileOverride, CompileError, PatternError } from './compiler/index.js';
export type { CompiledPattern, CompiledOverride } from './compiler/index.js';

// Matchers
export { fastMatch, matchesTemplate, checkVersionPadding, diagnose, diagnoseEntries } from './matcher/index.js';

// Validator
export { createFilenameValidator, validateFilename, suggestFilename } from './validator/index.js';
export type { FilenameValidator } from './validator/index.js';

// Fuzzy matcher
export { fuzzyMatch, fuzzyAccept } from './fuzzy/index.js';
export type { FuzzyMatch, FuzzyStage } from './fuzzy/index.js';

// Scene checks
export { checkSceneNodes, fileBasename } from './scene/index.js';

// Utils
export { normalizeConfiguredValue, fingerprintTemplate } from './utils/index.js';
