/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    Severity,
    WidthRange,
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
    DiagnosisEntryKind,
    DiagnosisEntry,
    FilenameValidationResult,
    SceneIssue,
} from '@framecheck/shared';

export {
    TokenDescriptorSchema,
    TemplateEntrySchema,
    NamingTemplateSchema,
    NamingRulesSchema,
    SceneSchema,
    DIAGNOSIS_PREVIEW_LENGTH,
    MAX_FILENAME_LENGTH,
    FINGERPRINT,
    FILE_NODE_CLASSES,
    VENDOR_COLORSPACE_CODES,
    COLORSPACE_SYNONYM_GROUPS,
    COLORSPACE_KEY_TERMS,
} from '@framecheck/shared';
