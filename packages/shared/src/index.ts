// Schemas
export {
    SeveritySchema,
    WidthRangeSchema,
    TokenValueSchema,
    TokenDescriptorSchema,
    LiteralEntrySchema,
    TemplateEntrySchema,
    NamingTemplateSchema,
    FilenameRuleSchema,
    ColorspaceRuleSchema,
    NamingRulesSchema,
    SceneNodeSchema,
    SceneSchema,
    DiagnosisEntryKindSchema,
    DiagnosisEntrySchema,
    FilenameValidationResultSchema,
    SceneIssueSchema,
} from './schemas.js';

// Types
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
} from './schemas.js';

// Constants
export {
    DIAGNOSIS_PREVIEW_LENGTH,
    MAX_FILENAME_LENGTH,
    FINGERPRINT,
    DEFAULT_SEVERITY,
    FILE_NODE_CLASSES,
    VENDOR_COLORSPACE_CODES,
    COLORSPACE_SYNONYM_GROUPS,
    COLORSPACE_KEY_TERMS,
} from './constants.js';
