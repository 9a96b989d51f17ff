/**
 * Zod schemas for framecheck data structures.
 *
 * Everything read from a rules file or a scene export goes through these
 * schemas before the engine sees it. The engine itself only ever receives
 * the parsed (output) shapes.
 */

import { z } from 'zod';
import { DEFAULT_SEVERITY } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

export const SeveritySchema = z.enum(['error', 'warning', 'info']);

export type Severity = z.infer<typeof SeveritySchema>;

/**
 * Inclusive width range for variable-length tokens.
 */
export const WidthRangeSchema = z
    .object({
        min: z.number().int().min(0),
        max: z.number().int().min(0),
    })
    .refine((r) => r.min <= r.max, { message: 'min must not exceed max' });

export type WidthRange = z.infer<typeof WidthRangeSchema>;

/**
 * Configured parameter of a token instance:
 * a width, a width range, one enumerated value / literal, or a list of values.
 */
export const TokenValueSchema = z.union([
    z.number().int(),
    WidthRangeSchema,
    z.string(),
    z.array(z.string()).min(1),
]);

export type TokenValue = z.infer<typeof TokenValueSchema>;

// ============================================================================
// Template Schemas
// ============================================================================

/**
 * Persisted token instance descriptor.
 */
export const TokenDescriptorSchema = z.object({
    kind: z.string().min(1),
    value: TokenValueSchema.nullable().default(null),
    separator: z.string().default(''),
    optional: z.boolean().default(false),
    prefix: z.string().default(''),
    suffix: z.string().default(''),
    ignore_case: z.boolean().default(false),
    label: z.string().min(1).optional(),
});

export type TokenDescriptor = z.infer<typeof TokenDescriptorSchema>;
export type TokenDescriptorInput = z.input<typeof TokenDescriptorSchema>;

/**
 * Bare literal entry placed between token instances.
 */
export const LiteralEntrySchema = z.object({
    literal: z.string().min(1),
});

export type LiteralEntry = z.infer<typeof LiteralEntrySchema>;

export const TemplateEntrySchema = z.union([LiteralEntrySchema, TokenDescriptorSchema]);

export type TemplateEntry = z.infer<typeof TemplateEntrySchema>;
export type TemplateEntryInput = z.input<typeof TemplateEntrySchema>;

/**
 * Ordered template plus optional free-text override used by the fast path only.
 */
export const NamingTemplateSchema = z.object({
    entries: z.array(TemplateEntrySchema),
    pattern_override: z.string().min(1).optional(),
});

export type NamingTemplate = z.infer<typeof NamingTemplateSchema>;
export type NamingTemplateInput = z.input<typeof NamingTemplateSchema>;

// ============================================================================
// Rule Schemas
// ============================================================================

export const FilenameRuleSchema = z.object({
    template: NamingTemplateSchema,
    severity: SeveritySchema.default(DEFAULT_SEVERITY),
});

export type FilenameRule = z.infer<typeof FilenameRuleSchema>;

export const ColorspaceRuleSchema = z.object({
    allowed: z.array(z.string()).default([]),
    severity: SeveritySchema.default(DEFAULT_SEVERITY),
});

export type ColorspaceRule = z.infer<typeof ColorspaceRuleSchema>;

/**
 * Top-level naming rules file (config/naming-rules.yaml).
 */
export const NamingRulesSchema = z.object({
    filename: FilenameRuleSchema.optional(),
    colorspaces: z.record(z.string(), ColorspaceRuleSchema).default({}),
});

export type NamingRules = z.infer<typeof NamingRulesSchema>;

// ============================================================================
// Scene Schemas
// ============================================================================

/**
 * One node as exported by the host scene-graph layer.
 */
export const SceneNodeSchema = z.object({
    name: z.string().min(1),
    class: z.string().min(1),
    file: z.string().optional(),
    colorspace: z.string().optional(),
    disabled: z.boolean().default(false),
});

export type SceneNode = z.infer<typeof SceneNodeSchema>;

export const SceneSchema = z.object({
    nodes: z.array(SceneNodeSchema),
});

export type Scene = z.infer<typeof SceneSchema>;

// ============================================================================
// Diagnosis Schemas
// ============================================================================

export const DiagnosisEntryKindSchema = z.enum(['token', 'separator', 'trailing', 'pattern-error', 'padding', 'override']);

export type DiagnosisEntryKind = z.infer<typeof DiagnosisEntryKindSchema>;

/**
 * One structured diagnosis entry. `message` is the human-readable form.
 */
export const DiagnosisEntrySchema = z.object({
    kind: DiagnosisEntryKindSchema,
    message: z.string(),
    label: z.string().optional(),
    expected: z.string().optional(),
    found: z.string().optional(),
});

export type DiagnosisEntry = z.infer<typeof DiagnosisEntrySchema>;

export const FilenameValidationResultSchema = z.object({
    filename: z.string(),
    valid: z.boolean(),
    path: z.enum(['fast', 'detailed']),
    diagnosis: z.array(z.string()),
    entries: z.array(DiagnosisEntrySchema),
    warnings: z.array(z.string()),
});

export type FilenameValidationResult = z.infer<typeof FilenameValidationResultSchema>;

/**
 * Issue raised against a scene node.
 */
export const SceneIssueSchema = z.object({
    node: z.string(),
    node_class: z.string(),
    check: z.enum(['filename', 'colorspace']),
    severity: SeveritySchema,
    current: z.string(),
    expected: z.string(),
    messages: z.array(z.string()),
});

export type SceneIssue = z.infer<typeof SceneIssueSchema>;
