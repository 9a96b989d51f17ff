/**
 * framecheck CLI - Core Types
 */

export interface WorkspaceOptions {
    workspace?: string;
}

export interface ValidateOptions extends WorkspaceOptions {
    fix?: boolean;
    json?: boolean;
}

export interface ColorspaceOptions extends WorkspaceOptions {
    class: string;
}

export interface AddTokenOptions extends WorkspaceOptions {
    value?: string;
    separator?: string;
    optional?: boolean;
    prefix?: string;
    suffix?: string;
    ignoreCase?: boolean;
    label?: string;
}

export interface CheckOptions extends WorkspaceOptions {
    report?: string;
    dryRun: boolean;
}

export interface WorkspaceConfig {
    rulesPath: string;
    defaultRulesPath: string;
}

export interface Workspace {
    root: string;
    reports: string;
    config: WorkspaceConfig;
}
