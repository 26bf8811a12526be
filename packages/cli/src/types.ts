/**
 * spendsort CLI - Core Types
 */

export interface CategorizeOptions {
    /** Re-categorize rows that already carry a category. */
    all: boolean;
    /** Ask for a category when no tier is confident, and learn the answer. */
    interactive: boolean;
    dryRun: boolean;
    workspace?: string;
}

export interface LearnOptions {
    workspace?: string;
}

export interface AddRuleOptions {
    workspace?: string;
}

export interface WorkspaceConfig {
    rulesPath: string;
    categoriesPath: string;
    settingsPath: string;
}

export interface Workspace {
    root: string;
    outputs: string;
    config: WorkspaceConfig;
}
