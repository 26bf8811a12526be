import { basename, extname, join } from 'node:path';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        outputs: join(root, 'outputs'),
        config: {
            rulesPath: join(root, 'config', 'rules.yaml'),
            categoriesPath: join(root, 'config', 'categories.yaml'),
            settingsPath: join(root, 'config', 'settings.yaml'),
        },
    };
}

/**
 * outputs/<input name>.categorized.xlsx
 */
export function getOutputPath(workspace: Workspace, inputPath: string): string {
    const name = basename(inputPath, extname(inputPath));
    return join(workspace.outputs, `${name}.categorized.xlsx`);
}
