/**
 * Command-line argument parsing.
 */

export interface ParsedArgs {
    command: string | undefined;
    positional: string[];
    flags: Set<string>;
    workspace?: string;
}

/**
 * Split argv into command, positional arguments and flags.
 * `--workspace` takes a value; every other `--flag` is boolean.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
    const positional: string[] = [];
    const flags = new Set<string>();
    let workspace: string | undefined;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--workspace') {
            workspace = argv[++i];
            if (workspace === undefined) {
                throw new Error('--workspace needs a directory');
            }
        } else if (arg.startsWith('--workspace=')) {
            workspace = arg.slice('--workspace='.length);
        } else if (arg.startsWith('--')) {
            flags.add(arg.slice(2));
        } else {
            positional.push(arg);
        }
    }

    const [command, ...rest] = positional;
    return { command, positional: rest, flags, workspace };
}
