import { readFileSync } from 'fs';
import { enableLoggers } from './logger';
import { runScript } from './script';

/**
 * `set-script <script-file>`
 * Runs a set script and prints the results. `SETS_DEBUG=registry,script`
 * (or `*`) turns on diagnostic logging.
 * @returns Process exit code.
 */
export function main(argv: string[], env: NodeJS.ProcessEnv = process.env): number {
    enableLoggers(env.SETS_DEBUG);

    if (argv.length !== 1) {
        console.error('Usage: set-script <script-file>');
        return 1;
    }

    const [file] = argv;
    let source: string;
    try {
        source = readFileSync(file, 'utf8');
    } catch {
        console.error(`Error: Cannot open file '${file}'`);
        return 1;
    }

    runScript(source);
    return 0;
}
