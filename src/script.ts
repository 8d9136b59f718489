/**
 * @module script
 * @description
 * Line-oriented front end over `SetRegistry<number>`.
 *
 * Format:
 * ```
 * A 3          # <name> <count>
 * 1 2 3        # <count> integers (read only when count > 0)
 * Q            # end of definitions
 * union A B    # one command per line, until EOF or `Q`
 * ```
 * Blank lines and lines starting with `#` are skipped in both blocks.
 */

import { SetRegistryError } from './errors';
import { LOG } from './logger';
import { NamedSet } from './named-set';
import { SetRegistry, isBinaryOperation, type BinaryOperation } from './registry';

const log = LOG.script;

export interface SetDefinition {
    name: string;
    values: number[];
    /** 1-based line of the header. */
    line: number;
}

export type ScriptCommand =
    | { kind: 'print' | 'size' | 'powerset'; name: string; line: number }
    | { kind: 'binary'; op: BinaryOperation; a: string; b: string; line: number }
    | { kind: 'issubset' | 'isequal' | 'cartesian'; a: string; b: string; line: number }
    | { kind: 'unknown'; token: string; line: number };

export interface Script {
    definitions: SetDefinition[];
    commands: ScriptCommand[];
}

/** Where results and per-command failures go. */
export interface ScriptOutput {
    print(line: string): void;
    error(line: string): void;
}

export const consoleOutput: ScriptOutput = {
    print: line => console.log(line),
    error: line => console.error(line),
};

const INTEGER = /^[+-]?\d+$/;
const END_OF_BLOCK = 'Q';

function isSkippable(line: string): boolean {
    return line === '' || line.startsWith('#');
}

/** Leading integer tokens of `line`; parsing stops at the first non-integer. */
export function parseIntList(line: string): number[] {
    const res: number[] = [];
    for (const token of line.trim().split(/\s+/)) {
        if (!INTEGER.test(token)) break;
        res.push(Number(token));
    }
    return res;
}

function parseCommand(tokens: string[], line: number): ScriptCommand {
    const [op, first = '', second = ''] = tokens;
    if (isBinaryOperation(op)) return { kind: 'binary', op, a: first, b: second, line };
    switch (op) {
        case 'print':
        case 'size':
        case 'powerset':
            return { kind: op, name: first, line };
        case 'issubset':
        case 'isequal':
        case 'cartesian':
            return { kind: op, a: first, b: second, line };
        default:
            return { kind: 'unknown', token: op, line };
    }
}

export function parseScript(source: string): Script {
    const lines = source.split(/\r?\n/);
    const definitions: SetDefinition[] = [];
    const commands: ScriptCommand[] = [];
    let i = 0;

    // Definition block
    while (i < lines.length) {
        const lineNo = i + 1;
        const line = lines[i++].trim();
        if (isSkippable(line)) continue;
        if (line === END_OF_BLOCK) break;

        const [name, countToken] = line.split(/\s+/);
        let count = 0;
        if (countToken !== undefined && INTEGER.test(countToken)) {
            count = Number(countToken);
        } else {
            log.warn(`line ${lineNo}: missing element count for set '${name}'`);
        }

        let values: number[] = [];
        if (count > 0 && i < lines.length) values = parseIntList(lines[i++]);
        definitions.push({ name, values, line: lineNo });
    }

    // Command block
    while (i < lines.length) {
        const lineNo = i + 1;
        const line = lines[i++].trim();
        if (isSkippable(line)) continue;
        if (line === END_OF_BLOCK) break;
        commands.push(parseCommand(line.split(/\s+/), lineNo));
    }

    return { definitions, commands };
}

function yesNo(b: boolean): string {
    return b ? 'Yes ✅' : 'No ❌';
}

/**
 * Executes parsed commands against a registry.
 * Registry failures are reported per command and never stop the run;
 * anything else propagates.
 */
export class ScriptInterpreter {
    constructor(
        readonly registry: SetRegistry<number> = new SetRegistry<number>(),
        private readonly output: ScriptOutput = consoleOutput
    ) {}

    define(def: SetDefinition): void {
        log.debug(`line ${def.line}: define ${def.name} with ${def.values.length} value(s)`);
        this.registry.addSet(NamedSet.from(def.name, def.values));
    }

    execute(command: ScriptCommand): void {
        const registry = this.registry;
        switch (command.kind) {
            case 'print': {
                const { name } = command;
                this.#attempt('', () => [registry.getSet(name).render()]);
                break;
            }
            case 'binary': {
                const { a, op, b } = command;
                this.#attempt('Error: ', () => [registry.operate(a, op, b).render()]);
                break;
            }
            case 'issubset': {
                const { a, b } = command;
                this.#attempt('Error during issubset: ', () => {
                    const isSubset = registry.getSet(a).isSubsetOf(registry.getSet(b));
                    return [`Is ${a} ⊆ ${b}? ${yesNo(isSubset)}`];
                });
                break;
            }
            case 'isequal': {
                const { a, b } = command;
                this.#attempt('Error during isequal: ', () => {
                    const isEqual = registry.getSet(a).isEqualTo(registry.getSet(b));
                    return [`Are ${a} and ${b} equal? ${yesNo(isEqual)}`];
                });
                break;
            }
            case 'size': {
                const { name } = command;
                this.#attempt('Error during size: ', () => [
                    `Size of set ${name}: ${registry.getSet(name).size} element(s)`,
                ]);
                break;
            }
            case 'powerset': {
                const { name } = command;
                this.#attempt('Error during powerset: ', () => {
                    const p = registry.operateUnary(name, 'powerset');
                    return [
                        `Power set of ${name} contains ${p.size} subsets:`,
                        ...p.elements().map(subset => subset.render()),
                    ];
                });
                break;
            }
            case 'cartesian': {
                const { a, b } = command;
                this.#attempt('Error during cartesian product: ', () => {
                    const product = registry.cartesianProduct(a, b);
                    return [`Cartesian product ${a} × ${b} (${product.size} pairs):`, product.toString()];
                });
                break;
            }
            case 'unknown':
                this.output.error(`Unknown operation: ${command.token}`);
                break;
        }
    }

    run(script: Script): void {
        for (const def of script.definitions) this.define(def);
        for (const command of script.commands) this.execute(command);
    }

    #attempt(errorPrefix: string, produce: () => string[]): void {
        let lines: string[];
        try {
            lines = produce();
        } catch (e) {
            if (!(e instanceof SetRegistryError)) throw e;
            this.output.error(errorPrefix + e.message);
            return;
        }
        for (const line of lines) this.output.print(line);
    }
}

/** Parses and runs `source`; returns the registry holding the defined sets. */
export function runScript(
    source: string,
    output: ScriptOutput = consoleOutput,
    registry: SetRegistry<number> = new SetRegistry<number>()
): SetRegistry<number> {
    new ScriptInterpreter(registry, output).run(parseScript(source));
    return registry;
}
