type LogFn = (...args: unknown[]) => void;

const DEFAULT_VOID: LogFn = () => {};

/**
 * Console-backed logger for one namespace. Every method is a no-op until enabled.
 */
export class Logger {
    debug: LogFn = DEFAULT_VOID;
    info: LogFn = DEFAULT_VOID;
    warn: LogFn = DEFAULT_VOID;
    error: LogFn = DEFAULT_VOID;

    #enabled = false;

    constructor(readonly namespace: string) {}

    get enabled(): boolean { return this.#enabled; }

    enable(): this {
        const prefix = `[${this.namespace}]`;
        this.debug = console.debug.bind(console, prefix);
        this.info = console.info.bind(console, prefix);
        this.warn = console.warn.bind(console, prefix);
        this.error = console.error.bind(console, prefix);
        this.#enabled = true;
        return this;
    }

    disable(): this {
        this.debug = this.info = this.warn = this.error = DEFAULT_VOID;
        this.#enabled = false;
        return this;
    }
}

export const LOG = {
    registry: new Logger('registry'),
    script: new Logger('script'),
} as const;

export type LogNamespace = keyof typeof LOG;

function isLogNamespace(name: string): name is LogNamespace {
    return Object.prototype.hasOwnProperty.call(LOG, name);
}

/**
 * Enables the namespaces listed in `list` (comma separated, `*` for all),
 * e.g. the value of `SETS_DEBUG`. Unknown names are ignored.
 * @returns The namespaces that were enabled.
 */
export function enableLoggers(list: string | undefined): LogNamespace[] {
    if (!list) return [];
    const wanted = list.split(',').map(s => s.trim()).filter(Boolean);
    const all = Object.keys(LOG).filter(isLogNamespace);
    const names = wanted.includes('*') ? all : wanted.filter(isLogNamespace);
    for (const name of names) LOG[name].enable();
    return names;
}
