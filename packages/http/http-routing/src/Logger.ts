/**
 * Logger - fire-and-forget, printf-style.
 *
 * Messages carry a severity marker at the start of the format string,
 * e.g. '#error parsing request params: %s'.
 */
export interface Logger {
    printf(format: string, ...args: unknown[]): void;
}

/**
 * Logger that writes through console, tagged like '[RequestContext] ...'.
 * '#error' messages go to console.error.
 */
export class ConsoleLogger implements Logger {
    constructor(private readonly tag: string = 'routekit') {}

    printf(format: string, ...args: unknown[]): void {
        const line = `[${this.tag}] ${format}`;
        if (format.startsWith('#error')) {
            console.error(line, ...args);
        } else {
            console.log(line, ...args);
        }
    }
}

/**
 * DI token for Logger injection.
 */
export const LOGGER_TOKEN = Symbol.for('Logger');
