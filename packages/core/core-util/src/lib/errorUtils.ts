/**
 * Error normalisation for catch blocks.
 *
 * Every catch block in routekit converts what it caught before using it:
 * ```typescript
 * try {
 *     await request.parseForm();
 * } catch (err: unknown) {
 *     const error = toError(err);
 *     logger.printf('#error parsing request params: %s', error.message);
 *     throw error;
 * }
 * ```
 *
 * Error instances (and subclasses) come back unchanged. Error-like objects keep
 * their message, name and stack. Anything else is described in a new Error.
 */
export function toError(err: unknown): Error {
    if (err instanceof Error) {
        return err;
    }

    if (err !== null && typeof err === 'object') {
        if ('message' in err) {
            const error = new Error(String(err.message));
            if ('stack' in err && typeof err.stack === 'string') {
                error.stack = err.stack;
            }
            if ('name' in err && typeof err.name === 'string') {
                error.name = err.name;
            }
            return error;
        }

        return new Error(`Non-Error object thrown: ${describeObject(err)}`);
    }

    const message = err == null ? 'Null or undefined thrown' : String(err);
    return new Error(message);
}

function describeObject(value: object): string {
    try {
        return JSON.stringify(value);
    } catch (err: unknown) {
        // Not normalised with toError: this is the error recovery path itself.
        void err;
        return '(unable to stringify)';
    }
}
