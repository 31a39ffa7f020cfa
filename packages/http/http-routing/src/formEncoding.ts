import { BodyParseError } from '@routekit/http-api';
import { FormValues } from './RouterRequest';

/**
 * Decode an application/x-www-form-urlencoded string (a query string or a form body).
 *
 * Pairs are separated by '&', '+' means space and a pair without '=' has an empty value.
 * Every occurrence of a repeated key is kept in order.
 *
 * @throws BodyParseError when a percent-escape is malformed ('%' not followed by two hex digits)
 */
export function parseFormEncoded(encoded: string): Map<string, string[]> {
    const values = new Map<string, string[]>();

    for (const pair of encoded.split('&')) {
        if (pair === '') {
            continue;
        }

        const separator = pair.indexOf('=');
        const rawKey = separator === -1 ? pair : pair.substring(0, separator);
        const rawValue = separator === -1 ? '' : pair.substring(separator + 1);

        appendValue(values, unescapeComponent(rawKey), unescapeComponent(rawValue));
    }

    return values;
}

/**
 * Append every value of source onto target, after any values target already holds.
 */
export function appendFormValues(target: Map<string, string[]>, source: FormValues): void {
    for (const [key, sourceValues] of source) {
        for (const value of sourceValues) {
            appendValue(target, key, value);
        }
    }
}

function appendValue(target: Map<string, string[]>, key: string, value: string): void {
    const existing = target.get(key);
    if (existing) {
        existing.push(value);
    } else {
        target.set(key, [value]);
    }
}

const MALFORMED_ESCAPE = /%(?![0-9A-Fa-f]{2})/;
const ESCAPE_RUN = /(?:%[0-9A-Fa-f]{2})+/g;

/**
 * Runs of escapes are decoded as UTF-8 bytes; sequences that are not valid
 * UTF-8 become U+FFFD rather than failing the whole form.
 */
function unescapeComponent(component: string): string {
    const spaced = component.replace(/\+/g, ' ');
    if (MALFORMED_ESCAPE.test(spaced)) {
        throw new BodyParseError(`invalid URL escape in "${component}"`);
    }
    return spaced.replace(ESCAPE_RUN, (run) => Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf8'));
}
