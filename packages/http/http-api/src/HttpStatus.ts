/**
 * Status codes used by the routing layer.
 */
export const HttpStatus = {
    OK: 200,
    MOVED_PERMANENTLY: 301,
    // Temporary redirect, the default for route targets that may move
    FOUND: 302,
    SEE_OTHER: 303,
    TEMPORARY_REDIRECT: 307,
    PERMANENT_REDIRECT: 308,
    BAD_REQUEST: 400,
    UNAUTHORIZED: 401,
    INTERNAL_SERVER_ERROR: 500,
} as const;

const STATUS_TEXT: ReadonlyMap<number, string> = new Map([
    [200, 'OK'],
    [301, 'Moved Permanently'],
    [302, 'Found'],
    [303, 'See Other'],
    [307, 'Temporary Redirect'],
    [308, 'Permanent Redirect'],
    [400, 'Bad Request'],
    [401, 'Unauthorized'],
    [403, 'Forbidden'],
    [404, 'Not Found'],
    [413, 'Payload Too Large'],
    [415, 'Unsupported Media Type'],
    [500, 'Internal Server Error'],
]);

/**
 * Reason phrase for a status code, '' when unknown.
 */
export function statusText(code: number): string {
    return STATUS_TEXT.get(code) ?? '';
}
