/**
 * Parameter that can replace a checked redirect's target when the caller opts in.
 */
export const REDIRECT_PARAM = 'redirect';

/**
 * Whether path is safe for a checked redirect: a local absolute path.
 *
 * It must start with '/' and contain no ':', which rejects scheme-qualified
 * targets such as 'javascript:alert(1)' or 'http://host/'. Protocol-relative
 * forms ('//host', '/\host') are rejected as well since browsers resolve them
 * to another origin.
 */
export function isSafeRedirectPath(path: string): boolean {
    if (!path.startsWith('/') || path.includes(':')) {
        return false;
    }
    return !path.startsWith('//') && !path.startsWith('/\\');
}
