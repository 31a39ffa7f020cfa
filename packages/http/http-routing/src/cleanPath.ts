import { posix } from 'path';

/**
 * Canonical form of a request path: rooted, '.' and '..' resolved, repeated
 * slashes collapsed and no trailing slash except for '/' itself.
 *
 * cleanPath('users//42/') === '/users/42'
 */
export function cleanPath(path: string): string {
    if (path === '') {
        return '/';
    }

    const rooted = path.startsWith('/') ? path : `/${path}`;
    const normalized = posix.normalize(rooted);

    if (normalized.length > 1 && normalized.endsWith('/')) {
        return normalized.substring(0, normalized.length - 1);
    }
    return normalized;
}
