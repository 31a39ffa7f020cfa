/**
 * @routekit/core-util
 *
 * Utilities shared by every routekit package.
 *
 * @packageDocumentation
 */

export { toError } from './lib/errorUtils';
