/**
 * @routekit/http-api
 *
 * HTTP error classes and status constants shared by the routing and server layers.
 *
 * @packageDocumentation
 */

export {
    HttpError,
    HttpBadRequestError,
    HttpPayloadTooLargeError,
    BodyParseError,
    MultipartReadError,
} from './errors';

export { HttpStatus, statusText } from './HttpStatus';
