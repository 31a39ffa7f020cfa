/**
 * HTTP error classes for routekit.
 * Every layer throws these so the Express wrapper can map them to a status code.
 */

/**
 * HttpError - Base error class with HTTP status code.
 * All specific HTTP errors extend this class.
 */
export class HttpError extends Error {
    public code: number;
    public readonly httpCause?: Error;

    constructor(message: string, code: number, cause?: Error) {
        super(message);
        this.code = code;
        this.httpCause = cause;
    }
}

/**
 * HttpBadRequestError - 400 Bad Request.
 */
export class HttpBadRequestError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 400, cause);
        this.name = 'BadRequest';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpPayloadTooLargeError - 413 Payload Too Large.
 */
export class HttpPayloadTooLargeError extends HttpError {
    constructor(message: string, public readonly limitBytes: number, cause?: Error) {
        super(message, 413, cause);
        this.name = 'PayloadTooLarge';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * BodyParseError - the request form could not be decoded.
 *
 * Raised for malformed URL encoding, unreadable body streams and bodies over
 * the form size limit (the latter carries an HttpPayloadTooLargeError cause).
 */
export class BodyParseError extends HttpBadRequestError {
    constructor(message: string, cause?: Error) {
        super(message, cause);
        this.name = 'BodyParseError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * MultipartReadError - uploaded parts could not be enumerated.
 * 415 when the request is not multipart/form-data, 400 when the stream fails.
 */
export class MultipartReadError extends HttpError {
    constructor(message: string, code: 400 | 415, cause?: Error) {
        super(message, code, cause);
        this.name = 'MultipartReadError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
