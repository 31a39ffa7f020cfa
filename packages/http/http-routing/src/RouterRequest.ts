import { MultipartReader } from './MultipartReader';

/**
 * Multi-valued mapping produced by query-string and form decoding.
 * Values for a repeated key keep their arrival order.
 */
export type FormValues = ReadonlyMap<string, readonly string[]>;

/**
 * RouterRequest - Interface for HTTP request abstraction.
 *
 * A minimal abstraction over the underlying HTTP stack (Express, raw Node.js http, etc.)
 * so that RequestContext and redirect logic stay independent of the server.
 *
 * Implementations:
 * - ExpressRouterRequest (in @routekit/http-server) - wraps an Express/Node request
 * - TestRouterRequest (in ./testing) - in-memory double for tests
 */
export interface RouterRequest {
    /**
     * Get all HTTP headers as a Map.
     * Header names are lowercase per HTTP spec.
     */
    getHeaders(): Map<string, string>;

    /**
     * Get a single header value by name (case-insensitive).
     *
     * @returns The header value, or undefined if not present
     */
    getSingleHeaderValue(headerName: string): string | undefined;

    /**
     * Get the HTTP method (GET, POST, PUT, DELETE, etc.).
     */
    getMethod(): string;

    /**
     * Get the raw request path without query string (e.g., '/users/42').
     */
    getPath(): string;

    /**
     * Decoded query-string values. Throws BodyParseError on malformed escapes.
     */
    getQuery(): FormValues;

    /**
     * Whether the request carries a body at all.
     */
    hasBody(): boolean;

    /**
     * Parse query and URL-encoded body values into one mapping, body values
     * first for each key. Idempotent: repeated calls resolve to the same values.
     * Multipart bodies are left unread for multipartReader().
     *
     * Rejects with BodyParseError.
     */
    parseForm(): Promise<FormValues>;

    /**
     * Open a streaming reader over a multipart/form-data body.
     * Throws MultipartReadError when the request is not multipart or the body is gone.
     */
    multipartReader(): MultipartReader;
}
