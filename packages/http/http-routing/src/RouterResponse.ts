/**
 * RouterResponse - Interface for HTTP response abstraction.
 *
 * Lets RequestContext and the Express wrapper write responses without
 * depending on the HTTP server implementation.
 *
 * Implementations:
 * - ExpressRouterResponse (in @routekit/http-server) - wraps Express Response
 * - TestRouterResponse (in ./testing) - records what was written
 */
export interface RouterResponse {
    /**
     * Set HTTP status code.
     */
    setStatus(code: number): void;

    /**
     * Set a response header.
     */
    setHeader(name: string, value: string): void;

    /**
     * Send response body and end the response.
     */
    send(body: string): void;

    /**
     * Check if headers have already been sent.
     * Used to prevent double-sending responses.
     */
    isHeadersSent(): boolean;

    /**
     * Write a redirect to location with the given status and end the response.
     * No validation happens here; see RequestContext.redirect for the checked form.
     */
    redirect(location: string, status: number): void;
}
