import { Response } from 'express';
import { RouterResponse } from '@routekit/http-routing';

/**
 * ExpressRouterResponse - Express implementation of RouterResponse interface.
 *
 * Bridges Express Response to the RouterResponse abstraction,
 * allowing the request context to write responses without depending on Express directly.
 */
export class ExpressRouterResponse implements RouterResponse {
    private res: Response;

    constructor(res: Response) {
        this.res = res;
    }

    setStatus(code: number): void {
        this.res.status(code);
    }

    setHeader(name: string, value: string): void {
        this.res.setHeader(name, value);
    }

    send(body: string): void {
        this.res.send(body);
    }

    isHeadersSent(): boolean {
        return this.res.headersSent;
    }

    /**
     * Sets Location and the status; Express writes the short body for the
     * negotiated content type.
     */
    redirect(location: string, status: number): void {
        this.res.redirect(status, location);
    }

    /**
     * Get the underlying Express response.
     * Use sparingly - prefer using RouterResponse interface methods.
     */
    getUnderlyingResponse(): Response {
        return this.res;
    }
}
