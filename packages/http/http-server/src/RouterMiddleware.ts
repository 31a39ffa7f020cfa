import { IncomingMessage } from 'http';
import { Request, Response, NextFunction } from 'express';
import { inject, injectable } from 'inversify';
import { HttpError, HttpStatus, statusText } from '@routekit/http-api';
import {
    LOGGER_TOKEN,
    Logger,
    ROUTER_CONFIG_TOKEN,
    RequestContext,
    RoutePattern,
    RouterConfig,
    RouterRequest,
    RouterResponse,
} from '@routekit/http-routing';
import { toError } from '@routekit/core-util';
import { RequestContextFactory } from './RequestContextFactory';
import {
    EXPRESS_REQUEST_OPTIONS_TOKEN,
    ExpressRouterRequest,
    ExpressRouterRequestOptions,
} from './express/ExpressRouterRequest';
import { ExpressRouterResponse } from './express/ExpressRouterResponse';

/**
 * Handler for one route, working on the request context only.
 */
export type ContextHandler = (context: RequestContext) => Promise<void> | void;

/**
 * Express route handler function type.
 */
export type ExpressRouteHandler = (
    req: Request,
    res: Response,
    next: NextFunction,
) => Promise<void>;

/**
 * RouterMiddleware - connects Express routes to RequestContext handlers.
 *
 * ```typescript
 * const middleware = container.get(RouterMiddleware);
 * const pattern = new RoutePattern('/users/:id');
 * app.get(pattern.pattern, middleware.wrap(pattern, async (ctx) => {
 *     await ctx.redirect(`/profiles/${ctx.routeParam('id')}`);
 * }));
 * ```
 *
 * Errors escaping a handler are recorded on the context and translated here:
 * HttpError subclasses become their status code with the message as plain text,
 * anything else becomes a 500 page (without details in production).
 */
@injectable()
export class RouterMiddleware {
    constructor(
        @inject(RequestContextFactory) private readonly contextFactory: RequestContextFactory,
        @inject(ROUTER_CONFIG_TOKEN) private readonly config: RouterConfig,
        @inject(LOGGER_TOKEN) private readonly logger: Logger,
        @inject(EXPRESS_REQUEST_OPTIONS_TOKEN) private readonly requestOptions: ExpressRouterRequestOptions,
    ) {}

    /**
     * Create an Express handler that runs handler inside a RequestContext.
     */
    wrap(pattern: RoutePattern, handler: ContextHandler): ExpressRouteHandler {
        return async (req: Request, res: Response): Promise<void> => {
            await this.dispatch(
                this.adaptRequest(req),
                new ExpressRouterResponse(res),
                pattern,
                handler,
            );
        };
    }

    /**
     * Wrap a Node request with the configured ExpressRouterRequestOptions.
     */
    adaptRequest(req: IncomingMessage): ExpressRouterRequest {
        return new ExpressRouterRequest(req, this.requestOptions);
    }

    /**
     * Run handler for one request. Never rejects.
     */
    async dispatch(
        request: RouterRequest,
        response: RouterResponse,
        pattern: RoutePattern,
        handler: ContextHandler,
    ): Promise<RequestContext> {
        const context = this.contextFactory.create(request, response, pattern);
        try {
            await handler(context);
        } catch (err: unknown) {
            const error = toError(err);
            context.addError(error);
            this.handleError(response, error);
        }
        return context;
    }

    /**
     * Write an error response unless the handler already started one.
     */
    handleError(response: RouterResponse, error: Error): void {
        if (response.isHeadersSent()) {
            this.logger.printf('#error Error after response was sent: %s', error.message);
            return;
        }

        if (error instanceof HttpError) {
            this.logger.printf('#info %s (%d): %s', error.name, error.code, error.message);
            response.setStatus(error.code);
            response.setHeader('Content-Type', 'text/plain; charset=utf-8');
            response.send(error.message || statusText(error.code));
            return;
        }

        this.logger.printf('#error Unexpected error: %s', error.stack ?? error.message);
        const detail = this.config.production() ? '' : `\n    <pre>${escapeHtml(error.message)}</pre>`;
        response.setStatus(HttpStatus.INTERNAL_SERVER_ERROR);
        response.setHeader('Content-Type', 'text/html; charset=utf-8');
        response.send(`<!DOCTYPE html>
<html>
<head><title>Server Error</title></head>
<body>
    <h1>You hit a server error</h1>
    <p>An unexpected error occurred while processing your request.</p>${detail}
</body>
</html>`);
    }
}

function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}
