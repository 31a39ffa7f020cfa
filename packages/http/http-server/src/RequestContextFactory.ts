import { inject, injectable } from 'inversify';
import {
    LOGGER_TOKEN,
    Logger,
    ROUTER_CONFIG_TOKEN,
    RequestContext,
    RoutePattern,
    RouterConfig,
    RouterRequest,
    RouterResponse,
    cleanPath,
} from '@routekit/http-routing';

/**
 * RequestContextFactory - creates the RequestContext for each inbound request.
 *
 * The pattern comes from the shared route table; every context gets its own
 * binding of it, so path variables never leak between requests.
 *
 * DI Pattern: bound as a singleton by createRouterModule(); config and logger are
 * shared by every context it creates.
 */
@injectable()
export class RequestContextFactory {
    constructor(
        @inject(ROUTER_CONFIG_TOKEN) private readonly config: RouterConfig,
        @inject(LOGGER_TOKEN) private readonly logger: Logger,
    ) {}

    create(request: RouterRequest, response: RouterResponse, pattern: RoutePattern): RequestContext {
        return new RequestContext(
            request,
            response,
            cleanPath(request.getPath()),
            pattern.bind(),
            this.logger,
            this.config,
        );
    }
}
