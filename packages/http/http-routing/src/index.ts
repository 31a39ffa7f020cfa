/**
 * @routekit/http-routing
 *
 * Request context and parameter resolution: merges path variables, query-string
 * and form values into one ParameterSpace and offers checked redirects.
 * Server-independent; the Express bindings live in @routekit/http-server.
 */

// Parameters
export { ParameterSpace } from './ParameterSpace';
export { parseFormEncoded, appendFormValues } from './formEncoding';

// Request context
export { RequestContext, RedirectOptions } from './RequestContext';
export { isSafeRedirectPath, REDIRECT_PARAM } from './redirectPolicy';

// Routes
export { Route, RoutePattern, RouteBinding, PathParams } from './Route';
export { cleanPath } from './cleanPath';

// Transport abstractions
export { RouterRequest, FormValues } from './RouterRequest';
export { RouterResponse } from './RouterResponse';
export { MultipartPart, MultipartReader } from './MultipartReader';

// Configuration and logging
export { RouterConfig, StaticRouterConfig, ROUTER_CONFIG_TOKEN } from './RouterConfig';
export { Logger, ConsoleLogger, LOGGER_TOKEN } from './Logger';

