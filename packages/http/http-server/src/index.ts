import 'reflect-metadata';

export { RequestContextFactory } from './RequestContextFactory';
export { RouterMiddleware, ContextHandler, ExpressRouteHandler } from './RouterMiddleware';
export { createRouterModule, RouterModuleOptions } from './modules/RouterModule';

// Express implementations of Router interfaces
export {
    ExpressRouterRequest,
    ExpressRouterRequestOptions,
    EXPRESS_REQUEST_OPTIONS_TOKEN,
    DEFAULT_MAX_FORM_BYTES,
} from './express/ExpressRouterRequest';
export { ExpressRouterResponse } from './express/ExpressRouterResponse';
export { BusboyMultipartReader } from './express/BusboyMultipartReader';
