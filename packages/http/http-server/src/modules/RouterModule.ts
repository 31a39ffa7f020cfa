import { ContainerModule } from 'inversify';
import {
    ConsoleLogger,
    LOGGER_TOKEN,
    Logger,
    ROUTER_CONFIG_TOKEN,
    RouterConfig,
    StaticRouterConfig,
} from '@routekit/http-routing';
import { RequestContextFactory } from '../RequestContextFactory';
import { RouterMiddleware } from '../RouterMiddleware';
import {
    EXPRESS_REQUEST_OPTIONS_TOKEN,
    ExpressRouterRequestOptions,
} from '../express/ExpressRouterRequest';

export interface RouterModuleOptions {
    /**
     * Defaults to StaticRouterConfig.fromEnv().
     */
    config?: RouterConfig;
    /**
     * Defaults to a ConsoleLogger tagged 'RequestContext'.
     */
    logger?: Logger;
    /**
     * Applied to every request RouterMiddleware wraps, e.g. the form size limit.
     */
    requestOptions?: ExpressRouterRequestOptions;
}

/**
 * Framework-level DI bindings: configuration, logger, the context factory and
 * the Express middleware.
 *
 * Load it before application modules:
 * ```typescript
 * const container = new Container();
 * await container.load(createRouterModule({ config: new StaticRouterConfig(settings, true) }));
 * ```
 */
export function createRouterModule(options: RouterModuleOptions = {}): ContainerModule {
    return new ContainerModule((loadOptions) => {
        const { bind } = loadOptions;

        bind<RouterConfig>(ROUTER_CONFIG_TOKEN).toConstantValue(
            options.config ?? StaticRouterConfig.fromEnv(),
        );
        bind<Logger>(LOGGER_TOKEN).toConstantValue(options.logger ?? new ConsoleLogger('RequestContext'));
        bind<ExpressRouterRequestOptions>(EXPRESS_REQUEST_OPTIONS_TOKEN).toConstantValue(
            options.requestOptions ?? {},
        );

        bind<RequestContextFactory>(RequestContextFactory).toSelf().inSingletonScope();
        bind<RouterMiddleware>(RouterMiddleware).toSelf().inSingletonScope();
    });
}
