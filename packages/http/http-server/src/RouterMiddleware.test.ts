import { IncomingMessage } from 'http';
import { Socket } from 'net';
import { Container } from 'inversify';
import { HttpBadRequestError } from '@routekit/http-api';
import { RequestContext, RoutePattern, StaticRouterConfig } from '@routekit/http-routing';
import { RecordingLogger, TestRouterRequest, TestRouterResponse } from '@routekit/http-routing/testing';
import { RouterMiddleware } from './RouterMiddleware';
import { RequestContextFactory } from './RequestContextFactory';
import { RouterModuleOptions, createRouterModule } from './modules/RouterModule';

interface Harness {
    container: Container;
    middleware: RouterMiddleware;
    logger: RecordingLogger;
}

async function createHarness(
    production = false,
    options: Pick<RouterModuleOptions, 'requestOptions'> = {},
): Promise<Harness> {
    const logger = new RecordingLogger();
    const config = new StaticRouterConfig(new Map([['site_name', 'Example']]), production);
    const container = new Container();
    await container.load(createRouterModule({ ...options, config, logger }));

    return { container, middleware: container.get(RouterMiddleware), logger };
}

const usersPattern = new RoutePattern('/users/:id');

function formPost(body: string): IncomingMessage {
    const req = new IncomingMessage(new Socket());
    req.method = 'POST';
    req.url = '/users/1';
    req.headers = {
        'content-type': 'application/x-www-form-urlencoded',
        'content-length': String(Buffer.byteLength(body)),
    };
    req.push(body);
    req.push(null);
    return req;
}

describe('RouterMiddleware', () => {
    describe('dispatch', () => {
        it('hands the handler a context for the cleaned path', async () => {
            const { middleware } = await createHarness();
            let seen: RequestContext | undefined;

            await middleware.dispatch(
                new TestRouterRequest({ path: '/users//42/' }),
                new TestRouterResponse(),
                usersPattern,
                (context) => {
                    seen = context;
                },
            );

            expect(seen?.currentPath()).toBe('/users/42');
            expect(seen?.routeParam('id')).toBe('42');
            expect(seen?.config('site_name')).toBe('Example');
        });

        it('binds the shared pattern separately for each request', async () => {
            const { middleware } = await createHarness();
            const ids: string[] = [];
            const handler = (context: RequestContext): void => {
                ids.push(context.routeParam('id'));
            };

            await middleware.dispatch(new TestRouterRequest({ path: '/users/1' }), new TestRouterResponse(), usersPattern, handler);
            await middleware.dispatch(new TestRouterRequest({ path: '/users/2' }), new TestRouterResponse(), usersPattern, handler);

            expect(ids).toEqual(['1', '2']);
        });

        it('lets the handler redirect', async () => {
            const { middleware } = await createHarness();
            const response = new TestRouterResponse();

            await middleware.dispatch(
                new TestRouterRequest({ path: '/users/42' }),
                response,
                usersPattern,
                async (context) => {
                    await context.redirect(`/profiles/${context.routeParam('id')}`);
                },
            );

            expect(response.redirects).toEqual([{ location: '/profiles/42', status: 302 }]);
        });

        it('writes an HttpError as its status code', async () => {
            const { middleware, logger } = await createHarness();
            const response = new TestRouterResponse();
            const failure = new HttpBadRequestError('missing name');

            const context = await middleware.dispatch(
                new TestRouterRequest({ path: '/users/1' }),
                response,
                usersPattern,
                () => {
                    throw failure;
                },
            );

            expect(response.status).toBe(400);
            expect(response.headers.get('content-type')).toBe('text/plain; charset=utf-8');
            expect(response.body).toBe('missing name');
            expect(context.errors).toEqual([failure]);
            expect(logger.lines).toEqual(['#info BadRequest (400): missing name']);
        });

        it('writes a 500 page with escaped details outside production', async () => {
            const { middleware } = await createHarness(false);
            const response = new TestRouterResponse();

            await middleware.dispatch(new TestRouterRequest({ path: '/users/1' }), response, usersPattern, async () => {
                throw new Error('<db> down');
            });

            expect(response.status).toBe(500);
            expect(response.headers.get('content-type')).toBe('text/html; charset=utf-8');
            expect(response.body).toContain('<pre>&lt;db&gt; down</pre>');
        });

        it('hides error details in production', async () => {
            const { middleware } = await createHarness(true);
            const response = new TestRouterResponse();

            await middleware.dispatch(new TestRouterRequest({ path: '/users/1' }), response, usersPattern, async () => {
                throw new Error('db down');
            });

            expect(response.status).toBe(500);
            expect(response.body).not.toContain('<pre>');
        });

        it('leaves a response that was already sent alone', async () => {
            const { middleware, logger } = await createHarness();
            const response = new TestRouterResponse();

            await middleware.dispatch(new TestRouterRequest({ path: '/users/1' }), response, usersPattern, async (context) => {
                await context.redirect('/home');
                throw new Error('late failure');
            });

            expect(response.status).toBe(302);
            expect(response.body).toBeUndefined();
            expect(logger.errors()).toEqual(['#error Error after response was sent: late failure']);
        });
    });

    describe('wrap', () => {
        it('returns an Express handler', async () => {
            const { middleware } = await createHarness();

            const handler = middleware.wrap(usersPattern, () => undefined);

            expect(typeof handler).toBe('function');
        });

        it('adapts requests with the module request options', async () => {
            const { middleware } = await createHarness(false, { requestOptions: { maxFormBytes: 4 } });

            const request = middleware.adaptRequest(formPost('name=Ann'));

            await expect(request.parseForm()).rejects.toThrow('request body too large');
        });

        it('uses the default form limit without request options', async () => {
            const { middleware } = await createHarness();

            const form = await middleware.adaptRequest(formPost('name=Ann')).parseForm();

            expect(form.get('name')).toEqual(['Ann']);
        });
    });

    describe('createRouterModule', () => {
        it('binds singletons', async () => {
            const { container, middleware } = await createHarness();

            expect(container.get(RouterMiddleware)).toBe(middleware);
            expect(container.get(RequestContextFactory)).toBe(container.get(RequestContextFactory));
        });
    });
});
