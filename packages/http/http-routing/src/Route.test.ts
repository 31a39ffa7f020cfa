import { RoutePattern } from './Route';
import { cleanPath } from './cleanPath';

describe('RoutePattern', () => {
    it('matches paths with the same shape', () => {
        const pattern = new RoutePattern('/users/:id/posts/:slug');

        expect(pattern.matches('/users/42/posts/hello')).toBe(true);
        expect(pattern.matches('/users/42/posts')).toBe(false);
        expect(pattern.matches('/accounts/42/posts/hello')).toBe(false);
    });

    it('lists variable names in pattern order', () => {
        expect(new RoutePattern('/users/:id/posts/:slug').variableNames()).toEqual(['id', 'slug']);
    });

    it('extracts bindings in pattern order', () => {
        const bindings = new RoutePattern('/users/:id/posts/:slug').extract('/users/42/posts/hello');

        expect(bindings && [...bindings]).toEqual([
            ['id', '42'],
            ['slug', 'hello'],
        ]);
    });

    it('decodes percent escapes in bound segments', () => {
        const bindings = new RoutePattern('/files/:name').extract('/files/a%2Fb%20c');

        expect(bindings?.get('name')).toBe('a/b c');
    });

    it('binds a malformed escape verbatim', () => {
        expect(new RoutePattern('/files/:name').extract('/files/100%')?.get('name')).toBe('100%');
    });

    it('matches the root pattern', () => {
        expect(new RoutePattern('/').matches('/')).toBe(true);
    });
});

describe('RouteBinding', () => {
    it('has no params until parsed', () => {
        const route = new RoutePattern('/users/:id').bind();

        expect(route.params).toBeUndefined();
        expect(route.pattern).toBe('/users/:id');
    });

    it('keeps the first parse', () => {
        const route = new RoutePattern('/users/:id').bind();

        route.parse('/users/1');
        route.parse('/users/2');

        expect(route.params?.get('id')).toBe('1');
    });

    it('parses a non-matching path to no bindings', () => {
        const route = new RoutePattern('/users/:id').bind();

        route.parse('/about');

        expect(route.params?.size).toBe(0);
    });

    it('gives each request its own bindings', () => {
        const pattern = new RoutePattern('/users/:id');
        const first = pattern.bind();
        const second = pattern.bind();

        first.parse('/users/1');
        second.parse('/users/2');

        expect(first.params?.get('id')).toBe('1');
        expect(second.params?.get('id')).toBe('2');
    });
});

describe('cleanPath', () => {
    it.each([
        ['', '/'],
        ['/', '/'],
        ['users//42/', '/users/42'],
        ['/a/./b/../c', '/a/c'],
        ['/../x', '/x'],
    ])('cleans %j to %j', (input, expected) => {
        expect(cleanPath(input)).toBe(expected);
    });
});
