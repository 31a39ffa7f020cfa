import { cleanPath } from './cleanPath';

/**
 * Path-variable bindings, in pattern order.
 */
export type PathParams = ReadonlyMap<string, string>;

/**
 * Route - the matched route as seen by one request.
 *
 * params is undefined until parse() has run. parse() is idempotent: only the
 * first call extracts bindings, later calls keep them.
 */
export interface Route {
    readonly pattern: string;
    readonly params: PathParams | undefined;
    parse(path: string): void;
}

/**
 * RoutePattern - an immutable route template such as '/users/:id/posts/:slug'.
 *
 * Patterns live in the route table and are shared by every request; they never
 * hold bindings. Call bind() once per request to get a Route that does.
 */
export class RoutePattern {
    private readonly segments: string[];

    constructor(public readonly pattern: string) {
        this.segments = splitSegments(cleanPath(pattern));
    }

    /**
     * Whether a cleaned request path matches this pattern.
     */
    matches(path: string): boolean {
        return this.extract(path) !== undefined;
    }

    /**
     * Variable names in pattern order.
     */
    variableNames(): string[] {
        return this.segments.filter(isVariable).map((segment) => segment.substring(1));
    }

    /**
     * Create a fresh per-request binding of this pattern.
     */
    bind(): RouteBinding {
        return new RouteBinding(this);
    }

    /**
     * Bindings for path, or undefined when path does not match.
     */
    extract(path: string): Map<string, string> | undefined {
        const pathSegments = splitSegments(path);
        if (pathSegments.length !== this.segments.length) {
            return undefined;
        }

        const bindings = new Map<string, string>();
        for (let i = 0; i < this.segments.length; i++) {
            const patternSegment = this.segments[i];
            const pathSegment = pathSegments[i];

            if (isVariable(patternSegment)) {
                bindings.set(patternSegment.substring(1), decodeSegment(pathSegment));
            } else if (patternSegment !== pathSegment) {
                return undefined;
            }
        }
        return bindings;
    }
}

/**
 * RouteBinding - one request's view of a RoutePattern.
 * A path that does not match the pattern parses to no bindings.
 */
export class RouteBinding implements Route {
    private bindings?: Map<string, string>;

    constructor(private readonly routePattern: RoutePattern) {}

    get pattern(): string {
        return this.routePattern.pattern;
    }

    get params(): PathParams | undefined {
        return this.bindings;
    }

    parse(path: string): void {
        if (this.bindings) {
            return;
        }
        this.bindings = this.routePattern.extract(path) ?? new Map<string, string>();
    }
}

function splitSegments(path: string): string[] {
    return path.split('/').filter((segment) => segment !== '');
}

function isVariable(segment: string): boolean {
    return segment.startsWith(':') && segment.length > 1;
}

function decodeSegment(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch (err: unknown) {
        //const error = toError(err);
        // A segment with a stray '%' is bound verbatim
        void err;
        return segment;
    }
}
