import { BodyParseError, HttpStatus } from '@routekit/http-api';
import { toError } from '@routekit/core-util';
import { FormValues, RouterRequest } from './RouterRequest';
import { RouterResponse } from './RouterResponse';
import { MultipartPart } from './MultipartReader';
import { ParameterSpace } from './ParameterSpace';
import { PathParams, Route } from './Route';
import { RouterConfig } from './RouterConfig';
import { Logger } from './Logger';
import { REDIRECT_PARAM, isSafeRedirectPath } from './redirectPolicy';

/**
 * Options for a checked redirect.
 */
export interface RedirectOptions {
    /**
     * Let a non-empty 'redirect' request parameter replace the target path.
     * Off unless asked for; the replacement is still validated.
     */
    allowParamOverride?: boolean;
}

/**
 * RequestContext - everything needed to serve one HTTP exchange.
 *
 * Parameters come from three sources: the query string, the URL-encoded body and
 * the path variables bound by the matched route. Each source is parsed at most
 * once per request and merged on demand:
 *
 * ```
 * params()  ──► form values (query + body)  ──► path variables
 *               parsed once, shared promise      parsed once by the Route
 * ```
 *
 * Form values are added first, so on a name collision they win over path variables.
 *
 * There are two layers of accessors. params() and paramFiles() reject on parse
 * failures; param() and paramInt() log the failure and return '' or 0.
 *
 * One context serves one request and is created by the dispatch layer before any
 * handler runs (see RequestContextFactory in @routekit/http-server).
 */
export class RequestContext {
    /**
     * Errors which occurred during routing or rendering.
     */
    readonly errors: Error[] = [];

    private formParse?: Promise<FormValues>;

    constructor(
        public readonly request: RouterRequest,
        public readonly response: RouterResponse,
        /**
         * The cleaned request path.
         */
        public readonly path: string,
        public readonly route: Route,
        private readonly logger: Logger,
        private readonly routerConfig: RouterConfig,
    ) {}

    /**
     * Merge every parameter of the request into a fresh ParameterSpace.
     * This may trigger a parse of the request form and of the route.
     *
     * @throws BodyParseError when the query or body cannot be decoded; the failure
     * is cached and every later call rejects with the same error
     */
    async params(): Promise<ParameterSpace> {
        let form: FormValues;
        try {
            form = await this.loadForm();
        } catch (err: unknown) {
            const error = toError(err);
            this.logf('#error parsing request params: %s', error.message);
            throw error instanceof BodyParseError ? error : new BodyParseError(error.message, error);
        }

        const params = new ParameterSpace();
        for (const [key, values] of form) {
            for (const value of values) {
                params.add(key, value);
            }
        }

        for (const [key, value] of this.routeParams()) {
            params.add(key, value);
        }

        return params;
    }

    /**
     * First value of a parameter, '' when absent or when the request could not be parsed.
     */
    async param(key: string): Promise<string> {
        const params = await this.paramsOrUndefined();
        return params ? params.get(key) : '';
    }

    /**
     * First value of a parameter as an integer, 0 when absent, not numeric,
     * or when the request could not be parsed.
     */
    async paramInt(key: string): Promise<number> {
        const params = await this.paramsOrUndefined();
        return params ? params.getInt(key) : 0;
    }

    /**
     * A path variable, '' when the route does not bind it.
     */
    routeParam(key: string): string {
        return this.routeParams().get(key) ?? '';
    }

    /**
     * Uploaded files in a multipart/form-data body. Parts without a filename
     * (ordinary fields) are skipped.
     *
     * Reads the body stream, so a second call fails with MultipartReadError.
     *
     * @throws MultipartReadError when the request is not multipart or the stream breaks
     */
    async paramFiles(): Promise<MultipartPart[]> {
        const reader = this.request.multipartReader();
        const parts: MultipartPart[] = [];

        for (let part = await reader.nextPart(); part !== undefined; part = await reader.nextPart()) {
            if (part.fileName === '') {
                continue;
            }
            parts.push(part);
        }

        return parts;
    }

    /**
     * Redirect to a local path, 302 Found unless told otherwise.
     *
     * Targets that are not local absolute paths (see isSafeRedirectPath) are refused
     * and logged; nothing is written, so the handler still owns the response.
     * To redirect off-site use redirectExternal.
     */
    async redirect(
        path: string,
        status: number = HttpStatus.FOUND,
        options: RedirectOptions = {},
    ): Promise<void> {
        let target = path;
        if (options.allowParamOverride) {
            const override = await this.param(REDIRECT_PARAM);
            if (override.length > 0) {
                target = override;
            }
        }

        if (!isSafeRedirectPath(target)) {
            this.logf('#error Ignoring redirect to external path %s', target);
            return;
        }

        this.logf('#info Redirecting (%d) to path:%s', status, target);
        this.response.redirect(target, status);
    }

    /**
     * Redirect (302) without any checks on the target. Use with caution.
     */
    redirectExternal(url: string): void {
        this.logf('#info Redirecting (%d) to external url:%s', HttpStatus.FOUND, url);
        this.response.redirect(url, HttpStatus.FOUND);
    }

    currentPath(): string {
        return this.path;
    }

    config(key: string): string {
        return this.routerConfig.config(key);
    }

    production(): boolean {
        return this.routerConfig.production();
    }

    logf(format: string, ...args: unknown[]): void {
        this.logger.printf(format, ...args);
    }

    addError(error: Error): void {
        this.errors.push(error);
    }

    /**
     * Query and body values, parsed on first use.
     * A request without a body contributes its query string only.
     */
    private loadForm(): Promise<FormValues> {
        if (!this.formParse) {
            this.formParse = this.request.hasBody() ? this.request.parseForm() : this.readQuery();
        }
        return this.formParse;
    }

    private async readQuery(): Promise<FormValues> {
        return this.request.getQuery();
    }

    private routeParams(): PathParams {
        if (this.route.params === undefined) {
            this.route.parse(this.path);
        }
        return this.route.params ?? new Map<string, string>();
    }

    private async paramsOrUndefined(): Promise<ParameterSpace | undefined> {
        try {
            return await this.params();
        } catch (err: unknown) {
            const error = toError(err);
            this.logf('#error parsing request: %s', error.message);
            return undefined;
        }
    }
}
