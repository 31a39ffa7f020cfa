import { IncomingMessage } from 'http';
import {
    BodyParseError,
    HttpPayloadTooLargeError,
    MultipartReadError,
} from '@routekit/http-api';
import {
    FormValues,
    MultipartReader,
    RouterRequest,
    appendFormValues,
    parseFormEncoded,
} from '@routekit/http-routing';
import { toError } from '@routekit/core-util';
import { BusboyMultipartReader } from './BusboyMultipartReader';

/**
 * Largest URL-encoded body parseForm() will read.
 */
export const DEFAULT_MAX_FORM_BYTES = 10 * 1024 * 1024;

const FORM_METHODS = ['POST', 'PUT', 'PATCH'];
const URL_ENCODED = 'application/x-www-form-urlencoded';
const MULTIPART = 'multipart/form-data';

export interface ExpressRouterRequestOptions {
    maxFormBytes?: number;
}

export const EXPRESS_REQUEST_OPTIONS_TOKEN = Symbol.for('ExpressRouterRequestOptions');

/**
 * ExpressRouterRequest - Express implementation of RouterRequest interface.
 *
 * Works on an Express Request or on any Node.js IncomingMessage, so the
 * request context stays independent of Express itself.
 */
export class ExpressRouterRequest implements RouterRequest {
    private req: IncomingMessage;
    private headerCache: Map<string, string> | null = null;
    private queryCache?: FormValues;
    private formParse?: Promise<FormValues>;
    private bodyClaimed = false;
    private readonly maxFormBytes: number;

    constructor(req: IncomingMessage, options: ExpressRouterRequestOptions = {}) {
        this.req = req;
        this.maxFormBytes = options.maxFormBytes ?? DEFAULT_MAX_FORM_BYTES;
    }

    /**
     * Get all HTTP headers as a Map.
     * Header names are lowercase per HTTP spec.
     */
    getHeaders(): Map<string, string> {
        if (this.headerCache) {
            return this.headerCache;
        }

        this.headerCache = new Map<string, string>();
        for (const [name, value] of Object.entries(this.req.headers)) {
            if (typeof value === 'string') {
                this.headerCache.set(name.toLowerCase(), value);
            } else if (Array.isArray(value)) {
                // If multiple values, join with comma (HTTP spec)
                this.headerCache.set(name.toLowerCase(), value.join(', '));
            }
        }

        return this.headerCache;
    }

    getSingleHeaderValue(headerName: string): string | undefined {
        return this.getHeaders().get(headerName.toLowerCase());
    }

    getMethod(): string {
        return (this.req.method ?? 'GET').toUpperCase();
    }

    /**
     * Raw path of the request target. Express rewrites req.url inside mounted
     * routers, so originalUrl is preferred when present.
     */
    getPath(): string {
        const target = this.requestTarget();
        const queryStart = target.indexOf('?');
        return queryStart === -1 ? target : target.substring(0, queryStart);
    }

    getQuery(): FormValues {
        if (!this.queryCache) {
            const target = this.requestTarget();
            const queryStart = target.indexOf('?');
            this.queryCache = parseFormEncoded(queryStart === -1 ? '' : target.substring(queryStart + 1));
        }
        return this.queryCache;
    }

    hasBody(): boolean {
        if (this.req.headers['transfer-encoding'] !== undefined) {
            return true;
        }
        const length = Number(this.req.headers['content-length'] ?? '0');
        return Number.isFinite(length) && length > 0;
    }

    /**
     * Query values plus, for POST/PUT/PATCH with a URL-encoded body, the body
     * values ahead of them. Other bodies (JSON, multipart) are not read.
     *
     * When earlier middleware (express.urlencoded()) already consumed the body,
     * the values it left on req.body are used instead.
     */
    parseForm(): Promise<FormValues> {
        if (!this.formParse) {
            this.formParse = this.readForm();
        }
        return this.formParse;
    }

    multipartReader(): MultipartReader {
        if (this.contentType() !== MULTIPART) {
            throw new MultipartReadError("request Content-Type isn't multipart/form-data", 415);
        }
        if (this.bodyClaimed || this.req.readableEnded) {
            throw new MultipartReadError('request body has already been read', 400);
        }

        this.bodyClaimed = true;
        try {
            return new BusboyMultipartReader(this.req, this.req.headers);
        } catch (err: unknown) {
            const error = toError(err);
            throw new MultipartReadError(`cannot read multipart body: ${error.message}`, 400, error);
        }
    }

    /**
     * Read the request body as text, up to maxFormBytes.
     */
    readBody(): Promise<string> {
        return new Promise((resolve, reject) => {
            const chunks: Buffer[] = [];
            let received = 0;
            let overflowed = false;

            this.req.on('data', (chunk: Buffer | string) => {
                if (overflowed) {
                    return;
                }
                const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
                received += buffer.length;
                if (received > this.maxFormBytes) {
                    overflowed = true;
                    const tooLarge = new HttpPayloadTooLargeError('request body too large', this.maxFormBytes);
                    reject(new BodyParseError(tooLarge.message, tooLarge));
                    return;
                }
                chunks.push(buffer);
            });
            this.req.on('end', () => {
                resolve(Buffer.concat(chunks).toString('utf8'));
            });
            this.req.on('error', (err) => {
                reject(new BodyParseError(`cannot read request body: ${err.message}`, err));
            });
        });
    }

    /**
     * Get the underlying request.
     * Use sparingly - prefer using RouterRequest interface methods.
     */
    getUnderlyingRequest(): IncomingMessage {
        return this.req;
    }

    private async readForm(): Promise<FormValues> {
        const values = new Map<string, string[]>();

        if (this.hasBody() && FORM_METHODS.includes(this.getMethod()) && this.contentType() === URL_ENCODED) {
            appendFormValues(values, await this.readBodyValues());
        }
        appendFormValues(values, this.getQuery());

        return values;
    }

    private async readBodyValues(): Promise<FormValues> {
        if (this.bodyClaimed || this.req.readableEnded) {
            const parsed = this.parsedBody();
            if (parsed === undefined) {
                throw new BodyParseError('request body has already been read');
            }
            return parsed;
        }

        this.bodyClaimed = true;
        return parseFormEncoded(await this.readBody());
    }

    /**
     * Flat string values express.urlencoded() stored on req.body, if any.
     * Nested objects from the extended parser are skipped.
     */
    private parsedBody(): FormValues | undefined {
        const req: IncomingMessage & { body?: unknown } = this.req;
        if (typeof req.body !== 'object' || req.body === null) {
            return undefined;
        }

        const values = new Map<string, string[]>();
        const entries: [string, unknown][] = Object.entries(req.body);
        for (const [key, value] of entries) {
            if (typeof value === 'string') {
                values.set(key, [value]);
            } else if (Array.isArray(value)) {
                const strings = value.filter((item): item is string => typeof item === 'string');
                if (strings.length > 0) {
                    values.set(key, strings);
                }
            }
        }
        return values;
    }

    private contentType(): string {
        const header = this.getSingleHeaderValue('content-type') ?? '';
        return header.split(';')[0].trim().toLowerCase();
    }

    private requestTarget(): string {
        const req: IncomingMessage & { originalUrl?: unknown } = this.req;
        if (typeof req.originalUrl === 'string') {
            return req.originalUrl;
        }
        return this.req.url ?? '/';
    }
}
