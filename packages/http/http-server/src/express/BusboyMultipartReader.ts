import { IncomingHttpHeaders } from 'http';
import { Readable } from 'stream';
import busboy from 'busboy';
import { MultipartReadError } from '@routekit/http-api';
import { MultipartPart, MultipartReader } from '@routekit/http-routing';
import { toError } from '@routekit/core-util';

interface PendingRead {
    resolve: (part: MultipartPart | undefined) => void;
    reject: (error: Error) => void;
}

/**
 * BusboyMultipartReader - MultipartReader over a streamed multipart/form-data body.
 *
 * busboy pushes fields and files as it parses; parts are queued here until
 * nextPart() pulls them. File contents are buffered whole so each part is
 * complete when handed out.
 *
 * The constructor throws when busboy rejects the headers (e.g. no boundary).
 */
export class BusboyMultipartReader implements MultipartReader {
    private readonly ready: MultipartPart[] = [];
    private pending?: PendingRead;
    private openFiles = 0;
    private parsed = false;
    private failure?: MultipartReadError;

    constructor(source: Readable, headers: IncomingHttpHeaders) {
        const parser = busboy({ headers });

        parser.on('field', (fieldName, value, info) => {
            this.deliver({
                fieldName,
                fileName: '',
                contentType: info.mimeType,
                content: Buffer.from(value),
            });
        });

        parser.on('file', (fieldName, stream, info) => {
            this.openFiles++;
            const chunks: Buffer[] = [];
            stream.on('data', (chunk: Buffer) => {
                chunks.push(chunk);
            });
            stream.on('end', () => {
                this.openFiles--;
                this.deliver({
                    fieldName,
                    fileName: info.filename ?? '',
                    contentType: info.mimeType,
                    content: Buffer.concat(chunks),
                });
            });
            stream.on('error', (err: Error) => {
                this.fail(err);
            });
        });

        parser.on('close', () => {
            this.parsed = true;
            this.settle();
        });
        parser.on('error', (err: unknown) => {
            this.fail(toError(err));
        });
        source.on('error', (err: Error) => {
            this.fail(err);
        });

        source.pipe(parser);
    }

    nextPart(): Promise<MultipartPart | undefined> {
        const part = this.ready.shift();
        if (part) {
            return Promise.resolve(part);
        }
        if (this.failure) {
            return Promise.reject(this.failure);
        }
        if (this.isExhausted()) {
            return Promise.resolve(undefined);
        }

        return new Promise((resolve, reject) => {
            this.pending = { resolve, reject };
        });
    }

    private deliver(part: MultipartPart): void {
        const pending = this.takePending();
        if (pending) {
            pending.resolve(part);
        } else {
            this.ready.push(part);
        }
        this.settle();
    }

    private settle(): void {
        if (this.isExhausted()) {
            this.takePending()?.resolve(undefined);
        }
    }

    private fail(error: Error): void {
        if (!this.failure) {
            this.failure = new MultipartReadError(`multipart stream failed: ${error.message}`, 400, error);
        }
        this.takePending()?.reject(this.failure);
    }

    private isExhausted(): boolean {
        return this.parsed && this.openFiles === 0 && this.ready.length === 0;
    }

    private takePending(): PendingRead | undefined {
        const pending = this.pending;
        this.pending = undefined;
        return pending;
    }
}
