/**
 * One part of a multipart/form-data body.
 * Ordinary form fields have an empty fileName.
 */
export interface MultipartPart {
    fieldName: string;
    fileName: string;
    contentType: string;
    content: Buffer;
}

/**
 * Streaming reader over the parts of a multipart body.
 */
export interface MultipartReader {
    /**
     * Resolves to the next part, or undefined once the body is exhausted.
     * Rejects with MultipartReadError when the stream cannot be read.
     */
    nextPart(): Promise<MultipartPart | undefined>;
}
