import type { RecognitionError } from '../errors/index.js';

/**
 * Image staged for a backend call. Only valid for the duration of the call.
 */
export interface StagedImage {
    /** Path of the transient file holding the image */
    path: string;
    mimeType: string;
    /** Read the staged bytes */
    read(): Promise<Buffer>;
}

/**
 * Arguments of a single recognition request
 */
export interface RecognitionRequest {
    image: StagedImage;
    prompt: string;
    signal?: AbortSignal;
}

/**
 * Response shapes backends are known to return
 */
export type RecognitionResponse =
    | string
    | { content: string }
    | { text: string }
    | { choices: ReadonlyArray<{ message?: { content?: string | null } | null; text?: string }> }
    | unknown;

/**
 * Recognition backend Interface
 *
 * One image in, one response out. The response shape is backend-specific and
 * is normalized by the recognition adapter.
 */
export interface IRecognitionBackend {
    /** Provider identifier for logs */
    readonly id: string;
    recognize(request: RecognitionRequest): Promise<RecognitionResponse>;
}

/**
 * Which decision-table row produced the normalized text
 */
export type ResponseShape =
    | 'string'
    | 'content'
    | 'text'
    | 'choice-message'
    | 'choice-text'
    | 'choice-unknown'
    | 'unknown';

export interface DecodedResponse {
    shape: ResponseShape;
    text: string;
}

/**
 * Adapter result: normalized text or a page-level error
 */
export type RecognitionOutcome =
    | { ok: true; text: string; shape: ResponseShape }
    | { ok: false; error: RecognitionError };
