import type { ObjectKindEnumType } from './enums.js';

/**
 * Bounding region of an extracted object: [x0, y0, x1, y1]
 */
export type Coordinates = readonly [number, number, number, number];

/**
 * Recognized payload of an extracted object
 */
export type ObjectContent =
    | { kind: Extract<ObjectKindEnumType, 'TEXT'>; text: string }
    | { kind: Extract<ObjectKindEnumType, 'IMAGE'>; data: Uint8Array; mimeType: string }
    | { kind: Extract<ObjectKindEnumType, 'TABLE'>; rows: string[][] };

/**
 * An object extracted from a document page
 */
export interface ExtractedObject {
    /** Unique, immutable, never reused */
    readonly index: number;
    /** Owning page (0-based), null for page-agnostic content */
    readonly page: number | null;
    readonly content: ObjectContent;
    readonly coordinates?: Coordinates;
}

/**
 * Result of classifying a file and counting its pages
 */
export interface DetectionResult {
    /** Classified format tag, e.g. PDF, TIFF, or the upper-cased extension */
    fileType: string;
    pageCount: number;
    /** File the renderer should read (an intermediate PDF for flow formats) */
    renderPath: string;
}

/**
 * Format detector / page counter collaborator
 */
export interface IFormatDetector {
    detect(filePath: string): Promise<DetectionResult>;
    /** Drop intermediate files of earlier detections, keeping `keepRenderPath` */
    release?(keepRenderPath?: string): Promise<void>;
}
