/**
 * System constants for pagescribe
 * Centralizes default values and user-facing messages
 */

import type { RecognitionProvider } from '../types/config.types.js';

export const VERSION = '0.1.0';

// ============================================
// Recognition Settings
// ============================================

export const DEFAULT_OCR_PROMPT =
    'Transcribe the contents of this image into plain text, and try to keep as close as possible ' +
    'to the original layout. Do not say anything else.';

export const DEFAULT_MODELS: Record<RecognitionProvider, string> = {
    openai: 'gemma-3-12b-it-qat',
    gemini: 'gemini-1.5-flash',
};

export const GENERATION_DEFAULTS = {
    /**
     * Transcription should be literal
     */
    temperature: 0.1,
    maxOutputTokens: 4096,
} as const;

/**
 * Placeholder key for local OpenAI-compatible servers that ignore auth
 */
export const LOCAL_SERVER_API_KEY = 'lm-studio';

// ============================================
// Status Messages
// ============================================

export const STATUS_MESSAGES = {
    loadingBatch: (start: number, end: number): string =>
        `Loading batch: Pages ${start} to ${end}...`,
    processingPage: (pageNumber: number, attempted: number, total: number): string =>
        `OCR processing page ${pageNumber} (${attempted}/${total})...`,
    completed: 'Conversion completed.',
    completedWithErrors: 'Conversion finished, but encountered errors or no text was processed.',
    cancelled: 'Conversion cancelled by user.',
    failed: (message: string): string => `Conversion failed unexpectedly: ${message}`,
    cancelling: 'Cancelling conversion...',
} as const;

// ============================================
// Output Markers
// ============================================

export const OUTPUT_MARKERS = {
    pageBlock: (pageNumber: number, text: string): string =>
        `--- Page ${pageNumber} ---\n${text}\n`,
    pageError: (pageNumber: number, message: string): string =>
        `Error processing page ${pageNumber}: ${message}`,
    batchLoadError: (start: number, end: number, message: string): string =>
        `\n--- ERROR LOADING BATCH: Pages ${start}-${end} ---\nError: ${message}\n`,
} as const;

