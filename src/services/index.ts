export { FormatDetector } from './detection/format.detector.js';
export { LibreOfficeConverter } from './detection/office.converter.js';
export type { IDocumentConverter, LibreOfficeConverterOptions } from './detection/office.converter.js';
export { MupdfPageCounter } from './detection/page-counter.js';
export type { IPageCounter } from './detection/page-counter.js';
export { classifyFile } from './detection/file-type.js';
export type { FormatFamily } from './detection/file-type.js';

export { MupdfPageRenderer } from './rendering/mupdf.renderer.js';

export { RecognitionAdapter } from './recognition/recognition.adapter.js';
export { OpenAIVisionBackend } from './recognition/openai.backend.js';
export type { OpenAIVisionConfig } from './recognition/openai.backend.js';
export { GeminiVisionBackend } from './recognition/gemini.backend.js';
export type { GeminiVisionConfig } from './recognition/gemini.backend.js';
export { createRecognitionBackend } from './recognition/backend.factory.js';
export { decodeResponse, stripCodeFences, normalizeResponse } from './recognition/response-normalizer.js';

export { saveResults, composeResults } from './output/result-writer.js';
