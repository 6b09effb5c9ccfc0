import type { RunStatusEnumType } from './enums.js';
import type { RunResult } from './pipeline.types.js';

/**
 * Summary of a loaded document
 */
export interface DocumentInfo {
    filePath: string;
    fileType: string;
    pageCount: number;
    /** File the renderer reads; differs from `filePath` for converted formats */
    renderPath: string;
}

/**
 * Snapshot of a session for status displays
 */
export interface SessionStatus {
    status: RunStatusEnumType;
    /** Set while a run is active */
    runId?: string;
    document?: DocumentInfo;
    committedBatches: number;
    lastResult?: RunResult;
}
