import { EventEmitter } from 'events';
import type { ErrorKindEnumType } from '../types/enums.js';
import type { BatchCommit, PageProgress, RunResult } from '../types/pipeline.types.js';
import type { RasterImage } from '../types/renderer.types.js';

/**
 * Event types emitted to the control surface
 */
export interface PageScribeEvents {
    // Document events
    'document:pageCount': { pageCount: number; fileType: string };
    'page:preview': { pageIndex: number; image: RasterImage };

    // Run events
    'status:changed': { message: string };
    'page:progress': PageProgress;
    'batch:committed': BatchCommit;
    'run:finished': RunResult;
    'run:error': { kind: ErrorKindEnumType; message: string };
}

/**
 * Type-safe event emitter for pagescribe
 *
 * Listeners run in emission order on the emitting task; the engine never
 * touches state owned by listeners.
 */
export class PageScribeEventEmitter extends EventEmitter {
    emit<K extends keyof PageScribeEvents>(
        event: K,
        data: PageScribeEvents[K]
    ): boolean {
        return super.emit(event, data);
    }

    on<K extends keyof PageScribeEvents>(
        event: K,
        listener: (data: PageScribeEvents[K]) => void
    ): this {
        return super.on(event, listener);
    }

    once<K extends keyof PageScribeEvents>(
        event: K,
        listener: (data: PageScribeEvents[K]) => void
    ): this {
        return super.once(event, listener);
    }

    off<K extends keyof PageScribeEvents>(
        event: K,
        listener: (data: PageScribeEvents[K]) => void
    ): this {
        return super.off(event, listener);
    }
}

export function createEventEmitter(): PageScribeEventEmitter {
    return new PageScribeEventEmitter();
}
