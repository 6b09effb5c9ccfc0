import type {
    Coordinates,
    ExtractedObject,
    IFormatDetector,
    ObjectContent,
} from '../types/document.types.js';
import { FileTypeEnum } from '../types/enums.js';

/**
 * In-memory registry of a document's page count and extracted objects.
 *
 * Object indices come from a monotonic counter and are never reused, even
 * after deletion. Objects are frozen on creation; a correction is a delete
 * followed by a new add.
 *
 * @example
 * ```typescript
 * const doc = new Document();
 * await doc.detectType('/scans/report.pdf', detector);
 * const obj = doc.addObject(0, { kind: 'TEXT', text: 'Page one' });
 * doc.getObject(obj.index); // the same object
 * ```
 */
export class Document {
    private _fileType: string | null = null;
    private _pageCount = 0;
    private _nextIndex = 0;
    private objects: ExtractedObject[] = [];

    /** Classified format tag, null until detection ran */
    get fileType(): string | null {
        return this._fileType;
    }

    get pageCount(): number {
        return this._pageCount;
    }

    /** Index the next added object will receive */
    get nextIndex(): number {
        return this._nextIndex;
    }

    get objectCount(): number {
        return this.objects.length;
    }

    addPage(): void {
        this._pageCount += 1;
    }

    /**
     * Append a new object. The page is not checked against the page count,
     * since detection may run after objects are added.
     */
    addObject(page: number | null, content: ObjectContent, coordinates?: Coordinates): ExtractedObject {
        const created: ExtractedObject = Object.freeze({
            index: this._nextIndex,
            page,
            content: Object.freeze({ ...content }),
            ...(coordinates !== undefined && { coordinates: copyCoordinates(coordinates) }),
        });

        this.objects.push(created);
        this._nextIndex += 1;
        return created;
    }

    getObject(index: number): ExtractedObject | undefined {
        return this.objects.find(obj => obj.index === index);
    }

    /**
     * @returns number of objects removed (0 or 1)
     */
    deleteObject(index: number): number {
        const before = this.objects.length;
        this.objects = this.objects.filter(obj => obj.index !== index);
        return before - this.objects.length;
    }

    /**
     * Remove every object owned by a page.
     * A document without pages has nothing to delete and is left untouched.
     */
    deletePageObjects(page: number): number {
        if (!this.hasPages()) {
            return 0;
        }

        const before = this.objects.length;
        this.objects = this.objects.filter(obj => obj.page !== page);
        return before - this.objects.length;
    }

    getPageObjects(page: number): readonly ExtractedObject[] {
        return this.objects.filter(obj => obj.page === page);
    }

    /** Snapshot in insertion order */
    getObjects(): readonly ExtractedObject[] {
        return [...this.objects];
    }

    hasPages(): boolean {
        return this._pageCount > 0;
    }

    /**
     * Classify the file and take its page count from the detector.
     * Tooling errors for recognized formats propagate unchanged.
     *
     * @returns the file the renderer should read for this document
     */
    async detectType(filePath: string, detector: IFormatDetector): Promise<string> {
        const detection = await detector.detect(filePath);

        this._fileType = detection.fileType || FileTypeEnum.UNKNOWN;
        this._pageCount = Math.max(0, Math.floor(detection.pageCount));

        return detection.renderPath;
    }
}

function copyCoordinates(coordinates: Coordinates): Coordinates {
    const [x0, y0, x1, y1] = coordinates;
    return Object.freeze([x0, y0, x1, y1] as const);
}
