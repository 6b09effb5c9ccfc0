/**
 * Document format enumeration
 * Formats outside this list keep their upper-cased extension as the type
 */
export const FileTypeEnum = {
    PDF: 'PDF',
    PPTX: 'PPTX',
    TIFF: 'TIFF',
    DOCX: 'DOCX',
    ODT: 'ODT',
    RTF: 'RTF',
    UNKNOWN: 'UNKNOWN',
} as const;

export type FileTypeEnumType = (typeof FileTypeEnum)[keyof typeof FileTypeEnum];

/**
 * Extracted object kind enumeration
 */
export const ObjectKindEnum = {
    TEXT: 'TEXT',
    IMAGE: 'IMAGE',
    TABLE: 'TABLE',
} as const;

export type ObjectKindEnumType = (typeof ObjectKindEnum)[keyof typeof ObjectKindEnum];

/**
 * Pipeline run state enumeration
 */
export const RunStatusEnum = {
    IDLE: 'IDLE',
    RUNNING: 'RUNNING',
    COMPLETED: 'COMPLETED',
    COMPLETED_WITH_ERRORS: 'COMPLETED_WITH_ERRORS',
    CANCELLED: 'CANCELLED',
    FAILED: 'FAILED',
} as const;

export type RunStatusEnumType = (typeof RunStatusEnum)[keyof typeof RunStatusEnum];

export type TerminalRunStatus = Exclude<RunStatusEnumType, 'IDLE' | 'RUNNING'>;

/**
 * Per-batch outcome enumeration
 */
export const BatchStatusEnum = {
    COMMITTED: 'COMMITTED',
    RENDER_FAILED: 'RENDER_FAILED',
    DISCARDED: 'DISCARDED',
} as const;

export type BatchStatusEnumType = (typeof BatchStatusEnum)[keyof typeof BatchStatusEnum];

/**
 * Error kinds reported to the control surface
 */
export const ErrorKindEnum = {
    VALIDATION: 'validation',
    TOOLING: 'tooling',
    RENDER: 'render',
    RECOGNITION: 'recognition',
    INTERNAL: 'internal',
    IO: 'io',
} as const;

export type ErrorKindEnumType = (typeof ErrorKindEnum)[keyof typeof ErrorKindEnum];
