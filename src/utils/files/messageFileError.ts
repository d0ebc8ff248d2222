export type FileErrorKind =
    | 'UnsupportedMediaType'
    | 'PayloadTooLarge'
    | 'InvalidCategory'
    | 'NotFound'
    | 'ValidationFailed';

const FILE_ERROR_STATUS: Record<FileErrorKind, 400 | 404> = {
    UnsupportedMediaType: 400,
    PayloadTooLarge: 400,
    InvalidCategory: 400,
    NotFound: 404,
    ValidationFailed: 400,
};

/**
 * Client-facing failure of a file operation. The kind fixes the HTTP status.
 */
export class FileServiceError extends Error {
    readonly kind: FileErrorKind;
    readonly status: 400 | 404;

    constructor(kind: FileErrorKind, message: string) {
        super(message);
        this.name = 'FileServiceError';
        this.kind = kind;
        this.status = FILE_ERROR_STATUS[kind];
    }
}

export const isFileServiceError = (error: unknown): error is FileServiceError => {
    return error instanceof FileServiceError;
};

export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException => {
    return error instanceof Error && 'code' in error;
};
