import type { FileCategory, FileCategoryDir } from '../../utils/files/messageFileConstants';

// Upload response body, returned once and never persisted
export interface IMessageFileUploadResult {
    url: string;
    filename: string;
    original_filename: string;
    content_type: string;
    size: number;
    type: FileCategory;
};

export interface IMessageFileStored {
    fileName: string;
    category: FileCategory;
    categoryDir: FileCategoryDir;
    filePath: string;
    url: string;
    size: number;
};

export interface IMessageFileUploadContext {
    tripId: number | null;
    messageId: number | null;
};
