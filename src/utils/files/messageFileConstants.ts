// upload limits
const MESSAGE_FILE_MAX_SIZE = 10 * 1024 * 1024;

// content types accepted for chat attachments
const ALLOWED_IMAGE_CONTENT_TYPE_LIST = [
    'image/jpeg',
    'image/jpg',
    'image/png',
    'image/gif',
    'image/webp',
] as const;
const ALLOWED_PDF_CONTENT_TYPE_LIST = ['application/pdf'] as const;

const ALLOWED_CONTENT_TYPE_LIST = [
    ...ALLOWED_IMAGE_CONTENT_TYPE_LIST,
    ...ALLOWED_PDF_CONTENT_TYPE_LIST,
] as const;
type AllowedContentType = typeof ALLOWED_CONTENT_TYPE_LIST[number];

// categories and their directory under uploads/messages
// 'other' is reserved, no allowed content type maps to it yet
type FileCategory = 'image' | 'pdf' | 'other';

const FILE_CATEGORY_DIR_LIST = ['images', 'pdfs', 'other'] as const;
type FileCategoryDir = typeof FILE_CATEGORY_DIR_LIST[number];

const FILE_CATEGORY_DIR: Record<FileCategory, FileCategoryDir> = {
    image: 'images',
    pdf: 'pdfs',
    other: 'other',
};

const CONTENT_TYPE_CATEGORY: Record<AllowedContentType, FileCategory> = {
    'image/jpeg': 'image',
    'image/jpg': 'image',
    'image/png': 'image',
    'image/gif': 'image',
    'image/webp': 'image',
    'application/pdf': 'pdf',
};

// used when a multipart part arrives without a usable content type
const EXTENSION_CONTENT_TYPE: Record<string, AllowedContentType> = {
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
    '.gif': 'image/gif',
    '.webp': 'image/webp',
    '.pdf': 'application/pdf',
};

const DEFAULT_FILE_EXTENSION = '.bin';
const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

// served when a stored name's extension says nothing about its directory
const CATEGORY_DIR_CONTENT_TYPE: Record<FileCategoryDir, string> = {
    images: DEFAULT_CONTENT_TYPE,
    pdfs: 'application/pdf',
    other: DEFAULT_CONTENT_TYPE,
};

const isAllowedContentType = (value: string): value is AllowedContentType => {
    return ALLOWED_CONTENT_TYPE_LIST.some((item) => item === value);
};

const isFileCategoryDir = (value: string): value is FileCategoryDir => {
    return FILE_CATEGORY_DIR_LIST.some((item) => item === value);
};

export type {
    AllowedContentType,
    FileCategory,
    FileCategoryDir,
};

export {
    MESSAGE_FILE_MAX_SIZE,
    ALLOWED_CONTENT_TYPE_LIST,
    FILE_CATEGORY_DIR_LIST,
    FILE_CATEGORY_DIR,
    CONTENT_TYPE_CATEGORY,
    EXTENSION_CONTENT_TYPE,
    DEFAULT_FILE_EXTENSION,
    DEFAULT_CONTENT_TYPE,
    CATEGORY_DIR_CONTENT_TYPE,
    isAllowedContentType,
    isFileCategoryDir,
};
