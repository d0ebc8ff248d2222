import path from 'path';
import { promises as fsPromises } from 'fs';
import type { FileHandle } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';

import {
    type AllowedContentType,
    type FileCategory,
    type FileCategoryDir,
    MESSAGE_FILE_MAX_SIZE,
    ALLOWED_CONTENT_TYPE_LIST,
    FILE_CATEGORY_DIR,
    FILE_CATEGORY_DIR_LIST,
    CONTENT_TYPE_CATEGORY,
    EXTENSION_CONTENT_TYPE,
    DEFAULT_FILE_EXTENSION,
    DEFAULT_CONTENT_TYPE,
    CATEGORY_DIR_CONTENT_TYPE,
    isAllowedContentType,
    isFileCategoryDir,
} from './messageFileConstants';
import { FileServiceError, isErrnoException } from './messageFileError';
import type { IMessageFileStored } from '../../types/typesFiles/messageFile.types';

// ==========================================
// PATHS
// ==========================================

const getMessagesDir = (uploadsRoot: string): string => {
    return path.join(uploadsRoot, 'messages');
};

const getCategoryDirPath = (uploadsRoot: string, categoryDir: FileCategoryDir): string => {
    return path.join(getMessagesDir(uploadsRoot), categoryDir);
};

const buildMessageFileUrl = (categoryDir: FileCategoryDir, fileName: string): string => {
    return `/files/messages/${categoryDir}/${fileName}`;
};

const ensureMessageFileDirs = async (uploadsRoot: string): Promise<void> => {
    for (const categoryDir of FILE_CATEGORY_DIR_LIST) {
        await fsPromises.mkdir(getCategoryDirPath(uploadsRoot, categoryDir), { recursive: true });
    }
};

// ==========================================
// CLASSIFY
// ==========================================

/**
 * Content type a part is checked against. Parts sent without a usable type
 * fall back to the original filename's extension.
 */
const resolveContentType = ({
    mimetype,
    originalName,
}: {
    mimetype: string;
    originalName: string;
}): string => {
    const declared = mimetype.split(';')[0].trim().toLowerCase();
    if (declared !== '' && declared !== DEFAULT_CONTENT_TYPE) {
        return declared;
    }

    const extension = path.extname(originalName).toLowerCase();
    const inferred: AllowedContentType | undefined = EXTENSION_CONTENT_TYPE[extension];
    return inferred ?? declared;
};

const getFileCategory = (contentType: AllowedContentType): FileCategory => {
    return CONTENT_TYPE_CATEGORY[contentType];
};

/**
 * Content type a stored file is served with. The extension decides only when
 * it agrees with the directory the file sits in.
 */
const getStoredContentType = ({
    categoryDir,
    fileName,
}: {
    categoryDir: FileCategoryDir;
    fileName: string;
}): string => {
    const extension = path.extname(fileName).toLowerCase();
    const contentType: AllowedContentType | undefined = EXTENSION_CONTENT_TYPE[extension];
    if (contentType && FILE_CATEGORY_DIR[getFileCategory(contentType)] === categoryDir) {
        return contentType;
    }
    return CATEGORY_DIR_CONTENT_TYPE[categoryDir];
};

/**
 * Checks type first, then size. Nothing touches the disk before this passes.
 */
const validateMessageFile = ({
    contentType,
    size,
    truncated,
}: {
    contentType: string;
    size: number;
    truncated: boolean;
}): AllowedContentType => {
    if (!isAllowedContentType(contentType)) {
        throw new FileServiceError(
            'UnsupportedMediaType',
            `File type not allowed. Allowed types: ${ALLOWED_CONTENT_TYPE_LIST.join(', ')}. Received: ${contentType || 'unknown'}`,
        );
    }

    if (truncated || size > MESSAGE_FILE_MAX_SIZE) {
        throw new FileServiceError(
            'PayloadTooLarge',
            `File too large. Maximum size: ${(MESSAGE_FILE_MAX_SIZE / (1024 * 1024)).toFixed(1)} MB`,
        );
    }

    return contentType;
};

// ==========================================
// NAMES
// ==========================================

const generateStoredFileName = (originalName: string): string => {
    const extension = path.extname(originalName).toLowerCase();
    const safeExtension = /^\.[a-z0-9]+$/.test(extension) ? extension : DEFAULT_FILE_EXTENSION;
    return `${uuidv4()}${safeExtension}`;
};

// a stored name is a single visible path component
const isSafeStoredFileName = (fileName: string): boolean => {
    if (fileName === '' || fileName.startsWith('.')) {
        return false;
    }
    return !/[/\\\0]/.test(fileName);
};

const parseCategoryDir = (value: string): FileCategoryDir => {
    if (!isFileCategoryDir(value)) {
        throw new FileServiceError(
            'InvalidCategory',
            `Invalid file type. Must be one of: ${FILE_CATEGORY_DIR_LIST.join(', ')}`,
        );
    }
    return value;
};

/**
 * Maps the `{file_type}/{filename}` pair of a file URL onto the disk.
 * The category is checked before anything else.
 */
const resolveMessageFilePath = ({
    uploadsRoot,
    categoryDir,
    fileName,
}: {
    uploadsRoot: string;
    categoryDir: string;
    fileName: string;
}): string => {
    const parsedCategoryDir = parseCategoryDir(categoryDir);
    if (!isSafeStoredFileName(fileName)) {
        throw new FileServiceError('NotFound', 'File not found');
    }
    return path.join(getCategoryDirPath(uploadsRoot, parsedCategoryDir), fileName);
};

// ==========================================
// PUT FILE
// ==========================================

/**
 * Writes the bytes next to their final path and renames them into place,
 * so a reader sees either nothing or the complete file.
 *
 * @example
 * const stored = await putMessageFile({
 *   uploadsRoot: 'uploads',
 *   contentType: 'image/png',
 *   originalName: 'photo.png',
 *   fileContent: buffer,
 * });
 * // stored.url === '/files/messages/images/<uuid>.png'
 */
const putMessageFile = async ({
    uploadsRoot,
    contentType,
    originalName,
    fileContent,
}: {
    uploadsRoot: string;
    contentType: AllowedContentType;
    originalName: string;
    fileContent: Buffer;
}): Promise<IMessageFileStored> => {
    const category = getFileCategory(contentType);
    const categoryDir = FILE_CATEGORY_DIR[category];
    const dirPath = getCategoryDirPath(uploadsRoot, categoryDir);
    await fsPromises.mkdir(dirPath, { recursive: true });

    const fileName = generateStoredFileName(originalName);
    const filePath = path.join(dirPath, fileName);
    const tempFilePath = path.join(dirPath, `.${fileName}.part`);

    try {
        await fsPromises.writeFile(tempFilePath, fileContent, { flag: 'wx' });
        await fsPromises.rename(tempFilePath, filePath);
    } catch (error) {
        await fsPromises.rm(tempFilePath, { force: true });
        throw error;
    }

    return {
        fileName,
        category,
        categoryDir,
        filePath,
        url: buildMessageFileUrl(categoryDir, fileName),
        size: fileContent.length,
    };
};

// ==========================================
// GET FILE
// ==========================================

export interface OpenMessageFileResult {
    handle: FileHandle;
    size: number;
    contentType: string;
    fileName: string;
}

/**
 * Opens a stored file for streaming. Once open, the bytes stay readable
 * even if the file is deleted concurrently.
 */
const openMessageFile = async ({
    uploadsRoot,
    categoryDir,
    fileName,
}: {
    uploadsRoot: string;
    categoryDir: string;
    fileName: string;
}): Promise<OpenMessageFileResult> => {
    const filePath = resolveMessageFilePath({ uploadsRoot, categoryDir, fileName });

    let handle: FileHandle;
    try {
        handle = await fsPromises.open(filePath, 'r');
    } catch (error) {
        if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
            throw new FileServiceError('NotFound', 'File not found');
        }
        throw error;
    }

    try {
        const stats = await handle.stat();
        if (!stats.isFile()) {
            throw new FileServiceError('NotFound', 'File not found');
        }
        return {
            handle,
            size: stats.size,
            contentType: getStoredContentType({
                categoryDir: parseCategoryDir(categoryDir),
                fileName,
            }),
            fileName,
        };
    } catch (error) {
        await handle.close();
        throw error;
    }
};

// ==========================================
// DELETE FILE
// ==========================================

const deleteMessageFile = async ({
    uploadsRoot,
    categoryDir,
    fileName,
}: {
    uploadsRoot: string;
    categoryDir: string;
    fileName: string;
}): Promise<void> => {
    const filePath = resolveMessageFilePath({ uploadsRoot, categoryDir, fileName });

    try {
        await fsPromises.unlink(filePath);
    } catch (error) {
        if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR' || error.code === 'EISDIR')) {
            throw new FileServiceError('NotFound', 'File not found');
        }
        throw error;
    }
};

export {
    getMessagesDir,
    getCategoryDirPath,
    buildMessageFileUrl,
    ensureMessageFileDirs,
    resolveContentType,
    getFileCategory,
    getStoredContentType,
    validateMessageFile,
    generateStoredFileName,
    isSafeStoredFileName,
    parseCategoryDir,
    resolveMessageFilePath,
    putMessageFile,
    openMessageFile,
    deleteMessageFile,
};
