import { Router, Request, Response, NextFunction } from 'express';
import fileUpload from 'express-fileupload';
import { body, query } from 'express-validator';
import { pipeline } from 'stream/promises';
import contentDisposition from 'content-disposition';

import middlewareExpressValidator from '../../middleware/middlewareExpressValidator';
import { MESSAGE_FILE_MAX_SIZE } from '../../utils/files/messageFileConstants';
import { FileServiceError } from '../../utils/files/messageFileError';
import {
    type OpenMessageFileResult,
    resolveContentType,
    validateMessageFile,
    putMessageFile,
    openMessageFile,
    deleteMessageFile,
} from '../../utils/files/messageFileStorage';
import type { MessageStore } from '../../utils/messageStore/messageStore.types';
import type {
    IMessageFileUploadContext,
    IMessageFileUploadResult,
} from '../../types/typesFiles/messageFile.types';

export interface FilesCrudRouterOptions {
    uploadsRoot: string;
    messageStore: MessageStore;
}

// ids are matched exactly, so they must fit a double without rounding
const ID_INT_OPTIONS = { min: 0, max: Number.MAX_SAFE_INTEGER };

const readOptionalId = (value: unknown, fieldName: string): number | null => {
    if (value === undefined || value === null || value === '') {
        return null;
    }
    if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
        return value;
    }
    if (typeof value === 'string' && /^\+?\d+$/.test(value.trim())) {
        const id = parseInt(value.trim(), 10);
        if (Number.isSafeInteger(id)) {
            return id;
        }
    }
    throw new FileServiceError('ValidationFailed', `${fieldName} must be a single integer`);
};

// form fields win over query params
const getUploadContext = (req: Request): IMessageFileUploadContext => {
    return {
        tripId: readOptionalId(req.body?.trip_id, 'trip_id') ?? readOptionalId(req.query.trip_id, 'trip_id'),
        messageId: readOptionalId(req.body?.message_id, 'message_id') ?? readOptionalId(req.query.message_id, 'message_id'),
    };
};

const createFilesCrudRouter = ({
    uploadsRoot,
    messageStore,
}: FilesCrudRouterOptions): Router => {
    // Router
    const router = Router();

    // parts past the limit are cut short and flagged as truncated
    router.use(fileUpload({
        limits: { fileSize: MESSAGE_FILE_MAX_SIZE + 1 },
    }));

    router.get('/health', (req: Request, res: Response) => {
        return res.json({ status: 'ok' });
    });

    // Upload File API
    router.post(
        '/upload',
        body('trip_id').optional({ values: 'falsy' }).not().isArray().isInt(ID_INT_OPTIONS),
        body('message_id').optional({ values: 'falsy' }).not().isArray().isInt(ID_INT_OPTIONS),
        query('trip_id').optional({ values: 'falsy' }).not().isArray().isInt(ID_INT_OPTIONS),
        query('message_id').optional({ values: 'falsy' }).not().isArray().isInt(ID_INT_OPTIONS),
        middlewareExpressValidator,
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                if (!req.files || Object.keys(req.files).length === 0) {
                    throw new FileServiceError('ValidationFailed', 'No file uploaded');
                }

                const file = req.files.file;
                if (!file) {
                    throw new FileServiceError('ValidationFailed', 'No file uploaded');
                }
                if (Array.isArray(file)) {
                    throw new FileServiceError('ValidationFailed', 'Only one file can be uploaded at a time');
                }

                const contentType = validateMessageFile({
                    contentType: resolveContentType({
                        mimetype: file.mimetype,
                        originalName: file.name,
                    }),
                    size: file.size,
                    truncated: file.truncated,
                });

                // the message must exist, and belong to the trip when one is given
                const { tripId, messageId } = getUploadContext(req);
                if (messageId !== null) {
                    const messageFound = tripId !== null
                        ? await messageStore.existsInTrip(messageId, tripId)
                        : await messageStore.exists(messageId);
                    if (!messageFound) {
                        throw new FileServiceError('NotFound', 'Message not found');
                    }
                }

                const stored = await putMessageFile({
                    uploadsRoot,
                    contentType,
                    originalName: file.name,
                    fileContent: file.data,
                });
                console.log(`File uploaded: ${stored.url} (${stored.size} bytes)`);

                const result: IMessageFileUploadResult = {
                    url: stored.url,
                    filename: stored.fileName,
                    original_filename: file.name,
                    content_type: contentType,
                    size: stored.size,
                    type: stored.category,
                };
                return res.status(200).json(result);
            } catch (error) {
                return next(error);
            }
        }
    );

    // Get File API
    router.get(
        '/messages/:file_type/:filename',
        async (req: Request, res: Response, next: NextFunction) => {
            let openedFile: OpenMessageFileResult | null = null;
            try {
                openedFile = await openMessageFile({
                    uploadsRoot,
                    categoryDir: req.params.file_type,
                    fileName: req.params.filename,
                });

                res.setHeader('Content-Type', openedFile.contentType);
                res.setHeader('Content-Length', String(openedFile.size));
                res.setHeader('Content-Disposition', contentDisposition(openedFile.fileName, { type: 'inline' }));
                await pipeline(openedFile.handle.createReadStream({ autoClose: false }), res);
            } catch (error) {
                if (res.headersSent || res.destroyed) {
                    console.error(`Stream failed on ${req.method} ${req.originalUrl}`, error);
                    return;
                }
                return next(error);
            } finally {
                if (openedFile) {
                    await openedFile.handle.close().catch((closeError: unknown) => {
                        console.error(`Failed to close ${req.originalUrl}`, closeError);
                    });
                }
            }
        }
    );

    // Delete File API
    router.delete(
        '/messages/:file_type/:filename',
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                await deleteMessageFile({
                    uploadsRoot,
                    categoryDir: req.params.file_type,
                    fileName: req.params.filename,
                });
                console.log(`File deleted: ${req.originalUrl}`);

                return res.json({ message: 'File deleted successfully' });
            } catch (error) {
                return next(error);
            }
        }
    );

    return router;
};

export default createFilesCrudRouter;
