import { Request, Response, NextFunction } from 'express';

import { isFileServiceError } from '../utils/files/messageFileError';

// status set by body parsers on malformed requests
const getClientErrorStatus = (error: unknown): number | null => {
    if (typeof error !== 'object' || error === null) {
        return null;
    }
    const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : null;
    if (typeof status === 'number' && status >= 400 && status < 500) {
        return status;
    }
    return null;
};

/**
 * Last handler in the chain. Known client errors keep their status; anything
 * else is logged and answered with a 500.
 */
const middlewareErrorHandler = (
    error: unknown,
    req: Request,
    res: Response,
    next: NextFunction,
) => {
    if (res.headersSent) {
        return next(error);
    }

    if (isFileServiceError(error)) {
        console.warn(`${req.method} ${req.originalUrl} | status=${error.status} | ${error.message}`);
        return res.status(error.status).json({ message: error.message, error: error.kind });
    }

    const clientErrorStatus = getClientErrorStatus(error);
    if (clientErrorStatus !== null) {
        const message = error instanceof Error ? error.message : 'Bad request';
        console.warn(`${req.method} ${req.originalUrl} | status=${clientErrorStatus} | ${message}`);
        return res.status(clientErrorStatus).json({ message });
    }

    console.error(`Unhandled error on ${req.method} ${req.originalUrl}`, error);
    return res.status(500).json({ message: 'Server error' });
};

export default middlewareErrorHandler;
