import { Request, Response, NextFunction } from 'express';
import { validationResult } from 'express-validator';

import type { FileErrorKind } from '../utils/files/messageFileError';

/**
 * Answers failed request validators with the same body shape as
 * `middlewareErrorHandler`, plus the per-field errors.
 */
const middlewareExpressValidator = (
    req: Request,
    res: Response,
    next: NextFunction,
) => {
    const result = validationResult(req);
    if (result.isEmpty()) {
        return next();
    }

    const errors = result.array();
    const fields = errors.map((item) => (item.type === 'field' ? item.path : item.type));
    const message = `Invalid value for ${[...new Set(fields)].join(', ')}`;
    const kind: FileErrorKind = 'ValidationFailed';

    console.warn(`${req.method} ${req.originalUrl} | status=400 | ${message}`);
    return res.status(400).json({ message, error: kind, errors });
};

export default middlewareExpressValidator;
