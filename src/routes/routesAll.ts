import { Router, Request, Response } from 'express';

// files
import createFilesCrudRouter from './files/filesCrud.route';
import type { MessageStore } from '../utils/messageStore/messageStore.types';

export interface RoutesAllOptions {
    uploadsRoot: string;
    messageStore: MessageStore;
}

const createRoutesAll = ({ uploadsRoot, messageStore }: RoutesAllOptions): Router => {
    const router = Router();

    router.get('/', (req: Request, res: Response) => {
        return res.send('Chat file attachment service.');
    });

    // Add all routes here
    router.use('/files', createFilesCrudRouter({ uploadsRoot, messageStore }));

    /*
    Example:
    POST   /files/upload
    GET    /files/messages/images/<uuid>.png
    DELETE /files/messages/pdfs/<uuid>.pdf
    */

    return router;
};

export default createRoutesAll;
