import express from 'express';
import morgan from 'morgan';
import cors from 'cors';

import createRoutesAll from './routes/routesAll';
import middlewareErrorHandler from './middleware/middlewareErrorHandler';
import type { MessageStore } from './utils/messageStore/messageStore.types';

export interface CreateAppOptions {
    // fixed at startup, read-only afterwards
    uploadsRoot: string;
    messageStore: MessageStore;
    corsOrigins?: string[];
    requestLogging?: boolean;
}

const createApp = ({
    uploadsRoot,
    messageStore,
    corsOrigins = [],
    requestLogging = true,
}: CreateAppOptions) => {
    const app = express();
    app.use(express.json({
        limit: '1mb',
    }));

    app.use(cors({
        origin: corsOrigins,
        methods: 'GET,POST,DELETE',
        allowedHeaders: ['Content-Type'],
    }));

    // Use morgan to log requests
    if (requestLogging) {
        app.use(morgan('dev'));
    }

    app.use('/', createRoutesAll({ uploadsRoot, messageStore }));

    app.use(middlewareErrorHandler);

    return app;
};

export default createApp;
