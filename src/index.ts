import 'dotenv/config';

import envKeys from './config/envKeys';
import createApp from './serverCommon';
import waitForDb from './utils/common/waitForDb';
import { ensureMessageFileDirs } from './utils/files/messageFileStorage';
import { createMessageStoreMongo } from './utils/messageStore/messageStoreMongo';

const init = async () => {
    await waitForDb({
        mongodbUri: envKeys.MONGODB_URI,
        intervalMs: envKeys.DB_WAIT_INTERVAL_MS,
        maxAttempts: envKeys.DB_WAIT_MAX_ATTEMPTS,
    });
    console.log('Connected to MongoDB');

    await ensureMessageFileDirs(envKeys.UPLOADS_ROOT);

    const app = createApp({
        uploadsRoot: envKeys.UPLOADS_ROOT,
        messageStore: createMessageStoreMongo(),
        corsOrigins: envKeys.CORS_ORIGINS,
        requestLogging: envKeys.CUSTOM_NODE_ENV !== 'test',
    });

    // Start server
    const PORT = envKeys.EXPRESS_PORT;
    app.listen(PORT, () => {
        console.log(`Server running on port http://localhost:${PORT}`)
    });
};

init().catch((err) => {
    console.log('Error starting server', err);
    process.exit(1);
});
