import mongoose from 'mongoose';

export interface WaitForDbOptions {
    mongodbUri: string;
    intervalMs: number;
    // 0 keeps trying forever
    maxAttempts: number;
    connect?: (uri: string) => Promise<unknown>;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const connectMongoose = (intervalMs: number) => async (uri: string) => {
    return mongoose.connect(uri, {
        serverSelectionTimeoutMS: intervalMs,
    });
};

/**
 * Blocks until the database accepts a connection, retrying every
 * `intervalMs`. Resolves with the number of attempts it took.
 */
const waitForDb = async ({
    mongodbUri,
    intervalMs,
    maxAttempts,
    connect = connectMongoose(intervalMs),
}: WaitForDbOptions): Promise<number> => {
    console.log('Waiting for the database to be ready...');

    let attempt = 0;
    for (;;) {
        attempt += 1;
        try {
            await connect(mongodbUri);
            console.log(`Database ready after ${attempt} attempt(s)`);
            return attempt;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            if (maxAttempts > 0 && attempt >= maxAttempts) {
                throw new Error(`Database not ready after ${attempt} attempt(s): ${message}`);
            }
            console.log(`Database not ready (attempt ${attempt}): ${message}`);
            await sleep(intervalMs);
        }
    }
};

export default waitForDb;
