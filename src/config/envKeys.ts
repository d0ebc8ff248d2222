const envKeys = {
    CUSTOM_NODE_ENV: 'local' as 'local' | 'dev' | 'prod' | 'test',
    EXPRESS_PORT: 8000,

    // additional origin
    CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:3000')
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin !== ''),

    // mongodb url
    MONGODB_URI: process.env.MONGODB_URI || 'mongodb://db:27017/chat',

    // db readiness wait
    DB_WAIT_INTERVAL_MS: 2000,
    DB_WAIT_MAX_ATTEMPTS: 0,

    // storage root, holds messages/{images,pdfs,other}
    UPLOADS_ROOT: process.env.UPLOADS_ROOT || 'uploads',
};

if(process.env.EXPRESS_PORT) {
    const temp_EXPRESS_PORT = parseInt(process.env.EXPRESS_PORT);
    if(temp_EXPRESS_PORT >= 1) {
        envKeys.EXPRESS_PORT = temp_EXPRESS_PORT;
    }
}

if(process.env.DB_WAIT_INTERVAL_MS) {
    const temp_DB_WAIT_INTERVAL_MS = parseInt(process.env.DB_WAIT_INTERVAL_MS);
    if(temp_DB_WAIT_INTERVAL_MS >= 1) {
        envKeys.DB_WAIT_INTERVAL_MS = temp_DB_WAIT_INTERVAL_MS;
    }
}

if(process.env.DB_WAIT_MAX_ATTEMPTS) {
    const temp_DB_WAIT_MAX_ATTEMPTS = parseInt(process.env.DB_WAIT_MAX_ATTEMPTS);
    if(temp_DB_WAIT_MAX_ATTEMPTS >= 0) {
        envKeys.DB_WAIT_MAX_ATTEMPTS = temp_DB_WAIT_MAX_ATTEMPTS;
    }
}

if (
    process.env.CUSTOM_NODE_ENV === 'local' ||
    process.env.CUSTOM_NODE_ENV === 'dev' ||
    process.env.CUSTOM_NODE_ENV === 'prod' ||
    process.env.CUSTOM_NODE_ENV === 'test'
) {
    envKeys.CUSTOM_NODE_ENV = process.env.CUSTOM_NODE_ENV;
}

export default envKeys;
