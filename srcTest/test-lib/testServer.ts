import { once } from 'events';
import type { Express } from 'express';
import type { Server } from 'http';

export interface TestServer {
    baseUrl: string;
    close: () => Promise<void>;
}

/**
 * Listens on an ephemeral loopback port inside the test process.
 */
export const startTestServer = async (app: Express): Promise<TestServer> => {
    const server: Server = app.listen(0, '127.0.0.1');
    await once(server, 'listening');

    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Test server has no TCP address');
    }

    return {
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>((resolve, reject) => {
            server.closeAllConnections();
            server.close((error) => (error ? reject(error) : resolve()));
        }),
    };
};
