import { ModelChatMessage } from '../../schema/schemaChat/SchemaChatMessage.schema';
import type { MessageStore } from './messageStore.types';

const createMessageStoreMongo = (): MessageStore => {
    return {
        exists: async (messageId: number): Promise<boolean> => {
            const result = await ModelChatMessage.exists({ messageId });
            return result !== null;
        },
        existsInTrip: async (messageId: number, tripId: number): Promise<boolean> => {
            const result = await ModelChatMessage.exists({ messageId, tripId });
            return result !== null;
        },
    };
};

export {
    createMessageStoreMongo,
};
