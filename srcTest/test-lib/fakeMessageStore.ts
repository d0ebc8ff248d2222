import type { MessageStore } from '../../src/utils/messageStore/messageStore.types';

export interface FakeMessage {
    messageId: number;
    tripId: number;
}

// in-memory stand-in for the mongo-backed store
export class FakeMessageStore implements MessageStore {
    readonly calls: string[] = [];
    private readonly messages: FakeMessage[];

    constructor(messages: FakeMessage[] = []) {
        this.messages = [...messages];
    }

    async exists(messageId: number): Promise<boolean> {
        this.calls.push(`exists:${messageId}`);
        return this.messages.some((message) => message.messageId === messageId);
    }

    async existsInTrip(messageId: number, tripId: number): Promise<boolean> {
        this.calls.push(`existsInTrip:${messageId}:${tripId}`);
        return this.messages.some((message) => {
            return message.messageId === messageId && message.tripId === tripId;
        });
    }
}
