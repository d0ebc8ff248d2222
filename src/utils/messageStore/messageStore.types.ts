/**
 * Existence checks on chat messages, consulted when an upload names a message.
 */
export interface MessageStore {
    exists(messageId: number): Promise<boolean>;
    existsInTrip(messageId: number, tripId: number): Promise<boolean>;
};
