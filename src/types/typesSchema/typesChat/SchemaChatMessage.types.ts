import type { Document } from 'mongoose';

// Chat message interface
export interface IChatMessage extends Document {
    // identification
    messageId: number;
    tripId: number;
    userId: number;

    body: string;

    // file
    fileUrl: string;
    fileType: string;
    fileName: string;

    // auto
    createdAtUtc: Date | null;
};
