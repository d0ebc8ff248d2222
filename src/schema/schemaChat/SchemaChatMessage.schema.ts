import mongoose, { Schema } from 'mongoose';

import type { IChatMessage } from '../../types/typesSchema/typesChat/SchemaChatMessage.types';

// Chat message schema
const chatMessageSchema = new Schema<IChatMessage>({
    // identification
    messageId: { type: Number, required: true, unique: true },
    tripId: { type: Number, required: true, index: true },
    userId: { type: Number, required: true, index: true },

    body: { type: String, default: '' },

    // file info
    fileUrl: {
        type: String,
        default: '',
        // "/files/messages/images/<uuid>.png"
    },
    fileType: {
        type: String,
        default: '',
        // image or pdf
    },
    fileName: { type: String, default: '' },

    // auto
    createdAtUtc: { type: Date, default: null },
});

chatMessageSchema.index({ messageId: 1, tripId: 1 });

// Chat message model
const ModelChatMessage = mongoose.model<IChatMessage>(
    'chatMessage',
    chatMessageSchema,
    'chatMessage'
);

export {
    ModelChatMessage
};
