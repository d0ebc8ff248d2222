import type { IMessageFileUploadResult } from '../../src/types/typesFiles/messageFile.types';

const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
};

export const readJsonRecord = async (res: Response): Promise<Record<string, unknown>> => {
    const body: unknown = await res.json();
    if (!isRecord(body)) {
        throw new Error(`Expected a JSON object, got ${JSON.stringify(body)}`);
    }
    return body;
};

export const readUploadResult = async (res: Response): Promise<IMessageFileUploadResult> => {
    const body = await readJsonRecord(res);
    const { url, filename, original_filename, content_type, size, type } = body;
    if (
        typeof url !== 'string' ||
        typeof filename !== 'string' ||
        typeof original_filename !== 'string' ||
        typeof content_type !== 'string' ||
        typeof size !== 'number' ||
        (type !== 'image' && type !== 'pdf' && type !== 'other')
    ) {
        throw new Error(`Unexpected upload result: ${JSON.stringify(body)}`);
    }
    return { url, filename, original_filename, content_type, size, type };
};
