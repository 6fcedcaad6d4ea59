/**
 * Message part helpers
 */

import type { DataPart, Message, MessagePart, MessageRole, TextPart } from './types.js';

export function createTextPart(text: string): TextPart {
    return { type: 'text', text };
}

export function createDataPart(data: Record<string, unknown>): DataPart {
    return { type: 'data', data };
}

export function createMessage(role: MessageRole, parts: MessagePart[]): Message {
    return { role, parts };
}

/**
 * Concatenate all text parts, space-joined, in order.
 */
export function getTextFromMessage(message: Message): string {
    return message.parts
        .filter((part): part is TextPart => part.type === 'text' && part.text.length > 0)
        .map((part) => part.text)
        .join(' ');
}

/**
 * First data part of a message, optionally the first one carrying `key`.
 */
export function findDataPart(message: Message, key?: string): DataPart | undefined {
    return message.parts.find(
        (part): part is DataPart => part.type === 'data' && (key === undefined || key in part.data)
    );
}
