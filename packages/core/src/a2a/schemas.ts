/**
 * Zod schemas for A2A wire payloads.
 *
 * Servers validate inbound envelopes and params with these; clients validate
 * responses from peers before trusting them.
 */

import { z } from 'zod';
import { A2AMethod, TaskStatus } from './types.js';
import type { AgentCard, Message, MessagePart, TaskView } from './types.js';

export const TextPartSchema = z.object({
    type: z.literal('text'),
    text: z.string(),
});

export const DataPartSchema = z.object({
    type: z.literal('data'),
    data: z.record(z.unknown()),
});

export const MessagePartSchema: z.ZodType<MessagePart> = z.discriminatedUnion('type', [
    TextPartSchema,
    DataPartSchema,
]);

export const MessageSchema: z.ZodType<Message> = z.object({
    role: z.enum(['user', 'assistant']),
    parts: z.array(MessagePartSchema),
});

export const TaskStatusSchema = z.nativeEnum(TaskStatus);

export const TaskSendParamsSchema = z.object({
    task: z.object({
        id: z.string().min(1, 'task.id must be a non-empty string'),
        message: MessageSchema,
    }),
});

export const TaskIdParamsSchema = z.object({
    taskId: z.string().min(1, 'taskId must be a non-empty string'),
});

/**
 * Envelope check only. `method` stays a string here so an unknown method can
 * be answered with METHOD_NOT_FOUND rather than INVALID_REQUEST.
 */
export const JsonRpcRequestEnvelopeSchema = z.object({
    jsonrpc: z.literal('2.0'),
    id: z.union([z.string(), z.number()]),
    method: z.string(),
    params: z.record(z.unknown()).default({}),
});

export type JsonRpcRequestEnvelope = z.output<typeof JsonRpcRequestEnvelopeSchema>;

export const A2AMethodSchema = z.nativeEnum(A2AMethod);

export const JsonRpcErrorSchema = z.object({
    code: z.number(),
    message: z.string(),
    data: z.record(z.unknown()).optional(),
});

export const TaskViewSchema: z.ZodType<TaskView> = z.object({
    taskId: z.string(),
    status: TaskStatusSchema,
    result: MessageSchema.optional(),
});

const JsonRpcIdSchema = z.union([z.string(), z.number(), z.null()]);

export const JsonRpcResponseSchema = z.union([
    z.object({
        jsonrpc: z.literal('2.0'),
        id: JsonRpcIdSchema,
        error: JsonRpcErrorSchema,
    }),
    z.object({
        jsonrpc: z.literal('2.0'),
        id: JsonRpcIdSchema,
        result: z.record(z.unknown()),
    }),
]);

export const AgentCardSchema: z.ZodType<AgentCard> = z.object({
    name: z.string(),
    description: z.string(),
    url: z.string(),
    version: z.string(),
    capabilities: z.object({
        streaming: z.boolean(),
        pushNotifications: z.boolean(),
    }),
    skills: z.array(
        z.object({
            id: z.string(),
            name: z.string(),
            description: z.string(),
        })
    ),
});
