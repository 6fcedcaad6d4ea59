import type { Logger, Message } from '@pacer/core';

/**
 * Incremental output from a streaming capability.
 */
export type CapabilityUpdate =
    | { type: 'progress'; message: string }
    | { type: 'chunk'; text: string };

export interface CapabilityContext {
    taskId: string;
    logger: Logger;
}

/**
 * The work an agent performs for a task.
 *
 * `execute` runs to completion. `stream`, when present, yields updates and
 * returns the final message; the dispatcher uses it for tasks/sendSubscribe.
 * Either may throw: the dispatcher turns the failure into INTERNAL_ERROR.
 */
export interface AgentCapability {
    execute(message: Message, context: CapabilityContext): Promise<Message>;
    stream?(
        message: Message,
        context: CapabilityContext
    ): AsyncGenerator<CapabilityUpdate, Message, undefined>;
}
