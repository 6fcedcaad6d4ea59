/**
 * A2A Protocol Type Definitions
 *
 * Wire types for the task-oriented Agent-to-Agent JSON-RPC protocol.
 *
 * @module a2a/types
 */

/**
 * Task lifecycle status.
 *
 * pending -> working -> completed | failed | canceled
 *
 * Terminal states are final.
 */
export enum TaskStatus {
    PENDING = 'pending',
    WORKING = 'working',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELED = 'canceled',
}

export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set([
    TaskStatus.COMPLETED,
    TaskStatus.FAILED,
    TaskStatus.CANCELED,
]);

export function isTerminalStatus(status: TaskStatus): boolean {
    return TERMINAL_TASK_STATUSES.has(status);
}

export type MessageRole = 'user' | 'assistant';

/**
 * Text part - natural-language content.
 */
export interface TextPart {
    type: 'text';
    text: string;
}

/**
 * Data part - structured JSON content.
 */
export interface DataPart {
    type: 'data';
    data: Record<string, unknown>;
}

export type MessagePart = TextPart | DataPart;

export interface Message {
    role: MessageRole;
    parts: MessagePart[];
}

/**
 * A task as submitted by a caller and tracked by the server.
 */
export interface Task {
    id: string;
    message: Message;
    status: TaskStatus;
    /** Populated once the task reaches `completed` */
    result?: Message;
}

/**
 * Task shape returned by tasks/send, tasks/get and tasks/cancel.
 */
export interface TaskView {
    taskId: string;
    status: TaskStatus;
    result?: Message;
}

/**
 * The four A2A methods. Routing is a closed switch over this enum.
 */
export enum A2AMethod {
    SEND = 'tasks/send',
    GET = 'tasks/get',
    CANCEL = 'tasks/cancel',
    SEND_SUBSCRIBE = 'tasks/sendSubscribe',
}

export interface TaskSendParams {
    task: {
        id: string;
        message: Message;
    };
}

export interface TaskIdParams {
    taskId: string;
}

export interface AgentSkill {
    id: string;
    name: string;
    description: string;
}

export interface AgentCapabilities {
    streaming: boolean;
    pushNotifications: boolean;
}

/**
 * Static agent descriptor served at /.well-known/agent.json
 */
export interface AgentCard {
    name: string;
    description: string;
    url: string;
    version: string;
    capabilities: AgentCapabilities;
    skills: AgentSkill[];
}
