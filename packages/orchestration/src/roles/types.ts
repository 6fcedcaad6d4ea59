import type { Message } from '@pacer/core';
import type { SendOptions } from '@pacer/client-sdk';

/**
 * The slice of A2AClient a role adapter needs.
 */
export interface PeerAgent {
    readonly peer: string;
    send(message: Message, options?: SendOptions): Promise<Message>;
}
