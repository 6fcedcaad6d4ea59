import type { AgentModel, AgentModelRequest } from './llm/model.js';

/**
 * Scripted AgentModel for capability tests: replies with fixed text and
 * records every request.
 */
export class ScriptedModel implements AgentModel {
    readonly modelId = 'scripted';
    readonly requests: AgentModelRequest[] = [];

    constructor(private readonly reply: string | Error, private readonly chunkSize = 16) {}

    async generate(request: AgentModelRequest): Promise<string> {
        this.requests.push(request);
        if (this.reply instanceof Error) {
            throw this.reply;
        }
        return this.reply;
    }

    async *stream(request: AgentModelRequest): AsyncGenerator<string, void, undefined> {
        this.requests.push(request);
        if (this.reply instanceof Error) {
            throw this.reply;
        }
        for (let start = 0; start < this.reply.length; start += this.chunkSize) {
            yield this.reply.slice(start, start + this.chunkSize);
        }
    }
}
