import { createAmazonBedrock } from '@ai-sdk/amazon-bedrock';
import { generateText, stepCountIs, streamText } from 'ai';
import type { LanguageModel, ToolSet } from 'ai';
import { PacerLogComponent, isPacerRuntimeError, toErrorMessage } from '@pacer/core';
import type { Logger, PacerEnvironment } from '@pacer/core';
import { AgentError } from '../errors.js';

export interface AgentModelRequest {
    system: string;
    prompt: string;
    tools: ToolSet;
}

/**
 * The model behind an agent capability: one tool-using turn, either awaited
 * in full or streamed as text deltas.
 */
export interface AgentModel {
    readonly modelId: string;
    generate(request: AgentModelRequest): Promise<string>;
    stream(request: AgentModelRequest): AsyncIterable<string>;
}

export interface VercelAgentModelOptions {
    /** Upper bound on model steps, tool round-trips included */
    maxSteps?: number;
    temperature?: number;
    maxOutputTokens?: number;
}

export const DEFAULT_MAX_STEPS = 8;
export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_OUTPUT_TOKENS = 2000;

/**
 * AgentModel on the Vercel AI SDK.
 */
export class VercelAgentModel implements AgentModel {
    private readonly logger: Logger;
    private readonly maxSteps: number;
    private readonly temperature: number;
    private readonly maxOutputTokens: number;

    constructor(
        private readonly model: LanguageModel,
        logger: Logger,
        options: VercelAgentModelOptions = {}
    ) {
        this.logger = logger.createChild(PacerLogComponent.LLM);
        this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
        this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
        this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
    }

    get modelId(): string {
        return typeof this.model === 'string' ? this.model : this.model.modelId;
    }

    async generate(request: AgentModelRequest): Promise<string> {
        this.logger.debug(`Generating with ${this.modelId}`, {
            tools: Object.keys(request.tools),
        });
        try {
            const result = await generateText({
                model: this.model,
                system: request.system,
                prompt: request.prompt,
                tools: request.tools,
                stopWhen: stepCountIs(this.maxSteps),
                temperature: this.temperature,
                maxOutputTokens: this.maxOutputTokens,
            });
            this.logger.debug('Generation finished', {
                finishReason: result.finishReason,
                steps: result.steps.length,
            });
            return result.text;
        } catch (error) {
            throw this.wrap(error);
        }
    }

    async *stream(request: AgentModelRequest): AsyncGenerator<string, void, undefined> {
        this.logger.debug(`Streaming with ${this.modelId}`, {
            tools: Object.keys(request.tools),
        });
        const result = streamText({
            model: this.model,
            system: request.system,
            prompt: request.prompt,
            tools: request.tools,
            stopWhen: stepCountIs(this.maxSteps),
            temperature: this.temperature,
            maxOutputTokens: this.maxOutputTokens,
        });

        try {
            for await (const part of result.fullStream) {
                switch (part.type) {
                    case 'text-delta':
                        yield part.text;
                        break;
                    case 'tool-call':
                        this.logger.debug(`Model called tool ${part.toolName}`);
                        break;
                    case 'error':
                        throw this.wrap(part.error);
                }
            }
        } catch (error) {
            throw this.wrap(error);
        }
    }

    private wrap(error: unknown): Error {
        if (isPacerRuntimeError(error)) {
            return error;
        }
        const reason = toErrorMessage(error);
        this.logger.error(`Model call failed: ${reason}`);
        return AgentError.generationFailed(this.modelId, reason);
    }
}

/**
 * The agents' model: MODEL_ID on Amazon Bedrock in AWS_REGION, credentials
 * from the default AWS provider chain.
 */
export function createBedrockModel(
    env: Pick<PacerEnvironment, 'AWS_REGION' | 'MODEL_ID'>,
    logger: Logger,
    options?: VercelAgentModelOptions
): VercelAgentModel {
    const bedrock = createAmazonBedrock({ region: env.AWS_REGION });
    return new VercelAgentModel(bedrock(env.MODEL_ID), logger, options);
}
