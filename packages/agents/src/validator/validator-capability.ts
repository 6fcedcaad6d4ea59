import {
    ConflictAnalysisSchema,
    ValidatorDataSchema,
    createDataPart,
    createMessage,
    createTextPart,
    findDataPart,
    getTextFromMessage,
} from '@pacer/core';
import type { ConflictAnalysis, Logger, Message, ValidationRequest } from '@pacer/core';
import type { AgentCapability, CapabilityContext, CapabilityUpdate } from '@pacer/server';
import { extractJsonObject } from '../llm/extract-json.js';
import type { AgentModel, AgentModelRequest } from '../llm/model.js';
import { DEFAULT_WORKOUT_MINUTES, getCalendarAvailability } from '../tools/calendar.js';
import type { CalendarOptions } from '../tools/calendar.js';
import { VALIDATOR_SYSTEM_PROMPT, buildValidationPrompt } from './prompt.js';
import { createValidatorTools } from './tools.js';

const CONFLICT_KEYWORDS = ['conflict', 'missing', 'unavailable', 'no time', 'limited'];

export interface ScheduleSummary {
    availableSlots: string[];
    message: string;
}

export function parseValidationRequest(message: Message): ValidationRequest {
    const rawRequest = getTextFromMessage(message);
    const dataPart = findDataPart(message);
    const parsed = dataPart ? ValidatorDataSchema.safeParse(dataPart.data) : undefined;
    if (!parsed?.success) {
        return { rawRequest };
    }

    const { workout, date, location } = parsed.data;
    return {
        rawRequest,
        ...(workout && { workout }),
        ...(date ? { date } : {}),
        ...(location ? { location } : {}),
    };
}

/**
 * The analysis in a model reply. Without one, a keyword scan of the reply
 * decides `hasConflicts` and the reply becomes the recommendation.
 */
export function readConflictAnalysis(text: string): ConflictAnalysis {
    const json = extractJsonObject(text, 'analysis');
    if (json) {
        const parsed = ConflictAnalysisSchema.safeParse(json['analysis']);
        if (parsed.success) {
            return {
                ...parsed.data,
                recommendation: parsed.data.recommendation || text,
            };
        }
    }

    const lower = text.toLowerCase();
    return {
        hasConflicts: CONFLICT_KEYWORDS.some((keyword) => lower.includes(keyword)),
        conflicts: [],
        recommendation: text,
    };
}

export function toValidatorMessage(analysis: ConflictAnalysis, schedule?: ScheduleSummary): Message {
    return createMessage('assistant', [
        createTextPart(analysis.recommendation),
        createDataPart({
            analysis,
            ...(schedule && { schedule }),
        }),
    ]);
}

export interface ValidatorCapabilityOptions extends CalendarOptions {
    model: AgentModel;
    logger: Logger;
}

/**
 * The validator agent: checks a workout against the calendar and the
 * equipment at the training location.
 */
export class ValidatorCapability implements AgentCapability {
    private readonly model: AgentModel;
    private readonly logger: Logger;
    private readonly calendar: CalendarOptions;

    constructor(options: ValidatorCapabilityOptions) {
        const { model, logger, ...calendar } = options;
        this.model = model;
        this.logger = logger;
        this.calendar = calendar;
    }

    async execute(message: Message, context: CapabilityContext): Promise<Message> {
        const request = parseValidationRequest(message);
        context.logger.info(`Validating ${request.workout?.name ?? 'free-text request'}`, {
            taskId: context.taskId,
        });

        const text = await this.model.generate(this.modelRequest(request));
        return toValidatorMessage(readConflictAnalysis(text), this.scheduleFor(request));
    }

    async *stream(
        message: Message,
        context: CapabilityContext
    ): AsyncGenerator<CapabilityUpdate, Message, undefined> {
        const request = parseValidationRequest(message);
        context.logger.info(
            `Validating ${request.workout?.name ?? 'free-text request'} (streaming)`,
            { taskId: context.taskId }
        );
        yield { type: 'progress', message: 'Checking schedule and equipment' };

        let text = '';
        for await (const chunk of this.model.stream(this.modelRequest(request))) {
            text += chunk;
            yield { type: 'chunk', text: chunk };
        }
        return toValidatorMessage(readConflictAnalysis(text), this.scheduleFor(request));
    }

    /** Free windows for the workout's day, alongside the model's analysis */
    scheduleFor(request: ValidationRequest): ScheduleSummary {
        const availability = getCalendarAvailability(
            {
                date: request.date,
                durationMinutes: request.workout?.estimatedDuration ?? DEFAULT_WORKOUT_MINUTES,
            },
            this.calendar
        );
        return {
            availableSlots: availability.freeWindows,
            message: availability.recommendation,
        };
    }

    private modelRequest(request: ValidationRequest): AgentModelRequest {
        return {
            system: VALIDATOR_SYSTEM_PROMPT,
            prompt: buildValidationPrompt(request),
            tools: createValidatorTools({ logger: this.logger, ...this.calendar }),
        };
    }
}
