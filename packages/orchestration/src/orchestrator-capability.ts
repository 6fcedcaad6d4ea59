import {
    ValidatorDataSchema,
    createDataPart,
    createMessage,
    createTextPart,
    findDataPart,
} from '@pacer/core';
import type { Message } from '@pacer/core';
import { parseWorkoutRequest } from '@pacer/server';
import type { AgentCapability, CapabilityContext, CapabilityUpdate } from '@pacer/server';
import type { OrchestrationRequest, OrchestrationResult } from './types.js';
import type { WorkoutOrchestrator } from './workout-orchestrator.js';

const PlacementSchema = ValidatorDataSchema.pick({ date: true, location: true });

/**
 * Orchestration input from an inbound message: goal and constraints through
 * the request parser, date and location from the data part when present.
 */
export function toOrchestrationRequest(message: Message): OrchestrationRequest {
    const { goal, constraints } = parseWorkoutRequest(message);
    const dataPart = findDataPart(message);
    const placement = dataPart ? PlacementSchema.safeParse(dataPart.data) : undefined;
    const date = placement?.success ? placement.data.date : undefined;
    const location = placement?.success ? placement.data.location : undefined;

    return {
        goal,
        constraints,
        ...(date ? { date } : {}),
        ...(location ? { location } : {}),
    };
}

export function summarizeResult(result: OrchestrationResult): string {
    const { workout, analysis } = result;
    const lines = [
        `${workout.name}: ${workout.exercises.length} exercises, ` +
            `about ${workout.estimatedDuration} minutes.`,
    ];
    for (const exercise of workout.exercises) {
        lines.push(
            `- ${exercise.name}: ${exercise.sets} x ${exercise.reps}, rest ${exercise.restSeconds}s`
        );
    }
    if (result.hasConflicts) {
        lines.push(`Adjusted for conflicts: ${analysis.recommendation || 'see analysis'}`);
    } else if (analysis.recommendation) {
        lines.push(analysis.recommendation);
    }
    return lines.join('\n');
}

export function toResultMessage(result: OrchestrationResult): Message {
    return createMessage('assistant', [
        createTextPart(summarizeResult(result)),
        createDataPart({
            workout: result.workout,
            analysis: result.analysis,
            hasConflicts: result.hasConflicts,
            isCompromise: result.isCompromise,
            ...(result.schedule !== undefined && { schedule: result.schedule }),
        }),
    ]);
}

/**
 * The orchestrator agent's capability: one orchestration run per task.
 */
export class OrchestratorCapability implements AgentCapability {
    constructor(private readonly orchestrator: WorkoutOrchestrator) {}

    async execute(message: Message, context: CapabilityContext): Promise<Message> {
        const request = toOrchestrationRequest(message);
        context.logger.debug('Orchestrating workout request', {
            taskId: context.taskId,
            goal: request.goal,
        });
        return toResultMessage(await this.orchestrator.run(request));
    }

    async *stream(
        message: Message,
        context: CapabilityContext
    ): AsyncGenerator<CapabilityUpdate, Message, undefined> {
        const request = toOrchestrationRequest(message);
        context.logger.debug('Orchestrating workout request (streaming)', {
            taskId: context.taskId,
            goal: request.goal,
        });

        const steps = this.orchestrator.steps(request);
        let next = await steps.next();
        while (!next.done) {
            yield { type: 'progress', message: next.value.message };
            next = await steps.next();
        }
        return toResultMessage(next.value);
    }
}
