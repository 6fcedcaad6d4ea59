import { resolvePeerDestination } from '@pacer/core';
import type { Logger, PacerEnvironment } from '@pacer/core';
import { A2AClient } from '@pacer/client-sdk';
import type { A2AClientOptions } from '@pacer/client-sdk';
import {
    OrchestratorCapability,
    PlannerRole,
    ValidatorRole,
    WorkoutOrchestrator,
} from '@pacer/orchestration';
import { PLANNER_AGENT_NAME } from '../planner/agent-card.js';
import { VALIDATOR_AGENT_NAME } from '../validator/agent-card.js';

/** Client settings shared by both peers, mostly for tests */
export type PeerClientOverrides = Pick<
    A2AClientOptions,
    'fetch' | 'sleep' | 'retry' | 'agentCoreInvoker'
>;

export interface OrchestratorAgentOptions {
    env: PacerEnvironment;
    logger: Logger;
    clients?: PeerClientOverrides;
}

export interface PeerClients {
    planner: A2AClient;
    validator: A2AClient;
}

export function createPeerClients(options: OrchestratorAgentOptions): PeerClients {
    const { env, logger, clients } = options;
    const shared = { logger, timeoutMs: env.A2A_TIMEOUT_MS, region: env.AWS_REGION, ...clients };

    return {
        planner: new A2AClient({
            ...shared,
            destination: resolvePeerDestination(env, 'biomechanics'),
            peer: PLANNER_AGENT_NAME,
        }),
        validator: new A2AClient({
            ...shared,
            destination: resolvePeerDestination(env, 'lifesync'),
            peer: VALIDATOR_AGENT_NAME,
        }),
    };
}

/**
 * The orchestrator agent's capability, wired to both peers from configuration.
 */
export function createOrchestratorCapability(
    options: OrchestratorAgentOptions
): OrchestratorCapability {
    const { planner, validator } = createPeerClients(options);
    options.logger.info(
        `Peers: ${planner.peer} via ${planner.transportKind}, ` +
            `${validator.peer} via ${validator.transportKind}`
    );

    return new OrchestratorCapability(
        new WorkoutOrchestrator({
            planner: new PlannerRole(planner),
            validator: new ValidatorRole(validator),
            logger: options.logger,
        })
    );
}
