export { createOrchestratorAgentCard, ORCHESTRATOR_AGENT_NAME } from './agent-card.js';
export { createOrchestratorCapability, createPeerClients } from './create-orchestrator.js';
export type {
    OrchestratorAgentOptions,
    PeerClientOverrides,
    PeerClients,
} from './create-orchestrator.js';
