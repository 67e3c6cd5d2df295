// mcp-swarm-orchestrator/src/types/index.ts
// Barrel re-export - all domain types

export * from './agent.js';
export * from './handoff.js';
export * from './routing.js';
export * from './hitl.js';
