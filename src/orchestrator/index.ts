/**
 * Orchestrator Module
 *
 * Deliberate-then-act control loop for the outreach agent.
 */

// Export types
export * from './types.js';

// Export phases
export { deliberate, buildDeliberationSystemPrompt } from './deliberation.js';
export { execute, buildExecutionSystemPrompt, EXECUTION_KICKOFF } from './execution.js';

// Export main entry points
export { OutreachAgent, createOutreachAgent } from './orchestrate.js';
export type { OutreachAgentOptions } from './orchestrate.js';
